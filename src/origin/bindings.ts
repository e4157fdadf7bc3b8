/**
 * Entity bindings
 *
 * One binding per layout entity: it turns state changes into commands on
 * the entity's endpoint link, and (for sensors) reports back into state.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { errorMessage } from '../errors';
import { LinkManager } from '../link/link-manager';
import {
  Aspect,
  SensorLevel,
  encodeSensorRegister,
  encodeSignalHeadSet,
  encodeTurnoutSet,
} from '../protocol/commands';
import { Sensor, SignalHead, Turnout, TurnoutState } from './layout';
import { SensorAddress, SignalHeadAddress, TurnoutAddress } from './naming';

const log = getLogger('Bindings');

/** The part of a link a binding talks to */
export type OutboundLink = Pick<LinkManager, 'alias' | 'send' | 'waitForActive'>;

/** Tracks sends still waiting for the link so shutdown can wait for them */
class PendingSends {
  private readonly pending = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger;
  }

  track(work: Promise<void>): void {
    const tracked: Promise<void> = work.then(
      () => {
        this.pending.delete(tracked);
      },
      (err: unknown) => {
        this.pending.delete(tracked);
        this.log.error({ err: errorMessage(err) }, 'Send failed');
      },
    );
    this.pending.add(tracked);
  }

  async settled(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}

// --- Turnouts ---

export class TurnoutBinding {
  readonly turnout: Turnout;
  readonly address: TurnoutAddress;
  private readonly link: OutboundLink;
  private readonly waitMs: number;
  private readonly sends: PendingSends;
  private readonly log: Logger;
  /** Position last asked of the node, sent or still waiting */
  private lastSent: boolean | null = null;
  /** Position the node last accepted */
  private confirmed: boolean | null = null;
  /** Layout state before the oldest change still waiting, used until a send succeeds */
  private fallback: TurnoutState | null = null;
  private changes = 0;
  private syncedThrough = 0;
  private waiting = 0;
  private restoring = false;
  private unsubscribe: (() => void) | null = null;

  constructor(turnout: Turnout, address: TurnoutAddress, link: OutboundLink, waitMs: number) {
    this.turnout = turnout;
    this.address = address;
    this.link = link;
    this.waitMs = waitMs;
    this.log = log.child({ turnout: turnout.systemName });
    this.sends = new PendingSends(this.log);
  }

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.turnout.subscribe((next, prev) => this.onChange(next, prev));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Send the current commanded state, whatever was sent before. False if unknown or not sent. */
  sync(): boolean {
    const state = this.turnout.getState();
    if (state === 'unknown') return false;
    const active = state === 'closed';
    if (!this.link.send(this.encode(active))) return false;
    this.lastSent = active;
    this.confirmed = active;
    this.syncedThrough = this.changes;
    return true;
  }

  settled(): Promise<void> {
    return this.sends.settled();
  }

  private onChange(next: TurnoutState, prev: TurnoutState): void {
    if (this.restoring || next === 'unknown') return;

    const active = next === 'closed';
    if (this.lastSent === active) {
      this.log.debug({ state: next }, 'Unchanged, not sent');
      return;
    }

    this.lastSent = active;
    if (this.waiting === 0) this.fallback = prev;
    this.waiting++;
    this.sends.track(this.forward(++this.changes, active));
  }

  private async forward(change: number, active: boolean): Promise<void> {
    try {
      const up = await this.link.waitForActive(this.waitMs);
      // The reconnect sync already sent the state this change led to
      if (change <= this.syncedThrough) return;

      if (up && this.link.send(this.encode(active))) {
        this.confirmed = active;
      } else if (change === this.changes) {
        this.rollBack(active);
      } else {
        this.log.debug({ closed: active }, 'Superseded command not sent');
      }
    } finally {
      this.waiting--;
    }
  }

  /** Put the layout back to what the node holds */
  private rollBack(active: boolean): void {
    const restored = this.confirmed === null ? this.fallback : this.confirmed ? 'closed' : 'thrown';
    this.lastSent = this.confirmed;
    this.log.warn({ closed: active, restored }, 'Turnout command not sent, state rolled back');
    if (restored === null || restored === this.turnout.getState()) return;

    this.restoring = true;
    try {
      this.turnout.setState(restored);
    } finally {
      this.restoring = false;
    }
  }

  private encode(active: boolean): string {
    return encodeTurnoutSet({ ...this.address, active });
  }
}

// --- Sensors ---

export class SensorBinding {
  readonly sensor: Sensor;
  readonly address: SensorAddress;
  private readonly link: OutboundLink;

  constructor(sensor: Sensor, address: SensorAddress, link: OutboundLink) {
    this.sensor = sensor;
    this.address = address;
    this.link = link;
  }

  get gpio(): number {
    return this.address.gpio;
  }

  /** Ask the node to start reporting this pin; the sensor goes unknown if that fails */
  register(): boolean {
    const sent = this.link.send(encodeSensorRegister(this.address.gpio));
    if (!sent) {
      log.warn({ sensor: this.sensor.systemName }, 'Sensor registration not sent');
      this.markUnknown();
    }
    return sent;
  }

  apply(level: SensorLevel): void {
    this.sensor.setState(level === 1 ? 'active' : 'inactive');
  }

  markUnknown(): void {
    this.sensor.setState('unknown');
  }
}

// --- Signal heads ---

export class SignalHeadBinding {
  readonly head: SignalHead;
  readonly address: SignalHeadAddress;
  private readonly link: OutboundLink;
  private readonly waitMs: number;
  private readonly sends: PendingSends;
  private changes = 0;
  private syncedThrough = 0;
  private unsubscribe: (() => void) | null = null;

  constructor(head: SignalHead, address: SignalHeadAddress, link: OutboundLink, waitMs: number) {
    this.head = head;
    this.address = address;
    this.link = link;
    this.waitMs = waitMs;
    this.sends = new PendingSends(log.child({ head: address.headId }));
  }

  attach(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.head.subscribe((next) => this.sends.track(this.forward(++this.changes, next)));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Darken the head, then restore its current aspect */
  sync(): boolean {
    if (!this.link.send(this.encode('dark'))) return false;
    const aspect = this.head.getState();
    if (aspect !== 'dark' && !this.link.send(this.encode(aspect))) return false;
    this.syncedThrough = this.changes;
    return true;
  }

  settled(): Promise<void> {
    return this.sends.settled();
  }

  private async forward(change: number, aspect: Aspect): Promise<void> {
    const up = await this.link.waitForActive(this.waitMs);
    if (change <= this.syncedThrough) return;
    if (!up || !this.link.send(this.encode(aspect))) {
      log.warn({ head: this.address.headId, aspect }, 'Aspect not sent, link down');
    }
  }

  private encode(aspect: Aspect): string {
    return encodeSignalHeadSet({ ...this.address, aspect });
  }
}
