/**
 * Signal Head Controller
 *
 * Aspect state machine for two-LED signal heads wired to GPIO-extender
 * boards. Every transition stops the head's blinker first; transitions
 * for one head run one at a time.
 *
 *   red              R on,  G off
 *   green            R off, G on
 *   dark             R off, G off
 *   flashing-red     G off, R blinking
 *   flashing-green   R off, G blinking
 */

import { getLogger } from '../logger';
import { ResourceError, errorMessage } from '../errors';
import { Aspect, SignalHeadSetCommand } from '../protocol/commands';
import { PeripheralRegistry } from '../hardware/peripheral-registry';
import { GpioExtender, HardwareBackend } from '../hardware/types';
import { BlinkScheduler } from './blink-scheduler';

const log = getLogger('SignalHeads');

export type HeadWiring = Pick<SignalHeadSetCommand, 'headId' | 'boardAddress' | 'redPin' | 'greenPin'>;

export interface HeadStatus extends HeadWiring {
  aspect: Aspect;
  blinking: boolean;
}

export class SignalHeadController {
  private readonly backend: HardwareBackend;
  private readonly scheduler: BlinkScheduler;
  private readonly boards = new PeripheralRegistry<GpioExtender>('gpio-extender');
  private readonly heads = new Map<string, HeadWiring & { aspect: Aspect }>();
  private readonly transitions = new Map<string, Promise<void>>();

  constructor(backend: HardwareBackend, scheduler: BlinkScheduler) {
    this.backend = backend;
    this.scheduler = scheduler;
  }

  /** Apply an aspect once every earlier transition for the same head has finished */
  setAspect(cmd: HeadWiring & { aspect: Aspect }): Promise<void> {
    const previous = this.transitions.get(cmd.headId) ?? Promise.resolve();
    // An earlier failure was already reported to its own caller
    const next = previous.then(() => this.apply(cmd), () => this.apply(cmd));
    this.transitions.set(cmd.headId, next);

    const forget = (): void => {
      if (this.transitions.get(cmd.headId) === next) this.transitions.delete(cmd.headId);
    };
    next.then(forget, forget);
    return next;
  }

  getAspect(headId: string): Aspect | undefined {
    return this.heads.get(headId)?.aspect;
  }

  status(): HeadStatus[] {
    return [...this.heads.values()].map((head) => ({
      ...head,
      blinking: this.scheduler.isRunning(head.headId),
    }));
  }

  /** Stop every blinker and darken every head this controller has driven */
  async shutdown(): Promise<void> {
    await Promise.allSettled([...this.transitions.values()]);
    await this.scheduler.cancelAll();

    for (const head of this.heads.values()) {
      const board = this.boards.get(head.boardAddress);
      if (!board) continue;
      try {
        board.writePin(head.redPin, false);
        board.writePin(head.greenPin, false);
        head.aspect = 'dark';
      } catch (err) {
        log.error({ headId: head.headId, err: errorMessage(err) }, 'Could not darken head');
      }
    }
    log.info({ heads: this.heads.size }, 'Signal heads dark');
  }

  private async apply(cmd: HeadWiring & { aspect: Aspect }): Promise<void> {
    const board = this.openBoard(cmd.boardAddress, cmd.headId);

    await this.scheduler.cancel(cmd.headId);

    try {
      const { redPin, greenPin } = cmd;
      switch (cmd.aspect) {
        case 'red':
          board.writePin(redPin, true);
          board.writePin(greenPin, false);
          break;
        case 'green':
          board.writePin(redPin, false);
          board.writePin(greenPin, true);
          break;
        case 'dark':
          board.writePin(redPin, false);
          board.writePin(greenPin, false);
          break;
        case 'flashing-red':
          board.writePin(greenPin, false);
          await this.scheduler.start(cmd.headId, (value) => board.writePin(redPin, value));
          break;
        case 'flashing-green':
          board.writePin(redPin, false);
          await this.scheduler.start(cmd.headId, (value) => board.writePin(greenPin, value));
          break;
      }
    } catch (err) {
      throw new ResourceError(
        'led-write-failed',
        `Could not set ${cmd.aspect} on head ${cmd.headId}: ${errorMessage(err)}`,
      );
    }

    this.heads.set(cmd.headId, {
      headId: cmd.headId,
      boardAddress: cmd.boardAddress,
      redPin: cmd.redPin,
      greenPin: cmd.greenPin,
      aspect: cmd.aspect,
    });
    log.info({ headId: cmd.headId, aspect: cmd.aspect }, 'Aspect set');
  }

  /** Open a board on first use and drive all of its pins low */
  private openBoard(address: number, headId: string): GpioExtender {
    try {
      return this.boards.acquire(address, (addr) => {
        const board = this.backend.openExtender(addr);
        for (let pin = 0; pin < board.pinCount; pin++) {
          board.writePin(pin, false);
        }
        log.info({ board: `0x${addr.toString(16)}` }, 'GPIO extender initialized');
        return board;
      });
    } catch (err) {
      throw new ResourceError(
        'board-init-failed',
        `Could not initialize board 0x${address.toString(16)} for head ${headId}: ${errorMessage(err)}`,
      );
    }
  }
}
