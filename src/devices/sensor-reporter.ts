/**
 * Sensor Reporter
 *
 * Watches input pins the origin registered and reports each change of
 * level as `IN:<gpio>:<0|1>`. Registering (or re-registering after a
 * reconnect) reports the current level straight away.
 */

import { getLogger } from '../logger';
import { ResourceError, errorMessage } from '../errors';
import { SensorLevel, encodeSensorReport } from '../protocol/commands';
import { PeripheralRegistry } from '../hardware/peripheral-registry';
import { HardwareBackend, InputPin } from '../hardware/types';

const log = getLogger('Sensors');

/** Sends one message to the origin; false when the link is down */
export type ReportFn = (message: string) => boolean;

export class SensorReporter {
  private readonly backend: HardwareBackend;
  private readonly report: ReportFn;
  private readonly pins = new PeripheralRegistry<InputPin>('input');
  private readonly levels = new Map<number, SensorLevel>();
  private readonly unsubscribers = new Map<number, () => void>();

  constructor(backend: HardwareBackend, report: ReportFn) {
    this.backend = backend;
    this.report = report;
  }

  /** Start watching a pin (once) and report its current level */
  register(gpio: number): SensorLevel {
    let pin: InputPin;
    try {
      pin = this.pins.acquire(gpio, (g) => this.backend.openInput(g));
    } catch (err) {
      throw new ResourceError('input-init-failed', `Could not open gpio ${gpio} as input: ${errorMessage(err)}`);
    }

    if (!this.unsubscribers.has(gpio)) {
      this.unsubscribers.set(gpio, pin.onChange((active) => this.onEdge(gpio, active)));
      log.info({ gpio }, 'Sensor registered');
    }

    let level: SensorLevel;
    try {
      level = pin.isActive() ? 1 : 0;
    } catch (err) {
      throw new ResourceError('input-read-failed', `Could not read gpio ${gpio}: ${errorMessage(err)}`);
    }

    this.levels.set(gpio, level);
    this.send(gpio, level);
    return level;
  }

  /** Last level reported for a pin */
  level(gpio: number): SensorLevel | undefined {
    return this.levels.get(gpio);
  }

  get registeredPins(): number[] {
    return this.pins.addresses();
  }

  /** Unsubscribe and release every pin */
  close(): void {
    for (const unsubscribe of this.unsubscribers.values()) unsubscribe();
    this.unsubscribers.clear();

    for (const [gpio, pin] of this.pins.entries()) {
      try {
        pin.close();
      } catch (err) {
        log.warn({ gpio, err: errorMessage(err) }, 'Could not release input');
      }
    }
    this.pins.clear();
    this.levels.clear();
  }

  private onEdge(gpio: number, active: boolean): void {
    const level: SensorLevel = active ? 1 : 0;
    if (this.levels.get(gpio) === level) return;
    this.levels.set(gpio, level);
    this.send(gpio, level);
  }

  private send(gpio: number, level: SensorLevel): void {
    if (!this.report(encodeSensorReport(gpio, level))) {
      log.warn({ gpio, level }, 'Sensor report not sent, link down');
    }
  }
}
