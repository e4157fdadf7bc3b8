/**
 * SimulatedBackend: in-memory stand-in for the node's servo, GPIO-extender
 * and input-pin hardware
 *
 * The device controllers see no difference between this and real
 * hardware. Provides:
 *   - Action log ring buffer with timestamps
 *   - Per-pin write history (for checking blink timing)
 *   - simulate() on input pins to fake a sensor edge
 *   - Failure injection: addresses that cannot be opened, and
 *     peripherals whose writes throw
 */

import { getLogger } from '../logger';
import {
  EXTENDER_PIN_COUNT,
  GpioExtender,
  HardwareBackend,
  InputPin,
  ServoDriver,
} from './types';

const log = getLogger('SimHardware');

export interface HardwareLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

export interface PinWrite {
  pin: number;
  value: boolean;
  timestamp: number;
}

type Recorder = (action: string, details: string) => void;

export class SimulatedServo implements ServoDriver {
  readonly channel: number;
  angle: number | null = null;
  readonly history: number[] = [];
  failWrites = false;
  private readonly record: Recorder;

  constructor(channel: number, record: Recorder) {
    this.channel = channel;
    this.record = record;
  }

  setAngle(angle: number): void {
    if (this.failWrites) {
      throw new Error(`servo channel ${this.channel} did not accept angle ${angle}`);
    }
    this.angle = angle;
    this.history.push(angle);
    this.record('Servo', `channel ${this.channel} -> ${angle}`);
  }
}

export class SimulatedExtender implements GpioExtender {
  readonly address: number;
  readonly pinCount = EXTENDER_PIN_COUNT;
  readonly pins: boolean[] = new Array<boolean>(EXTENDER_PIN_COUNT).fill(false);
  readonly writes: PinWrite[] = [];
  failWrites = false;
  private readonly record: Recorder;

  constructor(address: number, record: Recorder) {
    this.address = address;
    this.record = record;
  }

  writePin(pin: number, value: boolean): void {
    if (pin < 0 || pin >= this.pinCount) {
      throw new Error(`pin ${pin} does not exist on board 0x${this.address.toString(16)}`);
    }
    if (this.failWrites) {
      throw new Error(`board 0x${this.address.toString(16)} is not responding`);
    }
    this.pins[pin] = value;
    this.writes.push({ pin, value, timestamp: Date.now() });
    this.record('Extender', `0x${this.address.toString(16)} pin ${pin} = ${value ? 1 : 0}`);
  }

  /** Writes to one pin, oldest first */
  writesTo(pin: number): PinWrite[] {
    return this.writes.filter((w) => w.pin === pin);
  }
}

export class SimulatedInputPin implements InputPin {
  readonly gpio: number;
  closed = false;
  private active = false;
  private readonly listeners = new Set<(active: boolean) => void>();
  private readonly record: Recorder;

  constructor(gpio: number, record: Recorder) {
    this.gpio = gpio;
    this.record = record;
  }

  isActive(): boolean {
    return this.active;
  }

  onChange(listener: (active: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  close(): void {
    this.closed = true;
    this.listeners.clear();
    this.record('Input', `gpio ${this.gpio} closed`);
  }

  /** Fake an edge. Listeners fire even when the level does not change. */
  simulate(active: boolean): void {
    if (this.closed) return;
    this.active = active;
    this.record('Input', `gpio ${this.gpio} ${active ? 'asserted' : 'released'}`);
    for (const listener of [...this.listeners]) {
      listener(active);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

export class SimulatedBackend implements HardwareBackend {
  readonly name = 'simulated';

  readonly servos = new Map<number, SimulatedServo>();
  readonly extenders = new Map<number, SimulatedExtender>();
  readonly inputs = new Map<number, SimulatedInputPin>();

  /** Channels, board addresses and gpios whose open call throws */
  readonly unavailable = {
    servos: new Set<number>(),
    extenders: new Set<number>(),
    inputs: new Set<number>(),
  };

  readonly openCalls = { servos: 0, extenders: 0, inputs: 0 };

  private _log: HardwareLogEntry[] = [];
  private readonly maxLogSize = 200;

  openServo(channel: number): ServoDriver {
    this.openCalls.servos++;
    if (this.unavailable.servos.has(channel)) {
      throw new Error(`no servo controller answers for channel ${channel}`);
    }
    const servo = new SimulatedServo(channel, this.recorder);
    this.servos.set(channel, servo);
    this.record('Open', `servo channel ${channel}`);
    return servo;
  }

  openExtender(address: number): GpioExtender {
    this.openCalls.extenders++;
    if (this.unavailable.extenders.has(address)) {
      throw new Error(`no board at address 0x${address.toString(16)}`);
    }
    const board = new SimulatedExtender(address, this.recorder);
    this.extenders.set(address, board);
    this.record('Open', `extender 0x${address.toString(16)}`);
    return board;
  }

  openInput(gpio: number): InputPin {
    this.openCalls.inputs++;
    if (this.unavailable.inputs.has(gpio)) {
      throw new Error(`gpio ${gpio} cannot be configured as an input`);
    }
    const pin = new SimulatedInputPin(gpio, this.recorder);
    this.inputs.set(gpio, pin);
    this.record('Open', `input gpio ${gpio}`);
    return pin;
  }

  /** Get all log entries */
  getLog(): HardwareLogEntry[] {
    return [...this._log];
  }

  getState(): Record<string, unknown> {
    const servos: Record<string, number | null> = {};
    for (const [channel, servo] of this.servos) servos[channel] = servo.angle;

    const extenders: Record<string, boolean[]> = {};
    for (const [address, board] of this.extenders) extenders[`0x${address.toString(16)}`] = [...board.pins];

    const inputs: Record<string, boolean> = {};
    for (const [gpio, pin] of this.inputs) inputs[gpio] = pin.isActive();

    return { servos, extenders, inputs };
  }

  private readonly recorder: Recorder = (action, details) => this.record(action, details);

  /** Append to ring buffer and trace log */
  private record(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    log.trace({ action }, details);
  }
}
