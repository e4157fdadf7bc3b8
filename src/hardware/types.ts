/**
 * Hardware Types
 *
 * The slice of the node's hardware the device controllers need. Calls are
 * synchronous and throw on failure, which the controllers turn into
 * ResourceErrors reported back to the origin.
 */

/** One channel of a 16-channel PWM servo controller */
export interface ServoDriver {
  readonly channel: number;
  setAngle(angle: number): void;
}

/** A 16-pin GPIO-extender board on the shared bus */
export interface GpioExtender {
  readonly address: number;
  readonly pinCount: number;
  /** Configure the pin as an output and drive it */
  writePin(pin: number, value: boolean): void;
}

/** A pulled-up digital input. Active means the input is connected to ground. */
export interface InputPin {
  readonly gpio: number;
  isActive(): boolean;
  /** Called on every edge; returns an unsubscribe function */
  onChange(listener: (active: boolean) => void): () => void;
  close(): void;
}

export interface HardwareBackend {
  readonly name: string;
  openServo(channel: number): ServoDriver;
  openExtender(address: number): GpioExtender;
  openInput(gpio: number): InputPin;
}

export const EXTENDER_PIN_COUNT = 16;
