/**
 * Blink Scheduler
 *
 * Runs one background blink loop per signal head id. Each loop owns an
 * AbortController; cancel() aborts it and waits for the loop to finish,
 * so a new command never writes to pins a blinker is still toggling.
 */

import { getLogger } from '../logger';
import { errorMessage } from '../errors';

const log = getLogger('Blink');

export interface BlinkOptions {
  frequencyHz: number;
  /** Fraction of each cycle the LED is on */
  dutyCycle: number;
}

export const DEFAULT_BLINK_OPTIONS: BlinkOptions = {
  frequencyHz: 2,
  dutyCycle: 0.5,
};

/** Drives the blinking LED */
export type PinWriter = (value: boolean) => void;

export type BlinkFailureHandler = (headId: string, err: unknown) => void;

interface BlinkTask {
  controller: AbortController;
  done: Promise<void>;
}

export class BlinkScheduler {
  readonly options: BlinkOptions;
  private readonly tasks = new Map<string, BlinkTask>();
  private readonly onFailure: BlinkFailureHandler | undefined;

  constructor(options?: Partial<BlinkOptions>, onFailure?: BlinkFailureHandler) {
    this.options = { ...DEFAULT_BLINK_OPTIONS, ...options };
    this.onFailure = onFailure;
  }

  /** Start blinking for a head, stopping any blinker it already has */
  async start(headId: string, write: PinWriter): Promise<void> {
    while (this.tasks.has(headId)) {
      await this.cancel(headId);
    }

    const controller = new AbortController();
    const task: BlinkTask = { controller, done: Promise.resolve() };
    task.done = this.run(headId, write, controller.signal).then(() => {
      if (this.tasks.get(headId) === task) this.tasks.delete(headId);
    });
    this.tasks.set(headId, task);
    log.debug({ headId }, 'Blink started');
  }

  /** Stop a head's blinker and wait until it has exited. False if none was running. */
  async cancel(headId: string): Promise<boolean> {
    const task = this.tasks.get(headId);
    if (!task) return false;
    task.controller.abort();
    await task.done;
    log.debug({ headId }, 'Blink stopped');
    return true;
  }

  async cancelAll(): Promise<void> {
    await Promise.all([...this.tasks.keys()].map((headId) => this.cancel(headId)));
  }

  isRunning(headId: string): boolean {
    return this.tasks.has(headId);
  }

  get runningHeads(): string[] {
    return [...this.tasks.keys()];
  }

  private async run(headId: string, write: PinWriter, signal: AbortSignal): Promise<void> {
    const periodMs = 1000 / this.options.frequencyHz;
    const onMs = periodMs * this.options.dutyCycle;
    const offMs = periodMs - onMs;

    try {
      while (!signal.aborted) {
        write(true);
        await pause(onMs, signal);
        write(false);
        await pause(offMs, signal);
      }
    } catch (err) {
      log.error({ headId, err: errorMessage(err) }, 'Blink loop failed');
      this.onFailure?.(headId, err);
    }
  }
}

/** Sleep that ends early when the signal aborts */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const finish = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal.addEventListener('abort', finish, { once: true });
  });
}
