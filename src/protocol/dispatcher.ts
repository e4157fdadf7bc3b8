/**
 * Command Dispatcher
 *
 * Turns each inbound frame into exactly one handler call, or a diagnostic
 * frame back to the sender. Frames from one link go through a serial
 * queue, so a slow handler (waiting for a blink task to stop, opening a
 * peripheral) delays later frames but never reorders them.
 */

import { getLogger } from '../logger';
import { ProtocolError, ReportableError, errorMessage } from '../errors';
import {
  DiagnosticCommand,
  SensorRegisterCommand,
  SensorReportCommand,
  SignalHeadSetCommand,
  TurnoutSetCommand,
  decodeCommand,
  encodeDiagnostic,
} from './commands';

const log = getLogger('Dispatcher');

type Handler<C> = (cmd: C, frame: string) => void | Promise<void>;

/**
 * Handlers for the commands one side accepts. A command without a
 * handler is answered with `unsupported-command`.
 */
export interface CommandHandlers {
  sensorReport?: Handler<SensorReportCommand>;
  sensorRegister?: Handler<SensorRegisterCommand>;
  turnoutSet?: Handler<TurnoutSetCommand>;
  signalHeadSet?: Handler<SignalHeadSetCommand>;
  /** Diagnostics are never answered, whether or not this is set */
  diagnostic?: Handler<DiagnosticCommand>;
}

/** Sends one message back over the link the frame came from */
export type ReplyFn = (message: string) => boolean;

export interface DispatchCounters {
  handled: number;
  rejected: number;
  failed: number;
  diagnostics: number;
}

export class CommandDispatcher {
  readonly counters: DispatchCounters = { handled: 0, rejected: 0, failed: 0, diagnostics: 0 };

  private readonly name: string;
  private readonly handlers: CommandHandlers;
  private readonly reply: ReplyFn;
  private queue: Promise<void> = Promise.resolve();

  constructor(name: string, handlers: CommandHandlers, reply: ReplyFn) {
    this.name = name;
    this.handlers = handlers;
    this.reply = reply;
  }

  /** Queue a frame behind every frame dispatched before it */
  dispatch(frame: string): void {
    this.queue = this.queue
      .then(() => this.handle(frame))
      .catch((err: unknown) => {
        log.error({ link: this.name, frame, err: errorMessage(err) }, 'Dispatch failed');
      });
  }

  /** Resolves once every queued frame has been handled */
  async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.queue;
      await current;
    } while (current !== this.queue);
  }

  private async handle(frame: string): Promise<void> {
    const cmd = decodeCommand(frame);

    if (cmd.kind === 'error') {
      this.counters.rejected++;
      log.warn({ link: this.name, frame, reason: cmd.reason, detail: cmd.detail }, 'Rejected frame');
      this.report(cmd.reason, frame);
      return;
    }

    try {
      switch (cmd.kind) {
        case 'diagnostic':
          this.counters.diagnostics++;
          log.warn({ link: this.name, reason: cmd.reason, original: cmd.original }, 'Peer reported an error');
          if (this.handlers.diagnostic) await this.handlers.diagnostic(cmd, frame);
          return;
        case 'sensor-report':
          await this.invoke(this.handlers.sensorReport, cmd, frame);
          break;
        case 'sensor-register':
          await this.invoke(this.handlers.sensorRegister, cmd, frame);
          break;
        case 'turnout-set':
          await this.invoke(this.handlers.turnoutSet, cmd, frame);
          break;
        case 'signal-head-set':
          await this.invoke(this.handlers.signalHeadSet, cmd, frame);
          break;
      }
      this.counters.handled++;
    } catch (err) {
      this.counters.failed++;
      if (cmd.kind === 'diagnostic') {
        log.error({ link: this.name, err: errorMessage(err) }, 'Diagnostic handler failed');
      } else if (err instanceof ReportableError) {
        log.warn({ link: this.name, frame, reason: err.reason, err: err.message }, 'Command failed');
        this.report(err.reason, frame);
      } else {
        log.error({ link: this.name, frame, err: errorMessage(err) }, 'Unexpected handler failure');
        this.report('internal', frame);
      }
    }
  }

  private async invoke<C>(handler: Handler<C> | undefined, cmd: C, frame: string): Promise<void> {
    if (!handler) {
      throw new ProtocolError('unsupported-command', `${this.name} does not accept ${frame}`);
    }
    await handler(cmd, frame);
  }

  private report(reason: string, frame: string): void {
    try {
      if (!this.reply(encodeDiagnostic(reason, frame))) {
        log.warn({ link: this.name, reason }, 'Diagnostic not sent, link down');
      }
    } catch (err) {
      log.error({ link: this.name, reason, err: errorMessage(err) }, 'Could not send diagnostic');
    }
  }
}
