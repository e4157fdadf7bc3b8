/**
 * Actuator Node
 *
 * The program on the embedded host: listens for the origin, decodes its
 * frames and drives turnouts, signal heads and sensors.
 *
 *   origin ──TCP──▶ TcpServerLink ──frame──▶ CommandDispatcher
 *                        ▲                     ├─ TurnoutController
 *                        │                     ├─ SignalHeadController ── BlinkScheduler
 *                        └── IN:<gpio>:<0|1> ──┴─ SensorReporter
 */

import { getLogger } from '../logger';
import { LinkStats } from '../link-stats';
import { TcpServerLink } from '../link/tcp-server-link';
import { LinkOptions } from '../link/types';
import { CommandDispatcher, DispatchCounters } from '../protocol/dispatcher';
import { encodeDiagnostic } from '../protocol/commands';
import { HardwareBackend } from '../hardware/types';
import { TurnoutController } from '../devices/turnout-controller';
import { SignalHeadController, HeadStatus } from '../devices/signal-head-controller';
import { SensorReporter } from '../devices/sensor-reporter';
import { BlinkOptions, BlinkScheduler } from '../devices/blink-scheduler';

const log = getLogger('Node');

export const DEFAULT_NODE_PORT = 14200;

export interface ActuatorNodeOptions {
  backend: HardwareBackend;
  port?: number;
  listenAddress?: string;
  link?: Partial<LinkOptions>;
  flashing?: Partial<BlinkOptions>;
}

export interface NodeStatus {
  link: LinkStats;
  dispatch: DispatchCounters;
  heads: HeadStatus[];
  sensors: number[];
  servos: number[];
}

export class ActuatorNode {
  readonly link: TcpServerLink;
  readonly blinker: BlinkScheduler;
  readonly turnouts: TurnoutController;
  readonly signalHeads: SignalHeadController;
  readonly sensors: SensorReporter;
  readonly dispatcher: CommandDispatcher;

  constructor(options: ActuatorNodeOptions) {
    this.link = new TcpServerLink(options.port ?? DEFAULT_NODE_PORT, options.link, options.listenAddress);
    const send = (message: string): boolean => this.link.send(message);

    this.blinker = new BlinkScheduler(options.flashing, (headId) => {
      send(encodeDiagnostic('blink-failed', headId));
    });
    this.turnouts = new TurnoutController(options.backend);
    this.signalHeads = new SignalHeadController(options.backend, this.blinker);
    this.sensors = new SensorReporter(options.backend, send);

    this.dispatcher = new CommandDispatcher(this.link.alias, {
      turnoutSet: (cmd) => {
        this.turnouts.setPosition(cmd);
      },
      signalHeadSet: (cmd) => this.signalHeads.setAspect(cmd),
      sensorRegister: (cmd) => {
        this.sensors.register(cmd.gpio);
      },
    }, send);

    this.link.on('frame', (frame: string) => this.dispatcher.dispatch(frame));
    this.link.on('disconnected', (reason: string) => log.warn({ reason }, 'Origin disconnected'));
  }

  start(): void {
    log.info({ port: this.link.port }, 'Starting actuator node');
    this.link.start();
  }

  /** Darken every head, release the sensor pins, then close the link */
  async stop(graceMs = 0): Promise<void> {
    await this.dispatcher.idle();
    await this.signalHeads.shutdown();
    this.sensors.close();
    await this.link.stop(graceMs);
    log.info('Actuator node stopped');
  }

  getStatus(): NodeStatus {
    return {
      link: { ...this.link.stats },
      dispatch: { ...this.dispatcher.counters },
      heads: this.signalHeads.status(),
      sensors: this.sensors.registeredPins,
      servos: this.turnouts.servoChannels,
    };
  }
}
