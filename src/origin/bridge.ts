/**
 * LayoutBridge: connects layout entities to the actuator nodes named in them
 *
 * On start():
 *   - parses every turnout, sensor and signal head name; entities outside
 *     the naming convention are left alone
 *   - adds one endpoint link per distinct host:port and one dispatcher per link
 *   - subscribes one binding per entity
 *
 * On every (re)connect of a link, the node is brought in line with the
 * layout: sensors registered, turnouts sent their commanded position,
 * heads darkened and then given their current aspect.
 */

import { getLogger } from '../logger';
import { UnknownTargetError, errorMessage } from '../errors';
import { LinkStats } from '../link-stats';
import { LinkManager } from '../link/link-manager';
import { LinkState } from '../link/types';
import { CommandDispatcher, DispatchCounters } from '../protocol/dispatcher';
import { SensorReportCommand } from '../protocol/commands';
import { EndpointRegistry } from '../registry/endpoint-registry';
import { LayoutModel, Sensor, SignalHead, Turnout } from './layout';
import {
  DEFAULT_ENDPOINT_PORT,
  EndpointAddress,
  parseSensorName,
  parseSignalHeadName,
  parseTurnoutName,
  sensorSystemName,
} from './naming';
import { SensorBinding, SignalHeadBinding, TurnoutBinding } from './bindings';
import { StartupSequence, runShutdownSequence, runStartupSequence } from './lifecycle';

const log = getLogger('Bridge');

export interface BridgeOptions {
  /** Port used when an entity name gives only a host */
  defaultPort: number;
  /** How long a state change waits for a link that is down */
  connectWaitMs: number;
  /** Time each link gets to flush and close on stop() */
  shutdownGraceMs: number;
  /** Resend layout state after every reconnect, not just the first connect */
  resyncOnReconnect: boolean;
  startup: StartupSequence | null;
  /** Darken heads and close turnouts before disconnecting */
  shutdownSequence: boolean;
}

export const DEFAULT_BRIDGE_OPTIONS: BridgeOptions = {
  defaultPort: DEFAULT_ENDPOINT_PORT,
  connectWaitMs: 5000,
  shutdownGraceMs: 2000,
  resyncOnReconnect: true,
  startup: null,
  shutdownSequence: false,
};

interface Endpoint {
  address: EndpointAddress;
  link: LinkManager;
  dispatcher: CommandDispatcher;
  turnouts: TurnoutBinding[];
  sensors: Map<number, SensorBinding>;
  heads: SignalHeadBinding[];
  synced: boolean;
  unlisten: () => void;
}

export interface EndpointStatus {
  alias: string;
  state: LinkState;
  link: LinkStats;
  dispatch: DispatchCounters;
  turnouts: number;
  sensors: number;
  signalHeads: number;
}

export class LayoutBridge {
  readonly registry: EndpointRegistry;
  readonly options: BridgeOptions;
  private readonly layout: LayoutModel;
  private readonly endpoints = new Map<string, Endpoint>();
  private running = false;

  constructor(layout: LayoutModel, options?: Partial<BridgeOptions>, registry = new EndpointRegistry()) {
    this.layout = layout;
    this.options = { ...DEFAULT_BRIDGE_OPTIONS, ...options };
    this.registry = registry;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    for (const turnout of this.layout.turnouts()) this.bindTurnout(turnout);
    for (const sensor of this.layout.sensors()) this.bindSensor(sensor);
    for (const head of this.layout.signalHeads()) this.bindSignalHead(head);

    log.info({ endpoints: this.endpoints.size }, 'Bridge starting');
    for (const endpoint of this.endpoints.values()) {
      endpoint.link.start();
    }

    if (this.options.startup) {
      runStartupSequence(this.boundHeads(), this.boundTurnouts(), this.options.startup);
    }
  }

  /** Optional shutdown sequence, then every link is closed within the grace period */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.options.shutdownSequence) {
      runShutdownSequence(this.boundHeads(), this.boundTurnouts());
    }

    const endpoints = [...this.endpoints.values()];
    await Promise.all(endpoints.flatMap((ep) => [
      ...ep.turnouts.map((b) => b.settled()),
      ...ep.heads.map((b) => b.settled()),
    ]));
    await Promise.all(endpoints.map((ep) => ep.dispatcher.idle()));

    for (const ep of endpoints) {
      ep.turnouts.forEach((b) => b.detach());
      ep.heads.forEach((b) => b.detach());
      ep.unlisten();
    }
    this.endpoints.clear();

    await this.registry.removeAll(this.options.shutdownGraceMs);
    log.info('Bridge stopped');
  }

  getStatus(): EndpointStatus[] {
    return [...this.endpoints.values()].map((ep) => ({
      alias: ep.address.alias,
      state: ep.link.state,
      link: { ...ep.link.stats },
      dispatch: { ...ep.dispatcher.counters },
      turnouts: ep.turnouts.length,
      sensors: ep.sensors.size,
      signalHeads: ep.heads.length,
    }));
  }

  /** Wait until every endpoint has handled the frames it received so far */
  async idle(): Promise<void> {
    await Promise.all([...this.endpoints.values()].map((ep) => ep.dispatcher.idle()));
  }

  // --- Binding ---

  private bindTurnout(turnout: Turnout): void {
    const address = this.parse('turnout', turnout.systemName, parseTurnoutName);
    if (!address) return;
    const ep = this.endpoint(address.endpoint);
    const binding = new TurnoutBinding(turnout, address, ep.link, this.options.connectWaitMs);
    binding.attach();
    ep.turnouts.push(binding);
  }

  private bindSensor(sensor: Sensor): void {
    const address = this.parse('sensor', sensor.systemName, parseSensorName);
    if (!address) return;
    const ep = this.endpoint(address.endpoint);
    if (ep.sensors.has(address.gpio)) {
      log.warn({ sensor: sensor.systemName }, 'Another sensor already uses this gpio, skipped');
      return;
    }
    ep.sensors.set(address.gpio, new SensorBinding(sensor, address, ep.link));
  }

  private bindSignalHead(head: SignalHead): void {
    const name = head.userName ?? head.systemName;
    const address = this.parse('signal head', name, parseSignalHeadName);
    if (!address) return;
    const ep = this.endpoint(address.endpoint);
    const binding = new SignalHeadBinding(head, address, ep.link, this.options.connectWaitMs);
    binding.attach();
    ep.heads.push(binding);
  }

  private parse<A>(
    kind: string,
    name: string,
    parser: (name: string, defaultPort: number) => A | null,
  ): A | null {
    try {
      return parser(name, this.options.defaultPort);
    } catch (err) {
      log.warn({ kind, name, err: errorMessage(err) }, 'Malformed name, entity skipped');
      return null;
    }
  }

  private endpoint(address: EndpointAddress): Endpoint {
    const existing = this.endpoints.get(address.alias);
    if (existing) return existing;

    const link = this.registry.add(address.host, address.port);
    const ep: Endpoint = {
      address,
      link,
      dispatcher: new CommandDispatcher(address.alias, {
        sensorReport: (cmd) => this.onSensorReport(ep, cmd),
      }, (message) => link.send(message)),
      turnouts: [],
      sensors: new Map(),
      heads: [],
      synced: false,
      unlisten: () => undefined,
    };

    const onFrame = (frame: string): void => ep.dispatcher.dispatch(frame);
    const onConnected = (): void => this.onConnected(ep);
    const onDisconnected = (): void => this.onDisconnected(ep);
    link.on('frame', onFrame);
    link.on('connected', onConnected);
    link.on('disconnected', onDisconnected);
    ep.unlisten = () => {
      link.off('frame', onFrame);
      link.off('connected', onConnected);
      link.off('disconnected', onDisconnected);
    };

    this.endpoints.set(address.alias, ep);
    return ep;
  }

  // --- Link events ---

  private onConnected(ep: Endpoint): void {
    if (ep.synced && !this.options.resyncOnReconnect) return;
    ep.synced = true;

    let registered = 0;
    for (const sensor of ep.sensors.values()) {
      if (sensor.register()) registered++;
    }
    const turnouts = ep.turnouts.filter((b) => b.sync()).length;
    const heads = ep.heads.filter((b) => b.sync()).length;

    log.info({ alias: ep.address.alias, sensors: registered, turnouts, heads }, 'Node synchronized');
  }

  private onDisconnected(ep: Endpoint): void {
    for (const sensor of ep.sensors.values()) sensor.markUnknown();
  }

  private onSensorReport(ep: Endpoint, cmd: SensorReportCommand): void {
    const binding = ep.sensors.get(cmd.gpio);
    if (!binding) {
      throw new UnknownTargetError(
        'unknown-sensor',
        `No sensor ${sensorSystemName(cmd.gpio, ep.address)} in the layout`,
      );
    }
    binding.apply(cmd.level);
  }

  private boundTurnouts(): Turnout[] {
    return [...this.endpoints.values()].flatMap((ep) => ep.turnouts.map((b) => b.turnout));
  }

  private boundHeads(): SignalHead[] {
    return [...this.endpoints.values()].flatMap((ep) => ep.heads.map((b) => b.head));
  }
}
