/**
 * In-memory layout, built from the bridge's configuration
 */

import { Aspect } from '../protocol/commands';
import {
  LayoutEntity,
  LayoutModel,
  Sensor,
  SensorState,
  SignalHead,
  StateListener,
  Turnout,
  TurnoutState,
} from './layout';

export class MemoryEntity<S> implements LayoutEntity<S> {
  readonly systemName: string;
  readonly userName?: string;
  private state: S;
  private readonly listeners = new Set<StateListener<S>>();

  constructor(systemName: string, initial: S, userName?: string) {
    this.systemName = systemName;
    this.userName = userName;
    this.state = initial;
  }

  getState(): S {
    return this.state;
  }

  setState(state: S): void {
    if (state === this.state) return;
    const prev = this.state;
    this.state = state;
    for (const listener of [...this.listeners]) {
      listener(state, prev);
    }
  }

  subscribe(listener: StateListener<S>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

export interface LayoutDefinition {
  turnouts?: Array<{ systemName: string; userName?: string; state?: TurnoutState }>;
  sensors?: Array<{ systemName: string; userName?: string }>;
  signalHeads?: Array<{ systemName: string; userName?: string; aspect?: Aspect }>;
}

export class MemoryLayout implements LayoutModel {
  private readonly _turnouts = new Map<string, MemoryEntity<TurnoutState>>();
  private readonly _sensors = new Map<string, MemoryEntity<SensorState>>();
  private readonly _heads = new Map<string, MemoryEntity<Aspect>>();

  static fromDefinition(def: LayoutDefinition): MemoryLayout {
    const layout = new MemoryLayout();
    for (const t of def.turnouts ?? []) layout.addTurnout(t.systemName, t.state ?? 'unknown', t.userName);
    for (const s of def.sensors ?? []) layout.addSensor(s.systemName, s.userName);
    for (const h of def.signalHeads ?? []) layout.addSignalHead(h.systemName, h.aspect ?? 'dark', h.userName);
    return layout;
  }

  addTurnout(systemName: string, state: TurnoutState = 'unknown', userName?: string): MemoryEntity<TurnoutState> {
    const turnout = new MemoryEntity(systemName, state, userName);
    this._turnouts.set(systemName, turnout);
    return turnout;
  }

  addSensor(systemName: string, userName?: string): MemoryEntity<SensorState> {
    const sensor = new MemoryEntity<SensorState>(systemName, 'unknown', userName);
    this._sensors.set(systemName, sensor);
    return sensor;
  }

  addSignalHead(systemName: string, aspect: Aspect = 'dark', userName?: string): MemoryEntity<Aspect> {
    const head = new MemoryEntity(systemName, aspect, userName);
    this._heads.set(systemName, head);
    return head;
  }

  turnout(systemName: string): Turnout | undefined {
    return this._turnouts.get(systemName);
  }

  sensor(systemName: string): Sensor | undefined {
    return this._sensors.get(systemName);
  }

  signalHead(systemName: string): SignalHead | undefined {
    return this._heads.get(systemName);
  }

  turnouts(): Turnout[] {
    return [...this._turnouts.values()];
  }

  sensors(): Sensor[] {
    return [...this._sensors.values()];
  }

  signalHeads(): SignalHead[] {
    return [...this._heads.values()];
  }
}
