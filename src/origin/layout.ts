/**
 * Layout Model
 *
 * What the bridge needs from the layout application: named entities with
 * a state, and a way to hear about changes to that state.
 */

import { Aspect } from '../protocol/commands';

export type TurnoutState = 'closed' | 'thrown' | 'unknown';
export type SensorState = 'active' | 'inactive' | 'unknown';

export type StateListener<S> = (next: S, prev: S) => void;

export interface LayoutEntity<S> {
  readonly systemName: string;
  readonly userName?: string;
  getState(): S;
  /** Listeners are told only when the state actually changes */
  setState(state: S): void;
  /** Returns the unsubscribe function */
  subscribe(listener: StateListener<S>): () => void;
}

export type Turnout = LayoutEntity<TurnoutState>;
export type Sensor = LayoutEntity<SensorState>;
export type SignalHead = LayoutEntity<Aspect>;

export interface LayoutModel {
  turnouts(): Turnout[];
  sensors(): Sensor[];
  signalHeads(): SignalHead[];
}
