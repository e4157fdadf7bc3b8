/**
 * Layout startup and shutdown sequences
 *
 * Both act on layout entities; the bindings turn the resulting state
 * changes into commands like any other change.
 */

import { Aspect } from '../protocol/commands';
import { SignalHead, Turnout } from './layout';

export interface StartupSequence {
  /** Aspect every head shows once the layout is up */
  aspect: Aspect;
  closeTurnouts: boolean;
}

export function runStartupSequence(heads: SignalHead[], turnouts: Turnout[], sequence: StartupSequence): void {
  for (const head of heads) {
    head.setState('dark');
    head.setState(sequence.aspect);
  }
  if (sequence.closeTurnouts) {
    for (const turnout of turnouts) turnout.setState('closed');
  }
}

/** Heads dark, turnouts closed */
export function runShutdownSequence(heads: SignalHead[], turnouts: Turnout[]): void {
  for (const head of heads) head.setState('dark');
  for (const turnout of turnouts) turnout.setState('closed');
}
