/**
 * RunContext: per-invocation collaborators shared by every component.
 */

import type { Clock } from '../utils/clock.js';
import type { IObserver } from './observer.js';

export interface RunContext {
  /** Short id stamped on every event of one invocation. */
  readonly runId: string;
  readonly observer: IObserver;
  readonly clock: Clock;
}
