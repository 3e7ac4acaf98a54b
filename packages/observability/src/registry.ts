/**
 * Observer registry: factory that builds observers from config.
 *
 * Reads the `observability` section of VigilConfig and returns a ready-to-use
 * IObserver (potentially a MultiObserver wrapping several children).
 */

import type { IObserver } from '@vigil/core';

import { ConsoleObserver } from './console-observer.js';
import { SyslogObserver } from './syslog-observer.js';
import type { LogLevel } from './format.js';
import { MultiObserver } from './multi-observer.js';
import { NoopObserver } from './noop-observer.js';

// ---------------------------------------------------------------------------
// Public config shape (mirrors the observability section of VigilConfig)
// ---------------------------------------------------------------------------

export type ObserverName = 'console' | 'syslog' | 'noop';

export const OBSERVER_NAMES: readonly ObserverName[] = ['console', 'syslog', 'noop'];

export interface ObservabilityConfig {
  /** Observer names to activate (e.g. ["console", "syslog"]). */
  observers: string[];
  /** Minimum level for every sink. */
  logLevel?: LogLevel;
  /** Fixed tag on console lines and the syslog identifier. */
  tag?: string;
  /** Force console colors on or off. */
  color?: boolean;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Build an IObserver from configuration.
 *
 * - If `observers` is empty, returns a NoopObserver.
 * - If a single observer is listed, returns it directly.
 * - If multiple observers are listed, wraps them in a MultiObserver.
 */
export function createObserver(config: ObservabilityConfig): IObserver {
  const { observers, logLevel = 'info', tag, color } = config;

  if (observers.length === 0) {
    return new NoopObserver();
  }

  const children: IObserver[] = [];

  for (const name of observers) {
    switch (name) {
      case 'console':
        children.push(new ConsoleObserver({ logLevel, tag, color }));
        break;
      case 'syslog':
        children.push(new SyslogObserver({ logLevel, tag }));
        break;
      case 'noop':
        children.push(new NoopObserver());
        break;
      default:
        // Unknown observer name: warn and skip.
        console.warn(`[observability] unknown observer "${name}", skipping`);
        break;
    }
  }

  const [first] = children;
  if (first === undefined) {
    return new NoopObserver();
  }

  if (children.length === 1) {
    return first;
  }

  return new MultiObserver(children);
}
