/**
 * @vigil/observability: log sinks for supervision runs.
 *
 * Re-exports every observer implementation and the factory registry.
 */

export { ConsoleObserver } from './console-observer.js';
export type { ConsoleObserverOptions } from './console-observer.js';

export { SyslogObserver, DEFAULT_SYSLOG_FLUSH_TIMEOUT_MS } from './syslog-observer.js';
export type { SyslogObserverOptions } from './syslog-observer.js';

export { LineObserver } from './line-observer.js';
export { MultiObserver } from './multi-observer.js';
export { NoopObserver } from './noop-observer.js';

export { isLogLevel, formatDuration } from './format.js';
export type { LogLevel, LogLine } from './format.js';

export { createObserver, OBSERVER_NAMES } from './registry.js';
export type { ObservabilityConfig, ObserverName } from './registry.js';
