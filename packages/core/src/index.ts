/**
 * @vigil/core: contracts, shared types and errors.
 */

export * from './types/index.js';
export * from './errors/index.js';

export type * from './interfaces/observer.js';
export type * from './interfaces/notifier.js';
export type * from './interfaces/process-control.js';
export type * from './interfaces/probe.js';
export type * from './interfaces/run-context.js';

export { systemClock } from './utils/clock.js';
export type { Clock } from './utils/clock.js';

export { runCommand } from './utils/command.js';
export type { CommandRunner, CommandResult, CommandOptions } from './utils/command.js';
