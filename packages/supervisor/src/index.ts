/**
 * @vigil/supervisor: probing, recovery, escalation and warm-up.
 */

export * from './policy.js';
export * from './context.js';
export * from './probe-client.js';
export * from './systemd.js';
export * from './recovery.js';
export * from './notifier.js';
export * from './health-supervisor.js';
export * from './warmup.js';
