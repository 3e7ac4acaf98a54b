/**
 * Retry, settle and timeout defaults, plus the run-duration bound.
 *
 * The defaults are heuristics tuned for a service that needs roughly ten
 * seconds to load its embedding model; every value can be overridden from
 * configuration.
 */

import { ConfigError } from '@vigil/core';
import type { ProbeTimeouts, RetryPolicy } from '@vigil/core';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  retryDelayMs: 5_000,
  portReleasePauseMs: 2_000,
  settleDelayMs: 15_000,
  warmupAttempts: 3,
  warmupQuorum: 2,
  warmupMaxWaitMs: 120_000,
  warmupPollIntervalMs: 5_000,
  warmupPauseMs: 2_000,
};

export const DEFAULT_PROBE_TIMEOUTS: ProbeTimeouts = {
  processMs: 5_000,
  healthMs: 5_000,
  functionalMs: 30_000,
  warmupFunctionalMs: 60_000,
  restartMs: 15_000,
  alertMs: 5_000,
};

/** How often the external scheduler is expected to invoke a check. */
export const DEFAULT_SCHEDULE_INTERVAL_MS = 120_000;

// ── Validation ───────────────────────────────────────────────────────────

const TIMEOUT_KEYS: readonly (keyof ProbeTimeouts)[] = [
  'processMs',
  'healthMs',
  'functionalMs',
  'warmupFunctionalMs',
  'restartMs',
  'alertMs',
];

/**
 * Returns one human-readable problem per invalid field, keyed by the
 * configuration path it came from. Empty when the policy is usable.
 */
export function validatePolicy(policy: RetryPolicy, timeouts: ProbeTimeouts): string[] {
  const problems: string[] = [];

  const positiveInt = (path: string, value: number) => {
    if (!Number.isInteger(value) || value < 1) {
      problems.push(`${path} must be a positive integer (got ${value})`);
    }
  };
  const nonNegative = (path: string, value: number) => {
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`${path} must be a non-negative number (got ${value})`);
    }
  };
  const positive = (path: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`${path} must be a positive number (got ${value})`);
    }
  };

  positiveInt('policy.maxRetries', policy.maxRetries);
  nonNegative('policy.retryDelayMs', policy.retryDelayMs);
  nonNegative('policy.portReleasePauseMs', policy.portReleasePauseMs);
  nonNegative('policy.settleDelayMs', policy.settleDelayMs);
  positiveInt('policy.warmupAttempts', policy.warmupAttempts);
  positiveInt('policy.warmupQuorum', policy.warmupQuorum);
  nonNegative('policy.warmupMaxWaitMs', policy.warmupMaxWaitMs);
  positive('policy.warmupPollIntervalMs', policy.warmupPollIntervalMs);
  nonNegative('policy.warmupPauseMs', policy.warmupPauseMs);

  if (policy.warmupQuorum > policy.warmupAttempts) {
    problems.push(
      `policy.warmupQuorum (${policy.warmupQuorum}) cannot exceed policy.warmupAttempts (${policy.warmupAttempts})`,
    );
  }

  for (const key of TIMEOUT_KEYS) {
    positive(`timeouts.${key}`, timeouts[key]);
  }

  return problems;
}

/** Throws a ConfigError listing every problem found by validatePolicy(). */
export function assertValidPolicy(policy: RetryPolicy, timeouts: ProbeTimeouts): void {
  const problems = validatePolicy(policy, timeouts);
  if (problems.length > 0) {
    throw new ConfigError(`Invalid retry policy: ${problems.join('; ')}`, { problems });
  }
}

// ── Duration bound ───────────────────────────────────────────────────────

/** Free port, pause, restart, settle and verify, each step at its deadline. */
export function recoveryWorstCaseMs(policy: RetryPolicy, timeouts: ProbeTimeouts): number {
  return (
    timeouts.processMs +
    policy.portReleasePauseMs +
    timeouts.restartMs +
    policy.settleDelayMs +
    timeouts.healthMs
  );
}

/**
 * Longest possible `check` invocation: the functional-failure path, where
 * the health endpoint only answers on its last attempt, the probe and its
 * cleanup both time out, recovery fails, the alert sink is slow, and the
 * log sinks then take `flushMs` to drain.
 *
 * Invocations are not locked against each other, so this must stay below
 * the scheduling interval.
 */
export function worstCaseRunMs(
  policy: RetryPolicy,
  timeouts: ProbeTimeouts,
  flushMs = 0,
): number {
  const healthPhase =
    policy.maxRetries * timeouts.healthMs + (policy.maxRetries - 1) * policy.retryDelayMs;
  const functionalPhase = timeouts.functionalMs + timeouts.healthMs;
  const alertPhase = 2 * timeouts.alertMs;

  return (
    timeouts.processMs +
    healthPhase +
    functionalPhase +
    recoveryWorstCaseMs(policy, timeouts) +
    alertPhase +
    flushMs
  );
}
