/**
 * Shared value types for one supervised service.
 *
 * Everything here is built once at startup and passed explicitly into the
 * components that need it. Nothing reads ambient process state.
 */

/** Where and what to probe. Read-only for the lifetime of a run. */
export interface ServiceIdentity {
  /** Logical name used in log lines and alert messages. */
  readonly name: string;
  /** Process-manager unit queried for liveness and restarted on recovery. */
  readonly unit: string;
  readonly healthUrl: string;
  /** Collection endpoint the functional probe stores its test record in. */
  readonly functionalUrl: string;
  /** Detailed health endpoint reporting storage status and item counts. */
  readonly diagnosticsUrl: string;
  /** TCP port the service listens on; freed before every restart. */
  readonly port: number;
}

export interface RetryPolicy {
  /** Health-endpoint attempts before recovery is triggered. */
  readonly maxRetries: number;
  /** Pause between two health-endpoint attempts. */
  readonly retryDelayMs: number;
  /** Pause between freeing the port and issuing the restart. */
  readonly portReleasePauseMs: number;
  /** Pause between the restart and the verification probe. */
  readonly settleDelayMs: number;
  readonly warmupAttempts: number;
  /** Successful warm-up probes required to call the service warm. */
  readonly warmupQuorum: number;
  /** Deadline for the service to answer its health endpoint at boot. */
  readonly warmupMaxWaitMs: number;
  readonly warmupPollIntervalMs: number;
  /** Pause between two warm-up probes. */
  readonly warmupPauseMs: number;
}

/** Hard per-call deadlines. There is no cooperative cancellation mid-probe. */
export interface ProbeTimeouts {
  readonly processMs: number;
  readonly healthMs: number;
  readonly functionalMs: number;
  readonly warmupFunctionalMs: number;
  readonly restartMs: number;
  readonly alertMs: number;
}

// ── Probe results ────────────────────────────────────────────────────────

/**
 * Outcome of an operation whose failure is deliberately ignored by the
 * caller (artifact cleanup, port freeing, syslog writes). Returned rather
 * than swallowed so the ignoring stays visible and testable.
 */
export type BestEffortResult = { ok: true } | { ok: false; error: Error };

/** The record a functional probe stores and then deletes. */
export interface TestArtifact {
  readonly contentHash: string;
  readonly content: string;
  readonly tags: readonly string[];
}

/** Answer of the process-manager query; `detail` says why it is not alive. */
export interface ProcessLiveness {
  readonly alive: boolean;
  readonly detail?: string;
}

export type ProbeStatus = 'alive' | 'unreachable' | 'functional-failure';

export type ProbeResult =
  | {
      readonly status: 'alive';
      readonly detail?: string;
      readonly artifact?: TestArtifact;
      readonly cleanup?: BestEffortResult;
    }
  | {
      readonly status: 'functional-failure';
      readonly detail?: string;
      readonly artifact?: TestArtifact;
      readonly cleanup?: BestEffortResult;
    }
  | { readonly status: 'unreachable'; readonly detail?: string };

/** Subset of the detailed health payload the supervisor cares about. */
export interface ServiceDiagnostics {
  status: string;
  version?: string;
  storageStatus?: string;
  totalMemories?: number;
}

// ── Run outcomes ─────────────────────────────────────────────────────────

export type RunOutcome =
  | 'all-healthy'
  | 'recovered-after-restart'
  | 'escalated-process-down'
  | 'escalated-health-down'
  | 'escalated-functional-down';

export type ProbeStage = 'process' | 'health' | 'functional';

export type SupervisorState =
  | 'checking-process'
  | 'checking-health'
  | 'checking-functional'
  | 'recovering'
  | 'healthy'
  | 'escalated';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function isEscalated(outcome: RunOutcome): boolean {
  return outcome.startsWith('escalated-');
}

/** 0 for healthy or recovered, 1 for anything needing an operator. */
export function exitCodeFor(outcome: RunOutcome): number {
  return isEscalated(outcome) ? EXIT_FAILURE : EXIT_OK;
}

export function escalationFor(stage: ProbeStage): RunOutcome {
  switch (stage) {
    case 'process':
      return 'escalated-process-down';
    case 'health':
      return 'escalated-health-down';
    case 'functional':
      return 'escalated-functional-down';
  }
}
