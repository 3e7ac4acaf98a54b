/**
 * IObserver: observability contract
 *
 * Every state transition, probe, recovery step, alert and run outcome is
 * reported here. Sinks format one line per event; they must never throw
 * into the supervision flow.
 */

import type {
  BestEffortResult,
  ProbeStage,
  SupervisorState,
} from '../types/index.js';
import type { AlertDelivery } from './notifier.js';

export type RunKind = 'check' | 'warmup';

export interface RunMeta {
  runId: string;
  kind: RunKind;
  service: string;
  startedAt: Date;
}

export interface RunSummary {
  /** A RunOutcome for checks, 'warm' or 'cold' for warm-ups. */
  outcome: string;
  exitCode: number;
  duration: number;
}

export interface TransitionEvent {
  runId: string;
  from: SupervisorState;
  to: SupervisorState;
  reason: string;
  timestamp: Date;
}

export interface ProbeEvent {
  runId: string;
  stage: ProbeStage;
  passed: boolean;
  attempt?: number;
  maxAttempts?: number;
  detail?: string;
  duration: number;
}

export type RecoveryStep = 'free-port' | 'restart' | 'settle' | 'verify';

export interface RecoveryEvent {
  runId: string;
  step: RecoveryStep;
  result: BestEffortResult;
  detail?: string;
}

export interface AlertEvent {
  runId: string;
  message: string;
  delivery: AlertDelivery;
}

export type NoticeLevel = 'debug' | 'info' | 'warn';

/** Free-form line that fits none of the structured events. */
export interface NoticeEvent {
  runId: string;
  level: NoticeLevel;
  message: string;
}

export interface IObserver {
  onRunStart(meta: RunMeta): void;
  onRunEnd(meta: RunMeta, summary: RunSummary): void;
  onTransition(event: TransitionEvent): void;
  onProbe(event: ProbeEvent): void;
  onRecovery(event: RecoveryEvent): void;
  onAlert(event: AlertEvent): void;
  onNotice(event: NoticeEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
