/**
 * HealthSupervisor: one check run against one service.
 *
 * Probes escalate in depth (process, health endpoint, functional round
 * trip) and stop at the first failing stage. A failure triggers exactly
 * one restart through the actuator; if that does not bring the health
 * endpoint back the run escalates and the notifier is called once.
 *
 *   checking-process -> checking-health -> checking-functional -> healthy
 *          \                  |                    /
 *           `-------------> recovering <----------'
 *                           /        \
 *                      healthy     escalated
 */

import { EventEmitter } from 'node:events';
import {
  FunctionalFailureError,
  ProcessDownError,
  RecoveryFailedError,
  TransportUnreachableError,
  escalationFor,
  exitCodeFor,
  toError,
} from '@vigil/core';
import type {
  AlertDelivery,
  INotifier,
  IProbeClient,
  IRecoveryActuator,
  ProbeStage,
  ProbeTimeouts,
  RetryPolicy,
  RunContext,
  RunMeta,
  RunOutcome,
  ServiceIdentity,
  SupervisorState,
  TransitionEvent,
  VigilError,
} from '@vigil/core';
import { assertValidPolicy } from './policy.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface RunReport {
  outcome: RunOutcome;
  exitCode: number;
  /** First stage that failed, undefined for an all-healthy run. */
  failedStage?: ProbeStage;
  /** The error that sent the run into recovery. */
  failure?: VigilError;
  restarts: number;
  /** Present only when an alert was attempted. */
  alert?: AlertDelivery;
  durationMs: number;
}

export interface HealthSupervisorEvents {
  transition: [event: TransitionEvent];
  outcome: [report: RunReport];
}

export interface HealthSupervisorOptions {
  identity: ServiceIdentity;
  policy: RetryPolicy;
  timeouts: ProbeTimeouts;
  probe: IProbeClient;
  actuator: IRecoveryActuator;
  notifier: INotifier;
  context: RunContext;
}

type StageFailure = { stage: ProbeStage; error: VigilError };

export function escalationMessage(stage: ProbeStage, service: string): string {
  switch (stage) {
    case 'process':
      return `${service} failed to start after restart attempt`;
    case 'health':
      return `${service} health endpoint failed, restart unsuccessful`;
    case 'functional':
      return `${service} functional check failed, restart unsuccessful`;
  }
}

// ── HealthSupervisor ─────────────────────────────────────────────────────

export class HealthSupervisor extends EventEmitter<HealthSupervisorEvents> {
  private readonly identity: ServiceIdentity;
  private readonly policy: RetryPolicy;
  private readonly timeouts: ProbeTimeouts;
  private readonly probe: IProbeClient;
  private readonly actuator: IRecoveryActuator;
  private readonly notifier: INotifier;
  private readonly context: RunContext;

  private state: SupervisorState = 'checking-process';
  private running = false;

  constructor(options: HealthSupervisorOptions) {
    super();
    assertValidPolicy(options.policy, options.timeouts);
    this.identity = options.identity;
    this.policy = options.policy;
    this.timeouts = options.timeouts;
    this.probe = options.probe;
    this.actuator = options.actuator;
    this.notifier = options.notifier;
    this.context = options.context;
  }

  get currentState(): SupervisorState {
    return this.state;
  }

  async run(): Promise<RunReport> {
    // Guards this instance only. Separate invocations are not locked against
    // each other; worstCaseRunMs keeps them apart.
    if (this.running) {
      throw new Error('HealthSupervisor is already running');
    }
    this.running = true;

    const { clock, observer, runId } = this.context;
    const startedAt = clock.now();
    const meta: RunMeta = {
      runId,
      kind: 'check',
      service: this.identity.name,
      startedAt: new Date(startedAt),
    };
    observer.onRunStart(meta);

    try {
      this.state = 'checking-process';
      const failure = await this.runChecks();

      let report: RunReport;
      if (!failure) {
        this.transition('healthy', 'all checks passed');
        report = { outcome: 'all-healthy', exitCode: 0, restarts: 0, durationMs: 0 };
      } else {
        report = await this.recover(failure);
      }
      report.durationMs = clock.now() - startedAt;

      observer.onRunEnd(meta, {
        outcome: report.outcome,
        exitCode: report.exitCode,
        duration: report.durationMs,
      });
      this.emit('outcome', report);
      return report;
    } finally {
      this.running = false;
    }
  }

  // ── Stages ───────────────────────────────────────────────────────────

  /** Resolves with the first failing stage, or undefined when all pass. */
  private async runChecks(): Promise<StageFailure | undefined> {
    const { identity, probe, timeouts, policy } = this;
    const { clock, observer, runId } = this.context;

    // 1. Process
    let started = clock.now();
    const liveness = await probe.checkProcessAlive(identity);
    observer.onProbe({
      runId,
      stage: 'process',
      passed: liveness.alive,
      detail: liveness.detail,
      duration: clock.now() - started,
    });
    if (!liveness.alive) {
      return {
        stage: 'process',
        error: new ProcessDownError(
          liveness.detail ?? `${identity.unit} is not active`,
          identity.unit,
        ),
      };
    }
    this.transition('checking-health', `${identity.unit} is active`);

    // 2. Health endpoint, retried
    let healthy = false;
    for (let attempt = 1; attempt <= policy.maxRetries; attempt++) {
      started = clock.now();
      healthy = await probe.checkHealthEndpoint(identity, timeouts.healthMs);
      observer.onProbe({
        runId,
        stage: 'health',
        passed: healthy,
        attempt,
        maxAttempts: policy.maxRetries,
        duration: clock.now() - started,
      });
      if (healthy) break;
      if (attempt < policy.maxRetries) {
        await clock.sleep(policy.retryDelayMs);
      }
    }
    if (!healthy) {
      return {
        stage: 'health',
        error: new TransportUnreachableError(
          `${identity.healthUrl} not responding after ${policy.maxRetries} attempts`,
          identity.healthUrl,
          { attempts: policy.maxRetries },
        ),
      };
    }
    this.transition('checking-functional', 'health endpoint responding');

    // 3. Functional round trip
    started = clock.now();
    const result = await probe.checkFunctional(identity, timeouts.functionalMs);
    observer.onProbe({
      runId,
      stage: 'functional',
      passed: result.status === 'alive',
      detail: result.detail,
      duration: clock.now() - started,
    });

    if (result.status !== 'unreachable') {
      const cleanup = result.cleanup;
      if (cleanup && !cleanup.ok) {
        observer.onNotice({
          runId,
          level: 'warn',
          message: `test record ${result.artifact?.contentHash ?? '(unknown)'} not deleted: ${cleanup.error.message}`,
        });
      }
    }

    switch (result.status) {
      case 'alive':
        return undefined;
      case 'unreachable':
        return {
          stage: 'functional',
          error: new TransportUnreachableError(
            `${identity.functionalUrl} unreachable: ${result.detail ?? 'no detail'}`,
            identity.functionalUrl,
          ),
        };
      case 'functional-failure':
        return {
          stage: 'functional',
          error: new FunctionalFailureError(
            `functional check failed: ${result.detail ?? 'no detail'}`,
            { url: identity.functionalUrl },
          ),
        };
    }
  }

  /** One restart; its verification alone decides recovered vs escalated. */
  private async recover(failure: StageFailure): Promise<RunReport> {
    const { identity } = this;
    const { observer, runId } = this.context;

    this.transition('recovering', failure.error.message);
    const recovered = await this.actuator.restart(identity);

    if (recovered) {
      this.transition('healthy', `restart verified after ${failure.stage} failure`);
      const outcome: RunOutcome = 'recovered-after-restart';
      return {
        outcome,
        exitCode: exitCodeFor(outcome),
        failedStage: failure.stage,
        failure: failure.error,
        restarts: 1,
        durationMs: 0,
      };
    }

    const outcome = escalationFor(failure.stage);
    this.transition('escalated', `restart did not recover ${identity.name}`);

    const message = escalationMessage(failure.stage, identity.name);
    observer.onError(
      new RecoveryFailedError(message, { stage: failure.stage, unit: identity.unit }),
      { runId, cause: failure.error.message },
    );

    let alert: AlertDelivery;
    try {
      alert = await this.notifier.notify(message);
    } catch (err) {
      alert = { status: 'failed', error: toError(err) };
    }
    observer.onAlert({ runId, message, delivery: alert });

    return {
      outcome,
      exitCode: exitCodeFor(outcome),
      failedStage: failure.stage,
      failure: failure.error,
      restarts: 1,
      alert,
      durationMs: 0,
    };
  }

  private transition(to: SupervisorState, reason: string): void {
    const event: TransitionEvent = {
      runId: this.context.runId,
      from: this.state,
      to,
      reason,
      timestamp: new Date(this.context.clock.now()),
    };
    this.state = to;
    this.context.observer.onTransition(event);
    this.emit('transition', event);
  }
}
