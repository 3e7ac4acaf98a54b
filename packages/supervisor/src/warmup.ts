/**
 * WarmupLoop: one-shot boot-time warm-up of the service's data path.
 *
 * Waits for the health endpoint, then runs a fixed number of functional
 * probes and declares the service warm when a quorum of them succeed.
 * Never restarts anything.
 */

import { EXIT_FAILURE, EXIT_OK } from '@vigil/core';
import type {
  IProbeClient,
  ProbeTimeouts,
  RetryPolicy,
  RunContext,
  RunMeta,
  ServiceDiagnostics,
  ServiceIdentity,
} from '@vigil/core';
import { assertValidPolicy } from './policy.js';

export interface WarmupReport {
  /** The health endpoint answered before the deadline. */
  ready: boolean;
  successes: number;
  attempts: number;
  quorum: number;
  waitedMs: number;
  warm: boolean;
  exitCode: number;
}

export interface WarmupLoopOptions {
  identity: ServiceIdentity;
  policy: RetryPolicy;
  timeouts: ProbeTimeouts;
  probe: IProbeClient;
  context: RunContext;
}

export class WarmupLoop {
  private readonly identity: ServiceIdentity;
  private readonly policy: RetryPolicy;
  private readonly timeouts: ProbeTimeouts;
  private readonly probe: IProbeClient;
  private readonly context: RunContext;

  constructor(options: WarmupLoopOptions) {
    assertValidPolicy(options.policy, options.timeouts);
    this.identity = options.identity;
    this.policy = options.policy;
    this.timeouts = options.timeouts;
    this.probe = options.probe;
    this.context = options.context;
  }

  async run(): Promise<WarmupReport> {
    const { clock, observer, runId } = this.context;
    const { warmupAttempts: attempts, warmupQuorum: quorum } = this.policy;
    const startedAt = clock.now();
    const meta: RunMeta = {
      runId,
      kind: 'warmup',
      service: this.identity.name,
      startedAt: new Date(startedAt),
    };
    observer.onRunStart(meta);

    const ready = await this.waitForService();
    const waitedMs = clock.now() - startedAt;

    if (!ready) {
      observer.onNotice({
        runId,
        level: 'warn',
        message: `${this.identity.name} did not become ready within ${this.policy.warmupMaxWaitMs}ms`,
      });
      return this.finish(meta, startedAt, 'unavailable', {
        ready: false,
        successes: 0,
        attempts,
        quorum,
        waitedMs,
        warm: false,
        exitCode: EXIT_FAILURE,
      });
    }
    observer.onNotice({ runId, level: 'info', message: `${this.identity.name} is responding` });

    const before = await this.snapshot();
    if (before) {
      observer.onNotice({
        runId,
        level: 'info',
        message: `storage ${before.storageStatus ?? 'unknown'}, ${before.totalMemories ?? '?'} stored items`,
      });
    }

    let successes = 0;
    for (let i = 1; i <= attempts; i++) {
      const started = clock.now();
      const result = await this.probe.checkFunctional(
        this.identity,
        this.timeouts.warmupFunctionalMs,
        { label: `vigil warmup ${i}/${attempts}`, tags: ['warmup'] },
      );
      const passed = result.status === 'alive';
      if (passed) successes++;

      observer.onProbe({
        runId,
        stage: 'functional',
        passed,
        attempt: i,
        maxAttempts: attempts,
        detail: result.detail,
        duration: clock.now() - started,
      });
      if (result.status !== 'unreachable' && result.cleanup && !result.cleanup.ok) {
        observer.onNotice({
          runId,
          level: 'warn',
          message: `warm-up record ${result.artifact?.contentHash ?? '(unknown)'} not deleted: ${result.cleanup.error.message}`,
        });
      }

      if (i < attempts) {
        await clock.sleep(this.policy.warmupPauseMs);
      }
    }

    const after = await this.snapshot();
    if (
      before?.totalMemories !== undefined &&
      after?.totalMemories !== undefined &&
      before.totalMemories !== after.totalMemories
    ) {
      observer.onNotice({
        runId,
        level: 'warn',
        message: `stored item count changed during warm-up: ${before.totalMemories} -> ${after.totalMemories}`,
      });
    }

    const warm = successes >= quorum;
    return this.finish(meta, startedAt, warm ? 'warm' : 'cold', {
      ready: true,
      successes,
      attempts,
      quorum,
      waitedMs,
      warm,
      exitCode: warm ? EXIT_OK : EXIT_FAILURE,
    });
  }

  // ── Internal ─────────────────────────────────────────────────────────

  /** Poll the health endpoint until it answers or the deadline passes. */
  private async waitForService(): Promise<boolean> {
    const { clock } = this.context;
    const deadline = clock.now() + this.policy.warmupMaxWaitMs;

    while (clock.now() < deadline) {
      if (await this.probe.checkHealthEndpoint(this.identity, this.timeouts.healthMs)) {
        return true;
      }
      await clock.sleep(this.policy.warmupPollIntervalMs);
    }
    return false;
  }

  private snapshot(): Promise<ServiceDiagnostics | undefined> {
    return this.probe.fetchDiagnostics(this.identity, this.timeouts.healthMs);
  }

  private finish(
    meta: RunMeta,
    startedAt: number,
    outcome: string,
    report: WarmupReport,
  ): WarmupReport {
    this.context.observer.onRunEnd(meta, {
      outcome,
      exitCode: report.exitCode,
      duration: this.context.clock.now() - startedAt,
    });
    return report;
  }
}
