/**
 * RecoveryActuator: the only component allowed to disrupt the service.
 *
 * Sequence: free port, pause, restart, settle, verify. Only the final
 * health verification decides the result; every earlier step is best
 * effort and is reported, never thrown.
 */

import { RecoveryFailedError, toError } from '@vigil/core';
import type {
  BestEffortResult,
  IProbeClient,
  IProcessControl,
  IRecoveryActuator,
  ProbeTimeouts,
  RecoveryStep,
  RetryPolicy,
  RunContext,
  ServiceIdentity,
} from '@vigil/core';

export interface RecoveryActuatorOptions {
  processControl: IProcessControl;
  probe: IProbeClient;
  policy: Pick<RetryPolicy, 'portReleasePauseMs' | 'settleDelayMs'>;
  timeouts: Pick<ProbeTimeouts, 'processMs' | 'healthMs' | 'restartMs'>;
  context: RunContext;
}

export class RecoveryActuator implements IRecoveryActuator {
  private readonly processControl: IProcessControl;
  private readonly probe: IProbeClient;
  private readonly policy: RecoveryActuatorOptions['policy'];
  private readonly timeouts: RecoveryActuatorOptions['timeouts'];
  private readonly context: RunContext;

  constructor(options: RecoveryActuatorOptions) {
    this.processControl = options.processControl;
    this.probe = options.probe;
    this.policy = options.policy;
    this.timeouts = options.timeouts;
    this.context = options.context;
  }

  async forceFreePort(port: number): Promise<BestEffortResult> {
    let result: BestEffortResult;
    try {
      await this.processControl.freePort(port, this.timeouts.processMs);
      result = { ok: true };
    } catch (err) {
      result = { ok: false, error: toError(err) };
    }
    this.report('free-port', result, `port ${port}`);
    return result;
  }

  async restart(identity: ServiceIdentity): Promise<boolean> {
    const { clock } = this.context;

    await this.forceFreePort(identity.port);
    await clock.sleep(this.policy.portReleasePauseMs);

    let restarted: BestEffortResult;
    try {
      await this.processControl.restart(identity.unit, this.timeouts.restartMs);
      restarted = { ok: true };
    } catch (err) {
      // Carry on: the unit may still come up (or already be up) by itself.
      restarted = { ok: false, error: toError(err) };
    }
    this.report('restart', restarted, identity.unit);

    await clock.sleep(this.policy.settleDelayMs);
    this.report('settle', { ok: true }, `waited ${this.policy.settleDelayMs}ms`);

    const healthy = await this.probe.checkHealthEndpoint(identity, this.timeouts.healthMs);
    this.report(
      'verify',
      healthy
        ? { ok: true }
        : {
            ok: false,
            error: new RecoveryFailedError(`${identity.name} health endpoint still failing`, {
              unit: identity.unit,
              url: identity.healthUrl,
            }),
          },
      identity.healthUrl,
    );
    return healthy;
  }

  private report(step: RecoveryStep, result: BestEffortResult, detail: string): void {
    this.context.observer.onRecovery({ runId: this.context.runId, step, result, detail });
  }
}
