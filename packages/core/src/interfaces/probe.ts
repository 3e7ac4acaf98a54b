/**
 * IProbeClient / IRecoveryActuator: the supervisor's two collaborators.
 *
 * Probes are read-only and never throw on expected failure. The actuator
 * owns every disruptive action and its own verification.
 */

import type {
  BestEffortResult,
  ProbeResult,
  ProcessLiveness,
  ServiceDiagnostics,
  ServiceIdentity,
} from '../types/index.js';

export interface FunctionalProbeOptions {
  /** Human-readable prefix of the stored test content. */
  label?: string;
  tags?: string[];
  memoryType?: string;
}

export interface IProbeClient {
  checkProcessAlive(identity: ServiceIdentity): Promise<ProcessLiveness>;
  checkHealthEndpoint(identity: ServiceIdentity, timeoutMs: number): Promise<boolean>;
  checkFunctional(
    identity: ServiceIdentity,
    timeoutMs: number,
    options?: FunctionalProbeOptions,
  ): Promise<ProbeResult>;
  fetchDiagnostics(
    identity: ServiceIdentity,
    timeoutMs: number,
  ): Promise<ServiceDiagnostics | undefined>;
}

export interface IRecoveryActuator {
  forceFreePort(port: number): Promise<BestEffortResult>;
  /** Free port, restart, settle, verify. Resolves with the verification result. */
  restart(identity: ServiceIdentity): Promise<boolean>;
}
