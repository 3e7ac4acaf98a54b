/**
 * ProbeClient: the three probe depths against the service boundary.
 *
 * - process: asks the process manager whether the unit is active
 * - health: GET on the health endpoint, any 2xx in time is a pass
 * - functional: stores a uniquely tagged record, checks the store reply,
 *   then deletes the record again
 *
 * Probes never throw on expected failure. Transport problems become
 * `unreachable`, wrong answers become `functional-failure`, and the
 * functional probe's cleanup outcome is reported next to the result
 * without ever changing it.
 */

import { randomUUID } from 'node:crypto';
import {
  FunctionalFailureError,
  TransportUnreachableError,
  toError,
} from '@vigil/core';
import type {
  BestEffortResult,
  FunctionalProbeOptions,
  IProbeClient,
  IProcessControl,
  ProbeResult,
  ProbeTimeouts,
  ProcessLiveness,
  ServiceDiagnostics,
  ServiceIdentity,
  TestArtifact,
} from '@vigil/core';

// ── Types ────────────────────────────────────────────────────────────────

export interface ProbeClientOptions {
  processControl: IProcessControl;
  /** `processMs` bounds the liveness query, `healthMs` the artifact delete. */
  timeouts: Pick<ProbeTimeouts, 'processMs' | 'healthMs'>;
}

interface HttpReply {
  status: number;
  ok: boolean;
  body: string;
}

interface StoreReply {
  success: boolean;
  contentHash?: string;
}

const DEFAULT_LABEL = 'vigil health check';
const DEFAULT_TAGS = ['vigil-probe'];
const DEFAULT_MEMORY_TYPE = 'test';

/** Diagnostic bodies are clipped before they reach a log line. */
const MAX_DETAIL_LENGTH = 500;

// ── ProbeClient ──────────────────────────────────────────────────────────

export class ProbeClient implements IProbeClient {
  private readonly processControl: IProcessControl;
  private readonly timeouts: Pick<ProbeTimeouts, 'processMs' | 'healthMs'>;

  constructor(options: ProbeClientOptions) {
    this.processControl = options.processControl;
    this.timeouts = options.timeouts;
  }

  async checkProcessAlive(identity: ServiceIdentity): Promise<ProcessLiveness> {
    try {
      const alive = await this.processControl.isActive(identity.unit, this.timeouts.processMs);
      return alive ? { alive } : { alive, detail: `${identity.unit} is not active` };
    } catch (err) {
      // A liveness query that cannot even run counts as "not active".
      return {
        alive: false,
        detail: `could not query ${identity.unit}: ${toError(err).message}`,
      };
    }
  }

  async checkHealthEndpoint(identity: ServiceIdentity, timeoutMs: number): Promise<boolean> {
    try {
      const reply = await this.request(identity.healthUrl, { method: 'GET' }, timeoutMs);
      return reply.ok;
    } catch {
      return false;
    }
  }

  async checkFunctional(
    identity: ServiceIdentity,
    timeoutMs: number,
    options: FunctionalProbeOptions = {},
  ): Promise<ProbeResult> {
    const label = options.label ?? DEFAULT_LABEL;
    const tags = options.tags ?? DEFAULT_TAGS;
    const content = `${label} ${new Date().toISOString()} ${randomUUID().slice(0, 8)}`;

    let reply: HttpReply;
    try {
      reply = await this.request(
        identity.functionalUrl,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            content,
            tags,
            memory_type: options.memoryType ?? DEFAULT_MEMORY_TYPE,
          }),
        },
        timeoutMs,
      );
    } catch (err) {
      return { status: 'unreachable', detail: toError(err).message };
    }

    const parsed = parseStoreReply(reply.body);

    let artifact: TestArtifact | undefined;
    let cleanup: BestEffortResult | undefined;
    if (parsed?.contentHash !== undefined) {
      artifact = { contentHash: parsed.contentHash, content, tags };
      cleanup = await this.deleteArtifact(identity, parsed.contentHash);
    }

    if (!reply.ok) {
      return {
        status: 'functional-failure',
        detail: `HTTP ${reply.status}: ${clip(reply.body)}`,
        artifact,
        cleanup,
      };
    }
    if (parsed === undefined) {
      return {
        status: 'functional-failure',
        detail: `unparseable store reply: ${clip(reply.body)}`,
        artifact,
        cleanup,
      };
    }
    if (!parsed.success) {
      return { status: 'functional-failure', detail: clip(reply.body), artifact, cleanup };
    }
    return { status: 'alive', artifact, cleanup };
  }

  async fetchDiagnostics(
    identity: ServiceIdentity,
    timeoutMs: number,
  ): Promise<ServiceDiagnostics | undefined> {
    try {
      const reply = await this.request(identity.diagnosticsUrl, { method: 'GET' }, timeoutMs);
      if (!reply.ok) return undefined;
      return parseDiagnostics(reply.body);
    } catch {
      return undefined;
    }
  }

  // ── Internal ─────────────────────────────────────────────────────────

  /** Errors are intentionally ignored by callers; see BestEffortResult. */
  private async deleteArtifact(
    identity: ServiceIdentity,
    contentHash: string,
  ): Promise<BestEffortResult> {
    const url = `${identity.functionalUrl}/${encodeURIComponent(contentHash)}`;
    try {
      const reply = await this.request(url, { method: 'DELETE' }, this.timeouts.healthMs);
      if (!reply.ok) {
        return {
          ok: false,
          error: new FunctionalFailureError(`DELETE ${url} returned HTTP ${reply.status}`, {
            contentHash,
          }),
        };
      }
      return { ok: true };
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  /**
   * One bounded HTTP exchange, body included. Any transport-level problem
   * (refused connection, DNS, timeout, reset mid-body) is rethrown as a
   * TransportUnreachableError.
   */
  private async request(url: string, init: RequestInit, timeoutMs: number): Promise<HttpReply> {
    try {
      const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      const body = await response.text();
      return { status: response.status, ok: response.ok, body };
    } catch (err) {
      const error = toError(err);
      const reason =
        error.name === 'TimeoutError' ? `timed out after ${timeoutMs}ms` : error.message;
      throw new TransportUnreachableError(`${init.method ?? 'GET'} ${url} failed: ${reason}`, url);
    }
  }
}

// ── Reply parsing ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * The store endpoint answers `{ success, content_hash, memory: {...} }`.
 * Older releases only put the hash inside `memory`.
 */
export function parseStoreReply(text: string): StoreReply | undefined {
  const data = parseJson(text);
  if (!isRecord(data)) return undefined;

  const nested = isRecord(data['memory']) ? data['memory'] : {};
  return {
    success: data['success'] === true,
    contentHash: nonEmptyString(data['content_hash']) ?? nonEmptyString(nested['content_hash']),
  };
}

export function parseDiagnostics(text: string): ServiceDiagnostics | undefined {
  const data = parseJson(text);
  if (!isRecord(data)) return undefined;

  const status = nonEmptyString(data['status']);
  if (status === undefined) return undefined;

  const storage = isRecord(data['storage']) ? data['storage'] : {};
  const statistics = isRecord(data['statistics']) ? data['statistics'] : {};
  const total = statistics['total_memories'] ?? storage['total_memories'];

  return {
    status,
    version: nonEmptyString(data['version']),
    storageStatus: nonEmptyString(storage['status']),
    totalMemories: typeof total === 'number' ? total : undefined,
  };
}

function clip(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) return '(empty body)';
  return trimmed.length > MAX_DETAIL_LENGTH ? `${trimmed.slice(0, MAX_DETAIL_LENGTH)}…` : trimmed;
}
