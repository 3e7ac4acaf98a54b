import { vi } from 'vitest';
import { ConfigError } from '@vigil/core';
import { VirtualClock } from '@vigil/core/testing';
import type {
  IObserver,
  IProbeClient,
  IProcessControl,
  NoticeEvent,
  ProbeEvent,
  ProbeResult,
  ProcessLiveness,
  RunSummary,
  ServiceDiagnostics,
  ServiceIdentity,
} from '@vigil/core';
import { WarmupLoop } from './warmup.js';
import { ProbeClient } from './probe-client.js';
import { DEFAULT_PROBE_TIMEOUTS, DEFAULT_RETRY_POLICY } from './policy.js';
import { createRunContext } from './context.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const identity: ServiceIdentity = {
  name: 'memory-service',
  unit: 'mcp-memory-service',
  healthUrl: 'http://localhost:8100/api/health',
  functionalUrl: 'http://localhost:8100/api/memories',
  diagnosticsUrl: 'http://localhost:8100/api/health/detailed',
  port: 8100,
};

function fakeProbe() {
  return {
    checkProcessAlive: vi.fn(async (): Promise<ProcessLiveness> => ({ alive: true })),
    checkHealthEndpoint: vi.fn(async () => true),
    checkFunctional: vi.fn(async (): Promise<ProbeResult> => ({ status: 'alive' })),
    fetchDiagnostics: vi.fn(async (): Promise<ServiceDiagnostics | undefined> => undefined),
  } satisfies IProbeClient;
}

function recordingObserver() {
  const probes: ProbeEvent[] = [];
  const notices: NoticeEvent[] = [];
  const summaries: RunSummary[] = [];
  const observer: IObserver = {
    onRunStart: vi.fn(),
    onRunEnd: (_meta, summary) => {
      summaries.push(summary);
    },
    onTransition: vi.fn(),
    onProbe: (e) => {
      probes.push(e);
    },
    onRecovery: vi.fn(),
    onAlert: vi.fn(),
    onNotice: (e) => {
      notices.push(e);
    },
    onError: vi.fn(),
  };
  return { observer, probes, notices, summaries };
}

function setup(probe: IProbeClient = fakeProbe()) {
  const clock = new VirtualClock();
  const recorder = recordingObserver();
  const loop = new WarmupLoop({
    identity,
    policy: DEFAULT_RETRY_POLICY,
    timeouts: DEFAULT_PROBE_TIMEOUTS,
    probe,
    context: createRunContext({ runId: 'warm-1', observer: recorder.observer, clock }),
  });
  return { loop, clock, ...recorder };
}

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('WarmupLoop', () => {
  it('waits for the service, then declares it warm on a 2 of 3 quorum', async () => {
    const probe = fakeProbe();
    probe.checkHealthEndpoint
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);
    probe.checkFunctional
      .mockResolvedValueOnce({ status: 'alive' })
      .mockResolvedValueOnce({ status: 'functional-failure', detail: 'HTTP 500: model not loaded' })
      .mockResolvedValueOnce({ status: 'alive' });
    const { loop, clock, probes, summaries } = setup(probe);

    const report = await loop.run();

    expect(report).toEqual({
      ready: true,
      successes: 2,
      attempts: 3,
      quorum: 2,
      waitedMs: 10_000,
      warm: true,
      exitCode: 0,
    });
    expect(clock.sleeps).toEqual([5_000, 5_000, 2_000, 2_000]);
    expect(probe.checkFunctional).toHaveBeenNthCalledWith(1, identity, 60_000, {
      label: 'vigil warmup 1/3',
      tags: ['warmup'],
    });
    expect(probe.checkFunctional).toHaveBeenNthCalledWith(3, identity, 60_000, {
      label: 'vigil warmup 3/3',
      tags: ['warmup'],
    });
    expect(probes.map((p) => [p.attempt, p.passed])).toEqual([
      [1, true],
      [2, false],
      [3, true],
    ]);
    expect(probes[1]?.detail).toBe('HTTP 500: model not loaded');
    expect(summaries).toEqual([{ outcome: 'warm', exitCode: 0, duration: 14_000 }]);
  });

  it('reports cold when fewer than the quorum succeed', async () => {
    const probe = fakeProbe();
    probe.checkFunctional
      .mockResolvedValueOnce({ status: 'unreachable' })
      .mockResolvedValueOnce({ status: 'alive' })
      .mockResolvedValueOnce({ status: 'functional-failure' });
    const { loop, summaries } = setup(probe);

    const report = await loop.run();

    expect(report.successes).toBe(1);
    expect(report.warm).toBe(false);
    expect(report.exitCode).toBe(1);
    expect(summaries[0]?.outcome).toBe('cold');
  });

  it('gives up after the deadline without running functional probes', async () => {
    const probe = fakeProbe();
    probe.checkHealthEndpoint.mockResolvedValue(false);
    const { loop, clock, notices, summaries } = setup(probe);

    const report = await loop.run();

    expect(report).toEqual({
      ready: false,
      successes: 0,
      attempts: 3,
      quorum: 2,
      waitedMs: 120_000,
      warm: false,
      exitCode: 1,
    });
    expect(probe.checkHealthEndpoint).toHaveBeenCalledTimes(24);
    expect(clock.sleeps).toHaveLength(24);
    expect(probe.checkFunctional).not.toHaveBeenCalled();
    expect(notices).toEqual([
      {
        runId: 'warm-1',
        level: 'warn',
        message: 'memory-service did not become ready within 120000ms',
      },
    ]);
    expect(summaries).toEqual([{ outcome: 'unavailable', exitCode: 1, duration: 120_000 }]);
  });

  it('logs the storage state and warns when the stored item count moved', async () => {
    const probe = fakeProbe();
    probe.fetchDiagnostics
      .mockResolvedValueOnce({ status: 'healthy', storageStatus: 'connected', totalMemories: 10 })
      .mockResolvedValueOnce({ status: 'healthy', storageStatus: 'connected', totalMemories: 11 });
    const { loop, notices } = setup(probe);

    const report = await loop.run();

    expect(report.warm).toBe(true);
    expect(notices.map((n) => `${n.level} ${n.message}`)).toEqual([
      'info memory-service is responding',
      'info storage connected, 10 stored items',
      'warn stored item count changed during warm-up: 10 -> 11',
    ]);
  });

  it('warns about a warm-up record that could not be deleted', async () => {
    const probe = fakeProbe();
    probe.checkFunctional.mockResolvedValueOnce({
      status: 'alive',
      artifact: { contentHash: 'h1', content: 'vigil warmup 1/3', tags: ['warmup'] },
      cleanup: { ok: false, error: new Error('HTTP 404') },
    });
    const { loop, notices } = setup(probe);

    await loop.run();

    expect(notices).toContainEqual({
      runId: 'warm-1',
      level: 'warn',
      message: 'warm-up record h1 not deleted: HTTP 404',
    });
  });

  it('leaves the stored item count unchanged against an in-process store', async () => {
    const records = new Map<string, string>();
    let counter = 0;
    globalThis.fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      const url = String(input);
      const method = init?.method ?? 'GET';
      if (url.endsWith('/api/health')) return new Response('{"status":"healthy"}');
      if (url.endsWith('/api/health/detailed')) {
        return new Response(
          JSON.stringify({
            status: 'healthy',
            storage: { status: 'connected' },
            statistics: { total_memories: records.size },
          }),
        );
      }
      if (method === 'POST') {
        const hash = `h${++counter}`;
        records.set(hash, String(init?.body));
        return new Response(JSON.stringify({ success: true, content_hash: hash }));
      }
      if (method === 'DELETE') {
        records.delete(url.slice(url.lastIndexOf('/') + 1));
        return new Response('{"success":true}');
      }
      return new Response(null, { status: 404 });
    });
    const processControl: IProcessControl = {
      isActive: vi.fn(async () => true),
      restart: vi.fn(async () => {}),
      freePort: vi.fn(async () => {}),
    };
    const probe = new ProbeClient({ processControl, timeouts: DEFAULT_PROBE_TIMEOUTS });
    const { loop, notices } = setup(probe);

    const report = await loop.run();

    expect(report.successes).toBe(3);
    expect(counter).toBe(3);
    expect(records.size).toBe(0);
    expect(notices.map((n) => n.message)).toEqual([
      'memory-service is responding',
      'storage connected, 0 stored items',
    ]);
  });

  it('refuses a quorum larger than the attempt count', () => {
    expect(
      () =>
        new WarmupLoop({
          identity,
          policy: { ...DEFAULT_RETRY_POLICY, warmupQuorum: 4 },
          timeouts: DEFAULT_PROBE_TIMEOUTS,
          probe: fakeProbe(),
          context: createRunContext(),
        }),
    ).toThrow(ConfigError);
  });
});
