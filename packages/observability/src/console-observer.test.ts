import { vi } from 'vitest';
import { ConsoleObserver } from './console-observer.js';
import type { RunMeta, RunSummary } from '@vigil/core';

const NOW = new Date('2026-03-01T10:00:00.000Z');

function makeMeta(): RunMeta {
  return {
    runId: 'run-1',
    kind: 'check',
    service: 'memory',
    startedAt: NOW,
  };
}

describe('ConsoleObserver', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('line format', () => {
    it('prints timestamp, tag and message', () => {
      const observer = new ConsoleObserver({ color: false, tag: 'memory-watchdog' });
      observer.onRunStart(makeMeta());
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [memory-watchdog] check started for memory run=run-1',
      );
    });

    it('defaults the tag to vigil', () => {
      const observer = new ConsoleObserver({ color: false });
      observer.onNotice({ runId: 'run-1', level: 'info', message: 'hello' });
      expect(logSpy).toHaveBeenCalledWith('2026-03-01T10:00:00.000Z [vigil] hello');
    });

    it('wraps the line in ANSI codes when color is on', () => {
      const observer = new ConsoleObserver({ color: true });
      observer.onNotice({ runId: 'run-1', level: 'warn', message: 'careful' });
      const line = String(logSpy.mock.calls[0]?.[0]);
      expect(line).toContain('\x1b[33mcareful\x1b[0m');
      expect(line).toContain('[vigil]');
    });
  });

  describe('log level filtering', () => {
    it('logs info and above at "info" level', () => {
      const observer = new ConsoleObserver({ logLevel: 'info', color: false });
      observer.onRunStart(makeMeta());
      expect(logSpy).toHaveBeenCalledTimes(1);
    });

    it('suppresses info at "warn" level', () => {
      const observer = new ConsoleObserver({ logLevel: 'warn', color: false });
      observer.onRunStart(makeMeta());
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('suppresses passing probes unless at "debug" level', () => {
      const event = { runId: 'run-1', stage: 'health' as const, passed: true, duration: 12 };

      new ConsoleObserver({ logLevel: 'info', color: false }).onProbe(event);
      expect(logSpy).not.toHaveBeenCalled();

      new ConsoleObserver({ logLevel: 'debug', color: false }).onProbe(event);
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] health probe passed (12ms)',
      );
    });

    it('always prints failed runs at "error" level', () => {
      const observer = new ConsoleObserver({ logLevel: 'error', color: false });
      const summary: RunSummary = { outcome: 'escalated-health-down', exitCode: 1, duration: 2500 };
      observer.onRunEnd(makeMeta(), summary);
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] check finished: escalated-health-down exit=1 duration=2.50s',
      );
    });
  });

  describe('event lines', () => {
    it('prints transitions with their reason', () => {
      const observer = new ConsoleObserver({ color: false });
      observer.onTransition({
        runId: 'run-1',
        from: 'checking-process',
        to: 'recovering',
        reason: 'service not running',
        timestamp: NOW,
      });
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] checking-process -> recovering: service not running',
      );
    });

    it('prints failed probe attempts with attempt counter and detail', () => {
      const observer = new ConsoleObserver({ color: false });
      observer.onProbe({
        runId: 'run-1',
        stage: 'health',
        passed: false,
        attempt: 2,
        maxAttempts: 3,
        duration: 5000,
        detail: 'retrying in 5s',
      });
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] health probe failed attempt 2/3 (5.00s): retrying in 5s',
      );
    });

    it('prints failed recovery steps with the error', () => {
      const observer = new ConsoleObserver({ color: false });
      observer.onRecovery({
        runId: 'run-1',
        step: 'restart',
        result: { ok: false, error: new Error('unit not found') },
      });
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] recovery restart failed: unit not found',
      );
    });

    it('prints alerts as CRITICAL lines', () => {
      const observer = new ConsoleObserver({ color: false });
      observer.onAlert({
        runId: 'run-1',
        message: 'restart unsuccessful',
        delivery: { status: 'skipped', reason: 'alert sink unreachable' },
      });
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] CRITICAL: restart unsuccessful (alert skipped: alert sink unreachable)',
      );
    });

    it('prints errors with context', () => {
      const observer = new ConsoleObserver({ color: false });
      observer.onError(new Error('boom'), { stage: 'functional' });
      expect(logSpy).toHaveBeenCalledWith(
        '2026-03-01T10:00:00.000Z [vigil] Error: boom ctx={"stage":"functional"}',
      );
    });
  });

  it('flush resolves', async () => {
    await expect(new ConsoleObserver().flush()).resolves.toBeUndefined();
  });
});
