import { vi } from 'vitest';
import { SyslogObserver } from './syslog-observer.js';
import type { CommandRunner, SupervisorState } from '@vigil/core';

describe('SyslogObserver', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends each line to logger with tag and priority', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '' }));
    const observer = new SyslogObserver({ tag: 'memory-watchdog', runner });

    observer.onTransition({
      runId: 'run-1',
      from: 'checking-health',
      to: 'recovering',
      reason: 'health endpoint not responding after 3 attempts',
      timestamp: new Date(),
    });
    await observer.flush();

    expect(runner).toHaveBeenCalledWith(
      'logger',
      [
        '-t',
        'memory-watchdog',
        '-p',
        'user.info',
        'checking-health -> recovering: health endpoint not responding after 3 attempts',
      ],
      { timeoutMs: 2_000 },
    );
  });

  it('maps warn and error to syslog priorities', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '' }));
    const observer = new SyslogObserver({ runner });

    observer.onNotice({ runId: 'r', level: 'warn', message: 'slow' });
    observer.onError(new Error('bad'), {});
    await observer.flush();

    const priorities = runner.mock.calls.map((call) => call[1][3]);
    expect(priorities).toEqual(['user.warning', 'user.err']);
  });

  it('respects the log level', async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '' }));
    const observer = new SyslogObserver({ runner, logLevel: 'error' });

    observer.onNotice({ runId: 'r', level: 'info', message: 'ignored' });
    await observer.flush();

    expect(runner).not.toHaveBeenCalled();
  });

  it('warns once on stderr when logger is unavailable and keeps going', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const runner = vi.fn<CommandRunner>(async () => {
      throw new Error('spawn logger ENOENT');
    });
    const observer = new SyslogObserver({ runner });

    observer.onNotice({ runId: 'r', level: 'info', message: 'one' });
    observer.onNotice({ runId: 'r', level: 'info', message: 'two' });
    await expect(observer.flush()).resolves.toBeUndefined();

    expect(runner).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(
      '[SyslogObserver] system logger unavailable: spawn logger ENOENT',
    );
  });

  it('treats a non-zero logger exit as a failed write', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 1, stdout: '', stderr: 'denied' }));
    const observer = new SyslogObserver({ runner, binaryPath: '/usr/bin/logger' });

    observer.onNotice({ runId: 'r', level: 'info', message: 'x' });
    await observer.flush();

    expect(errorSpy).toHaveBeenCalledWith(
      '[SyslogObserver] system logger unavailable: /usr/bin/logger exited with code 1',
    );
  });

  it('writes one line at a time, in emission order', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const landed: string[] = [];
    const runner = vi.fn<CommandRunner>(async (_bin, args) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      if (landed.length === 0) {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      landed.push(args[4] ?? '');
      inFlight--;
      return { exitCode: 0, stdout: '', stderr: '' };
    });
    const observer = new SyslogObserver({ runner });
    const transition = (from: SupervisorState, to: SupervisorState) =>
      observer.onTransition({ runId: 'r', from, to, reason: 'x', timestamp: new Date() });

    transition('checking-process', 'checking-health');
    transition('checking-health', 'recovering');
    transition('recovering', 'escalated');
    await observer.flush();

    expect(maxInFlight).toBe(1);
    expect(landed).toEqual([
      'checking-process -> checking-health: x',
      'checking-health -> recovering: x',
      'recovering -> escalated: x',
    ]);
  });

  it('stops waiting at the flush deadline and drops the lines still queued', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    let release: () => void = () => {};
    const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: '', stderr: '' }));
    runner.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = () => resolve({ exitCode: 0, stdout: '', stderr: '' });
        }),
    );
    const observer = new SyslogObserver({ runner, flushTimeoutMs: 10 });

    observer.onNotice({ runId: 'r', level: 'info', message: 'one' });
    observer.onNotice({ runId: 'r', level: 'info', message: 'two' });
    observer.onNotice({ runId: 'r', level: 'info', message: 'three' });
    await observer.flush();

    expect(errorSpy).toHaveBeenCalledWith(
      '[SyslogObserver] flush timed out after 10ms, 2 line(s) dropped',
    );

    release();
    observer.onNotice({ runId: 'r', level: 'info', message: 'four' });
    await observer.flush();

    expect(runner).toHaveBeenCalledTimes(2);
  });
});
