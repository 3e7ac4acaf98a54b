/**
 * SyslogObserver: forwards every line to the system logger.
 *
 * Shells out to `logger -t <tag> -p user.<priority>` once per line. Writes
 * run in the background, one at a time and in emission order. flush()
 * waits for the queue for at most `flushTimeoutMs`; lines still queued
 * after that are dropped. A missing or failing `logger` binary is reported
 * once on stderr and otherwise ignored: the console sink still carries the
 * line.
 */

import { runCommand, toError } from '@vigil/core';
import type { BestEffortResult, CommandRunner } from '@vigil/core';
import { LineObserver } from './line-observer.js';
import type { LogLevel, LogLine } from './format.js';

/** Longest flush() waits for queued lines. */
export const DEFAULT_SYSLOG_FLUSH_TIMEOUT_MS = 2_000;

const SYSLOG_PRIORITY: Record<LogLevel, string> = {
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'err',
};

export interface SyslogObserverOptions {
  logLevel?: LogLevel;
  /** Syslog identifier. Default: 'vigil'. */
  tag?: string;
  /** Path to the logger binary. Default: 'logger'. */
  binaryPath?: string;
  /** Per-line timeout. Default: 2 000 ms. */
  timeoutMs?: number;
  /** Default: DEFAULT_SYSLOG_FLUSH_TIMEOUT_MS. */
  flushTimeoutMs?: number;
  runner?: CommandRunner;
}

export class SyslogObserver extends LineObserver {
  private readonly tag: string;
  private readonly binaryPath: string;
  private readonly timeoutMs: number;
  private readonly flushTimeoutMs: number;
  private readonly runner: CommandRunner;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  /** Bumped when flush() gives up; queued lines of older generations are dropped. */
  private generation = 0;
  private warned = false;

  constructor(options: SyslogObserverOptions = {}) {
    super(options.logLevel);
    this.tag = options.tag ?? 'vigil';
    this.binaryPath = options.binaryPath ?? 'logger';
    this.timeoutMs = options.timeoutMs ?? 2_000;
    this.flushTimeoutMs = options.flushTimeoutMs ?? DEFAULT_SYSLOG_FLUSH_TIMEOUT_MS;
    this.runner = options.runner ?? runCommand;
  }

  protected write(line: LogLine): void {
    const generation = this.generation;
    this.queued++;
    this.tail = this.tail.then(async () => {
      this.queued--;
      if (generation === this.generation) await this.send(line);
    });
  }

  override async flush(): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.flushTimeoutMs);
    });
    try {
      const winner = await Promise.race([this.tail.then(() => 'drained' as const), deadline]);
      if (winner === 'timeout') {
        this.generation++;
        console.error(
          `[SyslogObserver] flush timed out after ${this.flushTimeoutMs}ms, ${this.queued} line(s) dropped`,
        );
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async send(line: LogLine): Promise<BestEffortResult> {
    const args = ['-t', this.tag, '-p', `user.${SYSLOG_PRIORITY[line.level]}`, line.message];
    try {
      const result = await this.runner(this.binaryPath, args, { timeoutMs: this.timeoutMs });
      if (result.exitCode !== 0) {
        throw new Error(`${this.binaryPath} exited with code ${result.exitCode}`);
      }
      return { ok: true };
    } catch (err) {
      const error = toError(err);
      if (!this.warned) {
        this.warned = true;
        console.error(`[SyslogObserver] system logger unavailable: ${error.message}`);
      }
      return { ok: false, error };
    }
  }
}
