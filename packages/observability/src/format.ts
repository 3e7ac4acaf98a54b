/**
 * Plain-text rendering of observer events, shared by every sink.
 *
 * Each function returns the severity and the message body of exactly one
 * log line. Sinks add their own timestamp, tag and color.
 */

import type {
  RunMeta,
  RunSummary,
  TransitionEvent,
  ProbeEvent,
  RecoveryEvent,
  AlertEvent,
  NoticeEvent,
} from '@vigil/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_RANK, value);
}

export interface LogLine {
  level: LogLevel;
  message: string;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatRunStart(meta: RunMeta): LogLine {
  return {
    level: 'info',
    message: `${meta.kind} started for ${meta.service} run=${meta.runId}`,
  };
}

export function formatRunEnd(meta: RunMeta, summary: RunSummary): LogLine {
  return {
    level: summary.exitCode === 0 ? 'info' : 'error',
    message:
      `${meta.kind} finished: ${summary.outcome}` +
      ` exit=${summary.exitCode}` +
      ` duration=${formatDuration(summary.duration)}`,
  };
}

export function formatTransition(event: TransitionEvent): LogLine {
  return {
    level: event.to === 'escalated' ? 'error' : 'info',
    message: `${event.from} -> ${event.to}: ${event.reason}`,
  };
}

export function formatProbe(event: ProbeEvent): LogLine {
  const attempt =
    event.attempt !== undefined
      ? ` attempt ${event.attempt}${event.maxAttempts !== undefined ? `/${event.maxAttempts}` : ''}`
      : '';
  const detail = event.detail ? `: ${event.detail}` : '';
  return {
    level: event.passed ? 'debug' : 'warn',
    message:
      `${event.stage} probe ${event.passed ? 'passed' : 'failed'}${attempt}` +
      ` (${formatDuration(event.duration)})${detail}`,
  };
}

export function formatRecovery(event: RecoveryEvent): LogLine {
  const detail = event.detail ? ` ${event.detail}` : '';
  if (event.result.ok) {
    return { level: 'info', message: `recovery ${event.step} ok${detail}` };
  }
  return {
    level: 'warn',
    message: `recovery ${event.step} failed${detail}: ${event.result.error.message}`,
  };
}

export function formatAlert(event: AlertEvent): LogLine {
  switch (event.delivery.status) {
    case 'delivered':
      return { level: 'error', message: `CRITICAL: ${event.message} (alert delivered)` };
    case 'skipped':
      return {
        level: 'error',
        message: `CRITICAL: ${event.message} (alert skipped: ${event.delivery.reason})`,
      };
    case 'failed':
      return {
        level: 'error',
        message: `CRITICAL: ${event.message} (alert failed: ${event.delivery.error.message})`,
      };
  }
}

export function formatNotice(event: NoticeEvent): LogLine {
  return { level: event.level, message: event.message };
}

export function formatError(error: Error, context: Record<string, unknown>): LogLine {
  const ctx = Object.keys(context).length > 0 ? ` ctx=${JSON.stringify(context)}` : '';
  return { level: 'error', message: `${error.name}: ${error.message}${ctx}` };
}
