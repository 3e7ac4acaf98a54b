/**
 * LineObserver: base for sinks that emit one text line per event.
 *
 * Applies the level gate and delegates the actual write to the subclass.
 */

import type {
  IObserver,
  RunMeta,
  RunSummary,
  TransitionEvent,
  ProbeEvent,
  RecoveryEvent,
  AlertEvent,
  NoticeEvent,
} from '@vigil/core';
import {
  LEVEL_RANK,
  formatAlert,
  formatError,
  formatNotice,
  formatProbe,
  formatRecovery,
  formatRunEnd,
  formatRunStart,
  formatTransition,
  type LogLevel,
  type LogLine,
} from './format.js';

export abstract class LineObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  protected abstract write(line: LogLine): void;

  private emit(line: LogLine): void {
    if (LEVEL_RANK[line.level] < this.minLevel) return;
    this.write(line);
  }

  // ---- IObserver ----------------------------------------------------------

  onRunStart(meta: RunMeta): void {
    this.emit(formatRunStart(meta));
  }

  onRunEnd(meta: RunMeta, summary: RunSummary): void {
    this.emit(formatRunEnd(meta, summary));
  }

  onTransition(event: TransitionEvent): void {
    this.emit(formatTransition(event));
  }

  onProbe(event: ProbeEvent): void {
    this.emit(formatProbe(event));
  }

  onRecovery(event: RecoveryEvent): void {
    this.emit(formatRecovery(event));
  }

  onAlert(event: AlertEvent): void {
    this.emit(formatAlert(event));
  }

  onNotice(event: NoticeEvent): void {
    this.emit(formatNotice(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.emit(formatError(error, context));
  }

  async flush(): Promise<void> {
    // Subclasses with buffered output override this.
  }
}
