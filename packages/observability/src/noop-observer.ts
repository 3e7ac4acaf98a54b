/**
 * NoopObserver: silent observer that discards all events.
 *
 * Used when observability is explicitly disabled and as the default in
 * component constructors.
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

export class NoopObserver implements IObserver {
  onRunStart(_meta: RunMeta): void {
    // intentionally empty
  }

  onRunEnd(_meta: RunMeta, _summary: RunSummary): void {
    // intentionally empty
  }

  onTransition(_event: TransitionEvent): void {
    // intentionally empty
  }

  onProbe(_event: ProbeEvent): void {
    // intentionally empty
  }

  onRecovery(_event: RecoveryEvent): void {
    // intentionally empty
  }

  onAlert(_event: AlertEvent): void {
    // intentionally empty
  }

  onNotice(_event: NoticeEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
