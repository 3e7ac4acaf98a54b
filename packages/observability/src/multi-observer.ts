/**
 * MultiObserver: fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and logged to stderr so that a single
 * broken sink never aborts a supervision run.
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

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];

  constructor(children: IObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onRunStart(meta: RunMeta): void {
    this.safely((c) => c.onRunStart(meta));
  }

  onRunEnd(meta: RunMeta, summary: RunSummary): void {
    this.safely((c) => c.onRunEnd(meta, summary));
  }

  onTransition(event: TransitionEvent): void {
    this.safely((c) => c.onTransition(event));
  }

  onProbe(event: ProbeEvent): void {
    this.safely((c) => c.onProbe(event));
  }

  onRecovery(event: RecoveryEvent): void {
    this.safely((c) => c.onRecovery(event));
  }

  onAlert(event: AlertEvent): void {
    this.safely((c) => c.onAlert(event));
  }

  onNotice(event: NoticeEvent): void {
    this.safely((c) => c.onNotice(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
