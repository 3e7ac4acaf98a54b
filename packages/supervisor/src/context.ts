import { randomUUID } from 'node:crypto';
import { systemClock } from '@vigil/core';
import type { RunContext } from '@vigil/core';
import { NoopObserver } from '@vigil/observability';

export function createRunContext(overrides: Partial<RunContext> = {}): RunContext {
  return {
    runId: overrides.runId ?? randomUUID().slice(0, 8),
    observer: overrides.observer ?? new NoopObserver(),
    clock: overrides.clock ?? systemClock,
  };
}
