/**
 * Component wiring shared by the `check` and `warmup` commands.
 */

import type { Clock, IObserver, IProcessControl, RunContext, ServiceIdentity } from '@vigil/core';
import { createObserver } from '@vigil/observability';
import type { LogLevel } from '@vigil/observability';
import { ProbeClient, SystemdProcessControl, createRunContext } from '@vigil/supervisor';
import { buildIdentity } from './config.js';
import type { VigilConfig } from './config.js';

/** Replaceable collaborators; tests swap in fakes. */
export interface RuntimeOverrides {
  processControl?: IProcessControl;
  observer?: IObserver;
  clock?: Clock;
}

export interface Runtime {
  identity: ServiceIdentity;
  context: RunContext;
  processControl: IProcessControl;
  probe: ProbeClient;
}

export function createRuntime(
  config: VigilConfig,
  options: { tag: string; logLevel?: LogLevel },
  overrides: RuntimeOverrides = {},
): Runtime {
  const observer =
    overrides.observer ??
    createObserver({
      observers: config.observability.observers,
      logLevel: options.logLevel ?? config.observability.logLevel,
      tag: options.tag,
    });

  const processControl =
    overrides.processControl ?? new SystemdProcessControl({ scope: config.processControl.scope });

  return {
    identity: buildIdentity(config),
    context: createRunContext({ observer, clock: overrides.clock }),
    processControl,
    probe: new ProbeClient({ processControl, timeouts: config.timeouts }),
  };
}

/** `-v` / `--verbose` lowers the log level to debug. */
export function parseLogLevel(args: string[]): LogLevel | undefined {
  return args.includes('-v') || args.includes('--verbose') ? 'debug' : undefined;
}
