/**
 * Check command -- one supervision pass over the configured service.
 *
 * Meant to be invoked by an external timer. Exit code 0 means healthy or
 * recovered, 1 means the run escalated, 2 means the configuration is unusable.
 */

import { EXIT_FAILURE, EXIT_USAGE, toError } from '@vigil/core';
import {
  HealthSupervisor,
  NoopNotifier,
  NtfyNotifier,
  RecoveryActuator,
} from '@vigil/supervisor';
import type { INotifier } from '@vigil/core';
import { loadConfig } from '../config.js';
import type { VigilConfig } from '../config.js';
import { createRuntime, parseLogLevel } from '../runtime.js';
import type { RuntimeOverrides } from '../runtime.js';

const RESET = '\x1b[0m';
const RED = '\x1b[31m';

export function createNotifier(config: VigilConfig): INotifier {
  if (!config.alert.enabled) return new NoopNotifier();
  return new NtfyNotifier({
    baseUrl: config.alert.baseUrl,
    topic: config.alert.topic,
    title: config.alert.title,
    priority: config.alert.priority,
    tags: config.alert.tags,
    timeoutMs: config.timeouts.alertMs,
  });
}

export async function check(args: string[], overrides: RuntimeOverrides = {}): Promise<void> {
  let config: VigilConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`${RED}Failed to load config:${RESET} ${toError(err).message}`);
    process.exitCode = EXIT_USAGE;
    return;
  }

  const { identity, context, processControl, probe } = createRuntime(
    config,
    { tag: config.observability.tag, logLevel: parseLogLevel(args) },
    overrides,
  );

  const supervisor = new HealthSupervisor({
    identity,
    policy: config.policy,
    timeouts: config.timeouts,
    probe,
    actuator: new RecoveryActuator({
      processControl,
      probe,
      policy: config.policy,
      timeouts: config.timeouts,
      context,
    }),
    notifier: createNotifier(config),
    context,
  });

  try {
    const report = await supervisor.run();
    process.exitCode = report.exitCode;
  } catch (err) {
    context.observer.onError(toError(err), { runId: context.runId });
    process.exitCode = EXIT_FAILURE;
  } finally {
    await context.observer.flush?.();
  }
}
