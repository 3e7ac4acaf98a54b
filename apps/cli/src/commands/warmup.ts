/**
 * Warmup command -- run once at boot to load the service's models before
 * the first real request arrives.
 */

import { EXIT_FAILURE, EXIT_USAGE, toError } from '@vigil/core';
import { WarmupLoop } from '@vigil/supervisor';
import { loadConfig } from '../config.js';
import type { VigilConfig } from '../config.js';
import { createRuntime, parseLogLevel } from '../runtime.js';
import type { RuntimeOverrides } from '../runtime.js';

const RESET = '\x1b[0m';
const RED = '\x1b[31m';

export async function warmup(args: string[], overrides: RuntimeOverrides = {}): Promise<void> {
  let config: VigilConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`${RED}Failed to load config:${RESET} ${toError(err).message}`);
    process.exitCode = EXIT_USAGE;
    return;
  }

  const { identity, context, probe } = createRuntime(
    config,
    { tag: config.observability.warmupTag, logLevel: parseLogLevel(args) },
    overrides,
  );

  const loop = new WarmupLoop({
    identity,
    policy: config.policy,
    timeouts: config.timeouts,
    probe,
    context,
  });

  try {
    const report = await loop.run();
    process.exitCode = report.exitCode;
  } catch (err) {
    context.observer.onError(toError(err), { runId: context.runId });
    process.exitCode = EXIT_FAILURE;
  } finally {
    await context.observer.flush?.();
  }
}
