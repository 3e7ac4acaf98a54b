/**
 * Configuration loading for the vigil CLI.
 *
 * The file at `$VIGIL_CONFIG` (or ~/.vigil/config.json) is deep-merged over
 * the defaults, `${VAR}` references are resolved from the environment, and
 * the result is validated field by field. Every problem found is reported
 * in a single ConfigLoadError.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { ConfigError } from '@vigil/core';
import type { ProbeTimeouts, RetryPolicy, ServiceIdentity } from '@vigil/core';
import { DEFAULT_SYSLOG_FLUSH_TIMEOUT_MS, OBSERVER_NAMES } from '@vigil/observability';
import type { LogLevel } from '@vigil/observability';
import {
  DEFAULT_PROBE_TIMEOUTS,
  DEFAULT_RETRY_POLICY,
  DEFAULT_SCHEDULE_INTERVAL_MS,
  validatePolicy,
  worstCaseRunMs,
} from '@vigil/supervisor';
import type { SystemdScope } from '@vigil/supervisor';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ServiceConfig {
  /** Logical name used in log lines and alert messages. */
  name: string;
  unit: string;
  baseUrl: string;
  port: number;
  healthPath: string;
  diagnosticsPath: string;
  memoriesPath: string;
}

export interface AlertConfig {
  enabled: boolean;
  baseUrl: string;
  topic: string;
  title: string;
  priority: string;
  tags: string[];
}

export interface VigilObservabilityConfig {
  observers: string[];
  logLevel: LogLevel;
  /** Log tag for `check` runs. */
  tag: string;
  /** Log tag for `warmup` runs. */
  warmupTag: string;
}

export interface VigilConfig {
  service: ServiceConfig;
  processControl: { scope: SystemdScope };
  policy: RetryPolicy;
  timeouts: ProbeTimeouts;
  alert: AlertConfig;
  observability: VigilObservabilityConfig;
  schedule: { intervalMs: number };
}

export class ConfigLoadError extends ConfigError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getVigilDir(): string {
  return resolve(homedir(), '.vigil');
}

/** `$VIGIL_CONFIG` when set, otherwise ~/.vigil/config.json. */
export function getConfigPath(): string {
  const fromEnv = process.env['VIGIL_CONFIG'];
  if (fromEnv !== undefined && fromEnv.length > 0) return resolve(fromEnv);
  return join(getVigilDir(), 'config.json');
}

export function configExists(): boolean {
  return existsSync(getConfigPath());
}

export function ensureConfigDir(): void {
  mkdirSync(dirname(getConfigPath()), { recursive: true });
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): VigilConfig {
  return {
    service: {
      name: 'Memory service',
      unit: 'mcp-memory-service',
      baseUrl: 'http://localhost:8100',
      port: 8100,
      healthPath: '/api/health',
      diagnosticsPath: '/api/health/detailed',
      memoriesPath: '/api/memories',
    },
    processControl: { scope: 'user' },
    policy: { ...DEFAULT_RETRY_POLICY },
    timeouts: { ...DEFAULT_PROBE_TIMEOUTS },
    alert: {
      enabled: true,
      baseUrl: 'http://localhost:9080',
      topic: 'claude-memory',
      title: 'Memory Service Alert',
      priority: 'high',
      tags: ['warning'],
    },
    observability: {
      observers: ['console', 'syslog'],
      logLevel: 'info',
      tag: 'vigil',
      warmupTag: 'vigil-warmup',
    },
    schedule: { intervalMs: DEFAULT_SCHEDULE_INTERVAL_MS },
  };
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

export function loadConfig(): VigilConfig {
  const path = getConfigPath();
  let user: unknown = {};

  if (existsSync(path)) {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to read ${path}: ${message}`, { path });
    }
    try {
      user = JSON.parse(text);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigLoadError(`Failed to parse ${path}: ${message}`, { path });
    }
    if (!isRecord(user)) {
      throw new ConfigLoadError(`Failed to parse ${path}: top level must be an object`, { path });
    }
  }

  const merged = resolveEnvVars(deepMerge(getDefaultConfig(), user));
  return toConfig(merged, path);
}

export function saveConfig(config: VigilConfig): void {
  ensureConfigDir();
  writeFileSync(getConfigPath(), `${JSON.stringify(config, null, 2)}\n`, 'utf8');
}

/** The probe targets, derived once from the service section. */
export function buildIdentity(config: VigilConfig): ServiceIdentity {
  const base = config.service.baseUrl.replace(/\/+$/, '');
  return {
    name: config.service.name,
    unit: config.service.unit,
    healthUrl: `${base}${config.service.healthPath}`,
    functionalUrl: `${base}${config.service.memoriesPath}`,
    diagnosticsUrl: `${base}${config.service.diagnosticsPath}`,
    port: config.service.port,
  };
}

// ---------------------------------------------------------------------------
// Merge and env resolution
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars in `override` replace. */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isRecord(base) || !isRecord(override)) return override;

  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

/** Replace `${VAR}` in every string; unset variables become ''. */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
      return process.env[name] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = resolveEnvVars(entry);
    }
    return result;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Reads typed values out of the merged tree, collecting one problem per bad field. */
class FieldReader {
  readonly problems: string[] = [];

  constructor(private readonly root: unknown) {}

  string(path: string): string {
    const value = this.at(path);
    if (typeof value !== 'string' || value.trim().length === 0) {
      this.problems.push(`${path} must be a non-empty string`);
      return '';
    }
    return value;
  }

  url(path: string): string {
    const value = this.string(path);
    if (value.length > 0 && !URL.canParse(value)) {
      this.problems.push(`${path} must be an absolute URL (got "${value}")`);
    }
    return value;
  }

  number(path: string): number {
    const value = this.at(path);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.problems.push(`${path} must be a number`);
      return Number.NaN;
    }
    return value;
  }

  boolean(path: string): boolean {
    const value = this.at(path);
    if (typeof value !== 'boolean') {
      this.problems.push(`${path} must be true or false`);
      return false;
    }
    return value;
  }

  stringArray(path: string): string[] {
    const value = this.at(path);
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
      this.problems.push(`${path} must be an array of strings`);
      return [];
    }
    return value;
  }

  oneOf<T extends string>(path: string, allowed: readonly T[]): T | undefined {
    const value = this.at(path);
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      this.problems.push(`${path} must be one of ${allowed.join(', ')} (got ${JSON.stringify(value)})`);
    }
    return match;
  }

  private at(path: string): unknown {
    let node: unknown = this.root;
    for (const segment of path.split('.')) {
      if (!isRecord(node)) return undefined;
      node = node[segment];
    }
    return node;
  }
}

const SCOPES: readonly SystemdScope[] = ['user', 'system'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function toConfig(merged: unknown, path: string): VigilConfig {
  const read = new FieldReader(merged);

  const port = read.number('service.port');
  if (Number.isFinite(port) && (!Number.isInteger(port) || port < 1 || port > 65_535)) {
    read.problems.push(`service.port must be an integer between 1 and 65535 (got ${port})`);
  }

  const service: ServiceConfig = {
    name: read.string('service.name'),
    unit: read.string('service.unit'),
    baseUrl: read.url('service.baseUrl'),
    port,
    healthPath: read.string('service.healthPath'),
    diagnosticsPath: read.string('service.diagnosticsPath'),
    memoriesPath: read.string('service.memoriesPath'),
  };

  const policy: RetryPolicy = {
    maxRetries: read.number('policy.maxRetries'),
    retryDelayMs: read.number('policy.retryDelayMs'),
    portReleasePauseMs: read.number('policy.portReleasePauseMs'),
    settleDelayMs: read.number('policy.settleDelayMs'),
    warmupAttempts: read.number('policy.warmupAttempts'),
    warmupQuorum: read.number('policy.warmupQuorum'),
    warmupMaxWaitMs: read.number('policy.warmupMaxWaitMs'),
    warmupPollIntervalMs: read.number('policy.warmupPollIntervalMs'),
    warmupPauseMs: read.number('policy.warmupPauseMs'),
  };

  const timeouts: ProbeTimeouts = {
    processMs: read.number('timeouts.processMs'),
    healthMs: read.number('timeouts.healthMs'),
    functionalMs: read.number('timeouts.functionalMs'),
    warmupFunctionalMs: read.number('timeouts.warmupFunctionalMs'),
    restartMs: read.number('timeouts.restartMs'),
    alertMs: read.number('timeouts.alertMs'),
  };

  const alert: AlertConfig = {
    enabled: read.boolean('alert.enabled'),
    baseUrl: read.url('alert.baseUrl'),
    topic: read.string('alert.topic'),
    title: read.string('alert.title'),
    priority: read.string('alert.priority'),
    tags: read.stringArray('alert.tags'),
  };

  const observers = read.stringArray('observability.observers');
  for (const name of observers) {
    if (!OBSERVER_NAMES.some((known) => known === name)) {
      read.problems.push(
        `observability.observers contains unknown observer "${name}" (known: ${OBSERVER_NAMES.join(', ')})`,
      );
    }
  }
  const observability: VigilObservabilityConfig = {
    observers,
    logLevel: read.oneOf('observability.logLevel', LOG_LEVELS) ?? 'info',
    tag: read.string('observability.tag'),
    warmupTag: read.string('observability.warmupTag'),
  };

  const scope = read.oneOf('processControl.scope', SCOPES) ?? 'user';
  const intervalMs = read.number('schedule.intervalMs');

  // Cross-field checks only once every number involved is present.
  if (read.problems.length === 0) {
    read.problems.push(...validatePolicy(policy, timeouts));
  }
  if (read.problems.length === 0) {
    const flushMs = observers.includes('syslog') ? DEFAULT_SYSLOG_FLUSH_TIMEOUT_MS : 0;
    const bound = worstCaseRunMs(policy, timeouts, flushMs);
    if (bound >= intervalMs) {
      read.problems.push(
        `schedule.intervalMs (${intervalMs}) must exceed the worst-case run duration (${bound}ms); lower timeouts or retries`,
      );
    }
  }

  if (read.problems.length > 0) {
    throw new ConfigLoadError(`Invalid configuration (${path}): ${read.problems.join('; ')}`, {
      path,
      problems: read.problems,
    });
  }

  return {
    service,
    processControl: { scope },
    policy,
    timeouts,
    alert,
    observability,
    schedule: { intervalMs },
  };
}
