/**
 * Error hierarchy for vigil.
 *
 * Every error carries a stable machine-readable `code` and an optional
 * `context` bag for log lines. Probes translate most of these into results;
 * only configuration errors escape to the command line.
 */

export class VigilError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'VigilError';
    this.code = code;
    this.context = context;
  }
}

/** The process manager reports the service unit as not active. */
export class ProcessDownError extends VigilError {
  readonly unit: string;

  constructor(message: string, unit: string, context?: Record<string, unknown>) {
    super(message, 'PROCESS_DOWN', { ...context, unit });
    this.name = 'ProcessDownError';
    this.unit = unit;
  }
}

/** Timeout, refused connection or any other transport-level failure. */
export class TransportUnreachableError extends VigilError {
  readonly url: string;

  constructor(message: string, url: string, context?: Record<string, unknown>) {
    super(message, 'TRANSPORT_UNREACHABLE', { ...context, url });
    this.name = 'TransportUnreachableError';
    this.url = url;
  }
}

/** The service answered, but not with what a working data path returns. */
export class FunctionalFailureError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FUNCTIONAL_FAILURE', context);
    this.name = 'FunctionalFailureError';
  }
}

/** A restart was attempted and the verification probe still failed. */
export class RecoveryFailedError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RECOVERY_FAILED', context);
    this.name = 'RecoveryFailedError';
  }
}

/** The alert itself could not be delivered. Logged, never escalated. */
export class NotifyFailedError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOTIFY_FAILED', context);
    this.name = 'NotifyFailedError';
  }
}

export class ConfigError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** An external command exited non-zero, could not be spawned, or timed out. */
export class CommandError extends VigilError {
  readonly command: string;

  constructor(message: string, command: string, context?: Record<string, unknown>) {
    super(message, 'COMMAND_ERROR', { ...context, command });
    this.name = 'CommandError';
    this.command = command;
  }
}

/** Normalise anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
