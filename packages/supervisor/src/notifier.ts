/**
 * Alert delivery to an ntfy server.
 *
 * One notify() call per escalated run. The sink is probed first so an
 * unreachable server is reported as `skipped` rather than `failed`.
 */

import { NotifyFailedError, toError } from '@vigil/core';
import type { AlertDelivery, INotifier } from '@vigil/core';

export interface NtfyNotifierOptions {
  /** Server root, e.g. http://localhost:9080. */
  baseUrl: string;
  topic: string;
  title: string;
  /** Default: high */
  priority?: string;
  /** Default: ['warning'] */
  tags?: string[];
  /** Bounds the sink health check and the publish separately. Default: 5000 */
  timeoutMs?: number;
}

export class NtfyNotifier implements INotifier {
  readonly id = 'ntfy';

  private readonly baseUrl: string;
  private readonly topic: string;
  private readonly title: string;
  private readonly priority: string;
  private readonly tags: string[];
  private readonly timeoutMs: number;

  constructor(options: NtfyNotifierOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.topic = options.topic;
    this.title = options.title;
    this.priority = options.priority ?? 'high';
    this.tags = options.tags ?? ['warning'];
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  async notify(message: string): Promise<AlertDelivery> {
    const healthUrl = `${this.baseUrl}/health`;
    try {
      const health = await fetch(healthUrl, { signal: AbortSignal.timeout(this.timeoutMs) });
      if (!health.ok) {
        return { status: 'skipped', reason: `${healthUrl} returned HTTP ${health.status}` };
      }
    } catch (err) {
      return { status: 'skipped', reason: `${healthUrl} unreachable: ${toError(err).message}` };
    }

    const publishUrl = `${this.baseUrl}/${encodeURIComponent(this.topic)}`;
    try {
      const response = await fetch(publishUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/plain',
          Title: this.title,
          Priority: this.priority,
          Tags: this.tags.join(','),
        },
        body: message,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        return {
          status: 'failed',
          error: new NotifyFailedError(`ntfy publish returned HTTP ${response.status}`, {
            url: publishUrl,
            status: response.status,
          }),
        };
      }
      return { status: 'delivered' };
    } catch (err) {
      return {
        status: 'failed',
        error: new NotifyFailedError(`ntfy publish failed: ${toError(err).message}`, {
          url: publishUrl,
        }),
      };
    }
  }
}

/** Used when alerting is disabled in configuration. */
export class NoopNotifier implements INotifier {
  readonly id = 'noop';

  async notify(): Promise<AlertDelivery> {
    return { status: 'skipped', reason: 'alerting disabled' };
  }
}
