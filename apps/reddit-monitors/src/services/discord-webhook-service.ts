// src/services/discord-webhook-service.ts
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import type { DiscordMessage, DispatchResult } from '../types';
import { getErrorMessage } from '../types/errors';

export interface DispatchClient {
  /** Never rejects; every outcome is reported through the result. */
  send(message: DiscordMessage, targetUrl: string): Promise<DispatchResult>;
}

const DEFAULT_RETRY_AFTER_MS = 1000;

function readRetryAfterMs(response: AxiosResponse): number {
  const data: unknown = response.data;
  if (typeof data === 'object' && data !== null && 'retry_after' in data) {
    const seconds = Number(data.retry_after);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds * 1000);
    }
  }

  const header = Number(response.headers['retry-after']);
  if (Number.isFinite(header) && header >= 0) {
    return Math.ceil(header * 1000);
  }

  return DEFAULT_RETRY_AFTER_MS;
}

export class DiscordWebhookService implements DispatchClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly timeoutMs = 10000,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create();
  }

  async send(message: DiscordMessage, targetUrl: string): Promise<DispatchResult> {
    let response: AxiosResponse;
    try {
      response = await this.http.post(targetUrl, message, {
        timeout: this.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
        validateStatus: () => true,
      });
    } catch (error) {
      // Network failures and timeouts
      return { status: 'failed', reason: getErrorMessage(error), retryable: true };
    }

    const status = response.status;
    if (status >= 200 && status < 300) {
      return { status: 'delivered' };
    }
    if (status === 429) {
      return { status: 'rate-limited', retryAfterMs: readRetryAfterMs(response) };
    }
    // Discord rejected this particular payload; sending it again will not help
    if (status === 400 || status === 413) {
      return { status: 'failed', reason: `Discord rejected the message (HTTP ${status})`, retryable: false };
    }
    return { status: 'failed', reason: `Discord responded with HTTP ${status}`, retryable: true };
  }
}
