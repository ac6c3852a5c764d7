// src/services/dispatch-queue.ts
import type { DiscordMessage, DispatchResult, Logger } from '../types';
import { sleep as defaultSleep } from '../utils/timing';
import type { DispatchClient } from './discord-webhook-service';

export type DeliveryOutcome = DispatchResult | { status: 'aborted' };

export interface DispatchQueueOptions {
  /** Sends per message before a rate limit is reported back to the caller */
  maxAttempts?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/**
 * Serializes deliveries per webhook URL (one request in flight per URL) and
 * keeps every later send to a rate-limited URL waiting until its retry time.
 * Different URLs proceed independently.
 */
export class DispatchQueue {
  private readonly lanes = new Map<string, Promise<unknown>>();
  private readonly blockedUntil = new Map<string, number>();
  private readonly maxAttempts: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly client: DispatchClient, options: DispatchQueueOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 5;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? console;
  }

  deliver(message: DiscordMessage, targetUrl: string, signal?: AbortSignal): Promise<DeliveryOutcome> {
    const previous = this.lanes.get(targetUrl) ?? Promise.resolve();
    const run = previous.then(() => this.attempt(message, targetUrl, signal));
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.lanes.set(targetUrl, tail);
    void tail.then(() => {
      if (this.lanes.get(targetUrl) === tail) this.lanes.delete(targetUrl);
    });
    return run;
  }

  /** Earliest time (ms epoch) the next send to `targetUrl` may start */
  nextSendAt(targetUrl: string): number {
    return this.blockedUntil.get(targetUrl) ?? 0;
  }

  private async attempt(message: DiscordMessage, targetUrl: string, signal?: AbortSignal): Promise<DeliveryOutcome> {
    let last: DispatchResult = { status: 'failed', reason: 'no attempt made', retryable: true };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const wait = this.nextSendAt(targetUrl) - this.now();
      if (wait > 0) {
        await this.sleep(wait, signal);
      }
      if (signal?.aborted) {
        return { status: 'aborted' };
      }

      last = await this.client.send(message, targetUrl);
      if (last.status !== 'rate-limited') {
        return last;
      }

      this.blockedUntil.set(targetUrl, this.now() + last.retryAfterMs);
      this.logger.warn(
        `Discord rate limit hit, retrying in ${Math.ceil(last.retryAfterMs / 1000)}s (attempt ${attempt}/${this.maxAttempts})`
      );
    }

    return last;
  }
}
