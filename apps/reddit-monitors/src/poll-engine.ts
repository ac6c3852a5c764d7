import type {
  DiscordMessage,
  Item,
  ItemKind,
  KeywordConfig,
  Logger,
  Subscription,
  Watermark,
} from './types';
import { SourceError, getErrorMessage } from './types/errors';
import type { ItemSource } from './services/item-source';
import type { WatermarkStore } from './services/watermark-store';
import type { DispatchQueue } from './services/dispatch-queue';
import { matchItem } from './services/keyword-matcher';
import { formatKeywordMatch, formatPost } from './services/discord-formatter';
import { advanceWatermark, compareItems, isAfterWatermark } from './utils/item-order';
import { withTimeout } from './utils/timing';

export type CycleOutcome =
  | 'ok' // every new item handled
  | 'idle' // nothing new
  | 'deferred' // a dispatch failed or stayed rate limited; the rest waits for the next tick
  | 'aborted' // shutdown requested before the next item
  | 'transient-failure'
  | 'permanent-failure';

export interface CycleResult {
  subreddit: string;
  outcome: CycleOutcome;
  fetched: number;
  processed: number;
  delivered: number;
  skipped: number;
  watermark?: Watermark;
  error?: string;
}

interface Delivery {
  message: DiscordMessage;
  targetUrl: string;
  label: string;
}

export interface PollEngineOptions {
  source: ItemSource;
  store: WatermarkStore;
  dispatcher: DispatchQueue;
  keywords: KeywordConfig;
  fetchTimeoutMs: number;
  logger?: Logger;
}

/**
 * One fetch-diff-dispatch pass per call. The watermark is persisted after
 * every item, so a crash re-delivers at most the item that was in flight.
 */
export class PollEngine {
  private readonly logger: Logger;

  constructor(private readonly options: PollEngineOptions) {
    this.logger = options.logger ?? console;
  }

  kindsFor(subscription: Subscription): ItemKind[] {
    const { keywords } = this.options;
    const keywordsActive = subscription.monitorKeywords && keywords.keywords.length > 0;
    const kinds: ItemKind[] = [];
    if (subscription.monitorPosts || (keywordsActive && keywords.searchPosts)) {
      kinds.push('post');
    }
    if (keywordsActive && keywords.searchComments) {
      kinds.push('comment');
    }
    return kinds;
  }

  async runCycle(subscription: Subscription, signal?: AbortSignal): Promise<CycleResult> {
    const { subreddit } = subscription;
    const prefix = `[r/${subreddit}]`;
    const result: CycleResult = { subreddit, outcome: 'idle', fetched: 0, processed: 0, delivered: 0, skipped: 0 };

    const kinds = this.kindsFor(subscription);
    if (kinds.length === 0) {
      return result;
    }

    let watermark: Watermark | undefined;
    try {
      watermark = await this.options.store.get(subreddit);
    } catch (error) {
      this.logger.warn(`${prefix} Could not read watermark: ${getErrorMessage(error)}`);
      return { ...result, outcome: 'transient-failure', error: getErrorMessage(error) };
    }
    result.watermark = watermark;

    this.logger.log(watermark ? `${prefix} Checking for new items...` : `${prefix} First run - checking recent items...`);

    let items: Item[];
    try {
      items = await withTimeout(
        this.options.source.fetchNew(subreddit, watermark, kinds),
        this.options.fetchTimeoutMs,
        `Fetching r/${subreddit}`
      );
    } catch (error) {
      const message = getErrorMessage(error);
      if (error instanceof SourceError && error.permanent) {
        this.logger.error(`${prefix} ${message}`);
        return { ...result, outcome: 'permanent-failure', error: message };
      }
      this.logger.warn(`${prefix} Fetch failed, will retry next cycle: ${message}`);
      return { ...result, outcome: 'transient-failure', error: message };
    }

    const candidates = this.diff(items, watermark, kinds);
    result.fetched = items.length;
    if (candidates.length === 0) {
      this.logger.log(`${prefix} No new items`);
      return result;
    }
    this.logger.log(`${prefix} Found ${candidates.length} new item(s)`);
    result.outcome = 'ok';

    for (const item of candidates) {
      if (signal?.aborted) {
        result.outcome = 'aborted';
        break;
      }

      const deliveries = this.plan(subscription, item);
      let sentAny = false;
      let stop = false;

      for (const delivery of deliveries) {
        // Once part of an item went out, finish it regardless of shutdown
        const outcome = await this.options.dispatcher.deliver(
          delivery.message,
          delivery.targetUrl,
          sentAny ? undefined : signal
        );

        if (outcome.status === 'delivered') {
          sentAny = true;
          result.delivered++;
        } else if (outcome.status === 'failed' && !outcome.retryable) {
          this.logger.error(`${prefix} Dropping ${delivery.label} ${item.id}: ${outcome.reason}`);
        } else if (outcome.status === 'aborted') {
          result.outcome = 'aborted';
          stop = true;
          break;
        } else {
          const reason = outcome.status === 'failed' ? outcome.reason : 'still rate limited';
          this.logger.warn(`${prefix} Could not deliver ${delivery.label} ${item.id} (${reason}), will retry next cycle`);
          result.outcome = 'deferred';
          result.error = reason;
          stop = true;
          break;
        }
      }

      if (stop) break;

      if (deliveries.length === 0) result.skipped++;
      result.processed++;
      watermark = advanceWatermark(watermark, item);
      result.watermark = watermark;

      try {
        await this.options.store.set(subreddit, watermark);
      } catch (error) {
        // Progress stays in memory for this cycle; the next one starts from what is on disk
        this.logger.warn(`${prefix} ${getErrorMessage(error)}`);
      }
    }

    this.logger.log(
      `${prefix} Delivered ${result.delivered} message(s) for ${result.processed}/${candidates.length} item(s)`
    );
    return result;
  }

  /**
   * New items of the requested kinds in delivery order (oldest first)
   */
  diff(items: Item[], watermark: Watermark | undefined, kinds: ItemKind[]): Item[] {
    const seen = new Set<string>();
    const fresh: Item[] = [];
    for (const item of items) {
      const key = `${item.kind}:${item.id}`;
      if (seen.has(key) || !kinds.includes(item.kind) || !isAfterWatermark(item, watermark)) continue;
      seen.add(key);
      fresh.push(item);
    }
    return fresh.sort(compareItems);
  }

  private plan(subscription: Subscription, item: Item): Delivery[] {
    const deliveries: Delivery[] = [];

    if (item.kind === 'post' && subscription.monitorPosts) {
      deliveries.push({ message: formatPost(item), targetUrl: subscription.postWebhook, label: 'post' });
    }

    if (subscription.monitorKeywords) {
      const match = matchItem(item, this.options.keywords);
      if (match) {
        deliveries.push({
          message: formatKeywordMatch(match),
          targetUrl: subscription.keywordWebhook ?? subscription.postWebhook,
          label: `keyword match (${match.matchedKeywords.join(', ')}) in ${item.kind}`,
        });
      }
    }

    return deliveries;
  }
}
