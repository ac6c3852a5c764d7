// src/services/reddit-source-service.ts
import axios, { AxiosInstance } from 'axios';
import type { Item, ItemKind, Logger, RedditListing, RedditThing, Watermark } from '../types';
import { SourceError, getErrorMessage } from '../types/errors';
import { isAfterWatermark } from '../utils/item-order';
import type { ItemSource } from './item-source';
import { RedditAuthService } from './reddit-auth-service';

const API_BASE = 'https://oauth.reddit.com';
const PAGE_LIMIT = 100;
const FIRST_RUN_LIMIT = 10;
// Reddit serves at most 1000 items of a listing
const MAX_PAGES = 10;

const ENDPOINTS: Record<ItemKind, string> = {
  post: 'new',
  comment: 'comments',
};

export interface RedditSourceOptions {
  userAgent: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * Upper bound for one `fetchNew` call: every listing page of every kind plus
 * a token refresh, each allowed the full per-request timeout.
 */
export function fetchBudgetMs(requestTimeoutMs: number, kindCount: number = Object.keys(ENDPOINTS).length): number {
  return (kindCount * MAX_PAGES + 1) * requestTimeoutMs;
}

export class RedditSourceService implements ItemSource {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly authService: RedditAuthService,
    private readonly options: RedditSourceOptions
  ) {
    this.http = options.http ?? axios.create();
    this.logger = options.logger ?? console;
  }

  async fetchNew(subreddit: string, since: Watermark | undefined, kinds: ItemKind[]): Promise<Item[]> {
    const items: Item[] = [];
    for (const kind of kinds) {
      items.push(...(await this.fetchKind(subreddit, since, kind)));
    }
    // Newest first across kinds
    return items.sort((a, b) => b.createdAt - a.createdAt);
  }

  /**
   * Startup connection test; rejects with a permanent SourceError for a
   * missing, banned or private subreddit.
   */
  async checkSubreddit(subreddit: string): Promise<void> {
    await this.request<{ kind: string }>(subreddit, `/r/${subreddit}/about`, {});
  }

  private async fetchKind(subreddit: string, since: Watermark | undefined, kind: ItemKind): Promise<Item[]> {
    const firstRun = !since?.[kind];
    const items: Item[] = [];
    let after: string | null = null;
    let reachedWatermark = false;

    for (let page = 0; page < MAX_PAGES; page++) {
      const params: Record<string, string | number> = {
        limit: firstRun ? FIRST_RUN_LIMIT : PAGE_LIMIT,
        raw_json: 1,
      };
      if (after) params.after = after;

      const listing = await this.request<RedditListing>(subreddit, `/r/${subreddit}/${ENDPOINTS[kind]}`, params);
      const children = listing.data.children;

      for (const child of children) {
        const item = toItem(child, subreddit);
        if (!item || item.kind !== kind) continue;
        if (!isAfterWatermark(item, since)) {
          reachedWatermark = true;
          break;
        }
        items.push(item);
      }

      after = listing.data.after;
      if (firstRun || reachedWatermark || !after || children.length === 0) {
        break;
      }
    }

    if (!firstRun && !reachedWatermark) {
      this.logger.warn(
        `[r/${subreddit}] The ${kind} listing ended before the watermark, ${kind}s older than the ${items.length} fetched were missed`
      );
    }

    return items;
  }

  private async request<T>(subreddit: string, path: string, params: Record<string, string | number>): Promise<T> {
    const token = await this.authService.getAccessToken();
    try {
      const response = await this.http.get<T>(`${API_BASE}${path}`, {
        headers: {
          Authorization: `Bearer ${token}`,
          'User-Agent': this.options.userAgent,
        },
        params,
        timeout: this.options.timeoutMs,
        maxRedirects: 0,
      });
      return response.data;
    } catch (error) {
      throw this.toSourceError(subreddit, error);
    }
  }

  private toSourceError(subreddit: string, error: unknown): SourceError {
    if (!axios.isAxiosError(error) || !error.response) {
      return new SourceError(`r/${subreddit}: ${getErrorMessage(error)}`, { cause: error });
    }

    const status = error.response.status;
    if (status === 401) {
      this.authService.invalidate();
    }
    // Reddit redirects unknown subreddits to the search page
    const permanent = status === 403 || status === 404 || (status >= 300 && status < 400);
    return new SourceError(`r/${subreddit}: Reddit responded with HTTP ${status}`, {
      permanent,
      statusCode: status,
      cause: error,
    });
  }
}

export function toItem(thing: RedditThing, subreddit: string): Item | null {
  const data = thing.data;
  const permalink = `https://www.reddit.com${data.permalink}`;

  if (thing.kind === 't3') {
    return {
      id: data.id,
      kind: 'post',
      subreddit,
      createdAt: data.created_utc,
      title: data.title ?? '',
      body: data.is_self ? data.selftext ?? '' : '',
      author: data.author ?? '[deleted]',
      score: data.score,
      flair: data.link_flair_text || undefined,
      isNSFW: data.over_18 ?? false,
      isSpoiler: data.spoiler ?? false,
      permalink,
      url: data.url,
      isSelf: data.is_self ?? false,
      numComments: data.num_comments ?? 0,
    };
  }

  if (thing.kind === 't1') {
    // Deleted or removed comments carry no useful content
    if (!data.author || data.author === '[deleted]') return null;
    return {
      id: data.id,
      kind: 'comment',
      subreddit,
      createdAt: data.created_utc,
      body: data.body ?? '',
      author: data.author,
      score: data.score,
      isNSFW: data.over_18 ?? false,
      isSpoiler: false,
      permalink,
      postTitle: data.link_title,
      postPermalink: data.link_permalink,
    };
  }

  return null;
}
