import type { DiscordMessage, DispatchResult, Item, Logger, Subscription, Watermark } from '../types';
import { WatermarkPersistError } from '../types/errors';
import type { DispatchClient } from '../services/discord-webhook-service';
import type { WatermarkStore } from '../services/watermark-store';

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function makePost(id: string, createdAt: number, overrides: Partial<Item> = {}): Item {
  return {
    id,
    kind: 'post',
    subreddit: 'python',
    createdAt,
    title: `Post ${id}`,
    body: '',
    author: 'tester',
    score: 1,
    isNSFW: false,
    isSpoiler: false,
    permalink: `https://www.reddit.com/r/python/comments/${id}/`,
    url: `https://www.reddit.com/r/python/comments/${id}/`,
    isSelf: true,
    numComments: 0,
    ...overrides,
  };
}

export function makeComment(id: string, createdAt: number, overrides: Partial<Item> = {}): Item {
  return {
    id,
    kind: 'comment',
    subreddit: 'python',
    createdAt,
    body: `Comment ${id}`,
    author: 'commenter',
    score: 1,
    isNSFW: false,
    isSpoiler: false,
    permalink: `https://www.reddit.com/r/python/comments/abc/post/${id}/`,
    postTitle: 'Parent post',
    postPermalink: 'https://www.reddit.com/r/python/comments/abc/post/',
    ...overrides,
  };
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    subreddit: 'python',
    postWebhook: 'https://discord.test/webhooks/posts',
    keywordWebhook: null,
    enabled: true,
    monitorPosts: true,
    monitorKeywords: false,
    ...overrides,
  };
}

export class InMemoryWatermarkStore implements WatermarkStore {
  readonly values = new Map<string, Watermark>();
  /** Number of successful writes allowed before every further write fails */
  failAfter = Infinity;
  writes = 0;

  async get(subreddit: string): Promise<Watermark | undefined> {
    const value = this.values.get(subreddit);
    return value ? { ...value } : undefined;
  }

  async set(subreddit: string, watermark: Watermark): Promise<void> {
    if (this.writes >= this.failAfter) {
      throw new WatermarkPersistError('disk full');
    }
    this.writes++;
    this.values.set(subreddit, { ...watermark });
  }
}

export interface SentMessage {
  url: string;
  title: string;
  at: number;
  message: DiscordMessage;
}

/**
 * Records every send; results come from `respond`, delivered by default.
 */
export class RecordingClient implements DispatchClient {
  readonly sent: SentMessage[] = [];
  respond: (message: DiscordMessage, url: string) => DispatchResult = () => ({ status: 'delivered' });

  constructor(private readonly clock: { now: number } = { now: 0 }) {}

  async send(message: DiscordMessage, url: string): Promise<DispatchResult> {
    this.sent.push({ url, title: message.embeds[0].title, at: this.clock.now, message });
    return this.respond(message, url);
  }
}

export function fakeClock() {
  const clock = { now: 0 };
  return {
    clock,
    now: () => clock.now,
    sleep: async (ms: number) => {
      clock.now += ms;
    },
  };
}
