// TypeScript interfaces

export type ItemKind = 'post' | 'comment';

export interface Item {
  id: string;
  kind: ItemKind;
  subreddit: string;
  createdAt: number; // unix seconds
  title?: string; // posts only
  body: string;
  author: string;
  score: number;
  flair?: string; // posts only
  isNSFW: boolean;
  isSpoiler: boolean;
  permalink: string;
  url?: string;
  isSelf?: boolean;
  numComments?: number;
  postTitle?: string; // comments only
  postPermalink?: string; // comments only
}

export interface Cursor {
  id: string;
  createdAt: number;
}

/** Per-kind position of the newest processed item of one subreddit. */
export type Watermark = Partial<Record<ItemKind, Cursor>>;

export interface Subscription {
  subreddit: string;
  postWebhook: string;
  keywordWebhook: string | null;
  enabled: boolean;
  monitorPosts: boolean;
  monitorKeywords: boolean;
}

export interface KeywordConfig {
  keywords: string[];
  caseSensitive: boolean;
  searchPosts: boolean;
  searchComments: boolean;
}

export type MatchField = 'title' | 'body' | 'comment';

export interface MatchResult {
  item: Item;
  matchedKeywords: string[];
  matchedField: MatchField;
  matchedFields: MatchField[];
}

export interface RedditCredentials {
  clientId: string;
  clientSecret: string;
  username?: string;
  password?: string;
  userAgent: string;
}

export interface AppConfig {
  reddit: RedditCredentials;
  subscriptions: Subscription[];
  keywords: KeywordConfig;
  checkIntervalSeconds: number;
  requestTimeoutMs: number;
  stateFile: string;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

// Discord webhook payloads

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  url: string;
  fields: DiscordEmbedField[];
  footer: { text: string };
}

export interface DiscordMessage {
  embeds: DiscordEmbed[];
}

export type DispatchResult =
  | { status: 'delivered' }
  | { status: 'rate-limited'; retryAfterMs: number }
  | { status: 'failed'; reason: string; retryable: boolean };

// Reddit listing payloads

export interface RedditThingData {
  id: string;
  name: string;
  created_utc: number;
  author: string | null;
  permalink: string;
  score: number;
  title?: string;
  selftext?: string;
  body?: string;
  url?: string;
  is_self?: boolean;
  num_comments?: number;
  link_flair_text?: string | null;
  over_18?: boolean;
  spoiler?: boolean;
  link_title?: string;
  link_permalink?: string;
}

export interface RedditThing {
  kind: string;
  data: RedditThingData;
}

export interface RedditListing {
  data: {
    children: RedditThing[];
    after: string | null;
  };
}
