import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { AppConfig, KeywordConfig, Logger, Subscription } from './types';
import { ConfigError, getErrorMessage } from './types/errors';
import { GENERIC_USER_AGENT } from './services/reddit-auth-service';

export const DEFAULT_CHECK_INTERVAL_SECONDS = 300;
export const MIN_CHECK_INTERVAL_SECONDS = 30;
const DEFAULT_TIMEOUT_MS = 10000;

const SubscriptionEntrySchema = z.object({
  subreddit: z
    .string()
    .trim()
    .transform((name) => name.replace(/^\/?r\//i, ''))
    .pipe(z.string().regex(/^[A-Za-z0-9_]{2,21}$/, 'not a valid subreddit name')),
  webhook_url: z.string().url(),
  keyword_webhook_url: z
    .string()
    .optional()
    .nullable()
    .transform((url) => (url ? url : null))
    .pipe(z.string().url().nullable()),
  enabled: z.boolean().default(true),
  monitor_posts: z.boolean().default(true),
  monitor_keywords: z.boolean().default(false),
});

const KeywordFileSchema = z.object({
  keywords: z.array(z.string()).default([]),
  case_sensitive: z.boolean().default(false),
  search_posts: z.boolean().default(true),
  search_comments: z.boolean().default(true),
});

export const EMPTY_KEYWORDS: KeywordConfig = {
  keywords: [],
  caseSensitive: false,
  searchPosts: true,
  searchComments: true,
};

/**
 * Validate the subscription list. Malformed and duplicate entries are logged
 * and left out; disabled entries are dropped.
 */
export function parseSubscriptions(raw: unknown, logger: Logger = console): Subscription[] {
  if (!Array.isArray(raw)) {
    throw new ConfigError('Subscription file must contain a JSON array');
  }

  const subscriptions: Subscription[] = [];
  const seen = new Set<string>();

  raw.forEach((entry: unknown, index) => {
    const parsed = SubscriptionEntrySchema.safeParse(entry);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`);
      logger.warn(`Warning: Invalid configuration entry #${index + 1} (${issues.join('; ')}), skipping`);
      return;
    }

    const data = parsed.data;
    const key = data.subreddit.toLowerCase();
    if (seen.has(key)) {
      logger.warn(`Warning: Duplicate configuration for r/${data.subreddit}, skipping`);
      return;
    }
    seen.add(key);

    if (!data.enabled) return;

    subscriptions.push({
      subreddit: data.subreddit,
      postWebhook: data.webhook_url,
      keywordWebhook: data.keyword_webhook_url,
      enabled: data.enabled,
      monitorPosts: data.monitor_posts,
      monitorKeywords: data.monitor_keywords,
    });
  });

  return subscriptions;
}

export function parseKeywordConfig(raw: unknown): KeywordConfig {
  const parsed = KeywordFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid keyword configuration: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  const keywords = [...new Set(parsed.data.keywords.map((k) => k.trim()).filter((k) => k.length > 0))];
  return {
    keywords,
    caseSensitive: parsed.data.case_sensitive,
    searchPosts: parsed.data.search_posts,
    searchComments: parsed.data.search_comments,
  };
}

/**
 * Interval in seconds, clamped to the floor with a warning
 */
export function resolveCheckInterval(value: string | undefined, logger: Logger = console): number {
  if (value === undefined || value.trim() === '') return DEFAULT_CHECK_INTERVAL_SECONDS;

  const seconds = Number(value);
  if (!Number.isFinite(seconds)) {
    logger.warn(`Warning: CHECK_INTERVAL "${value}" is not a number, using ${DEFAULT_CHECK_INTERVAL_SECONDS}s`);
    return DEFAULT_CHECK_INTERVAL_SECONDS;
  }
  if (seconds < MIN_CHECK_INTERVAL_SECONDS) {
    logger.warn(`Warning: CHECK_INTERVAL ${value}s is below the ${MIN_CHECK_INTERVAL_SECONDS}s minimum, using ${MIN_CHECK_INTERVAL_SECONDS}s`);
    return MIN_CHECK_INTERVAL_SECONDS;
  }
  return Math.floor(seconds);
}

function readJson(file: string): unknown {
  const raw = fs.readFileSync(file, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Error reading configuration file ${file}: ${getErrorMessage(error)}`, error);
  }
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
}

/**
 * Build the immutable run configuration from the environment and the
 * subscription/keyword files.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? console;

  const missing = ['REDDIT_CLIENT_ID', 'REDDIT_CLIENT_SECRET'].filter((name) => !env[name]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}. Please check your .env file`);
  }

  const subredditsFile = path.resolve(cwd, env.SUBREDDITS_FILE || 'subreddits.json');
  if (!fs.existsSync(subredditsFile)) {
    throw new ConfigError(
      `Configuration file '${subredditsFile}' not found. Please create it with your subreddit-webhook mappings`
    );
  }
  const subscriptions = parseSubscriptions(readJson(subredditsFile), logger);
  if (subscriptions.length === 0) {
    throw new ConfigError(`No enabled subreddits found in ${subredditsFile}`);
  }

  const keywordsFile = path.resolve(cwd, env.KEYWORDS_FILE || 'keywords.json');
  let keywords = EMPTY_KEYWORDS;
  if (fs.existsSync(keywordsFile)) {
    keywords = parseKeywordConfig(readJson(keywordsFile));
  } else {
    logger.warn(`Warning: Keyword config file '${keywordsFile}' not found`);
  }

  const timeout = Number(env.REQUEST_TIMEOUT_MS);

  return Object.freeze({
    reddit: {
      clientId: env.REDDIT_CLIENT_ID ?? '',
      clientSecret: env.REDDIT_CLIENT_SECRET ?? '',
      username: env.REDDIT_USERNAME || undefined,
      password: env.REDDIT_PASSWORD || undefined,
      userAgent: env.REDDIT_USER_AGENT || GENERIC_USER_AGENT,
    },
    subscriptions,
    keywords,
    checkIntervalSeconds: resolveCheckInterval(env.CHECK_INTERVAL, logger),
    requestTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    stateFile: path.resolve(cwd, env.STATE_FILE || 'last_check.json'),
  });
}
