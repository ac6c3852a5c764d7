#!/usr/bin/env node
// main.ts
import * as dotenv from 'dotenv';
import path from 'path';
import { loadConfig } from './config';
import { PollEngine } from './poll-engine';
import { Scheduler } from './scheduler';
import type { Subscription } from './types';
import { ConfigError, SourceError, getErrorMessage } from './types/errors';
import { DiscordWebhookService } from './services/discord-webhook-service';
import { DispatchQueue } from './services/dispatch-queue';
import { RedditAuthService } from './services/reddit-auth-service';
import { RedditSourceService, fetchBudgetMs } from './services/reddit-source-service';
import { FileWatermarkStore } from './services/watermark-store';

// Load environment variables
dotenv.config();

async function resetWatermarks(subreddit: string | undefined): Promise<void> {
  const store = new FileWatermarkStore(path.resolve(process.env.STATE_FILE || 'last_check.json'));
  await store.reset(subreddit);
  console.log(subreddit ? `Watermark for r/${subreddit} cleared` : 'All watermarks cleared');
}

async function connectSubscriptions(source: RedditSourceService, subscriptions: Subscription[]): Promise<Subscription[]> {
  const usable: Subscription[] = [];
  for (const subscription of subscriptions) {
    try {
      await source.checkSubreddit(subscription.subreddit);
    } catch (error) {
      if (error instanceof SourceError && error.permanent) {
        console.warn(`Warning: Failed to connect to r/${subscription.subreddit}, skipping... (${error.message})`);
        continue;
      }
      // Transient trouble: keep it, the first cycle will retry
      console.warn(`Warning: Could not verify r/${subscription.subreddit}: ${getErrorMessage(error)}`);
    }
    usable.push(subscription);

    const monitoring: string[] = [];
    if (subscription.monitorPosts) monitoring.push('posts');
    if (subscription.monitorKeywords) monitoring.push('keywords');
    console.log(`✓ Configured r/${subscription.subreddit} (${monitoring.join(', ') || 'nothing'})`);
  }
  return usable;
}

// Main function to start the application
async function main(): Promise<void> {
  const [command, argument] = process.argv.slice(2);
  if (command === 'reset') {
    await resetWatermarks(argument);
    return;
  }

  const config = loadConfig();
  console.log(`Using User-Agent: ${config.reddit.userAgent}`);

  if (config.keywords.keywords.length > 0) {
    console.log(`Keyword monitoring enabled: ${config.keywords.keywords.join(', ')}`);
  } else {
    console.log('Keyword monitoring disabled (no keywords configured)');
  }

  const authService = new RedditAuthService(config.reddit, undefined, config.requestTimeoutMs);
  console.log('Starting authorization process...');
  await authService.getAccessToken();
  console.log('Successfully authenticated with Reddit API');

  const source = new RedditSourceService(authService, {
    userAgent: config.reddit.userAgent,
    timeoutMs: config.requestTimeoutMs,
  });
  const subscriptions = await connectSubscriptions(source, config.subscriptions);
  if (subscriptions.length === 0) {
    throw new ConfigError('No valid subreddit monitors could be initialized');
  }

  const engine = new PollEngine({
    source,
    store: new FileWatermarkStore(config.stateFile),
    dispatcher: new DispatchQueue(new DiscordWebhookService(config.requestTimeoutMs)),
    keywords: config.keywords,
    fetchTimeoutMs: fetchBudgetMs(config.requestTimeoutMs),
  });

  const scheduler = new Scheduler({
    engine,
    subscriptions,
    intervalSeconds: config.checkIntervalSeconds,
  });

  // Handle graceful shutdown
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\nReceived ${signal}, stopping monitor...`);
    scheduler.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    console.error('Unhandled rejection:', reason);
  });

  console.log(`\nMonitoring ${subscriptions.length} subreddit(s)`);
  console.log('Press Ctrl+C to stop\n');
  scheduler.start();
}

// Run the application
main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
