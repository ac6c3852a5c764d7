// src/services/watermark-store.ts
import fs from 'fs/promises';
import path from 'path';
import type { Cursor, Logger, Watermark } from '../types';
import { WatermarkPersistError, getErrorMessage } from '../types/errors';

export interface WatermarkStore {
  get(subreddit: string): Promise<Watermark | undefined>;
  /** Rejects with WatermarkPersistError when the new value could not be made durable. */
  set(subreddit: string, watermark: Watermark): Promise<void>;
}

type WatermarkState = Record<string, Watermark>;

function isCursor(value: unknown): value is Cursor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'createdAt' in value &&
    typeof value.createdAt === 'number'
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

function parseState(raw: string): WatermarkState {
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('state file must contain a JSON object');
  }

  const state: WatermarkState = {};
  for (const [subreddit, value] of Object.entries(parsed)) {
    if (typeof value !== 'object' || value === null) continue;
    const watermark: Watermark = {};
    if ('post' in value && isCursor(value.post)) watermark.post = value.post;
    if ('comment' in value && isCursor(value.comment)) watermark.comment = value.comment;
    state[subreddit] = watermark;
  }
  return state;
}

/**
 * JSON file keyed by subreddit name. Every write replaces the file through a
 * temp file and a rename, so a crash leaves either the old or the new content.
 * Writes are serialized; the in-memory copy only changes once the rename
 * succeeded.
 */
export class FileWatermarkStore implements WatermarkStore {
  private state: WatermarkState | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(
    private readonly stateFile: string,
    logger?: Logger
  ) {
    this.logger = logger ?? console;
  }

  async get(subreddit: string): Promise<Watermark | undefined> {
    const state = await this.load();
    const watermark = state[subreddit];
    return watermark ? { ...watermark } : undefined;
  }

  async set(subreddit: string, watermark: Watermark): Promise<void> {
    await this.enqueue(async (state) => ({ ...state, [subreddit]: { ...watermark } }));
  }

  /**
   * Forget one subreddit (re-baselined on its next cycle), or all of them.
   */
  async reset(subreddit?: string): Promise<void> {
    await this.enqueue(async (state) => {
      if (!subreddit) return {};
      const next = { ...state };
      delete next[subreddit];
      return next;
    });
  }

  private enqueue(update: (state: WatermarkState) => Promise<WatermarkState>): Promise<void> {
    const run = this.writeChain.then(async () => {
      const current = await this.load();
      const next = await update(current);
      await this.persist(next);
      this.state = next;
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<WatermarkState> {
    if (this.state) return this.state;

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.state = {};
        return this.state;
      }
      throw error;
    }

    try {
      this.state = parseState(raw);
    } catch (error) {
      this.logger.error(`Error reading state file ${this.stateFile}: ${getErrorMessage(error)}`);
      this.state = {};
    }
    return this.state;
  }

  private async persist(state: WatermarkState): Promise<void> {
    const tmpFile = `${this.stateFile}.${process.pid}.tmp`;
    let tmpCreated = false;
    try {
      await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
      const handle = await fs.open(tmpFile, 'w');
      tmpCreated = true;
      try {
        await handle.writeFile(JSON.stringify(state, null, 2));
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpFile, this.stateFile);
    } catch (error) {
      if (tmpCreated) {
        await fs.rm(tmpFile, { force: true });
      }
      throw new WatermarkPersistError(
        `Failed to write state file ${this.stateFile}: ${getErrorMessage(error)}`,
        error
      );
    }
  }
}
