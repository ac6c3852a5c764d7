import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileWatermarkStore } from '../../services/watermark-store';
import { WatermarkPersistError } from '../../types/errors';

describe('FileWatermarkStore', () => {
  let dir: string;
  let stateFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'watermarks-'));
    stateFile = path.join(dir, 'last_check.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should report no watermark before the first write', async () => {
    const store = new FileWatermarkStore(stateFile);

    expect(await store.get('python')).toBeUndefined();
  });

  it('should persist watermarks across instances', async () => {
    await new FileWatermarkStore(stateFile).set('python', { post: { id: 'p3', createdAt: 3 } });

    const reopened = new FileWatermarkStore(stateFile);

    expect(await reopened.get('python')).toEqual({ post: { id: 'p3', createdAt: 3 } });
    expect(JSON.parse(await fs.readFile(stateFile, 'utf-8'))).toEqual({
      python: { post: { id: 'p3', createdAt: 3 } },
    });
  });

  it('should leave no temp file behind', async () => {
    const store = new FileWatermarkStore(stateFile);
    await store.set('python', { post: { id: 'p1', createdAt: 1 } });

    expect(await fs.readdir(dir)).toEqual(['last_check.json']);
  });

  it('should keep concurrent writes for different subreddits', async () => {
    const store = new FileWatermarkStore(stateFile);

    await Promise.all([
      store.set('python', { post: { id: 'p1', createdAt: 1 } }),
      store.set('rust', { comment: { id: 'c1', createdAt: 2 } }),
    ]);

    const reopened = new FileWatermarkStore(stateFile);
    expect(await reopened.get('python')).toEqual({ post: { id: 'p1', createdAt: 1 } });
    expect(await reopened.get('rust')).toEqual({ comment: { id: 'c1', createdAt: 2 } });
  });

  it('should reset one subreddit or all of them', async () => {
    const store = new FileWatermarkStore(stateFile);
    await store.set('python', { post: { id: 'p1', createdAt: 1 } });
    await store.set('rust', { post: { id: 'r1', createdAt: 1 } });

    await store.reset('python');
    expect(await store.get('python')).toBeUndefined();
    expect(await store.get('rust')).toEqual({ post: { id: 'r1', createdAt: 1 } });

    await store.reset();
    expect(await new FileWatermarkStore(stateFile).get('rust')).toBeUndefined();
  });

  it('should start over when the state file is not valid JSON', async () => {
    const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await fs.writeFile(stateFile, '{ not json');

    const store = new FileWatermarkStore(stateFile, logger);

    expect(await store.get('python')).toBeUndefined();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining(`Error reading state file ${stateFile}: `));
  });

  it('should reject with WatermarkPersistError and keep the old value when the write fails', async () => {
    // A regular file where the parent directory should be
    await fs.writeFile(path.join(dir, 'blocker'), '');
    const store = new FileWatermarkStore(path.join(dir, 'blocker', 'state.json'));

    await expect(store.set('python', { post: { id: 'p1', createdAt: 1 } })).rejects.toBeInstanceOf(
      WatermarkPersistError
    );
    expect(await store.get('python')).toBeUndefined();
  });
});
