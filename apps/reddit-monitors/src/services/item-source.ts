import type { Item, ItemKind, Watermark } from '../types';

export interface ItemSource {
  /**
   * Items newer than `since` for the requested kinds, newest first. Without a
   * cursor for a kind only a small recent window of that kind is returned.
   * Rejects with a SourceError.
   */
  fetchNew(subreddit: string, since: Watermark | undefined, kinds: ItemKind[]): Promise<Item[]>;
}
