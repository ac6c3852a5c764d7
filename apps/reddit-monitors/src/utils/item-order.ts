import type { Cursor, Item, Watermark } from '../types';

/**
 * Compare Reddit base-36 ids numerically: a longer id is always newer.
 */
export function compareIds(a: string, b: string): number {
  if (a.length !== b.length) return a.length - b.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareCursors(a: Cursor, b: Cursor): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  return compareIds(a.id, b.id);
}

/**
 * Oldest first; equal timestamps fall back to id ascending, then posts before
 * comments so the order is the same on every run.
 */
export function compareItems(a: Item, b: Item): number {
  const byCursor = compareCursors(a, b);
  if (byCursor !== 0) return byCursor;
  if (a.kind === b.kind) return 0;
  return a.kind === 'post' ? -1 : 1;
}

export function toCursor(item: Item): Cursor {
  return { id: item.id, createdAt: item.createdAt };
}

export function isAfterWatermark(item: Item, watermark: Watermark | undefined): boolean {
  const cursor = watermark?.[item.kind];
  if (!cursor) return true;
  return compareCursors(toCursor(item), cursor) > 0;
}

export function advanceWatermark(watermark: Watermark | undefined, item: Item): Watermark {
  const current = watermark?.[item.kind];
  if (current && compareCursors(toCursor(item), current) <= 0) {
    return { ...watermark };
  }
  return { ...watermark, [item.kind]: toCursor(item) };
}
