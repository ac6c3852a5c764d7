// src/services/keyword-matcher.ts
import type { Item, KeywordConfig, MatchField, MatchResult } from '../types';

const WORD_CHAR = '[\\p{L}\\p{N}_]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildPattern(keyword: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(keyword)}(?!${WORD_CHAR})`, 'u');
}

/**
 * Return the configured keywords found in `text`, in configuration order.
 * A keyword only matches as a whole token: "ant gear" does not match inside
 * "antgeared".
 */
export function matchKeywords(text: string, config: KeywordConfig): string[] {
  if (!text || config.keywords.length === 0) {
    return [];
  }

  const haystack = config.caseSensitive ? text : text.toLowerCase();
  const matches: string[] = [];

  for (const keyword of config.keywords) {
    const needle = config.caseSensitive ? keyword.trim() : keyword.trim().toLowerCase();
    if (!needle || matches.includes(keyword)) {
      continue;
    }
    if (buildPattern(needle).test(haystack)) {
      matches.push(keyword);
    }
  }

  return matches;
}

/**
 * Evaluate an item against the keyword configuration. Posts are searched in
 * their title and body, comments in their body.
 */
export function matchItem(item: Item, config: KeywordConfig): MatchResult | null {
  const hits: Array<{ field: MatchField; keywords: string[] }> = [];

  if (item.kind === 'post') {
    if (!config.searchPosts) return null;
    hits.push({ field: 'title', keywords: matchKeywords(item.title ?? '', config) });
    hits.push({ field: 'body', keywords: matchKeywords(item.body, config) });
  } else {
    if (!config.searchComments) return null;
    hits.push({ field: 'comment', keywords: matchKeywords(item.body, config) });
  }

  const matchedFields = hits.filter((hit) => hit.keywords.length > 0).map((hit) => hit.field);
  if (matchedFields.length === 0) {
    return null;
  }

  const found = new Set(hits.flatMap((hit) => hit.keywords));
  return {
    item,
    matchedKeywords: [...new Set(config.keywords)].filter((keyword) => found.has(keyword)),
    matchedField: matchedFields[0],
    matchedFields,
  };
}
