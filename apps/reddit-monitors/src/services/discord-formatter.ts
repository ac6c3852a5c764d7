// src/services/discord-formatter.ts
import type { DiscordEmbed, DiscordEmbedField, DiscordMessage, Item, MatchResult } from '../types';

export const COLORS = {
  post: 16729344, // Reddit orange
  nsfw: 16711680,
  spoiler: 8421504,
  keyword: 16753920,
} as const;

const TITLE_LIMIT = 256;
const KEYWORD_TITLE_LIMIT = 230;
const TEXT_LIMIT = 300;
const FIELD_VALUE_LIMIT = 1024;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function truncate(text: string, limit: number = TEXT_LIMIT): string {
  if (text.length <= limit) return text;
  let cut = text.slice(0, limit - 3);
  // Never split a surrogate pair
  if (cut.length > 0 && isHighSurrogate(cut.charCodeAt(cut.length - 1))) {
    cut = cut.slice(0, -1);
  }
  return cut + '...';
}

function describePost(item: Item): string {
  const text = truncate(item.body);
  if (text) return text;
  if (!item.isSelf && item.url) return `[Link Post](${item.url})`;
  return '_No text content_';
}

function warningsField(item: Item): DiscordEmbedField | null {
  const warnings: string[] = [];
  if (item.isNSFW) warnings.push('NSFW');
  if (item.isSpoiler) warnings.push('Spoiler');
  if (warnings.length === 0) return null;
  return { name: '⚠️ Warnings', value: warnings.join(' | '), inline: false };
}

function authorField(item: Item): DiscordEmbedField {
  return { name: 'Author', value: `u/${item.author}`, inline: true };
}

function scoreField(item: Item): DiscordEmbedField {
  return { name: 'Score', value: `⬆️ ${item.score}`, inline: true };
}

function commentsField(item: Item): DiscordEmbedField {
  return { name: 'Comments', value: `💬 ${item.numComments ?? 0}`, inline: true };
}

function keywordsField(match: MatchResult): DiscordEmbedField {
  return {
    name: 'Matched Keywords',
    value: truncate(match.matchedKeywords.map((keyword) => `\`${keyword}\``).join(', '), FIELD_VALUE_LIMIT),
    inline: false,
  };
}

function wrap(embed: DiscordEmbed): DiscordMessage {
  return { embeds: [embed] };
}

/**
 * Embed for a new post on the subscription's post webhook
 */
export function formatPost(item: Item): DiscordMessage {
  let color: number = COLORS.post;
  if (item.isNSFW) {
    color = COLORS.nsfw;
  } else if (item.isSpoiler) {
    color = COLORS.spoiler;
  }

  const fields = [authorField(item), scoreField(item), commentsField(item)];
  if (item.flair) {
    fields.push({ name: 'Flair', value: item.flair, inline: true });
  }
  const warnings = warningsField(item);
  if (warnings) fields.push(warnings);

  return wrap({
    title: (item.title || 'Untitled').slice(0, TITLE_LIMIT),
    description: describePost(item),
    color,
    url: item.permalink,
    fields,
    footer: { text: `r/${item.subreddit}` },
  });
}

/**
 * Embed for a keyword hit, post or comment
 */
export function formatKeywordMatch(match: MatchResult): DiscordMessage {
  const { item } = match;

  if (item.kind === 'comment') {
    const postTitle = item.postTitle || 'Unknown Post';
    const fields = [
      keywordsField(match),
      {
        name: 'Post',
        value: item.postPermalink ? `[${postTitle}](${item.postPermalink})` : postTitle,
        inline: false,
      },
      authorField(item),
      scoreField(item),
    ];
    const warnings = warningsField(item);
    if (warnings) fields.push(warnings);

    return wrap({
      title: `🔍 Keyword Match: Comment in r/${item.subreddit}`,
      description: truncate(item.body),
      color: COLORS.keyword,
      url: item.permalink,
      fields,
      footer: { text: `r/${item.subreddit} • Comment` },
    });
  }

  const fields: DiscordEmbedField[] = [keywordsField(match)];
  if (item.flair) {
    fields.push({ name: 'Flair', value: item.flair, inline: true });
  }
  fields.push(
    { name: 'Location', value: match.matchedFields.join(', '), inline: false },
    authorField(item),
    scoreField(item),
    commentsField(item)
  );
  const warnings = warningsField(item);
  if (warnings) fields.push(warnings);

  return wrap({
    title: `🔍 ${(item.title || 'Untitled').slice(0, KEYWORD_TITLE_LIMIT)}`,
    description: describePost(item),
    color: COLORS.keyword,
    url: item.permalink,
    fields,
    footer: { text: `r/${item.subreddit} • Post` },
  });
}
