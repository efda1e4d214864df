/**
 * Tweet Normalizer
 *
 * Upstream payloads come in several shapes (flat client objects, v1.1 REST
 * statuses, GraphQL results with `legacy` / `core` nesting). Each canonical
 * field has an ordered list of accessors; the first present, non-empty value
 * wins.
 */

import { TWEET_PERMALINK_BASE, UNKNOWN_AUTHOR } from '../config/constants';
import type { RawTweetPayload, Tweet } from '../types/tweet-definitions';
import { DateUtils } from './date-utils';

export type FieldAccessor = (raw: RawTweetPayload) => unknown;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reads a nested property path, e.g. `path('user', 'screen_name')`.
 */
export function path(...keys: string[]): FieldAccessor {
  return (raw) => keys.reduce<unknown>((node, key) => (isRecord(node) ? node[key] : undefined), raw);
}

const GRAPHQL_USER = ['core', 'user_results', 'result'];

export type CanonicalField =
  | 'id'
  | 'text'
  | 'createdAt'
  | 'username'
  | 'displayName'
  | 'retweets'
  | 'likes'
  | 'replies'
  | 'quotes'
  | 'views';

export const FIELD_ACCESSORS: Record<CanonicalField, FieldAccessor[]> = {
  id: [path('id_str'), path('id'), path('rest_id'), path('tweet_id'), path('legacy', 'id_str')],
  text: [
    path('note_tweet', 'note_tweet_results', 'result', 'text'),
    path('full_text'),
    path('text'),
    path('legacy', 'full_text'),
    path('rawContent'),
  ],
  createdAt: [
    path('created_at'),
    path('created_at_datetime'),
    path('createdAt'),
    path('legacy', 'created_at'),
    path('date'),
  ],
  username: [
    path('username'),
    path('screen_name'),
    path('user', 'screen_name'),
    path('user', 'username'),
    path('author', 'username'),
    path('author', 'screen_name'),
    path(...GRAPHQL_USER, 'legacy', 'screen_name'),
    path(...GRAPHQL_USER, 'core', 'screen_name'),
  ],
  displayName: [
    path('display_name'),
    path('name'),
    path('user', 'name'),
    path('author', 'name'),
    path('author', 'display_name'),
    path(...GRAPHQL_USER, 'legacy', 'name'),
    path(...GRAPHQL_USER, 'core', 'name'),
  ],
  retweets: [
    path('retweet_count'),
    path('retweets'),
    path('legacy', 'retweet_count'),
    path('public_metrics', 'retweet_count'),
  ],
  likes: [
    path('favorite_count'),
    path('like_count'),
    path('likes'),
    path('legacy', 'favorite_count'),
    path('public_metrics', 'like_count'),
  ],
  replies: [
    path('reply_count'),
    path('replies'),
    path('legacy', 'reply_count'),
    path('public_metrics', 'reply_count'),
  ],
  quotes: [
    path('quote_count'),
    path('quotes'),
    path('legacy', 'quote_count'),
    path('public_metrics', 'quote_count'),
  ],
  views: [
    path('view_count'),
    path('views', 'count'),
    path('views'),
    path('ext_views', 'count'),
    path('public_metrics', 'impression_count'),
  ],
};

function firstString(raw: RawTweetPayload, accessors: FieldAccessor[]): string | undefined {
  for (const accessor of accessors) {
    const value = accessor(raw);
    if (typeof value === 'string' && value.trim() !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'bigint') return value.toString();
  }
  return undefined;
}

function toCount(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === 'string') {
    const cleaned = value.trim().replace(/,/g, '');
    if (/^\d+$/.test(cleaned)) return parseInt(cleaned, 10);
  }
  return undefined;
}

function firstCount(raw: RawTweetPayload, accessors: FieldAccessor[]): number {
  for (const accessor of accessors) {
    const count = toCount(accessor(raw));
    if (count !== undefined) return count;
  }
  return 0;
}

function firstTimestamp(raw: RawTweetPayload, accessors: FieldAccessor[]): { date: string; parsedDate: Date | null } {
  for (const accessor of accessors) {
    const value = accessor(raw);
    if (value instanceof Date) {
      const parsed = DateUtils.parseTimestamp(value);
      if (parsed) return { date: DateUtils.formatTimestamp(parsed), parsedDate: parsed };
      continue;
    }
    if (typeof value !== 'string' || value.trim() === '') continue;
    const parsed = DateUtils.parseTimestamp(value);
    // Unknown formats pass through untouched
    return parsed
      ? { date: DateUtils.formatTimestamp(parsed), parsedDate: parsed }
      : { date: value, parsedDate: null };
  }
  return { date: '', parsedDate: null };
}

export function buildPermalink(username: string, id: string): string {
  return username === UNKNOWN_AUTHOR
    ? `${TWEET_PERMALINK_BASE}/i/web/status/${id}`
    : `${TWEET_PERMALINK_BASE}/${username}/status/${id}`;
}

/**
 * Returns the canonical record, or null when the payload is unusable
 * (no identifier or no body text).
 */
export function normalizeTweet(raw: unknown): Tweet | null {
  if (!isRecord(raw)) return null;

  const id = firstString(raw, FIELD_ACCESSORS.id)?.trim();
  const text = firstString(raw, FIELD_ACCESSORS.text)?.replace(/\r\n|\r|\n/g, ' ').trim();
  if (!id || !text) return null;

  const handle = firstString(raw, FIELD_ACCESSORS.username)?.trim().replace(/^@/, '');
  const username = handle || UNKNOWN_AUTHOR;
  const { date, parsedDate } = firstTimestamp(raw, FIELD_ACCESSORS.createdAt);

  return {
    id,
    date,
    parsedDate,
    username,
    displayName: firstString(raw, FIELD_ACCESSORS.displayName) ?? '',
    text,
    retweets: firstCount(raw, FIELD_ACCESSORS.retweets),
    likes: firstCount(raw, FIELD_ACCESSORS.likes),
    replies: firstCount(raw, FIELD_ACCESSORS.replies),
    quotes: firstCount(raw, FIELD_ACCESSORS.quotes),
    views: firstCount(raw, FIELD_ACCESSORS.views),
    url: buildPermalink(username, id),
    raw,
  };
}
