/**
 * Search query construction and client-side keyword matching.
 */

import { IngestionErrors } from '../core/errors';
import { stripTimeSuffix, validateTwitterUsername } from './validation';

export type KeywordOperator = 'AND' | 'OR';

export interface SearchQueryParams {
  username?: string;
  keywords?: string[];
  operator?: KeywordOperator;
  since?: string;
  until?: string;
}

export function cleanKeywords(keywords: string[] | undefined): string[] {
  return (keywords ?? []).map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);
}

/**
 * Author queries: `(from:alice) -filter:replies`.
 * Keyword queries: `("a" OR "b") -filter:replies`.
 * Date bounds are appended as `since:` / `until:`.
 */
export function buildSearchQuery(params: SearchQueryParams): string {
  const operator = params.operator ?? 'OR';
  let base: string;

  if (params.username !== undefined && params.username.trim() !== '') {
    const check = validateTwitterUsername(params.username);
    if (!check.valid || !check.normalized) {
      throw IngestionErrors.malformedInput(check.error ?? 'Invalid username', { username: params.username });
    }
    base = `(from:${check.normalized}) -filter:replies`;
  } else {
    const keywords = cleanKeywords(params.keywords);
    if (keywords.length === 0) {
      throw IngestionErrors.malformedInput('Either a username or at least one keyword is required');
    }
    const joined = keywords.map((keyword) => `"${keyword.replace(/"/g, '')}"`).join(` ${operator} `);
    base = `(${joined}) -filter:replies`;
  }

  const parts = [base];
  if (params.since) parts.push(`since:${stripTimeSuffix(params.since)}`);
  if (params.until) parts.push(`until:${stripTimeSuffix(params.until)}`);
  return parts.join(' ');
}

/**
 * Case-insensitive substring match: all keywords (AND) or any (OR).
 * No keywords matches everything.
 */
export function matchesKeywords(text: string, keywords: string[] | undefined, operator: KeywordOperator = 'OR'): boolean {
  const cleaned = cleanKeywords(keywords).map((keyword) => keyword.toLowerCase());
  if (cleaned.length === 0) return true;
  const haystack = text.toLowerCase();
  return operator === 'AND'
    ? cleaned.every((keyword) => haystack.includes(keyword))
    : cleaned.some((keyword) => haystack.includes(keyword));
}
