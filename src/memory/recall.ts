import { createHash } from 'node:crypto';
import type { Impression, Sensation } from '../types/entities.js';
import type { RecallHit } from './memory-store.js';

const EXCERPT_LENGTH = 280;

/**
 * Dedup key of a sensation: SHA-256 over source, text and the timestamp
 * truncated to the second. Two adapters reporting the same thing in the
 * same second collapse into one record.
 */
export function sensationDedupKey(sensation: Pick<Sensation, 'source' | 'text' | 'timestamp'>): string {
  const second = Math.floor(sensation.timestamp.getTime() / 1000);
  return createHash('sha256')
    .update(sensation.source.modality)
    .update('\u0000')
    .update(sensation.source.device ?? '')
    .update('\u0000')
    .update(sensation.text)
    .update('\u0000')
    .update(String(second))
    .digest('hex');
}

function escapeRegex(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word containment ("ai" must not match "said").
 */
function containsWord(text: string, term: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegex(term)}(?![\\p{L}\\p{N}])`, 'iu').test(text);
}

/**
 * Term-overlap relevance of `text` to `query`.
 *
 * Whole-phrase match scores 10, each matching term 2, plus up to 1 for
 * recency (decays over a week). Zero means unrelated.
 */
export function scoreRelevance(query: string, text: string, timestamp: Date, now = Date.now()): number {
  const queryLower = query.trim().toLowerCase();
  if (queryLower.length < 2) {
    return 0;
  }
  const textLower = text.toLowerCase();
  const terms = [...new Set(queryLower.split(/\s+/).filter((t) => t.length >= 2))];

  let score = 0;
  if (containsWord(textLower, queryLower)) {
    score += 10;
  }
  for (const term of terms) {
    // Short terms only count as whole words
    const matched = term.length < 4 ? containsWord(textLower, term) : textLower.includes(term);
    if (matched) {
      score += 2;
    }
  }

  if (score === 0) {
    return 0;
  }
  const ageHours = (now - timestamp.getTime()) / (1000 * 60 * 60);
  return score + Math.max(0, 1 - ageHours / 168);
}

export function excerpt(text: string, length = EXCERPT_LENGTH): string {
  return text.length <= length ? text : `${text.slice(0, length - 1)}…`;
}

/**
 * Rank impressions against a query.
 */
export function rankImpressions(
  impressions: readonly Impression[],
  query: string,
  limit: number,
  now = Date.now()
): RecallHit[] {
  if (limit <= 0) {
    return [];
  }
  return impressions
    .map((impression) => ({
      impression,
      excerpt: excerpt(impression.text),
      score: scoreRelevance(query, impression.text, impression.timestamp, now),
    }))
    .filter((hit) => hit.score > 0)
    .sort((a, b) => b.score - a.score || b.impression.timestamp.getTime() - a.impression.timestamp.getTime())
    .slice(0, limit);
}
