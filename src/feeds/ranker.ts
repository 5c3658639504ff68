/**
 * Environ Digest — Ranker / Bounder
 */

import type { Item } from '../types';

/**
 * Newest first. Array#sort is stable, so equal timestamps keep input order.
 * Returns a new array.
 */
export function rankByRecency<T extends Pick<Item, 'publishedAt'>>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime());
}

/**
 * Rank, then keep the first `cap` items.
 */
export function bound<T extends Pick<Item, 'publishedAt'>>(items: readonly T[], cap: number): T[] {
  if (cap <= 0) return [];
  return rankByRecency(items).slice(0, cap);
}
