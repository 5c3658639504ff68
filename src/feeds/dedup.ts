/**
 * Environ Digest — Feed Deduplication
 *
 * Collapses items that share an identity key. The same story often arrives
 * from its own site and from an aggregator with a different timestamp; the
 * most recent copy wins.
 */

import { createHash } from 'crypto';
import type { Item } from '../types';

/**
 * Result of deduplication process.
 */
export interface DedupResult {
  items: Item[];
  duplicateCount: number;
  totalProcessed: number;
}

/**
 * Deterministic key for an item link: SHA-256 of the trimmed link, 16 hex chars.
 */
export function identityKey(link: string): string {
  return createHash('sha256').update(link.trim()).digest('hex').slice(0, 16);
}

/**
 * Keep one item per identity key.
 *
 * A later `publishedAt` replaces the kept item; on equal timestamps the
 * first seen stays. The survivor takes the slot of the key's first
 * occurrence, so output order depends only on input order.
 */
export function dedupe(items: Item[]): DedupResult {
  const slots = new Map<string, number>();
  const kept: Item[] = [];

  for (const item of items) {
    const slot = slots.get(item.identityKey);

    if (slot === undefined) {
      slots.set(item.identityKey, kept.length);
      kept.push(item);
      continue;
    }

    if (item.publishedAt.getTime() > kept[slot].publishedAt.getTime()) {
      kept[slot] = item;
    }
  }

  return {
    items: kept,
    duplicateCount: items.length - kept.length,
    totalProcessed: items.length,
  };
}
