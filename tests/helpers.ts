/**
 * Shared fixtures for tests
 */

import { identityKey } from '../src/feeds/dedup';
import type { Item } from '../src/types';

export function makeItem(link: string, publishedAt: string, overrides: Partial<Item> = {}): Item {
  return {
    title: `Story ${link}`,
    link,
    source: 'Test Source',
    summary: '',
    publishedAt: new Date(publishedAt),
    category: 'environment',
    identityKey: identityKey(link),
    ...overrides,
  };
}

/**
 * `count` items one hour apart, oldest first, starting at 2024-01-01T00:00Z.
 */
export function hourlyItems(count: number, prefix = 'https://example.org/story'): Item[] {
  return Array.from({ length: count }, (_, i) =>
    makeItem(`${prefix}/${i}`, new Date(Date.UTC(2024, 0, 1, i)).toISOString())
  );
}
