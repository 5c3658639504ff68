/**
 * Environ Digest — Category Aggregator
 *
 * Fans a category's sources through fetch + normalize and merges the
 * results. Sources run concurrently under a bounded pool; each task
 * collects into its own array and the arrays are merged afterwards in
 * configuration order.
 */

import pLimit from 'p-limit';
import type {
  CategoryKey,
  FeedSource,
  FetchOutcome,
  FetchSettings,
  Item,
  SourceReport,
} from '../types';
import { fetchFeed, type FetchFeedOptions } from './fetcher';
import { normalizeEntries } from './normalizer';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type Limit = ReturnType<typeof pLimit>;
export type FeedFetcher = (url: string, options: FetchFeedOptions) => Promise<FetchOutcome>;

export interface AggregatorOptions {
  fetch: FetchSettings;
  /** Run start; entries without a usable date get this timestamp */
  fetchedAt?: Date;
  /** Shared pool; one per call is created when absent */
  limit?: Limit;
  fetcher?: FeedFetcher;
}

export interface CategoryAggregate {
  category: CategoryKey;
  /** Unordered, not yet deduplicated */
  items: Item[];
  reports: SourceReport[];
}

interface SourceCollection {
  items: Item[];
  report: SourceReport;
}

const log = logger.child({ component: 'aggregator' });

// ============================================================
// FETCH HELPERS
// ============================================================

/**
 * Fetch and normalize a single source. Never rejects.
 */
export async function collectSource(
  source: FeedSource,
  options: AggregatorOptions
): Promise<SourceCollection> {
  const startTime = Date.now();
  const fetcher = options.fetcher ?? fetchFeed;
  const fetchedAt = options.fetchedAt ?? new Date();

  let outcome: FetchOutcome;
  try {
    outcome = await fetcher(source.url, {
      timeoutMs: options.fetch.timeoutMs,
      userAgent: options.fetch.userAgent,
    });
  } catch (error) {
    outcome = { ok: false, url: source.url, kind: 'source_unavailable', reason: errorMessage(error) };
  }

  const durationMs = Date.now() - startTime;

  if (!outcome.ok) {
    log.warn('Source fetch failed', {
      url: source.url,
      category: source.category,
      outcome: outcome.kind,
      error: outcome.reason,
      durationMs,
    });

    return {
      items: [],
      report: {
        url: source.url,
        category: source.category,
        outcome: outcome.kind,
        entriesFound: 0,
        itemsKept: 0,
        entriesDropped: 0,
        warnings: [],
        error: outcome.reason,
        durationMs,
      },
    };
  }

  const { items, dropped } = normalizeEntries(outcome.entries, {
    category: source.category,
    url: source.url,
    feedTitle: outcome.feedTitle,
    titleHint: source.title,
    fetchedAt,
  });

  for (const warning of outcome.warnings) {
    log.warn('Feed parsed with problems', { url: source.url, category: source.category, warning });
  }

  log.info('Source fetch completed', {
    url: source.url,
    category: source.category,
    outcome: 'ok',
    entries: outcome.entries.length,
    items: items.length,
    dropped,
    durationMs,
  });

  return {
    items,
    report: {
      url: source.url,
      category: source.category,
      outcome: 'ok',
      entriesFound: outcome.entries.length,
      itemsKept: items.length,
      entriesDropped: dropped,
      warnings: [...outcome.warnings],
      durationMs,
    },
  };
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

/**
 * Collect every item of one category. Failing sources contribute nothing
 * and show up in `reports`.
 */
export async function aggregateCategory(
  category: CategoryKey,
  sources: readonly FeedSource[],
  options: AggregatorOptions
): Promise<CategoryAggregate> {
  const limit = options.limit ?? pLimit(options.fetch.concurrency);
  const fetchedAt = options.fetchedAt ?? new Date();

  const collections = await Promise.all(
    sources.map(source =>
      limit(() => collectSource({ ...source, category }, { ...options, fetchedAt }))
    )
  );

  const items: Item[] = [];
  const reports: SourceReport[] = [];
  for (const collection of collections) {
    items.push(...collection.items);
    reports.push(collection.report);
  }

  return { category, items, reports };
}
