/**
 * Environ Digest — Pipeline
 *
 * One linear pass per invocation:
 * 1. Fetch + normalize every category's sources
 * 2. Deduplicate within each category
 * 3. Rank and bound each category
 * 4. Build the render context
 *
 * Nothing is retained between runs.
 */

import pLimit from 'p-limit';
import type { CategoryKey, CategorySummary, DigestConfig, Item, SourceReport } from './types';
import { aggregateCategory, type FeedFetcher } from './feeds/aggregator';
import { dedupe } from './feeds/dedup';
import { bound } from './feeds/ranker';
import { buildContext, type RenderContext } from './render/context';
import { logger } from './lib/logger';

export interface PipelineOptions {
  /** Run start; defaults to now */
  now?: Date;
  fetcher?: FeedFetcher;
}

export interface PipelineResult {
  context: RenderContext;
  /** Final per-category lists, newest first */
  categories: Map<CategoryKey, Item[]>;
  reports: SourceReport[];
  summaries: CategorySummary[];
  durationMs: number;
}

const log = logger.child({ component: 'pipeline' });

export async function runPipeline(
  config: DigestConfig,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const limit = pLimit(config.fetch.concurrency);

  log.info('Starting aggregation', {
    categories: config.site.categories.length,
    concurrency: config.fetch.concurrency,
  });

  // Categories are independent; the shared limit bounds total in-flight fetches
  const aggregates = await Promise.all(
    config.site.categories.map(({ key }) =>
      aggregateCategory(key, config.sources.get(key) ?? [], {
        fetch: config.fetch,
        fetchedAt: now,
        limit,
        fetcher: options.fetcher,
      })
    )
  );

  const categories = new Map<CategoryKey, Item[]>();
  const reports: SourceReport[] = [];
  const summaries: CategorySummary[] = [];

  for (const aggregate of aggregates) {
    const deduped = dedupe(aggregate.items);
    const kept = bound(deduped.items, config.site.perCategoryCap);

    categories.set(aggregate.category, kept);
    reports.push(...aggregate.reports);

    const summary: CategorySummary = {
      category: aggregate.category,
      sourcesAttempted: aggregate.reports.length,
      sourcesFailed: aggregate.reports.filter(r => r.outcome !== 'ok').length,
      itemsCollected: aggregate.items.length,
      duplicatesRemoved: deduped.duplicateCount,
      itemsKept: kept.length,
    };
    summaries.push(summary);

    log.info('Category aggregated', { ...summary });
  }

  const context = buildContext(categories, config.site, { generatedAt: now });
  const durationMs = Date.now() - startTime;

  log.info('Aggregation completed', {
    sources: reports.length,
    sourcesFailed: reports.filter(r => r.outcome !== 'ok').length,
    globalItems: context.all.length,
    durationMs,
  });

  return { context, categories, reports, summaries, durationMs };
}
