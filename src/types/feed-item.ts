/**
 * Environ Digest — Feed Item Types
 *
 * Every entry from every source is normalized to Item before
 * deduplication and ranking.
 */

// ============================================================
// FEED SOURCE CONFIGURATION
// ============================================================

export type CategoryKey = string;

/**
 * One RSS/Atom URL belonging to a category.
 */
export interface FeedSource {
  readonly url: string;
  readonly title?: string;
  readonly category: CategoryKey;
}

// ============================================================
// RAW ENTRY
// ============================================================

/**
 * Entry as the parser hands it over. Nothing is guaranteed present.
 */
export interface RawEntry {
  title?: string;
  link?: string;
  summary?: string;
  description?: string;
  content?: string;
  contentSnippet?: string;
  published?: string;
  pubDate?: string;
  isoDate?: string;
  updated?: string;
  date?: string;
}

// ============================================================
// ITEM
// ============================================================

/**
 * Canonical item. All fields are set once normalization succeeds.
 */
export interface Item {
  title: string;
  link: string;
  source: string;
  summary: string;
  publishedAt: Date;
  category: CategoryKey;
  identityKey: string;
}

// ============================================================
// FETCH OUTCOMES
// ============================================================

export type FetchFailureKind = 'source_unavailable' | 'feed_malformed';

export interface FetchSuccess {
  ok: true;
  url: string;
  feedTitle?: string;
  entries: RawEntry[];
  /** Structural problems the parser recovered from */
  warnings: string[];
}

export interface FetchFailure {
  ok: false;
  url: string;
  kind: FetchFailureKind;
  reason: string;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

/**
 * Per-source diagnostics collected by the aggregator.
 */
export interface SourceReport {
  url: string;
  category: CategoryKey;
  outcome: 'ok' | FetchFailureKind;
  entriesFound: number;
  itemsKept: number;
  /** Entries without a usable link */
  entriesDropped: number;
  warnings: string[];
  error?: string;
  durationMs: number;
}

export interface CategorySummary {
  category: CategoryKey;
  sourcesAttempted: number;
  sourcesFailed: number;
  itemsCollected: number;
  duplicatesRemoved: number;
  itemsKept: number;
}
