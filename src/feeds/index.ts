/**
 * Environ Digest — Feeds Module
 *
 * Fetch, normalize, deduplicate and rank feed items.
 */

export {
  fetchFeed,
  parseFeedDocument,
  parseWithSalvage,
  salvageXml,
  decodeBody,
  FEED_ACCEPT_HEADER,
  DEFAULT_USER_AGENT,
  type FetchFn,
  type FetchFeedOptions,
} from './fetcher';

export {
  normalizeEntry,
  normalizeEntries,
  parseFeedDate,
  resolvePublishedAt,
  resolveSourceName,
  TITLE_PLACEHOLDER,
  SUMMARY_MAX_LENGTH,
  SOURCE_MAX_LENGTH,
  type NormalizeContext,
  type NormalizeResult,
} from './normalizer';

export {
  dedupe,
  identityKey,
  type DedupResult,
} from './dedup';

export { rankByRecency, bound } from './ranker';

export {
  aggregateCategory,
  collectSource,
  type AggregatorOptions,
  type CategoryAggregate,
  type FeedFetcher,
  type Limit,
} from './aggregator';
