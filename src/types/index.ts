/**
 * Environ Digest — Type Exports
 */

export type {
  CategoryKey,
  FeedSource,
  RawEntry,
  Item,
  FetchFailureKind,
  FetchSuccess,
  FetchFailure,
  FetchOutcome,
  SourceReport,
  CategorySummary,
} from './feed-item';

export type {
  FeedSourceEntry,
  FeedsDocument,
  CategoryDefinition,
  SiteConfig,
  FetchSettings,
  DigestConfig,
} from './config';
export {
  FeedSourceEntrySchema,
  FeedsDocumentSchema,
  CategoryDefinitionSchema,
  SiteDocumentSchema,
  DEFAULT_CATEGORIES,
} from './config';
