/**
 * Environ Digest — Public API
 */

export * from './feeds';
export { runPipeline, type PipelineOptions, type PipelineResult } from './pipeline';
export {
  buildContext,
  buildNav,
  formatUtcLabel,
  toRenderItem,
  type RenderContext,
  type RenderItem,
  type NavEntry,
  type BuildContextOptions,
} from './render/context';
export { writeContext, serializeContext, CONTEXT_FILENAME } from './render/writer';
export { loadEnvironmentConfig, type EnvironmentConfig } from './config/environment';
export {
  loadDigestConfig,
  loadFeedsConfig,
  loadSiteConfig,
  parseFeedsDocument,
  parseSiteConfig,
  resolveSources,
  type ConfigPaths,
} from './config/loader';
export { ConfigInvalidError, type ConfigIssue } from './lib/errors';
export { logger, setLogLevel, type Logger, type LogLevel } from './lib/logger';
export * from './types';
