/**
 * Environ Digest — Configuration Loader
 *
 * Loads the site metadata and the per-category source lists.
 * Only the source list can abort the run; site metadata falls back to
 * its defaults.
 */

import { readFile } from 'fs/promises';
import type { ZodError } from 'zod';
import { ConfigInvalidError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { FeedsDocumentSchema, SiteDocumentSchema } from '../types';
import type {
  CategoryKey,
  DigestConfig,
  FeedSource,
  FeedsDocument,
  FetchSettings,
  SiteConfig,
} from '../types';

const log = logger.child({ component: 'config' });

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toIssues(error: ZodError) {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

async function readJson(filePath: string): Promise<unknown> {
  const text = await readFile(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigInvalidError(filePath, `not valid JSON: ${errorMessage(error)}`);
  }
}

// ============================================================
// SITE
// ============================================================

/**
 * Parse a site document. Missing fields take their defaults.
 */
export function parseSiteConfig(data: unknown, origin = 'site config'): SiteConfig {
  const parsed = SiteDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigInvalidError(origin, 'site metadata failed validation', toIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load site metadata. Never fails the run: an absent, unreadable or
 * invalid file falls back to the defaults with a warning.
 */
export async function loadSiteConfig(filePath: string): Promise<SiteConfig> {
  try {
    return parseSiteConfig(await readJson(filePath), filePath);
  } catch (error) {
    if (isNotFound(error)) {
      log.info('No site config file, using defaults', { path: filePath });
    } else {
      log.warn('Site config unusable, using defaults', {
        path: filePath,
        error: errorMessage(error),
        issues: error instanceof ConfigInvalidError ? error.issues : [],
      });
    }
    return parseSiteConfig({}, filePath);
  }
}

// ============================================================
// FEEDS
// ============================================================

/**
 * Resolve a feeds document against the site's categories.
 * Every category gets a (possibly empty) list, in navigation order.
 */
export function resolveSources(
  document: FeedsDocument,
  site: SiteConfig
): Map<CategoryKey, FeedSource[]> {
  const known = new Set(site.categories.map(c => c.key));

  for (const key of Object.keys(document)) {
    if (!known.has(key)) {
      log.warn('Ignoring sources for unknown category', { category: key });
    }
  }

  const sources = new Map<CategoryKey, FeedSource[]>();

  for (const { key } of site.categories) {
    const entries = document[key] ?? [];
    const seen = new Set<string>();
    const list: FeedSource[] = [];

    for (const entry of entries) {
      const source: FeedSource = typeof entry === 'string'
        ? { url: entry, category: key }
        : { url: entry.url, title: entry.title, category: key };

      if (seen.has(source.url)) {
        log.warn('Duplicate source in category', { category: key, url: source.url });
        continue;
      }
      seen.add(source.url);
      list.push(source);
    }

    sources.set(key, list);
  }

  return sources;
}

export function parseFeedsDocument(data: unknown, origin = 'feeds config'): FeedsDocument {
  const parsed = FeedsDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigInvalidError(origin, 'source list failed validation', toIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load the source list. Unlike site metadata, it must exist.
 */
export async function loadFeedsConfig(
  filePath: string,
  site: SiteConfig
): Promise<Map<CategoryKey, FeedSource[]>> {
  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    if (error instanceof ConfigInvalidError) throw error;
    throw new ConfigInvalidError(filePath, `cannot read source list: ${errorMessage(error)}`);
  }

  return resolveSources(parseFeedsDocument(data, filePath), site);
}

// ============================================================
// COMBINED
// ============================================================

export interface ConfigPaths {
  siteConfigPath: string;
  feedsConfigPath: string;
}

export async function loadDigestConfig(
  paths: ConfigPaths,
  fetch: FetchSettings
): Promise<DigestConfig> {
  const site = await loadSiteConfig(paths.siteConfigPath);
  const sources = await loadFeedsConfig(paths.feedsConfigPath, site);

  const total = Array.from(sources.values()).reduce((sum, list) => sum + list.length, 0);
  log.info('Configuration loaded', {
    categories: site.categories.length,
    sources: total,
    perCategoryCap: site.perCategoryCap,
    globalCap: site.globalCap,
  });

  return { site, sources, fetch };
}
