/**
 * Environ Digest — Item Normalizer
 *
 * Converts raw parser entries into the canonical Item shape.
 * Per-entry problems never throw: a missing link drops the entry,
 * an unusable date falls back to the fetch time.
 */

import type { CategoryKey, Item, RawEntry } from '../types';
import { toPlainText, truncate } from '../lib/text';
import { identityKey } from './dedup';

export const TITLE_PLACEHOLDER = '(no title)';
export const SUMMARY_MAX_LENGTH = 400;
export const SOURCE_MAX_LENGTH = 120;

export interface NormalizeContext {
  category: CategoryKey;
  /** Source URL, last resort for the display name */
  url: string;
  /** Title from the parsed feed document */
  feedTitle?: string;
  /** Title hint from configuration */
  titleHint?: string;
  /** Fallback timestamp for entries without a usable date */
  fetchedAt: Date;
}

// ============================================================
// TIMESTAMPS
// ============================================================

// ISO-like strings without a zone designator, e.g. "2024-01-01 10:00" or "2024-01-01T10:00:00"
const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?$/;
// RFC 822 style strings missing a zone, e.g. "Mon, 01 Jan 2024 10:00:00"
const ZONELESS_RFC822 = /^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{2,4}\s+\d{1,2}:\d{2}(?::\d{2})?$/;

/**
 * Parse a feed date string as an instant. Strings without a zone are read
 * as UTC rather than local time. Returns null when unparseable.
 */
export function parseFeedDate(value: string | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  let candidate = trimmed;
  if (ZONELESS_ISO.test(trimmed)) {
    candidate = `${trimmed.replace(' ', 'T')}${trimmed.length === 10 ? 'T00:00:00' : ''}Z`;
  } else if (ZONELESS_RFC822.test(trimmed)) {
    candidate = `${trimmed} GMT`;
  }

  const ms = Date.parse(candidate);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Published fields first, then updated fields, then the fetch time.
 */
export function resolvePublishedAt(raw: RawEntry, fetchedAt: Date): Date {
  const candidates = [raw.published, raw.pubDate, raw.isoDate, raw.updated, raw.date];

  for (const candidate of candidates) {
    const parsed = parseFeedDate(candidate);
    if (parsed) return parsed;
  }

  return new Date(fetchedAt.getTime());
}

// ============================================================
// TEXT FIELDS
// ============================================================

function firstNonEmpty(values: Array<string | undefined>): string {
  for (const value of values) {
    const text = toPlainText(value);
    if (text) return text;
  }
  return '';
}

export function resolveSourceName(context: Pick<NormalizeContext, 'feedTitle' | 'titleHint' | 'url'>): string {
  const name = firstNonEmpty([context.feedTitle, context.titleHint]) || context.url.trim();
  return truncate(name, SOURCE_MAX_LENGTH);
}

// ============================================================
// MAIN NORMALIZER
// ============================================================

/**
 * Normalize one entry. Returns null when the entry has no usable link.
 */
export function normalizeEntry(raw: RawEntry, context: NormalizeContext): Item | null {
  const link = raw.link?.trim() ?? '';
  if (!link) return null;

  return {
    title: firstNonEmpty([raw.title]) || TITLE_PLACEHOLDER,
    link,
    source: resolveSourceName(context),
    summary: truncate(
      firstNonEmpty([raw.summary, raw.description, raw.content, raw.contentSnippet]),
      SUMMARY_MAX_LENGTH
    ),
    publishedAt: resolvePublishedAt(raw, context.fetchedAt),
    category: context.category,
    identityKey: identityKey(link),
  };
}

export interface NormalizeResult {
  items: Item[];
  dropped: number;
}

/**
 * Normalize multiple entries, counting the ones without a link.
 */
export function normalizeEntries(rawEntries: RawEntry[], context: NormalizeContext): NormalizeResult {
  const items: Item[] = [];
  let dropped = 0;

  for (const raw of rawEntries) {
    const item = normalizeEntry(raw, context);
    if (item) {
      items.push(item);
    } else {
      dropped++;
    }
  }

  return { items, dropped };
}
