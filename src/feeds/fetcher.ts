/**
 * Environ Digest — Source Fetcher
 *
 * Downloads one RSS/Atom document and parses it into raw entries.
 * Never throws: every problem ends up in the returned FetchOutcome.
 */

import Parser from 'rss-parser';
import type { FetchOutcome, FetchSettings, RawEntry } from '../types';
import { errorMessage } from '../lib/errors';

export const FEED_ACCEPT_HEADER = [
  'application/rss+xml',
  'application/atom+xml',
  'application/rdf+xml;q=0.9',
  'application/xml;q=0.9',
  'text/xml;q=0.8',
  '*/*;q=0.5',
].join(', ');

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchFeedOptions extends Partial<FetchSettings> {
  fetchImpl?: FetchFn;
}

interface ParsedFields {
  description?: unknown;
  summary?: unknown;
  published?: unknown;
  updated?: unknown;
  date?: unknown;
  atomUpdated?: unknown;
}

const parser = new Parser<Record<string, unknown>, ParsedFields>({
  customFields: {
    item: [
      'description',
      'published',
      'updated',
      ['dc:date', 'date'],
      ['atom:updated', 'atomUpdated'],
    ],
  },
});

// ============================================================
// DECODING
// ============================================================

const DEFAULT_TIMEOUT_MS = 20000;
export const DEFAULT_USER_AGENT = 'EnvironDigest/1.0 (+feed aggregator; RSS/Atom reader)';

function charsetFromContentType(contentType: string | null): string | undefined {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)/i);
  return match?.[1];
}

function charsetFromProlog(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 256));
  const match = head.match(/<\?xml[^>]*encoding\s*=\s*["']([^"']+)["']/i);
  return match?.[1];
}

/**
 * Decode with the declared charset, falling back to UTF-8 when the
 * label is unknown.
 */
export function decodeBody(
  bytes: Uint8Array,
  contentType: string | null
): { text: string; warning?: string } {
  const declared = charsetFromContentType(contentType) ?? charsetFromProlog(bytes);

  if (declared) {
    try {
      return { text: new TextDecoder(declared).decode(bytes) };
    } catch {
      return {
        text: new TextDecoder('utf-8').decode(bytes),
        warning: `unknown encoding "${declared}", decoded as utf-8`,
      };
    }
  }

  return { text: new TextDecoder('utf-8').decode(bytes) };
}

// ============================================================
// PARSING
// ============================================================

/**
 * xml2js hands back either a string or `{ _: text, $: attrs }`.
 */
function pickText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && '_' in value && typeof value._ === 'string') {
    return value._;
  }
  return undefined;
}

function hasDate(value: string): boolean {
  return !Number.isNaN(Date.parse(value.trim()));
}

/**
 * Repair common faults before a second parse attempt: junk before the
 * prolog, control characters, bare ampersands and Atom date elements
 * the parser would choke on.
 */
export function salvageXml(xml: string): string {
  const start = xml.indexOf('<');
  const body = start > 0 ? xml.slice(start) : xml;

  return body
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '')
    .replace(/&(?!(?:#\d+|#x[0-9a-fA-F]+|[A-Za-z][A-Za-z0-9]*);)/g, '&amp;')
    .replace(/<(published|updated)>([^<]*)<\/\1>/g, (element, _tag: string, text: string) =>
      hasDate(text) ? element : ''
    );
}

interface ParsedDocument {
  feedTitle?: string;
  entries: RawEntry[];
}

export async function parseFeedDocument(xml: string): Promise<ParsedDocument> {
  const feed = await parser.parseString(xml);

  const entries = feed.items.map((item): RawEntry => ({
    title: pickText(item.title),
    link: pickText(item.link),
    summary: pickText(item.summary),
    description: pickText(item.description),
    content: pickText(item.content),
    contentSnippet: pickText(item.contentSnippet),
    published: pickText(item.published),
    pubDate: pickText(item.pubDate),
    isoDate: pickText(item.isoDate),
    updated: pickText(item.updated) ?? pickText(item.atomUpdated),
    date: pickText(item.date),
  }));

  return { feedTitle: pickText(feed.title), entries };
}

/**
 * Strict parse first; on failure one salvage pass. The strict error is
 * kept as a warning when salvage recovers the document.
 */
export async function parseWithSalvage(
  xml: string
): Promise<{ ok: true; document: ParsedDocument; warnings: string[] } | { ok: false; reason: string }> {
  try {
    return { ok: true, document: await parseFeedDocument(xml), warnings: [] };
  } catch (strictError) {
    const strictReason = errorMessage(strictError);
    try {
      const document = await parseFeedDocument(salvageXml(xml));
      return { ok: true, document, warnings: [`malformed feed recovered: ${strictReason}`] };
    } catch {
      return { ok: false, reason: strictReason };
    }
  }
}

// ============================================================
// FETCH
// ============================================================

function describeNetworkError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return `timed out after ${timeoutMs}ms`;
  }
  return errorMessage(error);
}

/**
 * Fetch and parse one feed.
 *
 * A non-2xx response whose body still parses into entries counts as a
 * success with a warning; some hosts answer bots with 403 plus the feed.
 */
export async function fetchFeed(url: string, options: FetchFeedOptions = {}): Promise<FetchOutcome> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl: FetchFn = options.fetchImpl ?? ((input, init) => fetch(input, init));

  let response: Response;
  let bytes: Uint8Array;
  try {
    response = await fetchImpl(url, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: FEED_ACCEPT_HEADER,
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
    bytes = new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    return { ok: false, url, kind: 'source_unavailable', reason: describeNetworkError(error, timeoutMs) };
  }

  const status = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`;
  const decoded = decodeBody(bytes, response.headers.get('content-type'));
  const parsed = await parseWithSalvage(decoded.text);

  if (!response.ok) {
    if (parsed.ok && parsed.document.entries.length > 0) {
      return {
        ok: true,
        url,
        feedTitle: parsed.document.feedTitle,
        entries: parsed.document.entries,
        warnings: [`${status} with parseable body`, ...(decoded.warning ? [decoded.warning] : []), ...parsed.warnings],
      };
    }
    return { ok: false, url, kind: 'source_unavailable', reason: status };
  }

  if (!parsed.ok) {
    return { ok: false, url, kind: 'feed_malformed', reason: parsed.reason };
  }

  return {
    ok: true,
    url,
    feedTitle: parsed.document.feedTitle,
    entries: parsed.document.entries,
    warnings: [...(decoded.warning ? [decoded.warning] : []), ...parsed.warnings],
  };
}
