/**
 * Tests for the Source Fetcher
 *
 * The network is replaced by an injected fetch returning in-process Responses;
 * parsing runs through the real rss-parser.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  decodeBody,
  fetchFeed,
  salvageXml,
  FEED_ACCEPT_HEADER,
} from '../../src/feeds/fetcher';
import { normalizeEntries } from '../../src/feeds/normalizer';

const FEED_URL = 'https://river.example.org/feed.xml';

const RSS_DOC = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:dc="http://purl.org/dc/elements/1.1/">
<channel>
<title>River Watch</title>
<link>https://river.example.org</link>
<description>River news</description>
<item><title>Dam opens</title><link>https://river.example.org/dam</link><description>Gates open</description><pubDate>Mon, 01 Jan 2024 10:00:00 GMT</pubDate></item>
<item><title>Dated by Dublin Core</title><link>https://river.example.org/dc</link><dc:date>2024-01-02T08:00:00Z</dc:date></item>
</channel>
</rss>`;

const ATOM_DOC = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
<title>Delta Monitor</title>
<entry><title>Salinity rising</title><link href="https://delta.example.org/salinity"/><updated>2024-01-03T09:30:00Z</updated><summary>Measurements</summary></entry>
</feed>`;

function respond(body: string, init: ResponseInit = {}) {
  return vi.fn(async (_url: string, _init?: RequestInit) =>
    new Response(body, {
      status: 200,
      headers: { 'content-type': 'application/rss+xml; charset=utf-8' },
      ...init,
    })
  );
}

describe('Source Fetcher', () => {
  describe('fetchFeed', () => {
    it('should parse an RSS document into raw entries', async () => {
      const outcome = await fetchFeed(FEED_URL, { fetchImpl: respond(RSS_DOC) });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      expect(outcome.feedTitle).toBe('River Watch');
      expect(outcome.warnings).toEqual([]);
      expect(outcome.entries).toHaveLength(2);
      expect(outcome.entries[0]).toMatchObject({
        title: 'Dam opens',
        link: 'https://river.example.org/dam',
        pubDate: 'Mon, 01 Jan 2024 10:00:00 GMT',
        description: 'Gates open',
      });
      expect(outcome.entries[1].date).toBe('2024-01-02T08:00:00Z');
    });

    it('should parse an Atom document', async () => {
      const outcome = await fetchFeed(FEED_URL, { fetchImpl: respond(ATOM_DOC) });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      expect(outcome.feedTitle).toBe('Delta Monitor');
      expect(outcome.entries).toHaveLength(1);
      expect(outcome.entries[0].link).toBe('https://delta.example.org/salinity');
      expect(outcome.entries[0].summary).toBe('Measurements');
      expect(outcome.entries[0].updated).toBe('2024-01-03T09:30:00Z');
    });

    it('should send a descriptive user agent and feed Accept header', async () => {
      const fetchImpl = respond(RSS_DOC);
      await fetchFeed(FEED_URL, { fetchImpl, userAgent: 'test-agent/1.0' });

      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl).toHaveBeenCalledWith(
        FEED_URL,
        expect.objectContaining({
          headers: { 'User-Agent': 'test-agent/1.0', Accept: FEED_ACCEPT_HEADER },
        })
      );
    });

    it('should recover entries from a feed with a bare ampersand and warn', async () => {
      const broken = RSS_DOC.replace('<title>Dam opens</title>', '<title>Dams & weirs</title>');
      const outcome = await fetchFeed(FEED_URL, { fetchImpl: respond(broken) });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      expect(outcome.entries[0].title).toBe('Dams & weirs');
      expect(outcome.warnings).toHaveLength(1);
      expect(outcome.warnings[0]).toMatch(/^malformed feed recovered: /);
    });

    it('should report a document that is not a feed as malformed', async () => {
      const outcome = await fetchFeed(FEED_URL, {
        fetchImpl: respond('<html><body>Not a feed</body></html>', {
          headers: { 'content-type': 'text/html' },
        }),
      });

      expect(outcome.ok).toBe(false);
      if (outcome.ok) return;
      expect(outcome.kind).toBe('feed_malformed');
    });

    it('should report a non-2xx response without a feed as unavailable', async () => {
      const outcome = await fetchFeed(FEED_URL, {
        fetchImpl: respond('Service Unavailable', {
          status: 503,
          statusText: 'Service Unavailable',
          headers: { 'content-type': 'text/plain' },
        }),
      });

      expect(outcome).toEqual({
        ok: false,
        url: FEED_URL,
        kind: 'source_unavailable',
        reason: 'HTTP 503 Service Unavailable',
      });
    });

    it('should accept a refused request that still carries the feed', async () => {
      const outcome = await fetchFeed(FEED_URL, {
        fetchImpl: respond(RSS_DOC, { status: 403, statusText: 'Forbidden' }),
      });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;
      expect(outcome.entries).toHaveLength(2);
      expect(outcome.warnings).toEqual(['HTTP 403 Forbidden with parseable body']);
    });

    it('should recover an Atom entry whose only date is unparseable and stamp it with the fetch time', async () => {
      const undated = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
<title>Delta Monitor</title>
<entry><title>Undated</title><link href="https://delta.example.org/undated"/><updated>not-a-date</updated></entry>
</feed>`;
      const outcome = await fetchFeed(FEED_URL, { fetchImpl: respond(undated) });

      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      expect(outcome.warnings).toEqual(['malformed feed recovered: Invalid time value']);
      expect(outcome.entries).toHaveLength(1);
      expect(outcome.entries[0]).toMatchObject({ title: 'Undated', link: 'https://delta.example.org/undated' });
      expect(outcome.entries[0].updated).toBeUndefined();

      const fetchedAt = new Date('2024-03-01T08:00:00Z');
      const { items, dropped } = normalizeEntries(outcome.entries, {
        category: 'water',
        url: FEED_URL,
        feedTitle: outcome.feedTitle,
        fetchedAt,
      });

      expect(dropped).toBe(0);
      expect(items[0].publishedAt.toISOString()).toBe('2024-03-01T08:00:00.000Z');
      expect(items[0].source).toBe('Delta Monitor');
    });

    it('should turn network errors into an unavailable outcome', async () => {
      const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
        throw new TypeError('fetch failed');
      });

      const outcome = await fetchFeed(FEED_URL, { fetchImpl });

      expect(outcome).toEqual({ ok: false, url: FEED_URL, kind: 'source_unavailable', reason: 'fetch failed' });
    });

    it('should describe timeouts', async () => {
      const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
        const error = new Error('The operation was aborted due to timeout');
        error.name = 'TimeoutError';
        throw error;
      });

      const outcome = await fetchFeed(FEED_URL, { fetchImpl, timeoutMs: 50 });

      expect(outcome).toEqual({
        ok: false,
        url: FEED_URL,
        kind: 'source_unavailable',
        reason: 'timed out after 50ms',
      });
    });
  });

  describe('salvageXml', () => {
    it('should escape bare ampersands and keep entities', () => {
      expect(salvageXml('<t>a & b &amp; c &#38; d</t>')).toBe('<t>a &amp; b &amp; c &#38; d</t>');
    });

    it('should drop junk before the first tag and control characters', () => {
      expect(salvageXml('junk\n<t>ok\u0001</t>')).toBe('<t>ok</t>');
    });

    it('should drop unparseable Atom dates and keep valid ones', () => {
      expect(salvageXml('<updated>not a date</updated><published>2024-01-01T00:00:00Z</published>')).toBe(
        '<published>2024-01-01T00:00:00Z</published>'
      );
    });
  });

  describe('decodeBody', () => {
    it('should honour the charset in the XML prolog', () => {
      const head = new TextEncoder().encode('<?xml version="1.0" encoding="ISO-8859-1"?><t>caf');
      const tail = new TextEncoder().encode('</t>');
      const bytes = new Uint8Array([...head, 0xe9, ...tail]);

      expect(decodeBody(bytes, null)).toEqual({
        text: '<?xml version="1.0" encoding="ISO-8859-1"?><t>café</t>',
      });
    });

    it('should fall back to UTF-8 for an unknown charset and warn', () => {
      const bytes = new TextEncoder().encode('<rss/>');

      expect(decodeBody(bytes, 'text/xml; charset=x-no-such-charset')).toEqual({
        text: '<rss/>',
        warning: 'unknown encoding "x-no-such-charset", decoded as utf-8',
      });
    });
  });
});
