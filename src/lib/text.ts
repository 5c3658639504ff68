/**
 * Environ Digest — Text helpers
 *
 * Conservative markup stripping for feed text. Regex only, no HTML parsing,
 * so malformed markup degrades to leftover text instead of an exception.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  laquo: '«',
  raquo: '»',
  zwnj: '‌',
  zwj: '‍',
  copy: '©',
  reg: '®',
  deg: '°',
};

const ENTITY_PATTERN = /&(#x[0-9a-f]+|#\d+|[a-z][a-z0-9]*);/gi;

function fromCodePoint(code: number): string | null {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return null;
  if (code >= 0xd800 && code <= 0xdfff) return null;
  return String.fromCodePoint(code);
}

/**
 * Decode numeric and common named character references.
 * Unknown names are left as-is.
 */
export function decodeEntities(input: string): string {
  return input.replace(ENTITY_PATTERN, (match, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return fromCodePoint(code) ?? match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, ' ').trim();
}

/**
 * Remove tags, comments and CDATA markers. A lone `<` that never closes is kept.
 */
export function stripTags(input: string): string {
  return input
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    .replace(/<\/?[a-z!][^<>]*>/gi, ' ');
}

/**
 * Entities first, then tags, then whitespace: escaped markup such as
 * `&lt;p&gt;` in a feed summary is removed along with real tags.
 */
export function toPlainText(input: string | undefined | null): string {
  if (!input) return '';
  return collapseWhitespace(stripTags(decodeEntities(input)));
}

/**
 * Cut to `max` characters (code points), trimming a dangling space.
 */
export function truncate(input: string, max: number): string {
  const chars = Array.from(input);
  if (chars.length <= max) return input;
  return chars.slice(0, max).join('').trimEnd();
}
