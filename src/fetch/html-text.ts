/**
 * Plain-text extraction from HTML pages.
 *
 * Regex-based: good enough for summarisation input, not a DOM parser.
 */

/** Elements dropped before extraction; they rarely carry page content. */
export const NOISE_ELEMENTS = [
  'nav',
  'footer',
  'header',
  'aside',
  'script',
  'style',
  'noscript',
  'iframe',
  'svg',
  'button',
  'form',
] as const;

/** Content roots tried in order before falling back to <body>. */
const CONTENT_ROOTS = ['article', 'main'] as const;

const BLOCK_CLOSE = /<\/(p|div|section|h[1-6]|li|tr|table|ul|ol|blockquote|pre|article|main|body)\s*>/gi;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

/**
 * Decode the handful of entities that matter for readable text.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#')) {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const codePoint = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      // Out-of-range references stay as written
      return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '');
}

function innerOf(html: string, tag: string): string | null {
  const match = new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)</${tag}\\s*>`, 'i').exec(html);
  return match ? match[1] : null;
}

/**
 * Remove every `<tag>…</tag>` block (and self-closing forms) for the noise elements.
 */
export function removeNoise(html: string): string {
  let result = html.replace(/<!--[\s\S]*?-->/g, '');
  for (const tag of NOISE_ELEMENTS) {
    // Innermost blocks only: the body may not open another block of the same tag
    const block = new RegExp(`<${tag}\\b[^>]*>(?:(?!<${tag}\\b)[\\s\\S])*?</${tag}\\s*>`, 'gi');
    let previous: string;
    // Repeat until the outer blocks are gone too
    do {
      previous = result;
      result = result.replace(block, '');
    } while (result !== previous);
    result = result.replace(new RegExp(`<${tag}\\b[^>]*/>`, 'gi'), '');
  }
  return result;
}

/**
 * Page title: `<title>`, else the first `<h1>`, else the last URL path segment.
 */
export function extractTitle(html: string, url: string): string {
  for (const tag of ['title', 'h1']) {
    const inner = innerOf(html, tag);
    if (inner !== null) {
      const text = decodeEntities(stripTags(inner)).replace(/\s+/g, ' ').trim();
      if (text) return text;
    }
  }
  return url.split('/').pop() || url;
}

/**
 * Readable text of the page's main content, one block per line.
 */
export function extractMainText(html: string): string {
  const cleaned = removeNoise(html);

  let region: string | null = null;
  for (const tag of CONTENT_ROOTS) {
    region = innerOf(cleaned, tag);
    if (region !== null) break;
  }
  if (region === null) {
    region = innerOf(cleaned, 'body') ?? cleaned;
  }

  const text = decodeEntities(
    stripTags(
      region
        .replace(/<br\s*\/?>/gi, '\n')
        .replace(/<li\b[^>]*>/gi, '\n- ')
        .replace(BLOCK_CLOSE, '\n'),
    ),
  );

  return text
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v\r]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}
