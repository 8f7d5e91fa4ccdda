/** Non-greedy, and allowed to span lines inside a tag. */
const TAG_PATTERN = /<[\s\S]*?>/g;

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0',
  ndash: '–',
  mdash: '—',
  lsquo: '‘',
  rsquo: '’',
  sbquo: '‚',
  ldquo: '“',
  rdquo: '”',
  bdquo: '„',
  hellip: '…',
  bull: '•',
  middot: '·',
  laquo: '«',
  raquo: '»',
  copy: '©',
  reg: '®',
  trade: '™',
  deg: '°',
  times: '×',
  euro: '€',
  pound: '£',
  shy: '\u00ad',
};

const ENTITY_PATTERN = /&(?:#(\d+)|#[xX]([0-9a-fA-F]+)|([A-Za-z][A-Za-z0-9]*));/g;

const MAX_CODE_POINT = 0x10ffff;

export function stripTags(html: string): string {
  return html.replace(TAG_PATTERN, '');
}

function fromCodePoint(match: string, codePoint: number): string {
  return Number.isFinite(codePoint) && codePoint > 0 && codePoint <= MAX_CODE_POINT
    ? String.fromCodePoint(codePoint)
    : match;
}

/**
 * Decodes decimal and hex character references and the named entities
 * that appear in article text. Unknown names are left as written.
 */
export function decodeHtmlEntities(value: string): string {
  if (!value.includes('&')) return value;

  return value.replace(
    ENTITY_PATTERN,
    (
      match: string,
      decimal: string | undefined,
      hex: string | undefined,
      name: string | undefined
    ) => {
      if (decimal) return fromCodePoint(match, Number.parseInt(decimal, 10));
      if (hex) return fromCodePoint(match, Number.parseInt(hex, 16));
      if (name) return NAMED_ENTITIES[name] ?? match;
      return match;
    }
  );
}

/** Tags first, then entities, so `&lt;b&gt;` survives as literal text. */
export function toPlainText(html: string): string {
  return decodeHtmlEntities(stripTags(html));
}
