/**
 * Text helpers shared by the field parsers
 */

const ENTITIES: ReadonlyArray<[RegExp, string]> = [
  [/&quot;|&#34;/g, '"'],
  [/&#39;|&#x27;/gi, "'"],
  [/&#x2F;|&#47;/gi, '/'],
  // Last, so "&amp;quot;" decodes to "&quot;" and not to a quote
  [/&amp;/g, '&'],
];

/**
 * Decodes the HTML entities the site uses inside attributes and text:
 * slash, ampersand and quotes.
 *
 * @example
 * unescapeEntities('/schedule-item/x?tab=media&amp;lang=en') // '/schedule-item/x?tab=media&lang=en'
 */
export function unescapeEntities(value: string): string {
  return ENTITIES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), value);
}

/**
 * Decodes JSON-style \uXXXX escapes left in escaped payloads
 */
export function decodeUnicodeEscapes(value: string): string {
  return value.replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) => String.fromCharCode(Number.parseInt(hex, 16)));
}

/**
 * Folds text for loose comparison: escapes decoded, diacritics stripped,
 * lower-cased. "Krep\u0161inio", "Krepšinio" and "KREPSINIO" all fold to
 * "krepsinio".
 */
export function foldText(value: string): string {
  return unescapeEntities(decodeUnicodeEscapes(value))
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

/**
 * Escapes a literal for use inside a RegExp source
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
