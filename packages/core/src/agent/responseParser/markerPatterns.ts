const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;
const VARIATION_SELECTOR = '\uFE0F';

export function escapeRegex(value: string): string {
  return value.replace(REGEX_SPECIALS, '\\$&');
}

/**
 * The glyph without its emoji variation selector, so `🛠` and `🛠️` compare
 * equal.
 */
export function bareGlyph(glyph: string): string {
  return glyph.split(VARIATION_SELECTOR).join('');
}

export function glyphPattern(glyph: string): string {
  return `${escapeRegex(bareGlyph(glyph))}${VARIATION_SELECTOR}?`;
}
