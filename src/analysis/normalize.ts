/** Glyphs of the "heart on fire" emoji sequence, kept alongside letters and digits. */
export const DEFAULT_KEPT_GLYPHS: readonly string[] = ['\u2764', '\uFE0F', '\u200D', '\u{1F525}'];

const URL_PATTERN = /http\S+|www\S+/g;

export interface NormalizeOptions {
  keepGlyphs?: readonly string[];
}

/**
 * Strips URLs and anything outside letters, digits, whitespace and the kept glyphs,
 * then trims and lowercases.
 *
 * The steps repeat until the text stops changing: removing punctuation can join
 * fragments into a new URL-like token (`h.ttps` → `https`), and the result has to be
 * a fixed point of this function.
 */
export function normalizeText(text: string, options: NormalizeOptions = {}): string {
  const disallowed = disallowedPattern(options.keepGlyphs ?? DEFAULT_KEPT_GLYPHS);
  let current = text;

  for (;;) {
    const next = current.replace(URL_PATTERN, '').replace(disallowed, '').trim().toLowerCase();
    if (next === current) {
      return next;
    }
    current = next;
  }
}

const patternCache = new Map<string, RegExp>();

function disallowedPattern(keepGlyphs: readonly string[]): RegExp {
  const key = keepGlyphs.join('');
  const cached = patternCache.get(key);
  if (cached) {
    return cached;
  }

  const escaped = Array.from(key)
    .map((glyph) => glyph.replace(/[\\\]\[^-]/g, '\\$&'))
    .join('');
  const pattern = new RegExp(`[^A-Za-z0-9\\s${escaped}]`, 'gu');
  patternCache.set(key, pattern);
  return pattern;
}
