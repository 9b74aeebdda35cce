import { describe, it, expect } from 'vitest';
import { normalizeText } from '../analysis/normalize.js';

const HEART_ON_FIRE = '\u2764\uFE0F\u200D\u{1F525}';

describe('normalizeText', () => {
  it('removes links and punctuation, then lowercases', () => {
    expect(normalizeText('Check this https://example.com/x NOW!!')).toBe('check this  now');
    expect(normalizeText('Visit www.site.com today')).toBe('visit  today');
  });

  it('keeps the heart-on-fire glyphs but drops other emoji', () => {
    expect(normalizeText(`Love it ${HEART_ON_FIRE} so much!!!`)).toBe(`love it ${HEART_ON_FIRE} so much`);
    expect(normalizeText('Great \u{1F600} video')).toBe('great  video');
  });

  it('honours a custom glyph allow-list', () => {
    expect(normalizeText('i \u2764 this', { keepGlyphs: [] })).toBe('i  this');
  });

  it('returns an empty string for empty or link-only input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('   https://youtu.be/abc   ')).toBe('');
  });

  it('removes links that only appear once punctuation is gone', () => {
    expect(normalizeText('h.ttps.site')).toBe('');
    expect(normalizeText('HTTPS://Example')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'First!!! 10/10 would watch again',
      'see w.w.w.example and H-T-T-P-stuff',
      `  Mixed CASE ${HEART_ON_FIRE} text\twith\ttabs  `,
      '¿Qué tal? ça va',
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });

  it('leaves only allowed characters and no links', () => {
    const output = normalizeText('Wow <b>bold</b> & http://a.b/c?d=e #tag @user www.x.y 42');
    expect(output).toMatch(/^[a-z0-9\s\u2764\uFE0F\u200D\u{1F525}]*$/u);
    expect(output).not.toMatch(/http|www/);
  });
});
