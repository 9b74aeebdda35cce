import { readFileSync } from 'node:fs';

export interface WordCount {
  word: string;
  count: number;
}

let defaultStopwords: ReadonlySet<string> | undefined;

export function loadStopwords(): ReadonlySet<string> {
  if (!defaultStopwords) {
    const raw = readFileSync(new URL('../../data/stopwords.json', import.meta.url), 'utf8');
    defaultStopwords = new Set(JSON.parse(raw) as string[]);
  }
  return defaultStopwords;
}

/**
 * Most frequent words of a normalized corpus. Words shorter than two characters and
 * stop-words are skipped; ties are ordered alphabetically.
 */
export function topWords(corpus: string, limit: number, stopwords: ReadonlySet<string> = loadStopwords()): WordCount[] {
  const counts = new Map<string, number>();
  for (const token of corpus.split(/\s+/)) {
    const word = token.replace(/[^a-z0-9]/g, '');
    if (word.length < 2 || stopwords.has(word)) {
      continue;
    }
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || a.word.localeCompare(b.word))
    .slice(0, Math.max(0, limit));
}
