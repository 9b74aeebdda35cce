import { readFileSync } from 'node:fs';
import vader from 'vader-sentiment';
import type { SentimentLabel } from '../types/index.js';

export interface SentimentResult {
  label: SentimentLabel;
  score: number;
}

/** Maps text to a label and a score in [-1, 1]. Must be deterministic and never throw on empty input. */
export interface SentimentClassifier {
  readonly name: string;
  classify(text: string): SentimentResult;
}

const NEUTRAL: SentimentResult = { label: 'Neutral', score: 0 };

export const VADER_THRESHOLD = 0.05;
export const POLARITY_THRESHOLD = 0.2;

export function labelForCompound(compound: number): SentimentLabel {
  if (compound >= VADER_THRESHOLD) return 'Positive';
  if (compound <= -VADER_THRESHOLD) return 'Negative';
  return 'Neutral';
}

export function labelForPolarity(polarity: number): SentimentLabel {
  if (polarity > POLARITY_THRESHOLD) return 'Positive';
  if (polarity < -POLARITY_THRESHOLD) return 'Negative';
  return 'Neutral';
}

/** Rule-lexicon scorer: VADER compound score, positive at >= 0.05 and negative at <= -0.05. */
export class VaderClassifier implements SentimentClassifier {
  readonly name = 'vader';

  classify(text: string): SentimentResult {
    if (text.trim().length === 0) {
      return NEUTRAL;
    }

    const { compound } = vader.SentimentIntensityAnalyzer.polarity_scores(text);
    return { label: labelForCompound(compound), score: compound };
  }
}

const AFINN_MAX_SCORE = 5;
const NEGATION_FACTOR = -0.75;

const NEGATION_WORDS = new Set([
  'not', 'no', 'never', 'neither', 'nor',
  'dont', 'doesnt', 'didnt', 'wont', 'wouldnt', 'cant', 'couldnt', 'shouldnt',
  'isnt', 'arent', 'wasnt', 'werent', 'havent', 'hasnt', 'hadnt',
]);

const INTENSITY = new Map<string, number>([
  ['very', 1.5],
  ['really', 1.3],
  ['extremely', 1.8],
  ['incredibly', 1.7],
  ['absolutely', 1.6],
  ['totally', 1.3],
  ['so', 1.3],
  ['slightly', 0.5],
  ['somewhat', 0.6],
  ['barely', 0.3],
  ['hardly', 0.3],
]);

let defaultLexicon: Readonly<Record<string, number>> | undefined;

export function loadAfinnLexicon(): Readonly<Record<string, number>> {
  if (!defaultLexicon) {
    const raw = readFileSync(new URL('../../data/afinn.json', import.meta.url), 'utf8');
    defaultLexicon = JSON.parse(raw) as Record<string, number>;
  }
  return defaultLexicon;
}

/**
 * Polarity-lexicon scorer over AFINN word scores (-5..5).
 *
 * A negation word partially flips the next scoring word, an intensity adverb scales it.
 * The polarity is the mean over scoring words divided by 5, clamped to [-1, 1];
 * positive above 0.2, negative below -0.2.
 */
export class PolarityClassifier implements SentimentClassifier {
  readonly name = 'polarity';
  private readonly lexicon: ReadonlyMap<string, number>;

  constructor(lexicon: Readonly<Record<string, number>> = loadAfinnLexicon()) {
    this.lexicon = new Map(Object.entries(lexicon));
  }

  classify(text: string): SentimentResult {
    const polarity = this.polarity(text);
    return { label: labelForPolarity(polarity), score: polarity };
  }

  polarity(text: string): number {
    const words = text.toLowerCase().replace(/[^a-z0-9\s]/g, '').split(/\s+/).filter(Boolean);

    let total = 0;
    let scoring = 0;
    let negated = false;
    let scale = 1;

    for (const word of words) {
      if (NEGATION_WORDS.has(word)) {
        negated = true;
        continue;
      }

      const intensity = INTENSITY.get(word);
      if (intensity !== undefined) {
        scale = intensity;
        continue;
      }

      const score = this.lexicon.get(word);
      if (score !== undefined) {
        total += score * scale * (negated ? NEGATION_FACTOR : 1);
        scoring += 1;
      }

      negated = false;
      scale = 1;
    }

    if (scoring === 0) {
      return 0;
    }

    return Math.max(-1, Math.min(1, total / scoring / AFINN_MAX_SCORE));
  }
}

export const CLASSIFIER_NAMES = ['vader', 'polarity'] as const;
export type ClassifierName = (typeof CLASSIFIER_NAMES)[number];

export function isClassifierName(value: string): value is ClassifierName {
  return (CLASSIFIER_NAMES as readonly string[]).includes(value);
}

export function createClassifier(name: string): SentimentClassifier {
  if (!isClassifierName(name)) {
    throw new Error(`Unknown classifier "${name}". Choose from: ${CLASSIFIER_NAMES.join(', ')}`);
  }

  return name === 'vader' ? new VaderClassifier() : new PolarityClassifier();
}
