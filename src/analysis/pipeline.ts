import type {
  AnalysisReport,
  CommentRecord,
  EnrichedComment,
  Highlights,
  MonthlyActivity,
  MonthlyBucket,
  SentimentDistribution,
  SentimentLabel,
  VideoSummary,
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { toMonthKey, trailingWindowStart } from '../utils/time.js';
import { truncate } from '../utils/text.js';
import { normalizeText } from './normalize.js';
import type { SentimentClassifier } from './sentiment.js';

export const DEFAULT_HIGHLIGHT_LIMIT = 5;

export interface EnrichmentResult {
  comments: EnrichedComment[];
  failures: number;
}

/**
 * Normalizes and classifies every comment. A comment whose text cannot be processed
 * is kept with empty normalized text and a Neutral/0 result, and counted as a failure.
 */
export function enrichComments(
  comments: readonly CommentRecord[],
  classifier: SentimentClassifier,
  options: { logger?: Logger } = {},
): EnrichmentResult {
  let failures = 0;

  const enriched = comments.map((comment, index) => {
    let normalizedText = '';
    try {
      normalizedText = normalizeText(comment.rawText);
      const { label, score } = classifier.classify(normalizedText);
      if (!Number.isFinite(score)) {
        throw new Error(`classifier returned a non-finite score (${score})`);
      }
      return { ...comment, normalizedText, sentimentLabel: label, polarityScore: score } satisfies EnrichedComment;
    } catch (error) {
      failures += 1;
      const reason = error instanceof Error ? error.message : String(error);
      options.logger?.(`Comment #${index + 1} by ${comment.author} fell back to Neutral: ${reason}`);
      return { ...comment, normalizedText, sentimentLabel: 'Neutral', polarityScore: 0 } satisfies EnrichedComment;
    }
  });

  return { comments: enriched, failures };
}

/**
 * (likes + comments) / views as a percentage with two decimals.
 * A video without recorded views has no rate: the result is null.
 */
export function engagementRate(video: Pick<VideoSummary, 'viewCount' | 'likeCount' | 'commentCount'>): number | null {
  if (video.viewCount <= 0) {
    return null;
  }

  const rate = ((video.likeCount + video.commentCount) / video.viewCount) * 100;
  return Math.round(rate * 100) / 100;
}

export interface BucketOptions {
  /** Keep only comments from the last N calendar months. */
  windowMonths?: number;
  now?: Date;
}

/**
 * Counts comments per UTC calendar month, ordered by month. Comments with an
 * unreadable timestamp are left out.
 */
export function bucketByMonth(comments: readonly CommentRecord[], options: BucketOptions = {}): MonthlyActivity {
  const dated = comments.flatMap((comment) => {
    const timestamp = Date.parse(comment.publishedAt);
    return Number.isNaN(timestamp) ? [] : [{ publishedAt: comment.publishedAt, timestamp }];
  });

  let inWindow = dated;
  const windowMonths = options.windowMonths ?? null;
  if (windowMonths !== null) {
    const cutoff = trailingWindowStart(options.now ?? new Date(), windowMonths).getTime();
    inWindow = dated.filter((entry) => entry.timestamp >= cutoff);
    if (inWindow.length === 0) {
      return { status: 'no-data-in-window', windowMonths, buckets: [] };
    }
  }

  const counts = new Map<string, number>();
  for (const entry of inWindow) {
    const key = toMonthKey(entry.publishedAt);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const buckets: MonthlyBucket[] = [...counts.entries()]
    .map(([monthKey, count]) => ({ monthKey, count }))
    .sort((a, b) => (a.monthKey < b.monthKey ? -1 : a.monthKey > b.monthKey ? 1 : 0));

  return { status: 'ok', windowMonths, buckets };
}

export function sentimentDistribution(comments: readonly EnrichedComment[]): SentimentDistribution {
  const distribution: SentimentDistribution = { Positive: 0, Neutral: 0, Negative: 0 };
  for (const comment of comments) {
    distribution[comment.sentimentLabel] += 1;
  }
  return distribution;
}

export interface HighlightOptions {
  limit?: number;
  /** When set, only comments with |score| strictly above this value qualify. */
  minMagnitude?: number;
}

/** Most-liked comments with the given label; equal like counts keep retrieval order. */
export function selectHighlights(
  comments: readonly EnrichedComment[],
  label: SentimentLabel,
  options: HighlightOptions = {},
): EnrichedComment[] {
  const limit = options.limit ?? DEFAULT_HIGHLIGHT_LIMIT;
  if (limit <= 0) {
    return [];
  }

  const { minMagnitude } = options;
  return comments
    .filter((comment) => comment.sentimentLabel === label)
    .filter((comment) => minMagnitude === undefined || Math.abs(comment.polarityScore) > minMagnitude)
    .sort((a, b) => b.likeCount - a.likeCount)
    .slice(0, limit);
}

/** All normalized text joined by spaces, the input of a word cloud or frequency table. */
export function buildCorpus(comments: readonly EnrichedComment[]): string {
  return comments
    .map((comment) => comment.normalizedText)
    .filter((text) => text.length > 0)
    .join(' ');
}

export interface AggregateOptions extends BucketOptions, HighlightOptions {
  logger?: Logger;
}

export function aggregate(
  video: VideoSummary,
  comments: readonly CommentRecord[],
  classifier: SentimentClassifier,
  options: AggregateOptions = {},
): AnalysisReport {
  const { comments: enriched, failures } = enrichComments(comments, classifier, { logger: options.logger });
  if (failures > 0) {
    options.logger?.(`${failures} of ${comments.length} comments could not be scored and were counted as Neutral.`);
  }

  const highlights: Highlights = {
    positive: selectHighlights(enriched, 'Positive', options),
    negative: selectHighlights(enriched, 'Negative', options),
  };
  const monthly = bucketByMonth(enriched, options);
  if (monthly.status === 'no-data-in-window') {
    options.logger?.(`No comments in the last ${monthly.windowMonths} months of "${truncate(video.title, 60)}".`);
  }

  return {
    video,
    classifier: classifier.name,
    engagementRate: engagementRate(video),
    comments: enriched,
    enrichmentFailures: failures,
    monthly,
    distribution: sentimentDistribution(enriched),
    highlights,
    corpus: buildCorpus(enriched),
  };
}
