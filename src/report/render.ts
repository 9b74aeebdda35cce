import { topWords, type WordCount } from '../analysis/words.js';
import type { AnalysisReport, EnrichedComment, SentimentDistribution, VideoSummary } from '../types/index.js';
import { SENTIMENT_LABELS } from '../types/index.js';
import { collapseWhitespace, formatCount, truncate } from '../utils/text.js';
import { isoDay } from '../utils/time.js';

export interface RenderOptions {
  words?: number;
  textWidth?: number;
}

export function renderVideoSummary(video: VideoSummary, engagementRate: number | null): string[] {
  return [
    `Title: ${video.title}`,
    `Channel: ${video.channel}`,
    `Published on: ${isoDay(video.publishedAt)}`,
    `Views: ${formatCount(video.viewCount)} | Likes: ${formatCount(video.likeCount)} | Comments: ${formatCount(video.commentCount)} | Engagement rate: ${formatRate(engagementRate)}`,
  ];
}

export function renderReport(report: AnalysisReport, options: RenderOptions = {}): string[] {
  const textWidth = options.textWidth ?? 100;
  const lines = [...renderVideoSummary(report.video, report.engagementRate), ''];

  lines.push(`Sentiment (${report.classifier}, ${report.comments.length} comments): ${formatDistribution(report.distribution)}`);
  if (report.enrichmentFailures > 0) {
    lines.push(`  ${report.enrichmentFailures} comments could not be scored and count as Neutral.`);
  }

  lines.push('', 'Comment activity by month:');
  if (report.monthly.status === 'no-data-in-window') {
    lines.push(`  No comments in the last ${report.monthly.windowMonths} months.`);
  } else {
    for (const bucket of report.monthly.buckets) {
      lines.push(`  ${bucket.monthKey}  ${formatCount(bucket.count)}`);
    }
  }

  const words = topWords(report.corpus, options.words ?? 15);
  if (words.length > 0) {
    lines.push('', `Most frequent words: ${formatWords(words)}`);
  }

  lines.push('', 'Top positive comments:', ...formatHighlights(report.highlights.positive, textWidth));
  lines.push('', 'Top negative comments:', ...formatHighlights(report.highlights.negative, textWidth));
  return lines;
}

/** Everything a dashboard needs to chart the run, without the full comment list. */
export function toReportJson(report: AnalysisReport, options: RenderOptions = {}) {
  return {
    video: report.video,
    classifier: report.classifier,
    engagementRate: report.engagementRate,
    commentsAnalyzed: report.comments.length,
    enrichmentFailures: report.enrichmentFailures,
    monthly: report.monthly,
    distribution: report.distribution,
    topWords: topWords(report.corpus, options.words ?? 15),
    highlights: report.highlights,
  };
}

export function formatRate(rate: number | null): string {
  return rate === null ? 'n/a' : `${rate}%`;
}

export function formatDistribution(distribution: SentimentDistribution): string {
  const total = SENTIMENT_LABELS.reduce((sum, label) => sum + distribution[label], 0);
  return SENTIMENT_LABELS.map((label) => {
    const share = total === 0 ? 0 : (distribution[label] / total) * 100;
    return `${label} ${distribution[label]} (${share.toFixed(1)}%)`;
  }).join(' | ');
}

function formatWords(words: WordCount[]): string {
  return words.map(({ word, count }) => `${word} (${count})`).join(', ');
}

function formatHighlights(comments: EnrichedComment[], textWidth: number): string[] {
  if (comments.length === 0) {
    return ['  (none)'];
  }

  return comments.map(
    (comment) => `  [${formatCount(comment.likeCount)} likes] ${comment.author}: ${truncate(collapseWhitespace(comment.rawText), textWidth)}`,
  );
}
