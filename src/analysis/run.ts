import { InvalidVideoUrlError, VideoNotFoundError } from '../errors.js';
import type { AnalysisOutcome, CommentSource } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { parseVideoId } from '../utils/videoUrl.js';
import { aggregate, type AggregateOptions } from './pipeline.js';
import { collectComments } from './retriever.js';
import type { SentimentClassifier } from './sentiment.js';

export interface RunOptions extends Omit<AggregateOptions, 'logger'> {
  classifier: SentimentClassifier;
  maxPages?: number;
  logger?: Logger;
}

/**
 * One analysis run for a video link: details, every comment page, then the report.
 * A video without comments yields `{ status: 'empty' }`; a bad link or a missing
 * video throws before anything else is fetched.
 */
export async function runAnalysis(source: CommentSource, url: string, options: RunOptions): Promise<AnalysisOutcome> {
  const videoId = parseVideoId(url);
  if (!videoId) {
    throw new InvalidVideoUrlError(url);
  }

  const { classifier, maxPages, logger, ...aggregateOptions } = options;
  logger?.(`Fetching details for ${videoId}...`);
  const video = await source.getVideoDetails(videoId);
  if (!video) {
    throw new VideoNotFoundError(videoId);
  }

  logger?.(`Fetching comments for "${video.title}"...`);
  const comments = await collectComments(source, videoId, { maxPages, logger });
  if (comments.length === 0) {
    return { status: 'empty', video };
  }

  logger?.(`Scoring ${comments.length} comments with ${classifier.name}...`);
  const report = aggregate(video, comments, classifier, { ...aggregateOptions, logger });
  return { status: 'ok', report };
}
