export type SentimentLabel = 'Positive' | 'Neutral' | 'Negative';

export const SENTIMENT_LABELS: readonly SentimentLabel[] = ['Positive', 'Neutral', 'Negative'];

export interface VideoSummary {
  videoId: string;
  title: string;
  channel: string;
  publishedAt: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
}

export interface CommentRecord {
  author: string;
  rawText: string;
  likeCount: number;
  publishedAt: string;
}

export interface EnrichedComment extends CommentRecord {
  normalizedText: string;
  sentimentLabel: SentimentLabel;
  polarityScore: number;
}

export interface CommentPage {
  records: CommentRecord[];
  nextPageToken?: string | undefined;
}

/**
 * The remote side of an analysis: video metadata plus a paginated comment listing.
 * `getVideoDetails` resolves to null when the video does not exist.
 */
export interface CommentSource {
  getVideoDetails(videoId: string): Promise<VideoSummary | null>;
  listCommentPage(videoId: string, pageToken?: string): Promise<CommentPage>;
}

export interface MonthlyBucket {
  monthKey: string;
  count: number;
}

export type MonthlyActivity =
  | { status: 'ok'; windowMonths: number | null; buckets: MonthlyBucket[] }
  | { status: 'no-data-in-window'; windowMonths: number; buckets: [] };

export type SentimentDistribution = Record<SentimentLabel, number>;

export interface Highlights {
  positive: EnrichedComment[];
  negative: EnrichedComment[];
}

export interface AnalysisReport {
  video: VideoSummary;
  classifier: string;
  engagementRate: number | null;
  comments: EnrichedComment[];
  enrichmentFailures: number;
  monthly: MonthlyActivity;
  distribution: SentimentDistribution;
  highlights: Highlights;
  corpus: string;
}

export type AnalysisOutcome =
  | { status: 'empty'; video: VideoSummary }
  | { status: 'ok'; report: AnalysisReport };
