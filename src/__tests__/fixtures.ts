import type { SentimentClassifier, SentimentResult } from '../analysis/sentiment.js';
import type { CommentPage, CommentRecord, CommentSource, EnrichedComment, VideoSummary } from '../types/index.js';

export const VIDEO: VideoSummary = {
  videoId: 'vid123',
  title: 'Building a treehouse',
  channel: 'Weekend Projects',
  publishedAt: '2024-01-05T12:00:00Z',
  viewCount: 1234,
  likeCount: 56,
  commentCount: 7,
};

export function comment(rawText: string, likeCount = 0, publishedAt = '2024-01-10T10:00:00Z', author = 'viewer'): CommentRecord {
  return { author, rawText, likeCount, publishedAt };
}

export function enriched(
  rawText: string,
  sentimentLabel: EnrichedComment['sentimentLabel'],
  polarityScore: number,
  likeCount = 0,
): EnrichedComment {
  return {
    author: 'viewer',
    rawText,
    likeCount,
    publishedAt: '2024-01-10T10:00:00Z',
    normalizedText: rawText.toLowerCase(),
    sentimentLabel,
    polarityScore,
  };
}

/** Deterministic classifier keyed on words: "good" is positive, "bad" negative, "boom" throws. */
export class KeywordStubClassifier implements SentimentClassifier {
  readonly name = 'stub';

  classify(text: string): SentimentResult {
    if (text.includes('boom')) {
      throw new Error('stub exploded');
    }
    if (text.includes('good')) return { label: 'Positive', score: 0.8 };
    if (text.includes('bad')) return { label: 'Negative', score: -0.7 };
    return { label: 'Neutral', score: 0 };
  }
}

/** In-memory comment source. Pages are keyed by the token that requests them; the first page is "start". */
export class FakeCommentSource implements CommentSource {
  readonly pageRequests: Array<string | undefined> = [];
  detailRequests = 0;

  constructor(
    private readonly pages: Record<string, CommentPage>,
    private readonly video: VideoSummary | null = VIDEO,
  ) {}

  async getVideoDetails(): Promise<VideoSummary | null> {
    this.detailRequests += 1;
    return this.video;
  }

  async listCommentPage(_videoId: string, pageToken?: string): Promise<CommentPage> {
    this.pageRequests.push(pageToken);
    const page = this.pages[pageToken ?? 'start'];
    if (!page) {
      throw new Error(`no page for token ${pageToken}`);
    }
    return page;
  }
}
