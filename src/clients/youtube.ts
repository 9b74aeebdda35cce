import { CommentsUnavailableError, YouTubeApiError } from '../errors.js';
import type { CommentPage, CommentRecord, CommentSource, VideoSummary } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

interface ApiErrorBody {
  error?: {
    code?: number;
    message?: string;
    errors?: Array<{ reason?: string; message?: string }>;
  };
}

interface VideoListResponse {
  items?: RawVideo[];
}

interface RawVideo {
  id: string;
  snippet: {
    title: string;
    channelTitle: string;
    publishedAt: string;
  };
  statistics?: {
    viewCount?: string;
    likeCount?: string;
    commentCount?: string;
  };
}

interface CommentThreadListResponse {
  items?: RawCommentThread[];
  nextPageToken?: string;
}

interface RawCommentThread {
  snippet: {
    topLevelComment: {
      snippet: {
        authorDisplayName: string;
        textDisplay: string;
        likeCount?: number;
        publishedAt: string;
      };
    };
  };
}

export interface YouTubeClientOptions {
  apiKey: string;
  pageSize?: number;
  baseUrl?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DEFAULT_BASE_URL = 'https://www.googleapis.com/youtube/v3';
export const MAX_PAGE_SIZE = 100;
const UNAVAILABLE_REASONS = new Set(['commentsDisabled', 'videoNotFound']);

export class YouTubeClient implements CommentSource {
  private readonly apiKey: string;
  private readonly pageSize: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger | undefined;

  constructor(options: YouTubeClientOptions) {
    if (!options.apiKey) {
      throw new Error('A YouTube Data API key is required.');
    }
    this.apiKey = options.apiKey;
    this.pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  async getVideoDetails(videoId: string): Promise<VideoSummary | null> {
    const url = this.buildUrl('videos', { part: 'snippet,statistics', id: videoId });
    const payload = await this.request<VideoListResponse>(url);
    const item = payload.items?.[0];
    if (!item) {
      return null;
    }

    return {
      videoId: item.id,
      title: item.snippet.title,
      channel: item.snippet.channelTitle,
      publishedAt: item.snippet.publishedAt,
      viewCount: parseCount(item.statistics?.viewCount),
      likeCount: parseCount(item.statistics?.likeCount),
      commentCount: parseCount(item.statistics?.commentCount),
    } satisfies VideoSummary;
  }

  async listCommentPage(videoId: string, pageToken?: string): Promise<CommentPage> {
    const params: Record<string, string> = {
      part: 'snippet',
      videoId,
      maxResults: String(this.pageSize),
      textFormat: 'plainText',
    };
    if (pageToken) {
      params.pageToken = pageToken;
    }

    const url = this.buildUrl('commentThreads', params);
    const payload = await this.request<CommentThreadListResponse>(url, videoId);
    const records = (payload.items ?? []).map((thread) => {
      const snippet = thread.snippet.topLevelComment.snippet;
      return {
        author: snippet.authorDisplayName,
        rawText: snippet.textDisplay,
        likeCount: snippet.likeCount ?? 0,
        publishedAt: snippet.publishedAt,
      } satisfies CommentRecord;
    });

    return { records, nextPageToken: payload.nextPageToken || undefined };
  }

  private buildUrl(resource: string, params: Record<string, string>): string {
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    return `${this.baseUrl}/${resource}?${query.toString()}`;
  }

  /** `commentsFor` marks a comment listing, whose disabled or missing video surfaces as CommentsUnavailableError. */
  private async request<T>(url: string, commentsFor?: string): Promise<T> {
    const response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });
    const text = await response.text();

    if (!response.ok) {
      const details = parseErrorBody(text);
      const reason = details.error?.errors?.[0]?.reason;
      const message = details.error?.message ?? `YouTube API request failed with status ${response.status}`;
      this.logger?.(`Request failed with status ${response.status}${reason ? ` (${reason})` : ''}.`);

      if (commentsFor && reason && UNAVAILABLE_REASONS.has(reason)) {
        throw new CommentsUnavailableError(commentsFor, reason);
      }
      throw new YouTubeApiError(message, response.status, reason);
    }

    return JSON.parse(text) as T;
  }
}

function parseCount(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? '0', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

function parseErrorBody(text: string): ApiErrorBody {
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null ? (parsed as ApiErrorBody) : {};
  } catch {
    return {};
  }
}
