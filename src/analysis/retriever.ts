import type { CommentPage, CommentRecord, CommentSource } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface RetrieveOptions {
  /** Stop after this many pages even if the source reports more. */
  maxPages?: number;
  logger?: Logger;
}

/**
 * Walks the comment listing one page at a time, following the continuation token
 * until the source stops returning one. Each call starts again from the first page.
 */
export async function* iterateCommentPages(
  source: CommentSource,
  videoId: string,
  options: RetrieveOptions = {},
): AsyncGenerator<CommentPage, void, undefined> {
  const maxPages = options.maxPages ?? Number.POSITIVE_INFINITY;
  let pageToken: string | undefined;
  let pages = 0;

  while (pages < maxPages) {
    const page = await source.listCommentPage(videoId, pageToken);
    pages += 1;
    options.logger?.(`Fetched page ${pages} (${page.records.length} comments)${page.nextPageToken ? '' : ', last page'}`);
    yield page;

    if (!page.nextPageToken) {
      return;
    }
    pageToken = page.nextPageToken;
  }

  options.logger?.(`Page limit reached after ${pages} pages.`);
}

/** Flattens every page into one list, in the order the source returned them. */
export async function collectComments(
  source: CommentSource,
  videoId: string,
  options: RetrieveOptions = {},
): Promise<CommentRecord[]> {
  const comments: CommentRecord[] = [];
  for await (const page of iterateCommentPages(source, videoId, options)) {
    comments.push(...page.records);
  }
  return comments;
}
