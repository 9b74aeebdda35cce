import { describe, it, expect } from 'vitest';
import { runAnalysis } from '../analysis/run.js';
import { InvalidVideoUrlError, VideoNotFoundError } from '../errors.js';
import { comment, FakeCommentSource, KeywordStubClassifier, VIDEO } from './fixtures.js';

const classifier = new KeywordStubClassifier();

describe('runAnalysis', () => {
  it('rejects a link without a video id before fetching anything', async () => {
    const source = new FakeCommentSource({});
    await expect(runAnalysis(source, 'https://example.com/clip', { classifier })).rejects.toBeInstanceOf(
      InvalidVideoUrlError,
    );
    expect(source.detailRequests).toBe(0);
  });

  it('halts when the video does not exist', async () => {
    const source = new FakeCommentSource({}, null);
    await expect(runAnalysis(source, 'https://youtu.be/abc', { classifier })).rejects.toMatchObject({
      name: 'VideoNotFoundError',
      videoId: 'abc',
      code: 'not-found',
    });
    await expect(runAnalysis(source, 'https://youtu.be/abc', { classifier })).rejects.toBeInstanceOf(VideoNotFoundError);
    expect(source.pageRequests).toEqual([]);
  });

  it('returns the empty state for a video without comments', async () => {
    const source = new FakeCommentSource({ start: { records: [] } });
    await expect(runAnalysis(source, 'https://www.youtube.com/watch?v=vid123', { classifier })).resolves.toEqual({
      status: 'empty',
      video: VIDEO,
    });
  });

  it('builds the report over every page', async () => {
    const source = new FakeCommentSource({
      start: {
        records: [comment('good jan', 4, '2024-01-03T00:00:00Z'), comment('bad jan', 9, '2024-01-04T00:00:00Z')],
        nextPageToken: 'next',
      },
      next: {
        records: Array.from({ length: 5 }, (_, i) => comment(`good mar ${i}`, i, `2024-03-0${i + 1}T00:00:00Z`)),
      },
    });

    const outcome = await runAnalysis(source, 'https://www.youtube.com/watch?v=vid123&t=5s', {
      classifier,
      windowMonths: 2,
      now: new Date('2024-04-15T00:00:00Z'),
      limit: 2,
    });

    expect(source.pageRequests).toEqual([undefined, 'next']);
    if (outcome.status !== 'ok') {
      throw new Error(`expected a report, got ${outcome.status}`);
    }
    const { report } = outcome;
    expect(report.comments).toHaveLength(7);
    expect(report.distribution).toEqual({ Positive: 6, Neutral: 0, Negative: 1 });
    expect(report.monthly).toEqual({ status: 'ok', windowMonths: 2, buckets: [{ monthKey: '2024-03', count: 5 }] });
    expect(report.highlights.positive.map((c) => c.rawText)).toEqual(['good jan', 'good mar 4']);
    expect(report.highlights.negative.map((c) => c.rawText)).toEqual(['bad jan']);
  });

  it('stops at the page limit', async () => {
    const source = new FakeCommentSource({
      start: { records: [comment('good one')], nextPageToken: 'next' },
      next: { records: [comment('good two')] },
    });
    const outcome = await runAnalysis(source, 'https://youtu.be/vid123', { classifier, maxPages: 1 });

    expect(source.pageRequests).toEqual([undefined]);
    expect(outcome.status === 'ok' ? outcome.report.comments.length : 0).toBe(1);
  });
});
