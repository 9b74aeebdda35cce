import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { EnrichedComment } from '../types/index.js';

export interface CsvRow {
  Author: string;
  Text: string;
  Likes: number;
  PublishedAt: string;
  CleanedText: string;
  Sentiment: string;
  Polarity: number;
}

const HEADER: ReadonlyArray<keyof CsvRow> = [
  'Author',
  'Text',
  'Likes',
  'PublishedAt',
  'CleanedText',
  'Sentiment',
  'Polarity',
];

export class CsvStreamWriter {
  private rows = 0;
  private failure: Error | undefined;

  private constructor(private readonly stream: WriteStream) {
    stream.on('error', (error) => {
      this.failure = error;
    });
  }

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    await waitFor(stream, 'open');
    const writer = new CsvStreamWriter(stream);
    await writer.writeLine(HEADER.join(','));
    return writer;
  }

  async writeRow(row: CsvRow): Promise<void> {
    await this.writeLine(formatCsvLine(row));
    this.rows += 1;
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    this.stream.end();
    await finished(this.stream);
  }

  get rowCount(): number {
    return this.rows;
  }

  private async writeLine(line: string): Promise<void> {
    this.throwIfFailed();
    if (!this.stream.write(`${line}\n`)) {
      await waitFor(this.stream, 'drain');
    }
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

export function commentToRow(comment: EnrichedComment): CsvRow {
  return {
    Author: comment.author,
    Text: comment.rawText,
    Likes: comment.likeCount,
    PublishedAt: comment.publishedAt,
    CleanedText: comment.normalizedText,
    Sentiment: comment.sentimentLabel,
    Polarity: Math.round(comment.polarityScore * 10000) / 10000,
  } satisfies CsvRow;
}

export function formatCsvLine(row: CsvRow): string {
  return HEADER.map((key) => csvEscape(String(row[key]))).join(',');
}

export async function writeCommentsCsv(destination: string, comments: readonly EnrichedComment[]): Promise<number> {
  const writer = await CsvStreamWriter.create(destination);
  for (const comment of comments) {
    await writer.writeRow(commentToRow(comment));
  }
  await writer.close();
  return writer.rowCount;
}

/** Resolves on `event`, rejects if the stream errors first. */
function waitFor(stream: WriteStream, event: 'open' | 'drain'): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onEvent = () => {
      stream.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      stream.off(event, onEvent);
      reject(error);
    };
    stream.once(event, onEvent);
    stream.once('error', onError);
  });
}

function csvEscape(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}
