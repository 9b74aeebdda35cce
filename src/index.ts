#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { engagementRate } from './analysis/pipeline.js';
import { runAnalysis } from './analysis/run.js';
import { createClassifier, CLASSIFIER_NAMES } from './analysis/sentiment.js';
import { MAX_PAGE_SIZE, YouTubeClient } from './clients/youtube.js';
import { writeCommentsCsv } from './csv/writer.js';
import { describeFailure } from './errors.js';
import { renderReport, renderVideoSummary, toReportJson } from './report/render.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

const program = new Command();
program
  .name('comment-pulse')
  .description("Fetch a YouTube video's comments, score their sentiment, and summarize engagement.");

program
  .command('analyze')
  .description('Analyze the comments of one video.')
  .argument('<url>', 'Video link, either ...watch?v=ID or youtu.be/ID.')
  .option('--api-key <key>', 'YouTube Data API key (default $YOUTUBE_API_KEY).')
  .option('--classifier <name>', `Sentiment scorer: ${CLASSIFIER_NAMES.join(' or ')}.`, 'vader')
  .option('--window-months <number>', 'Only chart comments from the last N months.')
  .option('--top <number>', 'Highlighted comments per sentiment (default 5).')
  .option('--highlight-threshold <number>', 'Only highlight comments whose |score| is above this value.')
  .option('--max-pages <number>', 'Stop fetching after N comment pages.')
  .option('--page-size <number>', `Comments per API call (default ${MAX_PAGE_SIZE}).`)
  .option('--words <number>', 'Most frequent words to list (default 15).')
  .option('--csv <path>', 'Where to write the comments CSV (default output/<timestamp>_<video>.csv).')
  .option('--json <path>', 'Also write the report as JSON.')
  .action(async (url: string, rawOptions: RawAnalyzeOptions) => {
    await handleAnalyze(url, rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeFailure(error));
  process.exitCode = 1;
});

interface RawAnalyzeOptions {
  apiKey?: string;
  classifier: string;
  windowMonths?: string;
  top?: string;
  highlightThreshold?: string;
  maxPages?: string;
  pageSize?: string;
  words?: string;
  csv?: string;
  json?: string;
}

interface AnalyzeContext {
  apiKey: string;
  classifier: string;
  windowMonths: number | undefined;
  top: number;
  highlightThreshold: number | undefined;
  maxPages: number | undefined;
  pageSize: number;
  words: number;
  csvPath: string | undefined;
  jsonPath: string | undefined;
}

async function handleAnalyze(url: string, rawOptions: RawAnalyzeOptions) {
  const context = buildContext(rawOptions);
  const classifier = createClassifier(context.classifier);
  const client = new YouTubeClient({
    apiKey: context.apiKey,
    pageSize: context.pageSize,
    logger: createLogger('youtube'),
  });

  const outcome = await runAnalysis(client, url, {
    classifier,
    maxPages: context.maxPages,
    windowMonths: context.windowMonths,
    limit: context.top,
    minMagnitude: context.highlightThreshold,
    logger: createLogger('analysis'),
  });

  if (outcome.status === 'empty') {
    printLines(renderVideoSummary(outcome.video, engagementRate(outcome.video)));
    console.log('\nNo comments found for this video.');
    return;
  }

  const { report } = outcome;
  printLines(renderReport(report, { words: context.words }));

  const csvPath = path.resolve(context.csvPath ?? defaultCsvPath(report.video.videoId));
  const written = await writeCommentsCsv(csvPath, report.comments);
  console.log(`\nWrote ${written} rows to ${csvPath}`);

  if (context.jsonPath) {
    const jsonPath = path.resolve(context.jsonPath);
    await fs.mkdir(path.dirname(jsonPath), { recursive: true });
    await fs.writeFile(jsonPath, JSON.stringify(toReportJson(report, { words: context.words }), null, 2), 'utf8');
    console.log(`Wrote report to ${jsonPath}`);
  }
}

function buildContext(raw: RawAnalyzeOptions): AnalyzeContext {
  return {
    apiKey: requireApiKey(raw.apiKey),
    classifier: raw.classifier.trim().toLowerCase(),
    windowMonths: parseOptionalPositiveInteger(raw.windowMonths, 'window-months'),
    top: parsePositiveInteger(raw.top, 5, 'top'),
    highlightThreshold: parseOptionalNonNegativeNumber(raw.highlightThreshold, 'highlight-threshold'),
    maxPages: parseOptionalPositiveInteger(raw.maxPages, 'max-pages'),
    pageSize: Math.min(parsePositiveInteger(raw.pageSize, MAX_PAGE_SIZE, 'page-size'), MAX_PAGE_SIZE),
    words: parsePositiveInteger(raw.words, 15, 'words'),
    csvPath: raw.csv?.trim() || undefined,
    jsonPath: raw.json?.trim() || undefined,
  };
}

function requireApiKey(fromFlag: string | undefined): string {
  const apiKey = fromFlag?.trim() || process.env.YOUTUBE_API_KEY?.trim();
  if (!apiKey) {
    throw new Error('YOUTUBE_API_KEY is missing from the environment (or pass --api-key).');
  }
  return apiKey;
}

function defaultCsvPath(videoId: string): string {
  const isoStamp = new Date().toISOString().replace(/[:]/g, '-');
  const safeVideo = videoId.replace(/[^A-Za-z0-9-_]+/g, '-');
  return path.join('output', `${isoStamp}_${safeVideo}.csv`);
}

function printLines(lines: string[]) {
  for (const line of lines) {
    console.log(line);
  }
}

function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  return parseOptionalPositiveInteger(value, flagName) ?? fallback;
}

function parseOptionalPositiveInteger(value: string | undefined, flagName: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

function parseOptionalNonNegativeNumber(value: string | undefined, flagName: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Option --${flagName} must be zero or a positive number.`);
  }
  return parsed;
}
