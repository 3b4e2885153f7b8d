import type { CollectedPaper } from '../agents/schemas';
import { PersistenceError } from '../agents/errors';
import { DurableLog } from '../pipeline/durableLog';
import { writeJsonAtomic } from '../utils/jsonFiles';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { sleep as defaultSleep } from '../utils/timeout';
import { toError } from '../utils/validation';
import { toCollectedPaper, type ListingEntry, type PageFetcher } from './types';

const defaultLogger = createConsoleLogger('Collect');

export interface CollectPapersOptions {
  entries: readonly ListingEntry[];
  fetcher: PageFetcher;
  outputPath: string;
  logPath: string;
  delayMs: { min: number; max: number };
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Fetches the detail page of every entry, one at a time with a random pause
 * between requests. Each paper goes to a JSON Lines log as soon as it is
 * fetched; the full list is written at the end and the log removed.
 */
export async function collectPapers(options: CollectPapersOptions): Promise<CollectedPaper[]> {
  const {
    entries,
    fetcher,
    outputPath,
    logPath,
    delayMs,
    logger = defaultLogger,
    sleep = defaultSleep,
    random = Math.random,
  } = options;
  const log = new DurableLog<CollectedPaper>(logPath);
  const { preservedAs } = await log.start();
  if (preservedAs) {
    logger.warn(`Log from an interrupted run moved to ${preservedAs}`);
  }

  const papers: CollectedPaper[] = [];
  for (const [index, entry] of entries.entries()) {
    const detail = await fetcher.fetchDetail(entry.link);
    const paper = toCollectedPaper(entry, detail);
    papers.push(paper);
    await log.append(paper);
    logger.info(`[${index + 1}/${entries.length}] ${entry.title}`);

    if (index < entries.length - 1) {
      await sleep(delayMs.min + random() * (delayMs.max - delayMs.min));
    }
  }

  try {
    await writeJsonAtomic(outputPath, papers);
  } catch (error) {
    throw new PersistenceError(outputPath, 'write paper list', toError(error));
  }
  try {
    await log.remove();
  } catch (error) {
    logger.warn('Paper list written but log could not be removed', {
      logPath,
      error: toError(error).message,
    });
  }

  logger.info(`Finished: ${papers.length} papers info fetched`, { outputPath });
  return papers;
}
