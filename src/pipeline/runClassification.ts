import { buildRelevancePrompt } from '../agents/buildPrompt';
import { JudgeInvocationError, PersistenceError } from '../agents/errors';
import type { JudgeClient } from '../agents/judge';
import type { ClassificationResult, PaperRecord, RunHeader } from '../agents/schemas';
import { extractVerdict } from '../agents/verdict';
import { writeJsonAtomic } from '../utils/jsonFiles';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { toError } from '../utils/validation';
import { DurableLog } from './durableLog';
import { serializeRunReport } from './reportFiles';
import type { RunPaths, RunReport, TopicQuery } from './types';

const defaultLogger = createConsoleLogger('Classify');

export interface RunClassificationOptions {
  topic: TopicQuery;
  papers: readonly PaperRecord[];
  judge: JudgeClient;
  paths: Pick<RunPaths, 'reportPath' | 'logPath'>;
  logger?: Logger;
}

export function toRunHeader(topic: TopicQuery): RunHeader {
  return {
    topic_desc: topic.description,
    venue: topic.venue,
    year: topic.year,
  };
}

async function classifyPaper(
  topic: TopicQuery,
  paper: PaperRecord,
  index: number,
  judge: JudgeClient
): Promise<ClassificationResult> {
  const prompt = buildRelevancePrompt(topic, paper);

  let rawText: string;
  try {
    const response = await judge.classify(prompt);
    rawText = response.rawText;
  } catch (error) {
    throw new JudgeInvocationError(index, paper.title, toError(error));
  }

  return {
    paper_title: paper.title,
    paper_abstract: paper.abstract,
    verdict: extractVerdict(rawText),
    raw_analysis: rawText,
  };
}

/**
 * Classifies `papers` one at a time, in order. Each result is flushed to the
 * durable log before the next paper starts. The final report is written only
 * once every paper is done, and the log is removed only after that write
 * succeeds. Any judge or disk failure stops the run with the log intact.
 */
export async function runClassification(options: RunClassificationOptions): Promise<RunReport> {
  const { topic, papers, judge, paths, logger = defaultLogger } = options;
  const startTime = Date.now();
  const report: RunReport = { header: toRunHeader(topic), results: [] };
  const log = new DurableLog<ClassificationResult>(paths.logPath);

  const { preservedAs } = await log.start();
  if (preservedAs) {
    logger.warn(`Log from an interrupted run moved to ${preservedAs}`);
  }

  logger.info(`Classifying ${papers.length} papers with ${judge.name}`, {
    venue: topic.venue,
    year: topic.year,
  });

  for (const [index, paper] of papers.entries()) {
    const result = await classifyPaper(topic, paper, index, judge);

    report.results.push(result);
    await log.append(result);

    if (result.verdict === null) {
      logger.warn(`[${index + 1}/${papers.length}] No verdict found in reply`, {
        title: paper.title,
      });
    } else {
      logger.info(`[${index + 1}/${papers.length}] ${result.verdict} ${paper.title}`);
    }
  }

  try {
    await writeJsonAtomic(paths.reportPath, serializeRunReport(report));
  } catch (error) {
    throw new PersistenceError(paths.reportPath, 'write final report', toError(error));
  }

  try {
    await log.remove();
  } catch (error) {
    logger.warn('Report written but log could not be removed', {
      logPath: paths.logPath,
      error: toError(error).message,
    });
  }

  logger.info(`Final result saved to ${paths.reportPath} in ${Date.now() - startTime}ms`);
  return report;
}
