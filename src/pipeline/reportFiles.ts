import * as path from 'path';
import { ReportFormatError } from '../agents/errors';
import {
  ClassificationResultSchema,
  PaperListSchema,
  RunHeaderSchema,
  type ClassificationResult,
  type PaperRecord,
} from '../agents/schemas';
import { readJsonFile } from '../utils/jsonFiles';
import { silentLogger, type Logger } from '../utils/logger';
import { formatValidationErrors } from '../utils/validation';
import { DurableLog } from './durableLog';
import type { RunReport, RunReportDocument } from './types';

export function serializeRunReport(report: RunReport): RunReportDocument {
  return [report.header, ...report.results];
}

export async function loadPaperList(filePath: string): Promise<PaperRecord[]> {
  const data = await readJsonFile(filePath);
  const parsed = PaperListSchema.safeParse(data);
  if (!parsed.success) {
    throw new ReportFormatError(filePath, formatValidationErrors(parsed.error));
  }
  return parsed.data;
}

/**
 * Loads classification results from a finished report (JSON array whose
 * first element is the run header) or from a durable log left behind by an
 * interrupted run (`.jsonl`).
 */
export async function loadClassificationResults(
  filePath: string,
  logger: Logger = silentLogger
): Promise<ClassificationResult[]> {
  if (path.extname(filePath).toLowerCase() === '.jsonl') {
    return DurableLog.read<ClassificationResult>(filePath, ClassificationResultSchema, logger);
  }

  const data = await readJsonFile(filePath);
  if (!Array.isArray(data)) {
    throw new ReportFormatError(filePath, 'expected a JSON array');
  }

  const results: ClassificationResult[] = [];
  data.forEach((entry: unknown, index) => {
    const result = ClassificationResultSchema.safeParse(entry);
    if (result.success) {
      results.push(result.data);
      return;
    }
    if (index === 0 && RunHeaderSchema.safeParse(entry).success) {
      return;
    }
    throw new ReportFormatError(
      filePath,
      `entry ${index}\n${formatValidationErrors(result.error)}`
    );
  });

  return results;
}
