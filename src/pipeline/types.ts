import type { ClassificationResult, RunHeader } from '../agents/schemas';

export type { ClassificationResult, PaperRecord, RunHeader } from '../agents/schemas';

export interface TopicQuery {
  description: string;
  venue: string;
  year: string;
}

export interface RunReport {
  header: RunHeader;
  results: ClassificationResult[];
}

/** On-disk shape of a finished run: the header first, then one result per paper. */
export type RunReportDocument = [RunHeader, ...ClassificationResult[]];

export interface RunPaths {
  reportPath: string;
  logPath: string;
  exportPath: string;
}
