export { extractVerdict, isVerdict, VERDICTS, type Verdict } from './agents/verdict';
export { buildRelevancePrompt, renderTemplate, type RelevancePrompt } from './agents/buildPrompt';
export type { JudgeClient, JudgeRequest, JudgeResponse } from './agents/judge';
export { createJudge, type CreateJudgeOptions } from './agents/createJudge';
export { GeminiJudge } from './agents/geminiJudge';
export { ChatCompletionsJudge } from './agents/chatCompletionsJudge';
export * from './agents/errors';
export * from './agents/schemas';

export type { TopicQuery, RunReport, RunReportDocument, RunPaths } from './pipeline/types';
export { runClassification, toRunHeader, type RunClassificationOptions } from './pipeline/runClassification';
export { DurableLog } from './pipeline/durableLog';
export {
  filterByVerdict,
  parseVerdictSelection,
  exportByVerdict,
  type VerdictSelection,
  type ExportOutcome,
} from './pipeline/filterByVerdict';
export { loadClassificationResults, loadPaperList, serializeRunReport } from './pipeline/reportFiles';
export {
  buildRunPaths,
  buildCollectPaths,
  buildFilterExportPath,
  formatRunTimestamp,
  logPathFor,
} from './pipeline/runPaths';

export type { PageFetcher, PaperDetail } from './ingest/types';
export { CvfPageFetcher, cvfListingUrl } from './ingest/cvf/client';
export { parseListingHtml, parseCvfDetailHtml } from './ingest/cvf/parse';
export { filterPapersByTitle } from './ingest/selection';
export { collectPapers, type CollectPapersOptions } from './ingest/collect';

export type { Logger } from './utils/logger';
