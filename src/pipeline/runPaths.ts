import type { RunPaths } from './types';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYYMMDD_HHMMSS`. */
export function formatRunTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/** The durable log sits next to its document: `x.json` → `x.jsonl`. */
export function logPathFor(documentPath: string): string {
  return `${documentPath}l`;
}

export function buildRunPaths(params: {
  venue: string;
  year: string;
  runTimestamp: string;
  output?: string;
}): RunPaths {
  const { venue, year, runTimestamp } = params;
  const reportPath = params.output || `detailed_filtered_papers_${venue}_${year}_${runTimestamp}.json`;
  return {
    reportPath,
    logPath: logPathFor(reportPath),
    exportPath: `papers_to_read_${venue}_${year}_${runTimestamp}.json`,
  };
}

export function buildFilterExportPath(runTimestamp: string): string {
  return `papers_to_read_${runTimestamp}.json`;
}

export interface CollectPaths {
  listingPath: string;
  outputPath: string;
  logPath: string;
}

export function buildCollectPaths(params: {
  conference: string;
  year: string;
  runTimestamp: string;
  output?: string;
}): CollectPaths {
  const { conference, year, runTimestamp } = params;
  const outputPath = params.output || `paper_result_${conference}_${year}_${runTimestamp}.json`;
  return {
    listingPath: `all_papers_${conference}_${year}_${runTimestamp}.json`,
    outputPath,
    logPath: logPathFor(outputPath),
  };
}
