import { isVerdict, type Verdict } from '../agents/verdict';
import { writeJsonAtomic } from '../utils/jsonFiles';
import { createConsoleLogger, type Logger } from '../utils/logger';

const defaultLogger = createConsoleLogger('Filter');

export type VerdictSelection =
  | { kind: 'accept'; verdicts: ReadonlySet<Verdict> }
  | { kind: 'skip' }
  | { kind: 'invalid'; reason: string };

export type ExportOutcome =
  | { kind: 'written'; path: string; count: number }
  | { kind: 'skipped' }
  | { kind: 'invalid'; reason: string };

/**
 * Keeps the records whose verdict is in `accepted`, in their original order.
 * Records without a verdict never match.
 */
export function filterByVerdict<T extends { verdict: Verdict | null }>(
  results: readonly T[],
  accepted: ReadonlySet<Verdict>
): T[] {
  return results.filter((r) => {
    const verdict: Verdict | null = r.verdict;
    return verdict !== null && accepted.has(verdict);
  });
}

/**
 * Parses an operator's verdict choice such as `"1"` or `"1, 0"`. `"n"` means
 * no export is wanted.
 */
export function parseVerdictSelection(input: string | undefined): VerdictSelection {
  const trimmed = (input ?? '').trim();
  if (trimmed.toLowerCase() === 'n') {
    return { kind: 'skip' };
  }

  const tokens = trimmed.split(/[\s,]+/).filter(Boolean);
  if (tokens.length === 0) {
    return { kind: 'invalid', reason: 'no verdict given; expected a comma separated subset of -1,0,1' };
  }

  const verdicts = new Set<Verdict>();
  for (const token of tokens) {
    if (!/^[+-]?\d+$/.test(token)) {
      return { kind: 'invalid', reason: `"${token}" is not a number` };
    }
    const value = Number(token);
    if (!isVerdict(value)) {
      return { kind: 'invalid', reason: `${value} is not one of -1, 0, 1` };
    }
    verdicts.add(value);
  }

  return { kind: 'accept', verdicts };
}

export async function exportByVerdict<T extends { verdict: Verdict | null }>(
  results: readonly T[],
  selection: VerdictSelection,
  outPath: string,
  logger: Logger = defaultLogger
): Promise<ExportOutcome> {
  if (selection.kind === 'skip') {
    logger.info('Export skipped');
    return { kind: 'skipped' };
  }
  if (selection.kind === 'invalid') {
    logger.warn(`Invalid verdict selection, nothing exported: ${selection.reason}`);
    return { kind: 'invalid', reason: selection.reason };
  }

  const kept = filterByVerdict(results, selection.verdicts);
  await writeJsonAtomic(outPath, kept);
  logger.info(`Results with approved verdicts saved to ${outPath}`, {
    kept: kept.length,
    total: results.length,
  });
  return { kind: 'written', path: outPath, count: kept.length };
}
