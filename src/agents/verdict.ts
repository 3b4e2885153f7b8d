export const VERDICTS = {
  relevant: 1,
  unsure: 0,
  irrelevant: -1,
} as const;

export type Verdict = (typeof VERDICTS)[keyof typeof VERDICTS];

export function isVerdict(value: unknown): value is Verdict {
  return value === VERDICTS.relevant || value === VERDICTS.unsure || value === VERDICTS.irrelevant;
}

// "Result", optional ASCII or full-width colon, optional **, ' or ` around
// the value. The trailing \b keeps 10 and 01 from matching.
const RESULT_PATTERN = /result\s*[:：]?\s*(?:\*\*|'|`)*(-?1|0)(?:\*\*|'|`)*\b/gi;

/**
 * Pulls the verdict out of a judge reply. Replies sometimes restate the
 * result, so the last `Result:` statement wins. Returns null when the reply
 * carries no recognisable result.
 */
export function extractVerdict(text: unknown): Verdict | null {
  if (typeof text !== 'string' || !text) {
    return null;
  }

  const matches = Array.from(text.matchAll(RESULT_PATTERN));
  const last = matches[matches.length - 1];
  if (!last) {
    return null;
  }

  const value = Number(last[1]);
  return isVerdict(value) ? value : null;
}
