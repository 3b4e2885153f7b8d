export interface FetchConfig {
  userAgent: string;
  minDelayMs: number;
  maxDelayMs: number;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export function getFetchConfig(env: NodeJS.ProcessEnv = process.env): FetchConfig {
  const minDelayMs = Number(env.FETCH_MIN_DELAY_MS || '1000');
  const maxDelayMs = Number(env.FETCH_MAX_DELAY_MS || '2000');
  return {
    userAgent: env.FETCH_USER_AGENT || DEFAULT_USER_AGENT,
    minDelayMs,
    maxDelayMs: Math.max(minDelayMs, maxDelayMs),
  };
}
