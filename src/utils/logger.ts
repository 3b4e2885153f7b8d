export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
}

export function createConsoleLogger(tag: string): Logger {
  return {
    error: (msg, ctx) => console.error(`[${tag}] ${msg}`, ctx || ''),
    warn: (msg, ctx) => console.warn(`[${tag}] ${msg}`, ctx || ''),
    info: (msg, ctx) => console.info(`[${tag}] ${msg}`, ctx || ''),
  };
}

export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
};
