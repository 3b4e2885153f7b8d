export class JudgeTimeoutError extends Error {
  constructor(
    public readonly judge: string,
    public readonly timeoutMs: number
  ) {
    super(`Judge ${judge} timed out after ${timeoutMs}ms`);
    this.name = 'JudgeTimeoutError';
  }
}

export class JudgeInvocationError extends Error {
  constructor(
    public readonly paperIndex: number,
    public readonly paperTitle: string,
    public readonly originalError: Error
  ) {
    super(
      `Judge call failed for paper #${paperIndex + 1} "${paperTitle}": ${originalError.message}`
    );
    this.name = 'JudgeInvocationError';
    this.cause = originalError;
  }
}

export class PersistenceError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly operation: string,
    public readonly originalError: Error
  ) {
    super(`Failed to ${operation} (${filePath}): ${originalError.message}`);
    this.name = 'PersistenceError';
    this.cause = originalError;
  }
}

export class ReportFormatError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly detail: string
  ) {
    super(`Unexpected content in ${filePath}: ${detail}`);
    this.name = 'ReportFormatError';
  }
}

export class UnsupportedModelError extends Error {
  constructor(public readonly modelType: string) {
    super(`Model type ${modelType} not implemented yet`);
    this.name = 'UnsupportedModelError';
  }
}

export class MissingApiKeyError extends Error {
  constructor(public readonly envVars: readonly string[]) {
    super(`No API key given. Pass --apikey or set ${envVars.join(' / ')}`);
    this.name = 'MissingApiKeyError';
  }
}

export class UnsupportedConferenceError extends Error {
  constructor(public readonly conference: string) {
    super(`Scraper for conference ${conference} has not been implemented`);
    this.name = 'UnsupportedConferenceError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly detail: string) {
    super(`Invalid options:\n${detail}`);
    this.name = 'ConfigError';
  }
}
