import { ChatCompletionsJudge } from './chatCompletionsJudge';
import type { JudgeConfig } from './config';
import { MissingApiKeyError, UnsupportedModelError } from './errors';
import { GeminiJudge } from './geminiJudge';
import type { JudgeClient } from './judge';
import type { FetchLike } from '../utils/http';
import type { Logger } from '../utils/logger';

export const API_KEY_ENV = 'PAPER_SCREEN_API_KEY';

export interface CreateJudgeOptions {
  modelType: string;
  apiKey?: string;
  model?: string;
  config?: JudgeConfig;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fetchImpl?: FetchLike;
}

export function createJudge(options: CreateJudgeOptions): JudgeClient {
  const env = options.env ?? process.env;
  const modelType = options.modelType.toLowerCase();

  if (modelType.includes('deepseek')) {
    const apiKey = options.apiKey || env[API_KEY_ENV];
    if (!apiKey) {
      throw new MissingApiKeyError([API_KEY_ENV]);
    }
    return new ChatCompletionsJudge({
      apiKey,
      model: options.model,
      config: options.config,
      fetchImpl: options.fetchImpl,
    });
  }

  if (modelType.includes('gemini')) {
    const apiKey = options.apiKey || env[API_KEY_ENV] || env.GOOGLE_API_KEY;
    if (!apiKey) {
      throw new MissingApiKeyError([API_KEY_ENV, 'GOOGLE_API_KEY']);
    }
    return new GeminiJudge({
      apiKey,
      model: options.model,
      config: options.config,
      logger: options.logger,
    });
  }

  throw new UnsupportedModelError(options.modelType);
}
