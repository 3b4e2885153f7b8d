import { GoogleGenerativeAI, type GenerateContentRequest, type ModelParams } from '@google/generative-ai';
import { JUDGE_CONFIG, JUDGE_MODELS, type JudgeConfig } from './config';
import { JudgeTimeoutError } from './errors';
import type { JudgeClient, JudgeRequest, JudgeResponse } from './judge';
import { withTimeout } from '../utils/timeout';
import { createConsoleLogger, type Logger } from '../utils/logger';

const defaultLogger = createConsoleLogger('Gemini');

export interface GenerativeModelLike {
  generateContent(request: GenerateContentRequest): Promise<{ response: { text(): string } }>;
}

export interface GenerativeModelProvider {
  getGenerativeModel(params: ModelParams): GenerativeModelLike;
}

export interface GeminiJudgeOptions {
  apiKey: string;
  model?: string;
  config?: JudgeConfig;
  logger?: Logger;
  /** Replaces the SDK client; used by tests. */
  provider?: GenerativeModelProvider;
}

export class GeminiJudge implements JudgeClient {
  readonly name: string;
  private readonly model: GenerativeModelLike;
  private readonly config: JudgeConfig;
  private readonly logger: Logger;

  constructor(options: GeminiJudgeOptions) {
    const modelName = options.model || JUDGE_MODELS.gemini.model;
    const provider: GenerativeModelProvider = options.provider ?? new GoogleGenerativeAI(options.apiKey);
    this.name = `gemini:${modelName}`;
    this.model = provider.getGenerativeModel({ model: modelName });
    this.config = options.config ?? JUDGE_CONFIG;
    this.logger = options.logger ?? defaultLogger;
  }

  async classify(request: JudgeRequest): Promise<JudgeResponse> {
    const fullPrompt = `${request.systemMessage}\n\nUser input:\n${request.userMessage}`;

    const result = await withTimeout(
      this.model.generateContent({
        contents: [{ role: 'user', parts: [{ text: fullPrompt }] }],
        generationConfig: {
          maxOutputTokens: this.config.maxTokens,
          temperature: 0.0,
        },
      }),
      this.config.timeoutMs,
      () => new JudgeTimeoutError(this.name, this.config.timeoutMs)
    );

    const rawText = result.response.text();
    if (!rawText) {
      this.logger.warn(`[${this.name}] Empty text in response`);
    }
    return { rawText: rawText || '' };
  }
}
