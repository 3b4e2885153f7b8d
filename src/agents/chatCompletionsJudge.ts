import { JUDGE_CONFIG, JUDGE_MODELS, type JudgeConfig } from './config';
import { JudgeTimeoutError } from './errors';
import type { JudgeClient, JudgeRequest, JudgeResponse } from './judge';
import { ChatCompletionResponseSchema, type ChatCompletionResponse } from './schemas';
import { defaultFetch, type FetchLike } from '../utils/http';
import { withTimeout } from '../utils/timeout';
import { formatValidationErrors } from '../utils/validation';

export interface ChatCompletionsJudgeOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  config?: JudgeConfig;
  fetchImpl?: FetchLike;
}

/**
 * Judge backed by an OpenAI-compatible `/chat/completions` endpoint
 * (DeepSeek by default). One non-streaming request per classification.
 */
export class ChatCompletionsJudge implements JudgeClient {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly config: JudgeConfig;
  private readonly fetchImpl: FetchLike;

  constructor(options: ChatCompletionsJudgeOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || JUDGE_MODELS.deepseek.baseUrl).replace(/\/+$/, '');
    this.model = options.model || JUDGE_MODELS.deepseek.model;
    this.config = options.config ?? JUDGE_CONFIG;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.name = `chat:${this.model}`;
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.apiKey}`,
    };
  }

  private async request(body: unknown): Promise<ChatCompletionResponse> {
    const res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      throw new Error(`Chat completion failed: ${res.status} ${await res.text()}`);
    }

    const json: unknown = await res.json();
    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Unexpected chat completion response.\n${formatValidationErrors(parsed.error)}`);
    }
    return parsed.data;
  }

  async classify(request: JudgeRequest): Promise<JudgeResponse> {
    const body = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemMessage },
        { role: 'user', content: request.userMessage },
      ],
      max_tokens: this.config.maxTokens,
      stream: false,
    };

    // One deadline for headers and body.
    const parsed = await withTimeout(
      this.request(body),
      this.config.timeoutMs,
      () => new JudgeTimeoutError(this.name, this.config.timeoutMs)
    );
    const [choice] = parsed.choices;
    return { rawText: choice?.message.content ?? '' };
  }
}
