export interface JudgeRequest {
  systemMessage: string;
  userMessage: string;
}

export interface JudgeResponse {
  rawText: string;
}

/**
 * A language-model judge. Implementations return the model's free-text reply
 * untouched; verdict extraction happens downstream.
 */
export interface JudgeClient {
  readonly name: string;
  classify(request: JudgeRequest): Promise<JudgeResponse>;
}
