export const JUDGE_MODELS = {
  deepseek: {
    baseUrl: process.env.DEEPSEEK_BASE_URL || 'https://api.deepseek.com',
    model: process.env.DEEPSEEK_MODEL || 'deepseek-chat',
  },
  gemini: {
    model: process.env.GEMINI_MODEL || 'gemini-2.5-flash',
  },
} as const;

export const JUDGE_CONFIG = {
  timeoutMs: parseInt(process.env.JUDGE_TIMEOUT_MS || '60000', 10),
  maxTokens: 1024,
} as const;

export type JudgeConfig = {
  timeoutMs: number;
  maxTokens: number;
};
