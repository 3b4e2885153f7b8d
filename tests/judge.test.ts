import { describe, it, expect, jest } from '@jest/globals';
import { Response } from 'node-fetch';
import { ChatCompletionsJudge } from '../src/agents/chatCompletionsJudge';
import { createJudge } from '../src/agents/createJudge';
import {
  JudgeTimeoutError,
  MissingApiKeyError,
  UnsupportedModelError,
} from '../src/agents/errors';
import { GeminiJudge, type GenerativeModelProvider } from '../src/agents/geminiJudge';
import type { FetchLike } from '../src/utils/http';
import { silentLogger } from '../src/utils/logger';

const request = { systemMessage: 'sys', userMessage: 'user' };
const config = { timeoutMs: 50, maxTokens: 256 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('ChatCompletionsJudge', () => {
  it('posts system and user messages and returns the reply text', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockResolvedValue(jsonResponse({ choices: [{ message: { content: 'Analysis: ok\nResult: 1' } }] }));
    const judge = new ChatCompletionsJudge({
      apiKey: 'test-secret',
      baseUrl: 'https://llm.example.test/',
      model: 'test-model',
      config,
      fetchImpl,
    });

    const response = await judge.classify(request);

    expect(response).toEqual({ rawText: 'Analysis: ok\nResult: 1' });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.example.test/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'user' },
      ],
      max_tokens: 256,
      stream: false,
    });
  });

  it('returns empty text for a null message content', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));
    const judge = new ChatCompletionsJudge({ apiKey: 'test-secret', config, fetchImpl });

    expect(await judge.classify(request)).toEqual({ rawText: '' });
  });

  it('fails on a non-2xx status', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockResolvedValue(new Response('invalid api key', { status: 401 }));
    const judge = new ChatCompletionsJudge({ apiKey: 'test-secret', config, fetchImpl });

    await expect(judge.classify(request)).rejects.toThrow('Chat completion failed: 401 invalid api key');
  });

  it('fails on a response without choices', async () => {
    const fetchImpl = jest.fn<FetchLike>().mockResolvedValue(jsonResponse({ choices: [] }));
    const judge = new ChatCompletionsJudge({ apiKey: 'test-secret', config, fetchImpl });

    await expect(judge.classify(request)).rejects.toThrow('Unexpected chat completion response');
  });

  it('times out a response whose body never arrives', async () => {
    const stalled = new Response('{}', { status: 200 });
    jest.spyOn(stalled, 'json').mockReturnValue(new Promise(() => undefined));
    const fetchImpl = jest.fn<FetchLike>().mockResolvedValue(stalled);
    const judge = new ChatCompletionsJudge({ apiKey: 'test-secret', config, fetchImpl });

    await expect(judge.classify(request)).rejects.toThrow(JudgeTimeoutError);
  });

  it('times out a request that never answers', async () => {
    const fetchImpl = jest.fn<FetchLike>(() => new Promise(() => undefined));
    const judge = new ChatCompletionsJudge({ apiKey: 'test-secret', config, fetchImpl });

    await expect(judge.classify(request)).rejects.toThrow(JudgeTimeoutError);
  });
});

describe('GeminiJudge', () => {
  function providerReturning(text: string) {
    const generateContent = jest.fn(async () => ({ response: { text: () => text } }));
    const provider: GenerativeModelProvider = {
      getGenerativeModel: () => ({ generateContent }),
    };
    return { provider, generateContent };
  }

  it('sends one prompt with temperature 0 and returns the text', async () => {
    const { provider, generateContent } = providerReturning('Result: 0');
    const judge = new GeminiJudge({ apiKey: 'test-secret', model: 'test-model', config, provider, logger: silentLogger });

    expect(await judge.classify(request)).toEqual({ rawText: 'Result: 0' });
    expect(generateContent).toHaveBeenCalledWith({
      contents: [{ role: 'user', parts: [{ text: 'sys\n\nUser input:\nuser' }] }],
      generationConfig: { maxOutputTokens: 256, temperature: 0 },
    });
    expect(judge.name).toBe('gemini:test-model');
  });

  it('times out a request that never answers', async () => {
    const provider: GenerativeModelProvider = {
      getGenerativeModel: () => ({ generateContent: () => new Promise(() => undefined) }),
    };
    const judge = new GeminiJudge({ apiKey: 'test-secret', config, provider, logger: silentLogger });

    await expect(judge.classify(request)).rejects.toThrow(JudgeTimeoutError);
  });
});

describe('createJudge', () => {
  it('picks the chat completions judge for deepseek', () => {
    const judge = createJudge({ modelType: 'DeepSeek', apiKey: 'test-secret' });
    expect(judge).toBeInstanceOf(ChatCompletionsJudge);
    expect(judge.name).toBe('chat:deepseek-chat');
  });

  it('reads the API key from the environment', () => {
    const judge = createJudge({ modelType: 'gemini', env: { GOOGLE_API_KEY: 'test-secret' } });
    expect(judge).toBeInstanceOf(GeminiJudge);
  });

  it('fails without an API key', () => {
    expect(() => createJudge({ modelType: 'deepseek', env: {} })).toThrow(MissingApiKeyError);
  });

  it('rejects unknown model types', () => {
    expect(() => createJudge({ modelType: 'llama', apiKey: 'test-secret' })).toThrow(
      'Model type llama not implemented yet'
    );
    expect(() => createJudge({ modelType: 'llama', apiKey: 'test-secret' })).toThrow(UnsupportedModelError);
  });
});
