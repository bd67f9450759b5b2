/**
 * Unit Tests — OpenAiCompletionClient
 *
 * The SDK is replaced by an object exposing only chat.completions.create.
 * Errors are the SDK's own classes, so the instanceof sorting into
 * transport / rejected / malformed is tested against the real hierarchy.
 */
import {
  createOpenAiSdk,
  OpenAiCompletionClient,
} from '@infrastructure/completion/OpenAiCompletionClient';
import OpenAI from 'openai';

import { completionConfig, silentLogger } from '../helpers/fixtures';

const prompt = { system: 'system text', user: 'user text' };

function chatCompletion(content: string | null) {
  return {
    id: 'cmpl-test',
    object: 'chat.completion',
    created: 1_700_000_000,
    model: 'deepseek-chat',
    choices: [
      { index: 0, message: { role: 'assistant', content }, finish_reason: 'stop', logprobs: null },
    ],
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
  };
}

describe('OpenAiCompletionClient', () => {
  let create: jest.Mock;
  let client: OpenAiCompletionClient;

  beforeEach(() => {
    create = jest.fn();
    const sdk = { chat: { completions: { create } } } as unknown as OpenAI;
    client = new OpenAiCompletionClient(sdk, completionConfig, silentLogger);
  });

  describe('complete() — request', () => {
    it('should send one non-streaming system+user request with the configured sampling', async () => {
      create.mockResolvedValue(chatCompletion('report'));

      await client.complete(prompt);

      expect(create).toHaveBeenCalledTimes(1);
      expect(create).toHaveBeenCalledWith({
        model: 'deepseek-chat',
        messages: [
          { role: 'system', content: 'system text' },
          { role: 'user', content: 'user text' },
        ],
        stream: false,
        temperature: 0.5,
        max_tokens: 1500,
      });
    });

    it('should omit max_tokens when no limit is configured', async () => {
      const sdk = { chat: { completions: { create } } } as unknown as OpenAI;
      client = new OpenAiCompletionClient(sdk, { ...completionConfig, maxTokens: null }, silentLogger);
      create.mockResolvedValue(chatCompletion('report'));

      await client.complete(prompt);

      expect(create.mock.calls[0][0]).not.toHaveProperty('max_tokens');
    });
  });

  describe('complete() — outcomes', () => {
    it('should return the first choice content verbatim', async () => {
      create.mockResolvedValue(chatCompletion('### 企业速览\n  内容  '));

      const result = await client.complete(prompt);

      expect(result).toEqual({ ok: true, value: '### 企业速览\n  内容  ' });
    });

    it('should report malformed when the content is empty', async () => {
      create.mockResolvedValue(chatCompletion(null));

      const result = await client.complete(prompt);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'malformed', message: 'Completion response has no message content' },
      });
    });

    it('should report malformed when there are no choices', async () => {
      create.mockResolvedValue({ ...chatCompletion('x'), choices: [] });

      const result = await client.complete(prompt);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'malformed', message: 'Completion response has no message content' },
      });
    });

    it('should report transport when the provider cannot be reached', async () => {
      create.mockRejectedValue(new OpenAI.APIConnectionError({ message: 'Connection error.' }));

      const result = await client.complete(prompt);

      expect(result).toEqual({ ok: false, error: { kind: 'transport', message: 'Connection error.' } });
    });

    it('should report transport on timeout', async () => {
      create.mockRejectedValue(new OpenAI.APIConnectionTimeoutError());

      const result = await client.complete(prompt);

      expect(result).toEqual({ ok: false, error: { kind: 'transport', message: 'Request timed out.' } });
    });

    it('should report rejected with the status when the provider returns an error', async () => {
      create.mockRejectedValue(
        new OpenAI.APIError(401, { message: 'Authentication Fails' }, undefined, undefined),
      );

      const result = await client.complete(prompt);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'rejected', status: 401, message: '401 Authentication Fails' },
      });
      expect(create).toHaveBeenCalledTimes(1);
    });

    it('should rethrow errors that are not SDK errors', async () => {
      create.mockRejectedValue(new TypeError('boom'));

      await expect(client.complete(prompt)).rejects.toThrow('boom');
    });
  });

  describe('configuration', () => {
    it('should return a config error without an SDK client', async () => {
      client = new OpenAiCompletionClient(null, { ...completionConfig, apiKey: null }, silentLogger);

      const result = await client.complete(prompt);

      expect(result).toEqual({ ok: false, error: { kind: 'config' } });
      expect(client.isConfigured()).toBe(false);
    });

    it('createOpenAiSdk() should return null without an API key', () => {
      expect(createOpenAiSdk({ ...completionConfig, apiKey: null })).toBeNull();
    });

    it('createOpenAiSdk() should build a client with retries disabled', () => {
      const sdk = createOpenAiSdk(completionConfig);

      expect(sdk).toBeInstanceOf(OpenAI);
      expect(sdk?.maxRetries).toBe(0);
      expect(sdk?.baseURL).toBe('http://completion.test');
    });
  });
});
