/**
 * OpenAI-Compatible Completion Client
 * Layer: Infrastructure
 * Pattern: Adapter (implements ICompletionClient)
 *
 * Talks to any `/chat/completions` endpoint the openai SDK can reach; the
 * default base URL points it at DeepSeek. The SDK's own retry loop is
 * switched off (`maxRetries: 0`) so one `complete()` is one HTTP request.
 *
 * SDK errors are sorted into the CompletionError set:
 *   APIConnectionError (incl. timeouts) → transport
 *   APIError with a status              → rejected
 *   2xx without choices/content         → malformed
 * Anything else is a bug and is rethrown.
 */
import type { CompletionConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type {
  CompletionError,
  CompletionRequest,
  ICompletionClient,
} from '@domain/interfaces/ICompletionClient';
import { err, ok, type Result } from '@shared/result';
import OpenAI from 'openai';

/** Returns null without an API key, which the client reports as a `config` error per call. */
export function createOpenAiSdk(cfg: CompletionConfig): OpenAI | null {
  if (cfg.apiKey == null) return null;
  return new OpenAI({
    apiKey: cfg.apiKey,
    baseURL: cfg.baseUrl,
    timeout: cfg.timeoutMs,
    maxRetries: 0,
  });
}

export class OpenAiCompletionClient implements ICompletionClient {
  constructor(
    private sdk: OpenAI | null,
    private cfg: CompletionConfig,
    private log: Logger,
  ) {}

  isConfigured(): boolean {
    return this.sdk !== null;
  }

  async complete(request: CompletionRequest): Promise<Result<string, CompletionError>> {
    if (this.sdk === null) {
      this.log.error('Completion API key is not configured');
      return err({ kind: 'config' });
    }

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.sdk.chat.completions.create({
        model: this.cfg.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        stream: false,
        temperature: this.cfg.temperature,
        ...(this.cfg.maxTokens != null && { max_tokens: this.cfg.maxTokens }),
      });
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionError) {
        this.log.warn({ message: error.message }, 'Completion provider unreachable');
        return err({ kind: 'transport', message: error.message });
      }
      if (error instanceof OpenAI.APIError) {
        this.log.warn({ status: error.status, message: error.message }, 'Completion provider rejected the request');
        return err({ kind: 'rejected', status: error.status ?? null, message: error.message });
      }
      throw error;
    }

    const content = completion.choices?.[0]?.message?.content;
    if (!content) {
      this.log.warn({ choices: completion.choices?.length ?? 0 }, 'Completion response has no content');
      return err({ kind: 'malformed', message: 'Completion response has no message content' });
    }

    this.log.debug(
      { model: completion.model, usage: completion.usage },
      'Completion received',
    );
    return ok(content);
  }
}
