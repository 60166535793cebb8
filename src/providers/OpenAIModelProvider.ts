/**
 * OpenAI chat-completions provider.
 * One SDK client per credential; SDK retries are off because the
 * orchestrator falls back to the heuristic extractor instead.
 */

import OpenAI from 'openai';
import {
  ModelProviderError,
  parseRetryAfter,
  type IModelProvider,
  type ModelCallOptions,
  type ModelPrompt,
} from './IModelProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const MAX_CLIENTS = 32;

/** The slice of the SDK client this provider uses. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): PromiseLike<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export class OpenAIModelProvider implements IModelProvider {
  readonly name = 'openai';
  readonly defaultModel: string;

  private readonly clients = new Map<string, ChatCompletionsClient>();
  private readonly createClient: (apiKey: string) => ChatCompletionsClient;

  constructor(opts?: {
    defaultModel?: string;
    createClient?: (apiKey: string) => ChatCompletionsClient;
  }) {
    this.defaultModel = opts?.defaultModel ?? DEFAULT_MODEL;
    this.createClient =
      opts?.createClient ?? ((apiKey) => new OpenAI({ apiKey, maxRetries: 0 }));
  }

  async complete(prompt: ModelPrompt, options: ModelCallOptions): Promise<string> {
    const client = this.clientFor(options.apiKey);

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await client.chat.completions.create(
        {
          model: options.model,
          messages: [
            { role: 'system', content: prompt.system },
            { role: 'user', content: prompt.user },
          ],
          temperature: 0,
          response_format: { type: 'json_object' },
        },
        { signal: options.signal }
      );
    } catch (err) {
      throw classifyOpenAIError(err);
    }

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new ModelProviderError('parse', 'Empty completion');
    }
    return content;
  }

  private clientFor(apiKey: string): ChatCompletionsClient {
    const existing = this.clients.get(apiKey);
    if (existing) return existing;

    const client = this.createClient(apiKey);
    this.clients.set(apiKey, client);
    if (this.clients.size > MAX_CLIENTS) {
      const oldest = this.clients.keys().next();
      if (!oldest.done) this.clients.delete(oldest.value);
    }
    return client;
  }
}

/** Map an SDK error to a failure kind. Connection and abort errors are checked before status. */
export function classifyOpenAIError(err: unknown): ModelProviderError {
  if (err instanceof ModelProviderError) return err;

  if (err instanceof OpenAI.APIUserAbortError || err instanceof OpenAI.APIConnectionError) {
    return new ModelProviderError('transient', err.message);
  }

  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    if (status === 401 || status === 403) {
      return new ModelProviderError('auth', err.message, status);
    }
    if (status === 429) {
      return new ModelProviderError(
        'quota',
        err.message,
        status,
        parseRetryAfter(err.headers?.['retry-after'])
      );
    }
    if (status === 404 || err.code === 'model_not_found') {
      return new ModelProviderError('model_not_found', err.message, status);
    }
    return new ModelProviderError('transient', err.message, status);
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ModelProviderError('transient', message);
}
