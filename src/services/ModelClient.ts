/**
 * Model Client Adapter
 *
 * Wraps one provider call: builds the prompt, enforces the per-call timeout,
 * parses the reply and classifies every failure into a ModelOutcome.
 * Never throws.
 */

import {
  ModelProviderError,
  type IModelProvider,
  type ModelFailure,
} from '../providers/IModelProvider.js';
import { buildAttributePrompt } from '../prompts/attributePrompt.js';
import type { AttributeName, AttributeSet, CountryCodeFormat } from '../types/models.js';
import type { ModelResponseParser } from './ModelResponseParser.js';

export type ModelOutcome =
  | { ok: true; attributes: AttributeSet }
  | { ok: false; failure: ModelFailure };

export interface ModelClientOptions {
  attributes: readonly AttributeName[];
  countryFormat: CountryCodeFormat;
  timeoutMs: number;
  maxInputChars: number;
}

export interface ModelCredentials {
  model: string;
  apiKey: string;
}

export function truncateInput(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

export class ModelClient {
  constructor(
    private readonly provider: IModelProvider,
    private readonly parser: ModelResponseParser,
    private readonly options: ModelClientOptions
  ) {}

  get defaultModel(): string {
    return this.provider.defaultModel;
  }

  async extract(text: string, credentials: ModelCredentials): Promise<ModelOutcome> {
    const prompt = buildAttributePrompt(
      truncateInput(text, this.options.maxInputChars),
      this.options.attributes,
      this.options.countryFormat
    );

    try {
      const reply = await this.withTimeout((signal) =>
        this.provider.complete(prompt, { ...credentials, signal })
      );
      return { ok: true, attributes: this.parser.parse(reply) };
    } catch (err) {
      return { ok: false, failure: toFailure(err) };
    }
  }

  /** Abort the call and reject as transient once the timeout elapses. */
  private async withTimeout<T>(call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ModelProviderError('transient', `Model call timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([call(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function toFailure(err: unknown): ModelFailure {
  if (err instanceof ModelProviderError) {
    return {
      kind: err.kind,
      message: err.message,
      ...(err.retryAfter !== undefined && { retryAfter: err.retryAfter }),
    };
  }
  return { kind: 'transient', message: err instanceof Error ? err.message : String(err) };
}
