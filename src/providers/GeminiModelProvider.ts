/**
 * Google Gemini provider.
 * Calls the REST generateContent endpoint with fetch; no SDK dependency.
 */

import { z } from 'zod';
import {
  ModelProviderError,
  parseRetryAfter,
  type IModelProvider,
  type ModelCallOptions,
  type ModelPrompt,
} from './IModelProvider.js';

export const DEFAULT_GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';
const DEFAULT_MODEL = 'gemini-2.0-flash';

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
});

const GeminiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

export class GeminiModelProvider implements IModelProvider {
  readonly name = 'gemini';
  readonly defaultModel: string;
  private readonly baseUrl: string;

  constructor(opts?: { defaultModel?: string; baseUrl?: string }) {
    this.defaultModel = opts?.defaultModel ?? DEFAULT_MODEL;
    this.baseUrl = (opts?.baseUrl ?? DEFAULT_GEMINI_API_BASE_URL).replace(/\/+$/, '');
  }

  async complete(prompt: ModelPrompt, options: ModelCallOptions): Promise<string> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(options.model)}:generateContent`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': options.apiKey,
        },
        body: JSON.stringify({
          systemInstruction: { parts: [{ text: prompt.system }] },
          contents: [{ role: 'user', parts: [{ text: prompt.user }] }],
          generationConfig: { temperature: 0, responseMimeType: 'application/json' },
        }),
        signal: options.signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ModelProviderError('transient', `Gemini request failed: ${message}`);
    }

    if (!res.ok) {
      const body: unknown = await res.json().catch(() => ({}));
      throw classifyGeminiError(res.status, body, parseRetryAfter(res.headers.get('Retry-After')));
    }

    const parsed = GeminiResponseSchema.safeParse(await res.json().catch(() => null));
    const text = parsed.success
      ? parsed.data.candidates?.[0]?.content?.parts?.[0]?.text
      : undefined;
    if (!text) {
      throw new ModelProviderError('parse', 'Gemini response has no candidate text');
    }
    return text;
  }
}

export function classifyGeminiError(
  status: number,
  body: unknown,
  retryAfter?: number
): ModelProviderError {
  const parsed = GeminiErrorSchema.safeParse(body);
  const detail = parsed.success ? (parsed.data.error.message ?? '') : '';
  const message = `Gemini API error (${status})${detail ? `: ${detail}` : ''}`;

  if (status === 401 || status === 403 || /api key not valid|API_KEY_INVALID/i.test(detail)) {
    return new ModelProviderError('auth', message, status);
  }
  if (status === 429) {
    return new ModelProviderError('quota', message, status, retryAfter);
  }
  if (status === 404) {
    return new ModelProviderError('model_not_found', message, status);
  }
  return new ModelProviderError('transient', message, status);
}
