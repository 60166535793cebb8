/**
 * Model provider interface.
 * Transport to a hosted language model: sends a prompt, returns the raw
 * reply text. Providers classify their own transport failures.
 */

/** Closed set of model failure kinds. */
export type ModelFailureKind = 'parse' | 'transient' | 'auth' | 'quota' | 'model_not_found';

/** Kinds the orchestrator recovers from with the heuristic extractor. */
export type RecoverableFailureKind = Extract<ModelFailureKind, 'parse' | 'transient'>;

/** Kinds that are answered to the caller as errors. */
export type TerminalFailureKind = Exclude<ModelFailureKind, RecoverableFailureKind>;

export interface ModelFailure {
  kind: ModelFailureKind;
  message: string;
  /** Seconds the provider asked callers to wait, when it said. */
  retryAfter?: number;
}

export function isRecoverable(kind: ModelFailureKind): kind is RecoverableFailureKind {
  return kind === 'parse' || kind === 'transient';
}

/** Thrown by providers; carries the classified kind. */
export class ModelProviderError extends Error {
  constructor(
    readonly kind: ModelFailureKind,
    message: string,
    readonly status?: number,
    readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'ModelProviderError';
  }
}

/**
 * Read a Retry-After header value: delay seconds or an HTTP date.
 * Returns whole seconds from `now`, or undefined when absent or unreadable.
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  const raw = value?.trim();
  if (!raw) return undefined;
  if (/^\d+$/.test(raw)) return Number(raw);

  const at = Date.parse(raw);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

export interface ModelPrompt {
  system: string;
  user: string;
}

export interface ModelCallOptions {
  model: string;
  apiKey: string;
  /** Aborted when the per-call timeout elapses. */
  signal?: AbortSignal;
}

export interface IModelProvider {
  /** Provider identifier, e.g. "openai". */
  readonly name: string;
  /** Model used when the caller supplies none. */
  readonly defaultModel: string;

  /**
   * Send the prompt and return the reply text.
   * Throws ModelProviderError on any failure.
   */
  complete(prompt: ModelPrompt, options: ModelCallOptions): Promise<string>;
}
