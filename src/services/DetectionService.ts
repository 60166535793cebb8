/**
 * Detection Orchestrator
 *
 * One description in, one validated AttributeSet out:
 * validate → normalize → cache → model → (recoverable failure) heuristic → admit.
 * Parse and transient model failures never leave this service; auth, quota and
 * model-not-found failures are thrown as AppErrors.
 */

import { createHash } from 'node:crypto';
import {
  AppError,
  ModelAuthError,
  ModelNotFoundError,
  QuotaError,
  ValidationError,
} from '../errors.js';
import { isRecoverable, type TerminalFailureKind } from '../providers/IModelProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AttributeSet,
  DetectionRequest,
  DetectionResult,
  DetectionSource,
} from '../types/models.js';
import { METRIC, type DetectionState } from './DetectionState.js';
import type { HeuristicExtractor } from './HeuristicExtractor.js';
import type { ModelClient } from './ModelClient.js';
import { combineText } from './TextNormalizer.js';

const MIN_MODEL_LENGTH = 3;
const MIN_API_KEY_LENGTH = 20;
const PREVIEW_LENGTH = 50;

const PAIRING_HINT =
  "Please provide both 'model' and 'api_key' together, or omit both to use defaults.";

/** A caller-supplied model and credential. */
export interface ModelOverride {
  model: string;
  apiKey: string;
}

export interface DetectionServiceOptions {
  /** Credential for the configured provider when no override is given. */
  defaultApiKey: string;
  /** Configured default model; the provider's own default when absent. */
  defaultModel?: string;
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}

/**
 * Check the override pair: both or neither, each well-formed.
 * Returns null when neither is supplied.
 */
export function resolveOverride(
  model: string | undefined,
  apiKey: string | undefined
): ModelOverride | null {
  const hasModel = present(model);
  const hasKey = present(apiKey);

  if (hasModel && !hasKey) {
    throw new ValidationError(`Custom model requires custom api_key. ${PAIRING_HINT}`);
  }
  if (hasKey && !hasModel) {
    throw new ValidationError(`Custom api_key requires custom model. ${PAIRING_HINT}`);
  }
  if (!present(model) || !present(apiKey)) return null;

  const trimmedModel = model.trim();
  const trimmedKey = apiKey.trim();
  if (trimmedModel.length < MIN_MODEL_LENGTH) {
    throw new ValidationError('Invalid model name format');
  }
  if (trimmedKey.length < MIN_API_KEY_LENGTH) {
    throw new ValidationError('Invalid API key format');
  }
  return { model: trimmedModel, apiKey: trimmedKey };
}

export function fingerprint(model: string, normalizedText: string): string {
  return createHash('sha256').update(`${model}\n${normalizedText}`).digest('hex');
}

export function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

export class DetectionService {
  constructor(
    private readonly state: DetectionState,
    private readonly modelClient: ModelClient,
    private readonly heuristic: HeuristicExtractor,
    private readonly logger: ILogProvider,
    private readonly options: DetectionServiceOptions
  ) {}

  /** The model a request with this override is answered by. */
  effectiveModel(override: ModelOverride | null): string {
    return override?.model ?? this.options.defaultModel ?? this.modelClient.defaultModel;
  }

  async detect(request: DetectionRequest): Promise<DetectionResult> {
    const started = Date.now();

    if (!present(request.title) && !present(request.description)) {
      throw new ValidationError("At least one of 'title' or 'description' is required");
    }
    const override = resolveOverride(request.model, request.apiKey);
    const model = this.effectiveModel(override);
    const isCustom = override !== null;

    const finish = (attributes: AttributeSet, source: DetectionSource): DetectionResult => {
      this.state.counters.increment(METRIC.detections, { source });
      return {
        attributes,
        cache: source === 'cache',
        source,
        model,
        isCustom,
        timeMs: Date.now() - started,
      };
    };

    const text = combineText(request.title, request.description);
    if (!text) {
      return finish(this.heuristic.extract(text), 'heuristic');
    }

    const key = fingerprint(model, text);
    const cached = this.state.cache.lookup(key);
    if (cached) {
      this.state.counters.increment(METRIC.cacheHits);
      this.logger.debug('Cache hit', { model, preview: preview(text) });
      return finish(cached, 'cache');
    }

    this.state.counters.increment(METRIC.modelCalls);
    const outcome = await this.modelClient.extract(text, {
      model,
      apiKey: override?.apiKey ?? this.options.defaultApiKey,
    });

    if (outcome.ok) {
      this.state.cache.admit(key, outcome.attributes);
      return finish(outcome.attributes, 'model');
    }

    const { kind, message, retryAfter } = outcome.failure;
    this.state.counters.increment(METRIC.modelFailures, { kind });

    if (isRecoverable(kind)) {
      this.logger.warn('Model call failed, using heuristic fallback', {
        kind,
        model,
        error: message,
        preview: preview(text),
      });
      const attributes = this.heuristic.extract(text);
      this.state.cache.admit(key, attributes);
      return finish(attributes, 'fallback');
    }

    this.logger.warn('Model call failed', { kind, model, error: message });
    throw terminalError(kind, model, retryAfter);
  }
}

function terminalError(kind: TerminalFailureKind, model: string, retryAfter?: number): AppError {
  switch (kind) {
    case 'auth':
      return new ModelAuthError();
    case 'quota':
      return new QuotaError(undefined, retryAfter);
    case 'model_not_found':
      return new ModelNotFoundError(model);
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled model failure kind: ${String(unreachable)}`);
    }
  }
}
