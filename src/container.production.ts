/**
 * Production container: configuration from the environment, the configured
 * model provider, console logging.
 */

import { loadConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import {
  ConsoleLogProvider,
  GeminiModelProvider,
  OpenAIModelProvider,
  type IModelProvider,
} from './providers/index.js';

let cached: Container | null = null;

/** Throws InitError when the environment is incomplete. */
export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);

  const modelProvider: IModelProvider =
    config.provider === 'gemini'
      ? new GeminiModelProvider({ defaultModel: config.defaultModel, baseUrl: config.geminiBaseUrl })
      : new OpenAIModelProvider({ defaultModel: config.defaultModel });

  cached = createContainer({
    config,
    modelProvider,
    logProvider: new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel }),
  });

  return cached;
}
