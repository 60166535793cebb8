export type {
  IModelProvider,
  ModelCallOptions,
  ModelFailure,
  ModelFailureKind,
  ModelPrompt,
  RecoverableFailureKind,
  TerminalFailureKind,
} from './IModelProvider.js';
export { ModelProviderError, isRecoverable } from './IModelProvider.js';
export { OpenAIModelProvider, classifyOpenAIError } from './OpenAIModelProvider.js';
export type { ChatCompletionsClient } from './OpenAIModelProvider.js';
export { GeminiModelProvider, classifyGeminiError } from './GeminiModelProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { LOG_LEVELS } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
