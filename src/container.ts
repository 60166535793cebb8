/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes the
 * real model provider; tests pass mocks.
 */

import type { AppConfig } from './config.js';
import type { IModelProvider } from './providers/IModelProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ICounterStore } from './stores/ICounterStore.js';
import type { IResultCache } from './stores/IResultCache.js';
import type { Middleware } from './middleware/pipeline.js';
import { InMemoryCounterStore } from './stores/InMemoryCounterStore.js';
import { InMemoryResultCache } from './stores/InMemoryResultCache.js';
import { CountryCatalog } from './services/CountryCatalog.js';
import { HsCodeCatalog } from './services/HsCodeCatalog.js';
import { HeuristicExtractor } from './services/HeuristicExtractor.js';
import { ModelResponseParser } from './services/ModelResponseParser.js';
import { ModelClient } from './services/ModelClient.js';
import { DetectionState } from './services/DetectionState.js';
import { DetectionService } from './services/DetectionService.js';
import { BatchService } from './services/BatchService.js';
import { StatsService } from './services/StatsService.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createRequestLogging } from './middleware/logging.js';

export interface Container {
  config: AppConfig;
  state: DetectionState;
  detectionService: DetectionService;
  batchService: BatchService;
  statsService: StatsService;
  hsCodeCatalog: HsCodeCatalog;
  logProvider: ILogProvider;
  authenticate: Middleware;
  /** Request log plus HTTP metrics under the given endpoint label. */
  logging: (endpoint: string) => Middleware;
}

export function createContainer(deps: {
  config: AppConfig;
  modelProvider: IModelProvider;
  logProvider: ILogProvider;
  resultCache?: IResultCache;
  counterStore?: ICounterStore;
}): Container {
  const { config } = deps;

  const state = new DetectionState(
    deps.resultCache ?? new InMemoryResultCache(config.cacheMaxEntries),
    deps.counterStore ?? new InMemoryCounterStore()
  );

  const countries = new CountryCatalog();
  const hsCodeCatalog = new HsCodeCatalog();
  const profile = { attributes: config.attributes, countryFormat: config.countryFormat };

  const heuristicExtractor = new HeuristicExtractor(countries, hsCodeCatalog, profile);
  const modelClient = new ModelClient(
    deps.modelProvider,
    new ModelResponseParser(countries, hsCodeCatalog, profile),
    { ...profile, timeoutMs: config.modelTimeoutMs, maxInputChars: config.maxInputChars }
  );

  const detectionService = new DetectionService(
    state,
    modelClient,
    heuristicExtractor,
    deps.logProvider,
    { defaultApiKey: config.providerApiKey, defaultModel: config.defaultModel }
  );
  const batchService = new BatchService(detectionService, deps.logProvider, {
    concurrency: config.batchConcurrency,
    maxItems: config.batchMaxItems,
  });
  const statsService = new StatsService(state, deps.logProvider);

  return {
    config,
    state,
    detectionService,
    batchService,
    statsService,
    hsCodeCatalog,
    logProvider: deps.logProvider,
    authenticate: createAuthMiddleware(config.serviceApiKeys),
    logging: createRequestLogging(deps.logProvider, state.counters),
  };
}
