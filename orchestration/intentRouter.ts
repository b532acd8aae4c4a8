import { createDefaultHandlerTable, type HandlerTable } from "../agents/handlerTable.js";
import { logger } from "../config/logger.js";
import { loadRouterConfig, type RouterConfig } from "../config/routerConfig.js";
import { detectCapabilities } from "../execution/capabilities.js";
import { CircuitBreaker } from "../execution/circuitBreaker.js";
import { ExecutionEngine } from "../execution/executionEngine.js";
import { ResultCache } from "../execution/resultCache.js";
import type { DispatchEventSink } from "../execution/shared/dispatchEventEmitter.js";
import { TandemDispatcher, type SleepFn } from "../execution/tandemDispatcher.js";
import { WorkerPool } from "../execution/workerPool.js";
import { createDirectorySourceProvider, type SourceProvider } from "../registry/descriptorLoader.js";
import { HandlerRegistry } from "../registry/handlerRegistry.js";

export interface IntentRouterOptions {
  readonly config?: RouterConfig;
  readonly table?: HandlerTable;
  readonly provider?: SourceProvider;
  readonly events?: DispatchEventSink;
  readonly now?: () => number;
  readonly sleep?: SleepFn;
}

/**
 * Assembles the router from explicit parts and performs the first registry
 * load. A failed first load leaves the router unloaded: `process` throws
 * until a later `reload()` succeeds.
 */
export function createIntentRouter(options: IntentRouterOptions = {}): ExecutionEngine {
  const config = options.config ?? loadRouterConfig();
  const table = options.table ?? createDefaultHandlerTable();
  const provider = options.provider ?? createDirectorySourceProvider(config.handlersDir);
  const now = options.now ?? Date.now;

  const capabilities = detectCapabilities(config.dispatch, table);
  const registry = new HandlerRegistry(provider, config.match);

  const engine = new ExecutionEngine({
    registry,
    dispatcher: new TandemDispatcher({
      table,
      capabilities,
      config: config.dispatch,
      now,
      sleep: options.sleep,
    }),
    breaker: new CircuitBreaker(config.breaker, now),
    cache: new ResultCache<unknown>(config.cache, now),
    pool: new WorkerPool(config.engine.poolSize),
    capabilities,
    config: config.engine,
    events: options.events,
    now,
  });

  const initial = engine.reload();
  if (!initial.ok) {
    logger.error({ source: initial.error.source }, "Initial registry load failed, router not ready");
  }

  return engine;
}
