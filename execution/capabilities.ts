import type { HandlerTable } from "../agents/handlerTable.js";
import { logger } from "../config/logger.js";
import type { DispatchConfig } from "../config/routerConfig.js";

export interface Capabilities {
  readonly fastPath: boolean;
  readonly reason: string;
}

/** Runs once when the router is assembled; the dispatcher only reads the result. */
export function detectCapabilities(config: DispatchConfig, table: HandlerTable): Capabilities {
  const capabilities = resolveCapabilities(config, table);
  logger.info(capabilities, "Dispatch capabilities detected");
  return Object.freeze(capabilities);
}

function resolveCapabilities(config: DispatchConfig, table: HandlerTable): Capabilities {
  if (config.mode === "fallback-only") {
    return { fastPath: false, reason: "dispatch mode is fallback-only" };
  }
  if (!config.fastPathEnabled) {
    return { fastPath: false, reason: "fast path disabled by ROUTER_FAST_PATH" };
  }
  if (!table.hasFastPath()) {
    return { fastPath: false, reason: "no handler registers a fast path" };
  }
  return { fastPath: true, reason: "fast path available" };
}
