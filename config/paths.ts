import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { logger } from "./logger.js";

export type Env = Readonly<Record<string, string | undefined>>;

export function getRouterHome(env: Env = process.env): string {
  return env.ROUTER_HOME ?? path.join(os.homedir(), ".tandem-router");
}

export function getHandlersDir(env: Env = process.env): string {
  return env.ROUTER_HANDLERS_DIR ?? path.resolve("agents", "descriptors");
}

export function getDatabasePath(env: Env = process.env): string {
  return env.ROUTER_DB_PATH ?? path.join(getRouterHome(env), "dispatch.db");
}

export function ensureRouterDirectories(env: Env = process.env): void {
  const dirs = new Set([getRouterHome(env), path.dirname(getDatabasePath(env))]);

  for (const dir of dirs) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info({ dir }, "Created router directory");
    }
  }
}
