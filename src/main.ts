#!/usr/bin/env node
import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../config/logger.js";
import { ensureRouterDirectories } from "../config/paths.js";
import { loadRouterConfig, type RouterConfig } from "../config/routerConfig.js";
import { createEventEmitter } from "../execution/shared/dispatchEventEmitter.js";
import { InputTooLargeError, RegistryNotLoadedError } from "../execution/shared/errors.js";
import { createIntentRouter } from "../orchestration/intentRouter.js";
import { createDirectorySourceProvider } from "../registry/descriptorLoader.js";
import { HandlerRegistry } from "../registry/handlerRegistry.js";
import { openAuditStore, readAuditReport, readTrace } from "../state/dispatchEvents.js";

const USAGE = `Usage:
  tandem-router route <text...> [--hint NAME]... [--deadline MS]
  tandem-router status
  tandem-router validate
  tandem-router events <traceId>
  tandem-router audit [--limit N] [--since ISO_TIME]`;

interface RouteArgs {
  readonly text: string;
  readonly hints: readonly string[];
  readonly deadlineMs?: number;
}

function parseRouteArgs(args: readonly string[]): RouteArgs {
  const words: string[] = [];
  const hints: string[] = [];
  let deadlineMs: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--hint") {
      const value = args[++i];
      if (value) hints.push(value);
    } else if (arg === "--deadline") {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error("--deadline must be a positive integer (milliseconds)");
      }
      deadlineMs = value;
    } else {
      words.push(arg);
    }
  }

  return { text: words.join(" "), hints, deadlineMs };
}

interface AuditArgs {
  readonly limit?: number;
  readonly sinceIso?: string;
}

function parseAuditArgs(args: readonly string[]): AuditArgs {
  let limit: number | undefined;
  let sinceIso: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--limit") {
      const value = Number(args[++i]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error("--limit must be a positive integer");
      }
      limit = value;
    } else if (arg === "--since") {
      const value = args[++i] ?? "";
      if (Number.isNaN(Date.parse(value))) {
        throw new Error(`--since must be an ISO timestamp. Got: "${value}"`);
      }
      sinceIso = new Date(value).toISOString();
    } else {
      throw new Error(`Unknown audit option: ${String(arg)}`);
    }
  }

  return { limit, sinceIso };
}

function openStore(routerConfig: RouterConfig): BetterSqlite3.Database {
  ensureRouterDirectories();
  return openAuditStore(routerConfig.databasePath, routerConfig.auditRetentionDays);
}

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

const [command = "help", ...rest] = process.argv.slice(2);
const config = loadRouterConfig();

let db: BetterSqlite3.Database | null = null;

try {
  switch (command) {
    case "route": {
      if (config.auditEnabled) {
        db = openStore(config);
      }
      const router = createIntentRouter({ config, events: db ? createEventEmitter(db) : undefined });
      const { text, hints, deadlineMs } = parseRouteArgs(rest);
      const response = await router.process(text, { hints, deadlineMs });
      print(response);
      break;
    }
    case "status": {
      const router = createIntentRouter({ config });
      print(router.getStatus());
      break;
    }
    case "validate": {
      const registry = new HandlerRegistry(createDirectorySourceProvider(config.handlersDir), config.match);
      const result = registry.reload();
      print(result);
      if (!result.ok) process.exitCode = 1;
      break;
    }
    case "events": {
      const traceId = rest[0];
      if (!traceId) throw new Error("events requires a trace id");
      db = openStore(config);
      print({ traceId, events: readTrace(db, traceId) });
      break;
    }
    case "audit": {
      const args = parseAuditArgs(rest);
      db = openStore(config);
      print(readAuditReport(db, args));
      break;
    }
    default:
      process.stdout.write(`${USAGE}\n`);
      if (command !== "help") process.exitCode = 1;
  }
} catch (error) {
  if (error instanceof InputTooLargeError || error instanceof RegistryNotLoadedError) {
    print({ ok: false, error: error.name, message: error.message });
  } else {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ command, error: message }, "Command failed");
    print({ ok: false, error: "CommandFailed", message });
  }
  process.exitCode = 1;
} finally {
  db?.close();
}
