import os from "node:os";
import { getDatabasePath, getHandlersDir, type Env } from "./paths.js";

export type DispatchMode = "auto" | "fallback-only";

export interface MatchConfig {
  readonly maxInputLength: number;
  readonly phraseBonus: number;
  readonly parallelRatio: number;
  readonly tagWeight: number;
}

export interface EngineConfig {
  readonly maxFanOut: number;
  readonly poolSize: number;
  readonly deadlineMs: number;
}

export interface CacheConfig {
  readonly capacity: number;
  readonly ttlMs: number;
}

export interface BreakerConfig {
  readonly failureThreshold: number;
  readonly windowMs: number;
  readonly coolDownMs: number;
  readonly backoffMultiplier: number;
  readonly maxCoolDownMs: number;
}

export interface DispatchConfig {
  readonly mode: DispatchMode;
  readonly fastPathEnabled: boolean;
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly fastFailureRate: number;
  readonly fastWindow: number;
  readonly fastMinSamples: number;
  readonly fastLatencyBudgetMs: number;
  readonly fastSampleTtlMs: number;
}

export interface RouterConfig {
  readonly handlersDir: string;
  readonly databasePath: string;
  readonly auditEnabled: boolean;
  readonly auditRetentionDays: number;
  readonly match: MatchConfig;
  readonly engine: EngineConfig;
  readonly cache: CacheConfig;
  readonly breaker: BreakerConfig;
  readonly dispatch: DispatchConfig;
}

const MAX_DEFAULT_POOL_SIZE = 16;
const VALID_DISPATCH_MODES: readonly DispatchMode[] = ["auto", "fallback-only"];
const FALSE_VALUES: ReadonlySet<string> = new Set(["0", "false", "no", "off"]);
const TRUE_VALUES: ReadonlySet<string> = new Set(["1", "true", "yes", "on"]);

export const DEFAULT_MATCH_CONFIG: MatchConfig = {
  maxInputLength: 10_000,
  phraseBonus: 1.5,
  parallelRatio: 0.5,
  tagWeight: 0.5,
};

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  capacity: 100,
  ttlMs: 3_600_000,
};

export const DEFAULT_BREAKER_CONFIG: BreakerConfig = {
  failureThreshold: 5,
  windowMs: 60_000,
  coolDownMs: 30_000,
  backoffMultiplier: 2,
  maxCoolDownMs: 300_000,
};

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  mode: "auto",
  fastPathEnabled: true,
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 2_000,
  fastFailureRate: 0.5,
  fastWindow: 20,
  fastMinSamples: 5,
  fastLatencyBudgetMs: 1_000,
  fastSampleTtlMs: 60_000,
};

export const DEFAULT_AUDIT_RETENTION_DAYS = 30;

export function defaultPoolSize(): number {
  return Math.max(1, Math.min(os.availableParallelism(), MAX_DEFAULT_POOL_SIZE));
}

export function loadRouterConfig(env: Env = process.env): RouterConfig {
  return {
    handlersDir: getHandlersDir(env),
    databasePath: getDatabasePath(env),
    auditEnabled: readFlag(env, "ROUTER_AUDIT", false),
    auditRetentionDays: readInteger(env, "ROUTER_AUDIT_RETENTION_DAYS", DEFAULT_AUDIT_RETENTION_DAYS),
    match: {
      maxInputLength: readInteger(env, "ROUTER_MAX_INPUT_LENGTH", DEFAULT_MATCH_CONFIG.maxInputLength),
      phraseBonus: readRatio(env, "ROUTER_PHRASE_BONUS", DEFAULT_MATCH_CONFIG.phraseBonus, 1),
      parallelRatio: readRatio(env, "ROUTER_PARALLEL_RATIO", DEFAULT_MATCH_CONFIG.parallelRatio, 0),
      tagWeight: readRatio(env, "ROUTER_TAG_WEIGHT", DEFAULT_MATCH_CONFIG.tagWeight, 0),
    },
    engine: {
      maxFanOut: readInteger(env, "ROUTER_MAX_FANOUT", 5),
      poolSize: readInteger(env, "ROUTER_POOL_SIZE", defaultPoolSize()),
      deadlineMs: readInteger(env, "ROUTER_DEADLINE_MS", 30_000),
    },
    cache: {
      capacity: readInteger(env, "ROUTER_CACHE_CAPACITY", DEFAULT_CACHE_CONFIG.capacity),
      ttlMs: readInteger(env, "ROUTER_CACHE_TTL_MS", DEFAULT_CACHE_CONFIG.ttlMs),
    },
    breaker: {
      failureThreshold: readInteger(env, "ROUTER_BREAKER_THRESHOLD", DEFAULT_BREAKER_CONFIG.failureThreshold),
      windowMs: readInteger(env, "ROUTER_BREAKER_WINDOW_MS", DEFAULT_BREAKER_CONFIG.windowMs),
      coolDownMs: readInteger(env, "ROUTER_BREAKER_COOLDOWN_MS", DEFAULT_BREAKER_CONFIG.coolDownMs),
      backoffMultiplier: readRatio(env, "ROUTER_BREAKER_BACKOFF", DEFAULT_BREAKER_CONFIG.backoffMultiplier, 1),
      maxCoolDownMs: readInteger(env, "ROUTER_BREAKER_MAX_COOLDOWN_MS", DEFAULT_BREAKER_CONFIG.maxCoolDownMs),
    },
    dispatch: {
      mode: readDispatchMode(env),
      fastPathEnabled: readFlag(env, "ROUTER_FAST_PATH", DEFAULT_DISPATCH_CONFIG.fastPathEnabled),
      maxAttempts: readInteger(env, "ROUTER_MAX_ATTEMPTS", DEFAULT_DISPATCH_CONFIG.maxAttempts),
      baseDelayMs: readInteger(env, "ROUTER_BACKOFF_BASE_MS", DEFAULT_DISPATCH_CONFIG.baseDelayMs),
      maxDelayMs: readInteger(env, "ROUTER_BACKOFF_MAX_MS", DEFAULT_DISPATCH_CONFIG.maxDelayMs),
      fastFailureRate: readRatio(env, "ROUTER_FAST_FAILURE_RATE", DEFAULT_DISPATCH_CONFIG.fastFailureRate, 0),
      fastWindow: readInteger(env, "ROUTER_FAST_WINDOW", DEFAULT_DISPATCH_CONFIG.fastWindow),
      fastMinSamples: readInteger(env, "ROUTER_FAST_MIN_SAMPLES", DEFAULT_DISPATCH_CONFIG.fastMinSamples),
      fastLatencyBudgetMs: readInteger(
        env,
        "ROUTER_FAST_LATENCY_BUDGET_MS",
        DEFAULT_DISPATCH_CONFIG.fastLatencyBudgetMs,
      ),
      fastSampleTtlMs: readInteger(env, "ROUTER_FAST_SAMPLE_TTL_MS", DEFAULT_DISPATCH_CONFIG.fastSampleTtlMs),
    },
  };
}

function readRaw(env: Env, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim().length === 0) return undefined;
  return value.trim();
}

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;

  const num = Number(raw);
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigError(`${key} must be a positive integer. Got: "${raw}"`);
  }
  return num;
}

function readRatio(env: Env, key: string, fallback: number, min: number): number {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;

  const num = Number(raw);
  if (!Number.isFinite(num) || num < min) {
    throw new ConfigError(`${key} must be a number >= ${String(min)}. Got: "${raw}"`);
  }
  return num;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = readRaw(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new ConfigError(`${key} must be a boolean flag (1/0, true/false). Got: "${raw}"`);
}

function readDispatchMode(env: Env): DispatchMode {
  const raw = readRaw(env, "ROUTER_DISPATCH_MODE");
  if (raw === undefined) return DEFAULT_DISPATCH_CONFIG.mode;
  const mode = VALID_DISPATCH_MODES.find((candidate) => candidate === raw);
  if (!mode) {
    throw new ConfigError(
      `ROUTER_DISPATCH_MODE must be one of: ${VALID_DISPATCH_MODES.join(", ")}. Got: "${raw}"`,
    );
  }
  return mode;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
