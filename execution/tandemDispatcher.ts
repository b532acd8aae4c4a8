import { setTimeout as delay } from "node:timers/promises";
import type { HandlerTable } from "../agents/handlerTable.js";
import type { HandlerBinding, HandlerFn } from "../agents/types.js";
import { logger } from "../config/logger.js";
import { DEFAULT_DISPATCH_CONFIG, type DispatchConfig } from "../config/routerConfig.js";
import type { Capabilities } from "./capabilities.js";
import { classifyHandlerError, errorMessage } from "./shared/errors.js";
import type { DispatchError, DispatchOutcome, ExecutionPath, Task } from "./shared/types.js";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface TandemDispatcherOptions {
  readonly table: HandlerTable;
  readonly capabilities: Capabilities;
  readonly config?: DispatchConfig;
  readonly now?: () => number;
  readonly sleep?: SleepFn;
}

export interface FastPathHealth {
  readonly samples: number;
  readonly failureRate: number;
  readonly meanLatencyMs: number;
  readonly usable: boolean;
}

interface PathSample {
  readonly ok: boolean;
  readonly latencyMs: number;
  readonly at: number;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Sliding window over the most recent fast-path outcomes of one handler.
 * Samples older than the TTL are dropped, so an unhealthy fast path gets
 * tried again once its failures have aged out.
 */
class PathHealth {
  private samples: PathSample[] = [];

  constructor(
    private readonly windowSize: number,
    private readonly ttlMs: number,
  ) {}

  record(ok: boolean, latencyMs: number, at: number): void {
    this.samples.push({ ok, latencyMs, at });
    if (this.samples.length > this.windowSize) this.samples.shift();
  }

  prune(now: number): void {
    const oldest = now - this.ttlMs;
    this.samples = this.samples.filter((sample) => sample.at > oldest);
  }

  get count(): number {
    return this.samples.length;
  }

  failureRate(): number {
    if (this.samples.length === 0) return 0;
    return this.samples.filter((sample) => !sample.ok).length / this.samples.length;
  }

  meanLatency(): number {
    if (this.samples.length === 0) return 0;
    return this.samples.reduce((sum, sample) => sum + sample.latencyMs, 0) / this.samples.length;
  }
}

export function backoffDelay(attempt: number, config: DispatchConfig): number {
  return Math.min(config.baseDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
}

/**
 * Chooses the fast path when it is available and healthy, and degrades to the
 * fallback path inside the same call when it fails. The fallback path retries
 * transient failures with exponential backoff.
 */
export class TandemDispatcher {
  private readonly table: HandlerTable;
  private readonly capabilities: Capabilities;
  private readonly config: DispatchConfig;
  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly fastHealth = new Map<string, PathHealth>();

  constructor(options: TandemDispatcherOptions) {
    this.table = options.table;
    this.capabilities = options.capabilities;
    this.config = options.config ?? DEFAULT_DISPATCH_CONFIG;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async invoke(task: Task, signal: AbortSignal): Promise<DispatchOutcome> {
    const started = this.now();
    const binding = this.table.resolve(task.handlerName);

    if (!binding) {
      return this.failure(task, "fallback", 0, started, false, {
        kind: "unknown_handler",
        message: `No implementation registered for handler "${task.handlerName}"`,
      });
    }

    let attempts = 0;
    let degraded = false;

    if (binding.fast && this.fastPathUsable(task.handlerName)) {
      attempts++;
      const fastStarted = this.now();
      try {
        const value = await this.call(binding.fast, task, 0, signal);
        const finished = this.now();
        this.healthOf(task.handlerName).record(true, finished - fastStarted, finished);
        return this.success(task, "fast", attempts, started, false, value);
      } catch (error) {
        const finished = this.now();
        this.healthOf(task.handlerName).record(false, finished - fastStarted, finished);
        if (signal.aborted) {
          return this.cancelled(task, "fast", attempts, started, false);
        }
        degraded = true;
        logger.warn(
          { handler: task.handlerName, taskId: task.id, error: errorMessage(error) },
          "Fast path failed, degrading to fallback path",
        );
      }
    }

    return this.runFallback(binding, task, signal, started, attempts, degraded);
  }

  fastPathHealth(handlerName: string): FastPathHealth {
    const health = this.fastHealth.get(handlerName);
    health?.prune(this.now());
    return {
      samples: health?.count ?? 0,
      failureRate: health?.failureRate() ?? 0,
      meanLatencyMs: health?.meanLatency() ?? 0,
      usable: this.fastPathUsable(handlerName),
    };
  }

  private async runFallback(
    binding: HandlerBinding,
    task: Task,
    signal: AbortSignal,
    started: number,
    priorAttempts: number,
    degraded: boolean,
  ): Promise<DispatchOutcome> {
    let attempts = priorAttempts;
    let lastMessage = "";

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (signal.aborted) {
        return this.cancelled(task, "fallback", attempts, started, degraded);
      }

      task.attempt = attempt;
      attempts++;

      try {
        const value = await this.call(binding.fallback, task, attempt, signal);
        return this.success(task, "fallback", attempts, started, degraded, value);
      } catch (error) {
        if (signal.aborted) {
          return this.cancelled(task, "fallback", attempts, started, degraded);
        }

        lastMessage = errorMessage(error);
        const failureClass = classifyHandlerError(error);

        if (failureClass === "cancelled") {
          return this.cancelled(task, "fallback", attempts, started, degraded);
        }

        if (failureClass === "fatal") {
          logger.warn(
            { handler: task.handlerName, taskId: task.id, attempt, error: lastMessage },
            "Handler failed with a non-retryable error, aborting",
          );
          return this.failure(task, "fallback", attempts, started, degraded, {
            kind: "handler_fatal",
            message: lastMessage,
          });
        }

        logger.warn(
          { handler: task.handlerName, taskId: task.id, attempt, error: lastMessage },
          "Handler failed with a transient error, will retry",
        );
      }

      if (attempt < this.config.maxAttempts) {
        try {
          await this.sleep(backoffDelay(attempt, this.config), signal);
        } catch (error) {
          logger.debug({ handler: task.handlerName, error: errorMessage(error) }, "Backoff interrupted");
          return this.cancelled(task, "fallback", attempts, started, degraded);
        }
      }
    }

    logger.error(
      { handler: task.handlerName, taskId: task.id, attempts: this.config.maxAttempts, lastMessage },
      "Fallback path failed after all retries",
    );

    return this.failure(task, "fallback", attempts, started, degraded, {
      kind: "retry_exhausted",
      message: `Fallback path failed after ${String(this.config.maxAttempts)} attempts: ${lastMessage}`,
    });
  }

  private call(fn: HandlerFn, task: Task, attempt: number, signal: AbortSignal): Promise<unknown> {
    task.invocations++;
    return fn({ handlerName: task.handlerName, payload: task.payload, attempt, signal });
  }

  private fastPathUsable(handlerName: string): boolean {
    if (!this.capabilities.fastPath) return false;

    const health = this.fastHealth.get(handlerName);
    health?.prune(this.now());
    if (!health || health.count < this.config.fastMinSamples) return true;

    return (
      health.failureRate() < this.config.fastFailureRate &&
      health.meanLatency() <= this.config.fastLatencyBudgetMs
    );
  }

  private healthOf(handlerName: string): PathHealth {
    let health = this.fastHealth.get(handlerName);
    if (!health) {
      health = new PathHealth(this.config.fastWindow, this.config.fastSampleTtlMs);
      this.fastHealth.set(handlerName, health);
    }
    return health;
  }

  private success(
    task: Task,
    path: ExecutionPath,
    attempts: number,
    started: number,
    degraded: boolean,
    value: unknown,
  ): DispatchOutcome {
    return {
      ok: true,
      handlerName: task.handlerName,
      path,
      attempts,
      latencyMs: this.now() - started,
      degraded,
      value,
    };
  }

  private failure(
    task: Task,
    path: ExecutionPath,
    attempts: number,
    started: number,
    degraded: boolean,
    error: DispatchError,
  ): DispatchOutcome {
    return {
      ok: false,
      handlerName: task.handlerName,
      path,
      attempts,
      latencyMs: this.now() - started,
      degraded,
      error,
    };
  }

  private cancelled(
    task: Task,
    path: ExecutionPath,
    attempts: number,
    started: number,
    degraded: boolean,
  ): DispatchOutcome {
    return this.failure(task, path, attempts, started, degraded, {
      kind: "cancelled",
      message: "Dispatch cancelled before completion",
    });
  }
}
