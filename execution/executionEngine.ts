import crypto from "node:crypto";
import type { HandlerCategory, TaskPayload } from "../agents/types.js";
import { logger } from "../config/logger.js";
import type { EngineConfig } from "../config/routerConfig.js";
import type { HandlerRegistry, RegistrySnapshot, ReloadFailure, ReloadResult } from "../registry/handlerRegistry.js";
import type { MatchResult } from "../routing/keywordTrie.js";
import { stripControlCharacters } from "../routing/tokenizer.js";
import type { Capabilities } from "./capabilities.js";
import type { CircuitBreaker, CircuitSnapshot } from "./circuitBreaker.js";
import { fingerprintFor, type CacheStats, type ResultCache } from "./resultCache.js";
import type { DispatchEventSink } from "./shared/dispatchEventEmitter.js";
import { TaskCancelledError, errorMessage } from "./shared/errors.js";
import type {
  AggregatedResponse,
  DispatchOutcome,
  HandlerOutcome,
  ProcessOptions,
  RankedCandidate,
  Task,
} from "./shared/types.js";
import type { TandemDispatcher } from "./tandemDispatcher.js";
import type { WorkerPool } from "./workerPool.js";

const LATENCY_WINDOW = 1_000;

export interface ExecutionEngineOptions {
  readonly registry: HandlerRegistry;
  readonly dispatcher: TandemDispatcher;
  readonly breaker: CircuitBreaker;
  readonly cache: ResultCache<unknown>;
  readonly pool: WorkerPool;
  readonly capabilities: Capabilities;
  readonly config: EngineConfig;
  readonly events?: DispatchEventSink;
  readonly now?: () => number;
}

export interface EngineMetrics {
  readonly requests: number;
  readonly tasks: number;
  readonly taskErrors: number;
  readonly timeouts: number;
  readonly meanLatencyMs: number;
  readonly p95LatencyMs: number;
}

export interface EngineStatus {
  readonly registry: {
    readonly loaded: boolean;
    readonly version: number | null;
    readonly loadedAt: string | null;
    readonly handlers: number;
    readonly keywords: number;
    readonly lastFailure: ReloadFailure | null;
  };
  readonly cache: CacheStats;
  readonly circuits: Readonly<Record<string, CircuitSnapshot>>;
  readonly queue: {
    readonly depth: number;
    readonly active: number;
    readonly poolSize: number;
  };
  readonly fastPath: Capabilities;
  readonly metrics: EngineMetrics;
}

interface CandidatePlan {
  readonly ranked: readonly RankedCandidate[];
  readonly unknownHints: readonly string[];
}

class LatencyWindow {
  private readonly samples: number[] = [];

  record(latencyMs: number): void {
    this.samples.push(latencyMs);
    if (this.samples.length > LATENCY_WINDOW) this.samples.shift();
  }

  mean(): number {
    if (this.samples.length === 0) return 0;
    return this.samples.reduce((sum, value) => sum + value, 0) / this.samples.length;
  }

  percentile(p: number): number {
    if (this.samples.length === 0) return 0;
    const sorted = [...this.samples].sort((a, b) => a - b);
    const index = Math.min(sorted.length - 1, Math.ceil((p / 100) * sorted.length) - 1);
    return sorted[Math.max(0, index)] ?? 0;
  }
}

/**
 * Routes one input to its candidate handlers and runs them under the shared
 * worker pool. Per-handler failures end up in the response; only bad input
 * or a registry that never loaded make `process` throw.
 */
export class ExecutionEngine {
  private readonly registry: HandlerRegistry;
  private readonly dispatcher: TandemDispatcher;
  private readonly breaker: CircuitBreaker;
  private readonly cache: ResultCache<unknown>;
  private readonly pool: WorkerPool;
  private readonly capabilities: Capabilities;
  private readonly config: EngineConfig;
  private readonly events: DispatchEventSink | undefined;
  private readonly now: () => number;
  private readonly latency = new LatencyWindow();
  private requests = 0;
  private tasks = 0;
  private taskErrors = 0;
  private timeouts = 0;

  constructor(options: ExecutionEngineOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.breaker = options.breaker;
    this.cache = options.cache;
    this.pool = options.pool;
    this.capabilities = options.capabilities;
    this.config = options.config;
    this.events = options.events;
    this.now = options.now ?? Date.now;
  }

  async process(inputText: string, options: ProcessOptions = {}): Promise<AggregatedResponse> {
    const started = this.now();
    const snapshot = this.registry.current();
    const match = snapshot.trie.match(inputText);
    const traceId = options.traceId ?? crypto.randomUUID();
    const input = stripControlCharacters(inputText).trim();

    this.requests++;

    const plan = planCandidates(match, snapshot, options.hints ?? []);
    const selected = plan.ranked.slice(0, this.config.maxFanOut);
    const categories = [...new Set(plan.ranked.map((candidate) => candidate.category))].sort();

    if (selected.length === 0 && plan.unknownHints.length === 0) {
      logger.info({ traceId }, "No handlers matched input");
      return this.respond(traceId, match, plan.ranked, categories, [], started);
    }

    this.events?.record({
      traceId,
      eventType: "route:matched",
      message: `Routed to ${String(selected.length)} handler(s)`,
      metadata: {
        matchedKeywords: match.matchedKeywords,
        matchedTags: match.matchedTags,
        candidates: selected.map((candidate) => candidate.name),
        unknownHints: plan.unknownHints,
      },
    });

    const deadlineMs = options.deadlineMs ?? this.config.deadlineMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new TaskCancelledError("timed_out"));
    }, deadlineMs);
    const onCallerAbort = (): void => {
      controller.abort(new TaskCancelledError("cancelled"));
    };

    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    try {
      const outcomes = await Promise.all(
        selected.map((candidate) =>
          this.runTask(candidate, taskPayload(input, match, candidate), controller.signal, traceId),
        ),
      );

      for (const hint of plan.unknownHints) {
        outcomes.push(unknownHintOutcome(hint));
      }

      for (const outcome of outcomes) {
        this.events?.record({
          traceId,
          handler: outcome.handlerName,
          eventType: "task:outcome",
          status: outcome.status,
          message: outcome.error?.message ?? outcome.status,
          level: outcome.status === "error" || outcome.status === "timed_out" ? "warn" : "info",
          metadata: { path: outcome.path, attempts: outcome.attempts, latencyMs: outcome.latencyMs },
        });
      }

      return this.respond(traceId, match, plan.ranked, categories, outcomes, started);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  reload(): ReloadResult {
    const result = this.registry.reload();

    if (result.ok) {
      this.breaker.prune(new Set(this.registry.current().descriptors.keys()));
    }

    this.events?.record({
      traceId: crypto.randomUUID(),
      eventType: "registry:reload",
      status: result.ok ? "ok" : "failed",
      message: result.ok
        ? `Registry version ${String(result.version)} with ${String(result.handlerCount)} handler(s)`
        : `${result.error.source}: ${result.error.message}`,
      level: result.ok ? "info" : "error",
    });

    return result;
  }

  getStatus(): EngineStatus {
    const snapshot = this.registry.isLoaded() ? this.registry.current() : null;

    return {
      registry: {
        loaded: snapshot !== null,
        version: snapshot?.version ?? null,
        loadedAt: snapshot?.loadedAt.toISOString() ?? null,
        handlers: snapshot?.descriptors.size ?? 0,
        keywords: snapshot?.trie.stats.keywords ?? 0,
        lastFailure: this.registry.getLastFailure(),
      },
      cache: this.cache.stats(),
      circuits: this.breaker.snapshot(),
      queue: {
        depth: this.pool.queued,
        active: this.pool.active,
        poolSize: this.pool.size,
      },
      fastPath: this.capabilities,
      metrics: {
        requests: this.requests,
        tasks: this.tasks,
        taskErrors: this.taskErrors,
        timeouts: this.timeouts,
        meanLatencyMs: this.latency.mean(),
        p95LatencyMs: this.latency.percentile(95),
      },
    };
  }

  private async runTask(
    candidate: RankedCandidate,
    payload: TaskPayload,
    signal: AbortSignal,
    traceId: string,
  ): Promise<HandlerOutcome> {
    const name = candidate.name;
    const taskStarted = this.now();

    const decision = this.breaker.check(name);
    if (!decision.allowed) {
      logger.info({ handler: name, traceId, retryAfterMs: decision.retryAfterMs }, "Circuit open, handler skipped");
      return {
        handlerName: name,
        status: "circuit_open",
        attempts: 0,
        latencyMs: 0,
        error: {
          kind: "circuit_open",
          message: `Circuit open for "${name}", retry in ${String(decision.retryAfterMs)}ms`,
        },
      };
    }

    const fingerprint = fingerprintFor(payload.normalizedInput, name);
    const cached = this.cache.get(fingerprint);
    if (cached.hit) {
      if (decision.trial) this.breaker.abandonTrial(name);
      return {
        handlerName: name,
        status: "cached",
        attempts: 0,
        latencyMs: this.now() - taskStarted,
        value: cached.value,
      };
    }

    const task: Task = {
      id: crypto.randomUUID(),
      handlerName: name,
      payload,
      priority: candidate.priority,
      submittedAt: this.now(),
      attempt: 0,
      invocations: 0,
    };

    let dispatched = false;
    this.tasks++;

    try {
      const outcome = await this.pool.run({
        priority: task.priority,
        signal,
        label: name,
        execute: (taskSignal) => {
          dispatched = true;
          return this.dispatcher.invoke(task, taskSignal);
        },
      });
      return this.settle(task, fingerprint, outcome, signal, decision.trial);
    } catch (error) {
      return this.settleRejected(task, error, dispatched, decision.trial, taskStarted, traceId);
    }
  }

  private settle(
    task: Task,
    fingerprint: string,
    outcome: DispatchOutcome,
    signal: AbortSignal,
    trial: boolean,
  ): HandlerOutcome {
    this.latency.record(outcome.latencyMs);

    if (outcome.ok) {
      this.breaker.recordSuccess(task.handlerName);
      this.cache.put(fingerprint, outcome.value);
      return {
        handlerName: task.handlerName,
        status: "success",
        path: outcome.path,
        attempts: outcome.attempts,
        latencyMs: outcome.latencyMs,
        value: outcome.value,
      };
    }

    const cancelled = outcome.error.kind === "cancelled";
    const timedOut = cancelled && signalTimedOut(signal);
    if (cancelled && !timedOut) {
      if (trial) this.breaker.abandonTrial(task.handlerName);
    } else {
      this.breaker.recordFailure(task.handlerName);
    }
    this.taskErrors++;
    if (timedOut) this.timeouts++;

    return {
      handlerName: task.handlerName,
      status: timedOut ? "timed_out" : "error",
      path: outcome.path,
      attempts: outcome.attempts,
      latencyMs: outcome.latencyMs,
      error: timedOut ? { kind: "timed_out", message: "Task exceeded the call deadline" } : outcome.error,
    };
  }

  private settleRejected(
    task: Task,
    error: unknown,
    dispatched: boolean,
    trial: boolean,
    taskStarted: number,
    traceId: string,
  ): HandlerOutcome {
    const latencyMs = this.now() - taskStarted;
    this.taskErrors++;

    if (error instanceof TaskCancelledError) {
      const timedOut = error.reason === "timed_out";
      if (dispatched && timedOut) {
        this.breaker.recordFailure(task.handlerName);
        this.latency.record(latencyMs);
      } else if (trial) {
        this.breaker.abandonTrial(task.handlerName);
      }

      if (timedOut) {
        this.timeouts++;
        logger.warn({ handler: task.handlerName, taskId: task.id, traceId, dispatched }, "Task timed out");
      }

      return {
        handlerName: task.handlerName,
        status: timedOut ? "timed_out" : "error",
        attempts: task.invocations,
        latencyMs,
        error: { kind: timedOut ? "timed_out" : "cancelled", message: error.message },
      };
    }

    this.breaker.recordFailure(task.handlerName);
    logger.error({ handler: task.handlerName, taskId: task.id, traceId, error: errorMessage(error) }, "Task failed unexpectedly");
    return {
      handlerName: task.handlerName,
      status: "error",
      attempts: task.invocations,
      latencyMs,
      error: { kind: "handler_fatal", message: errorMessage(error) },
    };
  }

  private respond(
    traceId: string,
    match: MatchResult,
    ranked: readonly RankedCandidate[],
    categories: readonly HandlerCategory[],
    outcomes: readonly HandlerOutcome[],
    started: number,
  ): AggregatedResponse {
    return {
      traceId,
      matchedKeywords: match.matchedKeywords,
      matchedTags: match.matchedTags,
      candidateHandlers: ranked,
      categories,
      suggestsParallel: match.suggestsParallel,
      outcomes,
      elapsedMs: this.now() - started,
    };
  }
}

/** Hinted handlers first, in hint order, then the matcher's ranking. */
export function planCandidates(
  match: MatchResult,
  snapshot: RegistrySnapshot,
  hints: readonly string[],
): CandidatePlan {
  const matchedByName = new Map(match.candidateHandlers.map((candidate) => [candidate.name, candidate]));
  const ranked: RankedCandidate[] = [];
  const unknownHints: string[] = [];
  const seen = new Set<string>();

  for (const rawHint of hints) {
    const name = rawHint.trim();
    if (name.length === 0 || seen.has(name)) continue;
    seen.add(name);

    const descriptor = snapshot.descriptors.get(name);
    if (!descriptor) {
      unknownHints.push(name);
      continue;
    }

    ranked.push({
      name,
      score: matchedByName.get(name)?.score ?? 0,
      priority: descriptor.priority,
      category: descriptor.category,
      hinted: true,
    });
  }

  for (const candidate of match.candidateHandlers) {
    if (seen.has(candidate.name)) continue;
    ranked.push({ ...candidate, hinted: false });
  }

  return { ranked, unknownHints };
}

function taskPayload(input: string, match: MatchResult, candidate: RankedCandidate): TaskPayload {
  return {
    input,
    normalizedInput: match.normalizedInput,
    matchedKeywords: match.matchedKeywords,
    hinted: candidate.hinted,
  };
}

function unknownHintOutcome(name: string): HandlerOutcome {
  return {
    handlerName: name,
    status: "error",
    attempts: 0,
    latencyMs: 0,
    error: { kind: "unknown_handler", message: `No handler named "${name}" is registered` },
  };
}

function signalTimedOut(signal: AbortSignal): boolean {
  const reason: unknown = signal.reason;
  return signal.aborted && reason instanceof TaskCancelledError && reason.reason === "timed_out";
}
