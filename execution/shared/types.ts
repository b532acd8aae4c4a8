import type { HandlerCategory, TaskPayload } from "../../agents/types.js";
import type { ScoredCandidate } from "../../routing/keywordTrie.js";

export type ExecutionPath = "fast" | "fallback";

export type DispatchErrorKind = "retry_exhausted" | "handler_fatal" | "cancelled" | "unknown_handler";

export type OutcomeErrorKind = DispatchErrorKind | "circuit_open" | "timed_out";

export type HandlerOutcomeStatus = "success" | "cached" | "circuit_open" | "timed_out" | "error";

/** One dispatch unit: a single candidate handler for a single `process` call. */
export interface Task {
  readonly id: string;
  readonly handlerName: string;
  readonly payload: TaskPayload;
  readonly priority: number;
  readonly submittedAt: number;
  /** Fallback-path attempt number, 0 before the first retry loop. */
  attempt: number;
  /** Handler calls made so far across both paths. */
  invocations: number;
}

export interface DispatchError {
  readonly kind: DispatchErrorKind;
  readonly message: string;
}

interface DispatchOutcomeBase {
  readonly handlerName: string;
  readonly path: ExecutionPath;
  readonly attempts: number;
  readonly latencyMs: number;
  readonly degraded: boolean;
}

export type DispatchOutcome =
  | (DispatchOutcomeBase & { readonly ok: true; readonly value: unknown })
  | (DispatchOutcomeBase & { readonly ok: false; readonly error: DispatchError });

export interface HandlerOutcome {
  readonly handlerName: string;
  readonly status: HandlerOutcomeStatus;
  readonly path?: ExecutionPath;
  readonly attempts: number;
  readonly latencyMs: number;
  readonly value?: unknown;
  readonly error?: {
    readonly kind: OutcomeErrorKind;
    readonly message: string;
  };
}

export interface RankedCandidate extends ScoredCandidate {
  readonly hinted: boolean;
}

export interface AggregatedResponse {
  readonly traceId: string;
  readonly matchedKeywords: readonly string[];
  readonly matchedTags: readonly string[];
  readonly candidateHandlers: readonly RankedCandidate[];
  readonly categories: readonly HandlerCategory[];
  readonly suggestsParallel: boolean;
  readonly outcomes: readonly HandlerOutcome[];
  readonly elapsedMs: number;
}

export interface ProcessOptions {
  readonly hints?: readonly string[];
  readonly deadlineMs?: number;
  readonly signal?: AbortSignal;
  readonly traceId?: string;
}
