import { logger } from "../config/logger.js";
import { DEFAULT_BREAKER_CONFIG, type BreakerConfig } from "../config/routerConfig.js";

export type CircuitStatus = "CLOSED" | "OPEN" | "HALF_OPEN";

export type CircuitDecision =
  | { readonly allowed: true; readonly trial: boolean }
  | { readonly allowed: false; readonly retryAfterMs: number };

export interface CircuitSnapshot {
  readonly status: CircuitStatus;
  readonly consecutiveFailures: number;
  readonly openedAt?: number;
  readonly coolDownMs: number;
}

type CircuitEvent = "request" | "success" | "failure" | "abandon" | "tick";

interface CircuitState {
  status: CircuitStatus;
  consecutiveFailures: number;
  /** Failure times of the current CLOSED run, oldest first. */
  recentFailures: number[];
  openedAt: number | null;
  coolDownMs: number;
  trialInFlight: boolean;
}

const ALLOWED: CircuitDecision = { allowed: true, trial: false };
const TRIAL: CircuitDecision = { allowed: true, trial: true };

/**
 * Per-handler CLOSED / OPEN / HALF_OPEN state machine. All state changes go
 * through `transition`; the breaker never waits, it only answers.
 */
export class CircuitBreaker {
  private readonly circuits = new Map<string, CircuitState>();

  constructor(
    private readonly config: BreakerConfig = DEFAULT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now,
  ) {}

  check(handler: string): CircuitDecision {
    return this.transition(handler, "request");
  }

  recordSuccess(handler: string): void {
    this.transition(handler, "success");
  }

  recordFailure(handler: string): void {
    this.transition(handler, "failure");
  }

  /** Frees a granted trial that never reached the handler. */
  abandonTrial(handler: string): void {
    this.transition(handler, "abandon");
  }

  snapshot(): Readonly<Record<string, CircuitSnapshot>> {
    const result: Record<string, CircuitSnapshot> = {};
    for (const handler of [...this.circuits.keys()].sort()) {
      this.transition(handler, "tick");
      const state = this.circuits.get(handler);
      if (!state) continue;
      result[handler] = {
        status: state.status,
        consecutiveFailures: state.consecutiveFailures,
        ...(state.openedAt !== null && state.status !== "CLOSED" ? { openedAt: state.openedAt } : {}),
        coolDownMs: state.coolDownMs,
      };
    }
    return result;
  }

  statusOf(handler: string): CircuitStatus {
    this.transition(handler, "tick");
    return this.circuits.get(handler)?.status ?? "CLOSED";
  }

  reset(handler?: string): void {
    if (handler === undefined) {
      this.circuits.clear();
      return;
    }
    this.circuits.delete(handler);
  }

  /** Forgets circuits of handlers that are no longer registered. */
  prune(activeHandlers: ReadonlySet<string>): void {
    for (const handler of [...this.circuits.keys()]) {
      if (!activeHandlers.has(handler)) this.circuits.delete(handler);
    }
  }

  private transition(handler: string, event: CircuitEvent): CircuitDecision {
    const now = this.now();
    const state = this.circuits.get(handler) ?? this.createState();
    if (!this.circuits.has(handler)) {
      if (event === "tick" || event === "abandon") return ALLOWED;
      this.circuits.set(handler, state);
    }

    if (state.status === "OPEN" && state.openedAt !== null && now - state.openedAt >= state.coolDownMs) {
      state.status = "HALF_OPEN";
      state.trialInFlight = false;
      logger.info({ handler, coolDownMs: state.coolDownMs }, "Circuit half-open, next call is a trial");
    }

    switch (event) {
      case "tick":
        return ALLOWED;
      case "request":
        return this.onRequest(state, now);
      case "success":
        this.onSuccess(handler, state);
        return ALLOWED;
      case "failure":
        this.onFailure(handler, state, now);
        return ALLOWED;
      case "abandon":
        if (state.status === "HALF_OPEN") state.trialInFlight = false;
        return ALLOWED;
    }
  }

  private onRequest(state: CircuitState, now: number): CircuitDecision {
    if (state.status === "CLOSED") return ALLOWED;

    if (state.status === "HALF_OPEN" && !state.trialInFlight) {
      state.trialInFlight = true;
      return TRIAL;
    }

    const openedAt = state.openedAt ?? now;
    return { allowed: false, retryAfterMs: Math.max(0, openedAt + state.coolDownMs - now) };
  }

  private onSuccess(handler: string, state: CircuitState): void {
    if (state.status === "OPEN") return;

    if (state.status === "HALF_OPEN") {
      logger.info({ handler }, "Circuit closed after successful trial");
    }
    state.status = "CLOSED";
    state.consecutiveFailures = 0;
    state.recentFailures = [];
    state.openedAt = null;
    state.coolDownMs = this.config.coolDownMs;
    state.trialInFlight = false;
  }

  private onFailure(handler: string, state: CircuitState, now: number): void {
    if (state.status === "OPEN") {
      state.consecutiveFailures++;
      return;
    }

    if (state.status === "HALF_OPEN") {
      state.status = "OPEN";
      state.consecutiveFailures++;
      state.openedAt = now;
      state.trialInFlight = false;
      state.coolDownMs = Math.min(state.coolDownMs * this.config.backoffMultiplier, this.config.maxCoolDownMs);
      logger.warn({ handler, coolDownMs: state.coolDownMs }, "Circuit trial failed, reopened");
      return;
    }

    const windowStart = now - this.config.windowMs;
    state.recentFailures = state.recentFailures.filter((at) => at >= windowStart);
    state.recentFailures.push(now);
    state.consecutiveFailures = state.recentFailures.length;

    if (state.consecutiveFailures >= this.config.failureThreshold) {
      state.status = "OPEN";
      state.openedAt = now;
      state.recentFailures = [];
      state.coolDownMs = this.config.coolDownMs;
      logger.warn(
        { handler, failures: state.consecutiveFailures, coolDownMs: state.coolDownMs },
        "Circuit opened",
      );
    }
  }

  private createState(): CircuitState {
    return {
      status: "CLOSED",
      consecutiveFailures: 0,
      recentFailures: [],
      openedAt: null,
      coolDownMs: this.config.coolDownMs,
      trialInFlight: false,
    };
  }
}
