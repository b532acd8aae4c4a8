import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { BreakerConfig } from "../config/routerConfig.js";
import { CircuitBreaker } from "./circuitBreaker.js";

const CONFIG: BreakerConfig = {
  failureThreshold: 3,
  windowMs: 1_000,
  coolDownMs: 500,
  backoffMultiplier: 2,
  maxCoolDownMs: 1_500,
};

function createBreaker(): { breaker: CircuitBreaker; advance: (ms: number) => void } {
  let current = 10_000;
  const breaker = new CircuitBreaker(CONFIG, () => current);
  return {
    breaker,
    advance: (ms) => {
      current += ms;
    },
  };
}

function fail(breaker: CircuitBreaker, handler: string, times: number): void {
  for (let i = 0; i < times; i++) breaker.recordFailure(handler);
}

describe("CircuitBreaker", () => {
  it("should allow calls to an unknown handler", () => {
    const { breaker } = createBreaker();

    assert.deepEqual(breaker.check("SECURITY"), { allowed: true, trial: false });
    assert.equal(breaker.statusOf("SECURITY"), "CLOSED");
  });

  it("should open after the failure threshold", () => {
    const { breaker } = createBreaker();

    fail(breaker, "SECURITY", 2);
    assert.equal(breaker.statusOf("SECURITY"), "CLOSED");

    fail(breaker, "SECURITY", 1);
    assert.equal(breaker.statusOf("SECURITY"), "OPEN");
    assert.deepEqual(breaker.check("SECURITY"), { allowed: false, retryAfterMs: 500 });
  });

  it("should keep circuits independent per handler", () => {
    const { breaker } = createBreaker();

    fail(breaker, "SECURITY", 3);

    assert.equal(breaker.check("OPTIMIZER").allowed, true);
  });

  it("should reset the count on success", () => {
    const { breaker } = createBreaker();

    fail(breaker, "SECURITY", 2);
    breaker.recordSuccess("SECURITY");
    fail(breaker, "SECURITY", 2);

    assert.equal(breaker.statusOf("SECURITY"), "CLOSED");
  });

  it("should forget failures older than the window", () => {
    const { breaker, advance } = createBreaker();

    fail(breaker, "SECURITY", 2);
    advance(1_001);
    fail(breaker, "SECURITY", 1);

    assert.equal(breaker.statusOf("SECURITY"), "CLOSED");
    assert.equal(breaker.snapshot()["SECURITY"]?.consecutiveFailures, 1);
  });

  it("should not open on failures spread wider than the window", () => {
    const { breaker, advance } = createBreaker();

    breaker.recordFailure("SECURITY");
    advance(900);
    breaker.recordFailure("SECURITY");
    advance(900);
    breaker.recordFailure("SECURITY");

    assert.equal(breaker.statusOf("SECURITY"), "CLOSED");
    assert.equal(breaker.snapshot()["SECURITY"]?.consecutiveFailures, 2);

    advance(100);
    breaker.recordFailure("SECURITY");
    assert.equal(breaker.statusOf("SECURITY"), "OPEN");
  });

  it("should grant exactly one trial after the cool-down", () => {
    const { breaker, advance } = createBreaker();
    fail(breaker, "SECURITY", 3);

    advance(499);
    assert.deepEqual(breaker.check("SECURITY"), { allowed: false, retryAfterMs: 1 });

    advance(1);
    assert.equal(breaker.statusOf("SECURITY"), "HALF_OPEN");
    assert.deepEqual(breaker.check("SECURITY"), { allowed: true, trial: true });
    assert.equal(breaker.check("SECURITY").allowed, false);
  });

  it("should close after a successful trial", () => {
    const { breaker, advance } = createBreaker();
    fail(breaker, "SECURITY", 3);
    advance(500);
    breaker.check("SECURITY");

    breaker.recordSuccess("SECURITY");

    assert.deepEqual(breaker.snapshot()["SECURITY"], {
      status: "CLOSED",
      consecutiveFailures: 0,
      coolDownMs: 500,
    });
  });

  it("should reopen with a longer cool-down after a failed trial", () => {
    const { breaker, advance } = createBreaker();
    fail(breaker, "SECURITY", 3);
    advance(500);
    breaker.check("SECURITY");

    breaker.recordFailure("SECURITY");

    assert.deepEqual(breaker.snapshot()["SECURITY"], {
      status: "OPEN",
      consecutiveFailures: 4,
      openedAt: 10_500,
      coolDownMs: 1_000,
    });

    advance(1_000);
    breaker.check("SECURITY");
    breaker.recordFailure("SECURITY");
    assert.equal(breaker.snapshot()["SECURITY"]?.coolDownMs, 1_500);
  });

  it("should free an abandoned trial for the next caller", () => {
    const { breaker, advance } = createBreaker();
    fail(breaker, "SECURITY", 3);
    advance(500);
    breaker.check("SECURITY");

    breaker.abandonTrial("SECURITY");

    assert.deepEqual(breaker.check("SECURITY"), { allowed: true, trial: true });
  });

  it("should ignore a late success while open", () => {
    const { breaker } = createBreaker();
    fail(breaker, "SECURITY", 3);

    breaker.recordSuccess("SECURITY");

    assert.equal(breaker.statusOf("SECURITY"), "OPEN");
  });

  it("should not create state for status reads", () => {
    const { breaker } = createBreaker();

    breaker.statusOf("SECURITY");
    breaker.abandonTrial("SECURITY");

    assert.deepEqual(breaker.snapshot(), {});
  });

  it("should prune circuits of removed handlers", () => {
    const { breaker } = createBreaker();
    fail(breaker, "SECURITY", 1);
    fail(breaker, "OPTIMIZER", 1);

    breaker.prune(new Set(["OPTIMIZER"]));

    assert.deepEqual(Object.keys(breaker.snapshot()), ["OPTIMIZER"]);
  });

  it("should reset one or all circuits", () => {
    const { breaker } = createBreaker();
    fail(breaker, "SECURITY", 3);
    fail(breaker, "OPTIMIZER", 3);

    breaker.reset("SECURITY");
    assert.equal(breaker.statusOf("SECURITY"), "CLOSED");
    assert.equal(breaker.statusOf("OPTIMIZER"), "OPEN");

    breaker.reset();
    assert.deepEqual(breaker.snapshot(), {});
  });
});
