import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { HandlerTable, advisoryHandler, createDefaultHandlerTable } from "./handlerTable.js";
import type { HandlerBinding, HandlerInvocation } from "./types.js";

function invocation(handlerName: string, input: string): HandlerInvocation {
  return {
    handlerName,
    payload: { input, normalizedInput: input.toLowerCase(), matchedKeywords: ["audit"], hinted: false },
    attempt: 1,
    signal: new AbortController().signal,
  };
}

const NOOP: HandlerBinding = { fallback: () => Promise.resolve(null) };

describe("HandlerTable", () => {
  it("should resolve registered bindings before the default", () => {
    const fallback: HandlerBinding = { fallback: () => Promise.resolve("default") };
    const table = new HandlerTable(fallback).register("SECURITY", NOOP);

    assert.equal(table.resolve("SECURITY"), NOOP);
    assert.equal(table.resolve("OTHER"), fallback);
    assert.equal(table.has("OTHER"), false);
  });

  it("should resolve nothing without a default", () => {
    assert.equal(new HandlerTable().resolve("SECURITY"), undefined);
  });

  it("should reject a second registration under the same name", () => {
    const table = new HandlerTable().register("SECURITY", NOOP);

    assert.throws(() => table.register("SECURITY", NOOP), { message: 'Handler "SECURITY" is already registered' });
  });

  it("should list names in order and detect fast paths", () => {
    const table = new HandlerTable().register("OPTIMIZER", NOOP).register("DEBUGGER", NOOP);

    assert.deepEqual(table.names(), ["DEBUGGER", "OPTIMIZER"]);
    assert.equal(table.hasFastPath(), false);

    table.register("SECURITY", { ...NOOP, fast: NOOP.fallback });
    assert.equal(table.hasFastPath(), true);
  });
});

describe("advisoryHandler", () => {
  it("should build a delegation command for the handler", async () => {
    const result = await advisoryHandler(invocation("DOCKER-AGENT", 'Audit the "api" image'));

    assert.deepEqual(result, {
      handler: "DOCKER-AGENT",
      mode: "advisory",
      command: 'Task(subagent_type="docker-agent", prompt="Audit the \\"api\\" image")',
      matchedKeywords: ["audit"],
    });
  });

  it("should be the default binding of the default table", async () => {
    const binding = createDefaultHandlerTable().resolve("ANYTHING");

    assert.equal(binding?.fallback, advisoryHandler);
  });
});
