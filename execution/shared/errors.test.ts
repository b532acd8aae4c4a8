import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  FatalHandlerError,
  InputTooLargeError,
  RetryableHandlerError,
  TaskCancelledError,
  cancelReasonOf,
  classifyHandlerError,
  errorMessage,
} from "./errors.js";

describe("classifyHandlerError", () => {
  it("should honour explicit error classes", () => {
    assert.equal(classifyHandlerError(new RetryableHandlerError("busy")), "retryable");
    assert.equal(classifyHandlerError(new FatalHandlerError("bad payload")), "fatal");
    assert.equal(classifyHandlerError(new TaskCancelledError("cancelled")), "cancelled");
  });

  it("should treat transient network failures as retryable", () => {
    assert.equal(classifyHandlerError(new Error("read ECONNRESET")), "retryable");
    assert.equal(classifyHandlerError(new Error("Request timed out after 5s")), "retryable");
  });

  it("should treat abort and timeout errors as retryable", () => {
    const error = new Error("The operation was aborted");
    error.name = "AbortError";

    assert.equal(classifyHandlerError(error), "retryable");
  });

  it("should treat anything else as fatal", () => {
    assert.equal(classifyHandlerError(new TypeError("cannot read properties of undefined")), "fatal");
    assert.equal(classifyHandlerError("plain string"), "fatal");
  });
});

describe("error helpers", () => {
  it("should format error messages", () => {
    assert.equal(errorMessage(new Error("boom")), "boom");
    assert.equal(errorMessage(42), "42");
  });

  it("should read the cancel reason from a signal", () => {
    const timed = new AbortController();
    timed.abort(new TaskCancelledError("timed_out"));
    const plain = new AbortController();
    plain.abort();

    assert.equal(cancelReasonOf(timed.signal), "timed_out");
    assert.equal(cancelReasonOf(plain.signal), "cancelled");
  });

  it("should describe oversized input", () => {
    const error = new InputTooLargeError(12_000, 10_000);

    assert.equal(error.message, "Input exceeds 10000 characters (got 12000)");
    assert.equal(error.name, "InputTooLargeError");
  });
});
