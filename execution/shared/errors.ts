export type CancelReason = "timed_out" | "cancelled";

export type FailureClass = "retryable" | "fatal" | "cancelled";

export class InputTooLargeError extends Error {
  constructor(
    readonly length: number,
    readonly limit: number,
  ) {
    super(`Input exceeds ${String(limit)} characters (got ${String(length)})`);
    this.name = "InputTooLargeError";
  }
}

export class RegistryNotLoadedError extends Error {
  constructor(message = "Handler registry has never been loaded successfully") {
    super(message);
    this.name = "RegistryNotLoadedError";
  }
}

export class TaskCancelledError extends Error {
  constructor(readonly reason: CancelReason) {
    super(reason === "timed_out" ? "Task exceeded the call deadline" : "Task was cancelled by the caller");
    this.name = "TaskCancelledError";
  }
}

/** Thrown by handlers for transient failures worth another attempt. */
export class RetryableHandlerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RetryableHandlerError";
  }
}

/** Thrown by handlers for failures no retry can fix (bad payload, declared fatal state). */
export class FatalHandlerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FatalHandlerError";
  }
}

const TRANSIENT_MARKERS: readonly string[] = [
  "timeout",
  "timed out",
  "econnreset",
  "econnrefused",
  "eai_again",
  "etimedout",
  "epipe",
  "network",
];

export function classifyHandlerError(error: unknown): FailureClass {
  if (error instanceof TaskCancelledError) return "cancelled";
  if (error instanceof RetryableHandlerError) return "retryable";
  if (error instanceof FatalHandlerError) return "fatal";

  if (!(error instanceof Error)) return "fatal";

  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return "retryable";
  }

  const msg = error.message.toLowerCase();
  if (TRANSIENT_MARKERS.some((marker) => msg.includes(marker))) {
    return "retryable";
  }

  return "fatal";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function cancelReasonOf(signal: AbortSignal): CancelReason {
  const reason: unknown = signal.reason;
  if (reason instanceof TaskCancelledError) return reason.reason;
  return "cancelled";
}
