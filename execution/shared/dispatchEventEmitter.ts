import type BetterSqlite3 from "better-sqlite3";
import { logger } from "../../config/logger.js";
import { emitDispatchEvent, type DispatchEventInput } from "../../state/dispatchEvents.js";

export interface DispatchEventSink {
  record(event: DispatchEventInput): void;
}

/** Writes dispatch events to SQLite. A failed write is logged, never thrown. */
export class DispatchEventEmitter implements DispatchEventSink {
  constructor(private readonly db: BetterSqlite3.Database) {}

  record(event: DispatchEventInput): void {
    try {
      emitDispatchEvent(this.db, event);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.warn(
        { error: msg, handler: event.handler, eventType: event.eventType, traceId: event.traceId },
        "Failed to record dispatch event",
      );
    }
  }
}

export function createEventEmitter(db: BetterSqlite3.Database): DispatchEventEmitter {
  return new DispatchEventEmitter(db);
}
