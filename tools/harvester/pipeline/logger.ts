import { emitAgentEvent } from "./events.js";
import type { EventType, HarvestStage, LogLevel } from "./types.js";

export interface LogMeta {
  stage?: HarvestStage;
  iteration?: number;
  eventType?: EventType;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  bytes?: number;
  path?: string;
  retryable?: boolean;
  errorCode?: string;
  [key: string]: unknown;
}

/**
 * Thin facade over the global emitter. `defaults` fill in any field a call
 * leaves out; events without a type are `run.lifecycle`.
 */
export class Logger {
  constructor(private readonly defaults: LogMeta = {}) {}

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta: LogMeta = {}): void {
    const merged: LogMeta = { ...this.defaults, ...meta };
    emitAgentEvent({
      ...merged,
      level,
      message,
      eventType: merged.eventType ?? "run.lifecycle",
    });
  }
}
