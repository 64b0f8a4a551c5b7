import { appendFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/json.js";
import { redactEvent } from "./redact.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type {
  AgentEvent,
  EventType,
  LogFormat,
  LogLevel,
  LogRuntimeConfig,
} from "./types.js";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  stage?: AgentEvent["stage"];
  iteration?: number;
  phase?: AgentEvent["phase"];
  action?: string;
  durationMs?: number;
  bytes?: number;
  path?: string;
  retryable?: boolean;
  errorCode?: string;
  [key: string]: unknown;
}

export interface EventSink {
  write(event: AgentEvent): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Event types kept out of the terminal unless running at debug level. */
const BACKGROUND_EVENT_TYPES = new Set<EventType>([
  "file.read",
  "file.write",
  "state.update",
  "checkpoint",
]);

const ENVELOPE_KEYS = new Set(["ts", "runId", "level", "stage", "iteration", "eventType", "message"]);

/** Extras worth showing on a one-line terminal summary, in display order. */
const SUMMARY_KEYS = [
  "newUnique",
  "uniqueLinesSeen",
  "idleScrollCount",
  "retryCount",
  "backoffMs",
  "errorCode",
];

class TerminalSink implements EventSink {
  constructor(
    private readonly level: LogLevel,
    private readonly format: LogFormat
  ) {}

  write(event: AgentEvent): void {
    if (!shouldPrintToTerminal(event, this.level)) {
      return;
    }
    const line = this.format === "json" ? JSON.stringify(event) : renderCondensed(event);
    switch (event.level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

class LineFileSink implements EventSink {
  constructor(
    private readonly path: string,
    private readonly render: (event: AgentEvent) => string
  ) {
    ensureDir(dirname(path));
  }

  write(event: AgentEvent): void {
    appendFileSync(this.path, `${this.render(event)}\n`);
  }
}

class EventEmitter {
  constructor(
    private readonly runId: string,
    private readonly minLevel: LogLevel,
    private readonly sinks: readonly EventSink[]
  ) {}

  emit(input: EmitInput): void {
    if (LEVEL_RANK[input.level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const ctx = getTelemetryContext();
    const { level, message, stage, iteration, eventType, ...extras } = input;
    const event = redactEvent({
      ts: new Date().toISOString(),
      runId: this.runId,
      level,
      stage: stage ?? ctx.stage,
      iteration: iteration ?? ctx.iteration,
      eventType: eventType ?? "run.lifecycle",
      message,
      ...extras,
    });

    for (const sink of this.sinks) {
      sink.write(event);
    }
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  const sinks: EventSink[] = [];
  if (config.console) {
    sinks.push(new TerminalSink(config.level, config.format));
  }
  if (config.eventsLogPath) {
    sinks.push(new LineFileSink(config.eventsLogPath, renderPretty));
  }
  if (config.eventFilePath) {
    sinks.push(new LineFileSink(config.eventFilePath, (event) => JSON.stringify(event)));
  }
  globalEmitter = new EventEmitter(config.runId, config.level, sinks);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

/** No-op until a run initializes the emitter, so library code can always emit. */
export function emitAgentEvent(input: EmitInput): void {
  globalEmitter?.emit(input);
}

export function renderPretty(event: AgentEvent): string {
  const head = `${event.ts} ${event.level.toUpperCase()} ${event.stage}#${event.iteration} [${event.eventType}] ${event.message}`;
  const extras = Object.entries(event)
    .filter(([key, value]) => !ENVELOPE_KEYS.has(key) && isPresent(value))
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return extras.length > 0 ? `${head} ${extras.join(" ")}` : head;
}

export function renderCondensed(event: AgentEvent): string {
  const clock = /T(\d{2}:\d{2}:\d{2})/.exec(event.ts)?.[1] ?? event.ts;
  const head = `[${clock}] ${event.stage}#${event.iteration} ${event.message}`;
  const summary = SUMMARY_KEYS.filter((key) => isPresent(event[key])).map(
    (key) => `${key}=${JSON.stringify(event[key])}`
  );
  return summary.length > 0 ? `${head} | ${summary.join(" ")}` : head;
}

export function shouldPrintToTerminal(event: AgentEvent, level: LogLevel): boolean {
  if (level === "debug" || LEVEL_RANK[event.level] >= LEVEL_RANK.warn) {
    return true;
  }
  if (BACKGROUND_EVENT_TYPES.has(event.eventType)) {
    return false;
  }
  if (event.eventType === "harvest.iteration") {
    return event.phase === "progress";
  }
  return true;
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}
