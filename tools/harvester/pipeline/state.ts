import { existsSync } from "fs";
import { randomBytes } from "crypto";
import { z } from "zod";
import { readJsonFile, writeJsonAtomic } from "../lib/json.js";
import { runLogPath } from "../lib/paths.js";
import { emitAgentEvent } from "./events.js";
import { CheckpointError, ConfigurationError, HarvestError, WriteError } from "./errors.js";
import { RUN_STATE_VERSION } from "./types.js";
import type { ErrorCode, LastError, RunConfig, RunState, TerminalStatus } from "./types.js";

const errorCodeSchema = z.enum([
  "E_LOOP_OPERATION_FAILED",
  "E_RETRY_EXCEEDED",
  "E_CONFIG",
  "E_CONTAINER_NOT_FOUND",
  "E_WRITE",
  "E_UNEXPECTED",
]);

const runStateSchema = z.object({
  version: z.literal(RUN_STATE_VERSION),
  runId: z.string().min(1),
  status: z.enum(["running", "completed", "interrupted", "failed"]),
  target: z.object({
    url: z.string().nullable(),
    containerSelector: z.string().min(1),
    lineSelector: z.string().min(1),
    entrySelector: z.string().min(1),
    speakerSelector: z.string().min(1),
    mode: z.enum(["text-only", "with-speaker"]),
  }),
  progress: z.object({
    loopCount: z.number().int().min(0),
    scrollOffset: z.number(),
    totalLinesSeen: z.number().int().min(0),
    uniqueLinesSeen: z.number().int().min(0),
    idleScrollCount: z.number().int().min(0),
    lastNewLineAt: z.string().nullable(),
  }),
  files: z.object({
    rawOutput: z.string(),
    finalOutput: z.string(),
    logFile: z.string(),
  }),
  runtime: z.object({
    maxIdleScrolls: z.number().int().min(1),
    scrollStep: z.number().int(),
    scrollIntervalMs: z.number().int().min(0),
    checkpointInterval: z.number().int().min(1),
    maxRetries: z.number().int().min(0),
    retryWaitMs: z.number().int().min(0),
    dedupeMode: z.literal("exact"),
  }),
  timestamps: z.object({
    startedAt: z.string(),
    updatedAt: z.string(),
    finishedAt: z.string().optional(),
  }),
  resumeCount: z.number().int().min(0),
  lastError: z
    .object({
      code: errorCodeSchema,
      message: z.string(),
      at: z.string(),
      retryCount: z.number().int().min(0),
    })
    .nullable(),
});

export function createRunId(now: Date = new Date()): string {
  const ts = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return `${ts}_${randomBytes(3).toString("hex")}`;
}

/** Strict load: no file is a configuration error, anything unreadable is a checkpoint error. */
export function loadRunState(path: string): RunState {
  if (!existsSync(path)) {
    throw new ConfigurationError(`state file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = readJsonFile(path);
  } catch (error) {
    throw new CheckpointError(`state file is not valid JSON: ${path}`, error);
  }

  const version = z.object({ version: z.unknown() }).safeParse(raw);
  if (!version.success) {
    throw new CheckpointError(`state file is not a JSON object: ${path}`);
  }
  if (version.data.version !== RUN_STATE_VERSION) {
    throw new CheckpointError(
      `unsupported run-state version ${JSON.stringify(version.data.version)} in ${path} (expected ${RUN_STATE_VERSION})`
    );
  }

  const parsed = runStateSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CheckpointError(`state file failed validation: ${issues}`, parsed.error);
  }

  const state: RunState = parsed.data;
  return state;
}

export function saveRunState(path: string, state: RunState): void {
  try {
    writeJsonAtomic(path, state);
  } catch (error) {
    throw new WriteError(path, error);
  }
}

function createInitialRunState(config: RunConfig, runId: string): RunState {
  const now = new Date().toISOString();
  return {
    version: RUN_STATE_VERSION,
    runId,
    status: "running",
    target: { ...config.target },
    progress: {
      loopCount: 0,
      scrollOffset: 0,
      totalLinesSeen: 0,
      uniqueLinesSeen: 0,
      idleScrollCount: 0,
      lastNewLineAt: null,
    },
    files: {
      rawOutput: config.rawOutputPath,
      finalOutput: config.finalOutputPath,
      logFile: runLogPath(config.rawOutputPath),
    },
    runtime: { ...config.runtime },
    timestamps: {
      startedAt: now,
      updatedAt: now,
    },
    resumeCount: 0,
    lastError: null,
  };
}

export interface ReplaySummary {
  totalLines: number;
  uniqueLines: number;
}

export interface IterationProgress {
  extracted: number;
  newUnique: number;
  uniqueLinesSeen: number;
  idleScrollCount: number;
}

export class RunStateStore {
  private constructor(
    public readonly path: string,
    private current: RunState
  ) {}

  static create(config: RunConfig, runId: string): RunStateStore {
    const store = new RunStateStore(config.stateFilePath, createInitialRunState(config, runId));
    store.persist();
    return store;
  }

  /**
   * Opens a new segment of an earlier run: identity, start time and loop
   * counters carry over, line counters come from replaying the raw log.
   */
  static resume(config: RunConfig, previous: RunState, replay: ReplaySummary): RunStateStore {
    const next = createInitialRunState(config, previous.runId);
    next.progress = {
      ...previous.progress,
      totalLinesSeen: replay.totalLines,
      uniqueLinesSeen: replay.uniqueLines,
    };
    next.timestamps.startedAt = previous.timestamps.startedAt;
    next.resumeCount = previous.resumeCount + 1;
    next.lastError = previous.lastError;

    const store = new RunStateStore(config.stateFilePath, next);
    store.persist();
    emitAgentEvent({
      level: "info",
      eventType: "state.update",
      message: "Resumed run state",
      previousStatus: previous.status,
      resumeCount: next.resumeCount,
      loopCount: next.progress.loopCount,
    });
    return store;
  }

  get state(): Readonly<RunState> {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current.status !== "running";
  }

  persist(): void {
    saveRunState(this.path, this.current);
  }

  recordIteration(progress: IterationProgress): void {
    this.assertRunning();
    const target = this.current.progress;
    const now = new Date().toISOString();
    target.totalLinesSeen += progress.extracted;
    target.uniqueLinesSeen = progress.uniqueLinesSeen;
    target.loopCount += 1;
    target.idleScrollCount = progress.idleScrollCount;
    if (progress.newUnique > 0) {
      target.lastNewLineAt = now;
    }
    this.current.timestamps.updatedAt = now;
  }

  recordScrollOffset(offset: number): void {
    this.assertRunning();
    this.current.progress.scrollOffset = offset;
    this.current.timestamps.updatedAt = new Date().toISOString();
  }

  recordError(code: ErrorCode, message: string, retryCount: number): LastError {
    this.assertRunning();
    const now = new Date().toISOString();
    const lastError: LastError = { code, message, at: now, retryCount };
    this.current.lastError = lastError;
    this.current.timestamps.updatedAt = now;
    return lastError;
  }

  clearError(): void {
    this.assertRunning();
    this.current.lastError = null;
  }

  /** The only way out of `running`; a terminal state is never mutated again. */
  markTerminal(status: TerminalStatus): void {
    this.assertRunning();
    const now = new Date().toISOString();
    this.current.status = status;
    this.current.timestamps.updatedAt = now;
    this.current.timestamps.finishedAt = now;
    emitAgentEvent({
      level: status === "completed" ? "info" : "warn",
      eventType: "state.update",
      message: "Run reached terminal status",
      status,
    });
  }

  private assertRunning(): void {
    if (this.current.status !== "running") {
      throw new HarvestError(
        `run ${this.current.runId} is already ${this.current.status}; its state can no longer change`,
        { code: "E_STATE_TERMINAL" }
      );
    }
  }
}
