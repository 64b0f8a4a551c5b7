export const RUN_STATE_VERSION = 1;

export type HarvestMode = "text-only" | "with-speaker";
export type DedupeMode = "exact";

export type RunStatus = "running" | "completed" | "interrupted" | "failed";
export type TerminalStatus = Exclude<RunStatus, "running">;

export type TerminalSignal =
  | "completed"
  | "configuration-error"
  | "retry-exceeded"
  | "container-not-found"
  | "write-failed"
  | "unexpected";

export type HarvestStage = "setup" | "harvest" | "finalize" | "doctor" | "system";

export type ErrorCode =
  | "E_LOOP_OPERATION_FAILED"
  | "E_RETRY_EXCEEDED"
  | "E_CONFIG"
  | "E_CONTAINER_NOT_FOUND"
  | "E_WRITE"
  | "E_UNEXPECTED";

export interface HarvestRecord {
  speaker?: string;
  text: string;
}

/** An entry as read from the page, before trimming or filtering. */
export interface RawEntry {
  speakerLabel?: string | null;
  text: string | null;
}

export interface ExtractionSelectors {
  lineSelector: string;
  entrySelector: string;
  speakerSelector: string;
}

export interface LastError {
  code: ErrorCode;
  message: string;
  at: string;
  retryCount: number;
}

export interface RunTarget extends ExtractionSelectors {
  url: string | null;
  containerSelector: string;
  mode: HarvestMode;
}

export interface RunProgress {
  loopCount: number;
  scrollOffset: number;
  totalLinesSeen: number;
  uniqueLinesSeen: number;
  idleScrollCount: number;
  lastNewLineAt: string | null;
}

export interface RunFiles {
  rawOutput: string;
  finalOutput: string;
  logFile: string;
}

export interface RunRuntime {
  maxIdleScrolls: number;
  scrollStep: number;
  scrollIntervalMs: number;
  checkpointInterval: number;
  maxRetries: number;
  retryWaitMs: number;
  dedupeMode: DedupeMode;
}

export interface RunTimestamps {
  startedAt: string;
  updatedAt: string;
  finishedAt?: string;
}

export interface RunState {
  version: typeof RUN_STATE_VERSION;
  runId: string;
  status: RunStatus;
  target: RunTarget;
  progress: RunProgress;
  files: RunFiles;
  runtime: RunRuntime;
  timestamps: RunTimestamps;
  resumeCount: number;
  lastError: LastError | null;
}

export interface RunConfig {
  target: RunTarget;
  runtime: RunRuntime;
  rawOutputPath: string;
  finalOutputPath: string;
  stateFilePath: string;
  resume: boolean;
  finalize: boolean;
  headless: boolean;
  timeoutMs: number;
  connectExisting: boolean;
  debugPort: number;
  log: LogOptions;
}

export interface FinalizeResult {
  totalLines: number;
  uniqueLines: number;
}

export interface HarvestResult {
  runId: string;
  status: TerminalStatus;
  signal: TerminalSignal;
  finalize?: FinalizeResult;
  error?: LastError;
}

export type LogFormat = "pretty" | "json";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogOptions {
  format: LogFormat;
  level: LogLevel;
  console: boolean;
  eventFile?: string;
}

export type EventType =
  | "run.lifecycle"
  | "harvest.iteration"
  | "harvest.idle"
  | "checkpoint"
  | "retry"
  | "driver"
  | "file.read"
  | "file.write"
  | "state.update"
  | "finalize"
  | "doctor"
  | "summary";

export interface AgentEvent {
  ts: string;
  runId: string;
  level: LogLevel;
  stage: HarvestStage;
  iteration: number;
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  bytes?: number;
  path?: string;
  retryable?: boolean;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  level: LogLevel;
  console: boolean;
  eventsLogPath?: string;
  eventFilePath?: string;
}
