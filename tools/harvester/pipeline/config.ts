import { z } from "zod";
import {
  DEFAULT_FINAL_OUTPUT,
  DEFAULT_RAW_OUTPUT,
  DEFAULT_STATE_FILE,
  resolveFromCwd,
} from "../lib/paths.js";
import { ConfigurationError } from "./errors.js";
import { loadRunState } from "./state.js";
import type { ExtractionSelectors, HarvestMode, LogOptions, RunConfig, RunState } from "./types.js";

export const DEFAULT_LINE_SELECTOR = '[class^="entryText-"]';
export const DEFAULT_ENTRY_SELECTOR = '[class^="baseEntry-"]';
export const DEFAULT_SPEAKER_SELECTOR = '[id^="timestampSpeakerAriaLabel-"]';

const DEFAULT_MAX_IDLE_SCROLLS = 8;
const DEFAULT_SCROLL_STEP = 400;
const DEFAULT_SCROLL_INTERVAL_MS = 600;
const DEFAULT_CHECKPOINT_INTERVAL = 5;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_WAIT_MS = 1000;
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_DEBUG_PORT = 9222;

/** Option values as they arrive from the command line; numbers are still strings. */
export interface RunCliInput {
  url?: string;
  container?: string;
  lineSelector?: string;
  entrySelector?: string;
  speakerSelector?: string;
  textOnly?: boolean;
  outputRaw?: string;
  outputFinal?: string;
  stateFile?: string;
  resume?: boolean;
  maxIdleScrolls?: string;
  scrollStep?: string;
  scrollIntervalMs?: string;
  checkpointInterval?: string;
  maxRetries?: string;
  retryWaitMs?: string;
  dedupeMode?: string;
  noHeadless?: boolean;
  timeoutMs?: string;
  noFinalize?: boolean;
  connectExisting?: boolean;
  debugPort?: string;
  logLevel?: string;
  logFormat?: string;
  eventFile?: string;
  quiet?: boolean;
}

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const dedupeModeSchema = z.enum(["exact"], {
  errorMap: () => ({ message: "unsupported dedupe mode (only \"exact\" is available)" }),
});

const runOptionsSchema = z.object({
  maxIdleScrolls: positiveInt(DEFAULT_MAX_IDLE_SCROLLS),
  scrollStep: positiveInt(DEFAULT_SCROLL_STEP),
  scrollIntervalMs: nonNegativeInt(DEFAULT_SCROLL_INTERVAL_MS),
  checkpointInterval: positiveInt(DEFAULT_CHECKPOINT_INTERVAL),
  maxRetries: nonNegativeInt(DEFAULT_MAX_RETRIES),
  retryWaitMs: nonNegativeInt(DEFAULT_RETRY_WAIT_MS),
  timeoutMs: positiveInt(DEFAULT_TIMEOUT_MS),
  debugPort: z.coerce.number().int().min(1).max(65_535).default(DEFAULT_DEBUG_PORT),
  dedupeMode: dedupeModeSchema.default("exact"),
});

const logOptionsSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  logFormat: z.enum(["pretty", "json"]).default("pretty"),
});

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `--${toKebab(String(issue.path[0] ?? ""))}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(message, parsed.error);
  }
  return parsed.data;
}

function toKebab(key: string): string {
  return key.replace(/[A-Z]/g, (ch) => `-${ch.toLowerCase()}`);
}

export function resolveLogOptions(input: Pick<RunCliInput, "logLevel" | "logFormat" | "eventFile" | "quiet">): LogOptions {
  const parsed = parseOrThrow(logOptionsSchema, {
    logLevel: input.logLevel,
    logFormat: input.logFormat,
  });
  return {
    level: parsed.logLevel,
    format: parsed.logFormat,
    console: !input.quiet,
    eventFile: input.eventFile ? resolveFromCwd(input.eventFile) : undefined,
  };
}

/**
 * Merges command-line values with the checkpoint when resuming: anything the
 * command line leaves out of the target comes from the saved state.
 */
export function resolveRunConfig(
  input: RunCliInput,
  loadState: (path: string) => RunState = loadRunState
): RunConfig {
  const stateFilePath = resolveFromCwd(input.stateFile ?? DEFAULT_STATE_FILE);
  const saved = input.resume ? loadState(stateFilePath).target : null;

  const url = input.url ?? saved?.url ?? null;
  const containerSelector = input.container ?? saved?.containerSelector;
  const explicitLineSelector = input.lineSelector ?? saved?.lineSelector;
  let mode: HarvestMode = saved?.mode ?? "with-speaker";
  if (input.textOnly !== undefined) {
    mode = input.textOnly ? "text-only" : "with-speaker";
  }

  const connectExisting = input.connectExisting ?? false;
  if (!connectExisting && !url) {
    throw new ConfigurationError(
      "--url is required (optional with --connect-existing, or when --resume supplies it)"
    );
  }
  if (!containerSelector) {
    throw new ConfigurationError("--container is required (--resume can supply it from the state file)");
  }
  if (mode === "text-only" && !explicitLineSelector) {
    throw new ConfigurationError("--line-selector is required in --text-only mode");
  }

  const options = parseOrThrow(runOptionsSchema, {
    maxIdleScrolls: input.maxIdleScrolls,
    scrollStep: input.scrollStep,
    scrollIntervalMs: input.scrollIntervalMs,
    checkpointInterval: input.checkpointInterval,
    maxRetries: input.maxRetries,
    retryWaitMs: input.retryWaitMs,
    timeoutMs: input.timeoutMs,
    debugPort: input.debugPort,
    dedupeMode: input.dedupeMode,
  });

  const selectors: ExtractionSelectors = {
    lineSelector: explicitLineSelector ?? DEFAULT_LINE_SELECTOR,
    entrySelector: input.entrySelector ?? saved?.entrySelector ?? DEFAULT_ENTRY_SELECTOR,
    speakerSelector: input.speakerSelector ?? saved?.speakerSelector ?? DEFAULT_SPEAKER_SELECTOR,
  };

  return {
    target: {
      url,
      containerSelector,
      mode,
      ...selectors,
    },
    runtime: {
      maxIdleScrolls: options.maxIdleScrolls,
      scrollStep: options.scrollStep,
      scrollIntervalMs: options.scrollIntervalMs,
      checkpointInterval: options.checkpointInterval,
      maxRetries: options.maxRetries,
      retryWaitMs: options.retryWaitMs,
      dedupeMode: options.dedupeMode,
    },
    rawOutputPath: resolveFromCwd(input.outputRaw ?? DEFAULT_RAW_OUTPUT),
    finalOutputPath: resolveFromCwd(input.outputFinal ?? DEFAULT_FINAL_OUTPUT),
    stateFilePath,
    resume: input.resume ?? false,
    finalize: !input.noFinalize,
    headless: !input.noHeadless,
    timeoutMs: options.timeoutMs,
    connectExisting,
    debugPort: options.debugPort,
    log: resolveLogOptions(input),
  };
}

export interface FinalizeConfig {
  rawOutputPath: string;
  finalOutputPath: string;
  dedupeMode: "exact";
}

export function resolveFinalizeConfig(
  input: Pick<RunCliInput, "outputRaw" | "outputFinal" | "dedupeMode">
): FinalizeConfig {
  const { dedupeMode } = parseOrThrow(z.object({ dedupeMode: dedupeModeSchema.default("exact") }), {
    dedupeMode: input.dedupeMode,
  });
  return {
    rawOutputPath: resolveFromCwd(input.outputRaw ?? DEFAULT_RAW_OUTPUT),
    finalOutputPath: resolveFromCwd(input.outputFinal ?? DEFAULT_FINAL_OUTPUT),
    dedupeMode,
  };
}

export interface DoctorConfig {
  url: string;
  containerSelector: string;
  mode: HarvestMode;
  selectors: ExtractionSelectors;
  headless: boolean;
  timeoutMs: number;
}

export function resolveDoctorConfig(input: RunCliInput): DoctorConfig {
  if (!input.url) {
    throw new ConfigurationError("--url is required");
  }
  if (!input.container) {
    throw new ConfigurationError("--container is required");
  }
  const { timeoutMs } = parseOrThrow(z.object({ timeoutMs: positiveInt(DEFAULT_TIMEOUT_MS) }), {
    timeoutMs: input.timeoutMs,
  });
  return {
    url: input.url,
    containerSelector: input.container,
    mode: input.textOnly ? "text-only" : "with-speaker",
    selectors: {
      lineSelector: input.lineSelector ?? DEFAULT_LINE_SELECTOR,
      entrySelector: input.entrySelector ?? DEFAULT_ENTRY_SELECTOR,
      speakerSelector: input.speakerSelector ?? DEFAULT_SPEAKER_SELECTOR,
    },
    headless: !input.noHeadless,
    timeoutMs,
  };
}
