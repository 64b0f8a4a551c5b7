import type { PageDriver } from "../driver/types.js";
import { removeFile, touchFile } from "../lib/lines.js";
import { runLogPath } from "../lib/paths.js";
import { DedupAccumulator } from "./dedup.js";
import { normalizeHarvestError } from "./errors.js";
import { initializeEventEmitter } from "./events.js";
import { errorCodeForSignal, signalForError } from "./exit-codes.js";
import { finalizeRawLog } from "./finalize.js";
import { HarvestLoop, type LoopOutcome } from "./harvest-loop.js";
import { Logger } from "./logger.js";
import { openHarvestSession, restoreScrollOffset } from "./session.js";
import { RunStateStore, createRunId, loadRunState } from "./state.js";
import { runInStage } from "./telemetry-context.js";
import type { HarvestResult, LastError, RunConfig, RunState, TerminalStatus } from "./types.js";

export interface HarvestDeps {
  driver: PageDriver;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * One harvest run end to end: state setup (fresh or resumed), session,
 * loop, terminal persistence and the optional finalize pass.
 *
 * Configuration problems found before any state exists are thrown; every
 * later failure is folded into the returned result and the state file.
 */
export async function runHarvest(config: RunConfig, deps: HarvestDeps): Promise<HarvestResult> {
  const previous = config.resume ? loadRunState(config.stateFilePath) : null;
  const runId = previous?.runId ?? createRunId();

  initializeEventEmitter({
    runId,
    format: config.log.format,
    level: config.log.level,
    console: config.log.console,
    eventsLogPath: runLogPath(config.rawOutputPath),
    eventFilePath: config.log.eventFile,
  });
  const logger = new Logger();

  const { store, accumulator } = prepareRun(config, previous, runId, logger);
  const { driver } = deps;

  logger.info("Run start", {
    stage: "setup",
    phase: "start",
    resume: config.resume,
    resumeCount: store.state.resumeCount,
    url: config.target.url,
    container: config.target.containerSelector,
    mode: config.target.mode,
    rawOutput: config.rawOutputPath,
    uniqueLinesSeen: accumulator.size,
    runtime: config.runtime,
  });

  let loopOutcome: LoopOutcome;
  try {
    const container = await runInStage("setup", 0, async () => {
      const handle = await openHarvestSession(driver, config, logger);
      if (config.resume) {
        await restoreScrollOffset(driver, handle, store.state.progress.scrollOffset, logger);
      }
      return handle;
    });
    loopOutcome = await new HarvestLoop({
      driver,
      container,
      store,
      accumulator,
      config,
      logger,
      sleep: deps.sleep,
    }).run();
  } catch (error) {
    await closeDriver(driver, logger);
    return failRun(store, error, logger);
  }

  await closeDriver(driver, logger);

  if (loopOutcome.kind === "interrupted") {
    return {
      runId,
      status: "interrupted",
      signal: "retry-exceeded",
      error: loopOutcome.error,
    };
  }
  if (loopOutcome.kind === "fatal-fault") {
    return failRun(store, loopOutcome.error, logger);
  }

  try {
    store.markTerminal("completed");
    store.persist();
  } catch (error) {
    return reportAfterCompletion(runId, error, logger);
  }

  logger.info("Run completed", {
    stage: "harvest",
    phase: "end",
    loopCount: store.state.progress.loopCount,
    totalLinesSeen: store.state.progress.totalLinesSeen,
    uniqueLinesSeen: store.state.progress.uniqueLinesSeen,
  });

  if (!config.finalize) {
    return { runId, status: "completed", signal: "completed" };
  }

  try {
    const result = await runInStage("finalize", 0, async () =>
      finalizeRawLog(config.rawOutputPath, config.finalOutputPath, config.runtime.dedupeMode)
    );
    logger.info("Finalized raw output", {
      eventType: "finalize",
      stage: "finalize",
      totalLines: result.totalLines,
      uniqueLines: result.uniqueLines,
      path: config.finalOutputPath,
    });
    return { runId, status: "completed", signal: "completed", finalize: result };
  } catch (error) {
    return reportAfterCompletion(runId, error, logger);
  }
}

function prepareRun(
  config: RunConfig,
  previous: RunState | null,
  runId: string,
  logger: Logger
): { store: RunStateStore; accumulator: DedupAccumulator } {
  try {
    if (previous) {
      const replay = DedupAccumulator.fromRawLog(config.rawOutputPath);
      touchFile(config.rawOutputPath);
      const store = RunStateStore.resume(config, previous, {
        totalLines: replay.totalLines,
        uniqueLines: replay.accumulator.size,
      });
      logger.info("Replayed raw output", {
        stage: "setup",
        eventType: "state.update",
        totalLines: replay.totalLines,
        uniqueLines: replay.accumulator.size,
      });
      return { store, accumulator: replay.accumulator };
    }

    if (removeFile(config.rawOutputPath)) {
      logger.info("Removed previous raw output", {
        stage: "setup",
        eventType: "file.write",
        path: config.rawOutputPath,
      });
    }
    touchFile(config.rawOutputPath);
    return { store: RunStateStore.create(config, runId), accumulator: new DedupAccumulator() };
  } catch (error) {
    throw normalizeHarvestError(error);
  }
}

function failRun(store: RunStateStore, error: unknown, logger: Logger): HarvestResult {
  const normalized = normalizeHarvestError(error);
  const signal = signalForError(normalized);
  let lastError: LastError | undefined = store.state.lastError ?? undefined;

  if (!store.isTerminal) {
    lastError = store.recordError(errorCodeForSignal(signal), normalized.message, 0);
    store.markTerminal("failed");
    try {
      store.persist();
    } catch (persistError) {
      logger.error("Could not persist failed run state", {
        errorCode: normalizeHarvestError(persistError).code,
        errorMessage: normalizeHarvestError(persistError).message,
      });
    }
  }

  logger.error("Run failed", {
    phase: "fail",
    errorCode: normalized.code,
    errorMessage: normalized.message,
    signal,
    cause: normalized.cause instanceof Error ? normalized.cause.stack : undefined,
  });

  return {
    runId: store.state.runId,
    status: terminalStatusOf(store.state.status),
    signal,
    error: lastError,
  };
}

function reportAfterCompletion(runId: string, error: unknown, logger: Logger): HarvestResult {
  const normalized = normalizeHarvestError(error);
  const signal = signalForError(normalized);
  logger.error("Run completed but output could not be written", {
    stage: "finalize",
    phase: "fail",
    errorCode: normalized.code,
    errorMessage: normalized.message,
  });
  return {
    runId,
    status: "completed",
    signal,
    error: {
      code: errorCodeForSignal(signal),
      message: normalized.message,
      at: new Date().toISOString(),
      retryCount: 0,
    },
  };
}

function terminalStatusOf(status: RunState["status"]): TerminalStatus {
  return status === "running" ? "failed" : status;
}

async function closeDriver(driver: PageDriver, logger: Logger): Promise<void> {
  try {
    await driver.close();
  } catch (error) {
    logger.warn("Closing the page driver failed", {
      eventType: "driver",
      errorMessage: error instanceof Error ? error.message : String(error),
    });
  }
}
