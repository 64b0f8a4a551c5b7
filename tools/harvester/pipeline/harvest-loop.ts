import { appendLines } from "../lib/lines.js";
import type { ContainerHandle, PageDriver } from "../driver/types.js";
import type { DedupAccumulator } from "./dedup.js";
import { HarvestError, WriteError, normalizeHarvestError } from "./errors.js";
import { IdleDetector } from "./idle.js";
import type { Logger } from "./logger.js";
import { serializeRecord, toRecords } from "./records.js";
import { RetryGovernor, wait } from "./retry.js";
import type { RunStateStore } from "./state.js";
import { runInStage } from "./telemetry-context.js";
import type { LastError, RunConfig } from "./types.js";

export interface HarvestLoopDeps {
  driver: PageDriver;
  container: ContainerHandle;
  store: RunStateStore;
  accumulator: DedupAccumulator;
  config: RunConfig;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export type IterationOutcome =
  | { kind: "progressed"; extracted: number; newUnique: number; idleScrollCount: number }
  | { kind: "retryable-fault"; error: HarvestError }
  | { kind: "fatal-fault"; error: HarvestError };

export type LoopOutcome =
  | { kind: "completed" }
  | { kind: "interrupted"; error: LastError }
  | { kind: "fatal-fault"; error: HarvestError };

interface CommittedExtraction {
  extracted: number;
  newUnique: number;
  idleScrollCount: number;
}

/**
 * Sequential extract → append → scroll loop over one page session.
 *
 * An iteration commits its extraction (raw log + counters) before scrolling.
 * When the scroll then fails, the retry resumes at the scroll so the same
 * extraction is never appended twice.
 */
export class HarvestLoop {
  private readonly idle: IdleDetector;
  private readonly governor: RetryGovernor;
  private readonly sleep: (ms: number) => Promise<void>;
  private committed: CommittedExtraction | null = null;

  constructor(private readonly deps: HarvestLoopDeps) {
    const { runtime } = deps.config;
    this.idle = new IdleDetector(runtime.maxIdleScrolls, deps.store.state.progress.idleScrollCount);
    this.governor = new RetryGovernor(runtime.maxRetries, runtime.retryWaitMs);
    this.sleep = deps.sleep ?? wait;
  }

  async run(): Promise<LoopOutcome> {
    const { store, logger, config } = this.deps;

    while (!this.idle.reached) {
      const loopCount = store.state.progress.loopCount;
      const iteration = this.committed ? loopCount : loopCount + 1;
      const outcome = await runInStage("harvest", iteration, () => this.step());

      if (outcome.kind === "fatal-fault") {
        return outcome;
      }

      if (outcome.kind === "retryable-fault") {
        const decision = this.governor.recordFailure();
        if (decision.kind === "exhausted") {
          const lastError = store.recordError(
            "E_RETRY_EXCEEDED",
            `max retries exceeded during collection loop: ${outcome.error.message}`,
            decision.failures
          );
          store.markTerminal("interrupted");
          store.persist();
          logger.error("Retry budget exhausted", {
            eventType: "retry",
            stage: "harvest",
            iteration,
            errorCode: outcome.error.code,
            retryCount: decision.failures,
          });
          return { kind: "interrupted", error: lastError };
        }

        store.recordError("E_LOOP_OPERATION_FAILED", outcome.error.message, decision.failures);
        store.persist();
        logger.warn("Iteration failed; retrying", {
          eventType: "retry",
          stage: "harvest",
          iteration,
          errorCode: outcome.error.code,
          errorMessage: outcome.error.message,
          retryCount: decision.failures,
          backoffMs: decision.backoffMs,
        });
        await this.sleep(decision.backoffMs);
        continue;
      }

      this.governor.recordSuccess();
      if (this.idle.reached) {
        break;
      }
      await this.sleep(config.runtime.scrollIntervalMs);
    }

    logger.info("No new lines for the idle threshold; stopping", {
      eventType: "harvest.idle",
      stage: "harvest",
      iteration: store.state.progress.loopCount,
      idleScrollCount: this.idle.count,
    });
    return { kind: "completed" };
  }

  private async step(): Promise<IterationOutcome> {
    const { driver, container, store, accumulator, config, logger } = this.deps;
    const { target, runtime } = config;

    if (!this.committed) {
      let lines: string[];
      try {
        const entries = await driver.readEntries(container, target, target.mode);
        lines = toRecords(entries, target.mode).map(serializeRecord);
      } catch (error) {
        return classifyFault(error);
      }

      try {
        appendLines(config.rawOutputPath, lines);
      } catch (error) {
        return { kind: "fatal-fault", error: new WriteError(config.rawOutputPath, error) };
      }

      const newUnique = accumulator.observe(lines);
      const idleScrollCount = this.idle.observe(newUnique);
      store.recordIteration({
        extracted: lines.length,
        newUnique,
        uniqueLinesSeen: accumulator.size,
        idleScrollCount,
      });
      this.committed = { extracted: lines.length, newUnique, idleScrollCount };
    }

    try {
      await driver.scrollBy(container, runtime.scrollStep);
      store.recordScrollOffset(await driver.readScrollOffset(container));
    } catch (error) {
      return classifyFault(error);
    }

    const committed = this.committed;
    this.committed = null;
    store.clearError();

    const progress = store.state.progress;
    if (progress.loopCount % Math.max(runtime.checkpointInterval, 1) === 0) {
      try {
        store.persist();
      } catch (error) {
        return { kind: "fatal-fault", error: normalizeHarvestError(error) };
      }
      logger.debug("Checkpoint saved", { eventType: "checkpoint", path: store.path });
    }

    const meta = {
      eventType: "harvest.iteration" as const,
      extracted: committed.extracted,
      newUnique: committed.newUnique,
      uniqueLinesSeen: progress.uniqueLinesSeen,
      idleScrollCount: committed.idleScrollCount,
      scrollOffset: progress.scrollOffset,
    };
    if (committed.newUnique > 0) {
      logger.info("Collected new lines", { ...meta, phase: "progress" });
    } else {
      logger.debug("No new lines this iteration", meta);
    }

    return { kind: "progressed", ...committed };
  }
}

function classifyFault(error: unknown): IterationOutcome {
  const normalized = normalizeHarvestError(error);
  if (normalized.retryable) {
    return { kind: "retryable-fault", error: normalized };
  }
  if (normalized instanceof WriteError) {
    return { kind: "fatal-fault", error: normalized };
  }
  throw normalized;
}
