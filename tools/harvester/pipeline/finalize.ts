import { existsSync } from "fs";
import { readLines } from "../lib/lines.js";
import { writeTextAtomic } from "../lib/json.js";
import { DedupAccumulator } from "./dedup.js";
import { ConfigurationError, WriteError } from "./errors.js";
import type { DedupeMode, FinalizeResult } from "./types.js";

export function dedupeExact(lines: readonly string[]): string[] {
  const accumulator = new DedupAccumulator();
  return lines.filter((line) => accumulator.observe([line]) === 1);
}

export function assertDedupeMode(mode: string): asserts mode is DedupeMode {
  if (mode !== "exact") {
    throw new ConfigurationError(`unsupported dedupe mode: ${mode}`);
  }
}

/**
 * Rewrites the final artifact from the whole raw log: empty lines dropped,
 * first occurrence of each line kept in order. Safe to run repeatedly and on
 * the raw log of an interrupted run.
 */
export function finalizeRawLog(
  rawPath: string,
  finalPath: string,
  dedupeMode: string = "exact"
): FinalizeResult {
  assertDedupeMode(dedupeMode);
  if (!existsSync(rawPath)) {
    throw new ConfigurationError(`raw file not found: ${rawPath}`);
  }

  const lines = readLines(rawPath).filter((line) => line !== "");
  const deduped = dedupeExact(lines);
  const content = deduped.length > 0 ? `${deduped.join("\n")}\n` : "";

  try {
    writeTextAtomic(finalPath, content);
  } catch (error) {
    throw new WriteError(finalPath, error);
  }

  return { totalLines: lines.length, uniqueLines: deduped.length };
}
