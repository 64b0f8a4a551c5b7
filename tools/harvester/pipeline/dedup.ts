import { readLines } from "../lib/lines.js";

/**
 * Exact-string seen-set. Owned by a single run; membership is the only
 * thing that matters, so lines are compared byte for byte.
 */
export class DedupAccumulator {
  private readonly seen = new Set<string>();

  static fromLines(lines: Iterable<string>): DedupAccumulator {
    const accumulator = new DedupAccumulator();
    accumulator.observe(lines);
    return accumulator;
  }

  /** Replays a raw log; empty lines are skipped as the finalizer skips them. */
  static fromRawLog(path: string): { accumulator: DedupAccumulator; totalLines: number } {
    const lines = readLines(path).filter((line) => line !== "");
    return { accumulator: DedupAccumulator.fromLines(lines), totalLines: lines.length };
  }

  observe(lines: Iterable<string>): number {
    let newUnique = 0;
    for (const line of lines) {
      if (!this.seen.has(line)) {
        this.seen.add(line);
        newUnique += 1;
      }
    }
    return newUnique;
  }

  has(line: string): boolean {
    return this.seen.has(line);
  }

  get size(): number {
    return this.seen.size;
  }
}
