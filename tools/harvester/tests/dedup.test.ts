import { describe, expect, test } from "vitest";
import { writeFileSync } from "fs";
import { join } from "path";
import { DedupAccumulator } from "../pipeline/dedup.js";
import { makeWorkDir } from "./helpers.js";

describe("DedupAccumulator", () => {
  test("counts only lines it has not seen before", () => {
    const accumulator = new DedupAccumulator();

    expect(accumulator.observe(["a", "b", "a"])).toBe(2);
    expect(accumulator.observe(["b", "c"])).toBe(1);
    expect(accumulator.observe([])).toBe(0);
    expect(accumulator.size).toBe(3);
    expect(accumulator.has("c")).toBe(true);
  });

  test("compares lines exactly", () => {
    const accumulator = DedupAccumulator.fromLines(["Alice\tHello"]);

    expect(accumulator.observe(["Alice\tHello ", "alice\tHello", "Alice\tHello"])).toBe(2);
  });

  test("replays a raw log skipping empty lines", () => {
    const path = join(makeWorkDir(), "raw_output.txt");
    writeFileSync(path, "a\n\na\nb\n");

    const { accumulator, totalLines } = DedupAccumulator.fromRawLog(path);

    expect(totalLines).toBe(3);
    expect(accumulator.size).toBe(2);
  });

  test("a missing raw log replays as empty", () => {
    const { accumulator, totalLines } = DedupAccumulator.fromRawLog(
      join(makeWorkDir(), "missing.txt")
    );

    expect(totalLines).toBe(0);
    expect(accumulator.size).toBe(0);
  });
});
