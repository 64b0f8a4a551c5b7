import { describe, expect, test } from "vitest";
import { readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { ConfigurationError } from "../pipeline/errors.js";
import { dedupeExact, finalizeRawLog } from "../pipeline/finalize.js";
import { makeWorkDir } from "./helpers.js";

function setup(raw: string): { rawPath: string; finalPath: string } {
  const dir = makeWorkDir();
  const rawPath = join(dir, "raw_output.txt");
  writeFileSync(rawPath, raw);
  return { rawPath, finalPath: join(dir, "out", "final_output.txt") };
}

describe("dedupeExact", () => {
  test("keeps the first occurrence of each line in order", () => {
    expect(dedupeExact(["b", "a", "b", "c", "a"])).toEqual(["b", "a", "c"]);
  });
});

describe("finalizeRawLog", () => {
  test("drops empty lines and duplicates", () => {
    const { rawPath, finalPath } = setup("A\tHello\nB\tWorld\nA\tHello\n\nB\tWorld\n");

    const result = finalizeRawLog(rawPath, finalPath);

    expect(result).toEqual({ totalLines: 4, uniqueLines: 2 });
    expect(readFileSync(finalPath, "utf-8")).toBe("A\tHello\nB\tWorld\n");
  });

  test("running it twice produces the same file", () => {
    const { rawPath, finalPath } = setup("x\ny\nx\n");

    finalizeRawLog(rawPath, finalPath);
    const first = readFileSync(finalPath, "utf-8");
    const second = finalizeRawLog(rawPath, finalPath);

    expect(second).toEqual({ totalLines: 3, uniqueLines: 2 });
    expect(readFileSync(finalPath, "utf-8")).toBe(first);
  });

  test("an empty raw log gives an empty final file", () => {
    const { rawPath, finalPath } = setup("");

    expect(finalizeRawLog(rawPath, finalPath)).toEqual({ totalLines: 0, uniqueLines: 0 });
    expect(readFileSync(finalPath, "utf-8")).toBe("");
  });

  test("a missing raw log is a configuration error", () => {
    const dir = makeWorkDir();
    const rawPath = join(dir, "absent.txt");

    expect(() => finalizeRawLog(rawPath, join(dir, "final.txt"))).toThrow(ConfigurationError);
    expect(() => finalizeRawLog(rawPath, join(dir, "final.txt"))).toThrow(
      `raw file not found: ${rawPath}`
    );
  });

  test("rejects dedupe modes other than exact", () => {
    const { rawPath, finalPath } = setup("a\n");

    expect(() => finalizeRawLog(rawPath, finalPath, "fuzzy")).toThrow(
      "unsupported dedupe mode: fuzzy"
    );
  });
});
