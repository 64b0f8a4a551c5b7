import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { RunConfig, RunRuntime, RunTarget } from "../pipeline/types.js";

export function makeWorkDir(): string {
  return mkdtempSync(join(tmpdir(), "scroll-harvest-"));
}

export interface ConfigOverrides {
  target?: Partial<RunTarget>;
  runtime?: Partial<RunRuntime>;
  resume?: boolean;
  finalize?: boolean;
  connectExisting?: boolean;
}

export function makeConfig(workDir: string, overrides: ConfigOverrides = {}): RunConfig {
  return {
    target: {
      url: "https://transcript.test/live",
      containerSelector: "#panel",
      lineSelector: ".text",
      entrySelector: ".entry",
      speakerSelector: ".speaker",
      mode: "with-speaker",
      ...overrides.target,
    },
    runtime: {
      maxIdleScrolls: 3,
      scrollStep: 100,
      scrollIntervalMs: 25,
      checkpointInterval: 1,
      maxRetries: 2,
      retryWaitMs: 50,
      dedupeMode: "exact",
      ...overrides.runtime,
    },
    rawOutputPath: join(workDir, "raw_output.txt"),
    finalOutputPath: join(workDir, "final_output.txt"),
    stateFilePath: join(workDir, "state.json"),
    resume: overrides.resume ?? false,
    finalize: overrides.finalize ?? true,
    headless: true,
    timeoutMs: 1000,
    connectExisting: overrides.connectExisting ?? false,
    debugPort: 9222,
    log: { format: "pretty", level: "error", console: false },
  };
}
