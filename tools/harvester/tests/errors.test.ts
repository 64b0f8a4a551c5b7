import { describe, expect, test } from "vitest";
import { join } from "path";
import { readFileSync } from "fs";
import {
  CheckpointError,
  ConfigurationError,
  ContainerNotFoundError,
  DriverTimeoutError,
  HarvestError,
  WriteError,
  normalizeHarvestError,
} from "../pipeline/errors.js";
import { exitCodeForError, exitCodeForSignal } from "../pipeline/exit-codes.js";
import { makeWorkDir } from "./helpers.js";

function fsError(): unknown {
  try {
    readFileSync(join(makeWorkDir(), "missing.txt"));
  } catch (error) {
    return error;
  }
  throw new Error("expected the read to fail");
}

describe("normalizeHarvestError", () => {
  test("passes harvest errors through", () => {
    const error = new DriverTimeoutError("scroll", 500);
    expect(normalizeHarvestError(error)).toBe(error);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe("scroll timed out after 500ms");
  });

  test("turns file system errors into write errors", () => {
    const normalized = normalizeHarvestError(fsError());
    expect(normalized).toBeInstanceOf(WriteError);
    expect(normalized.code).toBe("E_WRITE");
  });

  test("wraps anything else as unexpected", () => {
    const normalized = normalizeHarvestError(new TypeError("boom"));
    expect(normalized).toBeInstanceOf(HarvestError);
    expect(normalized.code).toBe("E_UNEXPECTED");
    expect(normalized.message).toBe("boom");
    expect(normalizeHarvestError("plain").message).toBe("plain");
  });
});

describe("exit codes", () => {
  test("map terminal signals", () => {
    expect(exitCodeForSignal("completed")).toBe(0);
    expect(exitCodeForSignal("configuration-error")).toBe(10);
    expect(exitCodeForSignal("container-not-found")).toBe(20);
    expect(exitCodeForSignal("retry-exceeded")).toBe(30);
    expect(exitCodeForSignal("write-failed")).toBe(40);
    expect(exitCodeForSignal("unexpected")).toBe(50);
  });

  test("map thrown errors", () => {
    expect(exitCodeForError(new ConfigurationError("bad flag"))).toBe(10);
    expect(exitCodeForError(new CheckpointError("bad state"))).toBe(10);
    expect(exitCodeForError(new ContainerNotFoundError("#panel"))).toBe(20);
    expect(exitCodeForError(new WriteError("/out.txt", new Error("disk full")))).toBe(40);
    expect(exitCodeForError(new Error("boom"))).toBe(50);
  });
});
