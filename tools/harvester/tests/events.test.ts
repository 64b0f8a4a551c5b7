import { afterEach, describe, expect, test } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import {
  initializeEventEmitter,
  renderCondensed,
  renderPretty,
  resetEventEmitter,
  shouldPrintToTerminal,
} from "../pipeline/events.js";
import { Logger } from "../pipeline/logger.js";
import { redactEvent } from "../pipeline/redact.js";
import { runInStage } from "../pipeline/telemetry-context.js";
import type { AgentEvent } from "../pipeline/types.js";
import { makeWorkDir } from "./helpers.js";

function sampleEvent(overrides: Partial<AgentEvent> = {}): AgentEvent {
  return {
    ts: "2026-02-26T00:00:00.000Z",
    runId: "run-1",
    level: "info",
    stage: "harvest",
    iteration: 3,
    eventType: "harvest.iteration",
    message: "Collected new lines",
    ...overrides,
  };
}

afterEach(() => {
  resetEventEmitter();
});

describe("event redaction", () => {
  test("redacts secret-like keys and normalizes URLs", () => {
    const redacted = redactEvent(
      sampleEvent({
        apiToken: "test-token",
        api_key: "test-key",
        cookie: "session=test-secret",
        url: "https://transcript.test/live?token=abc&page=2&id=ok",
      })
    );

    expect(redacted.apiToken).toBe("[REDACTED]");
    expect(redacted.api_key).toBe("[REDACTED]");
    expect(redacted.cookie).toBe("[REDACTED]");
    expect(redacted.url).toBe("https://transcript.test/live?page=2&id=ok");
  });

  test("truncates long strings", () => {
    const redacted = redactEvent(sampleEvent({ message: "x".repeat(500) }));

    expect(redacted.message).toBe(`${"x".repeat(240)}...[truncated]`);
  });

  test("redacts nested values", () => {
    const redacted = redactEvent(sampleEvent({ headers: { Authorization: "Bearer test-secret" } }));

    expect(redacted.headers).toEqual({ Authorization: "[REDACTED]" });
  });
});

describe("event formatting", () => {
  test("pretty format includes level, stage, iteration, eventType and extras", () => {
    const line = renderPretty(sampleEvent({ newUnique: 4, phase: "progress" }));

    expect(line).toBe(
      '2026-02-26T00:00:00.000Z INFO harvest#3 [harvest.iteration] Collected new lines newUnique=4 phase="progress"'
    );
  });

  test("pretty format without extras ends at the message", () => {
    expect(renderPretty(sampleEvent())).toBe(
      "2026-02-26T00:00:00.000Z INFO harvest#3 [harvest.iteration] Collected new lines"
    );
  });

  test("condensed format is compact and keeps only key extras", () => {
    const line = renderCondensed(
      sampleEvent({ phase: "progress", newUnique: 4, idleScrollCount: 0, scrollOffset: 900 })
    );

    expect(line).toBe("[00:00:00] harvest#3 Collected new lines | newUnique=4 idleScrollCount=0");
  });
});

describe("terminal filtering", () => {
  test("hides state and file noise at info level", () => {
    expect(shouldPrintToTerminal(sampleEvent({ eventType: "state.update" }), "info")).toBe(false);
    expect(shouldPrintToTerminal(sampleEvent({ eventType: "file.write" }), "info")).toBe(false);
    expect(shouldPrintToTerminal(sampleEvent({ eventType: "checkpoint" }), "info")).toBe(false);
  });

  test("shows iterations only when they made progress", () => {
    expect(shouldPrintToTerminal(sampleEvent(), "info")).toBe(false);
    expect(shouldPrintToTerminal(sampleEvent({ phase: "progress" }), "info")).toBe(true);
  });

  test("always shows warnings and errors", () => {
    expect(
      shouldPrintToTerminal(sampleEvent({ eventType: "checkpoint", level: "warn" }), "info")
    ).toBe(true);
    expect(shouldPrintToTerminal(sampleEvent({ eventType: "file.write", level: "error" }), "info")).toBe(
      true
    );
  });

  test("debug level prints everything", () => {
    expect(shouldPrintToTerminal(sampleEvent({ eventType: "state.update" }), "debug")).toBe(true);
  });
});

describe("event emitter", () => {
  test("writes JSON lines with the current stage and drops events below the level", async () => {
    const dir = makeWorkDir();
    const eventFilePath = join(dir, "events.jsonl");
    const eventsLogPath = join(dir, "run.log");
    initializeEventEmitter({
      runId: "run-7",
      format: "pretty",
      level: "info",
      console: false,
      eventsLogPath,
      eventFilePath,
    });
    const logger = new Logger();

    await runInStage("harvest", 2, async () => {
      logger.debug("Not written");
      logger.info("Written", { eventType: "checkpoint", password: "test-secret" });
    });

    const lines = readFileSync(eventFilePath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(1);
    const event: Record<string, unknown> = JSON.parse(lines[0]);
    expect(event.runId).toBe("run-7");
    expect(event.stage).toBe("harvest");
    expect(event.iteration).toBe(2);
    expect(event.eventType).toBe("checkpoint");
    expect(event.message).toBe("Written");
    expect(event.password).toBe("[REDACTED]");

    expect(readFileSync(eventsLogPath, "utf-8")).toContain("INFO harvest#2 [checkpoint] Written");
  });

  test("logger fills fields from its defaults", () => {
    const eventFilePath = join(makeWorkDir(), "events.jsonl");
    initializeEventEmitter({ runId: "run-8", format: "json", level: "debug", console: false, eventFilePath });

    new Logger({ eventType: "doctor" }).warn("Container not found");

    const event: Record<string, unknown> = JSON.parse(readFileSync(eventFilePath, "utf-8"));
    expect(event.eventType).toBe("doctor");
    expect(event.stage).toBe("system");
    expect(event.level).toBe("warn");
  });
});
