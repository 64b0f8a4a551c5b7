#!/usr/bin/env node
import { parseArgs } from "util";
import { PlaywrightPageDriver } from "../driver/playwright.js";
import {
  resolveDoctorConfig,
  resolveFinalizeConfig,
  resolveLogOptions,
  resolveRunConfig,
  type RunCliInput,
} from "../pipeline/config.js";
import { runDoctor } from "../pipeline/doctor.js";
import { ConfigurationError, HarvestError } from "../pipeline/errors.js";
import { initializeEventEmitter } from "../pipeline/events.js";
import {
  EXIT_CONFIG_ERROR,
  EXIT_OK,
  exitCodeForError,
  exitCodeForSignal,
} from "../pipeline/exit-codes.js";
import { finalizeRawLog } from "../pipeline/finalize.js";
import { Logger } from "../pipeline/logger.js";
import { runHarvest } from "../pipeline/run-harvest.js";

const USAGE = `Usage: scroll-harvest <command> [options]

Commands:
  run        Scroll a container and harvest its entries
  finalize   Deduplicate a raw log into the final output
  doctor     Check selectors against the page before a run

run options:
  --url <url>                   Page to open (optional with --connect-existing or --resume)
  --container <selector>        Scrollable container (required unless resumed)
  --line-selector <selector>    Body text node (required with --text-only)
  --entry-selector <selector>   Entry element in speaker mode
  --speaker-selector <selector> Speaker label element in speaker mode
  --text-only                   Harvest body text without speaker labels
  --output-raw <path>           Raw log (default ./raw_output.txt)
  --output-final <path>         Final output (default ./final_output.txt)
  --state-file <path>           Run state checkpoint (default ./state.json)
  --resume                      Continue the run recorded in --state-file
  --max-idle-scrolls <n>        Stop after n scrolls without new lines (default 8)
  --scroll-step <px>            Pixels per scroll (default 400)
  --scroll-interval-ms <ms>     Wait between scrolls (default 600)
  --checkpoint-interval <n>     Save state every n iterations (default 5)
  --max-retries <n>             Retries per failing iteration (default 3)
  --retry-wait-ms <ms>          Wait before a retry (default 1000)
  --dedupe-mode exact           Deduplication mode (default exact)
  --timeout-ms <ms>             Driver timeout (default 30000)
  --no-headless                 Show the browser window
  --no-finalize                 Skip writing the final output
  --connect-existing            Attach to a browser started with remote debugging
  --debug-port <port>           Remote debugging port (default 9222)
  --log-level <level>           debug|info|warn|error (default info)
  --log-format <format>         pretty|json (default pretty)
  --event-file <path>           Also write events as JSON lines
  --quiet                       No terminal logging`;

function parseCliArgs(argv: string[]): { command: string | undefined; input: RunCliInput } {
  try {
    return toCliInput(argv);
  } catch (error) {
    if (error instanceof HarvestError) {
      throw error;
    }
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), error);
  }
}

function toCliInput(argv: string[]): { command: string | undefined; input: RunCliInput } {
  const parsed = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      url: { type: "string" },
      container: { type: "string" },
      "line-selector": { type: "string" },
      "entry-selector": { type: "string" },
      "speaker-selector": { type: "string" },
      "text-only": { type: "boolean" },
      "output-raw": { type: "string" },
      "output-final": { type: "string" },
      "state-file": { type: "string" },
      resume: { type: "boolean" },
      "max-idle-scrolls": { type: "string" },
      "scroll-step": { type: "string" },
      "scroll-interval-ms": { type: "string" },
      "checkpoint-interval": { type: "string" },
      "max-retries": { type: "string" },
      "retry-wait-ms": { type: "string" },
      "dedupe-mode": { type: "string" },
      "no-headless": { type: "boolean" },
      "timeout-ms": { type: "string" },
      "no-finalize": { type: "boolean" },
      "connect-existing": { type: "boolean" },
      "debug-port": { type: "string" },
      "log-level": { type: "string" },
      "log-format": { type: "string" },
      "event-file": { type: "string" },
      quiet: { type: "boolean" },
      help: { type: "boolean" },
    },
  });

  const values = parsed.values;
  if (values.help) {
    console.log(USAGE);
    process.exit(EXIT_OK);
  }

  return {
    command: parsed.positionals[0],
    input: {
      url: values.url,
      container: values.container,
      lineSelector: values["line-selector"],
      entrySelector: values["entry-selector"],
      speakerSelector: values["speaker-selector"],
      textOnly: values["text-only"],
      outputRaw: values["output-raw"],
      outputFinal: values["output-final"],
      stateFile: values["state-file"],
      resume: values.resume,
      maxIdleScrolls: values["max-idle-scrolls"],
      scrollStep: values["scroll-step"],
      scrollIntervalMs: values["scroll-interval-ms"],
      checkpointInterval: values["checkpoint-interval"],
      maxRetries: values["max-retries"],
      retryWaitMs: values["retry-wait-ms"],
      dedupeMode: values["dedupe-mode"],
      noHeadless: values["no-headless"],
      timeoutMs: values["timeout-ms"],
      noFinalize: values["no-finalize"],
      connectExisting: values["connect-existing"],
      debugPort: values["debug-port"],
      logLevel: values["log-level"],
      logFormat: values["log-format"],
      eventFile: values["event-file"],
      quiet: values.quiet,
    },
  };
}

async function runCommand(input: RunCliInput): Promise<number> {
  const config = resolveRunConfig(input);
  const driver = new PlaywrightPageDriver({
    headless: config.headless,
    timeoutMs: config.timeoutMs,
  });
  const result = await runHarvest(config, { driver });

  if (result.signal === "completed") {
    if (result.finalize) {
      console.log(
        `[finalize] total=${result.finalize.totalLines}, unique=${result.finalize.uniqueLines}, output=${config.finalOutputPath}`
      );
    }
    console.log(`[run] ${result.status} (${result.runId})`);
  } else {
    console.error(
      `[${result.signal}] run ${result.runId} ended ${result.status}: ${result.error?.message ?? "no detail"}`
    );
    console.error(`- state: ${config.stateFilePath}`);
    console.error(`- raw output: ${config.rawOutputPath}`);
    if (result.status === "interrupted") {
      console.error("Resume with --resume once the page is reachable again.");
    }
  }
  return exitCodeForSignal(result.signal);
}

function initializeCliEvents(runId: string, input: RunCliInput): void {
  const log = resolveLogOptions(input);
  initializeEventEmitter({
    runId,
    format: log.format,
    level: log.level,
    console: log.console,
    eventFilePath: log.eventFile,
  });
}

function finalizeCommand(input: RunCliInput): number {
  const config = resolveFinalizeConfig(input);
  initializeCliEvents("finalize", input);
  const { totalLines, uniqueLines } = finalizeRawLog(
    config.rawOutputPath,
    config.finalOutputPath,
    config.dedupeMode
  );
  console.log(`[finalize] total=${totalLines}, unique=${uniqueLines}, output=${config.finalOutputPath}`);
  return EXIT_OK;
}

async function doctorCommand(input: RunCliInput): Promise<number> {
  const config = resolveDoctorConfig(input);
  initializeCliEvents("doctor", input);
  const driver = new PlaywrightPageDriver({ headless: config.headless, timeoutMs: config.timeoutMs });
  const { report, exitCode } = await runDoctor(config, driver, new Logger({ stage: "doctor", eventType: "doctor" }));
  console.log(JSON.stringify(report, null, 2));
  return exitCode;
}

async function main(): Promise<number> {
  const { command, input } = parseCliArgs(process.argv.slice(2));

  switch (command) {
    case "run":
      return runCommand(input);
    case "finalize":
      return finalizeCommand(input);
    case "doctor":
      return doctorCommand(input);
    default:
      console.error(command ? `Unknown command: ${command}\n` : "Missing command\n");
      console.error(USAGE);
      return EXIT_CONFIG_ERROR;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const label = error instanceof HarvestError ? error.code : "E_UNEXPECTED";
    console.error(`[${label}]`, error instanceof Error ? error.message : error);
    if (!(error instanceof HarvestError)) {
      console.error(error);
    }
    process.exitCode = exitCodeForError(error);
  });
