import type { PageDriver } from "../driver/types.js";
import type { DoctorConfig } from "./config.js";
import { EXIT_OK, EXIT_SELECTOR_ERROR } from "./exit-codes.js";
import type { Logger } from "./logger.js";
import type { HarvestMode, RawEntry } from "./types.js";

export interface DoctorReport {
  containerFound: boolean;
  containerSelector: string;
  mode?: HarvestMode;
  lineSelector?: string;
  lineCount?: number;
  entrySelector?: string;
  speakerSelector?: string;
  entryCount?: number;
  speakerCount?: number;
  textCount?: number;
  /** First entry exactly as read, so a blank text selector shows up here. */
  sampleEntry?: RawEntry | null;
}

/** Checks the selectors against a live page before committing to a run. */
export async function runDoctor(
  config: DoctorConfig,
  driver: PageDriver,
  logger: Logger
): Promise<{ report: DoctorReport; exitCode: number }> {
  try {
    await driver.navigate(config.url, config.timeoutMs);
    const container = await driver.locate(config.containerSelector);
    const report: DoctorReport = {
      containerFound: container !== null,
      containerSelector: config.containerSelector,
    };

    if (!container) {
      logger.warn("Container not found", { selector: config.containerSelector });
      return { report, exitCode: EXIT_SELECTOR_ERROR };
    }

    await driver.waitVisible(container, config.timeoutMs);
    const { selectors } = config;

    if (config.mode === "text-only") {
      report.mode = "text-only";
      report.lineSelector = selectors.lineSelector;
      report.lineCount = await driver.countMatches(container, selectors.lineSelector);
    } else {
      report.mode = "with-speaker";
      report.entrySelector = selectors.entrySelector;
      report.speakerSelector = selectors.speakerSelector;
      report.lineSelector = selectors.lineSelector;
      report.entryCount = await driver.countMatches(container, selectors.entrySelector);
      report.speakerCount = await driver.countMatches(container, selectors.speakerSelector);
      report.textCount = await driver.countMatches(container, selectors.lineSelector);
      report.sampleEntry =
        report.entryCount > 0
          ? ((await driver.readEntries(container, selectors, "with-speaker"))[0] ?? null)
          : null;
    }

    logger.info("Selector check finished", { ...report });
    return { report, exitCode: EXIT_OK };
  } finally {
    await driver.close();
  }
}
