import type { ContainerHandle, PageCandidate, PageDriver } from "../driver/types.js";
import { ConfigurationError, ContainerNotFoundError, HarvestError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { RunConfig } from "./types.js";

const INTERNAL_PAGE_PREFIXES = ["devtools://", "chrome-extension://", "chrome://"];

export interface CandidatePick {
  candidate: PageCandidate;
  ambiguous: PageCandidate[];
}

/**
 * Chooses which tab of an attached browser to harvest. Exact URL matches win,
 * then pages under the same origin and path; otherwise the first page, with
 * the other viable pages reported as ambiguous.
 */
export function pickCandidate(candidates: readonly PageCandidate[], urlHint?: string | null): CandidatePick {
  if (candidates.length === 0) {
    throw new ConfigurationError("no open pages found in the attached browser");
  }

  const external = candidates.filter(
    (candidate) => !INTERNAL_PAGE_PREFIXES.some((prefix) => candidate.url.startsWith(prefix))
  );
  const viable = external.length > 0 ? external : [...candidates];
  if (viable.length === 1) {
    return { candidate: viable[0], ambiguous: [] };
  }

  if (urlHint) {
    const exact = viable.find((candidate) => candidate.url === urlHint);
    if (exact) {
      return { candidate: exact, ambiguous: [] };
    }
    const prefix = viable.filter((candidate) => sharesLocation(candidate.url, urlHint));
    if (prefix.length > 0) {
      return { candidate: prefix[0], ambiguous: prefix.slice(1) };
    }
  }

  return { candidate: viable[0], ambiguous: viable.slice(1) };
}

function sharesLocation(candidateUrl: string, hint: string): boolean {
  try {
    const candidate = new URL(candidateUrl);
    const target = new URL(hint);
    return candidate.origin === target.origin && candidate.pathname.startsWith(target.pathname);
  } catch {
    return false;
  }
}

/**
 * Gets the driver onto the target page and resolves the scroll container.
 * A container that is absent or never becomes visible is a structural
 * problem and is reported once, here, instead of being retried.
 */
export async function openHarvestSession(
  driver: PageDriver,
  config: RunConfig,
  logger: Logger
): Promise<ContainerHandle> {
  const { url, containerSelector } = config.target;

  if (config.connectExisting) {
    const endpoint = `http://localhost:${config.debugPort}`;
    const candidates = await driver.attachExisting(endpoint);
    const pick = pickCandidate(candidates, url);
    if (pick.ambiguous.length > 0) {
      logger.warn("Several pages match; using the first", {
        eventType: "driver",
        chosen: pick.candidate.url,
        others: pick.ambiguous.map((candidate) => candidate.url),
      });
    }
    await driver.selectPage(pick.candidate.id);
    logger.info("Attached to existing page", {
      eventType: "driver",
      url: pick.candidate.url,
      title: pick.candidate.title,
    });
    if (url && driver.currentUrl() !== url) {
      await driver.navigate(url, config.timeoutMs);
    }
  } else {
    if (!url) {
      throw new ConfigurationError("--url is required unless --connect-existing is set");
    }
    await driver.navigate(url, config.timeoutMs);
  }

  const container = await driver.locate(containerSelector);
  if (!container) {
    throw new ContainerNotFoundError(containerSelector);
  }

  try {
    await driver.waitVisible(container, config.timeoutMs);
  } catch (error) {
    if (error instanceof HarvestError && error.retryable) {
      throw new ContainerNotFoundError(containerSelector, error);
    }
    throw error;
  }

  logger.info("Container ready", { eventType: "driver", selector: containerSelector });
  return container;
}

/** Moves a fresh page back to where the previous segment of the run stopped. */
export async function restoreScrollOffset(
  driver: PageDriver,
  container: ContainerHandle,
  targetOffset: number,
  logger: Logger
): Promise<number> {
  const current = await driver.readScrollOffset(container);
  if (targetOffset <= 0 || current >= targetOffset) {
    return current;
  }
  await driver.scrollBy(container, targetOffset - current);
  const restored = await driver.readScrollOffset(container);
  logger.info("Restored scroll position", {
    eventType: "driver",
    targetOffset,
    restored,
  });
  return restored;
}
