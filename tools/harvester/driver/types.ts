import type { ExtractionSelectors, HarvestMode, RawEntry } from "../pipeline/types.js";

export interface ContainerHandle {
  readonly selector: string;
}

export interface PageCandidate {
  id: string;
  url: string;
  title: string;
}

/**
 * Browser automation surface consumed by the harvest loop. Implementations
 * own their timeouts and surface them as `DriverTimeoutError`; other
 * transient DOM failures surface as `ExtractionError`.
 */
export interface PageDriver {
  navigate(url: string, timeoutMs: number): Promise<void>;
  attachExisting(endpoint: string): Promise<PageCandidate[]>;
  selectPage(candidateId: string): Promise<void>;
  currentUrl(): string | undefined;
  locate(selector: string): Promise<ContainerHandle | null>;
  waitVisible(handle: ContainerHandle, timeoutMs: number): Promise<void>;
  /** Entries currently in the DOM, in document order and unfiltered. */
  readEntries(
    handle: ContainerHandle,
    selectors: ExtractionSelectors,
    mode: HarvestMode
  ): Promise<RawEntry[]>;
  countMatches(handle: ContainerHandle, selector: string): Promise<number>;
  scrollBy(handle: ContainerHandle, delta: number): Promise<void>;
  readScrollOffset(handle: ContainerHandle): Promise<number>;
  close(): Promise<void>;
}
