import { chromium, errors, type Browser, type Locator, type Page } from "playwright-core";
import { DriverTimeoutError, ExtractionError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";
import type { ExtractionSelectors, HarvestMode, RawEntry } from "../pipeline/types.js";
import type { ContainerHandle, PageCandidate, PageDriver } from "./types.js";

export interface PlaywrightDriverOptions {
  headless: boolean;
  timeoutMs: number;
}

class PlaywrightContainer implements ContainerHandle {
  constructor(
    public readonly selector: string,
    public readonly locator: Locator
  ) {}
}

export class PlaywrightPageDriver implements PageDriver {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private candidates = new Map<string, Page>();

  constructor(private readonly options: PlaywrightDriverOptions) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const page = await this.ensurePage();
    emitAgentEvent({ level: "info", eventType: "driver", message: "Navigating", url });
    await this.guard("navigate", timeoutMs, () =>
      page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs })
    );
  }

  async attachExisting(endpoint: string): Promise<PageCandidate[]> {
    emitAgentEvent({
      level: "info",
      eventType: "driver",
      message: "Connecting to running browser",
      endpoint,
    });
    const browser = await this.guard("connect", this.options.timeoutMs, () =>
      chromium.connectOverCDP(endpoint, { timeout: this.options.timeoutMs })
    );
    this.browser = browser;
    this.candidates.clear();

    const pages = browser.contexts().flatMap((context) => context.pages());
    const out: PageCandidate[] = [];
    for (const [index, page] of pages.entries()) {
      const id = String(index);
      this.candidates.set(id, page);
      out.push({ id, url: page.url(), title: await page.title() });
    }
    return out;
  }

  async selectPage(candidateId: string): Promise<void> {
    const page = this.candidates.get(candidateId);
    if (!page) {
      throw new ExtractionError(`unknown page candidate: ${candidateId}`, undefined, false);
    }
    this.page = page;
  }

  currentUrl(): string | undefined {
    return this.page?.url();
  }

  async locate(selector: string): Promise<ContainerHandle | null> {
    const page = this.requirePage();
    const locator = page.locator(selector);
    const count = await this.guard("locate", this.options.timeoutMs, () => locator.count());
    if (count === 0) {
      return null;
    }
    return new PlaywrightContainer(selector, locator.first());
  }

  async waitVisible(handle: ContainerHandle, timeoutMs: number): Promise<void> {
    const { locator } = this.resolve(handle);
    await this.guard("waitVisible", timeoutMs, () =>
      locator.waitFor({ state: "visible", timeout: timeoutMs })
    );
  }

  async readEntries(
    handle: ContainerHandle,
    selectors: ExtractionSelectors,
    mode: HarvestMode
  ): Promise<RawEntry[]> {
    const { locator } = this.resolve(handle);
    const timeout = this.options.timeoutMs;

    if (mode === "text-only") {
      const texts = await this.guard("extract", timeout, () =>
        locator.evaluate(
          (el, lineSelector) =>
            Array.from(el.querySelectorAll(lineSelector)).map((node) =>
              node instanceof HTMLElement ? node.innerText : (node.textContent ?? "")
            ),
          selectors.lineSelector,
          { timeout }
        )
      );
      return texts.map((text) => ({ text }));
    }

    return this.guard("extract", timeout, () =>
      locator.evaluate(
        (el, config) =>
          Array.from(el.querySelectorAll(config.entrySelector)).map((entry) => {
            const speakerEl = entry.querySelector(config.speakerSelector);
            const textEl = entry.querySelector(config.lineSelector);
            return {
              speakerLabel:
                speakerEl instanceof HTMLElement
                  ? speakerEl.innerText
                  : (speakerEl?.textContent ?? null),
              text: textEl instanceof HTMLElement ? textEl.innerText : (textEl?.textContent ?? null),
            };
          }),
        selectors,
        { timeout }
      )
    );
  }

  async countMatches(handle: ContainerHandle, selector: string): Promise<number> {
    const { locator } = this.resolve(handle);
    return this.guard("count", this.options.timeoutMs, () => locator.locator(selector).count());
  }

  async scrollBy(handle: ContainerHandle, delta: number): Promise<void> {
    const { locator } = this.resolve(handle);
    const timeout = this.options.timeoutMs;
    await this.guard("scroll", timeout, () =>
      locator.evaluate(
        (el, step) => {
          el.scrollBy(0, step);
        },
        delta,
        { timeout }
      )
    );
  }

  async readScrollOffset(handle: ContainerHandle): Promise<number> {
    const { locator } = this.resolve(handle);
    const timeout = this.options.timeoutMs;
    const offset = await this.guard("readScrollOffset", timeout, () =>
      locator.evaluate((el) => el.scrollTop, undefined, { timeout })
    );
    return Math.trunc(offset);
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    this.candidates.clear();
    if (browser) {
      await browser.close();
    }
  }

  private async ensurePage(): Promise<Page> {
    if (this.page) {
      return this.page;
    }
    if (!this.browser) {
      this.browser = await chromium.launch({ headless: this.options.headless });
    }
    this.page = await this.browser.newPage();
    return this.page;
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new ExtractionError("no page is open; navigate or attach first", undefined, false);
    }
    return this.page;
  }

  private resolve(handle: ContainerHandle): PlaywrightContainer {
    if (!(handle instanceof PlaywrightContainer)) {
      throw new ExtractionError(
        `container handle for ${handle.selector} was not created by this driver`,
        undefined,
        false
      );
    }
    return handle;
  }

  private async guard<T>(operation: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new DriverTimeoutError(operation, timeoutMs, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(`${operation} failed: ${message}`, error);
    }
  }
}
