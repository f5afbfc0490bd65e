import type { Browser } from "playwright-core";
import { getChromiumExecutablePath } from "./scrapeWindow";

/** Anything that can turn a URL into rendered HTML. Rejects on timeout or navigation error. */
export interface PageRenderer {
  render(url: string, timeoutMs: number): Promise<string>;
}

/** A renderer backed by one long-lived browser page; close() releases the browser. */
export interface RenderSession extends PageRenderer {
  close(): Promise<void>;
}

async function launchChromium(): Promise<Browser> {
  const { chromium } = await import("playwright-core");
  return chromium.launch({
    headless: true,
    args: ["--no-sandbox"],
    executablePath: getChromiumExecutablePath(),
  });
}

/**
 * Open a headless Chromium with a single page that is reused for every render.
 * Navigations run one at a time; callers must not render concurrently.
 */
export async function openRenderSession(): Promise<RenderSession> {
  const browser = await launchChromium();
  try {
    const context = await browser.newContext();
    const page = await context.newPage();
    return {
      async render(url, timeoutMs) {
        await page.goto(url, { waitUntil: "networkidle", timeout: timeoutMs });
        return page.content();
      },
      async close() {
        await context.close();
        await browser.close();
      },
    };
  } catch (e) {
    await browser.close();
    throw e;
  }
}

/**
 * One-shot render of an infinite-scroll listing. Scrolls with the mouse wheel
 * until the measured content stops growing for two rounds or maxScrolls is reached.
 */
export async function fetchWithPlaywrightAutoScroll(
  url: string,
  opts?: {
    timeoutMs?: number;
    maxScrolls?: number;
    scrollWaitMs?: number;
    /** Count of matching elements is the growth measure; document height otherwise. */
    stabilizeSelector?: string;
  }
): Promise<string> {
  const timeoutMs = opts?.timeoutMs ?? 90_000;
  const maxScrolls = opts?.maxScrolls ?? 20;
  const scrollWaitMs = opts?.scrollWaitMs ?? 1000;
  const stabilizeSelector = opts?.stabilizeSelector;

  const browser = await launchChromium();
  try {
    const context = await browser.newContext();
    const page = await context.newPage();
    await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });

    const measure = async (): Promise<number> =>
      stabilizeSelector
        ? page.locator(stabilizeSelector).count()
        : page.evaluate(() => document.body.scrollHeight);

    let stableRounds = 0;
    let prev = await measure();

    for (let i = 0; i < maxScrolls; i++) {
      await page.mouse.wheel(0, 5000);
      await page.waitForTimeout(scrollWaitMs);

      const next = await measure();
      if (next === prev) stableRounds++;
      else stableRounds = 0;
      prev = next;

      if (stableRounds >= 2) break;
    }

    return await page.content();
  } finally {
    await browser.close();
  }
}
