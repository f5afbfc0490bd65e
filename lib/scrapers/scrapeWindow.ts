/**
 * Centralized scrape configuration, read from the environment on every call so
 * route handlers pick up changes without a rebuild.
 *
 * Values that are missing, non-numeric or not positive fall back to the default.
 */
function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

/** Number of bilietai.lt listing pages walked in the first crawl phase. */
export function getListingPagesToCheck(): number {
  return readPositiveInt("BILIETAI_PAGES", 6);
}

export function getCompensaPagesToCheck(): number {
  return readPositiveInt("COMPENSA_PAGES", 6);
}

export function getKakavaScrollRounds(): number {
  return readPositiveInt("KAKAVA_SCROLL_ROUNDS", 20);
}

/** Navigation timeout for headless-browser pages. */
export function getRenderTimeoutMs(): number {
  return readPositiveInt("RENDER_TIMEOUT_MS", 90_000);
}

/** Timeout for plain HTTP fetches of static pages. */
export function getFetchTimeoutMs(): number {
  return readPositiveInt("FETCH_TIMEOUT_MS", 30_000);
}

export function getOutputDir(): string {
  return process.env.OUTPUT_DIR?.trim() || "output";
}

/** Chromium binary for playwright-core; undefined lets Playwright use its own lookup. */
export function getChromiumExecutablePath(): string | undefined {
  return process.env.CHROMIUM_EXECUTABLE_PATH?.trim() || undefined;
}
