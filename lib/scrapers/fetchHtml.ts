import { getFetchTimeoutMs } from "./scrapeWindow";

const UA =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";

/**
 * Fetch HTML from a URL with a desktop user-agent.
 * Throws on non-2xx responses and when the timeout elapses.
 */
export async function fetchHtml(url: string, timeoutMs = getFetchTimeoutMs()): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": UA },
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${url}`);
    }
    // Response.text() decodes as UTF-8 and replaces invalid sequences.
    return await res.text();
  } finally {
    clearTimeout(timeoutId);
  }
}
