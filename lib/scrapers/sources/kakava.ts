import * as cheerio from "cheerio";
import type { ListingLink, Scraper } from "../types";
import { LISTING_LINK_COLUMNS } from "../types";
import { fetchWithPlaywrightAutoScroll } from "../fetchPlaywright";
import { flattenText, resolveUrl } from "../domWalk";
import { getKakavaScrollRounds, getRenderTimeoutMs } from "../scrapeWindow";
import { dedupeBy, scrapeTimestamp } from "@/lib/normalize/normalizeRows";

const BASE_URL = "https://www.kakava.lt";
const EVENTS_URL = `${BASE_URL}/en/events`;
const EVENT_LINK_SELECTOR = "a[href*='/event/']";

/**
 * Kakava renders its catalogue client-side and pages by infinite scroll, so only
 * the card title and event URL are available from the listing.
 */
export function parseKakava(html: string, timestamp: string): ListingLink[] {
  const $ = cheerio.load(html);
  const links: ListingLink[] = [];

  $(EVENT_LINK_SELECTOR).each((_, el) => {
    const href = el.attribs.href;
    const title = flattenText(el);
    if (!href || !title) return;
    links.push({ title, url: resolveUrl(href, BASE_URL), timestamp });
  });

  return dedupeBy(links, ["url"]);
}

export const kakavaScraper: Scraper = {
  id: "kakava_lt",
  name: "Kakava.lt",
  columns: LISTING_LINK_COLUMNS,

  async scrape() {
    const html = await fetchWithPlaywrightAutoScroll(EVENTS_URL, {
      timeoutMs: getRenderTimeoutMs(),
      maxScrolls: getKakavaScrollRounds(),
      stabilizeSelector: EVENT_LINK_SELECTOR,
    });
    return parseKakava(html, scrapeTimestamp(new Date()));
  },
};
