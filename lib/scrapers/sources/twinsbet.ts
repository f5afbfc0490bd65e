import * as cheerio from "cheerio";
import type { Scraper, VenueEvent } from "../types";
import { VENUE_EVENT_COLUMNS } from "../types";
import { fetchHtml } from "../fetchHtml";
import { DocumentWalk, hasHref, resolveUrl } from "../domWalk";
import { dedupeBy } from "@/lib/normalize/normalizeRows";

const EVENTS_URL = "https://twinsbetarena.lt/en/events/";

const DATE_RE = /(\d{4}-\d{2}-\d{2})/;
const TIME_ONLY_RE = /^\s*\d{2}:\d{2}\s*$/;

/** Card chrome that sits between a title and its date. */
function isValidNameText(s: string): boolean {
  const text = s.trim();
  if (!text) return false;
  if (text.includes("Price from") || text.includes("Buy a ticket")) return false;
  if (text === "Category" || text === "All categories" || text === "Date") return false;
  if (DATE_RE.test(text)) return false;
  return true;
}

/**
 * Cards print "YYYY-MM-DD" then "HH:MM"; the title and link come before the date.
 */
export function parseTwinsbet(html: string, pageUrl = EVENTS_URL): VenueEvent[] {
  const $ = cheerio.load(html);
  const walk = DocumentWalk.of($);
  const events: VenueEvent[] = [];

  for (const dateNode of walk.texts((s) => DATE_RE.test(s))) {
    const m = dateNode.data.match(DATE_RE);
    if (!m) continue;

    const timeNode = walk.nextText(dateNode, (s) => TIME_ONLY_RE.test(s));
    const nameNode = walk.previousText(dateNode, isValidNameText);
    const linkTag = walk.previousElement(dateNode, (el) => el.name === "a" && hasHref(el));

    events.push({
      event_name: nameNode ? nameNode.data.trim().split(/\s+/).join(" ") : "",
      location: "Twinsbet Arena",
      city: "Vilnius",
      date: m[1],
      time: timeNode ? timeNode.data.trim() : "",
      event_link: linkTag ? resolveUrl(linkTag.attribs.href, pageUrl) : "",
    });
  }

  return dedupeBy(events, VENUE_EVENT_COLUMNS);
}

export const twinsbetScraper: Scraper = {
  id: "twinsbet",
  name: "Twinsbet Arena",
  columns: VENUE_EVENT_COLUMNS,

  async scrape() {
    return parseTwinsbet(await fetchHtml(EVENTS_URL));
  },
};
