import * as cheerio from "cheerio";
import type { Scraper, VenueEvent } from "../types";
import { VENUE_EVENT_COLUMNS } from "../types";
import { fetchHtml } from "../fetchHtml";
import { DocumentWalk, hasHref, norm, resolveUrl } from "../domWalk";
import { dedupeBy, VENUE_EVENT_KEY } from "@/lib/normalize/normalizeRows";

const BASE_URL = "https://www.svyturioarena.lt";
const EVENTS_URL = `${BASE_URL}/en/renginiai/`;

/** "2025/05/17 / 19:00" on a line of its own. */
const DATE_TIME_RE = /^\s*(\d{4}\/\d{2}\/\d{2})\s*\/\s*(\d{1,2}:\d{2})\s*$/;

const MAX_TITLE_LENGTH = 120;

function isTitleCandidate(raw: string): boolean {
  const text = norm(raw);
  if (!text) return false;
  if (DATE_TIME_RE.test(text)) return false;
  if (text.startsWith("Ticket price:") || text.startsWith("Image:")) return false;
  if (text === "To buy a ticket" || text === "More") return false;
  if (!/\p{L}/u.test(text)) return false;
  return text.length <= MAX_TITLE_LENGTH;
}

/**
 * The date line precedes the title on each card, and the card's link precedes both.
 */
export function parseSvyturioArena(html: string): VenueEvent[] {
  const $ = cheerio.load(html);
  const walk = DocumentWalk.of($);
  const events: VenueEvent[] = [];

  for (const node of walk.texts((s) => DATE_TIME_RE.test(s))) {
    const m = node.data.trim().match(DATE_TIME_RE);
    if (!m) continue;

    const titleNode = walk.nextText(node, isTitleCandidate);
    if (!titleNode) continue;

    const link = walk.previousElement(node, (el) => el.name === "a" && hasHref(el));

    events.push({
      event_name: norm(titleNode.data),
      location: "Švyturio Arena",
      city: "Klaipėda",
      date: m[1].replace(/\//g, "-"),
      time: m[2],
      event_link: link ? resolveUrl(link.attribs.href, BASE_URL) : "",
    });
  }

  return dedupeBy(events, VENUE_EVENT_KEY);
}

export const svyturioArenaScraper: Scraper = {
  id: "svyturioarena",
  name: "Švyturio Arena",
  columns: VENUE_EVENT_COLUMNS,

  async scrape() {
    return parseSvyturioArena(await fetchHtml(EVENTS_URL));
  },
};
