import * as cheerio from "cheerio";
import type { Scraper, VenueEvent } from "../types";
import { VENUE_EVENT_COLUMNS } from "../types";
import { fetchHtml } from "../fetchHtml";
import { norm, resolveUrl, textLines } from "../domWalk";
import { dedupeBy, sortByDateTime, VENUE_EVENT_KEY } from "@/lib/normalize/normalizeRows";

const BASE_URL = "https://siauliuarena.lt";
const LIST_URL = `${BASE_URL}/renginiai/`;

const DATE_RE = /\d{4}-\d{2}-\d{2}/;
const TIME_RE = /\b\d{1,2}:\d{2}\b/;

/** How many lines after the date line may still carry its time. */
const TIME_LOOKAHEAD_LINES = 4;

/** Sorted, de-duplicated event page URLs from the listing, without query or fragment. */
export function parseSiauliuListing(html: string): string[] {
  const $ = cheerio.load(html);
  const urls = new Set<string>();
  $("a[href*='/event/']").each((_, a) => {
    const href = a.attribs.href;
    if (!href) return;
    urls.add(resolveUrl(href.split("?")[0].split("#")[0], BASE_URL));
  });
  return [...urls].sort();
}

/** One row from an event page, or null when the page has no title. */
export function parseSiauliuEvent(html: string, url: string): VenueEvent | null {
  const $ = cheerio.load(html);

  const eventName = norm($("h1, h2").first().text()) || norm($("title").first().text());
  if (!eventName) return null;

  const lines = textLines($.root()[0]);
  let date = "";
  let time = "";

  for (let idx = 0; idx < lines.length; idx++) {
    const dateMatch = lines[idx].match(DATE_RE);
    if (!dateMatch) continue;

    date = dateMatch[0];
    const sameLine = lines[idx].match(TIME_RE);
    if (sameLine) {
      time = sameLine[0];
    } else {
      for (let j = idx + 1; j < Math.min(idx + 1 + TIME_LOOKAHEAD_LINES, lines.length); j++) {
        const later = lines[j].match(TIME_RE);
        if (later) {
          time = later[0];
          break;
        }
      }
    }
    break;
  }

  return {
    event_name: eventName,
    location: "Šiaulių Arena",
    city: "Šiauliai",
    date,
    time,
    event_link: url,
  };
}

export const siauliuArenaScraper: Scraper = {
  id: "siauliuarena",
  name: "Šiaulių Arena",
  columns: VENUE_EVENT_COLUMNS,

  async scrape() {
    const urls = parseSiauliuListing(await fetchHtml(LIST_URL));
    const events: VenueEvent[] = [];

    for (const url of urls) {
      let html: string;
      try {
        html = await fetchHtml(url);
      } catch (e) {
        console.warn(`[siauliuarena] event page skipped: ${url}:`, e instanceof Error ? e.message : String(e));
        continue;
      }
      const event = parseSiauliuEvent(html, url);
      if (event) events.push(event);
    }

    return sortByDateTime(dedupeBy(events, VENUE_EVENT_KEY));
  },
};
