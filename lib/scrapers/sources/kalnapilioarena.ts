import * as cheerio from "cheerio";
import type { Scraper, VenueEvent } from "../types";
import { VENUE_EVENT_COLUMNS } from "../types";
import { fetchHtml } from "../fetchHtml";
import { DocumentWalk, norm, resolveUrl } from "../domWalk";
import { dedupeBy, VENUE_EVENT_KEY } from "@/lib/normalize/normalizeRows";

const BASE_URL = "https://kalnapilisarena.lt";
const EVENTS_URL = `${BASE_URL}/renginiai/`;

/** Genitive month names as printed in "2025 gegužės 17 d. 19:00". */
const LT_MONTHS: Record<string, string> = {
  sausio: "01",
  vasario: "02",
  kovo: "03",
  balandžio: "04",
  gegužės: "05",
  birželio: "06",
  liepos: "07",
  rugpjūčio: "08",
  rugsėjo: "09",
  spalio: "10",
  lapkričio: "11",
  gruodžio: "12",
};

const DATE_TIME_RE = /(\d{4})\s+(\S+)\s+(\d{1,2})\s+d\.\s+(\d{1,2}:\d{2})/i;

export function parseKalnapilioArena(html: string): VenueEvent[] {
  const $ = cheerio.load(html);
  const walk = DocumentWalk.of($);
  const events: VenueEvent[] = [];

  for (const node of walk.texts((s) => DATE_TIME_RE.test(s))) {
    const m = norm(node.data).match(DATE_TIME_RE);
    if (!m) continue;

    const [, year, monthWord, day, time] = m;
    const month = LT_MONTHS[monthWord.toLowerCase()];
    if (!month) continue;

    const link = walk.previousElement(node, (el) => el.name === "a");
    if (!link) continue;

    events.push({
      event_name: norm($(link).text()),
      location: "Kalnapilio Arena",
      city: "Panevėžys",
      date: `${year}-${month}-${day.padStart(2, "0")}`,
      time,
      event_link: resolveUrl(link.attribs.href ?? "", BASE_URL),
    });
  }

  return dedupeBy(events, VENUE_EVENT_KEY);
}

export const kalnapilioArenaScraper: Scraper = {
  id: "kalnapilioarena",
  name: "Kalnapilio Arena",
  columns: VENUE_EVENT_COLUMNS,

  async scrape() {
    return parseKalnapilioArena(await fetchHtml(EVENTS_URL));
  },
};
