import * as cheerio from "cheerio";
import type { Scraper, VenueEvent } from "../types";
import { VENUE_EVENT_COLUMNS } from "../types";
import { fetchHtml } from "../fetchHtml";
import { flattenText, norm } from "../domWalk";
import { getCompensaPagesToCheck } from "../scrapeWindow";
import { dedupeBy, sortByDateTime, VENUE_EVENT_KEY } from "@/lib/normalize/normalizeRows";

const SITE = "https://www.compensakoncertusale.lt";
const BASE_URL = `${SITE}/events`;

/** Abbreviated month names; looked up by the first four letters, then the first three. */
const LT_MONTHS: Record<string, string> = {
  sau: "01",
  vas: "02",
  kov: "03",
  bal: "04",
  geg: "05",
  bir: "06",
  lie: "07",
  rgp: "08",
  rugp: "08",
  rug: "09",
  rugs: "09",
  spa: "10",
  lap: "11",
  gru: "12",
};

/**
 * "<title> 17 geg 19:00 … www.bilietai.lt/…" in the page's flattened text.
 * The ticket link is the only reliable end-of-card marker.
 */
const EVENT_RE =
  /(?<title>.+?)\s+(?<day>\d{1,2})\s+(?<month>[A-Za-zĄČĘĖĮŠŲŪŽąčęėįšųūž]{3,6})\s+(?<time>\d{1,2}:\d{2})\s+.*?(?<link>www\.(?:bilietai|kakava|manobilietas|ticketshop|medusa)\.lt\S*)/gu;

const EVENT_PAGE_HREF_RE = /^(?:https?:\/\/(?:www\.)?compensakoncertusale\.lt)?(?<path>\/renginiai\/[^/?#]+)\/?$/i;

/** Everything after this heading is the archive. */
const PAST_EVENTS_HEADING = "praėję renginiai";

/** How far ahead of the cursor a title slug is searched for among the page's event links. */
const SLUG_LOOKAHEAD = 8;

/** Listing pages: the bare URL, then ?page=1..pagesToCheck-1. */
export function compensaPageUrls(pagesToCheck: number): string[] {
  const urls = [BASE_URL];
  for (let i = 1; i < pagesToCheck; i++) urls.push(`${BASE_URL}?page=${i}`);
  return urls;
}

/** The listing shows day and month only; a month more than six months back belongs to next year. */
export function guessYear(monthNum: number, today: Date): number {
  const year = today.getFullYear();
  return monthNum - (today.getMonth() + 1) < -6 ? year + 1 : year;
}

export function cleanTitle(raw: string): string {
  return norm(raw)
    .replace(/\s*\|\s*Vilnius$/i, "")
    .replace(/\s*\(Vilnius\)$/i, "")
    .replace(/\s*COMPENSA\s*$/i, "")
    .replace(/^[ \-|]+|[ \-|]+$/g, "");
}

/** ASCII slug as used in the venue's /renginiai/<slug> URLs. */
export function slugify(s: string): string {
  return norm(s)
    .toLowerCase()
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function eventPageLinks($: cheerio.CheerioAPI): string[] {
  const links: string[] = [];
  const seen = new Set<string>();
  $("a[href]").each((_, a) => {
    const m = a.attribs.href.trim().match(EVENT_PAGE_HREF_RE);
    const path = m?.groups?.path;
    if (!path) return;
    const full = SITE + path;
    if (seen.has(full)) return;
    seen.add(full);
    links.push(full);
  });
  return links;
}

/**
 * Rows from one listing page. Cards are matched in the page text, then paired with
 * the page's event links in order: a link containing the title's slug wins, otherwise
 * the next unused link, otherwise the link last used for the same title, otherwise
 * the ticket link.
 */
export function parseCompensaPage(html: string, today = new Date()): VenueEvent[] {
  const $ = cheerio.load(html);
  const links = eventPageLinks($);

  let text = flattenText($.root()[0]).replace(/\s+/g, " ");
  const cut = text.toLowerCase().indexOf(PAST_EVENTS_HEADING);
  if (cut !== -1) text = text.slice(0, cut);

  const events: VenueEvent[] = [];
  const lastLinkForTitle = new Map<string, string>();
  let linkIdx = 0;

  for (const m of text.matchAll(EVENT_RE)) {
    const groups = m.groups;
    if (!groups) continue;

    const monthRaw = groups.month.toLowerCase().replace(/^\.+|\.+$/g, "");
    const monthNumStr = LT_MONTHS[monthRaw.slice(0, 4)] ?? LT_MONTHS[monthRaw.slice(0, 3)];
    if (!monthNumStr) continue;

    const year = guessYear(Number.parseInt(monthNumStr, 10), today);
    const day = groups.day.padStart(2, "0");

    const title = cleanTitle(groups.title);
    if (/\brenginiai\b/i.test(title)) continue;

    let ticketLink = groups.link;
    if (!ticketLink.startsWith("http")) ticketLink = `https://${ticketLink}`;

    let eventLink: string | undefined;
    const titleSlug = slugify(title);
    for (let j = linkIdx; j < Math.min(linkIdx + SLUG_LOOKAHEAD, links.length); j++) {
      if (titleSlug && links[j].includes(titleSlug)) {
        eventLink = links[j];
        linkIdx = j + 1;
        break;
      }
    }
    if (eventLink === undefined && linkIdx < links.length) {
      eventLink = links[linkIdx];
      linkIdx++;
    }
    if (eventLink === undefined) {
      eventLink = lastLinkForTitle.get(title) ?? ticketLink;
    }
    lastLinkForTitle.set(title, eventLink);

    events.push({
      event_name: title,
      location: "Compensa koncertų salė",
      city: "Vilnius",
      date: `${year}-${monthNumStr}-${day}`,
      time: groups.time,
      event_link: eventLink,
    });
  }

  return events;
}

export const compensaScraper: Scraper = {
  id: "compensa",
  name: "Compensa koncertų salė",
  columns: VENUE_EVENT_COLUMNS,

  async scrape() {
    const events: VenueEvent[] = [];
    for (const url of compensaPageUrls(getCompensaPagesToCheck())) {
      let html: string;
      try {
        html = await fetchHtml(url);
      } catch (e) {
        console.warn(`[compensa] listing page skipped: ${url}:`, e instanceof Error ? e.message : String(e));
        continue;
      }
      events.push(...parseCompensaPage(html));
    }
    return sortByDateTime(dedupeBy(events, VENUE_EVENT_KEY));
  },
};
