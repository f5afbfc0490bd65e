import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import type { Scraper, VenueEvent } from "../types";
import { VENUE_EVENT_COLUMNS } from "../types";
import { fetchHtml } from "../fetchHtml";
import { DocumentWalk, findParent, flattenText, norm, resolveUrl } from "../domWalk";
import { dedupeBy, VENUE_EVENT_KEY } from "@/lib/normalize/normalizeRows";

const EVENTS_URL = "https://www.zalgirioarena.lt/en/events";

const DATE_RE = /^\s*(\d{4}-\d{2}-\d{2})\s*$/;
const TIME_RE = /^\s*(\d{1,2}:\d{2})\s*$/;

const LOCATIONS = new Set(["Zalgirio Arena", "SDG amphitheatre", "Outside", "Foyer"]);
const CATEGORIES = new Set([
  "Concert",
  "Conference",
  "EuroLeague",
  "Exhibition",
  "Fair",
  "LKL/KMT",
  "Other",
  "Performance",
  "Sport",
  "Stand-up",
]);

/** Card buttons; reaching one means the card had no title. */
const CARD_ACTIONS = new Set(["Buy ticket", "Information"]);

/** Lines of card fine print that follow the category in some layouts. */
const NOT_A_TITLE_PREFIXES = [
  "Duration:",
  "Doors open",
  "Organizer:",
  "From ",
  "Photography",
  "Only allowed",
  "Children",
  "Free admission",
  "No free admission",
  "New AUDI club members",
  "Audi club members",
  "Nuo ",
  "Vaikai",
  "Neįgalieji",
];

const TICKET_HOSTS = ["koobin", "kakava", "bilietai", "ticketshop", "manobilietas"];

const MAX_TITLE_LENGTH = 120;

function isValidTitle(raw: string): boolean {
  const text = norm(raw);
  if (!text) return false;
  if (LOCATIONS.has(text) || CATEGORIES.has(text) || CARD_ACTIONS.has(text)) return false;
  if (NOT_A_TITLE_PREFIXES.some((p) => text.startsWith(p))) return false;
  return text.length <= MAX_TITLE_LENGTH;
}

function usableHref(a: Element): string {
  const href = (a.attribs.href ?? "").trim();
  return href && href !== "#" ? href : "";
}

/** "Buy ticket" button of the card, else any link to a known ticket seller. */
function ticketLinkIn($: cheerio.CheerioAPI, card: Element): string {
  const anchors = $(card).find("a[href]").toArray();

  for (const a of anchors) {
    const href = usableHref(a);
    if (href && flattenText(a).toLowerCase() === "buy ticket") return resolveUrl(href, EVENTS_URL);
  }
  for (const a of anchors) {
    const href = usableHref(a);
    const lower = href.toLowerCase();
    if (href && TICKET_HOSTS.some((h) => lower.includes(h))) return resolveUrl(href, EVENTS_URL);
  }
  return "";
}

/**
 * Each card reads: date, time, location, category, title, then action buttons.
 * Cards missing any of those are skipped; a card without a ticket link is kept.
 */
export function parseZalgirioArena(html: string): VenueEvent[] {
  const $ = cheerio.load(html);
  const walk = DocumentWalk.of($);
  const events: VenueEvent[] = [];

  for (const dateNode of walk.texts((s) => DATE_RE.test(s))) {
    const dateMatch = dateNode.data.match(DATE_RE);
    if (!dateMatch) continue;

    const timeNode = walk.nextText(dateNode, (s) => TIME_RE.test(s));
    if (!timeNode) continue;

    const locNode = walk.nextText(timeNode, (s) => LOCATIONS.has(s.trim()));
    if (!locNode) continue;

    const catNode = walk.nextText(locNode, (s) => CATEGORIES.has(s.trim()));
    if (!catNode) continue;

    let title: string | null = null;
    for (const text of walk.textsAfter(catNode)) {
      const trimmed = text.data.trim();
      if (!trimmed) continue;
      if (CARD_ACTIONS.has(trimmed)) break;
      if (isValidTitle(trimmed)) {
        title = norm(trimmed);
        break;
      }
    }
    if (!title) continue;

    const card =
      findParent(dateNode, (el) => el.attribs.role === "listitem") ??
      findParent(dateNode, (el) => el.name === "li") ??
      findParent(dateNode, (el) => el.name === "div");

    events.push({
      event_name: title,
      location: norm(locNode.data),
      city: "Kaunas",
      date: dateMatch[1],
      time: timeNode.data.trim(),
      event_link: card ? ticketLinkIn($, card) : "",
    });
  }

  return dedupeBy(events, VENUE_EVENT_KEY);
}

export const zalgirioArenaScraper: Scraper = {
  id: "zalgirioarena",
  name: "Žalgirio Arena",
  columns: VENUE_EVENT_COLUMNS,

  async scrape() {
    return parseZalgirioArena(await fetchHtml(EVENTS_URL));
  },
};
