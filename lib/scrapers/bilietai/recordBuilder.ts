import type { EventRecord } from "../types";
import type { EventObject } from "../jsonLdEvent";
import { flattenText, resolveUrl } from "../domWalk";
import { scrapeTimestamp } from "@/lib/normalize/normalizeRows";
import { SITE_ROOT, type Container } from "./containerResolver";

const TIME_RE = /\b(\d{1,2}:\d{2})\b/;

/** "2025-05-01T19:00:00+03:00" -> { date: "2025-05-01", time: "19:00" }; time is "" for date-only values. */
export function splitDateTime(value: string | undefined): { date: string; time: string } {
  if (!value) return { date: "", time: "" };
  const t = value.indexOf("T");
  if (t === -1) return { date: value.trim(), time: "" };
  return { date: value.slice(0, t).trim(), time: value.slice(t + 1).trim().slice(0, 5) };
}

/** First H:MM / HH:MM in the text, or "". */
export function firstTimeInText(text: string): string {
  return text.match(TIME_RE)?.[1] ?? "";
}

export interface BuildContext {
  siteRoot?: string;
  /** Clock for scraped_at, read once per record. */
  now: () => Date;
}

/**
 * Map one JSON-LD event and its resolved container to a table row.
 * Missing fields become ""; a date without a time borrows the first time printed in the container.
 */
export function buildRecord(
  event: EventObject,
  container: Container | null,
  eventLink: string,
  ctx: BuildContext
): EventRecord {
  const { date, time } = splitDateTime(event.startDate);
  const startTime = time || (container ? firstTimeInText(flattenText(container)) : "");

  let ticketLink = event.offerUrl ?? "";
  if (ticketLink.startsWith("/")) ticketLink = resolveUrl(ticketLink, ctx.siteRoot ?? SITE_ROOT);

  return {
    title: event.name ?? "",
    location: event.location?.name ?? "",
    city: event.location?.locality ?? "",
    start_date: date,
    start_time: startTime,
    event_link: eventLink,
    ticket_link: ticketLink,
    scraped_at: scrapeTimestamp(ctx.now()),
  };
}
