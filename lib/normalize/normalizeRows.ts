import type { EventRecord, VenueEvent } from "@/lib/scrapers/types";

/** Identity of one event occurrence in the bilietai table. */
export const EVENT_RECORD_KEY = ["title", "start_date", "start_time", "location"] as const satisfies readonly (keyof EventRecord)[];

/** Identity of one event occurrence in the venue tables. */
export const VENUE_EVENT_KEY = ["event_name", "date", "time", "location"] as const satisfies readonly (keyof VenueEvent)[];

/** UTC timestamp with second precision, e.g. "2026-10-18T12:00:00Z". */
export function scrapeTimestamp(now: Date): string {
  return now.toISOString().slice(0, 19) + "Z";
}

/**
 * Keep the first row for each combination of `keys`, preserving input order.
 */
export function dedupeBy<T extends object, K extends keyof T>(rows: readonly T[], keys: readonly K[]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const row of rows) {
    const id = JSON.stringify(keys.map((k) => row[k]));
    if (seen.has(id)) continue;
    seen.add(id);
    out.push(row);
  }
  return out;
}

/** Stable ascending sort on ISO date, then HH:MM time. */
export function sortByDateTime(rows: readonly VenueEvent[]): VenueEvent[] {
  return [...rows].sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    if (a.time !== b.time) return a.time < b.time ? -1 : 1;
    return 0;
  });
}
