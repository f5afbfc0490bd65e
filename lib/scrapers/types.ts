/**
 * Canonical row of the bilietai.lt table.
 * Dates are ISO "YYYY-MM-DD", times "HH:MM"; empty string when unknown.
 */
export type EventRecord = {
  title: string;
  location: string;
  city: string;
  start_date: string;
  start_time: string;
  event_link: string;
  ticket_link: string;
  scraped_at: string;
};

/** Row of the single-venue tables (arenas and concert halls). */
export type VenueEvent = {
  event_name: string;
  location: string;
  city: string;
  date: string;
  time: string;
  event_link: string;
};

/** Row of the Kakava listing table: only title and link are known without visiting each event. */
export type ListingLink = {
  title: string;
  url: string;
  timestamp: string;
};

export type TableRow = Record<string, string>;

export const EVENT_RECORD_COLUMNS = [
  "title",
  "location",
  "city",
  "start_date",
  "start_time",
  "event_link",
  "ticket_link",
  "scraped_at",
] as const satisfies readonly (keyof EventRecord)[];

export const VENUE_EVENT_COLUMNS = [
  "event_name",
  "location",
  "city",
  "date",
  "time",
  "event_link",
] as const satisfies readonly (keyof VenueEvent)[];

export const LISTING_LINK_COLUMNS = ["title", "url", "timestamp"] as const satisfies readonly (keyof ListingLink)[];

export interface Scraper {
  /** Table id; output file is df_<id>.csv. */
  id: string;
  name: string;
  columns: readonly string[];
  /** Fetch every page the source needs and return the finished, deduplicated table. */
  scrape(): Promise<TableRow[]>;
}
