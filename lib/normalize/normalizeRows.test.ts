import { describe, it, expect } from "vitest";
import {
  dedupeBy,
  sortByDateTime,
  scrapeTimestamp,
  EVENT_RECORD_KEY,
  VENUE_EVENT_KEY,
} from "./normalizeRows";
import type { EventRecord, VenueEvent } from "@/lib/scrapers/types";

function record(overrides: Partial<EventRecord>): EventRecord {
  return {
    title: "Concert",
    location: "Hall",
    city: "Vilnius",
    start_date: "2025-05-01",
    start_time: "19:00",
    event_link: "https://www.bilietai.lt/eng/tickets/concert-1/",
    ticket_link: "",
    scraped_at: "2025-04-01T10:00:00Z",
    ...overrides,
  };
}

function venueEvent(date: string, time: string, name = "Show"): VenueEvent {
  return { event_name: name, location: "Arena", city: "Kaunas", date, time, event_link: "" };
}

describe("dedupeBy", () => {
  it("keeps the first record per (title, start_date, start_time, location)", () => {
    const first = record({ event_link: "https://www.bilietai.lt/eng/tickets/concert-1/" });
    const second = record({ event_link: "https://www.bilietai.lt/eng/tickets/concert-2/" });
    const out = dedupeBy([first, second], EVENT_RECORD_KEY);
    expect(out).toHaveLength(1);
    expect(out[0]).toBe(first);
  });

  it("treats a different time or venue as a different occurrence", () => {
    const rows = [
      record({}),
      record({ start_time: "21:00" }),
      record({ location: "Other hall" }),
    ];
    expect(dedupeBy(rows, EVENT_RECORD_KEY)).toHaveLength(3);
  });

  it("does not confuse values that only collide when concatenated", () => {
    const a = record({ title: "A B", location: "C" });
    const b = record({ title: "A", location: "B C" });
    expect(dedupeBy([a, b], EVENT_RECORD_KEY)).toEqual([a, b]);
  });

  it("ignores columns outside the key", () => {
    const a = { ...venueEvent("2025-06-01", "20:00"), event_link: "https://a.example/1" };
    const b = { ...venueEvent("2025-06-01", "20:00"), event_link: "https://a.example/2" };
    expect(dedupeBy([a, b], VENUE_EVENT_KEY)).toEqual([a]);
  });
});

describe("sortByDateTime", () => {
  it("orders by date then time and keeps ties in input order", () => {
    const rows = [
      venueEvent("2025-06-02", "19:00", "c"),
      venueEvent("2025-06-01", "20:00", "b"),
      venueEvent("2025-06-01", "18:00", "a"),
      venueEvent("2025-06-02", "19:00", "d"),
    ];
    expect(sortByDateTime(rows).map((r) => r.event_name)).toEqual(["a", "b", "c", "d"]);
  });

  it("puts rows without a time first within their date", () => {
    const rows = [venueEvent("2025-06-01", "18:00", "timed"), venueEvent("2025-06-01", "", "untimed")];
    expect(sortByDateTime(rows).map((r) => r.event_name)).toEqual(["untimed", "timed"]);
  });
});

describe("scrapeTimestamp", () => {
  it("formats UTC with second precision and a Z suffix", () => {
    expect(scrapeTimestamp(new Date("2025-04-01T10:20:30.456Z"))).toBe("2025-04-01T10:20:30Z");
  });
});
