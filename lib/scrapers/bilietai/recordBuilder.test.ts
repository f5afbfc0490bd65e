import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { buildRecord, firstTimeInText, splitDateTime, type BuildContext } from "./recordBuilder";

const ctx: BuildContext = { now: () => new Date("2025-04-01T10:00:00.123Z") };

function card(html: string): Element {
  const el = cheerio.load(html)(".card").get(0);
  if (!el) throw new Error("fixture has no .card");
  return el;
}

describe("splitDateTime", () => {
  it("splits at the T and keeps HH:MM", () => {
    expect(splitDateTime("2025-05-01T19:00:00+03:00")).toEqual({ date: "2025-05-01", time: "19:00" });
    expect(splitDateTime("2025-06-01T18:00")).toEqual({ date: "2025-06-01", time: "18:00" });
  });

  it("returns an empty time for date-only values", () => {
    expect(splitDateTime("2025-05-02")).toEqual({ date: "2025-05-02", time: "" });
  });

  it("returns empty parts when there is no date", () => {
    expect(splitDateTime(undefined)).toEqual({ date: "", time: "" });
    expect(splitDateTime("")).toEqual({ date: "", time: "" });
  });
});

describe("firstTimeInText", () => {
  it("finds the first clock time", () => {
    expect(firstTimeInText("Doors 18:30, show 19:00")).toBe("18:30");
    expect(firstTimeInText("Starts at 9:05")).toBe("9:05");
  });

  it("returns an empty string without a time", () => {
    expect(firstTimeInText("Sold out")).toBe("");
  });
});

describe("buildRecord", () => {
  const link = "https://www.bilietai.lt/eng/tickets/jazz-night-101/";

  it("maps every field and resolves a site-relative ticket link", () => {
    const record = buildRecord(
      {
        name: "Jazz Night",
        startDate: "2025-05-01T19:00:00+03:00",
        location: { name: "Tamsta Club", locality: "Vilnius" },
        offerUrl: "/eng/tickets/jazz-night-101/buy/",
      },
      null,
      link,
      ctx
    );
    expect(record).toEqual({
      title: "Jazz Night",
      location: "Tamsta Club",
      city: "Vilnius",
      start_date: "2025-05-01",
      start_time: "19:00",
      event_link: link,
      ticket_link: "https://www.bilietai.lt/eng/tickets/jazz-night-101/buy/",
      scraped_at: "2025-04-01T10:00:00Z",
    });
  });

  it("keeps an absolute ticket link as given", () => {
    const record = buildRecord({ offerUrl: "https://tickets.example.com/a?b=1" }, null, link, ctx);
    expect(record.ticket_link).toBe("https://tickets.example.com/a?b=1");
  });

  it("fills missing fields with empty strings", () => {
    const record = buildRecord({}, null, link, ctx);
    expect(record).toEqual({
      title: "",
      location: "",
      city: "",
      start_date: "",
      start_time: "",
      event_link: link,
      ticket_link: "",
      scraped_at: "2025-04-01T10:00:00Z",
    });
  });

  it("borrows the first time printed in the container for a date-only event", () => {
    const container = card(`<div class="card"><p>Doors 18:30, show 19:00</p></div>`);
    const record = buildRecord({ startDate: "2025-05-02" }, container, link, ctx);
    expect(record.start_date).toBe("2025-05-02");
    expect(record.start_time).toBe("18:30");
  });

  it("ignores times inside scripts when borrowing", () => {
    const container = card(`<div class="card"><script>var opens = "07:45";</script><p>Starts 20:15</p></div>`);
    expect(buildRecord({ startDate: "2025-05-02" }, container, link, ctx).start_time).toBe("20:15");
  });

  it("prefers the time from the start date over the container text", () => {
    const container = card(`<div class="card"><p>Doors 18:30</p></div>`);
    expect(buildRecord({ startDate: "2025-05-02T21:00" }, container, link, ctx).start_time).toBe("21:00");
  });
});
