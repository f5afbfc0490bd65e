import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import type { Scraper, TableRow } from "./types";
import { runScrapers, summarizeRun, tableName } from "./runScrapers";

const rows: TableRow[] = [
  { title: "A", url: "https://example.test/a", timestamp: "2025-04-01T10:00:00Z" },
  { title: "B", url: "https://example.test/b", timestamp: "2025-04-01T10:00:00Z" },
];

const alpha: Scraper = {
  id: "alpha",
  name: "Alpha",
  columns: ["title", "url", "timestamp"],
  scrape: async () => rows,
};

const failure = new Error("HTTP 503: https://example.test/beta");
const beta: Scraper = {
  id: "beta",
  name: "Beta",
  columns: ["title"],
  scrape: async () => {
    throw failure;
  },
};

describe("runScrapers", () => {
  const writeTable = vi.fn(async () => {});

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    writeTable.mockClear();
  });

  it("saves every table and reports a failing scraper without stopping", async () => {
    const results = await runScrapers({ scrapers: [beta, alpha], outputDir: "out", writeTable });

    const path = join("out", "df_alpha.csv");
    expect(results).toEqual([
      { sourceId: "beta", count: 0, path: null, errors: ["HTTP 503: https://example.test/beta"] },
      { sourceId: "alpha", count: 2, path, errors: [] },
    ]);
    expect(writeTable).toHaveBeenCalledTimes(1);
    expect(writeTable).toHaveBeenCalledWith(path, alpha.columns, rows);
    expect(console.log).toHaveBeenCalledWith("df_alpha: 2 rows");
    expect(console.log).toHaveBeenCalledWith(`Saved: ${path}`);
    expect(console.error).toHaveBeenCalledWith("[scrape] beta failed:", failure);
  });

  it("writes nothing on a dry run", async () => {
    const results = await runScrapers({ scrapers: [alpha], outputDir: "out", writeTable, dryRun: true });
    expect(results).toEqual([{ sourceId: "alpha", count: 2, path: null, errors: [] }]);
    expect(writeTable).not.toHaveBeenCalled();
  });

  it("runs only the requested scraper", async () => {
    const results = await runScrapers({ scrapers: [alpha, beta], outputDir: "out", writeTable, sourceId: "beta" });
    expect(results.map((r) => r.sourceId)).toEqual(["beta"]);
    expect(writeTable).not.toHaveBeenCalled();
  });

  it("reports a failed write as a scraper error", async () => {
    const failingWrite = vi.fn(async () => {
      throw new Error("EACCES: permission denied");
    });
    const results = await runScrapers({ scrapers: [alpha], outputDir: "out", writeTable: failingWrite });
    expect(results).toEqual([{ sourceId: "alpha", count: 0, path: null, errors: ["EACCES: permission denied"] }]);
  });
});

describe("tableName", () => {
  it("prefixes the scraper id", () => {
    expect(tableName({ id: "bilietai_lt" })).toBe("df_bilietai_lt");
  });
});

describe("summarizeRun", () => {
  it("reports dryRun false explicitly on a real run", () => {
    const results = [{ sourceId: "alpha", count: 2, path: join("out", "df_alpha.csv"), errors: [] }];
    expect(summarizeRun(results, false)).toEqual({ ok: true, dryRun: false, totalRows: 2, results });
  });

  it("is not ok when any scraper reported an error", () => {
    const results = [
      { sourceId: "alpha", count: 2, path: null, errors: [] },
      { sourceId: "beta", count: 0, path: null, errors: ["HTTP 503: https://example.test/beta"] },
    ];
    expect(summarizeRun(results, true)).toEqual({ ok: false, dryRun: true, totalRows: 2, results });
  });
});
