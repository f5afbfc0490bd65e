import { join } from "node:path";
import type { Scraper, TableRow } from "./types";
import type { ScrapeResult, ScrapeRunResponse } from "@/types";
import { getScrapers } from "./registry";
import { getOutputDir } from "./scrapeWindow";
import { writeCsv } from "@/lib/output/formatCsv";

export interface RunOptions {
  /** Scrape and count, but write nothing. */
  dryRun?: boolean;
  /** Run only this scraper. */
  sourceId?: string;
  outputDir?: string;
  /** Defaults to the registry. */
  scrapers?: readonly Scraper[];
  writeTable?: (path: string, columns: readonly string[], rows: readonly TableRow[]) => Promise<void>;
}

export function tableName(scraper: Pick<Scraper, "id">): string {
  return `df_${scraper.id}`;
}

/**
 * Run scrapers one after another and save each table as CSV.
 * A failing scraper is logged and reported; it never stops the others.
 */
export async function runScrapers(opts: RunOptions = {}): Promise<ScrapeResult[]> {
  const outputDir = opts.outputDir ?? getOutputDir();
  const writeTable = opts.writeTable ?? writeCsv;
  const all = opts.scrapers ?? getScrapers();
  const selected = opts.sourceId ? all.filter((s) => s.id === opts.sourceId) : all;

  const results: ScrapeResult[] = [];
  for (const scraper of selected) {
    const name = tableName(scraper);
    try {
      const rows = await scraper.scrape();
      console.log(`${name}: ${rows.length} rows`);

      let path: string | null = null;
      if (!opts.dryRun) {
        path = join(outputDir, `${name}.csv`);
        await writeTable(path, scraper.columns, rows);
        console.log(`Saved: ${path}`);
      }
      results.push({ sourceId: scraper.id, count: rows.length, path, errors: [] });
    } catch (e) {
      console.error(`[scrape] ${scraper.id} failed:`, e);
      const msg = e instanceof Error ? e.message : String(e);
      results.push({ sourceId: scraper.id, count: 0, path: null, errors: [msg] });
    }
  }
  return results;
}

/** Response body of a run: `ok` only when no scraper reported an error. */
export function summarizeRun(results: ScrapeResult[], dryRun: boolean): ScrapeRunResponse {
  return {
    ok: results.every((r) => r.errors.length === 0),
    dryRun,
    totalRows: results.reduce((sum, r) => sum + r.count, 0),
    results,
  };
}
