/** Outcome of one scraper in a run. */
export interface ScrapeResult {
  sourceId: string;
  count: number;
  /** CSV written for this table; null on dry runs and failures. */
  path: string | null;
  errors: string[];
}

export interface ScrapeRunResponse {
  ok: boolean;
  dryRun: boolean;
  totalRows: number;
  results: ScrapeResult[];
}

export interface ScraperInfo {
  id: string;
  name: string;
  columns: readonly string[];
}
