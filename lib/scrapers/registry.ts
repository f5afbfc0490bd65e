import type { Scraper } from "./types";

const scrapers = new Map<string, Scraper>();

/** Register once per id; later registrations with the same id are ignored. Run order is registration order. */
export function registerScraper(scraper: Scraper): void {
  if (scrapers.has(scraper.id)) return;
  scrapers.set(scraper.id, scraper);
}

export function getScrapers(): Scraper[] {
  return [...scrapers.values()];
}

export function getScraperById(id: string): Scraper | undefined {
  return scrapers.get(id);
}
