import type { Scraper } from "../types";
import { EVENT_RECORD_COLUMNS } from "../types";
import { openRenderSession } from "../fetchPlaywright";
import { crawlBilietai } from "../bilietai/crawl";
import { getListingPagesToCheck, getRenderTimeoutMs } from "../scrapeWindow";

export const bilietaiScraper: Scraper = {
  id: "bilietai_lt",
  name: "Bilietai.lt",
  columns: EVENT_RECORD_COLUMNS,

  async scrape() {
    return crawlBilietai({
      pagesToCheck: getListingPagesToCheck(),
      timeoutMs: getRenderTimeoutMs(),
      openSession: openRenderSession,
    });
  },
};
