import * as cheerio from "cheerio";
import type { EventRecord } from "../types";
import type { PageRenderer, RenderSession } from "../fetchPlaywright";
import { extractJsonLdEvents } from "../jsonLdEvent";
import { dedupeBy, EVENT_RECORD_KEY } from "@/lib/normalize/normalizeRows";
import { resolveContainer, SITE_ROOT } from "./containerResolver";
import { buildRecord, type BuildContext } from "./recordBuilder";
import { expandSeries, isSeriesPlaceholder } from "./series";

const LISTING_URL =
  "https://www.bilietai.lt/eng/tickets/visi/" +
  "category:1002,1005,1006/" +
  "status:insales,sold_out/" +
  "order:date,asc/" +
  "page:{page}/" +
  "venue:294187,45371,103680,208473,39028,39404,41503," +
  "39103,84421,40473,39368,39220,317656,40052,47301," +
  "45058,90741,190114,39105,45041/";

/** Listing pages 1..pagesToCheck. */
export function listingUrls(pagesToCheck: number): string[] {
  const urls: string[] = [];
  for (let page = 1; page <= pagesToCheck; page++) {
    urls.push(LISTING_URL.replace("{page}", String(page)));
  }
  return urls;
}

/**
 * Everything one crawl run has learned so far. Created per run and threaded
 * through both phases; nothing outlives the run.
 */
export interface CrawlState {
  /** Detail links already turned into a row or a series candidate. */
  readonly seenEventLinks: ReadonlySet<string>;
  /** Series link -> placeholder row used when expansion finds nothing. Insertion order is expansion order. */
  readonly seriesLinks: ReadonlyMap<string, EventRecord>;
  /** Direct events, in the order they were found. */
  readonly records: readonly EventRecord[];
}

export function emptyCrawlState(): CrawlState {
  return { seenEventLinks: new Set(), seriesLinks: new Map(), records: [] };
}

/**
 * Fold one rendered listing page into the state. Blocks without an unambiguous
 * link are dropped, links seen on an earlier page are skipped, and the rest go
 * either to the direct rows or to the pending series.
 */
export function absorbListingPage(state: CrawlState, html: string, ctx: BuildContext): CrawlState {
  const $ = cheerio.load(html);
  const seen = new Set(state.seenEventLinks);
  const series = new Map(state.seriesLinks);
  const records = [...state.records];

  for (const { block, event } of extractJsonLdEvents($)) {
    const { container, link } = resolveContainer($, block, ctx.siteRoot);
    if (!link || seen.has(link)) continue;
    seen.add(link);

    const record = buildRecord(event, container, link, ctx);
    if (isSeriesPlaceholder(record, container)) {
      series.set(link, record);
    } else {
      records.push(record);
    }
  }

  return { seenEventLinks: seen, seriesLinks: series, records };
}

export interface CrawlContext extends BuildContext {
  timeoutMs: number;
}

/** Phase one: walk the listing pages in order. A page that fails to render contributes nothing. */
export async function collectListings(
  renderer: PageRenderer,
  urls: readonly string[],
  state: CrawlState,
  ctx: CrawlContext
): Promise<CrawlState> {
  let next = state;
  for (const url of urls) {
    let html: string;
    try {
      html = await renderer.render(url, ctx.timeoutMs);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      console.warn(`[bilietai] listing page skipped: ${url}: ${msg}`);
      continue;
    }
    next = absorbListingPage(next, html, ctx);
  }
  return next;
}

/** Phase two: expand each pending series exactly once, after all listing pages are done. */
export async function expandPending(
  renderer: PageRenderer,
  state: CrawlState,
  ctx: CrawlContext
): Promise<EventRecord[]> {
  const expanded: EventRecord[] = [];
  for (const [seriesUrl, fallback] of state.seriesLinks) {
    expanded.push(...(await expandSeries(renderer, seriesUrl, fallback, ctx)));
  }
  return expanded;
}

export interface CrawlOptions {
  pagesToCheck: number;
  timeoutMs: number;
  /** Opens the browser; a rejection here aborts the run. */
  openSession: () => Promise<RenderSession>;
  now?: () => Date;
  /** Overrides the listing pages derived from pagesToCheck. */
  urls?: readonly string[];
}

/**
 * Full bilietai.lt run: listings, then series expansion, then dedup on
 * (title, start_date, start_time, location). The session is closed once at the
 * end however many pages failed.
 */
export async function crawlBilietai(opts: CrawlOptions): Promise<EventRecord[]> {
  const ctx: CrawlContext = {
    siteRoot: SITE_ROOT,
    now: opts.now ?? (() => new Date()),
    timeoutMs: opts.timeoutMs,
  };
  const urls = opts.urls ?? listingUrls(opts.pagesToCheck);

  const session = await opts.openSession();
  try {
    const state = await collectListings(session, urls, emptyCrawlState(), ctx);
    const expanded = await expandPending(session, state, ctx);
    return dedupeBy([...state.records, ...expanded], EVENT_RECORD_KEY);
  } finally {
    await session.close();
  }
}
