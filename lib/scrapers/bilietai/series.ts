import * as cheerio from "cheerio";
import type { EventRecord } from "../types";
import type { PageRenderer } from "../fetchPlaywright";
import { extractJsonLdEvents } from "../jsonLdEvent";
import { rawText } from "../domWalk";
import { resolveContainer, type Container } from "./containerResolver";
import { buildRecord, type BuildContext } from "./recordBuilder";

/** Printed on listing cards of events that play at more than one venue. */
export const MULTIPLE_VENUES_MARKER = "Different venues";

/**
 * A listing row stands for several dated occurrences when it has no venue,
 * or when its card says it plays at different venues. Either is enough.
 */
export function isSeriesPlaceholder(record: EventRecord, container: Container | null): boolean {
  if (!record.location) return true;
  return container ? rawText(container).includes(MULTIPLE_VENUES_MARKER) : false;
}

/**
 * Occurrence rows from a rendered series page. Only events with a venue and a
 * ticket URL count, and links back to the series page itself are ignored so a
 * series can never expand into itself. Falls back to the placeholder when
 * nothing qualifies.
 */
export function expandSeriesPage(
  html: string,
  seriesUrl: string,
  fallback: EventRecord,
  ctx: BuildContext
): EventRecord[] {
  const $ = cheerio.load(html);
  const rows: EventRecord[] = [];

  for (const { block, event } of extractJsonLdEvents($)) {
    if (!event.location?.name) continue;
    if (!event.offerUrl) continue;

    const { container, link } = resolveContainer($, block, ctx.siteRoot);
    if (!link || link === seriesUrl) continue;

    rows.push(buildRecord(event, container, link, ctx));
  }

  return rows.length > 0 ? rows : [fallback];
}

/**
 * Render one series page and expand it. A failed render yields the placeholder.
 * Expanded rows are final: they are never classified as series again.
 */
export async function expandSeries(
  renderer: PageRenderer,
  seriesUrl: string,
  fallback: EventRecord,
  ctx: BuildContext & { timeoutMs: number }
): Promise<EventRecord[]> {
  let html: string;
  try {
    html = await renderer.render(seriesUrl, ctx.timeoutMs);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.warn(`[bilietai] series page skipped, using placeholder: ${seriesUrl}: ${msg}`);
    return [fallback];
  }
  return expandSeriesPage(html, seriesUrl, fallback, ctx);
}
