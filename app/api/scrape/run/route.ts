import { NextRequest, NextResponse } from "next/server";
import { getScraperById } from "@/lib/scrapers/registry";
import { registerAllScrapers } from "@/lib/scrapers/sources";
import { runScrapers, summarizeRun } from "@/lib/scrapers/runScrapers";

registerAllScrapers();

export const dynamic = "force-dynamic";
export const runtime = "nodejs";
/** bilietai.lt renders up to six listing pages plus every series page in a browser. */
export const maxDuration = 900;

/**
 * Run every scraper (or ?sourceId=<id>) and save df_<id>.csv tables.
 * POST /api/scrape/run?dryRun=true scrapes and counts without writing.
 */
export async function POST(req: NextRequest) {
  const { searchParams } = new URL(req.url ?? "/", "http://localhost");
  const dryRun = searchParams.get("dryRun") === "true";
  const sourceId = searchParams.get("sourceId") ?? undefined;

  if (sourceId && !getScraperById(sourceId)) {
    return NextResponse.json({ error: `Scraper "${sourceId}" not found` }, { status: 404 });
  }

  const results = await runScrapers({ dryRun, sourceId });
  return NextResponse.json(summarizeRun(results, dryRun));
}
