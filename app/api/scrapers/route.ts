import { NextResponse } from "next/server";
import { getScrapers } from "@/lib/scrapers/registry";
import { registerAllScrapers } from "@/lib/scrapers/sources";
import type { ScraperInfo } from "@/types";

registerAllScrapers();

export const dynamic = "force-dynamic";

export async function GET() {
  const scrapers: ScraperInfo[] = getScrapers().map((s) => ({
    id: s.id,
    name: s.name,
    columns: s.columns,
  }));
  return NextResponse.json({ scrapers });
}
