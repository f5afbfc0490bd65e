import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { TableRow } from "@/lib/scrapers/types";

/** Spreadsheet apps need the BOM to read the file as UTF-8. */
const UTF8_BOM = "\uFEFF";

function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Header row of `columns`, then one line per row. Missing cells are empty.
 */
export function formatCsv(columns: readonly string[], rows: readonly TableRow[]): string {
  const lines = [columns.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((c) => escapeCsvField(row[c] ?? "")).join(","));
  }
  return lines.join("\n") + "\n";
}

/** Write a table as UTF-8 CSV with a BOM, creating the directory if needed. */
export async function writeCsv(path: string, columns: readonly string[], rows: readonly TableRow[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, UTF8_BOM + formatCsv(columns, rows), "utf-8");
}
