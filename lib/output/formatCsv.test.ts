import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { formatCsv, writeCsv } from "./formatCsv";

describe("formatCsv", () => {
  it("writes a header and one line per row in column order", () => {
    const csv = formatCsv(["title", "url"], [
      { url: "https://example.test/a", title: "A" },
      { title: "B", url: "https://example.test/b" },
    ]);
    expect(csv).toBe("title,url\nA,https://example.test/a\nB,https://example.test/b\n");
  });

  it("quotes fields with commas, quotes or newlines", () => {
    const csv = formatCsv(["title"], [{ title: 'Say "hi", then\nleave' }]);
    expect(csv).toBe('title\n"Say ""hi"", then\nleave"\n');
  });

  it("leaves missing cells empty", () => {
    expect(formatCsv(["a", "b"], [{ a: "1" }])).toBe("a,b\n1,\n");
  });

  it("writes only the header for an empty table", () => {
    expect(formatCsv(["a", "b"], [])).toBe("a,b\n");
  });
});

describe("writeCsv", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("creates the directory and prefixes the file with a BOM", async () => {
    dir = await mkdtemp(join(tmpdir(), "csv-"));
    const path = join(dir, "nested", "df_test.csv");
    await writeCsv(path, ["city"], [{ city: "Šiauliai" }]);
    expect(await readFile(path, "utf-8")).toBe("\uFEFFcity\nŠiauliai\n");
  });
});
