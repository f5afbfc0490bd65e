import { describe, it, expect } from "vitest";
import { parseKakava } from "./kakava";

const TIMESTAMP = "2025-04-01T10:00:00Z";

describe("parseKakava", () => {
  it("keeps one titled link per event URL", () => {
    const html =
      `<a href="/en/event/show-1">  Show <b>One</b> </a>` +
      `<a href="https://www.kakava.lt/en/event/show-1">Show One again</a>` +
      `<a href="/en/event/empty-2"> </a>` +
      `<a href="/en/about">About</a>` +
      `<a href="/lt/event/koncertas-3"><img alt=""><span>Koncertas</span></a>`;
    expect(parseKakava(html, TIMESTAMP)).toEqual([
      { title: "Show One", url: "https://www.kakava.lt/en/event/show-1", timestamp: TIMESTAMP },
      { title: "Koncertas", url: "https://www.kakava.lt/lt/event/koncertas-3", timestamp: TIMESTAMP },
    ]);
  });

  it("keeps non-ASCII event paths as the page writes them", () => {
    expect(parseKakava(`<a href="/lt/event/šventė-5">Šventė</a>`, TIMESTAMP)).toEqual([
      { title: "Šventė", url: "https://www.kakava.lt/lt/event/šventė-5", timestamp: TIMESTAMP },
    ]);
  });
});
