import { describe, it, expect, afterEach, vi } from "vitest";
import {
  getChromiumExecutablePath,
  getListingPagesToCheck,
  getOutputDir,
  getRenderTimeoutMs,
} from "./scrapeWindow";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("scrape configuration", () => {
  it("uses defaults when variables are unset", () => {
    vi.stubEnv("BILIETAI_PAGES", "");
    vi.stubEnv("OUTPUT_DIR", "");
    vi.stubEnv("CHROMIUM_EXECUTABLE_PATH", "");
    expect(getListingPagesToCheck()).toBe(6);
    expect(getOutputDir()).toBe("output");
    expect(getChromiumExecutablePath()).toBeUndefined();
  });

  it("reads positive integers from the environment", () => {
    vi.stubEnv("BILIETAI_PAGES", " 3 ");
    vi.stubEnv("RENDER_TIMEOUT_MS", "45000");
    expect(getListingPagesToCheck()).toBe(3);
    expect(getRenderTimeoutMs()).toBe(45000);
  });

  it("falls back on values that are not positive integers", () => {
    vi.stubEnv("BILIETAI_PAGES", "0");
    vi.stubEnv("RENDER_TIMEOUT_MS", "soon");
    expect(getListingPagesToCheck()).toBe(6);
    expect(getRenderTimeoutMs()).toBe(90_000);
  });

  it("reads paths as given", () => {
    vi.stubEnv("OUTPUT_DIR", "/tmp/tables");
    vi.stubEnv("CHROMIUM_EXECUTABLE_PATH", "/usr/bin/chromium");
    expect(getOutputDir()).toBe("/tmp/tables");
    expect(getChromiumExecutablePath()).toBe("/usr/bin/chromium");
  });
});
