import { describe, it, expect, vi, afterEach } from "vitest";
import { VisitedRegistry, buildCrawlResult } from "../crawler/base.js";

// ---------------------------------------------------------------------------
// 1. VisitedRegistry
// ---------------------------------------------------------------------------
describe("VisitedRegistry", () => {
  it("should start empty", () => {
    const registry = new VisitedRegistry();
    expect(registry.size).toBe(0);
    expect(registry.isVisited("https://example.com/")).toBe(false);
    expect(registry.urls()).toEqual([]);
  });

  it("should report a marked URL as visited", () => {
    const registry = new VisitedRegistry();
    registry.markVisited("https://example.com/docs");

    expect(registry.isVisited("https://example.com/docs")).toBe(true);
    expect(registry.size).toBe(1);
  });

  it("should treat marking twice as a no-op", () => {
    const registry = new VisitedRegistry();
    registry.markVisited("https://example.com/docs");
    registry.markVisited("https://example.com/docs");

    expect(registry.size).toBe(1);
  });

  it("should compare URLs exactly, without normalization", () => {
    const registry = new VisitedRegistry();
    registry.markVisited("https://example.com/docs");

    expect(registry.isVisited("https://example.com/docs/")).toBe(false);
    expect(registry.isVisited("https://example.com/docs#intro")).toBe(false);
  });

  it("should list URLs in marking order", () => {
    const registry = new VisitedRegistry();
    registry.markVisited("https://example.com/b");
    registry.markVisited("https://example.com/a");
    registry.markVisited("https://example.com/b");

    expect(registry.urls()).toEqual(["https://example.com/b", "https://example.com/a"]);
  });

  it("should return a snapshot that later marks do not change", () => {
    const registry = new VisitedRegistry();
    registry.markVisited("https://example.com/a");
    const snapshot = registry.urls();
    registry.markVisited("https://example.com/b");

    expect(snapshot).toEqual(["https://example.com/a"]);
  });

  it("should keep separate instances independent", () => {
    const first = new VisitedRegistry();
    const second = new VisitedRegistry();
    first.markVisited("https://example.com/");

    expect(second.isVisited("https://example.com/")).toBe(false);
  });

  it("should serialize marks from interleaved async callers", async () => {
    const registry = new VisitedRegistry();
    const urls = Array.from({ length: 20 }, (_, i) => `https://example.com/${i % 5}`);

    await Promise.all(
      urls.map(async (url) => {
        await Promise.resolve();
        registry.markVisited(url);
      }),
    );

    expect(registry.size).toBe(5);
  });
});

// ---------------------------------------------------------------------------
// 2. buildCrawlResult
// ---------------------------------------------------------------------------
describe("buildCrawlResult", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should report visited URLs, their count, the limit flag and the duration", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:01.500Z"));

    const registry = new VisitedRegistry();
    registry.markVisited("https://example.com/");
    registry.markVisited("https://example.com/about");

    const result = buildCrawlResult(
      "https://example.com/",
      registry,
      true,
      new Date("2026-01-01T00:00:00.000Z").getTime(),
    );

    expect(result).toEqual({
      seedUrl: "https://example.com/",
      visited: ["https://example.com/", "https://example.com/about"],
      stats: { totalPages: 2, duration: 1500, limitReached: true },
    });
  });
});
