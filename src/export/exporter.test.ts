import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { runExport } from "./exporter";
import type { Reporter } from "./reporter";
import { TransportError } from "../errors";
import { createTestConfig, subscriptionsBody } from "../test-utils/fixtures";

const logger = pino({ level: "silent" });
const now = new Date(2024, 0, 15, 10, 0);

const techNews = {
  name: "Tech News",
  url: "https://example.com/feed",
  folder: "News",
  createdAt: "2024-01-01T00:00:00Z",
  lastFetchedAt: "2024-01-01T00:00:05Z",
};

function createMockReporter(): Reporter & {
  fetching: ReturnType<typeof vi.fn>;
  filtered: ReturnType<typeof vi.fn>;
  subscriptions: ReturnType<typeof vi.fn>;
  exported: ReturnType<typeof vi.fn>;
} {
  return {
    fetching: vi.fn(),
    filtered: vi.fn(),
    subscriptions: vi.fn(),
    exported: vi.fn(),
  };
}

function stubResponse(items: ReadonlyArray<Record<string, unknown>>): void {
  vi.stubGlobal(
    "fetch",
    vi.fn().mockResolvedValue(new Response(subscriptionsBody(items))),
  );
}

describe("runExport", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "opml-export-test-"));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should drop a subscription fetched 5 seconds after creation when excluding unfetched", async () => {
    stubResponse([techNews]);
    const reporter = createMockReporter();

    const result = await runExport({
      config: createTestConfig(),
      options: { excludeUnfetched: true },
      reporter,
      logger,
      outputDir: tmpDir,
      now,
    });

    expect(result).toEqual({
      outputPath: join(tmpDir, "omnivore_rss_export_20240115.opml"),
      fetchedCount: 1,
      removedCount: 1,
      exportedFeedCount: 0,
    });
    expect(reporter.filtered).toHaveBeenCalledWith(1);
    expect(reporter.subscriptions).toHaveBeenCalledWith([]);

    const opml = readFileSync(result.outputPath, "utf-8");
    expect(opml).toContain("  <body>\n  </body>");
  });

  it("should export the folder outline when not filtering", async () => {
    stubResponse([techNews]);
    const reporter = createMockReporter();

    const result = await runExport({
      config: createTestConfig(),
      options: { excludeUnfetched: false },
      reporter,
      logger,
      outputDir: tmpDir,
      now,
    });

    const opml = readFileSync(result.outputPath, "utf-8");
    expect(opml).toContain(
      [
        '    <outline text="News" title="News">',
        '      <outline type="rss" text="Tech News" title="Tech News" xmlUrl="https://example.com/feed"/>',
        "    </outline>",
      ].join("\n"),
    );
    expect(reporter.filtered).not.toHaveBeenCalled();
    expect(result.removedCount).toBe(0);
    expect(result.exportedFeedCount).toBe(1);
  });

  it("should report subscriptions without a URL but leave them out of the file", async () => {
    stubResponse([
      { name: "Newsletter Only", folder: "Letters", newsletterEmail: "x@example.com" },
    ]);
    const reporter = createMockReporter();

    const result = await runExport({
      config: createTestConfig(),
      options: { excludeUnfetched: false },
      reporter,
      logger,
      outputDir: tmpDir,
      now,
    });

    const reported = reporter.subscriptions.mock.calls[0]?.[0];
    expect(reported).toHaveLength(1);
    expect(readFileSync(result.outputPath, "utf-8")).not.toContain(
      "Newsletter Only",
    );
  });

  it("should not report a filter step when nothing was removed", async () => {
    stubResponse([
      { ...techNews, lastFetchedAt: "2024-01-05T00:00:00Z" },
    ]);
    const reporter = createMockReporter();

    await runExport({
      config: createTestConfig(),
      options: { excludeUnfetched: true },
      reporter,
      logger,
      outputDir: tmpDir,
      now,
    });

    expect(reporter.filtered).not.toHaveBeenCalled();
    expect(reporter.exported).toHaveBeenCalledWith(
      join(tmpDir, "omnivore_rss_export_20240115.opml"),
    );
  });

  it("should write no file when the fetch fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("down", { status: 503 })),
    );
    const reporter = createMockReporter();

    await expect(
      runExport({
        config: createTestConfig(),
        options: { excludeUnfetched: false },
        reporter,
        logger,
        outputDir: tmpDir,
        now,
      }),
    ).rejects.toBeInstanceOf(TransportError);

    expect(reporter.fetching).toHaveBeenCalledOnce();
    expect(reporter.subscriptions).not.toHaveBeenCalled();
    expect(existsSync(join(tmpDir, "omnivore_rss_export_20240115.opml"))).toBe(false);
  });
});
