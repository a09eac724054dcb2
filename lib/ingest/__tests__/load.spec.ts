import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { DatasetCache, loadProjections, type LoadedDataset } from "@/lib/ingest/load";
import { LoadError } from "@/lib/ingest/errors";

const fixture = path.resolve(__dirname, "../../../fixtures/projections/sample.csv");

describe("loadProjections", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads the fixture into a canonical table", async () => {
    const { table, summary } = await loadProjections(fixture);
    expect(table.rows.map((r) => r.name)).toEqual([
      "Alpha One",
      "Bravo Two",
      "Charlie Three",
      "Delta Four",
      "Echo Five",
    ]);
    expect(table.rows[2].team).toBe("KC");
    expect(table.rows[3].touchdown_points).toBe(null);
    expect(table.rows[3].total_projection).toBe(null);
    expect(summary.rows_loaded).toBe(5);
    expect(summary.rows_dropped).toBe(0);
    expect(summary.unknown_columns).toEqual(["Notes"]);
    expect(summary.missing_columns).toEqual([]);
  });

  it("rejects a missing file with a not_found LoadError", async () => {
    const missing = path.join(os.tmpdir(), "fantasyline-does-not-exist.csv");
    await expect(loadProjections(missing)).rejects.toBeInstanceOf(LoadError);
    await expect(loadProjections(missing)).rejects.toMatchObject({ reason: "not_found", path: missing });
  });
});

describe("DatasetCache", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "fantasyline-"));
    file = path.join(dir, "week.csv");
    fs.writeFileSync(file, "Player,Total_Projection\nAnn Lee,12\n");
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function countingCache() {
    const loader = vi.fn((f: string): Promise<LoadedDataset> => loadProjections(f));
    return { cache: new DatasetCache(loader), loader };
  }

  it("reuses the table for repeated loads of an unchanged file", async () => {
    const { cache, loader } = countingCache();
    const a = await cache.load(file);
    const b = await cache.load(file);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(b).toBe(a);
    expect(cache.size).toBe(1);
  });

  it("shares one read between concurrent loads", async () => {
    const { cache, loader } = countingCache();
    const [a, b] = await Promise.all([cache.load(file), cache.load(file)]);
    expect(loader).toHaveBeenCalledTimes(1);
    expect(b).toBe(a);
  });

  it("re-reads after invalidate", async () => {
    const { cache, loader } = countingCache();
    await cache.load(file);
    cache.invalidate(file);
    expect(cache.size).toBe(0);
    await cache.load(file);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("re-reads when the file changes on disk", async () => {
    const { cache, loader } = countingCache();
    const first = await cache.load(file);
    fs.writeFileSync(file, "Player,Total_Projection\nAnn Lee,12\nBob Ray,9\n");
    const second = await cache.load(file);
    expect(loader).toHaveBeenCalledTimes(2);
    expect(first.table.rows).toHaveLength(1);
    expect(second.table.rows).toHaveLength(2);
  });

  it("does not cache failed loads", async () => {
    const loader = vi
      .fn((f: string): Promise<LoadedDataset> => loadProjections(f))
      .mockRejectedValueOnce(new Error("disk hiccup"));
    const cache = new DatasetCache(loader);
    await expect(cache.load(file)).rejects.toMatchObject({ name: "LoadError", reason: "unreadable" });
    expect(cache.size).toBe(0);
    const ok = await cache.load(file);
    expect(ok.table.rows[0].name).toBe("Ann Lee");
  });

  it("reports a missing file as not_found", async () => {
    const cache = new DatasetCache();
    await expect(cache.load(path.join(dir, "nope.csv"))).rejects.toMatchObject({ reason: "not_found" });
  });
});
