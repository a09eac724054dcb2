import { promises as fs } from "fs";
import path from "path";
import type { IngestSummary, ProjectionTable } from "@/lib/domain/types";
import { COLUMN_KEYS } from "@/lib/domain/types";
import { LoadError } from "./errors";
import { parseProjectionsCsv, type ParseReport } from "./parse";

export type LoadedDataset = {
  table: ProjectionTable;
  summary: IngestSummary;
  errors: ParseReport["errors"];
};

function errnoCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

function toLoadError(file: string, e: unknown): LoadError {
  if (e instanceof LoadError) return e;
  const code = errnoCode(e);
  if (code === "ENOENT" || code === "ENOTDIR") {
    return new LoadError(file, "not_found", `Projections file not found: ${file}`, { cause: e });
  }
  const detail = e instanceof Error ? e.message : String(e);
  return new LoadError(file, "unreadable", `Could not read projections file ${file}: ${detail}`, { cause: e });
}

export async function loadProjections(file: string): Promise<LoadedDataset> {
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e) {
    throw toLoadError(file, e);
  }

  const rep = parseProjectionsCsv(text, file);
  const summary: IngestSummary = {
    source: file,
    rows_loaded: rep.table.rows.length,
    rows_dropped: rep.droppedRows,
    unknown_columns: rep.unknownColumns,
    missing_columns: COLUMN_KEYS.filter((k) => !rep.table.columns.includes(k)),
  };

  if (rep.droppedRows > 0) {
    console.warn(`[projections] dropped ${rep.droppedRows} of ${rep.rowCount} rows from ${file}`);
  }
  if (rep.unknownColumns.length > 0) {
    console.warn(`[projections] ignoring columns: ${rep.unknownColumns.join(", ")}`);
  }

  return { table: rep.table, summary, errors: rep.errors };
}

type CacheEntry = {
  mtimeMs: number;
  size: number;
  pending: Promise<LoadedDataset>;
};

/**
 * Memoizes loads per file. An entry is reused while the file's mtime and size
 * are unchanged; concurrent loads of the same version share one read.
 * Failed loads are evicted so the next call retries.
 */
export class DatasetCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly loader: (file: string) => Promise<LoadedDataset> = loadProjections) {}

  get size(): number {
    return this.entries.size;
  }

  async load(file: string): Promise<LoadedDataset> {
    const key = path.resolve(file);
    let stat: { mtimeMs: number; size: number };
    try {
      stat = await fs.stat(key);
    } catch (e) {
      this.entries.delete(key);
      throw toLoadError(file, e);
    }

    const hit = this.entries.get(key);
    if (hit && hit.mtimeMs === stat.mtimeMs && hit.size === stat.size) {
      return hit.pending;
    }

    const pending = this.loader(file);
    const entry: CacheEntry = { mtimeMs: stat.mtimeMs, size: stat.size, pending };
    this.entries.set(key, entry);
    try {
      return await pending;
    } catch (e) {
      if (this.entries.get(key) === entry) this.entries.delete(key);
      throw toLoadError(file, e);
    }
  }

  invalidate(file?: string): void {
    if (file === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(path.resolve(file));
  }
}
