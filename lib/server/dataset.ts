import path from "path";
import { DEFAULT_PROJECTIONS_CSV } from "@/lib/config";
import { DatasetCache, type LoadedDataset } from "@/lib/ingest/load";
import { isLoadError } from "@/lib/ingest/errors";

// One cache per server process; route handlers share it
const cache = new DatasetCache();

export function projectionsCsvPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.PROJECTIONS_CSV?.trim();
  if (fromEnv) return path.resolve(fromEnv);
  return path.join(process.cwd(), DEFAULT_PROJECTIONS_CSV);
}

export async function getDataset(opts: { refresh?: boolean } = {}): Promise<LoadedDataset> {
  const file = projectionsCsvPath();
  if (opts.refresh) cache.invalidate(file);
  return cache.load(file);
}

export function wantsRefresh(params: URLSearchParams): boolean {
  const v = params.get("refresh");
  return v === "1" || v === "true";
}

export function errorResponse(e: unknown): Response {
  if (isLoadError(e)) {
    console.warn(`[projections] load failed (${e.reason}): ${e.message}`);
    return Response.json({ ok: false, error: e.message, reason: e.reason }, { status: 503 });
  }
  const message = e instanceof Error ? e.message : String(e);
  console.warn("[projections] request failed", message);
  return Response.json({ ok: false, error: message }, { status: 500 });
}
