import { COLUMN_HEADERS, COLUMN_KEYS, type ColumnKey } from "@/lib/domain/types";

// Source header spellings per canonical column, preferred spelling first.
// Exact match only (after trimming surrounding whitespace).
export const HEADER_ALIASES: Record<ColumnKey, readonly string[]> = {
  name: [COLUMN_HEADERS.name],
  team: [COLUMN_HEADERS.team],
  position: [COLUMN_HEADERS.position],
  base_projection: [COLUMN_HEADERS.base_projection],
  touchdown_points: [COLUMN_HEADERS.touchdown_points, "Proj TD Pts"],
  total_projection: [COLUMN_HEADERS.total_projection],
};

export type HeaderResolution = {
  // canonical column -> header as it appears in the file
  sourceHeaders: Partial<Record<ColumnKey, string>>;
  columns: ColumnKey[];
  unknownColumns: string[];
};

export function resolveHeaders(fields: readonly string[]): HeaderResolution {
  const byTrimmed = new Map<string, string>();
  for (const f of fields) {
    const t = f.trim();
    if (!byTrimmed.has(t)) byTrimmed.set(t, f);
  }

  const sourceHeaders: Partial<Record<ColumnKey, string>> = {};
  const columns: ColumnKey[] = [];
  const used = new Set<string>();

  for (const key of COLUMN_KEYS) {
    const hit = HEADER_ALIASES[key].find((alias) => byTrimmed.has(alias));
    if (hit === undefined) continue;
    const raw = byTrimmed.get(hit);
    if (raw === undefined) continue;
    sourceHeaders[key] = raw;
    columns.push(key);
    used.add(raw);
  }

  const unknownColumns = fields.filter((f) => !used.has(f)).map((f) => f.trim());
  return { sourceHeaders, columns, unknownColumns };
}
