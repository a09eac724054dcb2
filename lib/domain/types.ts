// Domain models for the projections table

export const COLUMN_KEYS = [
  "name",
  "team",
  "position",
  "base_projection",
  "touchdown_points",
  "total_projection",
] as const;

export type ColumnKey = (typeof COLUMN_KEYS)[number];

export type NumericColumnKey = "base_projection" | "touchdown_points" | "total_projection";

// Header written back out on export (and the preferred spelling on ingest)
export const COLUMN_HEADERS: Record<ColumnKey, string> = {
  name: "Player",
  team: "Team",
  position: "Pos",
  base_projection: "Base_Projection",
  touchdown_points: "Proj TD PTS",
  total_projection: "Total_Projection",
};

export const RANKING_FIELD = "total_projection" satisfies NumericColumnKey;

// One player-week entry. null = absent (missing column, blank cell or bad number).
export type ProjectionRow = {
  name: string;
  team: string | null;
  position: string | null;
  base_projection: number | null;
  touchdown_points: number | null;
  total_projection: number | null;
};

// `columns` is the schema: canonical fields present in the source, canonical order.
export type ProjectionTable = {
  readonly columns: readonly ColumnKey[];
  readonly rows: readonly ProjectionRow[];
};

export type IngestSummary = {
  source: string;
  rows_loaded: number;
  rows_dropped: number;
  unknown_columns: string[];
  missing_columns: ColumnKey[];
};

export function hasColumn(table: ProjectionTable, key: ColumnKey): boolean {
  return table.columns.includes(key);
}
