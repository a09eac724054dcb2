import type { ColumnKey, ProjectionRow, ProjectionTable } from "@/lib/domain/types";
import { hasColumn } from "@/lib/domain/types";
import {
  ALL_POSITIONS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SORT_DESCENDING,
  DEFAULT_SORT_FIELD,
  SORT_FIELD_ORDER,
  type PageSize,
} from "@/lib/config";
import { tableToCsv } from "@/lib/csv/exportTable";

export type QueryConfig = {
  position: string; // "All" or an exact position value
  nameQuery: string; // case-insensitive substring; "" disables
  teams: string[]; // exact team codes; [] disables
  sortField: ColumnKey;
  sortDescending: boolean;
  pageSize: PageSize;
  pageIndex: number; // 1-based, clamped on use
};

export type QueryResult = {
  view: ProjectionRow[]; // current page
  filtered: ProjectionRow[]; // filtered + sorted, unpaginated
  totalFilteredRows: number;
  pageIndex: number; // after clamping
  pageCount: number;
};

export const DEFAULT_QUERY: QueryConfig = {
  position: ALL_POSITIONS,
  nameQuery: "",
  teams: [],
  sortField: DEFAULT_SORT_FIELD,
  sortDescending: DEFAULT_SORT_DESCENDING,
  pageSize: DEFAULT_PAGE_SIZE,
  pageIndex: 1,
};

export function parseTeamFilter(input: string): string[] {
  return input
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);
}

export function pageCount(totalRows: number, pageSize: number): number {
  return Math.max(1, Math.ceil(totalRows / pageSize));
}

export function clampPageIndex(pageIndex: number, totalRows: number, pageSize: number): number {
  const last = pageCount(totalRows, pageSize);
  const idx = Number.isFinite(pageIndex) ? Math.trunc(pageIndex) : 1;
  return Math.min(Math.max(idx, 1), last);
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

// Stable; absent values always trail, whichever direction
export function sortRows(rows: readonly ProjectionRow[], field: ColumnKey, descending: boolean): ProjectionRow[] {
  return [...rows].sort((x, y) => {
    const a = x[field];
    const b = y[field];
    if (a === null && b === null) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    const c = compareValues(a, b);
    return descending ? -c : c;
  });
}

export function filterRows(table: ProjectionTable, config: Pick<QueryConfig, "position" | "nameQuery" | "teams">): ProjectionRow[] {
  let rows: ProjectionRow[] = [...table.rows];

  if (config.position !== ALL_POSITIONS && hasColumn(table, "position")) {
    rows = rows.filter((r) => r.position === config.position);
  }

  if (config.nameQuery) {
    const needle = config.nameQuery.toLowerCase();
    rows = rows.filter((r) => r.name.toLowerCase().includes(needle));
  }

  if (config.teams.length > 0 && hasColumn(table, "team")) {
    const teams = new Set(config.teams);
    rows = rows.filter((r) => r.team !== null && teams.has(r.team));
  }

  return rows;
}

export function runQuery(table: ProjectionTable, config: QueryConfig): QueryResult {
  const matched = filterRows(table, config);
  const filtered = hasColumn(table, config.sortField)
    ? sortRows(matched, config.sortField, config.sortDescending)
    : matched;

  const totalFilteredRows = filtered.length;
  const pageIndex = clampPageIndex(config.pageIndex, totalFilteredRows, config.pageSize);
  const start = (pageIndex - 1) * config.pageSize;

  return {
    view: filtered.slice(start, start + config.pageSize),
    filtered,
    totalFilteredRows,
    pageIndex,
    pageCount: pageCount(totalFilteredRows, config.pageSize),
  };
}

// Last row number on the current page ("Showing X of Y rows")
export function shownThrough(result: QueryResult, pageSize: number): number {
  return Math.min(result.pageIndex * pageSize, result.totalFilteredRows);
}

export function positionOptions(table: ProjectionTable): string[] {
  const seen = new Set<string>();
  for (const r of table.rows) {
    if (r.position !== null) seen.add(r.position);
  }
  return [ALL_POSITIONS, ...seen];
}

export function sortableFields(table: ProjectionTable): ColumnKey[] {
  return SORT_FIELD_ORDER.filter((f) => hasColumn(table, f));
}

export function exportFilteredCsv(table: ProjectionTable, config: QueryConfig): string {
  return tableToCsv(table.columns, runQuery(table, config).filtered);
}
