import type { ColumnKey } from "@/lib/domain/types";

export const DEFAULT_PROJECTIONS_CSV = "data/projections.csv";

export const PAGE_SIZES = [10, 25, 50, 100] as const;
export type PageSize = (typeof PAGE_SIZES)[number];
export const DEFAULT_PAGE_SIZE: PageSize = 25;

export const ALL_POSITIONS = "All";
export const QUICK_POSITIONS = [ALL_POSITIONS, "RB", "WR", "TE"] as const;

export const DEFAULT_SORT_FIELD: ColumnKey = "total_projection";
export const DEFAULT_SORT_DESCENDING = true;

// Sort menu order; fields missing from the table are left out
export const SORT_FIELD_ORDER: readonly ColumnKey[] = [
  "total_projection",
  "base_projection",
  "touchdown_points",
  "name",
  "team",
  "position",
];

export const MAX_COMPARE = 5;

export const FILTERED_EXPORT_NAME = "fantasyline_filtered.csv";
export const COMPARE_EXPORT_NAME = "fantasyline_compare.csv";
