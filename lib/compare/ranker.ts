import type { ProjectionRow, ProjectionTable } from "@/lib/domain/types";
import { RANKING_FIELD, hasColumn } from "@/lib/domain/types";
import { MAX_COMPARE } from "@/lib/config";
import { tableToCsv } from "@/lib/csv/exportTable";

export type ComparisonWarning = {
  code: "too_many_selected";
  message: string;
  dropped: string[];
};

export type RankedEntry = {
  rank: number; // 1-based
  row: ProjectionRow;
  value: number | null;
  isTop: boolean;
};

export type RankingOutcome =
  | { kind: "undetermined" }
  | { kind: "single_winner"; winner: ProjectionRow; maxValue: number }
  | { kind: "tie"; winners: ProjectionRow[]; maxValue: number };

export type ComparisonResult =
  | { status: "no_selection" }
  | {
      status: "ranking_field_missing";
      selection: string[];
      matched: ProjectionRow[];
      warnings: ComparisonWarning[];
    }
  | {
      status: "ranked";
      selection: string[];
      matched: ProjectionRow[];
      ranked: RankedEntry[];
      outcome: RankingOutcome;
      warnings: ComparisonWarning[];
    };

// Distinct player names in table order (multi-select options)
export function playerOptions(table: ProjectionTable): string[] {
  return [...new Set(table.rows.map((r) => r.name))];
}

export function limitSelection(selection: readonly string[], max = MAX_COMPARE): {
  selection: string[];
  warnings: ComparisonWarning[];
} {
  const unique = [...new Set(selection)];
  if (unique.length <= max) return { selection: unique, warnings: [] };
  const dropped = unique.slice(max);
  return {
    selection: unique.slice(0, max),
    warnings: [
      {
        code: "too_many_selected",
        message: `You selected more than ${max}. Keeping the first ${max}.`,
        dropped,
      },
    ],
  };
}

export function determineOutcome(rows: readonly ProjectionRow[]): RankingOutcome {
  const values = rows.map((r) => r[RANKING_FIELD]).filter((v): v is number => v !== null);
  if (values.length === 0) return { kind: "undetermined" };
  const maxValue = Math.max(...values);
  const winners = rows.filter((r) => r[RANKING_FIELD] === maxValue);
  const [first] = winners;
  if (winners.length === 1 && first) return { kind: "single_winner", winner: first, maxValue };
  return { kind: "tie", winners, maxValue };
}

export function rankRows(rows: readonly ProjectionRow[], maxValue: number | null): RankedEntry[] {
  const ordered = [...rows].sort((x, y) => {
    const a = x[RANKING_FIELD];
    const b = y[RANKING_FIELD];
    if (a === null && b === null) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return b - a;
  });
  return ordered.map((row, i) => {
    const value = row[RANKING_FIELD];
    return {
      rank: i + 1,
      row,
      value,
      isTop: i === 0 && value !== null && value === maxValue,
    };
  });
}

export function compareSelection(table: ProjectionTable, picks: readonly string[]): ComparisonResult {
  const { selection, warnings } = limitSelection(picks);
  if (selection.length === 0) return { status: "no_selection" };

  const wanted = new Set(selection);
  const matched = table.rows.filter((r) => wanted.has(r.name));

  if (!hasColumn(table, RANKING_FIELD)) {
    return { status: "ranking_field_missing", selection, matched, warnings };
  }

  const outcome = determineOutcome(matched);
  const maxValue = outcome.kind === "undetermined" ? null : outcome.maxValue;
  return {
    status: "ranked",
    selection,
    matched,
    ranked: rankRows(matched, maxValue),
    outcome,
    warnings,
  };
}

export function describeOutcome(outcome: RankingOutcome): string {
  switch (outcome.kind) {
    case "single_winner":
      return `${outcome.winner.name} has the highest projection (${outcome.maxValue.toFixed(2)}).`;
    case "tie":
      return `Tie for highest projection (${outcome.maxValue.toFixed(2)}) between: ${outcome.winners
        .map((r) => r.name)
        .join(", ")}`;
    case "undetermined":
      return "No projections available to rank these players.";
  }
}

export function exportComparisonCsv(table: ProjectionTable, result: ComparisonResult): string {
  const rows = result.status === "no_selection" ? [] : result.matched;
  return tableToCsv(table.columns, rows);
}
