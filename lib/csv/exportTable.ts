import type { ColumnKey, ProjectionRow } from "@/lib/domain/types";
import { COLUMN_HEADERS } from "@/lib/domain/types";

/**
 * Serializes rows to CSV using the canonical source headers, so the output
 * re-ingests to the same table.
 * @param columns - Schema columns to include, in output order
 * @param rows - Rows to export (already filtered/sorted by the caller)
 */
export function tableToCsv(columns: readonly ColumnKey[], rows: readonly ProjectionRow[]): string {
  const csvRows: string[] = [];

  // Add header row
  csvRows.push(columns.map((c) => escapeCSVField(COLUMN_HEADERS[c])).join(","));

  // Add data rows
  for (const row of rows) {
    csvRows.push(columns.map((c) => escapeCSVField(formatCSVValue(row[c]))).join(","));
  }

  return csvRows.join("\n") + "\n";
}

/**
 * Formats a value for CSV export
 */
function formatCSVValue(value: string | number | null): string {
  if (value === null) {
    return "";
  }

  if (typeof value === "number") {
    return value.toString();
  }

  return value;
}

/**
 * Escapes a field value for CSV format
 */
export function escapeCSVField(value: string): string {
  if (!value) return "";

  // If the value contains comma, quote, or newline, wrap in quotes and escape quotes
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

export function csvAttachment(csv: string, fileName: string): Response {
  return new Response(csv, {
    status: 200,
    headers: {
      "Content-Type": "text/csv; charset=utf-8",
      "Content-Disposition": `attachment; filename="${fileName}"`,
    },
  });
}
