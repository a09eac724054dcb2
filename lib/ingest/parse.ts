import Papa from "papaparse";
import type { ProjectionRow, ProjectionTable } from "@/lib/domain/types";
import { COLUMN_HEADERS, COLUMN_KEYS } from "@/lib/domain/types";
import { resolveHeaders } from "./aliases";
import { LoadError } from "./errors";
import { ProjectionCsvSchema } from "./schemas";

export type ParseReport = {
  table: ProjectionTable;
  errors: { row: number; message: string }[];
  rowCount: number;
  droppedRows: number;
  unknownColumns: string[];
};

// CSV text -> canonical table, with header aliasing + row validation
export function parseProjectionsCsv(text: string, source = "<inline>"): ParseReport {
  const result = Papa.parse<Record<string, unknown>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    delimiter: ",",
    dynamicTyping: false,
    skipEmptyLines: true,
  });

  const fields = (result.meta.fields ?? []).filter((f) => f.trim() !== "");
  if (fields.length === 0) {
    throw new LoadError(source, "unparseable", `${source}: no header row found`);
  }

  const broken = result.errors.find((e) => e.code === "MissingQuotes");
  if (broken) {
    throw new LoadError(
      source,
      "unparseable",
      `${source}: ${broken.message}${broken.row !== undefined ? ` (row ${broken.row + 1})` : ""}`
    );
  }

  const { sourceHeaders, columns, unknownColumns } = resolveHeaders(fields);
  const nameHeader = sourceHeaders.name;
  if (nameHeader === undefined) {
    throw new LoadError(source, "missing_column", `${source}: required column "${COLUMN_HEADERS.name}" not found`);
  }

  const errors: { row: number; message: string }[] = result.errors.map((e) => ({
    row: e.row !== undefined ? e.row + 1 : -1,
    message: e.message,
  }));
  const rows: ProjectionRow[] = [];
  let droppedRows = 0;

  result.data.forEach((raw, idx) => {
    // Map source headers -> canonical keys; absent columns stay undefined
    const mapped: Record<string, unknown> = {};
    for (const key of COLUMN_KEYS) {
      const header = sourceHeaders[key];
      if (header !== undefined) mapped[key] = raw[header];
    }

    const parsed = ProjectionCsvSchema.safeParse(mapped);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      droppedRows += 1;
      const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      errors.push({ row: idx + 1, message: msg });
    }
  });

  return {
    table: { columns, rows },
    errors,
    rowCount: result.data.length,
    droppedRows,
    unknownColumns,
  };
}
