import { z } from "zod";

// Helpers
const toStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1, "player name is required"));

const toOptStr = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    return s === "" ? null : s;
  });

// Plain decimal or exponent notation only; no 0x/0b/0o literals
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Loose numeric coercion: blanks, "NA" and garbage become null, never an error
export function coerceNumber(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = String(v).trim();
  if (!DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

const toOptNum = z.union([z.number(), z.string(), z.null(), z.undefined()]).transform(coerceNumber);

// Row schema for CSV after header aliasing
export const ProjectionCsvSchema = z.object({
  name: toStr,
  team: toOptStr,
  position: toOptStr,
  base_projection: toOptNum,
  touchdown_points: toOptNum,
  total_projection: toOptNum,
});

export type ProjectionCsv = z.infer<typeof ProjectionCsvSchema>;
