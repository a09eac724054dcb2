import { z } from "zod";
import { COLUMN_KEYS } from "@/lib/domain/types";
import { PAGE_SIZES, type PageSize } from "@/lib/config";
import { DEFAULT_QUERY, parseTeamFilter, type QueryConfig } from "./pipeline";

const isPageSize = (n: number): n is PageSize => PAGE_SIZES.some((s) => s === n);

const pageSizeParam = z.coerce
  .number()
  .int()
  .refine(isPageSize, { message: `must be one of ${PAGE_SIZES.join(", ")}` });

const boolParam = z.enum(["true", "false", "1", "0"]).transform((v) => v === "true" || v === "1");

export const QueryParamsSchema = z.object({
  position: z.string().trim().min(1).default(DEFAULT_QUERY.position),
  q: z.string().default(""),
  teams: z.string().default("").transform(parseTeamFilter),
  sort: z.enum(COLUMN_KEYS).default(DEFAULT_QUERY.sortField),
  desc: boolParam.default(DEFAULT_QUERY.sortDescending ? "true" : "false"),
  pageSize: pageSizeParam.default(DEFAULT_QUERY.pageSize),
  page: z.coerce.number().int().min(1).default(1),
});

export type QueryParseResult = { ok: true; config: QueryConfig } | { ok: false; error: string };

export function parseQueryParams(params: URLSearchParams): QueryParseResult {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(QueryParamsSchema.shape)) {
    const v = params.get(key);
    if (v !== null) raw[key] = v;
  }

  const parsed = QueryParamsSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
    };
  }

  const p = parsed.data;
  return {
    ok: true,
    config: {
      position: p.position,
      nameQuery: p.q,
      teams: p.teams,
      sortField: p.sort,
      sortDescending: p.desc,
      pageSize: p.pageSize,
      pageIndex: p.page,
    },
  };
}
