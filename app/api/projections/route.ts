import { NextRequest } from "next/server";
import { FILTERED_EXPORT_NAME } from "@/lib/config";
import { csvAttachment } from "@/lib/csv/exportTable";
import { parseQueryParams } from "@/lib/query/params";
import { exportFilteredCsv, runQuery, shownThrough } from "@/lib/query/pipeline";
import { errorResponse, getDataset, wantsRefresh } from "@/lib/server/dataset";

export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  const { searchParams } = req.nextUrl;
  const parsed = parseQueryParams(searchParams);
  if (!parsed.ok) {
    return Response.json({ ok: false, error: parsed.error }, { status: 400 });
  }

  try {
    const { table } = await getDataset({ refresh: wantsRefresh(searchParams) });
    const config = parsed.config;

    if (searchParams.get("format") === "csv") {
      return csvAttachment(exportFilteredCsv(table, config), FILTERED_EXPORT_NAME);
    }

    const res = runQuery(table, config);
    return Response.json({
      ok: true,
      columns: table.columns,
      view: res.view,
      totalFilteredRows: res.totalFilteredRows,
      pageIndex: res.pageIndex,
      pageCount: res.pageCount,
      shownThrough: shownThrough(res, config.pageSize),
      empty: res.totalFilteredRows === 0,
    });
  } catch (e) {
    return errorResponse(e);
  }
}
