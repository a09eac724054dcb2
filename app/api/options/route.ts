import path from "path";
import { NextRequest } from "next/server";
import { MAX_COMPARE, PAGE_SIZES, QUICK_POSITIONS } from "@/lib/config";
import { playerOptions } from "@/lib/compare/ranker";
import { positionOptions, sortableFields } from "@/lib/query/pipeline";
import { errorResponse, getDataset, wantsRefresh } from "@/lib/server/dataset";

export const dynamic = "force-dynamic";

// Choices for the browser controls, derived from the loaded table
export async function GET(req: NextRequest) {
  try {
    const { table, summary } = await getDataset({ refresh: wantsRefresh(req.nextUrl.searchParams) });
    const present = positionOptions(table);
    return Response.json({
      ok: true,
      columns: table.columns,
      quickPositions: QUICK_POSITIONS.filter((p) => present.includes(p)),
      positions: present,
      sortFields: sortableFields(table),
      pageSizes: PAGE_SIZES,
      maxCompare: MAX_COMPARE,
      players: playerOptions(table),
      summary: { ...summary, source: path.basename(summary.source) },
    });
  } catch (e) {
    return errorResponse(e);
  }
}
