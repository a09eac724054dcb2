import { NextRequest } from "next/server";
import { COMPARE_EXPORT_NAME } from "@/lib/config";
import { csvAttachment } from "@/lib/csv/exportTable";
import { compareSelection, describeOutcome, exportComparisonCsv } from "@/lib/compare/ranker";
import { errorResponse, getDataset, wantsRefresh } from "@/lib/server/dataset";

export const dynamic = "force-dynamic";

// GET /api/compare?player=A&player=B
export async function GET(req: NextRequest) {
  const { searchParams } = req.nextUrl;
  const picks = searchParams
    .getAll("player")
    .map((p) => p.trim())
    .filter(Boolean);

  try {
    const { table } = await getDataset({ refresh: wantsRefresh(searchParams) });
    const result = compareSelection(table, picks);

    if (searchParams.get("format") === "csv") {
      return csvAttachment(exportComparisonCsv(table, result), COMPARE_EXPORT_NAME);
    }

    let headline: string | null = null;
    if (result.status === "no_selection") headline = "Select players above to compare.";
    else if (result.status === "ranking_field_missing")
      headline = "Column `Total_Projection` not found in CSV; cannot rank players.";
    else headline = describeOutcome(result.outcome);

    return Response.json({ ok: true, result, headline });
  } catch (e) {
    return errorResponse(e);
  }
}
