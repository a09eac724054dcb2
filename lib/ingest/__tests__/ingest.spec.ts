import { describe, it, expect } from "vitest";
import { parseProjectionsCsv } from "@/lib/ingest/parse";
import { resolveHeaders } from "@/lib/ingest/aliases";
import { LoadError } from "@/lib/ingest/errors";

const csv = `Player,Team,Pos,Base_Projection,Proj TD PTS,Total_Projection,Opp
  Ann Lee ,KC , RB,10.5,2,12.5,LAC
Bob Ray,BUF,WR,8,n/a,9,NYJ
Cal Moss,,WR,,, ,DAL`;

describe("parseProjectionsCsv", () => {
  it("trims text fields and coerces numerics", () => {
    const rep = parseProjectionsCsv(csv);
    expect(rep.rowCount).toBe(3);
    expect(rep.droppedRows).toBe(0);
    expect(rep.table.rows[0]).toEqual({
      name: "Ann Lee",
      team: "KC",
      position: "RB",
      base_projection: 10.5,
      touchdown_points: 2,
      total_projection: 12.5,
    });
  });

  it("loads unparseable and blank numbers as absent, not zero", () => {
    const rep = parseProjectionsCsv(csv);
    expect(rep.table.rows[1].touchdown_points).toBe(null);
    expect(rep.table.rows[1].total_projection).toBe(9);
    expect(rep.table.rows[2]).toEqual({
      name: "Cal Moss",
      team: null,
      position: "WR",
      base_projection: null,
      touchdown_points: null,
      total_projection: null,
    });
  });

  it("loads hex, binary and octal literals as absent", () => {
    const rep = parseProjectionsCsv(
      "Player,Base_Projection,Proj TD PTS,Total_Projection\nAnn Lee,0x1A,0b11,0o17\nBob Ray,+1.5,.5,2e1"
    );
    expect(rep.table.rows[0]).toMatchObject({
      base_projection: null,
      touchdown_points: null,
      total_projection: null,
    });
    expect(rep.table.rows[1]).toMatchObject({
      base_projection: 1.5,
      touchdown_points: 0.5,
      total_projection: 20,
    });
  });

  it("keeps canonical column order and reports ignored columns", () => {
    const rep = parseProjectionsCsv(csv);
    expect(rep.table.columns).toEqual([
      "name",
      "team",
      "position",
      "base_projection",
      "touchdown_points",
      "total_projection",
    ]);
    expect(rep.unknownColumns).toEqual(["Opp"]);
  });

  it("reconciles the alternate touchdown header", () => {
    const rep = parseProjectionsCsv(`Total_Projection,Proj TD Pts,Player\n14,4,Ann Lee`);
    expect(rep.table.columns).toEqual(["name", "touchdown_points", "total_projection"]);
    expect(rep.table.rows[0]).toMatchObject({ name: "Ann Lee", touchdown_points: 4, total_projection: 14 });
  });

  it("omits canonical columns the source lacks", () => {
    const rep = parseProjectionsCsv(`Player,Total_Projection\nAnn Lee,5`);
    expect(rep.table.columns).toEqual(["name", "total_projection"]);
    expect(rep.table.rows[0].team).toBe(null);
    expect(rep.table.rows[0].base_projection).toBe(null);
  });

  it("drops rows without a player name", () => {
    const rep = parseProjectionsCsv(`Player,Team\n ,KC\nBob Ray,BUF`);
    expect(rep.droppedRows).toBe(1);
    expect(rep.table.rows.map((r) => r.name)).toEqual(["Bob Ray"]);
    expect(rep.errors).toHaveLength(1);
    expect(rep.errors[0].row).toBe(1);
  });

  it("fails with LoadError when the player column is missing", () => {
    expect(() => parseProjectionsCsv(`Team,Pos\nKC,RB`, "week1.csv")).toThrow(LoadError);
    try {
      parseProjectionsCsv(`Team,Pos\nKC,RB`, "week1.csv");
    } catch (e) {
      expect(e).toBeInstanceOf(LoadError);
      if (e instanceof LoadError) {
        expect(e.reason).toBe("missing_column");
        expect(e.path).toBe("week1.csv");
      }
    }
  });

  it("fails with LoadError on empty or broken input", () => {
    expect(() => parseProjectionsCsv("")).toThrow(/no header row/);
    expect(() => parseProjectionsCsv(`Player,Team\n"Ann Lee,KC\nBob Ray,BUF`)).toThrow(LoadError);
  });
});

describe("resolveHeaders", () => {
  it("prefers the canonical touchdown spelling when both are present", () => {
    const res = resolveHeaders(["Player", "Proj TD Pts", "Proj TD PTS"]);
    expect(res.sourceHeaders.touchdown_points).toBe("Proj TD PTS");
    expect(res.unknownColumns).toEqual(["Proj TD Pts"]);
  });

  it("matches headers exactly, not case-insensitively", () => {
    const res = resolveHeaders(["player", " Player ", "TEAM"]);
    expect(res.columns).toEqual(["name"]);
    expect(res.sourceHeaders.name).toBe(" Player ");
    expect(res.unknownColumns).toEqual(["player", "TEAM"]);
  });
});
