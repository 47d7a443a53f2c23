import { describe, expect, it } from "vitest";
import { parseReportArgs, sceneRow } from "../../src/bin/report";
import { buildSceneRecord } from "../../src/services/sceneStore";
import { candidate } from "../helpers/candidates";

describe("sceneRow", () => {
  it("summarizes a stored scene", () => {
    const record = buildSceneRecord(candidate());

    expect(sceneRow(record)).toEqual({
      Id: record.id.slice(0, 12),
      Show: "Better Call Saul",
      Episode: "S02E05",
      Location: "Living room",
      Words: 5,
      Preview: "CHUCK: Sit down."
    });
  });

  it("truncates long first lines and marks unknown episodes", () => {
    const record = buildSceneRecord(
      candidate({ episodeCode: "", location: null, sceneText: `CHUCK: ${"a".repeat(70)}\nJIMMY: Fine.` })
    );

    expect(sceneRow(record)).toMatchObject({
      Episode: "?",
      Location: "",
      Preview: `CHUCK: ${"a".repeat(52)}…`
    });
  });
});

describe("parseReportArgs", () => {
  it("prints totals without arguments", () => {
    expect(parseReportArgs([])).toEqual({ kind: "stats" });
  });

  it("lists one character's scenes in an episode", () => {
    expect(parseReportArgs(["chuck_mcgill", "s02e05"])).toEqual({
      kind: "list",
      filter: { characterKey: "chuck_mcgill", episodeCode: "S02E05", limit: 200 }
    });
  });

  it("filters by show and dialogue text", () => {
    expect(parseReportArgs(["--show", "Succession", "--search=boar on the floor"])).toEqual({
      kind: "list",
      filter: { show: "Succession", text: "boar on the floor", limit: 200 }
    });
  });

  it.each([
    [["--verbose"], "Unknown option: --verbose"],
    [["--search"], "--search needs a value"],
    [["chuck_mcgill", "S02E05", "extra"], "Unexpected argument: extra"]
  ])("rejects %j", (argv, message) => {
    expect(parseReportArgs(argv)).toEqual({ kind: "usage", message });
  });
});
