import { describe, it, expect } from "vitest";
import { formatCell, tableToCsv } from "../src/master/csv.js";

describe("formatCell", () => {
  it("writes nulls and non-finite numbers as empty", () => {
    expect(formatCell(null)).toBe("");
    expect(formatCell(undefined)).toBe("");
    expect(formatCell(NaN)).toBe("");
  });

  it("writes numbers and booleans as text", () => {
    expect(formatCell(-74.006)).toBe("-74.006");
    expect(formatCell(false)).toBe("false");
  });
});

describe("tableToCsv", () => {
  it("quotes fields that need it", () => {
    const csv = tableToCsv({
      columns: ["a", "b"],
      rows: [
        { a: "x,y", b: null },
        { a: 'say "hi"', b: 1.5 },
      ],
    });
    expect(csv).toBe('a,b\n"x,y",\n"say ""hi""",1.5\n');
  });
});
