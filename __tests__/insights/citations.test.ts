import { describe, it, expect } from "vitest";
import { lookupCitedRows, verifyCitations } from "@/lib/insights/citations";
import { bindAnalysisResult } from "@/lib/insights/schema";
import { CitationError } from "@/lib/insights/errors";
import { CHECKOUT_THEME } from "../helpers/scripted-client";
import type { FeedbackTable } from "@/lib/insights/types";

const rows = [0, 1, 2].map((row_id) => ({ row_id, text: `row ${row_id}` }));

describe("verifyCitations", () => {
  it("accepts citations inside the analyzed rows", () => {
    const result = bindAnalysisResult({ themes: [CHECKOUT_THEME] });
    expect(() => verifyCitations(result, rows)).not.toThrow();
  });

  it("reports the first offending theme with deduplicated ids", () => {
    const result = bindAnalysisResult({
      themes: [
        CHECKOUT_THEME,
        { ...CHECKOUT_THEME, theme: "Pricing", cited_row_ids: [1, 9, 9, -1] },
        { ...CHECKOUT_THEME, theme: "Later", cited_row_ids: [40] },
      ],
    });

    try {
      verifyCitations(result, rows);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CitationError);
      if (err instanceof CitationError) {
        expect(err.theme).toBe("Pricing");
        expect(err.rowIds).toEqual([9, -1]);
        expect(err.message).toBe('Theme "Pricing" cites unknown row ids: 9, -1');
      }
    }
  });
});

describe("lookupCitedRows", () => {
  const long = "x".repeat(2500);
  const table: FeedbackTable = {
    columns: ["id", "text"],
    rows: [
      { id: 1, text: "first" },
      { id: 2, text: long },
      { id: 3, text: null },
    ],
  };

  it("returns cell text in citation order", () => {
    expect(lookupCitedRows(table, "text", [2, 0])).toEqual([
      { row_id: 2, text: "" },
      { row_id: 0, text: "first" },
    ]);
  });

  it("returns the full text, not the truncated payload text", () => {
    const [row] = lookupCitedRows(table, "text", [1]);
    expect(row.text).toHaveLength(2500);
  });

  it("throws CitationError for ids outside the table", () => {
    expect(() => lookupCitedRows(table, "text", [0, 3], "Theme A")).toThrow(
      new CitationError("Theme A", [3])
    );
  });
});
