import { describe, it, expect } from "vitest";
import { bindAnalysisResult } from "@/lib/insights/schema";
import { ResponseValidationError } from "@/lib/insights/errors";
import { CHECKOUT_THEME } from "../helpers/scripted-client";

function bindError(value: unknown): ResponseValidationError {
  try {
    bindAnalysisResult(value);
  } catch (err) {
    if (err instanceof ResponseValidationError) return err;
    throw err;
  }
  throw new Error("expected bindAnalysisResult to throw");
}

describe("bindAnalysisResult", () => {
  it("binds a conforming theme list", () => {
    const result = bindAnalysisResult({ themes: [CHECKOUT_THEME] });
    expect(result.themes).toEqual([CHECKOUT_THEME]);
  });

  it("strips keys outside the schema", () => {
    const result = bindAnalysisResult({ themes: [{ ...CHECKOUT_THEME, confidence: 0.9 }], note: "x" });
    expect(result).toEqual({ themes: [CHECKOUT_THEME] });
  });

  it("accepts a theme count outside 3-7", () => {
    expect(bindAnalysisResult({ themes: [] }).themes).toEqual([]);
  });

  it("rejects a missing required field", () => {
    const { recommended_action: _omitted, ...partial } = CHECKOUT_THEME;
    const error = bindError({ themes: [partial] });
    expect(error.issues.map((i) => i.path)).toEqual(["themes[0].recommended_action"]);
  });

  it("rejects frequency and severity outside Low/Medium/High", () => {
    const error = bindError({
      themes: [{ ...CHECKOUT_THEME, frequency: "Very High", severity: "medium" }],
    });
    expect(error.issues.map((i) => i.path)).toEqual(["themes[0].frequency", "themes[0].severity"]);
  });

  it("rejects non-integer citations", () => {
    const error = bindError({ themes: [{ ...CHECKOUT_THEME, cited_row_ids: [0, "2", 1.5] }] });
    expect(error.issues.map((i) => i.path)).toEqual([
      "themes[0].cited_row_ids[1]",
      "themes[0].cited_row_ids[2]",
    ]);
  });

  it("rejects a theme with no citations", () => {
    const error = bindError({ themes: [{ ...CHECKOUT_THEME, cited_row_ids: [] }] });
    expect(error.issues).toEqual([
      { path: "themes[0].cited_row_ids", message: "must cite at least one row" },
    ]);
  });

  it("rejects a top-level array", () => {
    const error = bindError([CHECKOUT_THEME]);
    expect(error.code).toBe("validation");
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].path).toBe("");
  });
});
