import { describe, it, expect } from "vitest";
import { generateMarkdownReport, REPORT_FILE_NAME } from "@/lib/export/markdown";
import { bindAnalysisResult } from "@/lib/insights/schema";
import { CHECKOUT_THEME } from "../helpers/scripted-client";

describe("generateMarkdownReport", () => {
  it("writes one section per theme separated by a blank line", () => {
    const result = bindAnalysisResult({
      themes: [
        CHECKOUT_THEME,
        {
          theme: "Dark mode",
          summary: "Requested often.",
          frequency: "Medium",
          severity: "Low",
          recommended_action: "Ship a dark theme.",
          cited_row_ids: [1],
        },
      ],
    });

    expect(generateMarkdownReport(result)).toBe(
      [
        "# AI Insight Synthesizer Output",
        "",
        "## Checkout performance",
        "- Summary: Users report slow checkout.",
        "- Frequency: High",
        "- Severity: Medium",
        "- Recommended action: Optimize checkout path.",
        "- Cited rows: 0, 2",
        "",
        "## Dark mode",
        "- Summary: Requested often.",
        "- Frequency: Medium",
        "- Severity: Low",
        "- Recommended action: Ship a dark theme.",
        "- Cited rows: 1",
        "",
      ].join("\n")
    );
  });

  it("writes only the title for an empty result", () => {
    expect(generateMarkdownReport({ themes: [] })).toBe("# AI Insight Synthesizer Output\n");
  });

  it("names the download insights_report.md", () => {
    expect(REPORT_FILE_NAME).toBe("insights_report.md");
  });
});
