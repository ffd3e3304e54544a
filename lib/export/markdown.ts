/**
 * Markdown report for a completed analysis.
 */

import type { AnalysisResult } from "@/lib/insights/types";

export const REPORT_TITLE = "AI Insight Synthesizer Output";
export const REPORT_FILE_NAME = "insights_report.md";

/**
 * One `## <theme>` section per theme with Summary, Frequency, Severity,
 * Recommended action and Cited rows bullets. Sections are separated by a
 * blank line and the report ends with a newline.
 */
export function generateMarkdownReport(result: AnalysisResult): string {
  const lines = [`# ${REPORT_TITLE}\n`];

  for (const t of result.themes) {
    lines.push(`## ${t.theme}`);
    lines.push(`- Summary: ${t.summary}`);
    lines.push(`- Frequency: ${t.frequency}`);
    lines.push(`- Severity: ${t.severity}`);
    lines.push(`- Recommended action: ${t.recommended_action}`);
    lines.push(`- Cited rows: ${t.cited_row_ids.join(", ")}\n`);
  }

  return lines.join("\n");
}
