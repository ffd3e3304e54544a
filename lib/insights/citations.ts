/**
 * Citation checks.
 *
 * A theme may only cite rows that were sent to the model. This is checked
 * right after schema binding, so rendering never meets an unknown id.
 */

import { CitationError } from "./errors";
import { cellToText } from "./payload";
import type { AnalysisResult, CitedRow, FeedbackRow, FeedbackTable } from "./types";

/**
 * Throws CitationError for the first theme citing an id outside `rows`.
 */
export function verifyCitations(result: AnalysisResult, rows: FeedbackRow[]): void {
  const known = new Set(rows.map((r) => r.row_id));

  for (const theme of result.themes) {
    const unknown = theme.cited_row_ids.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new CitationError(theme.theme, [...new Set(unknown)]);
    }
  }
}

/**
 * Resolve cited ids against the uploaded table, in citation order, with the
 * full untruncated cell text.
 */
export function lookupCitedRows(
  table: FeedbackTable,
  column: string,
  ids: number[],
  theme = ""
): CitedRow[] {
  const missing = ids.filter((id) => !Number.isInteger(id) || id < 0 || id >= table.rows.length);
  if (missing.length > 0) {
    throw new CitationError(theme, missing);
  }

  return ids.map((id) => ({
    row_id: id,
    text: cellToText(table.rows[id][column]),
  }));
}
