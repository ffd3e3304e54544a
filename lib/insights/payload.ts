/**
 * Builds the row payload sent to the model.
 */

import { PayloadError } from "./errors";
import type { CellValue, FeedbackRow, FeedbackTable } from "./types";

/** Per-row character cap for feedback text sent to the model. */
export const MAX_FEEDBACK_CHARS = 2000;

/** Row-count bounds offered by the page. */
export const MIN_ROWS = 5;
export const MAX_ROWS = 50;
export const DEFAULT_ROWS = 15;

export function cellToText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Take the first `maxRows` rows of `column`. Each record's `row_id` is the
 * row's position in the table and its text is truncated to
 * MAX_FEEDBACK_CHARS. Any cell value is coerced to a string.
 */
export function buildFeedbackPayload(
  table: FeedbackTable,
  column: string,
  maxRows: number
): FeedbackRow[] {
  if (!table.columns.includes(column)) {
    throw new PayloadError(`Column "${column}" is not in the uploaded table`);
  }

  return table.rows.slice(0, Math.max(0, maxRows)).map((row, index) => ({
    row_id: index,
    text: cellToText(row[column]).slice(0, MAX_FEEDBACK_CHARS),
  }));
}
