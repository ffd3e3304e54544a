/**
 * CSV reading for uploaded feedback files.
 *
 * Runs in the browser (the page parses the file before upload) and in tests.
 * Rows keep file order; a row's index is its `row_id` everywhere downstream.
 */

import Papa from "papaparse";
import { CsvParseError } from "./errors";
import type { FeedbackTable } from "./types";

export const PREVIEW_ROWS = 20;

/**
 * Parse CSV text with a header row. Empty lines are skipped and missing
 * trailing cells read as "". Field-count mismatches are tolerated the way a
 * spreadsheet export usually needs.
 */
export function parseFeedbackCsv(text: string): FeedbackTable {
  const result = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const columns = (result.meta.fields ?? []).filter((field) => field.length > 0);
  if (columns.length === 0) {
    throw new CsvParseError("The CSV file has no header row.");
  }

  const rows = result.data.map((record) => {
    const row: Record<string, string> = {};
    for (const column of columns) {
      row[column] = record[column] ?? "";
    }
    return row;
  });

  if (rows.length === 0) {
    throw new CsvParseError("The CSV file has a header but no data rows.");
  }

  return { columns, rows };
}

/** First `limit` rows, for the preview grid. */
export function previewRows(table: FeedbackTable, limit = PREVIEW_ROWS): FeedbackTable["rows"] {
  return table.rows.slice(0, limit);
}

/** Best guess at the free-text column: a name hint first, then longest average cell. */
export function guessTextColumn(table: FeedbackTable): string {
  const hinted = table.columns.find((c) =>
    /feedback|comment|text|review|message|response/i.test(c)
  );
  if (hinted) return hinted;

  let best = table.columns[0] ?? "";
  let bestLength = -1;
  for (const column of table.columns) {
    const total = table.rows.reduce((acc, row) => acc + String(row[column] ?? "").length, 0);
    const avg = table.rows.length > 0 ? total / table.rows.length : 0;
    if (avg > bestLength) {
      best = column;
      bestLength = avg;
    }
  }
  return best;
}
