/**
 * Domain types for feedback analysis.
 *
 * Everything here lives for a single request: rows are derived from the
 * uploaded table when the user clicks Analyze and discarded afterwards.
 */

import type { AnalysisResult, Level, Theme } from "./schema";

export type { AnalysisResult, Level, Theme };

/** A cell as it arrives from the browser: papaparse yields strings, JSON callers may send scalars. */
export type CellValue = string | number | boolean | null;

/** Parsed CSV: header columns in file order plus one record per data row. */
export interface FeedbackTable {
  columns: string[];
  rows: Record<string, CellValue | undefined>[];
}

/** One row of the prompt payload. `row_id` is the row's position in the table. */
export interface FeedbackRow {
  row_id: number;
  text: string;
}

/** A cited row resolved against the uploaded table, with its full cell text. */
export interface CitedRow {
  row_id: number;
  text: string;
}

/** A theme ready to render: the model's fields plus its resolved citations. */
export interface ThemeCard extends Theme {
  heading: string;
  citations: CitedRow[];
}

export interface AnalysisOutcome {
  /** Rows sent to the model. */
  rows: FeedbackRow[];
  result: AnalysisResult;
  /** True when the first response needed the repair request. */
  repaired: boolean;
  promptVersion: string;
  durationMs: number;
}

/** Successful body of POST /api/analyze. */
export interface AnalyzeResponse {
  cards: ThemeCard[];
  markdown: string;
  fileName: string;
  repaired: boolean;
  promptVersion: string;
  durationMs: number;
}
