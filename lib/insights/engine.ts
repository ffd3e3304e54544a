/**
 * Feedback analysis pipeline.
 *
 * payload -> prompt -> model -> decode (one repair) -> schema -> citations
 *
 * Every stage either succeeds or aborts the whole analysis; there are no
 * partial results.
 */

import { buildFeedbackPayload } from "./payload";
import { composeAnalysisMessages, PROMPT_VERSIONS } from "./prompts";
import { decodeWithRepair } from "./repair";
import { bindAnalysisResult } from "./schema";
import { verifyCitations } from "./citations";
import type { AnalysisOutcome, FeedbackTable } from "./types";
import type { ModelClient } from "@/lib/llm/chat-completions";
import { logger } from "@/lib/logger";

export interface AnalyzeFeedbackOptions {
  table: FeedbackTable;
  /** Column holding the feedback text. */
  column: string;
  /** Number of leading rows to analyze (5-50 from the page). */
  maxRows: number;
  client: ModelClient;
}

export async function analyzeFeedback(options: AnalyzeFeedbackOptions): Promise<AnalysisOutcome> {
  const startTime = Date.now();
  const rows = buildFeedbackPayload(options.table, options.column, options.maxRows);

  logger.info("Analyzing feedback", {
    column: options.column,
    tableRows: options.table.rows.length,
    analyzedRows: rows.length,
    promptVersion: PROMPT_VERSIONS.analysis,
  });

  const raw = await options.client.complete(composeAnalysisMessages(rows));
  const { value, repaired } = await decodeWithRepair(raw, options.client);
  const result = bindAnalysisResult(value);
  verifyCitations(result, rows);

  const durationMs = Date.now() - startTime;
  logger.info("Feedback analysis complete", {
    themes: result.themes.length,
    repaired,
    durationMs,
  });

  return {
    rows,
    result,
    repaired,
    promptVersion: PROMPT_VERSIONS.analysis,
    durationMs,
  };
}
