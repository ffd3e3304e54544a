/**
 * API: /api/analyze
 *
 * POST -- synthesize themes from uploaded feedback rows
 *
 * Accepts: { columns: string[], rows: Record<string, cell>[], column: string, maxRows: 5-50 }
 * Returns: { cards: ThemeCard[], markdown, fileName, repaired, promptVersion, durationMs }
 *
 * Failures answer { error, code } with no partial results.
 */

import { NextRequest, NextResponse } from "next/server";
import { getConfig } from "@/lib/llm/config";
import { createChatModelClient } from "@/lib/llm/chat-completions";
import { analyzeFeedback } from "@/lib/insights/engine";
import { buildThemeCards } from "@/lib/insights/presenter";
import { describeAnalysisError } from "@/lib/insights/error-response";
import { generateMarkdownReport, REPORT_FILE_NAME } from "@/lib/export/markdown";
import { safeParseBody, AnalyzeRequestSchema } from "@/lib/validation";
import type { AnalyzeResponse } from "@/lib/insights/types";
import { scopedLogger } from "@/lib/logger";

const log = scopedLogger("api/analyze");

// The whole analysis (up to two model calls) happens inside this request.
export const maxDuration = 600;

export async function POST(request: NextRequest) {
  const parsed = await safeParseBody(request, AnalyzeRequestSchema);
  if (!parsed.success) {
    log.warn("validation failed", { error: parsed.error });
    return NextResponse.json({ error: parsed.error }, { status: 400 });
  }

  const body = parsed.data;
  const table = { columns: body.columns, rows: body.rows.slice(0, body.maxRows) };

  try {
    const client = createChatModelClient(getConfig());
    const outcome = await analyzeFeedback({
      table,
      column: body.column,
      maxRows: body.maxRows,
      client,
    });

    const response: AnalyzeResponse = {
      cards: buildThemeCards(outcome.result, table, body.column),
      markdown: generateMarkdownReport(outcome.result),
      fileName: REPORT_FILE_NAME,
      repaired: outcome.repaired,
      promptVersion: outcome.promptVersion,
      durationMs: outcome.durationMs,
    };
    return NextResponse.json(response);
  } catch (err) {
    const { status, body: errorBody } = describeAnalysisError(err);
    log.error("analysis failed", {
      code: errorBody.code,
      error: errorBody.error,
    });
    return NextResponse.json(errorBody, { status });
  }
}
