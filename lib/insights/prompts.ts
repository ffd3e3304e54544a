/**
 * Prompt texts for theme synthesis and JSON repair.
 *
 * The analysis request is three messages: persona, task + data, and the
 * output schema last, since models follow a format constraint more reliably
 * when it is the final instruction they read. The schema string is a
 * contract with the schema binder; change both together.
 */

import { createHash } from "crypto";
import type { ChatMessage } from "@/lib/llm/chat-completions";
import type { FeedbackRow } from "./types";

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export const ANALYSIS_SYSTEM_PROMPT =
  "You are a product leader. Your job is to synthesize customer feedback into actionable product insights. " +
  "Be specific and avoid generic advice. Every theme must include citations to row_id values.";

export const ANALYSIS_TASK =
  "Cluster the feedback into 3-7 themes. For each theme: name, summary, frequency, severity, recommended_action, cited_row_ids.";

export const OUTPUT_SCHEMA_PROMPT =
  "Return ONLY valid JSON. No markdown, no commentary. " +
  'Schema: {"themes": [{"theme": "", "summary": "", ' +
  '"frequency": "Low|Medium|High", "severity": "Low|Medium|High", ' +
  '"recommended_action": "", "cited_row_ids": [0]}]}. ' +
  "cited_row_ids must be real row_id integers from the input.";

export const REPAIR_SYSTEM_PROMPT = "Fix JSON.";

export const REPAIR_USER_PREFIX = "Repair this into valid JSON only:\n";

// ---------------------------------------------------------------------------
// Versions
// ---------------------------------------------------------------------------

function shortHash(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 8);
}

/** Content hashes of the prompt texts, reported with every result. */
export const PROMPT_VERSIONS = {
  analysis: shortHash([ANALYSIS_SYSTEM_PROMPT, ANALYSIS_TASK, OUTPUT_SCHEMA_PROMPT].join("\n")),
  repair: shortHash([REPAIR_SYSTEM_PROMPT, REPAIR_USER_PREFIX].join("\n")),
} as const;

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export function composeAnalysisMessages(rows: FeedbackRow[]): ChatMessage[] {
  const user = {
    task: ANALYSIS_TASK,
    feedback: rows.map((r) => ({ row_id: r.row_id, text: r.text })),
  };

  return [
    { role: "system", content: ANALYSIS_SYSTEM_PROMPT },
    { role: "user", content: JSON.stringify(user) },
    { role: "user", content: OUTPUT_SCHEMA_PROMPT },
  ];
}

export function composeRepairMessages(raw: string): ChatMessage[] {
  return [
    { role: "system", content: REPAIR_SYSTEM_PROMPT },
    { role: "user", content: REPAIR_USER_PREFIX + raw },
  ];
}
