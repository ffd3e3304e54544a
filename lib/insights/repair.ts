/**
 * Bounded JSON recovery for model output.
 *
 * Two states. `parsing` decodes the first response strictly (a single
 * fenced block at most); on failure the process moves to `repairing`, which
 * sends exactly one repair request and decodes its output leniently. A
 * second decode failure is final. The model client is
 * injected, so the bound can be exercised with scripted responses.
 */

import { composeRepairMessages } from "./prompts";
import { ResponseParseError } from "./errors";
import type { ModelClient } from "@/lib/llm/chat-completions";
import { parseLLMJson, parseStrictJson } from "@/lib/llm/parse-llm-json";
import { logger } from "@/lib/logger";

export type RecoveryState =
  | { phase: "parsing"; raw: string }
  | { phase: "repairing"; raw: string; decodeError: string }
  | { phase: "decoded"; value: unknown; repaired: boolean }
  | { phase: "failed"; raw: string; decodeError: string };

type DecodeResult = { ok: true; value: unknown } | { ok: false; error: string };

function decode(raw: string, parse: (text: string) => unknown): DecodeResult {
  try {
    return { ok: true, value: parse(raw) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Advance the recovery process by one transition. Only the `repairing`
 * phase talks to the model.
 */
export async function step(state: RecoveryState, client: ModelClient): Promise<RecoveryState> {
  switch (state.phase) {
    case "parsing": {
      const result = decode(state.raw, parseStrictJson);
      if (result.ok) return { phase: "decoded", value: result.value, repaired: false };
      return { phase: "repairing", raw: state.raw, decodeError: result.error };
    }
    case "repairing": {
      logger.warn("Model response is not valid JSON, requesting repair", {
        rawLength: state.raw.length,
        decodeError: state.decodeError,
      });
      const repairedRaw = await client.complete(composeRepairMessages(state.raw));
      const result = decode(repairedRaw, parseLLMJson);
      if (result.ok) return { phase: "decoded", value: result.value, repaired: true };
      return { phase: "failed", raw: repairedRaw, decodeError: result.error };
    }
    case "decoded":
    case "failed":
      return state;
  }
}

export interface DecodedResponse {
  value: unknown;
  repaired: boolean;
}

/**
 * Decode `raw`, repairing at most once. Throws ResponseParseError when the
 * repair output does not decode either; model client errors propagate as is.
 */
export async function decodeWithRepair(raw: string, client: ModelClient): Promise<DecodedResponse> {
  let state: RecoveryState = { phase: "parsing", raw };

  while (state.phase === "parsing" || state.phase === "repairing") {
    state = await step(state, client);
  }

  if (state.phase === "failed") {
    logger.error("Repair response is not valid JSON either", {
      rawLength: state.raw.length,
      raw: state.raw.slice(0, 4000),
    });
    throw new ResponseParseError(
      `The model did not return valid JSON, even after one repair attempt (${state.decodeError})`,
      state.raw
    );
  }

  return { value: state.value, repaired: state.repaired };
}
