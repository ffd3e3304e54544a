import { logger } from "@/lib/logger";

/**
 * Parse JSON from LLM responses that may be wrapped in markdown code
 * fences, contain preamble/postamble text, or include BOM characters.
 *
 * Strategies, in order:
 * 1. Raw JSON.parse (fast path for well-behaved models)
 * 2. Extract between ```json / ``` fences using indexOf
 * 3. Bracket-match: first { or [ to the last matching closer
 * 4. Repair missing commas between elements and trailing commas
 *
 * Truncated output is not salvaged: a cut-off theme list must fail so the
 * caller can run its repair request instead of rendering partial results.
 *
 * Throws SyntaxError when nothing decodes.
 */
export function parseLLMJson(raw: string): unknown {
  const trimmed = raw.replace(/^\uFEFF/, "").trim();

  // Strategy 1: direct parse
  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to fence extraction
  }

  // Strategy 2: extract from markdown code fences
  const fenced = extractFromFences(trimmed);
  if (fenced !== null) {
    try {
      return JSON.parse(fenced);
    } catch {
      const bracketed = extractBrackets(fenced);
      if (bracketed !== null) {
        const value = tryParseOrRepair(bracketed);
        if (value.ok) return value.value;
      }
    }
  }

  // Strategy 3 + 4: bracket-match on the full string, then repair
  const bracketed = extractBrackets(trimmed);
  if (bracketed !== null) {
    const value = tryParseOrRepair(bracketed);
    if (value.ok) return value.value;
  }

  logger.warn("parseLLMJson: unable to decode LLM response", {
    rawLength: trimmed.length,
    raw: trimmed.slice(0, 4000),
  });
  throw new SyntaxError(
    `parseLLMJson: unable to extract valid JSON from LLM response (${trimmed.length} chars, starts with: ${JSON.stringify(trimmed.slice(0, 60))})`
  );
}

/**
 * Strict decode for a model's first reply. The BOM and surrounding
 * whitespace are dropped and a reply that is exactly one fenced block is
 * unwrapped; any other text around the JSON fails with SyntaxError.
 */
export function parseStrictJson(raw: string): unknown {
  const trimmed = raw.replace(/^\uFEFF/, "").trim();
  const fenced = /^```(?:json)?[ \t]*\r?\n([\s\S]*?)\s*```$/.exec(trimmed);
  return JSON.parse(fenced ? fenced[1] : trimmed);
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParseOrRepair(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    // try the repaired form
  }
  try {
    return { ok: true, value: JSON.parse(repairLlmJson(text)) };
  } catch {
    return { ok: false };
  }
}

/**
 * Fix common structural JSON errors in LLM output.
 *
 * In valid JSON, literal newlines only appear between tokens (never inside
 * strings, where they must be escaped as \n). This means patterns like
 * `}\n{` are unambiguously a missing comma between adjacent array elements.
 */
export function repairLlmJson(text: string): string {
  let result = text;

  // Missing comma between adjacent objects in arrays.
  result = result.replace(/\}(\s+)\{/g, "},$1{");

  // Missing comma between a closing bracket/brace and the next element.
  result = result.replace(/\](\s+)\{/g, "],$1{");
  result = result.replace(/\}(\s+)\[/g, "},$1[");

  // Trailing commas before ] or }.
  result = result.replace(/,(\s*[\]}])/g, "$1");

  return result;
}

function extractFromFences(text: string): string | null {
  const openPatterns = ["```json\n", "```json\r\n", "```json ", "```\n", "```\r\n"];
  let openIdx = -1;
  let contentStart = -1;

  for (const pat of openPatterns) {
    const idx = text.indexOf(pat);
    if (idx !== -1 && (openIdx === -1 || idx < openIdx)) {
      openIdx = idx;
      contentStart = idx + pat.length;
    }
  }

  if (openIdx === -1 || contentStart === -1) return null;

  const closeIdx = text.indexOf("```", contentStart);
  if (closeIdx === -1) {
    // No closing fence -- take everything after the opening
    return text.slice(contentStart).trim();
  }

  return text.slice(contentStart, closeIdx).trim();
}

function extractBrackets(text: string): string | null {
  const firstBrace = text.indexOf("{");
  const firstBracket = text.indexOf("[");

  if (firstBrace === -1 && firstBracket === -1) return null;

  let start: number;
  let closeChar: string;

  if (firstBrace === -1) {
    start = firstBracket;
    closeChar = "]";
  } else if (firstBracket === -1 || firstBrace < firstBracket) {
    start = firstBrace;
    closeChar = "}";
  } else {
    start = firstBracket;
    closeChar = "]";
  }

  const end = text.lastIndexOf(closeChar);
  if (end <= start) return null;

  return text.slice(start, end + 1);
}
