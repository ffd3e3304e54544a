/**
 * Schema binding for the model's theme list.
 *
 * Frequency and severity are a closed three-value enum: anything else the
 * model invents ("Very High", "med") is rejected here rather than rendered.
 */

import { z } from "zod/v4";
import { ResponseValidationError, type ValidationIssue } from "./errors";
import { logger } from "@/lib/logger";

export const LEVELS = ["Low", "Medium", "High"] as const;

export const LevelSchema = z.enum(LEVELS);
export type Level = z.infer<typeof LevelSchema>;

export const ThemeSchema = z.object({
  theme: z.string(),
  summary: z.string(),
  frequency: LevelSchema,
  severity: LevelSchema,
  recommended_action: z.string(),
  cited_row_ids: z.array(z.number().int()).min(1, "must cite at least one row"),
});
export type Theme = z.infer<typeof ThemeSchema>;

export const AnalysisResultSchema = z.object({
  themes: z.array(ThemeSchema),
});
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;

/** The prompt asks for this many themes; the count is reported, not enforced. */
export const EXPECTED_THEME_RANGE = { min: 3, max: 7 } as const;

function formatPath(path: PropertyKey[]): string {
  return path
    .map((segment, i) =>
      typeof segment === "number" ? `[${segment}]` : `${i === 0 ? "" : "."}${String(segment)}`
    )
    .join("");
}

/**
 * Validate decoded JSON against the AnalysisResult shape.
 * Throws ResponseValidationError listing every issue; no repair follows.
 */
export function bindAnalysisResult(value: unknown): AnalysisResult {
  const parsed = AnalysisResultSchema.safeParse(value);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }));
    throw new ResponseValidationError(issues);
  }

  const count = parsed.data.themes.length;
  if (count < EXPECTED_THEME_RANGE.min || count > EXPECTED_THEME_RANGE.max) {
    logger.warn("Theme count outside the requested range", {
      count,
      expected: `${EXPECTED_THEME_RANGE.min}-${EXPECTED_THEME_RANGE.max}`,
    });
  }

  return parsed.data;
}
