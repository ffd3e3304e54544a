/**
 * Input validation for API routes.
 */

import { z } from "zod/v4";
import { MAX_ROWS, MIN_ROWS } from "@/lib/insights/payload";

const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// ---------------------------------------------------------------------------
// Zod schemas for API routes
// ---------------------------------------------------------------------------

export const AnalyzeRequestSchema = z
  .object({
    columns: z.array(z.string().min(1)).min(1, "columns must list at least one column").max(500),
    // Only the first `maxRows` rows are analyzed; longer tables are accepted and cut there.
    rows: z.array(z.record(z.string(), CellSchema)).min(1, "rows must contain at least one row"),
    column: z.string().min(1, "column is required"),
    maxRows: z
      .number()
      .int("maxRows must be an integer")
      .min(MIN_ROWS, `maxRows must be at least ${MIN_ROWS}`)
      .max(MAX_ROWS, `maxRows must be at most ${MAX_ROWS}`),
  })
  .refine((body) => body.columns.includes(body.column), {
    message: "column must be one of columns",
    path: ["column"],
  });

export type AnalyzeRequestInput = z.infer<typeof AnalyzeRequestSchema>;

/**
 * Parse a request body against a schema. Returns the joined issue messages
 * instead of throwing, so routes can answer 400 directly.
 */
export async function safeParseBody<T>(
  request: Request,
  schema: z.ZodType<T>
): Promise<{ success: true; data: T } | { success: false; error: string }> {
  let raw: unknown;
  try {
    raw = await request.json();
  } catch {
    return { success: false, error: "Invalid JSON in request body" };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((i) => i.message).join("; ");
    return { success: false, error: messages };
  }

  return { success: true, data: result.data };
}
