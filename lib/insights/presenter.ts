import { lookupCitedRows } from "./citations";
import type { AnalysisResult, FeedbackTable, Theme, ThemeCard } from "./types";

export function themeHeading(theme: Theme): string {
  return `${theme.theme} (Freq: ${theme.frequency}, Sev: ${theme.severity})`;
}

/** One card per theme, with cited rows resolved against the uploaded table. */
export function buildThemeCards(
  result: AnalysisResult,
  table: FeedbackTable,
  column: string
): ThemeCard[] {
  return result.themes.map((theme) => ({
    ...theme,
    heading: themeHeading(theme),
    citations: lookupCitedRows(table, column, theme.cited_row_ids, theme.theme),
  }));
}
