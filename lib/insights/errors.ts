/**
 * Failure classes of an analysis request. Each carries a stable `code` the
 * API surfaces to the page; none of them is retried.
 */

export class CsvParseError extends Error {
  readonly code = "csv";

  constructor(message: string) {
    super(message);
    this.name = "CsvParseError";
  }
}

export class PayloadError extends Error {
  readonly code = "payload";

  constructor(message: string) {
    super(message);
    this.name = "PayloadError";
  }
}

/** Model output was not JSON, and neither was the output of the repair request. */
export class ResponseParseError extends Error {
  readonly code = "parse";
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super(message);
    this.name = "ResponseParseError";
    this.rawResponse = rawResponse;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Decoded JSON does not match the theme schema. */
export class ResponseValidationError extends Error {
  readonly code = "validation";
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      `Model response does not match the theme schema: ${issues
        .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
        .join("; ")}`
    );
    this.name = "ResponseValidationError";
    this.issues = issues;
  }
}

/** A theme cites row ids that were not part of the analyzed rows. */
export class CitationError extends Error {
  readonly code = "citation";
  readonly theme: string;
  readonly rowIds: number[];

  constructor(theme: string, rowIds: number[]) {
    super(
      `Theme "${theme}" cites unknown row id${rowIds.length === 1 ? "" : "s"}: ${rowIds.join(", ")}`
    );
    this.name = "CitationError";
    this.theme = theme;
    this.rowIds = rowIds;
  }
}
