import type { InputSummary } from "../../types/pipeline";

export type ReportErrorCode =
  | "UNRECOVERABLE_INPUT"
  | "MERGE_CONFLICT"
  | "OUTPUT_WRITE_FAILURE"
  | "NO_DATA"
  | "INVALID_CONFIG";

/**
 * Failure raised by the report pipeline.
 *
 * UNRECOVERABLE_INPUT and MERGE_CONFLICT are caught per input and recorded as
 * skips; the remaining codes fail the whole invocation.
 */
export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly source?: string;
  /** Inputs processed and skipped before a whole-run failure. */
  readonly summary?: InputSummary;

  constructor(
    code: ReportErrorCode,
    message: string,
    options: { source?: string; cause?: unknown; summary?: InputSummary } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ReportError";
    this.code = code;
    this.source = options.source;
    this.summary = options.summary;
  }

  /** Same error, carrying the run's input summary. */
  withSummary(summary: InputSummary): ReportError {
    return new ReportError(this.code, this.message, {
      source: this.source,
      cause: this.cause,
      summary,
    });
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
