export type ReportKind =
  | "channel-metrics"
  | "first-days"
  | "chart-data"
  | "retention"
  | "daily-stats";

export const REPORT_KINDS: readonly ReportKind[] = [
  "channel-metrics",
  "first-days",
  "chart-data",
  "retention",
  "daily-stats",
];

export type PeriodMode = "lag-window" | "configured";

/** An input that contributed nothing to the report, with the reason shown to the user. */
export interface SkippedInput {
  source: string;
  reason: string;
}

export interface InputSummary {
  processed: number;
  skipped: SkippedInput[];
  warnings: string[];
}

export interface ReportResult {
  kind: ReportKind;
  outputPath: string;
  rowCount: number;
  columns: string[];
  duration: number;
  summary: InputSummary;
}

export type ProgressCallback = (step: string, percent: number) => void;
