export * from "./types/analytics-json";
export * from "./types/pipeline";
export * from "./lib/errors/report-error";
export * from "./lib/json/path-extractor";
export * from "./lib/json/column-resolver";
export * from "./lib/json/report-templates";
export * from "./lib/table/table";
export * from "./lib/table/row-assembler";
export * from "./lib/table/metadata-joiner";
export * from "./lib/table/reconciler";
export * from "./lib/analytics/derived-metrics";
export * from "./lib/parser/csv-parser";
export * from "./lib/output/csv-writer";
export { buildReportConfig, isReportKind, type ReportConfig } from "./lib/config/report-config";
export { runReport, buildReport } from "./lib/reports/run-report";
export { buildChannelMetricsReport } from "./lib/reports/channel-metrics";
export { buildFirstDaysReport } from "./lib/reports/first-days";
export { buildChartDataReport, mergeChartData } from "./lib/reports/chart-data";
export { buildRetentionReport, combineRetention, parseArchiveName } from "./lib/reports/retention";
export { buildDailyStatsReport } from "./lib/reports/daily-stats";
