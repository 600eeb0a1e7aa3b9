#!/usr/bin/env node
/**
 * Build one analytics report from exported files.
 *
 * Usage:
 *   video-reports channel-metrics --input ./exports/json
 *   video-reports first-days --input ./card.json --period-mode configured
 *   video-reports chart-data --input ./exports/zips --csv-name "Chart data.csv"
 *   video-reports retention --input ./exports/retention --output-file retention.csv
 *   video-reports daily-stats --input ./daily.csv --filter-date 2024-01-01
 */

import { Command } from "commander";
import { buildReportConfig, isReportKind } from "./lib/config/report-config";
import { describeError, ReportError } from "./lib/errors/report-error";
import { runReport } from "./lib/reports/run-report";
import { REPORT_KINDS, type InputSummary, type ReportResult } from "./types/pipeline";

interface CliOptions {
  input: string;
  outputDir?: string;
  outputFile?: string;
  csvName?: string;
  filterDate?: string;
  periodMode?: string;
}

function printInputSummary(summary: InputSummary): void {
  console.log(`Inputs processed: ${summary.processed}, skipped: ${summary.skipped.length}`);
  for (const skip of summary.skipped) {
    console.log(`  - ${skip.source}: ${skip.reason}`);
  }
  if (summary.warnings.length > 0) {
    console.log(`Warnings: ${summary.warnings.length}`);
    for (const w of summary.warnings.slice(0, 10)) {
      console.log(`  - ${w}`);
    }
  }
}

function printSummary(result: ReportResult): void {
  console.log("\n=== Results ===");
  console.log(`Report: ${result.kind}`);
  console.log(`Output: ${result.outputPath}`);
  console.log(`Rows: ${result.rowCount.toLocaleString()}  Columns: ${result.columns.length}`);
  printInputSummary(result.summary);
  console.log(`Duration: ${result.duration}s`);
}

const program = new Command();

program
  .name("video-reports")
  .description("Build merged, enriched CSV reports from exported video analytics files")
  .argument("<kind>", `report kind (${REPORT_KINDS.join(", ")})`)
  .requiredOption("-i, --input <path>", "input file or directory")
  .option("-o, --output-dir <dir>", "directory to save the output CSV file")
  .option("-f, --output-file <name>", "name of the output CSV file (default: timestamped)")
  .option("--csv-name <member>", "CSV member to read from each chart-data archive")
  .option("--filter-date <YYYY-MM-DD>", "daily-stats: only videos published on or after this date")
  .option("--period-mode <mode>", "first-days: lag-window or configured")
  .action((kind: string, options: CliOptions) => {
    if (!isReportKind(kind)) {
      console.error(`Unknown report kind "${kind}". Expected one of: ${REPORT_KINDS.join(", ")}`);
      process.exitCode = 1;
      return;
    }

    try {
      const config = buildReportConfig(options);
      const result = runReport(kind, config, (step, percent) => {
        console.log(`  [${String(percent).padStart(3)}%] ${step}`);
      });
      printSummary(result);
    } catch (err) {
      const prefix = err instanceof ReportError ? `${err.code}: ` : "";
      console.error(`Report failed: ${prefix}${describeError(err)}`);
      if (err instanceof ReportError && err.summary) printInputSummary(err.summary);
      process.exitCode = 1;
    }
  });

program.parse();
