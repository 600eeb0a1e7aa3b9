/**
 * Report entry point: gathers inputs for a report kind, builds the table,
 * and writes the CSV.
 */

import { existsSync } from "fs";
import { join } from "path";
import type { ProgressCallback, ReportKind, ReportResult } from "../../types/pipeline";
import { filenameTimestamp } from "../analytics/date-utils";
import type { ReportConfig } from "../config/report-config";
import { ReportError } from "../errors/report-error";
import { listInputFiles, loadJsonDocument, type LoadedDocument } from "../input/json-loader";
import { writeCsv } from "../output/csv-writer";
import { buildChannelMetricsReport } from "./channel-metrics";
import { buildChartDataReport } from "./chart-data";
import { buildDailyStatsReport } from "./daily-stats";
import { buildFirstDaysReport } from "./first-days";
import { InputLedger } from "./input-ledger";
import type { ReportBuild } from "./report-build";
import { buildRetentionReport } from "./retention";

function inputFiles(config: ReportConfig, extension: string): string[] {
  if (!existsSync(config.input)) {
    throw new ReportError("INVALID_CONFIG", `Input path not found: ${config.input}`);
  }
  const files = listInputFiles(config.input, extension);
  console.log(`[run-report] Found ${files.length} ${extension} file(s) in ${config.input}`);
  return files;
}

/** Decode each JSON file; failures are recorded as skips. */
export function loadDocuments(files: readonly string[], ledger: InputLedger): LoadedDocument[] {
  const documents: LoadedDocument[] = [];
  for (const file of files) {
    const result = loadJsonDocument(file);
    if (result.ok) documents.push(result.loaded);
    else ledger.skip(result.source, result.reason);
  }
  return documents;
}

export function buildReport(kind: ReportKind, config: ReportConfig): ReportBuild {
  switch (kind) {
    case "channel-metrics": {
      const ledger = new InputLedger(kind);
      return buildChannelMetricsReport(loadDocuments(inputFiles(config, ".json"), ledger), ledger);
    }
    case "first-days": {
      const ledger = new InputLedger(kind);
      const documents = loadDocuments(inputFiles(config, ".json"), ledger);
      return buildFirstDaysReport(documents, config.periodMode, ledger);
    }
    case "chart-data":
      return buildChartDataReport(inputFiles(config, ".zip"), {
        csvName: config.csvName,
        tmpRoot: config.tmpRoot,
      });
    case "retention":
      return buildRetentionReport(inputFiles(config, ".zip"), { tmpRoot: config.tmpRoot });
    case "daily-stats": {
      const [csvPath] = inputFiles(config, ".csv");
      if (!csvPath) {
        throw new ReportError("INVALID_CONFIG", `No CSV export found at ${config.input}`);
      }
      return buildDailyStatsReport(csvPath, { filterDate: config.filterDate });
    }
  }
}

export function runReport(
  kind: ReportKind,
  config: ReportConfig,
  onProgress?: ProgressCallback
): ReportResult {
  const startTime = Date.now();
  const progress = onProgress ?? (() => {});

  progress(`Building ${kind} report...`, 10);
  const build = buildReport(kind, config);

  progress("Writing CSV...", 90);
  const filename = config.outputFile ?? `${build.filenamePrefix}_${filenameTimestamp()}.csv`;
  const outputPath = join(config.outputDir, filename);
  try {
    writeCsv(build.table, outputPath);
  } catch (err) {
    throw err instanceof ReportError ? err.withSummary(build.summary) : err;
  }

  const { summary } = build;
  console.log(
    `[run-report] Successfully processed ${summary.processed} input(s), skipped ${summary.skipped.length}`
  );
  progress("Done", 100);

  return {
    kind,
    outputPath,
    rowCount: build.table.rows.length,
    columns: [...build.table.columns],
    duration: Math.round((Date.now() - startTime) / 100) / 10,
    summary,
  };
}
