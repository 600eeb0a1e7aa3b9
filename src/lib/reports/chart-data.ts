/**
 * Chart data report: merges the chart CSV found in each exported archive.
 *
 * Archives cover overlapping periods with partially filled columns, so rows
 * are merged on their descriptive key columns: the first archive's values
 * are kept and later archives only fill its gaps.
 */

import { basename } from "path";
import { withExtractedCsvs } from "../archive/zip-extract";
import { describeError, ReportError } from "../errors/report-error";
import { parseCsvFile } from "../parser/csv-parser";
import { CHART_DATA_KEY_COLUMNS } from "../parser/schemas";
import { TableReconciler } from "../table/reconciler";
import type { Table } from "../table/table";
import { InputLedger } from "./input-ledger";
import type { ReportBuild } from "./report-build";

export interface ChartDataSource {
  /** Archive filename, used in warnings. */
  source: string;
  table: Table;
}

/**
 * Read `csvName` out of one archive; null when the archive lacks it. Key
 * columns stay text so rows from different archives compare equal.
 */
export function readChartCsv(zipPath: string, csvName: string, tmpRoot?: string): ChartDataSource | null {
  return withExtractedCsvs(zipPath, { members: [csvName], tmpRoot }, (files) => {
    const file = files.get(csvName);
    if (!file) return null;
    const { table } = parseCsvFile(file.filePath, { textColumns: CHART_DATA_KEY_COLUMNS });
    return { source: basename(zipPath), table };
  });
}

export function mergeChartData(
  sources: readonly ChartDataSource[],
  ledger: InputLedger = new InputLedger("chart-data")
): ReportBuild {
  const reconciler = new TableReconciler({ kind: "merge-fill", keys: CHART_DATA_KEY_COLUMNS });

  for (const { source, table } of sources) {
    const rejection = reconciler.add(table, source);
    if (rejection === null) ledger.processed(source);
    else ledger.skip(source, rejection);
  }

  if (reconciler.count === 0) {
    throw new ReportError("NO_DATA", "No chart data was found in the archives", {
      summary: ledger.summary(),
    });
  }

  const table = reconciler.result();
  console.log(`[chart-data] Combined ${table.rows.length} rows from ${reconciler.count} CSV files`);
  return { table, summary: ledger.summary(), filenamePrefix: "chart_data" };
}

export function buildChartDataReport(
  zipPaths: readonly string[],
  options: { csvName: string; tmpRoot?: string }
): ReportBuild {
  const ledger = new InputLedger("chart-data");
  const sources: ChartDataSource[] = [];

  for (const zipPath of zipPaths) {
    const name = basename(zipPath);
    try {
      const source = readChartCsv(zipPath, options.csvName, options.tmpRoot);
      if (source) sources.push(source);
      else ledger.skip(name, `File ${options.csvName} not found in ${name}`);
    } catch (err) {
      ledger.skip(name, describeError(err));
    }
  }

  return mergeChartData(sources, ledger);
}
