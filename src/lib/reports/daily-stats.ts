/**
 * Daily video stats report: running totals and engagement ratios over a
 * per-video, per-day statistics export.
 */

import { basename } from "path";
import { addEngagementRates, addRunningTotals } from "../analytics/derived-metrics";
import { daysBetween, formatDay, parseDate, parseDayKey } from "../analytics/date-utils";
import { ReportError } from "../errors/report-error";
import { parseCsvFile, validateRows, type ParsedCsv } from "../parser/csv-parser";
import { DAILY_STATS_METRICS, DailyVideoStatsSchema, type DailyVideoStats } from "../parser/schemas";
import { createTable, sortRows, type Row, type Table } from "../table/table";
import { InputLedger } from "./input-ledger";
import type { ReportBuild } from "./report-build";

const DAILY_COLUMNS = [
  "ytVideoID",
  "ytChannelID",
  "ytVideoTitle",
  "ytVideoPublishedDate",
  "ytVideoPublishedTime",
  "Date",
  "views",
  "estimatedMinutesWatched",
  "comments",
  "likes",
  "dislikes",
  "shares",
  "subscribersGained",
  "subscribersLost",
  "DaysSincePublish",
] as const;

export const runningTotalName = (metric: string): string => `RunningTotal_${metric}`;

function toRow(record: DailyVideoStats): Row {
  const published = parseDate(record.ytVideoPublishedDate);
  const day = parseDate(record.Date);
  return {
    ...record,
    ytVideoPublishedDate: published ? formatDay(published) : record.ytVideoPublishedDate,
    Date: day ? formatDay(day) : record.Date,
    DaysSincePublish: published && day ? daysBetween(published, day) : null,
  };
}

export interface DailyStatsOptions {
  /** Keep only videos published on or after this day (`YYYY-MM-DD`). */
  filterDate?: string;
}

export function buildDailyStatsTable(
  input: Table,
  options: DailyStatsOptions,
  ledger: InputLedger,
  source = "daily stats"
): Table {
  const { data, warnings } = validateRows(input, DailyVideoStatsSchema, source);
  warnings.forEach((w) => ledger.warn(w));

  let records = data;
  if (options.filterDate !== undefined) {
    const cutoff = parseDayKey(options.filterDate);
    if (!cutoff) {
      throw new ReportError("INVALID_CONFIG", `Date '${options.filterDate}' is not in YYYY-MM-DD format`);
    }
    records = records.filter((r) => {
      const published = parseDate(r.ytVideoPublishedDate);
      return published !== null && published.getTime() >= cutoff.getTime();
    });
    console.log(`[daily-stats] ${records.length} of ${data.length} rows published on or after ${options.filterDate}`);
  }

  let table = createTable(DAILY_COLUMNS, records.map(toRow));
  table = sortRows(table, ["ytVideoID", "Date"]);
  table = addRunningTotals(table, {
    groupBy: "ytVideoID",
    metrics: DAILY_STATS_METRICS,
    name: runningTotalName,
  });
  return addEngagementRates(table, {
    views: "views",
    daysSincePublish: "DaysSincePublish",
    comments: "comments",
    likes: "likes",
    shares: "shares",
    minutesWatched: "estimatedMinutesWatched",
  });
}

function readStatsCsv(csvPath: string, source: string): ParsedCsv {
  try {
    return parseCsvFile(csvPath);
  } catch (err) {
    throw new ReportError("UNRECOVERABLE_INPUT", `Could not read ${source}`, { source, cause: err });
  }
}

export function buildDailyStatsReport(csvPath: string, options: DailyStatsOptions): ReportBuild {
  const ledger = new InputLedger("daily-stats");
  const source = basename(csvPath);

  const parsed = readStatsCsv(csvPath, source);
  parsed.warnings.forEach((w) => ledger.warn(w));

  const table = buildDailyStatsTable(parsed.table, options, ledger, source);
  if (table.rows.length === 0) {
    ledger.skip(source, "no rows left after validation and filtering");
    throw new ReportError("NO_DATA", "No data found. Check the filter date or the export file.", {
      summary: ledger.summary(),
    });
  }
  ledger.processed(source);

  return { table, summary: ledger.summary(), filenamePrefix: "daily_stats" };
}
