/**
 * DerivedMetricsEngine: unit conversions, running totals, ratios and
 * output column ordering.
 *
 * Unit conversion runs once per report, before running totals are taken.
 * Running totals follow the current row order; callers sort by video and
 * date (or position) first.
 */

import {
  createTable,
  toNumber,
  withColumn,
  type CellValue,
  type Row,
  type Table,
} from "../table/table";

// ── Unit conversion ─────────────────────────────────────────

export type UnitConversion = "percentage" | "hours" | "minutes" | "seconds" | "count";

const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;
const MS_PER_SECOND = 1_000;

/** Conversion applied to a metric column, decided by its name. */
export function conversionFor(column: string): UnitConversion {
  if (column.includes("PERCENTAGE") || column.includes("VTR")) return "percentage";
  if (column === "WATCH_TIME") return "hours";
  if (column === "AVERAGE_WATCH_TIME") return "minutes";
  if (column.includes("TIME") && column.includes("MILLI")) return "seconds";
  return "count";
}

/** Round half to even at `decimals` places, on the scaled value. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  return rounded / factor;
}

export function convertValue(value: CellValue, conversion: UnitConversion): CellValue {
  const num = toNumber(value);
  switch (conversion) {
    case "percentage":
      return num === null ? null : roundTo(num, 2);
    case "hours":
      return num === null ? null : roundTo(num / MS_PER_HOUR, 2);
    case "minutes":
      return num === null ? null : roundTo(num / MS_PER_MINUTE, 2);
    case "seconds":
      return num === null ? null : roundTo(num / MS_PER_SECOND, 1);
    case "count":
      return num === null ? 0 : Math.trunc(num);
  }
}

export function convertUnits(table: Table, metrics: readonly string[]): Table {
  const conversions = new Map(
    metrics.filter((m) => table.columns.includes(m)).map((m) => [m, conversionFor(m)] as const)
  );
  if (conversions.size === 0) return table;

  const rows = table.rows.map((row) => {
    const out: Row = { ...row };
    for (const [column, conversion] of conversions) {
      out[column] = convertValue(row[column] ?? null, conversion);
    }
    return out;
  });
  return { columns: table.columns, rows };
}

/** Replace null cells in `columns` with zero. */
export function fillNullsWithZero(table: Table, columns: readonly string[]): Table {
  const targets = columns.filter((c) => table.columns.includes(c));
  const rows = table.rows.map((row) => {
    const out: Row = { ...row };
    for (const col of targets) if (out[col] === null || out[col] === undefined) out[col] = 0;
    return out;
  });
  return { columns: table.columns, rows };
}

// ── Running totals ──────────────────────────────────────────

export const RUNNING_TOTAL_SUFFIX = "_RUNNING_TOTAL";

export type RunningTotalNamer = (metric: string) => string;

export const suffixRunningTotal: RunningTotalNamer = (metric) => `${metric}${RUNNING_TOTAL_SUFFIX}`;

export interface RunningTotalOptions {
  groupBy: string;
  metrics: readonly string[];
  name?: RunningTotalNamer;
}

/**
 * Cumulative sum of each metric within its group, in row order. A null cell
 * yields a null total at that row and does not reset the sum.
 */
export function addRunningTotals(table: Table, options: RunningTotalOptions): Table {
  const name = options.name ?? suffixRunningTotal;
  const metrics = options.metrics.filter(
    (m) => table.columns.includes(m) && !m.endsWith(RUNNING_TOTAL_SUFFIX)
  );

  let result = table;
  for (const metric of metrics) {
    const sums = new Map<string, number>();
    result = withColumn(result, name(metric), (row) => {
      const group = String(row[options.groupBy] ?? "");
      const value = toNumber(row[metric] ?? null);
      if (value === null) return null;
      const total = (sums.get(group) ?? 0) + value;
      sums.set(group, total);
      return total;
    });
  }
  return result;
}

/**
 * Suffix sum within each group: each row gets the sum of `source` from that
 * row to the last row of its group. Null cells count as zero.
 */
export function addReverseRunningTotal(
  table: Table,
  options: { groupBy: string; source: string; target: string }
): Table {
  const totals = new Array<number>(table.rows.length).fill(0);
  const sums = new Map<string, number>();
  for (let i = table.rows.length - 1; i >= 0; i--) {
    const row = table.rows[i];
    const group = String(row[options.groupBy] ?? "");
    const total = (sums.get(group) ?? 0) + (toNumber(row[options.source] ?? null) ?? 0);
    sums.set(group, total);
    totals[i] = total;
  }
  return withColumn(table, options.target, (_, i) => totals[i]);
}

// ── Ratios ──────────────────────────────────────────────────

/** numerator / denominator, or `fallback` when either side is null or the denominator is zero. */
export function safeRatio(
  numerator: number | null,
  denominator: number | null,
  fallback: number | null = 0
): number | null {
  if (numerator === null || denominator === null || denominator === 0) return fallback;
  return numerator / denominator;
}

export interface EngagementColumns {
  views: string;
  daysSincePublish: string;
  comments: string;
  likes: string;
  shares: string;
  minutesWatched: string;
}

/**
 * Adds ViewsPerDay, EngagementRate (percent) and RetentionRate.
 * Zero days since publish count as one day.
 */
export function addEngagementRates(table: Table, cols: EngagementColumns): Table {
  const num = (row: Row, col: string) => toNumber(row[col] ?? null);

  let result = withColumn(table, "ViewsPerDay", (row) => {
    const days = num(row, cols.daysSincePublish);
    return safeRatio(num(row, cols.views) ?? 0, days === 0 ? 1 : days);
  });

  result = withColumn(result, "EngagementRate", (row) => {
    const comments = num(row, cols.comments);
    const likes = num(row, cols.likes);
    const shares = num(row, cols.shares);
    if (comments === null || likes === null || shares === null) return 0;
    return safeRatio((comments + likes + shares) * 100, num(row, cols.views));
  });

  return withColumn(result, "RetentionRate", (row) =>
    safeRatio(num(row, cols.minutesWatched), num(row, cols.views))
  );
}

// ── Column ordering ─────────────────────────────────────────

export interface ColumnOrderOptions {
  /** Key/descriptive columns that always come first. */
  leading: readonly string[];
  /** Preferred metric order. */
  known: readonly string[];
  name?: RunningTotalNamer;
  isRunningTotal?: (column: string) => boolean;
}

/**
 * Leading columns, then known metrics in preferred order, then any other
 * metrics in first-seen order, then the running totals in the same relative
 * order. Columns not in the table are skipped.
 */
export function orderMetricColumns(columns: readonly string[], options: ColumnOrderOptions): string[] {
  const name = options.name ?? suffixRunningTotal;
  const isRunningTotal = options.isRunningTotal ?? ((c: string) => c.endsWith(RUNNING_TOTAL_SUFFIX));
  const present = new Set(columns);

  const leading = options.leading.filter((c) => present.has(c));
  const known = options.known.filter((c) => present.has(c));
  const extras = columns.filter(
    (c) => !leading.includes(c) && !known.includes(c) && !isRunningTotal(c)
  );
  const totals = [...known, ...extras].map(name).filter((c) => present.has(c));

  return [...leading, ...known, ...extras, ...totals];
}

export function orderColumns(table: Table, options: ColumnOrderOptions): Table {
  return createTable(orderMetricColumns(table.columns, options), table.rows);
}
