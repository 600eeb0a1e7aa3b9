/**
 * RowAssembler: zips resolved dimension and metric columns into rows.
 */

import type { ResolvedColumns } from "../json/column-resolver";
import { createTable, type CellValue, type Row, type Table } from "./table";

export interface LagWindow {
  periodColumn: string;
  periods: readonly string[];
}

export interface AssembleOptions {
  idColumn: string;
  dateColumn?: string;
  /** Formats raw date dimension values (e.g. `20240105` → `2024-01-05`). */
  formatDate?: (value: CellValue) => CellValue;
  /** Constant columns broadcast to every row, placed after the keys. */
  constants?: Readonly<Record<string, CellValue>>;
  /**
   * Emit one row per period for each video instead of one row per video.
   * Row (i, p) reads every metric at position i + p.
   */
  lagWindow?: LagWindow;
  /** Drop rows whose metrics are all null. Defaults to true. */
  dropEmptyRows?: boolean;
}

function metricNames(columns: ResolvedColumns): string[] {
  return columns.metrics.map((m) => m.name);
}

function hasAnyMetric(row: Row, metrics: readonly string[]): boolean {
  return metrics.some((m) => row[m] !== null && row[m] !== undefined);
}

export function assembleRows(columns: ResolvedColumns, options: AssembleOptions): Table {
  const { idColumn, dateColumn, formatDate, constants = {}, lagWindow } = options;
  const dropEmptyRows = options.dropEmptyRows ?? true;
  const metrics = metricNames(columns);
  const constantColumns = Object.keys(constants);

  const header = [
    idColumn,
    ...(dateColumn !== undefined && columns.dates ? [dateColumn] : []),
    ...constantColumns,
    ...(lagWindow ? [lagWindow.periodColumn] : []),
    ...metrics,
  ];

  const rows: Row[] = [];

  const baseRow = (i: number): Row => {
    const row: Row = { [idColumn]: columns.ids[i] ?? null };
    if (dateColumn !== undefined && columns.dates) {
      const raw = columns.dates[i] ?? null;
      row[dateColumn] = formatDate ? formatDate(raw) : raw;
    }
    for (const col of constantColumns) row[col] = constants[col];
    return row;
  };

  if (!lagWindow) {
    columns.ids.forEach((_, i) => {
      const row = baseRow(i);
      for (const metric of columns.metrics) row[metric.name] = metric.values[i] ?? null;
      rows.push(row);
    });
  } else {
    // Offset alignment: bounded only by the metric arrays that were present
    // in the document; absent slots read as null.
    const resolvedLengths = columns.metrics.filter((m) => m.resolved).map((m) => m.values.length);
    const limit = resolvedLengths.length > 0 ? Math.min(...resolvedLengths) : 0;

    columns.ids.forEach((_, i) => {
      lagWindow.periods.forEach((period, p) => {
        const position = i + p;
        if (position >= limit) return;
        const row = baseRow(i);
        row[lagWindow.periodColumn] = period;
        for (const metric of columns.metrics) row[metric.name] = metric.values[position] ?? null;
        rows.push(row);
      });
    });
  }

  const kept = dropEmptyRows ? rows.filter((row) => hasAnyMetric(row, metrics)) : rows;
  return createTable(header, kept);
}
