/**
 * In-memory tables passed between pipeline stages.
 *
 * Every helper returns a new Table; stages hand tables to one another and
 * never edit rows they did not create.
 */

export type CellValue = string | number | null;

export type Row = Record<string, CellValue>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export function createTable(columns: readonly string[], rows: readonly Row[] = []): Table {
  const normalized = rows.map((row) => {
    const out: Row = {};
    for (const col of columns) out[col] = row[col] ?? null;
    return out;
  });
  return { columns: [...columns], rows: normalized };
}

export function isEmptyTable(table: Table): boolean {
  return table.rows.length === 0;
}

export function hasColumns(table: Table, columns: readonly string[]): boolean {
  return columns.every((c) => table.columns.includes(c));
}

export function missingColumns(table: Table, columns: readonly string[]): string[] {
  return columns.filter((c) => !table.columns.includes(c));
}

/** Union of column names, first-seen order. */
export function unionColumns(...columnSets: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const set of columnSets) {
    for (const col of set) {
      if (!seen.has(col)) {
        seen.add(col);
        out.push(col);
      }
    }
  }
  return out;
}

/**
 * Project onto `columns` in the given order. Columns the table lacks are
 * dropped unless `fillMissing` is set, in which case they are added as null.
 */
export function selectColumns(
  table: Table,
  columns: readonly string[],
  fillMissing = false
): Table {
  const kept = fillMissing ? [...columns] : columns.filter((c) => table.columns.includes(c));
  return createTable(kept, table.rows);
}

export function getColumn(table: Table, column: string): CellValue[] {
  return table.rows.map((row) => row[column] ?? null);
}

/** Add (or replace) a column computed per row. New columns go last. */
export function withColumn(
  table: Table,
  column: string,
  compute: (row: Row, index: number) => CellValue
): Table {
  const columns = table.columns.includes(column) ? table.columns : [...table.columns, column];
  const rows = table.rows.map((row, i) => ({ ...row, [column]: compute(row, i) }));
  return { columns, rows };
}

export function filterRows(table: Table, keep: (row: Row) => boolean): Table {
  return { columns: table.columns, rows: table.rows.filter(keep) };
}

export function appendTables(tables: readonly Table[]): Table {
  const columns = unionColumns(...tables.map((t) => t.columns));
  return createTable(columns, tables.flatMap((t) => t.rows));
}

function compareCells(a: CellValue, b: CellValue): number {
  // nulls sort last
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? 1 : -1;
  }
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Stable sort by the given columns, ascending. */
export function sortRows(table: Table, by: readonly string[]): Table {
  const indexed = table.rows.map((row, i) => ({ row, i }));
  indexed.sort((x, y) => {
    for (const col of by) {
      const cmp = compareCells(x.row[col] ?? null, y.row[col] ?? null);
      if (cmp !== 0) return cmp;
    }
    return x.i - y.i;
  });
  return { columns: table.columns, rows: indexed.map((e) => e.row) };
}

export function rowKey(row: Row, columns: readonly string[]): string {
  return JSON.stringify(columns.map((c) => row[c] ?? null));
}

/** Drop rows identical across every column, keeping the first occurrence. */
export function dropDuplicateRows(table: Table): Table {
  const seen = new Set<string>();
  const rows = table.rows.filter((row) => {
    const key = rowKey(row, table.columns);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  return { columns: table.columns, rows };
}

export function mapColumn(
  table: Table,
  column: string,
  transform: (value: CellValue, row: Row) => CellValue
): Table {
  if (!table.columns.includes(column)) return table;
  const rows = table.rows.map((row) => ({ ...row, [column]: transform(row[column] ?? null, row) }));
  return { columns: table.columns, rows };
}

export function renameColumns(table: Table, mapping: Readonly<Record<string, string>>): Table {
  const columns = table.columns.map((c) => mapping[c] ?? c);
  const rows = table.rows.map((row) => {
    const out: Row = {};
    for (const col of table.columns) out[mapping[col] ?? col] = row[col] ?? null;
    return out;
  });
  return { columns, rows };
}

/** Coerce a cell to a finite number, or null. Numeric strings count. */
export function toNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}
