import Papa from "papaparse";
import { readFileSync } from "fs";
import { basename } from "path";
import { z } from "zod";
import { createTable, type CellValue, type Row, type Table } from "../table/table";

const NUMERIC_CELL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const LEADING_ZERO = /^[+-]?0\d/;

export type ColumnType = "number" | "string";

/**
 * A column is numeric when every non-blank cell is numeric text and none
 * carries a leading zero (ids such as `00123`). Otherwise it stays text.
 */
export function inferColumnType(cells: readonly (string | undefined)[]): ColumnType {
  let sawValue = false;
  for (const raw of cells) {
    const trimmed = raw?.trim() ?? "";
    if (trimmed === "") continue;
    if (!NUMERIC_CELL.test(trimmed) || LEADING_ZERO.test(trimmed)) return "string";
    sawValue = true;
  }
  return sawValue ? "number" : "string";
}

/** Type a raw CSV cell for its column: blank → null, otherwise number or the original text. */
export function coerceCell(raw: string | undefined, type: ColumnType): CellValue {
  const trimmed = raw?.trim() ?? "";
  if (trimmed === "") return null;
  return type === "number" ? Number(trimmed) : raw ?? null;
}

export interface CsvParseOptions {
  /** Columns always kept as text, whatever their cells look like. */
  textColumns?: readonly string[];
}

export interface ParsedCsv {
  table: Table;
  warnings: string[];
}

/**
 * Parse CSV text with a header row into a Table. Header names are trimmed
 * but otherwise kept as exported.
 */
export function parseCsvText(
  content: string,
  label = "csv",
  options: CsvParseOptions = {}
): ParsedCsv {
  // Remove BOM if present
  const cleanContent = content.replace(/^\uFEFF/, "");

  const parsed = Papa.parse<Record<string, string>>(cleanContent, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (header) => header.trim(),
  });

  const columns = (parsed.meta.fields ?? []).filter((f) => f.length > 0);
  const types = new Map(
    columns.map((col) => {
      const type: ColumnType = options.textColumns?.includes(col)
        ? "string"
        : inferColumnType(parsed.data.map((record) => record[col]));
      return [col, type] as const;
    })
  );
  const rows: Row[] = parsed.data.map((record) => {
    const row: Row = {};
    for (const col of columns) row[col] = coerceCell(record[col], types.get(col) ?? "string");
    return row;
  });

  const warnings: string[] = [];
  if (parsed.errors.length > 0) {
    warnings.push(
      ...parsed.errors.slice(0, 5).map((e) => `${label}: CSV parse error at row ${e.row}: ${e.message}`)
    );
  }

  console.log(`[csv-parser] ${label}: ${rows.length} rows, ${columns.length} columns`);
  return { table: createTable(columns, rows), warnings };
}

export function parseCsvFile(filePath: string, options: CsvParseOptions = {}): ParsedCsv {
  const fileContent = readFileSync(filePath, "utf8");
  return parseCsvText(fileContent, basename(filePath), options);
}

/**
 * Validate each row of a table against a Zod schema.
 * Returns validated rows and warnings for the first rows that failed.
 */
export function validateRows<T>(
  table: Table,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): { data: T[]; warnings: string[] } {
  const data: T[] = [];
  const warnings: string[] = [];

  table.rows.forEach((row, i) => {
    const result = schema.safeParse(row);
    if (result.success) {
      data.push(result.data);
    } else if (warnings.length < 10) {
      // Only warn for the first few rows to avoid spam
      warnings.push(
        `${label} row ${i + 1}: ${result.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`
      );
    }
  });

  return { data, warnings };
}
