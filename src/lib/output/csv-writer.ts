import Papa from "papaparse";
import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { ReportError } from "../errors/report-error";
import type { Table } from "../table/table";

/** Serialise with a header row in the table's column order; nulls become empty cells. */
export function serializeCsv(table: Table): string {
  const data = table.rows.map((row) =>
    table.columns.map((col) => {
      const value = row[col];
      return value === null || value === undefined ? "" : value;
    })
  );
  return Papa.unparse({ fields: [...table.columns], data }, { newline: "\n" });
}

export function writeCsv(table: Table, outputPath: string): void {
  const content = serializeCsv(table);
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, `${content}\n`, "utf8");
  } catch (err) {
    throw new ReportError("OUTPUT_WRITE_FAILURE", `Could not write report to ${outputPath}`, {
      cause: err,
    });
  }
  console.log(
    `[csv-writer] Wrote ${table.rows.length} rows × ${table.columns.length} columns → ${outputPath}`
  );
}
