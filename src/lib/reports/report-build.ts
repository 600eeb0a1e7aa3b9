import type { InputSummary } from "../../types/pipeline";
import type { Table } from "../table/table";

/** A finished report table, ready to be written. */
export interface ReportBuild {
  table: Table;
  summary: InputSummary;
  /** Used when the caller gives no output filename. */
  filenamePrefix: string;
}
