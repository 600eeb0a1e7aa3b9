/**
 * Audience retention report: one table per "Audience retention …" archive,
 * concatenated and tagged with the archive filename.
 *
 * Per archive:
 *   Organic ⋈ Detailed activity         (inner, on video position)
 *     ⟕ subscribed / not subscribed     (pivoted by subscription status)
 *     ⟕ new / returning viewers         (pivoted by viewer type)
 *
 * Across archives:
 *   People Remaining     = viewers who stop at or after this position
 *   Stopped/Remaining %  = Stopped watching / People Remaining
 *   Start Date, End Date, Video Title parsed from the archive name
 */

import { basename } from "path";
import { addReverseRunningTotal } from "../analytics/derived-metrics";
import { withExtractedCsvs } from "../archive/zip-extract";
import { describeError, ReportError } from "../errors/report-error";
import { parseCsvFile, validateRows } from "../parser/csv-parser";
import {
  NewReturningRetentionRowSchema,
  RETENTION_MEMBERS,
  RETENTION_POSITION_COLUMN,
  SubscriberRetentionRowSchema,
} from "../parser/schemas";
import { joinOnKeys, TableReconciler } from "../table/reconciler";
import {
  createTable,
  selectColumns,
  sortRows,
  toNumber,
  withColumn,
  type CellValue,
  type Row,
  type Table,
} from "../table/table";
import { InputLedger } from "./input-ledger";
import type { ReportBuild } from "./report-build";

export const ZIP_FILENAME_COLUMN = "zipfilename";

export const RETENTION_COLUMN_ORDER = [
  "Video position (%)",
  "Absolute audience retention (%)",
  "Compared to other videos (%)",
  "Started watching",
  "Stopped watching",
  "Number of times each moment was seen",
  "Not subscribed Retention",
  "Subscribed Retention",
  "New Viewer Retention",
  "Return Viewer Retention",
  ZIP_FILENAME_COLUMN,
  "People Remaining",
  "Stopped/Remaining %",
  "Start Date",
  "End Date",
  "Video Title",
] as const;

const ARCHIVE_NAME_PATTERN = /^Audience retention (\d{4}-\d{2}-\d{2})_(\d{4}-\d{2}-\d{2}) (.+?)\.zip/;

export interface ArchiveTags {
  startDate: string;
  endDate: string;
  videoTitle: string;
}

/** Tags from `Audience retention <start>_<end> <title>.zip`; "Unknown" when the name does not match. */
export function parseArchiveName(filename: string): ArchiveTags {
  const match = ARCHIVE_NAME_PATTERN.exec(filename);
  if (!match) return { startDate: "Unknown", endDate: "Unknown", videoTitle: "Unknown" };
  return { startDate: match[1], endDate: match[2], videoTitle: match[3] };
}

export interface RetentionTables {
  organic: Table;
  detailed: Table;
  subscribers: Table;
  newReturning: Table;
}

// ── Per-archive transform ───────────────────────────────────

/**
 * Joins the four member tables of one retention archive. Pivot failures
 * only drop that pivot's columns and are reported through `warnings`.
 */
export class RetentionArchive {
  readonly warnings: string[] = [];

  constructor(
    private readonly name: string,
    private readonly tables: RetentionTables
  ) {}

  /** Position → (Not subscribed Retention, Subscribed Retention). */
  subscriberPivot(): Table | null {
    const { data, warnings } = validateRows(
      this.tables.subscribers,
      SubscriberRetentionRowSchema,
      RETENTION_MEMBERS.subscribers
    );
    this.warnings.push(...warnings);

    const byPosition = new Map<string, Row>();
    for (const row of data) {
      const position = row[RETENTION_POSITION_COLUMN];
      const key = String(position);
      const status = row["Subscription status"].trim();
      const column =
        status === "Subscribed" ? "Subscribed Retention" : status === "Not subscribed" ? "Not subscribed Retention" : null;
      if (!column) continue;

      const entry = byPosition.get(key) ?? {
        [RETENTION_POSITION_COLUMN]: position,
        "Not subscribed Retention": null,
        "Subscribed Retention": null,
      };
      if (entry[column] !== null) {
        this.warnings.push(`${this.name}: duplicate subscriber retention entries at position ${key}`);
        return null;
      }
      entry[column] = row["Absolute audience retention (%)"];
      byPosition.set(key, entry);
    }

    return createTable(
      [RETENTION_POSITION_COLUMN, "Not subscribed Retention", "Subscribed Retention"],
      [...byPosition.values()]
    );
  }

  /** Position → (New Viewer Retention, Return Viewer Retention); first value per position wins. */
  newReturningPivot(): Table {
    const { data, warnings } = validateRows(
      this.tables.newReturning,
      NewReturningRetentionRowSchema,
      RETENTION_MEMBERS.newReturning
    );
    this.warnings.push(...warnings);

    const byPosition = new Map<string, Row>();
    for (const row of data) {
      const position = row[RETENTION_POSITION_COLUMN];
      const key = String(position);
      const viewerType = row["New and Returning Viewers"].toLowerCase();
      const column = viewerType.includes("new")
        ? "New Viewer Retention"
        : viewerType.includes("return")
          ? "Return Viewer Retention"
          : null;
      if (!column) continue;

      const entry = byPosition.get(key) ?? {
        [RETENTION_POSITION_COLUMN]: position,
        "New Viewer Retention": null,
        "Return Viewer Retention": null,
      };
      if (entry[column] === null) entry[column] = row["Absolute audience retention (%)"];
      byPosition.set(key, entry);
    }

    return createTable(
      [RETENTION_POSITION_COLUMN, "New Viewer Retention", "Return Viewer Retention"],
      [...byPosition.values()]
    );
  }

  combined(): Table {
    const base = joinOnKeys(this.tables.organic, this.tables.detailed, [RETENTION_POSITION_COLUMN], "inner");
    if (!base.ok) {
      throw new ReportError("MERGE_CONFLICT", `${this.name}: ${base.reason}`, { source: this.name });
    }

    let table = base.table;
    for (const pivot of [this.subscriberPivot(), this.newReturningPivot()]) {
      if (!pivot) continue;
      const joined = joinOnKeys(table, pivot, [RETENTION_POSITION_COLUMN], "left");
      if (joined.ok) table = joined.table;
    }
    return table;
  }
}

// ── Archive reading ─────────────────────────────────────────

export function readRetentionArchive(zipPath: string, tmpRoot?: string): RetentionTables {
  const members = Object.values(RETENTION_MEMBERS);
  return withExtractedCsvs(zipPath, { members, tmpRoot }, (files) => {
    const missing = members.filter((m) => !files.has(m));
    if (missing.length > 0) {
      throw new ReportError(
        "UNRECOVERABLE_INPUT",
        `There is no item named ${missing.map((m) => `'${m}'`).join(", ")} in the archive`
      );
    }
    const read = (member: string): Table => {
      const file = files.get(member);
      if (!file) throw new ReportError("UNRECOVERABLE_INPUT", `missing ${member}`);
      return parseCsvFile(file.filePath).table;
    };
    return {
      organic: read(RETENTION_MEMBERS.organic),
      detailed: read(RETENTION_MEMBERS.detailed),
      subscribers: read(RETENTION_MEMBERS.subscribers),
      newReturning: read(RETENTION_MEMBERS.newReturning),
    };
  });
}

// ── Report ──────────────────────────────────────────────────

export interface RetentionSource {
  /** Archive filename; drives the tag columns. */
  source: string;
  tables: RetentionTables;
}

function stoppedShare(row: Row): CellValue {
  const stopped = toNumber(row["Stopped watching"] ?? null);
  const remaining = toNumber(row["People Remaining"] ?? null);
  if (stopped === null || remaining === null || remaining === 0) return null;
  return stopped / remaining;
}

export function combineRetention(
  sources: readonly RetentionSource[],
  ledger: InputLedger = new InputLedger("retention")
): ReportBuild {
  const reconciler = new TableReconciler({ kind: "concatenate", tagColumn: ZIP_FILENAME_COLUMN });

  for (const { source, tables } of sources) {
    try {
      const archive = new RetentionArchive(source, tables);
      const combined = archive.combined();
      archive.warnings.forEach((w) => ledger.warn(w));
      reconciler.add(combined, source);
      ledger.processed(source);
    } catch (err) {
      ledger.skip(source, describeError(err));
    }
  }

  if (reconciler.count === 0) {
    throw new ReportError("NO_DATA", "No retention data was processed", {
      summary: ledger.summary(),
    });
  }

  let table = sortRows(reconciler.result(), [ZIP_FILENAME_COLUMN, RETENTION_POSITION_COLUMN]);

  if (table.columns.includes("Stopped watching")) {
    table = addReverseRunningTotal(table, {
      groupBy: ZIP_FILENAME_COLUMN,
      source: "Stopped watching",
      target: "People Remaining",
    });
    table = withColumn(table, "Stopped/Remaining %", stoppedShare);
  } else {
    ledger.warn("Error calculating additional metrics: 'Stopped watching' column missing");
  }

  const tagsFor = (row: Row): ArchiveTags => parseArchiveName(String(row[ZIP_FILENAME_COLUMN] ?? ""));
  table = withColumn(table, "Start Date", (row) => tagsFor(row).startDate);
  table = withColumn(table, "End Date", (row) => tagsFor(row).endDate);
  table = withColumn(table, "Video Title", (row) => tagsFor(row).videoTitle);

  table = selectColumns(table, RETENTION_COLUMN_ORDER);

  return { table, summary: ledger.summary(), filenamePrefix: "retention_analysis" };
}

export function buildRetentionReport(
  zipPaths: readonly string[],
  options: { tmpRoot?: string } = {}
): ReportBuild {
  const ledger = new InputLedger("retention");
  const sources: RetentionSource[] = [];

  for (const zipPath of zipPaths) {
    const name = basename(zipPath);
    try {
      sources.push({ source: name, tables: readRetentionArchive(zipPath, options.tmpRoot) });
    } catch (err) {
      ledger.skip(name, describeError(err));
    }
  }

  return combineRetention(sources, ledger);
}
