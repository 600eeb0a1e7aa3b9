/**
 * First-days report: per-video early-performance metrics from scatterplot
 * card dumps.
 *
 * In lag-window mode every video yields up to three rows (24h, 7d, 28d)
 * read at positional offsets into the metric arrays. In configured mode
 * each video yields one row labelled with the card's configured period.
 */

import type { JsonValue } from "../../types/analytics-json";
import type { PeriodMode } from "../../types/pipeline";
import { convertUnits } from "../analytics/derived-metrics";
import { ReportError } from "../errors/report-error";
import type { LoadedDocument } from "../input/json-loader";
import { resolveColumns } from "../json/column-resolver";
import { resolveArray, resolvePath } from "../json/path-extractor";
import {
  FIRST_DAYS_ENTITIES_PATH,
  FIRST_DAYS_PERIODS,
  FIRST_DAYS_TEMPLATE,
  FIRST_DAYS_TIME_PERIOD_PATH,
  PERIOD_BY_DAY_COUNT,
} from "../json/report-templates";
import {
  extractVideoMetadata,
  joinMetadata,
  MetadataIndex,
  type MetadataColumn,
} from "../table/metadata-joiner";
import { TableReconciler } from "../table/reconciler";
import { assembleRows } from "../table/row-assembler";
import { selectColumns, type Table } from "../table/table";
import { InputLedger } from "./input-ledger";
import type { ReportBuild } from "./report-build";

export const FIRST_DAYS_ID_COLUMN = "VIDEO_ID";
export const FIRST_DAYS_PERIOD_COLUMN = "TIME_PERIOD";
export const FIRST_DAYS_SOURCE_COLUMN = "SOURCE_FILE";

const METADATA_COLUMNS: readonly MetadataColumn[] = [
  { name: "TITLE", pick: (m) => m.title },
  { name: "PUBLISHED_DATE", pick: (m) => m.publishedDate },
];

const DESCRIPTIVE_COLUMNS: readonly string[] = [
  FIRST_DAYS_ID_COLUMN,
  ...METADATA_COLUMNS.map((c) => c.name),
  FIRST_DAYS_PERIOD_COLUMN,
  FIRST_DAYS_SOURCE_COLUMN,
];

/** Period label from the card config; `24h` when absent or unrecognised. */
export function configuredTimePeriod(document: JsonValue): string {
  const count = resolvePath(document, `${FIRST_DAYS_TIME_PERIOD_PATH}.count`);
  if (count.found && typeof count.value === "number") {
    return PERIOD_BY_DAY_COUNT[count.value] ?? "24h";
  }
  return "24h";
}

export function extractFirstDaysMetadata(document: JsonValue): MetadataIndex {
  const index = new MetadataIndex();
  const entities = resolveArray(document, FIRST_DAYS_ENTITIES_PATH);
  if (!entities.found) {
    console.warn("[first-days] Could not find video metadata in the JSON");
    return index;
  }
  index.add(
    extractVideoMetadata(entities.value, {
      container: "entityData",
      id: "videoId",
      title: "title",
      publishedSeconds: "timePublishedSeconds",
    })
  );
  return index;
}

export type FirstDaysExtraction = { ok: true; table: Table } | { ok: false; reason: string };

/** Rows for one document, metadata joined, units not yet converted. */
export function extractFirstDays(document: JsonValue, periodMode: PeriodMode): FirstDaysExtraction {
  const resolution = resolveColumns(document, FIRST_DAYS_TEMPLATE);
  if (!resolution.ok) return resolution;

  const table =
    periodMode === "lag-window"
      ? assembleRows(resolution.columns, {
          idColumn: FIRST_DAYS_ID_COLUMN,
          lagWindow: { periodColumn: FIRST_DAYS_PERIOD_COLUMN, periods: FIRST_DAYS_PERIODS },
        })
      : assembleRows(resolution.columns, {
          idColumn: FIRST_DAYS_ID_COLUMN,
          constants: { [FIRST_DAYS_PERIOD_COLUMN]: configuredTimePeriod(document) },
        });

  const joined = joinMetadata(table, extractFirstDaysMetadata(document), {
    idColumn: FIRST_DAYS_ID_COLUMN,
    columns: METADATA_COLUMNS,
  });

  return { ok: true, table: joined };
}

export function buildFirstDaysReport(
  documents: readonly LoadedDocument[],
  periodMode: PeriodMode,
  ledger: InputLedger = new InputLedger("first-days")
): ReportBuild {
  const reconciler = new TableReconciler({ kind: "concatenate", tagColumn: FIRST_DAYS_SOURCE_COLUMN });

  for (const { source, document } of documents) {
    const extraction = extractFirstDays(document, periodMode);
    if (!extraction.ok) {
      ledger.skip(source, extraction.reason);
      continue;
    }
    reconciler.add(extraction.table, source);
    ledger.processed(source);
  }

  if (reconciler.count === 0) {
    throw new ReportError("NO_DATA", "No first-days metrics found in the JSON files", {
      summary: ledger.summary(),
    });
  }

  let table = reconciler.result();
  if (reconciler.count === 1) {
    table = selectColumns(
      table,
      table.columns.filter((c) => c !== FIRST_DAYS_SOURCE_COLUMN)
    );
  }

  const metricColumns = table.columns.filter((c) => !DESCRIPTIVE_COLUMNS.includes(c));
  table = convertUnits(table, metricColumns);

  console.log(
    `[first-days] ${table.rows.length} rows of metrics (${metricColumns.length} metrics, ${periodMode})`
  );

  return { table, summary: ledger.summary(), filenamePrefix: "first_days" };
}
