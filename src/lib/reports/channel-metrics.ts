/**
 * Channel metrics report: per-video, per-day metrics from top-entities
 * chart dumps, merged across files, with running totals and video metadata.
 *
 * Flow:
 *  1. Locate the top-entities result table in each document
 *  2. Resolve id/date dimensions and the enumerated metric columns
 *  3. Merge documents on (video, date), earlier files winning
 *  4. Convert units, then running totals per video
 *  5. Left-join title / publish date / length
 */

import { isJsonObject, type JsonValue } from "../../types/analytics-json";
import {
  addRunningTotals,
  convertUnits,
  fillNullsWithZero,
  orderColumns,
} from "../analytics/derived-metrics";
import { formatDateId } from "../analytics/date-utils";
import { ReportError } from "../errors/report-error";
import type { LoadedDocument } from "../input/json-loader";
import { resolveColumns } from "../json/column-resolver";
import { ABSENT, found, resolveArray, resolvePath, type Lookup } from "../json/path-extractor";
import {
  CHANNEL_KNOWN_METRICS,
  CHANNEL_METRICS_TEMPLATE,
  TOP_ENTITIES_QUERY_KEY,
} from "../json/report-templates";
import {
  extractVideoMetadata,
  joinMetadata,
  MetadataIndex,
  metadataTable,
  type MetadataColumn,
  type VideoMetadata,
} from "../table/metadata-joiner";
import { TableReconciler } from "../table/reconciler";
import { assembleRows } from "../table/row-assembler";
import { sortRows, type Table } from "../table/table";
import { InputLedger } from "./input-ledger";
import type { ReportBuild } from "./report-build";

export const CHANNEL_ID_COLUMN = "Video IDs";
export const CHANNEL_DATE_COLUMN = "Dates";
const KEY_COLUMNS: readonly string[] = [CHANNEL_ID_COLUMN, CHANNEL_DATE_COLUMN];

export const CHANNEL_METADATA_COLUMNS: readonly MetadataColumn[] = [
  { name: "Title", pick: (m) => m.title },
  { name: "Published Date", pick: (m) => m.publishedDate },
  { name: "Length (seconds)", pick: (m) => m.lengthSeconds },
];

function results(document: JsonValue): JsonValue[] {
  const list = resolveArray(document, "results");
  return list.found ? list.value : [];
}

/** `value.resultTable` of the first result keyed as the top-entities query. */
export function findTopEntitiesTable(document: JsonValue): Lookup<JsonValue> {
  for (const result of results(document)) {
    if (!isJsonObject(result) || result.key !== TOP_ENTITIES_QUERY_KEY) continue;
    const table = resolvePath(result, "value.resultTable");
    return table.found && isJsonObject(table.value) ? found(table.value) : ABSENT;
  }
  return ABSENT;
}

/** Creator video list from the first result that carries one. */
export function extractCreatorVideoMetadata(document: JsonValue): VideoMetadata[] {
  for (const result of results(document)) {
    const videos = resolveArray(result, "value.getCreatorVideos.videos");
    if (!videos.found) continue;
    return extractVideoMetadata(videos.value, {
      container: "",
      id: "videoId",
      title: "title",
      publishedSeconds: "timePublishedSeconds",
      lengthSeconds: "lengthSeconds",
    });
  }
  return [];
}

export type ChannelExtraction = { ok: true; table: Table } | { ok: false; reason: string };

export function extractChannelMetrics(document: JsonValue): ChannelExtraction {
  const resultTable = findTopEntitiesTable(document);
  if (!resultTable.found) {
    return { ok: false, reason: `no ${TOP_ENTITIES_QUERY_KEY} result table` };
  }

  const resolution = resolveColumns(resultTable.value, CHANNEL_METRICS_TEMPLATE);
  if (!resolution.ok) return resolution;

  const table = assembleRows(resolution.columns, {
    idColumn: CHANNEL_ID_COLUMN,
    dateColumn: CHANNEL_DATE_COLUMN,
    formatDate: formatDateId,
  });
  return { ok: true, table };
}

/** Merge, derive and join the documents of one run. */
export function buildChannelMetricsReport(
  documents: readonly LoadedDocument[],
  ledger: InputLedger = new InputLedger("channel-metrics")
): ReportBuild {
  const reconciler = new TableReconciler({ kind: "merge-fill", keys: KEY_COLUMNS });
  const metadata = new MetadataIndex();

  for (const { source, document } of documents) {
    const extraction = extractChannelMetrics(document);
    let contributed = false;

    if (extraction.ok) {
      const rejection = reconciler.add(extraction.table, source);
      if (rejection === null) contributed = true;
      else ledger.warn(`${source}: merge skipped (${rejection})`);
    } else {
      ledger.warn(`${source}: no metrics data extracted (${extraction.reason})`);
    }

    const added = metadata.add(extractCreatorVideoMetadata(document));
    if (added > 0) contributed = true;

    if (contributed) ledger.processed(source);
    else ledger.skip(source, extraction.ok ? "metrics could not be merged" : extraction.reason);
  }

  console.log(`[channel-metrics] Collected metadata for ${metadata.size} videos`);

  const merged = reconciler.result();
  const metricColumns = merged.columns.filter((c) => !KEY_COLUMNS.includes(c));
  const hasMetrics = merged.rows.length > 0 && metricColumns.length > 0;

  if (!hasMetrics && metadata.size === 0) {
    throw new ReportError("NO_DATA", "No metrics or video metadata found in the JSON files", {
      summary: ledger.summary(),
    });
  }

  if (!hasMetrics) {
    return {
      table: metadataTable(metadata, CHANNEL_ID_COLUMN, CHANNEL_METADATA_COLUMNS),
      summary: ledger.summary(),
      filenamePrefix: "channel_metrics",
    };
  }

  let table = fillNullsWithZero(merged, metricColumns);
  table = sortRows(table, KEY_COLUMNS);
  table = convertUnits(table, metricColumns);
  table = addRunningTotals(table, { groupBy: CHANNEL_ID_COLUMN, metrics: metricColumns });
  table = orderColumns(table, { leading: KEY_COLUMNS, known: CHANNEL_KNOWN_METRICS });

  if (metadata.size > 0) {
    table = joinMetadata(table, metadata, {
      idColumn: CHANNEL_ID_COLUMN,
      columns: CHANNEL_METADATA_COLUMNS,
      after: KEY_COLUMNS,
    });
  }

  console.log(
    `[channel-metrics] ${metricColumns.length} metrics across ${table.rows.length} rows`
  );

  return { table, summary: ledger.summary(), filenamePrefix: "channel_metrics" };
}
