/**
 * Per-video descriptive metadata and its left join onto metric tables.
 */

import { format, fromUnixTime } from "date-fns";
import { isJsonObject, type JsonValue } from "../../types/analytics-json";
import { found, resolvePath } from "../json/path-extractor";
import { createTable, type CellValue, type Row, type Table } from "./table";

export interface VideoMetadata {
  id: string;
  title: string | null;
  publishedSeconds: number | null;
  /** `YYYY-MM-DD HH:MM:SS`, local time. */
  publishedDate: string | null;
  lengthSeconds: CellValue;
}

export const PUBLISHED_DATE_FORMAT = "yyyy-MM-dd HH:mm:ss";

/** Whole epoch seconds from a number or an integer string; anything else is null. */
export function parseEpochSeconds(value: JsonValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) return parseInt(value, 10);
  return null;
}

export function formatPublishedDate(seconds: number | null): string | null {
  if (seconds === null) return null;
  const date = fromUnixTime(seconds);
  return Number.isNaN(date.getTime()) ? null : format(date, PUBLISHED_DATE_FORMAT);
}

export interface EntityFieldPaths {
  /** Path inside each entity to the object carrying the fields. Empty for the entity itself. */
  container: string;
  id: string;
  title: string;
  publishedSeconds: string;
  lengthSeconds?: string;
}

/**
 * Read metadata records from a list of entities. Entities without a string
 * id are skipped; a bad timestamp only nulls the date.
 */
export function extractVideoMetadata(
  entities: readonly JsonValue[],
  paths: EntityFieldPaths
): VideoMetadata[] {
  const records: VideoMetadata[] = [];

  for (const entity of entities) {
    const container = paths.container ? resolvePath(entity, paths.container) : found(entity);
    if (!container.found || !isJsonObject(container.value)) continue;
    const data = container.value;

    const id = data[paths.id];
    if (typeof id !== "string" || id.length === 0) continue;

    const title = data[paths.title];
    const publishedSeconds = parseEpochSeconds(data[paths.publishedSeconds]);
    const length = paths.lengthSeconds !== undefined ? data[paths.lengthSeconds] : undefined;

    records.push({
      id,
      title: typeof title === "string" ? title : null,
      publishedSeconds,
      publishedDate: formatPublishedDate(publishedSeconds),
      lengthSeconds:
        typeof length === "string" || typeof length === "number" ? length : null,
    });
  }

  return records;
}

/**
 * Metadata keyed by video id. The first record seen for an id is kept and
 * later ones are ignored.
 */
export class MetadataIndex {
  private byId = new Map<string, VideoMetadata>();

  /** Returns how many records were new. */
  add(records: readonly VideoMetadata[]): number {
    let added = 0;
    for (const record of records) {
      if (this.byId.has(record.id)) continue;
      this.byId.set(record.id, record);
      added++;
    }
    return added;
  }

  get(id: CellValue): VideoMetadata | undefined {
    return id === null ? undefined : this.byId.get(String(id));
  }

  get size(): number {
    return this.byId.size;
  }

  values(): VideoMetadata[] {
    return [...this.byId.values()];
  }
}

export interface MetadataColumn {
  name: string;
  pick: (record: VideoMetadata) => CellValue;
}

export interface JoinOptions {
  idColumn: string;
  columns: readonly MetadataColumn[];
  /** Metadata columns are inserted right after these; defaults to the id column. */
  after?: readonly string[];
}

/** Left join on the video id. Rows without metadata get null columns. */
export function joinMetadata(table: Table, metadata: MetadataIndex, options: JoinOptions): Table {
  const { idColumn, columns } = options;
  const after = options.after ?? [idColumn];
  const metadataNames = columns.map((c) => c.name);

  const leading = table.columns.filter((c) => after.includes(c));
  const trailing = table.columns.filter((c) => !after.includes(c) && !metadataNames.includes(c));
  const header = [...leading, ...metadataNames, ...trailing];

  const rows = table.rows.map((row) => {
    const record = metadata.get(row[idColumn] ?? null);
    const out: Row = { ...row };
    for (const col of columns) out[col.name] = record ? col.pick(record) : null;
    return out;
  });

  return createTable(header, rows);
}

/** Metadata as a standalone table, for runs that found no metrics. */
export function metadataTable(
  metadata: MetadataIndex,
  idColumn: string,
  columns: readonly MetadataColumn[]
): Table {
  const rows = metadata.values().map((record) => {
    const row: Row = { [idColumn]: record.id };
    for (const col of columns) row[col.name] = col.pick(record);
    return row;
  });
  return createTable([idColumn, ...columns.map((c) => c.name)], rows);
}
