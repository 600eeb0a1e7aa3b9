/**
 * ColumnResolver: locates dimension and metric columns in an export
 * document via fixed path templates.
 *
 * Metric names are discovered from the document when every slot exposes
 * one; if any slot lacks a name, all slots fall back to the template names
 * so a table never mixes discovered and fallback names.
 */

import { isJsonArray, isJsonObject, type JsonValue } from "../../types/analytics-json";
import type { CellValue } from "../table/table";
import { joinPath, resolveArray, resolveString } from "./path-extractor";

// ── Templates ───────────────────────────────────────────────

export interface MetricSlot {
  fallbackName: string;
  /** Alternative paths to the value array; the first non-empty array wins. */
  valuePaths: readonly string[];
  /** Sibling path holding the metric's own name. */
  namePath?: string;
}

/**
 * Metric slots enumerated from an array of metric descriptors, one slot per
 * element. Used when the document decides how many metrics it carries.
 */
export interface EnumeratedMetricSlots {
  arrayPath: string;
  /** Child objects probed, in order, for a `values` array. */
  valueKinds: readonly string[];
  /** Name path relative to each element. */
  namePath: string;
  fallbackNames: readonly string[];
}

export interface ColumnTemplate {
  family: string;
  /** Prefix applied to every path below. */
  basePath: string;
  idPath: string;
  datePath?: string;
  metrics: readonly MetricSlot[] | EnumeratedMetricSlots;
}

// ── Resolved columns ────────────────────────────────────────

export interface MetricColumn {
  name: string;
  values: CellValue[];
  /** False when the value path was absent and the column is all null. */
  resolved: boolean;
}

export interface ResolvedColumns {
  ids: CellValue[];
  dates?: CellValue[];
  metrics: MetricColumn[];
  /** Names read from the document, or null when fallback names were used. */
  discoveredNames: string[] | null;
}

export type ColumnResolution =
  | { ok: true; columns: ResolvedColumns }
  | { ok: false; reason: string };

export function toCellValue(value: JsonValue): CellValue {
  if (value === null || typeof value === "string" || typeof value === "number") return value;
  if (typeof value === "boolean") return String(value);
  return null;
}

function toCells(values: JsonValue[]): CellValue[] {
  return values.map(toCellValue);
}

function padTo(values: CellValue[], length: number): CellValue[] {
  if (values.length >= length) return values;
  return [...values, ...new Array<CellValue>(length - values.length).fill(null)];
}

function isEnumerated(
  metrics: ColumnTemplate["metrics"]
): metrics is EnumeratedMetricSlots {
  return !Array.isArray(metrics);
}

/** Expand an enumerated template into concrete slots for this document. */
export function expandMetricSlots(
  document: JsonValue,
  template: ColumnTemplate
): MetricSlot[] {
  const { metrics, basePath } = template;
  if (!isEnumerated(metrics)) {
    return metrics.map((slot) => ({
      fallbackName: slot.fallbackName,
      valuePaths: slot.valuePaths.map((p) => joinPath(basePath, p)),
      namePath: slot.namePath !== undefined ? joinPath(basePath, slot.namePath) : undefined,
    }));
  }

  const arrayPath = joinPath(basePath, metrics.arrayPath);
  const descriptors = resolveArray(document, arrayPath);
  if (!descriptors.found) return [];

  return descriptors.value.map((descriptor, i) => {
    const elementPath = `${arrayPath}[${i}]`;
    const kinds = [...metrics.valueKinds];
    // Any other child object carrying a `values` array is accepted too.
    if (isJsonObject(descriptor)) {
      for (const [key, child] of Object.entries(descriptor)) {
        if (!kinds.includes(key) && isJsonObject(child) && isJsonArray(child.values)) {
          kinds.push(key);
        }
      }
    }
    return {
      fallbackName: metrics.fallbackNames[i] ?? `METRIC_${i + 1}`,
      valuePaths: kinds.map((kind) => `${elementPath}.${kind}.values`),
      namePath: `${elementPath}.${metrics.namePath}`,
    };
  });
}

/**
 * Discover metric names. All-or-nothing: returns null unless every slot
 * has a name path that resolves to a non-empty string.
 */
export function discoverMetricNames(
  document: JsonValue,
  slots: readonly MetricSlot[]
): string[] | null {
  const names: string[] = [];
  for (const slot of slots) {
    if (slot.namePath === undefined) return null;
    const name = resolveString(document, slot.namePath);
    if (!name.found) return null;
    names.push(name.value);
  }
  return names.length > 0 ? names : null;
}

function resolveMetricValues(
  document: JsonValue,
  slot: MetricSlot
): CellValue[] | null {
  for (const path of slot.valuePaths) {
    const values = resolveArray(document, path);
    if (values.found && values.value.length > 0) return toCells(values.value);
  }
  return null;
}

export function resolveColumns(
  document: JsonValue,
  template: ColumnTemplate
): ColumnResolution {
  const idPath = joinPath(template.basePath, template.idPath);
  const ids = resolveArray(document, idPath);
  if (!ids.found || ids.value.length === 0) {
    return { ok: false, reason: `Could not extract videos from path ${idPath}` };
  }
  const idCells = toCells(ids.value);

  let dateCells: CellValue[] | undefined;
  if (template.datePath !== undefined) {
    const datePath = joinPath(template.basePath, template.datePath);
    const dates = resolveArray(document, datePath);
    if (!dates.found) {
      return { ok: false, reason: `Could not extract dates from path ${datePath}` };
    }
    dateCells = padTo(toCells(dates.value), idCells.length);
  }

  const slots = expandMetricSlots(document, template);
  const discoveredNames = discoverMetricNames(document, slots);

  const metrics: MetricColumn[] = slots.map((slot, i) => {
    const name = discoveredNames ? discoveredNames[i] : slot.fallbackName;
    const values = resolveMetricValues(document, slot);
    return values
      ? { name, values: padTo(values, idCells.length), resolved: true }
      : { name, values: new Array<CellValue>(idCells.length).fill(null), resolved: false };
  });

  if (!metrics.some((m) => m.resolved)) {
    return { ok: false, reason: "No metric values found in JSON" };
  }

  return {
    ok: true,
    columns: { ids: idCells, dates: dateCells, metrics, discoveredNames },
  };
}

