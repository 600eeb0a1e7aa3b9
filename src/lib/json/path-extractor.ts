/**
 * Dotted path lookups over decoded export documents.
 *
 * Syntax: `results[0].value.getCards.cards[0].sideEntities.videos`
 * Each segment is a field name, optionally followed by `[n]` to index into
 * the array stored under that field.
 *
 * Lookups never throw on document shape: a missing field, a non-object
 * parent, a non-array or an out-of-range index all resolve to `ABSENT`.
 */

import { isJsonArray, isJsonObject, type JsonValue } from "../../types/analytics-json";

export interface PathSegment {
  field: string;
  index?: number;
}

export type PathExpression = readonly PathSegment[];

export type Lookup<T> = { found: true; value: T } | { found: false };

export const ABSENT: { found: false } = { found: false };

export function found<T>(value: T): Lookup<T> {
  return { found: true, value };
}

const SEGMENT_PATTERN = /^([^.[\]]+)(?:\[(\d+)\])?$/;

const parsedPaths = new Map<string, PathExpression>();

/**
 * Parse a path string. Paths are authored in code, so a malformed one is a
 * programming error and throws.
 */
export function parsePath(path: string): PathExpression {
  const cached = parsedPaths.get(path);
  if (cached) return cached;

  const segments = path.split(".").map((part): PathSegment => {
    const match = SEGMENT_PATTERN.exec(part);
    if (!match) {
      throw new Error(`Invalid path segment "${part}" in "${path}"`);
    }
    return match[2] !== undefined
      ? { field: match[1], index: Number(match[2]) }
      : { field: match[1] };
  });

  parsedPaths.set(path, segments);
  return segments;
}

export function formatPath(path: PathExpression): string {
  return path
    .map((s) => (s.index !== undefined ? `${s.field}[${s.index}]` : s.field))
    .join(".");
}

/** Concatenate path fragments, skipping empty ones. */
export function joinPath(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join(".");
}

export function resolvePath(
  document: JsonValue,
  path: string | PathExpression
): Lookup<JsonValue> {
  const segments = typeof path === "string" ? parsePath(path) : path;
  let current: JsonValue = document;

  for (const segment of segments) {
    if (!isJsonObject(current) || !Object.prototype.hasOwnProperty.call(current, segment.field)) {
      return ABSENT;
    }
    current = current[segment.field];

    if (segment.index !== undefined) {
      if (!isJsonArray(current) || segment.index >= current.length) {
        return ABSENT;
      }
      current = current[segment.index];
    }
  }

  return found(current);
}

export function resolveArray(document: JsonValue, path: string): Lookup<JsonValue[]> {
  const result = resolvePath(document, path);
  return result.found && isJsonArray(result.value) ? found(result.value) : ABSENT;
}

/** Non-empty string at `path`. */
export function resolveString(document: JsonValue, path: string): Lookup<string> {
  const result = resolvePath(document, path);
  return result.found && typeof result.value === "string" && result.value.length > 0
    ? found(result.value)
    : ABSENT;
}
