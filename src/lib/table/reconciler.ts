/**
 * MultiSourceReconciler: combines the per-source tables of one run.
 *
 * Two policies:
 *   concatenate  tag each table with its source and append
 *   merge-fill   outer join on key columns; the accumulated table keeps its
 *                values and only null cells are filled from the new source
 *
 * Fully identical rows are dropped once, when the result is taken.
 */

import {
  appendTables,
  createTable,
  dropDuplicateRows,
  missingColumns,
  rowKey,
  unionColumns,
  withColumn,
  type Row,
  type Table,
} from "./table";

export type MergeOutcome =
  | { ok: true; table: Table }
  | { ok: false; reason: string };

export type JoinKind = "inner" | "left" | "outer";

/**
 * Join `left` and `right` on `keys`. Shared non-key columns keep the left
 * value and take the right one only where the left is null.
 */
export function joinOnKeys(
  left: Table,
  right: Table,
  keys: readonly string[],
  how: JoinKind
): MergeOutcome {
  const missingLeft = missingColumns(left, keys);
  const missingRight = missingColumns(right, keys);
  if (missingLeft.length > 0 || missingRight.length > 0) {
    const missing = unionColumns(missingLeft, missingRight);
    return { ok: false, reason: `merge keys missing: ${missing.join(", ")}` };
  }

  const columns = unionColumns(left.columns, right.columns);
  const rightOnly = right.columns.filter((c) => !left.columns.includes(c));
  const shared = right.columns.filter((c) => left.columns.includes(c) && !keys.includes(c));

  const rightByKey = new Map<string, Row[]>();
  for (const row of right.rows) {
    const key = rowKey(row, keys);
    const bucket = rightByKey.get(key);
    if (bucket) bucket.push(row);
    else rightByKey.set(key, [row]);
  }

  const matchedKeys = new Set<string>();
  const rows: Row[] = [];

  for (const leftRow of left.rows) {
    const key = rowKey(leftRow, keys);
    const matches = rightByKey.get(key);
    if (!matches) {
      if (how !== "inner") rows.push({ ...leftRow });
      continue;
    }
    matchedKeys.add(key);
    for (const rightRow of matches) {
      const merged: Row = { ...leftRow };
      for (const col of rightOnly) merged[col] = rightRow[col] ?? null;
      for (const col of shared) {
        if (merged[col] === null || merged[col] === undefined) merged[col] = rightRow[col] ?? null;
      }
      rows.push(merged);
    }
  }

  if (how === "outer") {
    for (const rightRow of right.rows) {
      if (!matchedKeys.has(rowKey(rightRow, keys))) rows.push({ ...rightRow });
    }
  }

  return { ok: true, table: createTable(columns, rows) };
}

/** Outer join where the accumulated (left) table's values are never overwritten. */
export function mergeWithFill(left: Table, right: Table, keys: readonly string[]): MergeOutcome {
  return joinOnKeys(left, right, keys, "outer");
}

export type ReconcilePolicy =
  | { kind: "concatenate"; tagColumn: string }
  | { kind: "merge-fill"; keys: readonly string[] };

/**
 * Accumulates source tables under one policy. A source whose merge cannot be
 * formed is rejected and the accumulated table is left untouched.
 */
export class TableReconciler {
  private readonly policy: ReconcilePolicy;
  private batches: Table[] = [];
  private merged: Table | null = null;
  private sourceCount = 0;

  constructor(policy: ReconcilePolicy) {
    this.policy = policy;
  }

  /** Returns null on success, or the reason the source was not merged. */
  add(table: Table, source: string): string | null {
    if (this.policy.kind === "concatenate") {
      const tagColumn = this.policy.tagColumn;
      this.batches.push(withColumn(table, tagColumn, () => source));
      this.sourceCount++;
      return null;
    }

    if (this.merged === null) {
      const missing = missingColumns(table, this.policy.keys);
      if (missing.length > 0) return `merge keys missing: ${missing.join(", ")}`;
      this.merged = table;
      this.sourceCount++;
      return null;
    }

    const outcome = mergeWithFill(this.merged, table, this.policy.keys);
    if (!outcome.ok) return outcome.reason;
    this.merged = outcome.table;
    this.sourceCount++;
    return null;
  }

  get count(): number {
    return this.sourceCount;
  }

  result(): Table {
    if (this.policy.kind === "concatenate") {
      return dropDuplicateRows(appendTables(this.batches));
    }
    return this.merged ? dropDuplicateRows(this.merged) : createTable([...this.policy.keys]);
  }
}
