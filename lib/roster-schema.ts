/**
 * @fileoverview Column schema reconciliation for roster tables.
 *
 * The column list is stored beside the rows and reconciled explicitly:
 * a column seen anywhere exists everywhere, backfilled with null.
 *
 * @module lib/roster-schema
 */

import type { CellValue, PartialRecord, RosterRecord, RosterTable } from '@/types/roster';
import { cloneCell, normalizeCell } from './data-normalization';

export function createEmptyTable(columns: string[] = []): RosterTable {
  return { columns: [...columns], rows: [] };
}

/**
 * Union of column lists, keeping first-seen order.
 * Existing columns keep their position; new ones are appended.
 */
export function reconcileColumns(existing: readonly string[], ...incoming: (readonly string[])[]): string[] {
  const seen = new Set(existing);
  const columns = [...existing];
  for (const list of incoming) {
    for (const col of list) {
      if (!seen.has(col)) {
        seen.add(col);
        columns.push(col);
      }
    }
  }
  return columns;
}

/** Keys of a partial record whose value is not `undefined`. */
export function suppliedColumns(record: PartialRecord): string[] {
  return Object.keys(record).filter((key) => record[key] !== undefined);
}

/** Normalize every supplied value of a partial record. */
export function normalizeRecord(record: PartialRecord): RosterRecord {
  const out: RosterRecord = {};
  for (const key of suppliedColumns(record)) {
    out[key] = normalizeCell(record[key]);
  }
  return out;
}

/**
 * Copy a record onto an exact column set: missing columns become null,
 * columns outside the set are dropped.
 */
export function conformRecord(record: Readonly<Record<string, CellValue | undefined>>, columns: readonly string[]): RosterRecord {
  const out: RosterRecord = {};
  for (const col of columns) {
    const value = record[col];
    out[col] = value === undefined ? null : cloneCell(value);
  }
  return out;
}

export function cloneRecord(record: RosterRecord): RosterRecord {
  const out: RosterRecord = {};
  for (const key of Object.keys(record)) {
    out[key] = cloneCell(record[key]);
  }
  return out;
}

/** Deep copy; dates are cloned so callers cannot reach store state. */
export function cloneTable(table: RosterTable): RosterTable {
  return {
    columns: [...table.columns],
    rows: table.rows.map(cloneRecord),
  };
}

/**
 * Reconcile a table whose rows may disagree on columns.
 * The result's columns are the table's columns followed by any extra
 * columns found on rows; every row is conformed to them.
 */
export function conformTable(table: RosterTable): RosterTable {
  const columns = reconcileColumns(table.columns, ...table.rows.map((row) => Object.keys(row)));
  return {
    columns,
    rows: table.rows.map((row) => conformRecord(row, columns)),
  };
}

/** True when every row has exactly the table's columns (I1). */
export function hasUniformColumns(table: RosterTable): boolean {
  const expected = new Set(table.columns);
  return table.rows.every((row) => {
    const keys = Object.keys(row);
    return keys.length === expected.size && keys.every((k) => expected.has(k));
  });
}
