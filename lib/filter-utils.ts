/**
 * @fileoverview Roster filter logic: column-membership predicates, filter
 * option lists and free-text search. Used by the derived views and the
 * employee table.
 */

import type { CellValue, RosterFilters, RosterRecord, RosterTable } from '@/types/roster';
import { cellToText } from './data-normalization';

/** Sidebar filter columns, in display order */
export const FILTER_COLUMNS = ['Region', 'Role', 'Business Unit', 'Employee Type'] as const;

/** Columns scanned by free-text search */
export const SEARCH_COLUMNS = [
  'Preferred Name',
  'Work Email',
  'Personal',
  'Role',
  'Region',
  'Business Unit',
  'Business Title',
  'Manager Name',
] as const;

/** Key used to compare a cell with a selected filter value */
export function filterKey(value: CellValue): string {
  return cellToText(value);
}

/**
 * Keep rows where every active predicate's column value is one of its
 * allowed values. Predicates with no allowed values, and predicates on
 * columns the table does not have, are ignored.
 */
export function filterRecords(
  rows: readonly RosterRecord[],
  filters: RosterFilters,
  columns: readonly string[],
): RosterRecord[] {
  const known = new Set(columns);
  const active = Object.entries(filters)
    .filter(([col, allowed]) => known.has(col) && allowed.length > 0)
    .map(([col, allowed]) => [col, new Set(allowed)] as const);

  if (active.length === 0) return [...rows];

  return rows.filter((row) =>
    active.every(([col, allowed]) => {
      const value = row[col] ?? null;
      return value !== null && allowed.has(filterKey(value));
    }),
  );
}

/** Filter the rows of a table. */
export function filterTable(table: RosterTable, filters: RosterFilters): RosterRecord[] {
  return filterRecords(table.rows, filters, table.columns);
}

/**
 * Sorted distinct non-blank values of a column (empty when the column is absent).
 */
export function getFilterOptions(table: RosterTable, column: string): string[] {
  if (!table.columns.includes(column)) return [];
  const values = new Set<string>();
  for (const row of table.rows) {
    const value = row[column] ?? null;
    if (value === null) continue;
    const key = filterKey(value);
    if (key.trim()) values.add(key);
  }
  return [...values].sort((a, b) => a.localeCompare(b));
}

/** Drop filter selections for columns that no longer exist. */
export function pruneFilters(filters: RosterFilters, columns: readonly string[]): RosterFilters {
  const known = new Set(columns);
  const next: RosterFilters = {};
  for (const [col, allowed] of Object.entries(filters)) {
    if (known.has(col) && allowed.length > 0) next[col] = [...allowed];
  }
  return next;
}

export function hasActiveFilters(filters: RosterFilters): boolean {
  return Object.values(filters).some((allowed) => allowed.length > 0);
}

/**
 * Case-insensitive substring search over the search columns.
 * A blank term returns every row.
 */
export function searchRecords(
  rows: readonly RosterRecord[],
  term: string,
  columns: readonly string[] = SEARCH_COLUMNS,
): RosterRecord[] {
  const needle = term.trim().toLowerCase();
  if (!needle) return [...rows];
  return rows.filter((row) =>
    columns.some((col) => {
      const value = row[col] ?? null;
      return value !== null && cellToText(value).toLowerCase().includes(needle);
    }),
  );
}
