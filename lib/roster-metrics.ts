/**
 * @fileoverview Derived views over a roster snapshot.
 *
 * Everything here is a pure function of the table; the session provider
 * calls `computeDerivedViews` again after each committed change.
 *
 * @module lib/roster-metrics
 */

import type {
  ClassSummary,
  CompletionCounts,
  CompletionStatus,
  GroupCount,
  OverviewMetrics,
  RosterDerivedViews,
  RosterFilters,
  RosterRecord,
  RosterTable,
  TrainingCompletionRow,
} from '@/types/roster';
import { cellToText, formatDateCell, parseDateCell } from './data-normalization';
import { FILTER_COLUMNS, filterRecords, filterTable, getFilterOptions } from './filter-utils';

export const BOOT_CAMP_COLUMN = 'Boot Camp In-Person';
export const VILT_COLUMN = 'VILT';
export const TRANSFER_PROMO_COLUMN = 'Transfer/Promo';
export const CLASS_COLUMNS = [BOOT_CAMP_COLUMN, VILT_COLUMN, TRANSFER_PROMO_COLUMN] as const;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function nonNull(rows: readonly RosterRecord[], column: string): RosterRecord[] {
  return rows.filter((row) => (row[column] ?? null) !== null);
}

function distinctCount(rows: readonly RosterRecord[], column: string): number {
  return new Set(nonNull(rows, column).map((row) => cellToText(row[column] ?? null))).size;
}

/**
 * Headline numbers: total rows, hires within the window, distinct classes.
 */
export function computeOverviewMetrics(
  table: RosterTable,
  now: Date = new Date(),
  recentHireWindowDays = 90,
): OverviewMetrics {
  const { rows, columns } = table;
  let recentHires = 0;
  if (columns.includes('Hire Date')) {
    const cutoff = now.getTime() - recentHireWindowDays * MS_PER_DAY;
    for (const row of rows) {
      const hired = parseDateCell(row['Hire Date'] ?? null);
      if (hired && hired.getTime() >= cutoff) recentHires++;
    }
  }
  return {
    totalEmployees: rows.length,
    recentHires,
    bootCampClasses: columns.includes(BOOT_CAMP_COLUMN) ? distinctCount(rows, BOOT_CAMP_COLUMN) : 0,
    viltClasses: columns.includes(VILT_COLUMN) ? distinctCount(rows, VILT_COLUMN) : 0,
  };
}

/**
 * Row count per distinct value, most frequent first (ties by value).
 */
export function countBy(rows: readonly RosterRecord[], column: string, limit?: number): GroupCount[] {
  const counts = new Map<string, number>();
  for (const row of nonNull(rows, column)) {
    const key = cellToText(row[column] ?? null);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const sorted = [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || a.value.localeCompare(b.value));
  return limit === undefined ? sorted : sorted.slice(0, limit);
}

/**
 * Students per class for a class column. Filters apply only when asked.
 */
export function summarizeClasses(
  table: RosterTable,
  column: string,
  filters: RosterFilters = {},
  applyFilters = false,
  limit = 20,
): ClassSummary | null {
  if (!table.columns.includes(column)) return null;
  const base = nonNull(table.rows, column);
  const shown = applyFilters ? filterRecords(base, filters, table.columns) : base;
  return {
    column,
    totalStudents: base.length,
    displayedStudents: shown.length,
    classes: countBy(shown, column, limit),
  };
}

/** Picker entry meaning every class of the column */
export const ALL_CLASSES = 'All Classes';

const STUDENT_COLUMNS = ['Preferred Name', 'Work Email', 'Region', 'Role', 'Business Unit'];

/** Columns shown beside the student list for each class column */
export const CLASS_DETAIL_COLUMNS: Readonly<Record<string, readonly string[]>> = {
  [BOOT_CAMP_COLUMN]: [...STUDENT_COLUMNS, BOOT_CAMP_COLUMN, 'BOOTCAMP_MOD'],
  [VILT_COLUMN]: [...STUDENT_COLUMNS, VILT_COLUMN, 'VILT_MOD'],
  [TRANSFER_PROMO_COLUMN]: [...STUDENT_COLUMNS, TRANSFER_PROMO_COLUMN, 'Hire Date', 'Business Title'],
};

/** Picker choices: `All Classes`, then every class, newest name first. */
export function listClassOptions(table: RosterTable, column: string): string[] {
  if (!table.columns.includes(column)) return [];
  const classes = new Set(nonNull(table.rows, column).map((row) => cellToText(row[column] ?? null)));
  return [ALL_CLASSES, ...[...classes].sort((a, b) => b.localeCompare(a))];
}

/**
 * Students with a value in a class column, optionally narrowed to one class
 * (`null` or `All Classes` keeps them all). Every roster column is kept so
 * the result can be exported; rows are ordered by class, newest name first.
 * Filters apply only when asked, as for the class summaries.
 */
export function studentsInClass(
  table: RosterTable,
  column: string,
  cls: string | null,
  filters: RosterFilters = {},
  applyFilters = false,
): RosterTable {
  if (!table.columns.includes(column)) return { columns: [...table.columns], rows: [] };
  const base = nonNull(table.rows, column);
  const scoped = applyFilters ? filterRecords(base, filters, table.columns) : base;
  const rows = cls === null || cls === ALL_CLASSES
    ? scoped
    : scoped.filter((row) => cellToText(row[column] ?? null) === cls);
  return {
    columns: [...table.columns],
    rows: [...rows].sort((a, b) => cellToText(b[column] ?? null).localeCompare(cellToText(a[column] ?? null))),
  };
}

/** Detail columns of a class column that the roster actually has. */
export function classDetailColumns(table: RosterTable, column: string): string[] {
  const wanted = CLASS_DETAIL_COLUMNS[column] ?? [...STUDENT_COLUMNS, column];
  return wanted.filter((col) => table.columns.includes(col));
}

export function computeCompletion(rows: readonly RosterRecord[], column: string): CompletionCounts {
  const completed = nonNull(rows, column).length;
  return { completed, notCompleted: rows.length - completed };
}

function statusOf(row: RosterRecord, column: string, present: boolean): CompletionStatus | null {
  if (!present) return null;
  return (row[column] ?? null) !== null ? 'Completed' : 'Not Completed';
}

function dateTextOf(row: RosterRecord, column: string): string | null {
  const d = parseDateCell(row[column] ?? null);
  return d ? formatDateCell(d).slice(0, 10) : null;
}

/**
 * Per-employee completion status, sorted by preferred name.
 */
export function buildTrainingCompletion(rows: readonly RosterRecord[], columns: readonly string[]): TrainingCompletionRow[] {
  const hasBootCamp = columns.includes(BOOT_CAMP_COLUMN);
  const hasVilt = columns.includes(VILT_COLUMN);
  return rows
    .map((row) => ({
      name: cellToText(row['Preferred Name'] ?? null),
      email: cellToText(row['Work Email'] ?? null),
      region: cellToText(row['Region'] ?? null),
      role: cellToText(row['Role'] ?? null),
      businessUnit: cellToText(row['Business Unit'] ?? null),
      bootCampStatus: statusOf(row, BOOT_CAMP_COLUMN, hasBootCamp),
      viltStatus: statusOf(row, VILT_COLUMN, hasVilt),
      courseCompletionDate: dateTextOf(row, 'Course Completion'),
      seCapstoneDate: dateTextOf(row, 'SE Capstone'),
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Training completion as a table for CSV export. Status and date columns
 * appear only when the roster has their source column.
 */
export function trainingCompletionTable(
  rows: readonly TrainingCompletionRow[],
  columns: readonly string[],
): RosterTable {
  const fields: [string, (row: TrainingCompletionRow) => string | null][] = [
    ['Preferred Name', (r) => r.name],
    ['Work Email', (r) => r.email],
    ['Region', (r) => r.region],
    ['Role', (r) => r.role],
    ['Business Unit', (r) => r.businessUnit],
  ];
  if (columns.includes(BOOT_CAMP_COLUMN)) fields.push(['Boot Camp Status', (r) => r.bootCampStatus]);
  if (columns.includes(VILT_COLUMN)) fields.push(['VILT Status', (r) => r.viltStatus]);
  if (columns.includes('Course Completion')) fields.push(['Course Completion Date', (r) => r.courseCompletionDate]);
  if (columns.includes('SE Capstone')) fields.push(['SE Capstone Date', (r) => r.seCapstoneDate]);

  return {
    columns: fields.map(([header]) => header),
    rows: rows.map((row) => {
      const record: RosterRecord = {};
      for (const [header, read] of fields) record[header] = read(row);
      return record;
    }),
  };
}

export interface DerivedViewOptions {
  now?: Date;
  recentHireWindowDays?: number;
  /** Apply the sidebar filters to the class summaries */
  applyFiltersToClasses?: boolean;
}

/**
 * Recompute every view from the current table. Called after each
 * successful mutation and whenever filters change.
 */
export function computeDerivedViews(
  table: RosterTable,
  filters: RosterFilters,
  options: DerivedViewOptions = {},
): RosterDerivedViews {
  const filteredRows = filterTable(table, filters);
  const has = (col: string) => table.columns.includes(col);

  const filterOptions: Record<string, string[]> = {};
  for (const col of FILTER_COLUMNS) {
    filterOptions[col] = getFilterOptions(table, col);
  }

  const classSummaries: ClassSummary[] = [];
  for (const col of CLASS_COLUMNS) {
    const summary = summarizeClasses(table, col, filters, options.applyFiltersToClasses ?? false);
    if (summary) classSummaries.push(summary);
  }

  return {
    metrics: computeOverviewMetrics(table, options.now, options.recentHireWindowDays),
    filteredRows,
    byRegion: has('Region') ? countBy(filteredRows, 'Region') : [],
    byRole: has('Role') ? countBy(filteredRows, 'Role', 10) : [],
    classSummaries,
    bootCampCompletion: has(BOOT_CAMP_COLUMN) ? computeCompletion(filteredRows, BOOT_CAMP_COLUMN) : null,
    viltCompletion: has(VILT_COLUMN) ? computeCompletion(filteredRows, VILT_COLUMN) : null,
    trainingCompletion: buildTrainingCompletion(filteredRows, table.columns),
    filterOptions,
  };
}
