/**
 * @fileoverview Core type definitions for the class roster.
 *
 * A roster is a dynamic-column table: the column list travels with the rows
 * and every row carries a value (possibly null) for each listed column.
 *
 * @module types/roster
 */

// ============================================================================
// CELLS & RECORDS
// ============================================================================

/** A single scalar cell. `null` means "no value". */
export type CellValue = string | number | boolean | Date | null;

/** One roster row (one person), keyed by column name. */
export type RosterRecord = Record<string, CellValue>;

/**
 * Incoming values from a form or import. Missing keys and `undefined`
 * are accepted and treated as absent.
 */
export type PartialRecord = Record<string, CellValue | undefined>;

/**
 * The in-memory roster. `columns` is the explicit, ordered schema;
 * every entry of `rows` has exactly these keys.
 */
export interface RosterTable {
  columns: string[];
  rows: RosterRecord[];
}

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * How an edit locates its target row.
 * column   = match `row[column]` against `value` (user-facing edits)
 * position = ordinal row index, valid only while it is in range
 */
export type RecordTarget =
  | { strategy: 'column'; column: string; value: CellValue }
  | { strategy: 'position'; index: number };

export interface ResolvedRecord {
  index: number;
  record: RosterRecord;
}

// ============================================================================
// CHANGE NOTIFICATIONS
// ============================================================================

export type RosterChangeKind = 'load' | 'append' | 'update' | 'clear';

export interface RosterChange {
  kind: RosterChangeKind;
  version: number;
  rowCount: number;
  at: string;
  /** Identity value of the row touched by append/update, when known */
  identity?: string | null;
  /** Source file name for `load` */
  source?: string;
}

export type RosterListener = (change: RosterChange) => void;

// ============================================================================
// FILTERS & DERIVED VIEWS
// ============================================================================

/** Column → allowed display values. Empty lists are unconstrained. */
export type RosterFilters = Record<string, string[]>;

export interface GroupCount {
  value: string;
  count: number;
}

export interface OverviewMetrics {
  totalEmployees: number;
  recentHires: number;
  bootCampClasses: number;
  viltClasses: number;
}

export interface CompletionCounts {
  completed: number;
  notCompleted: number;
}

export interface TrainingCompletionRow {
  name: string;
  email: string;
  region: string;
  role: string;
  businessUnit: string;
  bootCampStatus: CompletionStatus | null;
  viltStatus: CompletionStatus | null;
  courseCompletionDate: string | null;
  seCapstoneDate: string | null;
}

export type CompletionStatus = 'Completed' | 'Not Completed';

export interface ClassSummary {
  column: string;
  /** Rows with a non-null class value, before filters */
  totalStudents: number;
  /** Rows with a non-null class value, after filters (when applied) */
  displayedStudents: number;
  classes: GroupCount[];
}

export interface RosterDerivedViews {
  metrics: OverviewMetrics;
  filteredRows: RosterRecord[];
  byRegion: GroupCount[];
  byRole: GroupCount[];
  classSummaries: ClassSummary[];
  bootCampCompletion: CompletionCounts | null;
  viltCompletion: CompletionCounts | null;
  trainingCompletion: TrainingCompletionRow[];
  filterOptions: Record<string, string[]>;
}
