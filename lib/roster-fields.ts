/**
 * @fileoverview Field catalog for the add / edit employee forms, plus the
 * conversions between string form state and roster patches.
 *
 * @module lib/roster-fields
 */

import type { CellValue, PartialRecord, RosterRecord, RosterTable } from '@/types/roster';
import { cellToText, cloneCell, parseDateCell } from './data-normalization';
import { getFilterOptions } from './filter-utils';

export type FieldKind = 'text' | 'date' | 'select';
export type FieldGroup = 'profile' | 'training';

export interface RosterFieldDef {
  key: string;
  label: string;
  kind: FieldKind;
  group: FieldGroup;
  required?: boolean;
  /** Fixed choices; select fields without them draw options from the column */
  options?: readonly string[];
}

export const EMPLOYEE_TYPE_OPTIONS = ['', 'Full Time', 'Part Time', 'Contract', 'Intern'] as const;
export const YES_NO_OPTIONS = ['', 'Yes', 'No'] as const;

const select = (key: string, group: FieldGroup, options?: readonly string[]): RosterFieldDef => ({
  key,
  label: key,
  kind: 'select',
  group,
  options,
});

export const ROSTER_FIELDS: readonly RosterFieldDef[] = [
  { key: 'Preferred Name', label: 'Preferred Name', kind: 'text', group: 'profile', required: true },
  { key: 'Work Email', label: 'Work Email', kind: 'text', group: 'profile', required: true },
  { key: 'Personal', label: 'Personal', kind: 'text', group: 'profile' },
  { key: 'Hire Date', label: 'Hire Date', kind: 'date', group: 'profile' },
  select('Business Title', 'profile'),
  select('Business Unit', 'profile'),
  select('Region', 'profile'),
  select('Role', 'profile'),
  select('Location', 'profile'),
  select('Manager Name', 'profile'),
  select('Manager Email', 'profile'),
  select('Cost Center #', 'profile'),
  select('Cost Center Name', 'profile'),
  select('Employee Type', 'profile', EMPLOYEE_TYPE_OPTIONS),
  select('Management VP', 'profile'),
  select('Management RVP', 'profile'),
  select('Boot Camp In-Person', 'training'),
  select('VILT', 'training'),
  select('Transfer/Promo', 'training'),
  { key: 'SE Capstone', label: 'SE Capstone Date', kind: 'date', group: 'training' },
  select('Capstone Channel', 'training'),
  select('BOOTCAMP_MOD', 'training'),
  select('VILT_MOD', 'training'),
  select('Duplicate Check', 'training'),
  select('Load OB_NEW_HIRES', 'training', YES_NO_OPTIONS),
  select('NewHire Loaded?', 'training', YES_NO_OPTIONS),
  select('Load CAPSTONE_AUDIT', 'training', YES_NO_OPTIONS),
  select('Capstone Loaded', 'training', YES_NO_OPTIONS),
];

/** Columns a fresh roster is expected to carry */
export const DEFAULT_COLUMNS: readonly string[] = ROSTER_FIELDS.map((f) => f.key);

export type FormValues = Record<string, string>;

// ============================================================================
// FORM STATE
// ============================================================================

/** `YYYY-MM-DD` for `<input type="date">`, '' when the value is not a date. */
export function toDateInputValue(value: CellValue): string {
  if (value === null || value === '') return '';
  const d = value instanceof Date ? value : parseDateCell(value);
  return d ? d.toISOString().slice(0, 10) : '';
}

export function emptyFormValues(): FormValues {
  const values: FormValues = {};
  for (const field of ROSTER_FIELDS) values[field.key] = '';
  return values;
}

/** Current record → form state for every catalog field. */
export function recordToFormValues(record: RosterRecord): FormValues {
  const values: FormValues = {};
  for (const field of ROSTER_FIELDS) {
    const value = record[field.key] ?? null;
    values[field.key] = field.kind === 'date' ? toDateInputValue(value) : cellToText(value);
  }
  return values;
}

/**
 * Form state → patch covering every catalog field. Date fields become UTC
 * dates; blank text stays '' and is stored as null by the roster store.
 *
 * With `original`, a field whose text is unchanged keeps the record's own
 * value, so numbers and booleans read from a spreadsheet stay typed.
 */
export function formValuesToPatch(values: FormValues, original?: RosterRecord): PartialRecord {
  const patch: PartialRecord = {};
  const before = original ? recordToFormValues(original) : null;
  for (const field of ROSTER_FIELDS) {
    const raw = values[field.key] ?? '';
    if (original && before && before[field.key] === raw && field.key in original) {
      patch[field.key] = cloneCell(original[field.key] ?? null);
      continue;
    }
    patch[field.key] = field.kind === 'date' ? parseDateCell(raw) : raw;
  }
  return patch;
}

export function missingRequiredFields(values: FormValues): string[] {
  return ROSTER_FIELDS.filter((f) => f.required && !(values[f.key] ?? '').trim()).map((f) => f.label);
}

// ============================================================================
// DROPDOWNS
// ============================================================================

/**
 * Options for a select field: fixed choices when defined, otherwise ''
 * followed by the column's distinct values. The current value is always
 * included.
 */
export function getDropdownOptions(table: RosterTable, field: RosterFieldDef, current = ''): string[] {
  const options = field.options ? [...field.options] : ['', ...getFilterOptions(table, field.key)];
  if (current && !options.includes(current)) options.push(current);
  return options;
}

// ============================================================================
// EMPLOYEE PICKER
// ============================================================================

export interface EmployeeOption {
  email: string;
  label: string;
}

/**
 * Rows that can be edited (non-null identity), one per identity, labelled
 * `Name (email)` and sorted by label.
 */
export function listEditableEmployees(
  table: RosterTable,
  identityColumn: string,
  nameColumn = 'Preferred Name',
): EmployeeOption[] {
  if (!table.columns.includes(identityColumn)) return [];
  const seen = new Set<string>();
  const options: EmployeeOption[] = [];
  for (const row of table.rows) {
    const identity = row[identityColumn] ?? null;
    if (identity === null) continue;
    const email = cellToText(identity);
    // A repeated identity is listed once; saving it is rejected by the store
    if (seen.has(email)) continue;
    seen.add(email);
    const name = cellToText(row[nameColumn] ?? null);
    options.push({ email, label: name ? `${name} (${email})` : email });
  }
  return options.sort((a, b) => a.label.localeCompare(b.label));
}
