import { describe, it, expect } from 'vitest';
import type { RosterTable } from '@/types/roster';
import {
  DEFAULT_COLUMNS,
  emptyFormValues,
  formValuesToPatch,
  getDropdownOptions,
  listEditableEmployees,
  missingRequiredFields,
  recordToFormValues,
  ROSTER_FIELDS,
  toDateInputValue,
  type RosterFieldDef,
} from './roster-fields';

function field(key: string): RosterFieldDef {
  const found = ROSTER_FIELDS.find((f) => f.key === key);
  if (!found) throw new Error(`no field ${key}`);
  return found;
}

describe('roster-fields', () => {
  it('describes the 28 form columns in order', () => {
    expect(ROSTER_FIELDS).toHaveLength(28);
    expect(DEFAULT_COLUMNS.slice(0, 4)).toEqual(['Preferred Name', 'Work Email', 'Personal', 'Hire Date']);
    expect(ROSTER_FIELDS.filter((f) => f.required).map((f) => f.key)).toEqual(['Preferred Name', 'Work Email']);
    expect(field('SE Capstone').label).toBe('SE Capstone Date');
  });

  describe('toDateInputValue', () => {
    it('formats dates and date text as YYYY-MM-DD', () => {
      expect(toDateInputValue(new Date(Date.UTC(2024, 0, 5)))).toBe('2024-01-05');
      expect(toDateInputValue('3/5/2024')).toBe('2024-03-05');
    });

    it('returns blank for missing or unparseable values', () => {
      expect(toDateInputValue(null)).toBe('');
      expect(toDateInputValue('')).toBe('');
      expect(toDateInputValue('garbage')).toBe('');
    });
  });

  it('converts a record to form values for every field', () => {
    const values = recordToFormValues({
      'Preferred Name': 'Ann',
      'Work Email': 'a@x.com',
      'Hire Date': new Date(Date.UTC(2024, 3, 1)),
      'Cost Center #': 4100,
    });
    expect(Object.keys(values)).toHaveLength(28);
    expect(values['Preferred Name']).toBe('Ann');
    expect(values['Hire Date']).toBe('2024-04-01');
    expect(values['Cost Center #']).toBe('4100');
    expect(values['Region']).toBe('');
  });

  it('converts form values to a patch with UTC dates', () => {
    const values = { ...emptyFormValues(), 'Preferred Name': 'Ann', 'Hire Date': '2024-02-10', Region: 'East' };
    const patch = formValuesToPatch(values);

    expect(Object.keys(patch)).toEqual([...DEFAULT_COLUMNS]);
    expect(patch['Hire Date']).toEqual(new Date(Date.UTC(2024, 1, 10)));
    expect(patch['SE Capstone']).toBeNull();
    expect(patch['Region']).toBe('East');
    expect(patch['Personal']).toBe('');
  });

  it('keeps typed values for fields the form left unchanged', () => {
    const original = {
      'Preferred Name': 'Ann',
      'Work Email': 'a@x.com',
      'Cost Center #': 4100,
      'Hire Date': new Date(Date.UTC(2024, 3, 1)),
      'Capstone Loaded': true,
    };
    const values = { ...recordToFormValues(original), Region: 'East' };
    const patch = formValuesToPatch(values, original);

    expect(patch['Cost Center #']).toBe(4100);
    expect(patch['Capstone Loaded']).toBe(true);
    expect(patch['Hire Date']).toEqual(new Date(Date.UTC(2024, 3, 1)));
    expect(patch['Region']).toBe('East');
    expect(patch['Personal']).toBe('');
  });

  it('takes the form text for fields the user changed', () => {
    const original = { 'Preferred Name': 'Ann', 'Work Email': 'a@x.com', 'Cost Center #': 4100 };
    const values = { ...recordToFormValues(original), 'Cost Center #': '4200' };
    expect(formValuesToPatch(values, original)['Cost Center #']).toBe('4200');
  });

  it('lists missing required fields by label', () => {
    expect(missingRequiredFields(emptyFormValues())).toEqual(['Preferred Name', 'Work Email']);
    expect(missingRequiredFields({ ...emptyFormValues(), 'Preferred Name': 'Ann', 'Work Email': ' ' })).toEqual([
      'Work Email',
    ]);
  });

  describe('getDropdownOptions', () => {
    const table: RosterTable = {
      columns: ['Region'],
      rows: [{ Region: 'West' }, { Region: 'East' }, { Region: null }],
    };

    it('offers a blank followed by the column values', () => {
      expect(getDropdownOptions(table, field('Region'))).toEqual(['', 'East', 'West']);
    });

    it('keeps the current value when it is not in the list', () => {
      expect(getDropdownOptions(table, field('Region'), 'North')).toEqual(['', 'East', 'West', 'North']);
    });

    it('uses fixed options where the field defines them', () => {
      expect(getDropdownOptions(table, field('Employee Type'))).toEqual(['', 'Full Time', 'Part Time', 'Contract', 'Intern']);
      expect(getDropdownOptions(table, field('NewHire Loaded?'), 'Maybe')).toEqual(['', 'Yes', 'No', 'Maybe']);
    });
  });

  describe('listEditableEmployees', () => {
    it('labels rows with an identity and sorts them', () => {
      const table: RosterTable = {
        columns: ['Preferred Name', 'Work Email'],
        rows: [
          { 'Preferred Name': 'Bob', 'Work Email': 'b@x.com' },
          { 'Preferred Name': 'Ann', 'Work Email': 'a@x.com' },
          { 'Preferred Name': null, 'Work Email': 'z@x.com' },
          { 'Preferred Name': 'Quinn', 'Work Email': null },
        ],
      };
      expect(listEditableEmployees(table, 'Work Email')).toEqual([
        { email: 'a@x.com', label: 'Ann (a@x.com)' },
        { email: 'b@x.com', label: 'Bob (b@x.com)' },
        { email: 'z@x.com', label: 'z@x.com' },
      ]);
    });

    it('lists a repeated identity once', () => {
      const table: RosterTable = {
        columns: ['Preferred Name', 'Work Email'],
        rows: [
          { 'Preferred Name': 'Ann', 'Work Email': 'a@x.com' },
          { 'Preferred Name': 'Ann B', 'Work Email': 'a@x.com' },
          { 'Preferred Name': 'Bob', 'Work Email': 'b@x.com' },
        ],
      };
      expect(listEditableEmployees(table, 'Work Email')).toEqual([
        { email: 'a@x.com', label: 'Ann (a@x.com)' },
        { email: 'b@x.com', label: 'Bob (b@x.com)' },
      ]);
    });

    it('returns nothing when the identity column is absent', () => {
      expect(listEditableEmployees({ columns: ['Preferred Name'], rows: [{ 'Preferred Name': 'Ann' }] }, 'Work Email')).toEqual([]);
    });
  });
});
