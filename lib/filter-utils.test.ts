import { describe, it, expect } from 'vitest';
import type { RosterRecord, RosterTable } from '@/types/roster';
import {
  filterRecords,
  filterTable,
  getFilterOptions,
  hasActiveFilters,
  pruneFilters,
  searchRecords,
} from './filter-utils';

const columns = ['Preferred Name', 'Work Email', 'Region', 'Role'];
const rows: RosterRecord[] = [
  { 'Preferred Name': 'Ann Lee', 'Work Email': 'ann@x.com', Region: 'East', Role: 'SE' },
  { 'Preferred Name': 'Bob', 'Work Email': 'bob@x.com', Region: 'West', Role: 'Annotator' },
  { 'Preferred Name': 'Cy', 'Work Email': 'cy@x.com', Region: null, Role: 'SE' },
];

const names = (list: RosterRecord[]) => list.map((r) => r['Preferred Name']);

describe('filter-utils', () => {
  describe('filterRecords', () => {
    it('keeps rows whose value is allowed', () => {
      expect(names(filterRecords(rows, { Region: ['East', 'West'] }, columns))).toEqual(['Ann Lee', 'Bob']);
    });

    it('requires every predicate to hold', () => {
      expect(names(filterRecords(rows, { Region: ['East'], Role: ['SE'] }, columns))).toEqual(['Ann Lee']);
    });

    it('ignores empty selections and unknown columns', () => {
      expect(filterRecords(rows, { Region: [] }, columns)).toHaveLength(3);
      expect(filterRecords(rows, { 'Employee Type': ['Intern'] }, columns)).toHaveLength(3);
    });

    it('compares dates by their display day', () => {
      const table: RosterTable = {
        columns: ['Hire Date'],
        rows: [{ 'Hire Date': new Date(Date.UTC(2024, 0, 5)) }, { 'Hire Date': new Date(Date.UTC(2024, 0, 6)) }],
      };
      expect(filterTable(table, { 'Hire Date': ['2024-01-05'] })).toEqual([table.rows[0]]);
    });
  });

  describe('getFilterOptions', () => {
    it('lists sorted distinct non-blank values', () => {
      const table: RosterTable = {
        columns: ['Region'],
        rows: [{ Region: 'West' }, { Region: 'East' }, { Region: null }, { Region: '  ' }, { Region: 'West' }],
      };
      expect(getFilterOptions(table, 'Region')).toEqual(['East', 'West']);
      expect(getFilterOptions(table, 'Role')).toEqual([]);
    });
  });

  it('prunes selections for missing columns and empty lists', () => {
    expect(pruneFilters({ Region: ['East'], Gone: ['x'], Role: [] }, ['Region', 'Role'])).toEqual({ Region: ['East'] });
  });

  it('detects active filters', () => {
    expect(hasActiveFilters({ Region: [] })).toBe(false);
    expect(hasActiveFilters({ Region: [], Role: ['SE'] })).toBe(true);
  });

  describe('searchRecords', () => {
    it('matches case-insensitively across search columns', () => {
      expect(names(searchRecords(rows, 'ANN'))).toEqual(['Ann Lee', 'Bob']);
      expect(names(searchRecords(rows, 'bob@'))).toEqual(['Bob']);
    });

    it('returns every row for a blank term', () => {
      expect(searchRecords(rows, '   ')).toHaveLength(3);
    });

    it('limits the scan to the given columns', () => {
      expect(names(searchRecords(rows, 'ann', ['Work Email']))).toEqual(['Ann Lee']);
    });
  });
});
