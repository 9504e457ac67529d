import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { RosterChange, RosterTable } from '@/types/roster';
import { RosterStore } from './roster-store';
import { IntegrityError, NotFoundError, ValidationError } from './roster-errors';
import { hasUniformColumns } from './roster-schema';

function makeStore(): RosterStore {
  return new RosterStore({ identityColumn: 'email', requiredColumns: ['name', 'email'] });
}

function twoPeople(): RosterTable {
  return {
    columns: ['name', 'email', 'Region'],
    rows: [
      { name: 'Ann', email: 'a@x.com', Region: 'East' },
      { name: 'Bob', email: 'b@x.com', Region: 'West' },
    ],
  };
}

const byEmail = (value: string) => ({ strategy: 'column' as const, column: 'email', value });

describe('RosterStore', () => {
  let store: RosterStore;

  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    store = makeStore();
  });

  describe('append', () => {
    it('appends to an empty table with every other known column null', () => {
      store.load({ columns: ['name', 'email', 'Region', 'Role'], rows: [] });
      const table = store.append({ name: 'Alex', email: 'alex@x.com' });

      expect(table.rows).toHaveLength(1);
      expect(table.rows[0]).toEqual({ name: 'Alex', email: 'alex@x.com', Region: null, Role: null });
    });

    it('backfills a new column with null on existing rows', () => {
      store.load({ columns: ['name', 'email'], rows: [{ name: 'Ann', email: 'a@x.com' }] });
      const table = store.append({ name: 'Cy', email: 'c@x.com', Region: 'North' });

      expect(table.columns).toEqual(['name', 'email', 'Region']);
      expect(store.getColumns()).toEqual(['name', 'email', 'Region']);
      expect(table.rows[0]).toEqual({ name: 'Ann', email: 'a@x.com', Region: null });
      expect(table.rows[1]).toEqual({ name: 'Cy', email: 'c@x.com', Region: 'North' });
    });

    it('keeps the column union across a sequence of appends', () => {
      store.append({ name: 'A', email: 'a@x.com', Role: 'SE' });
      store.append({ name: 'B', email: 'b@x.com', Region: 'East' });
      const table = store.append({ name: 'C', email: 'c@x.com', Location: 'Remote', Role: 'AE' });

      expect(table.columns).toEqual(['name', 'email', 'Role', 'Region', 'Location']);
      expect(hasUniformColumns(table)).toBe(true);
      expect(table.rows[0]).toEqual({ name: 'A', email: 'a@x.com', Role: 'SE', Region: null, Location: null });
    });

    it('grows the row count by exactly one', () => {
      store.load(twoPeople());
      const before = store.getRowCount();
      store.append({ name: 'Cy', email: 'c@x.com' });
      expect(store.getRowCount()).toBe(before + 1);
    });

    it('stores empty and whitespace strings as null', () => {
      const table = store.append({ name: 'Alex', email: 'alex@x.com', Region: '', Role: '   ' });
      expect(table.rows[0].Region).toBeNull();
      expect(table.rows[0].Role).toBeNull();
    });

    it('rejects missing required fields and leaves the table alone', () => {
      store.load(twoPeople());
      const before = store.snapshot();

      expect(() => store.append({ name: '  ', email: '' })).toThrow(ValidationError);
      expect(() => store.append({ name: '', email: '' })).toThrow('Please fill in required fields: name and email');
      expect(store.snapshot()).toEqual(before);
      expect(store.getVersion()).toBe(1);
    });

    it('reports the missing fields on the error', () => {
      try {
        store.append({ name: 'Alex' });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationError);
        if (err instanceof ValidationError) expect(err.fields).toEqual(['email']);
      }
    });

    it('rejects a duplicate identity', () => {
      store.load(twoPeople());
      expect(() => store.append({ name: 'Bobby', email: 'b@x.com' })).toThrow(
        'A record with email "b@x.com" already exists.',
      );
      expect(store.getRowCount()).toBe(2);
    });
  });

  describe('update', () => {
    beforeEach(() => {
      store.load(twoPeople());
    });

    it('changes only the matched row', () => {
      const table = store.update(byEmail('b@x.com'), { name: 'Bob2' });

      expect(table.rows).toHaveLength(2);
      expect(table.rows[1]).toEqual({ name: 'Bob2', email: 'b@x.com', Region: 'West' });
      expect(table.rows[0]).toEqual({ name: 'Ann', email: 'a@x.com', Region: 'East' });
    });

    it('keeps unpatched columns and applies normalized patch values', () => {
      const table = store.update(byEmail('a@x.com'), { Region: '', Role: 'SE' });

      expect(table.columns).toEqual(['name', 'email', 'Region', 'Role']);
      expect(table.rows[0]).toEqual({ name: 'Ann', email: 'a@x.com', Region: null, Role: 'SE' });
      expect(table.rows[1]).toEqual({ name: 'Bob', email: 'b@x.com', Region: 'West', Role: null });
    });

    it('treats undefined patch values as absent', () => {
      const table = store.update(byEmail('a@x.com'), { name: undefined, Region: 'South' });
      expect(table.rows[0]).toEqual({ name: 'Ann', email: 'a@x.com', Region: 'South' });
    });

    it('raises NotFoundError for an unknown identity and leaves the table unchanged', () => {
      const before = store.snapshot();
      const version = store.getVersion();

      expect(() => store.update(byEmail('c@x.com'), { name: 'Cy' })).toThrow(NotFoundError);
      expect(store.snapshot()).toEqual(before);
      expect(store.getVersion()).toBe(version);
    });

    it('never falls back to a position when the identity misses', () => {
      expect(() => store.update(byEmail('zz@x.com'), { name: 'Nobody' })).toThrow(
        'Record not found (email = "zz@x.com"). Refresh the list and pick the record again.',
      );
      expect(store.snapshot().rows.map((r) => r.name)).toEqual(['Ann', 'Bob']);
    });

    it('raises NotFoundError for a blank lookup value', () => {
      expect(() => store.update(byEmail('  '), { name: 'X' })).toThrow(NotFoundError);
      expect(() => store.update({ strategy: 'column', column: 'email', value: null }, { name: 'X' })).toThrow(NotFoundError);
    });

    it('raises NotFoundError when the lookup column is not in the table', () => {
      expect(() => store.update({ strategy: 'column', column: 'Personal', value: 'a@x.com' }, { name: 'X' })).toThrow(
        NotFoundError,
      );
    });

    it('rejects clearing a required field', () => {
      expect(() => store.update(byEmail('a@x.com'), { name: '' })).toThrow('Please fill in required fields: name');
      expect(store.snapshot().rows[0].name).toBe('Ann');
    });

    it('allows changing the identity to a new unique value', () => {
      const table = store.update(byEmail('a@x.com'), { email: 'ann@x.com' });
      expect(table.rows[0].email).toBe('ann@x.com');
      expect(store.find(byEmail('a@x.com'))).toBeNull();
    });

    it('reverts an update that would duplicate another identity', () => {
      const before = store.snapshot();
      try {
        store.update(byEmail('b@x.com'), { email: 'a@x.com' });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(IntegrityError);
        if (err instanceof IntegrityError) {
          expect(err.message).toBe('2 records would share email "a@x.com". Update cancelled.');
          expect(err.expected).toBe(1);
          expect(err.actual).toBe(2);
        }
      }
      expect(store.snapshot()).toEqual(before);
    });

    it('rejects a duplicate identity when the row is found through another column', () => {
      store.load({
        columns: ['name', 'email', 'Personal'],
        rows: [
          { name: 'Ann', email: 'a@x.com', Personal: 'p1' },
          { name: 'Bob', email: 'b@x.com', Personal: 'p2' },
        ],
      });
      const before = store.snapshot();

      expect(() => store.update({ strategy: 'column', column: 'Personal', value: 'p2' }, { email: 'a@x.com' })).toThrow(
        '2 records would share email "a@x.com". Update cancelled.',
      );
      expect(store.snapshot()).toEqual(before);
      expect(store.snapshot().rows.map((r) => r.email)).toEqual(['a@x.com', 'b@x.com']);
    });

    it('updates through another column when the identity stays unique', () => {
      store.load({
        columns: ['name', 'email', 'Personal'],
        rows: [
          { name: 'Ann', email: 'a@x.com', Personal: 'p1' },
          { name: 'Bob', email: 'b@x.com', Personal: 'p2' },
        ],
      });
      const table = store.update({ strategy: 'column', column: 'Personal', value: 'p2' }, { email: 'bob@x.com' });
      expect(table.rows[1]).toEqual({ name: 'Bob', email: 'bob@x.com', Personal: 'p2' });
    });

    it('keeps the row count across a series of updates', () => {
      store.update(byEmail('a@x.com'), { Region: 'North' });
      store.update(byEmail('b@x.com'), { Region: 'South', Role: 'AE' });
      store.update(byEmail('a@x.com'), { name: 'Annie' });
      expect(store.getRowCount()).toBe(2);
    });

    it('supports positional targets within range', () => {
      const table = store.update({ strategy: 'position', index: 1 }, { Region: 'Central' });
      expect(table.rows[1].Region).toBe('Central');
    });

    it('rejects positional targets out of range', () => {
      expect(() => store.update({ strategy: 'position', index: 5 }, { name: 'X' })).toThrow(
        'Record not found (row #6). Refresh the list and pick the record again.',
      );
      expect(() => store.update({ strategy: 'position', index: -1 }, { name: 'X' })).toThrow(NotFoundError);
    });

    it('matches date identities by instant', () => {
      const store2 = new RosterStore({ identityColumn: 'id', requiredColumns: ['id'] });
      store2.load({ columns: ['id', 'note'], rows: [{ id: new Date(Date.UTC(2024, 0, 2)), note: 'first' }] });
      const table = store2.update(
        { strategy: 'column', column: 'id', value: new Date(Date.UTC(2024, 0, 2)) },
        { note: 'second' },
      );
      expect(table.rows[0].note).toBe('second');
    });
  });

  describe('load and clear', () => {
    it('conforms ragged rows on load', () => {
      const table = store.load({
        columns: ['name', 'email'],
        rows: [{ name: 'Ann', email: 'a@x.com' }, { name: 'Bob', email: 'b@x.com', Region: 'West' }],
      });
      expect(table.columns).toEqual(['name', 'email', 'Region']);
      expect(table.rows[0]).toEqual({ name: 'Ann', email: 'a@x.com', Region: null });
      expect(store.getOriginalCount()).toBe(2);
    });

    it('clears rows, columns and the original count', () => {
      store.load(twoPeople());
      const table = store.clear();
      expect(table).toEqual({ columns: [], rows: [] });
      expect(store.getOriginalCount()).toBe(0);
    });
  });

  describe('snapshots and notifications', () => {
    it('returns copies that cannot change the store', () => {
      store.load({
        columns: ['name', 'email', 'Hire Date'],
        rows: [{ name: 'Ann', email: 'a@x.com', 'Hire Date': new Date(Date.UTC(2024, 5, 1)) }],
      });
      const snap = store.snapshot();
      snap.rows[0].name = 'Mallory';
      snap.columns.push('Extra');
      const hire = snap.rows[0]['Hire Date'];
      if (hire instanceof Date) hire.setUTCFullYear(1990);

      const fresh = store.snapshot();
      expect(fresh.rows[0].name).toBe('Ann');
      expect(fresh.columns).toEqual(['name', 'email', 'Hire Date']);
      expect(fresh.rows[0]['Hire Date']).toEqual(new Date(Date.UTC(2024, 5, 1)));
    });

    it('notifies subscribers once per committed change', () => {
      const changes: RosterChange[] = [];
      const unsubscribe = store.subscribe((change) => changes.push(change));

      store.load(twoPeople(), { source: 'roster.csv' });
      store.append({ name: 'Cy', email: 'c@x.com' });
      expect(() => store.append({ name: 'Cy', email: 'c@x.com' })).toThrow(ValidationError);
      unsubscribe();
      store.clear();

      expect(changes.map((c) => [c.kind, c.version, c.rowCount])).toEqual([
        ['load', 1, 2],
        ['append', 2, 3],
      ]);
      expect(changes[0].source).toBe('roster.csv');
      expect(changes[1].identity).toBe('c@x.com');
      expect(store.getVersion()).toBe(3);
      expect(store.getLastChange()?.kind).toBe('clear');
    });

    it('keeps notifying when a listener throws', () => {
      const seen: number[] = [];
      store.subscribe(() => {
        throw new Error('listener broke');
      });
      store.subscribe((change) => seen.push(change.version));

      store.append({ name: 'Alex', email: 'alex@x.com' });
      expect(seen).toEqual([1]);
      expect(store.getRowCount()).toBe(1);
    });

    it('finds a record without modifying anything', () => {
      store.load(twoPeople());
      const found = store.find(byEmail('b@x.com'));
      expect(found).toEqual({ index: 1, record: { name: 'Bob', email: 'b@x.com', Region: 'West' } });
      expect(store.getVersion()).toBe(1);
    });
  });
});
