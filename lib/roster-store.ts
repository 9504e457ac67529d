/**
 * @file roster-store.ts
 * @description Record store and reconciler for the class roster
 *
 * Owns one authoritative roster table per session and performs appends and
 * point updates. Every operation builds a candidate table, checks the
 * row-count and identity invariants against it, and only then commits it
 * with a single assignment; a rejected operation never touches the
 * committed table.
 *
 * The store is created by the session provider (lib/roster-context.tsx),
 * never as a module singleton.
 *
 * @dataflow
 *   Upload / Add / Edit → RosterStore → subscribers → computeDerivedViews()
 */

import type {
  CellValue,
  PartialRecord,
  RecordTarget,
  ResolvedRecord,
  RosterChange,
  RosterChangeKind,
  RosterListener,
  RosterRecord,
  RosterTable,
} from '@/types/roster';
import { cellEquals, cellToText } from './data-normalization';
import { getRosterConfig, type RosterConfig } from './roster-config';
import { IntegrityError, NotFoundError, ValidationError } from './roster-errors';
import {
  cloneRecord,
  cloneTable,
  conformRecord,
  conformTable,
  createEmptyTable,
  normalizeRecord,
  reconcileColumns,
} from './roster-schema';
import { createLogger } from './logger';

const log = createLogger('roster-store');

export type RosterStoreOptions = Pick<RosterConfig, 'identityColumn' | 'requiredColumns'>;

export interface LoadMeta {
  source?: string;
}

// ============================================================================
// HELPERS
// ============================================================================

function describeTarget(target: RecordTarget): string {
  return target.strategy === 'column'
    ? `${target.column} = "${cellToText(target.value)}"`
    : `row #${target.index + 1}`;
}

function identityText(value: CellValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  return cellToText(value);
}

function countMatches(rows: readonly RosterRecord[], column: string, value: CellValue): number {
  let n = 0;
  for (const row of rows) {
    if (cellEquals(row[column] ?? null, value)) n++;
  }
  return n;
}

// ============================================================================
// ROSTER STORE
// ============================================================================

export class RosterStore {
  private table: RosterTable = createEmptyTable();
  private version = 0;
  private originalCount = 0;
  private lastChange: RosterChange | null = null;
  private readonly listeners = new Set<RosterListener>();
  private readonly options: RosterStoreOptions;

  constructor(options: Partial<RosterStoreOptions> = {}) {
    const config = getRosterConfig();
    this.options = {
      identityColumn: options.identityColumn ?? config.identityColumn,
      requiredColumns: options.requiredColumns ?? config.requiredColumns,
    };
  }

  // =========================================================================
  // READ ACCESS
  // =========================================================================

  /**
   * Copy-on-read snapshot; mutating it never affects the store.
   */
  snapshot(): RosterTable {
    return cloneTable(this.table);
  }

  getRowCount(): number {
    return this.table.rows.length;
  }

  getColumns(): string[] {
    return [...this.table.columns];
  }

  getVersion(): number {
    return this.version;
  }

  /** Row count of the last loaded file (0 when nothing was loaded) */
  getOriginalCount(): number {
    return this.originalCount;
  }

  getLastChange(): RosterChange | null {
    return this.lastChange ? { ...this.lastChange } : null;
  }

  getIdentityColumn(): string {
    return this.options.identityColumn;
  }

  /**
   * Resolve a target without modifying anything. Returns a copy of the row.
   */
  find(target: RecordTarget): ResolvedRecord | null {
    const index = this.locate(this.table, target);
    if (index === -1) return null;
    return { index, record: cloneRecord(this.table.rows[index]) };
  }

  // =========================================================================
  // MUTATIONS
  // =========================================================================

  /**
   * Replace the table wholesale (file ingest). Rows are reconciled against
   * the table's columns so every row ends up with the full column set.
   */
  load(table: RosterTable, meta: LoadMeta = {}): RosterTable {
    const next = conformTable(table);
    this.originalCount = next.rows.length;
    this.commit(next, 'load', { source: meta.source });
    log.info(`Loaded ${next.rows.length} records`, { source: meta.source, columns: next.columns.length });
    return this.snapshot();
  }

  /** Discard the table and the loaded-file count. */
  clear(): RosterTable {
    this.originalCount = 0;
    this.commit(createEmptyTable(), 'clear');
    log.info('Roster cleared');
    return this.snapshot();
  }

  /**
   * Append one record as the last row.
   *
   * @throws {ValidationError} mandatory fields empty, or identity already present
   * @throws {IntegrityError} the candidate table did not grow by exactly one row
   */
  append(record: PartialRecord): RosterTable {
    const incoming = normalizeRecord(record);
    this.assertRequired(incoming, this.options.requiredColumns);

    const { identityColumn } = this.options;
    const identity = incoming[identityColumn] ?? null;
    if (identity !== null && countMatches(this.table.rows, identityColumn, identity) > 0) {
      log.warn('Append rejected: duplicate identity', { identity: cellToText(identity) });
      throw new ValidationError(
        `A record with ${identityColumn} "${cellToText(identity)}" already exists.`,
        [identityColumn],
      );
    }

    const before = this.table.rows.length;
    const columns = reconcileColumns(this.table.columns, Object.keys(incoming));
    const next: RosterTable = {
      columns,
      rows: [
        ...this.table.rows.map((row) => conformRecord(row, columns)),
        conformRecord(incoming, columns),
      ],
    };

    if (next.rows.length !== before + 1) {
      throw new IntegrityError(
        `Row count mismatch after add: expected ${before + 1}, got ${next.rows.length}. Nothing was saved.`,
        before + 1,
        next.rows.length,
      );
    }

    this.commit(next, 'append', { identity: identityText(identity) });
    log.info('Record appended', { identity: identityText(identity), rowCount: next.rows.length });
    return this.snapshot();
  }

  /**
   * Merge a form patch into exactly one existing row.
   *
   * Columns named by the patch take the normalized patch value; every other
   * column keeps the row's current value. Patch columns new to the table are
   * added, null for the other rows.
   *
   * @throws {NotFoundError} the target resolves to no row
   * @throws {ValidationError} a mandatory column in the patch is empty
   * @throws {IntegrityError} row count changed, or the new identity is not unique
   */
  update(target: RecordTarget, patch: PartialRecord): RosterTable {
    const index = this.locate(this.table, target);
    if (index === -1) {
      log.warn('Update rejected: target not found', { target: describeTarget(target) });
      throw new NotFoundError(
        `Record not found (${describeTarget(target)}). Refresh the list and pick the record again.`,
        target.strategy === 'column' ? identityText(target.value) : null,
      );
    }

    const changes = normalizeRecord(patch);
    const requiredInPatch = this.options.requiredColumns.filter((col) => col in changes);
    this.assertRequired(changes, requiredInPatch);

    const before = this.table.rows.length;
    const columns = reconcileColumns(this.table.columns, Object.keys(changes));
    const current = this.table.rows[index];
    const merged: RosterRecord = {};
    for (const col of columns) {
      merged[col] = col in changes ? changes[col] : current[col] ?? null;
    }

    const next: RosterTable = {
      columns,
      rows: this.table.rows.map((row, i) => (i === index ? merged : conformRecord(row, columns))),
    };

    if (next.rows.length !== before) {
      log.error('Update aborted: row count mismatch', { expected: before, actual: next.rows.length });
      throw new IntegrityError(
        `Row count mismatch: expected ${before}, got ${next.rows.length}. Update cancelled to prevent data loss.`,
        before,
        next.rows.length,
      );
    }

    // The identity column must stay unique; a column lookup must still resolve
    const { identityColumn } = this.options;
    const verifyColumns = [identityColumn];
    if (target.strategy === 'column' && target.column !== identityColumn) verifyColumns.push(target.column);
    for (const column of verifyColumns) {
      const value = merged[column] ?? null;
      const mustResolve = target.strategy === 'column' && target.column === column;
      if (value === null && !mustResolve) continue;
      const matches = value === null ? 0 : countMatches(next.rows, column, value);
      if (matches !== 1) {
        log.error('Update aborted: identity verification failed', {
          column,
          identity: identityText(value),
          matches,
        });
        throw new IntegrityError(
          matches === 0
            ? `Record with ${column} "${cellToText(value)}" would not be found after saving. Update cancelled.`
            : `${matches} records would share ${column} "${cellToText(value)}". Update cancelled.`,
          1,
          matches,
        );
      }
    }

    this.commit(next, 'update', { identity: identityText(merged[identityColumn]) });
    log.info('Record updated', { target: describeTarget(target), rowCount: next.rows.length });
    return this.snapshot();
  }

  // =========================================================================
  // SUBSCRIPTIONS
  // =========================================================================

  /**
   * Listen for committed changes. Returns an unsubscribe function.
   */
  subscribe(listener: RosterListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // =========================================================================
  // INTERNALS
  // =========================================================================

  private locate(table: RosterTable, target: RecordTarget): number {
    if (target.strategy === 'position') {
      const { index } = target;
      return Number.isInteger(index) && index >= 0 && index < table.rows.length ? index : -1;
    }
    if (target.value === null || (typeof target.value === 'string' && target.value.trim() === '')) {
      return -1;
    }
    if (!table.columns.includes(target.column)) return -1;
    return table.rows.findIndex((row) => cellEquals(row[target.column] ?? null, target.value));
  }

  private assertRequired(record: RosterRecord, required: readonly string[]): void {
    const missing = required.filter((col) => (record[col] ?? null) === null);
    if (missing.length > 0) {
      log.warn('Validation failed', { missing });
      throw new ValidationError(`Please fill in required fields: ${missing.join(' and ')}`, missing);
    }
  }

  private commit(next: RosterTable, kind: RosterChangeKind, extra: Pick<RosterChange, 'identity' | 'source'> = {}): void {
    this.table = next;
    this.version += 1;
    const change: RosterChange = {
      kind,
      version: this.version,
      rowCount: next.rows.length,
      at: new Date().toISOString(),
      ...extra,
    };
    this.lastChange = change;
    this.listeners.forEach((listener) => {
      try {
        listener({ ...change });
      } catch (err) {
        log.error('Roster listener failed', err);
      }
    });
  }
}
