'use client';

/**
 * @fileoverview Roster Context Provider.
 *
 * Owns the session's RosterStore (one per mounted provider, never a module
 * global) and exposes the current snapshot, derived views, filters, the
 * latest notice and the user actions. Every action recovers roster errors
 * at this boundary and reports them as a notice; the store keeps its
 * last-known-good table.
 *
 * Data Flow:
 * 1. Upload → ingestRosterFile() → store.load()
 * 2. Add / Edit forms → store.append() / store.update()
 * 3. Store notifies → version bumps → snapshot and views recomputed
 *
 * @module lib/roster-context
 */

import React, { createContext, useCallback, useContext, useMemo, useRef, useState, useSyncExternalStore, ReactNode } from 'react';
import type { RosterChange, RosterDerivedViews, RosterFilters, RosterTable } from '@/types/roster';
import { RosterStore } from '@/lib/roster-store';
import { ingestRosterFile } from '@/lib/roster-ingest';
import { computeDerivedViews, studentsInClass, trainingCompletionTable } from '@/lib/roster-metrics';
import { pruneFilters } from '@/lib/filter-utils';
import { formValuesToPatch, missingRequiredFields, type FormValues } from '@/lib/roster-fields';
import { buildExportFileName, classExportPrefix, CSV_MIME, downloadBlob, toCsv, toXlsx, XLSX_MIME } from '@/lib/roster-export';
import { getRosterConfig } from '@/lib/roster-config';
import { ValidationError, toUserMessage } from '@/lib/roster-errors';
import { createLogger } from '@/lib/logger';

const log = createLogger('roster-context');

export interface RosterNotice {
  type: 'ok' | 'err' | 'info';
  text: string;
}

type RosterContextType = {
  snapshot: RosterTable;
  views: RosterDerivedViews;
  version: number;
  originalCount: number;
  lastChange: RosterChange | null;
  identityColumn: string;
  filters: RosterFilters;
  setFilter: (column: string, values: string[]) => void;
  resetFilters: () => void;
  applyFiltersToClasses: boolean;
  setApplyFiltersToClasses: (value: boolean) => void;
  notice: RosterNotice | null;
  dismissNotice: () => void;
  uploadFile: (file: File) => Promise<boolean>;
  addEmployee: (values: FormValues) => boolean;
  updateEmployee: (email: string, values: FormValues) => boolean;
  clearAll: () => void;
  downloadCsv: () => void;
  downloadXlsx: () => void;
  /** CSV of one class (or every class, with `null`) of a class column */
  downloadClassCsv: (column: string, cls: string | null) => void;
  downloadTrainingCsv: () => void;
};

const RosterContext = createContext<RosterContextType | undefined>(undefined);

interface RosterProviderProps {
  children: ReactNode;
  /** Injected store (tests, storybook); a fresh one is created otherwise */
  store?: RosterStore;
}

export function RosterProvider({ children, store: injected }: RosterProviderProps) {
  const storeRef = useRef<RosterStore | null>(injected ?? null);
  if (!storeRef.current) storeRef.current = new RosterStore();
  const store = storeRef.current;

  const config = getRosterConfig();
  const [filters, setFilters] = useState<RosterFilters>({});
  const [applyFiltersToClasses, setApplyFiltersToClasses] = useState(false);
  const [notice, setNotice] = useState<RosterNotice | null>(null);

  const subscribe = useCallback((onChange: () => void) => store.subscribe(() => onChange()), [store]);
  const getVersion = useCallback(() => store.getVersion(), [store]);
  const version = useSyncExternalStore(subscribe, getVersion, getVersion);

  // Recompute derived views from the current table after every change
  const snapshot = useMemo(() => store.snapshot(), [store, version]);
  const activeFilters = useMemo(() => pruneFilters(filters, snapshot.columns), [filters, snapshot]);
  const views = useMemo(
    () => computeDerivedViews(snapshot, activeFilters, {
      recentHireWindowDays: config.recentHireWindowDays,
      applyFiltersToClasses,
    }),
    [snapshot, activeFilters, applyFiltersToClasses, config.recentHireWindowDays],
  );

  const setFilter = useCallback((column: string, values: string[]) => {
    setFilters((prev) => ({ ...prev, [column]: values }));
  }, []);

  const resetFilters = useCallback(() => setFilters({}), []);
  const dismissNotice = useCallback(() => setNotice(null), []);

  const fail = useCallback((action: string, err: unknown) => {
    log.warn(`${action} failed`, { error: toUserMessage(err) });
    setNotice({ type: 'err', text: toUserMessage(err) });
  }, []);

  const uploadFile = useCallback(async (file: File): Promise<boolean> => {
    try {
      const result = ingestRosterFile(file.name, await file.arrayBuffer());
      if (!result.ok) {
        fail('Upload', result.error);
        return false;
      }
      const table = store.load(result.table, { source: result.fileName });
      setNotice({ type: 'ok', text: `Loaded ${table.rows.length} records from ${result.fileName}.` });
      return true;
    } catch (err) {
      fail('Upload', err);
      return false;
    }
  }, [store, fail]);

  const addEmployee = useCallback((values: FormValues): boolean => {
    try {
      const missing = missingRequiredFields(values);
      if (missing.length > 0) {
        throw new ValidationError(`Please fill in required fields: ${missing.join(' and ')}`, missing);
      }
      const table = store.append(formValuesToPatch(values));
      setNotice({ type: 'ok', text: `Employee '${values['Preferred Name']}' added. Total employees: ${table.rows.length}` });
      return true;
    } catch (err) {
      fail('Add employee', err);
      return false;
    }
  }, [store, fail]);

  const updateEmployee = useCallback((email: string, values: FormValues): boolean => {
    try {
      const missing = missingRequiredFields(values);
      if (missing.length > 0) {
        throw new ValidationError(`Please fill in required fields: ${missing.join(' and ')}`, missing);
      }
      const target = { strategy: 'column' as const, column: store.getIdentityColumn(), value: email };
      const current = store.find(target);
      const table = store.update(target, formValuesToPatch(values, current?.record));
      setNotice({ type: 'ok', text: `Employee '${values['Preferred Name']}' updated. Total employees: ${table.rows.length}` });
      return true;
    } catch (err) {
      fail('Update employee', err);
      return false;
    }
  }, [store, fail]);

  const clearAll = useCallback(() => {
    store.clear();
    setFilters({});
    setNotice({ type: 'info', text: 'Data cleared.' });
  }, [store]);

  const downloadCsv = useCallback(() => {
    try {
      downloadBlob(toCsv(store.snapshot()), buildExportFileName(config.exportFilePrefix, 'csv'), CSV_MIME);
    } catch (err) {
      fail('CSV export', err);
    }
  }, [store, config.exportFilePrefix, fail]);

  const downloadXlsx = useCallback(() => {
    try {
      const bytes = toXlsx(store.snapshot(), config.exportSheetName);
      downloadBlob(bytes, buildExportFileName(config.exportFilePrefix, 'xlsx'), XLSX_MIME);
    } catch (err) {
      fail('Excel export', err);
    }
  }, [store, config.exportFilePrefix, config.exportSheetName, fail]);

  const downloadClassCsv = useCallback((column: string, cls: string | null) => {
    try {
      const students = studentsInClass(snapshot, column, cls, activeFilters, applyFiltersToClasses);
      downloadBlob(toCsv(students), buildExportFileName(classExportPrefix(column, cls), 'csv'), CSV_MIME);
    } catch (err) {
      fail('Class export', err);
    }
  }, [snapshot, activeFilters, applyFiltersToClasses, fail]);

  const downloadTrainingCsv = useCallback(() => {
    try {
      const table = trainingCompletionTable(views.trainingCompletion, snapshot.columns);
      downloadBlob(toCsv(table), buildExportFileName('training_completion', 'csv'), CSV_MIME);
    } catch (err) {
      fail('Training completion export', err);
    }
  }, [views, snapshot, fail]);

  const value = useMemo<RosterContextType>(() => ({
    snapshot,
    views,
    version,
    originalCount: store.getOriginalCount(),
    lastChange: store.getLastChange(),
    identityColumn: store.getIdentityColumn(),
    filters: activeFilters,
    setFilter,
    resetFilters,
    applyFiltersToClasses,
    setApplyFiltersToClasses,
    notice,
    dismissNotice,
    uploadFile,
    addEmployee,
    updateEmployee,
    clearAll,
    downloadCsv,
    downloadXlsx,
    downloadClassCsv,
    downloadTrainingCsv,
  }), [
    snapshot, views, version, store, activeFilters, setFilter, resetFilters,
    applyFiltersToClasses, notice, dismissNotice, uploadFile, addEmployee,
    updateEmployee, clearAll, downloadCsv, downloadXlsx, downloadClassCsv,
    downloadTrainingCsv,
  ]);

  return <RosterContext.Provider value={value}>{children}</RosterContext.Provider>;
}

export function useRoster(): RosterContextType {
  const ctx = useContext(RosterContext);
  if (!ctx) throw new Error('useRoster must be used within a RosterProvider');
  return ctx;
}
