/**
 * @file roster-export.ts
 * @description CSV and Excel export of a roster snapshot
 *
 * Both exports are pure: they read a snapshot and return text / bytes.
 * Triggering the browser download is left to the caller (see
 * `downloadBlob`).
 *
 * @dependencies xlsx (SheetJS)
 */

import * as XLSX from 'xlsx';
import type { CellValue, RosterTable } from '@/types/roster';
import { rowsToCSV } from './csv-parser';
import { cellToText, dateToSerial } from './data-normalization';
import { ALL_CLASSES, BOOT_CAMP_COLUMN, TRANSFER_PROMO_COLUMN, VILT_COLUMN } from './roster-metrics';

export const CSV_MIME = 'text/csv';
export const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const DATE_FORMAT = 'yyyy-mm-dd';

// ============================================================================
// FILENAME GENERATION
// ============================================================================

/**
 * `<prefix>_YYYYMMDD.<ext>` using the local calendar day.
 */
export function buildExportFileName(prefix: string, ext: 'csv' | 'xlsx', now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = `${now.getMonth() + 1}`.padStart(2, '0');
  const d = `${now.getDate()}`.padStart(2, '0');
  return `${prefix}_${y}${m}${d}.${ext}`;
}

const CLASS_EXPORT_PREFIXES: Readonly<Record<string, string>> = {
  [BOOT_CAMP_COLUMN]: 'bootcamp_class',
  [VILT_COLUMN]: 'vilt_class',
  [TRANSFER_PROMO_COLUMN]: 'transfer_promo',
};

/**
 * File name prefix for one class (or `all`) of a class column, safe for
 * file systems: `bootcamp_class_BC-Jan`, `vilt_class_all`.
 */
export function classExportPrefix(column: string, cls: string | null): string {
  const base = CLASS_EXPORT_PREFIXES[column] ?? column.toLowerCase().replace(/[^a-z0-9]+/g, '_');
  const part = cls === null || cls === ALL_CLASSES ? 'all' : cls.trim().replace(/[^\w.-]+/g, '_');
  return `${base}_${part || 'all'}`;
}

/** Excel limits sheet names to 31 characters and forbids a few symbols. */
export function safeSheetName(name: string): string {
  const cleaned = name.replace(/[\\/*?:[\]]/g, '_').slice(0, 31);
  return cleaned || 'Sheet1';
}

// ============================================================================
// CSV
// ============================================================================

/**
 * Header row of column names, one line per record, null as an empty field.
 */
export function toCsv(table: RosterTable): string {
  const header = table.columns;
  const lines = table.rows.map((row) => table.columns.map((col) => cellToText(row[col] ?? null)));
  return rowsToCSV([header, ...lines]);
}

// ============================================================================
// EXCEL
// ============================================================================

function toSheetCell(value: CellValue): XLSX.CellObject | null {
  if (value === null) return null;
  if (value instanceof Date) return { t: 'n', v: dateToSerial(value), z: DATE_FORMAT };
  if (typeof value === 'number') return { t: 'n', v: value };
  if (typeof value === 'boolean') return { t: 'b', v: value };
  return { t: 's', v: value };
}

/**
 * Build the one-sheet worksheet for a table. Dates are written as
 * spreadsheet serials with a date format so Excel shows real date cells.
 */
export function buildWorksheet(table: RosterTable): XLSX.WorkSheet {
  const sheet = XLSX.utils.aoa_to_sheet([table.columns]);
  table.rows.forEach((row, r) => {
    table.columns.forEach((col, c) => {
      const cell = toSheetCell(row[col] ?? null);
      if (cell) sheet[XLSX.utils.encode_cell({ r: r + 1, c })] = cell;
    });
  });
  const lastCol = Math.max(table.columns.length - 1, 0);
  sheet['!ref'] = XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: { r: table.rows.length, c: lastCol } });
  autoSizeColumns(sheet, table);
  return sheet;
}

function autoSizeColumns(sheet: XLSX.WorkSheet, table: RosterTable): void {
  sheet['!cols'] = table.columns.map((col) => {
    let width = col.length;
    for (const row of table.rows) {
      width = Math.max(width, cellToText(row[col] ?? null).length);
    }
    return { wch: Math.min(width + 2, 60) };
  });
}

/**
 * Serialize the table to `.xlsx` bytes.
 */
export function toXlsx(table: RosterTable, sheetName: string): ArrayBuffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, buildWorksheet(table), safeSheetName(sheetName));
  const out: ArrayBuffer = XLSX.write(workbook, { type: 'array', bookType: 'xlsx' });
  return out;
}

// ============================================================================
// BROWSER DOWNLOAD
// ============================================================================

/**
 * Trigger a browser download for generated content.
 */
export function downloadBlob(content: string | ArrayBuffer, fileName: string, mime: string): void {
  const blob = new Blob([content], { type: mime });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}
