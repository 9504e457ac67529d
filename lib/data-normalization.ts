import type { CellValue } from '@/types/roster';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
// Spreadsheet day 0 (1899-12-30), UTC
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);

function isValidDate(d: Date): boolean {
  return !Number.isNaN(d.getTime());
}

/**
 * Normalize one cell before it enters the roster.
 * Blank strings, `undefined`, NaN and invalid dates all mean "no value".
 */
export function normalizeCell(value: CellValue | undefined): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return isValidDate(value) ? new Date(value.getTime()) : null;
  return value;
}

/** Coerce an arbitrary parsed value (spreadsheet cell, JSON) into a cell. */
export function toCellValue(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return normalizeCell(value);
  }
  if (value instanceof Date) return normalizeCell(value);
  return normalizeCell(String(value));
}

export function serialToDate(serial: number): Date | null {
  if (!Number.isFinite(serial)) return null;
  // Round to the second; serials carry float noise
  const ms = Math.round((SERIAL_EPOCH_MS + serial * MS_PER_DAY) / 1000) * 1000;
  const d = new Date(ms);
  return isValidDate(d) ? d : null;
}

export function dateToSerial(date: Date): number {
  return (date.getTime() - SERIAL_EPOCH_MS) / MS_PER_DAY;
}

/**
 * Parse a date-like cell to a UTC date.
 * Accepts Date objects, spreadsheet serials, ISO `YYYY-MM-DD[...]` and US `M/D/YYYY`.
 */
export function parseDateCell(value: unknown): Date | null {
  if (value == null || value === '') return null;
  if (value instanceof Date) return isValidDate(value) ? new Date(value.getTime()) : null;
  if (typeof value === 'number') return serialToDate(value);
  if (typeof value !== 'string') return null;

  const raw = value.trim();
  if (!raw) return null;

  const iso = raw.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?)?/);
  if (iso) {
    if (/[T ]\d{1,2}:\d{2}.*(Z|[+-]\d{2}:?\d{2})$/.test(raw)) {
      const zoned = new Date(raw);
      return isValidDate(zoned) ? zoned : null;
    }
    const [, y, m, d, hh = '0', mm = '0', ss = '0'] = iso;
    return utcDate(Number(y), Number(m), Number(d), Number(hh), Number(mm), Number(ss));
  }

  const us = raw.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/);
  if (us) {
    const [, m, d, y] = us;
    const year = y.length === 2 ? 2000 + Number(y) : Number(y);
    return utcDate(year, Number(m), Number(d));
  }

  // Free-form text such as "March 5, 2024" parses as local wall time; keep the wall time in UTC
  const fallback = new Date(raw);
  if (!isValidDate(fallback)) return null;
  return utcDate(
    fallback.getFullYear(),
    fallback.getMonth() + 1,
    fallback.getDate(),
    fallback.getHours(),
    fallback.getMinutes(),
    fallback.getSeconds(),
  );
}

function utcDate(y: number, m: number, d: number, hh = 0, mm = 0, ss = 0): Date | null {
  if (m < 1 || m > 12 || d < 1 || d > 31) return null;
  const date = new Date(Date.UTC(y, m - 1, d, hh, mm, ss));
  // Reject rollovers such as 2024-02-31
  if (date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) return null;
  return date;
}

/** `YYYY-MM-DD`, or full ISO when the date carries a time of day. */
export function formatDateCell(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

/** Display text for a cell; null becomes ''. */
export function cellToText(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return formatDateCell(value);
  return String(value);
}

/** Cell equality; dates compare by instant. */
export function cellEquals(a: CellValue, b: CellValue): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }
  return a === b;
}

export function cloneCell(value: CellValue): CellValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}
