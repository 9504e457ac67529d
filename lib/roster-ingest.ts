/**
 * @file roster-ingest.ts
 * @description Turns an uploaded CSV / XLSX / XLS file into a roster table
 *
 * - Header names are trimmed; blank headers become `Unnamed: <n>` and
 *   repeated headers get `.1`, `.2` suffixes
 * - Empty cells become null; CSV cells stay text, spreadsheet cells keep
 *   their native number / boolean / text type
 * - Configured date columns are coerced to UTC dates (or null)
 *
 * Never throws: failures come back as `{ ok: false, error: ParseError }`.
 *
 * @dependencies xlsx (SheetJS)
 */

import * as XLSX from 'xlsx';
import type { CellValue, RosterRecord, RosterTable } from '@/types/roster';
import { parseCSVRows } from './csv-parser';
import { parseDateCell, toCellValue } from './data-normalization';
import { getRosterConfig, type RosterConfig } from './roster-config';
import { ParseError } from './roster-errors';
import { createLogger } from './logger';

const log = createLogger('roster-ingest');

export const SUPPORTED_EXTENSIONS = ['xlsx', 'xls', 'csv'] as const;
export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export type IngestResult =
  | { ok: true; table: RosterTable; fileName: string }
  | { ok: false; error: ParseError };

export type IngestOptions = Partial<Pick<RosterConfig, 'dateColumns' | 'maxUploadBytes'>>;

type FileData = ArrayBuffer | Uint8Array | string;

// ============================================================================
// HELPERS
// ============================================================================

export function getFileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).trim().toLowerCase();
}

function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((s) => s === ext);
}

function byteLength(data: FileData): number {
  if (typeof data === 'string') return new TextEncoder().encode(data).byteLength;
  return data.byteLength;
}

function toBytes(data: Exclude<FileData, string>): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

function toText(data: FileData): string {
  return typeof data === 'string' ? data : new TextDecoder('utf-8').decode(toBytes(data));
}

/**
 * Trim header names and make them unique and non-empty.
 */
export function normalizeHeaders(raw: readonly unknown[]): string[] {
  const used = new Map<string, number>();
  return raw.map((value, i) => {
    const text = value == null ? '' : String(value).trim();
    const base = text || `Unnamed: ${i}`;
    const seen = used.get(base) ?? 0;
    used.set(base, seen + 1);
    if (seen === 0) return base;

    let suffix = seen;
    let candidate = `${base}.${suffix}`;
    while (used.has(candidate)) {
      suffix++;
      candidate = `${base}.${suffix}`;
    }
    used.set(candidate, 1);
    return candidate;
  });
}

/**
 * Build a table from a header row and data rows (both raw values).
 */
export function buildTable(
  headerRow: readonly unknown[],
  dataRows: readonly (readonly unknown[])[],
  dateColumns: readonly string[],
): RosterTable {
  const columns = normalizeHeaders(headerRow);
  const dateSet = new Set(dateColumns);

  const rows = dataRows.map((values) => {
    const record: RosterRecord = {};
    columns.forEach((col, i) => {
      const raw = values[i];
      const cell: CellValue = dateSet.has(col) ? parseDateCell(raw) : toCellValue(raw);
      record[col] = cell;
    });
    return record;
  });

  return { columns, rows };
}

// ============================================================================
// PARSERS
// ============================================================================

function parseCsvTable(data: FileData, dateColumns: readonly string[]): RosterTable {
  const [header, ...rows] = parseCSVRows(toText(data));
  if (!header) throw new Error('File has no header row');
  return buildTable(header, rows, dateColumns);
}

function parseWorkbookTable(data: FileData, dateColumns: readonly string[]): RosterTable {
  const workbook = typeof data === 'string'
    ? XLSX.read(data, { type: 'binary' })
    : XLSX.read(toBytes(data), { type: 'array' });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) throw new Error('Workbook has no sheets');

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
  const [header, ...rows] = matrix;
  if (!header || header.length === 0) throw new Error('File has no header row');
  return buildTable(header, rows, dateColumns);
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse an uploaded roster file.
 *
 * @example
 * ```ts
 * const result = ingestRosterFile(file.name, await file.arrayBuffer());
 * if (result.ok) store.load(result.table, { source: result.fileName });
 * else setNotice({ type: 'err', text: result.error.message });
 * ```
 */
export function ingestRosterFile(fileName: string, data: FileData, options: IngestOptions = {}): IngestResult {
  const config = getRosterConfig();
  const dateColumns = options.dateColumns ?? config.dateColumns;
  const maxUploadBytes = options.maxUploadBytes ?? config.maxUploadBytes;

  const ext = getFileExtension(fileName);
  if (!isSupportedExtension(ext)) {
    const error = new ParseError(
      `Unsupported file type: ${ext || '(none)'}. Please use .xlsx, .xls, or .csv`,
      fileName,
    );
    log.warn('Rejected upload', { fileName, ext });
    return { ok: false, error };
  }

  const size = byteLength(data);
  if (size > maxUploadBytes) {
    const limitMb = Math.round(maxUploadBytes / (1024 * 1024));
    log.warn('Rejected upload: file too large', { fileName, size });
    return { ok: false, error: new ParseError(`File is too large (limit ${limitMb} MB).`, fileName) };
  }

  try {
    const table = ext === 'csv' ? parseCsvTable(data, dateColumns) : parseWorkbookTable(data, dateColumns);
    log.info(`Parsed ${table.rows.length} rows from ${fileName}`, { columns: table.columns.length });
    return { ok: true, table, fileName };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.error(`Failed to parse ${fileName}`, err);
    return { ok: false, error: new ParseError(`Error loading file: ${reason}`, fileName) };
  }
}
