/**
 * @fileoverview Runtime configuration for the roster console.
 *
 * Values come from `NEXT_PUBLIC_` environment variables so the browser
 * bundle sees them; every setting has a default.
 *
 * @module lib/roster-config
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RosterConfig {
  /** Column used to re-locate a record across edits */
  identityColumn: string;
  /** Columns that must be non-empty on add/edit */
  requiredColumns: string[];
  /** Columns coerced to dates on ingest */
  dateColumns: string[];
  recentHireWindowDays: number;
  maxUploadBytes: number;
  exportFilePrefix: string;
  exportSheetName: string;
  logLevel: LogLevel;
}

/** Raw environment values, all optional. */
export interface RosterEnv {
  NEXT_PUBLIC_ROSTER_IDENTITY_COLUMN?: string;
  NEXT_PUBLIC_ROSTER_REQUIRED_COLUMNS?: string;
  NEXT_PUBLIC_ROSTER_DATE_COLUMNS?: string;
  NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS?: string;
  NEXT_PUBLIC_ROSTER_MAX_UPLOAD_MB?: string;
  NEXT_PUBLIC_ROSTER_EXPORT_PREFIX?: string;
  NEXT_PUBLIC_ROSTER_EXPORT_SHEET?: string;
  NEXT_PUBLIC_LOG_LEVEL?: string;
  NODE_ENV?: string;
}

export const DEFAULT_ROSTER_CONFIG: RosterConfig = {
  identityColumn: 'Work Email',
  requiredColumns: ['Preferred Name', 'Work Email'],
  dateColumns: ['Hire Date', 'Course Completion'],
  recentHireWindowDays: 90,
  maxUploadBytes: 50 * 1024 * 1024, // 50 MB
  exportFilePrefix: 'class_roster',
  exportSheetName: 'Class Roster',
  logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function asText(v: string | undefined, fallback: string): string {
  const t = typeof v === 'string' ? v.trim() : '';
  return t.length ? t : fallback;
}

function asList(v: string | undefined, fallback: string[]): string[] {
  if (!v) return [...fallback];
  const items = v.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length ? items : [...fallback];
}

function asPositiveNumber(v: string | undefined, fallback: number): number {
  const n = Number(v);
  return v != null && v.trim() !== '' && Number.isFinite(n) && n > 0 ? n : fallback;
}

function asLogLevel(v: string | undefined, nodeEnv: string | undefined): LogLevel {
  const lower = (v ?? '').trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === lower);
  if (match) return match;
  return nodeEnv === 'development' ? 'debug' : DEFAULT_ROSTER_CONFIG.logLevel;
}

/**
 * Build a config from raw environment values.
 * The identity column is always treated as required.
 */
export function parseRosterConfig(env: RosterEnv): RosterConfig {
  const identityColumn = asText(env.NEXT_PUBLIC_ROSTER_IDENTITY_COLUMN, DEFAULT_ROSTER_CONFIG.identityColumn);
  const requiredColumns = asList(env.NEXT_PUBLIC_ROSTER_REQUIRED_COLUMNS, DEFAULT_ROSTER_CONFIG.requiredColumns);
  if (!requiredColumns.includes(identityColumn)) requiredColumns.push(identityColumn);

  const maxUploadMb = asPositiveNumber(env.NEXT_PUBLIC_ROSTER_MAX_UPLOAD_MB, DEFAULT_ROSTER_CONFIG.maxUploadBytes / (1024 * 1024));

  return {
    identityColumn,
    requiredColumns,
    dateColumns: asList(env.NEXT_PUBLIC_ROSTER_DATE_COLUMNS, DEFAULT_ROSTER_CONFIG.dateColumns),
    recentHireWindowDays: asPositiveNumber(env.NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS, DEFAULT_ROSTER_CONFIG.recentHireWindowDays),
    maxUploadBytes: Math.round(maxUploadMb * 1024 * 1024),
    exportFilePrefix: asText(env.NEXT_PUBLIC_ROSTER_EXPORT_PREFIX, DEFAULT_ROSTER_CONFIG.exportFilePrefix),
    exportSheetName: asText(env.NEXT_PUBLIC_ROSTER_EXPORT_SHEET, DEFAULT_ROSTER_CONFIG.exportSheetName).slice(0, 31),
    logLevel: asLogLevel(env.NEXT_PUBLIC_LOG_LEVEL, env.NODE_ENV),
  };
}

// Next inlines NEXT_PUBLIC_ values only for literal `process.env.X` reads.
function readEnv(): RosterEnv {
  return {
    NEXT_PUBLIC_ROSTER_IDENTITY_COLUMN: process.env.NEXT_PUBLIC_ROSTER_IDENTITY_COLUMN,
    NEXT_PUBLIC_ROSTER_REQUIRED_COLUMNS: process.env.NEXT_PUBLIC_ROSTER_REQUIRED_COLUMNS,
    NEXT_PUBLIC_ROSTER_DATE_COLUMNS: process.env.NEXT_PUBLIC_ROSTER_DATE_COLUMNS,
    NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS: process.env.NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS,
    NEXT_PUBLIC_ROSTER_MAX_UPLOAD_MB: process.env.NEXT_PUBLIC_ROSTER_MAX_UPLOAD_MB,
    NEXT_PUBLIC_ROSTER_EXPORT_PREFIX: process.env.NEXT_PUBLIC_ROSTER_EXPORT_PREFIX,
    NEXT_PUBLIC_ROSTER_EXPORT_SHEET: process.env.NEXT_PUBLIC_ROSTER_EXPORT_SHEET,
    NEXT_PUBLIC_LOG_LEVEL: process.env.NEXT_PUBLIC_LOG_LEVEL,
    NODE_ENV: process.env.NODE_ENV,
  };
}

let cachedConfig: RosterConfig | null = null;

/** Config for the current process (lazy, cached). */
export function getRosterConfig(): RosterConfig {
  if (!cachedConfig) cachedConfig = parseRosterConfig(readEnv());
  return cachedConfig;
}
