import { describe, it, expect } from 'vitest';
import { DEFAULT_ROSTER_CONFIG, parseRosterConfig } from './roster-config';

describe('parseRosterConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(parseRosterConfig({})).toEqual(DEFAULT_ROSTER_CONFIG);
  });

  it('always requires the identity column', () => {
    const config = parseRosterConfig({
      NEXT_PUBLIC_ROSTER_IDENTITY_COLUMN: 'Employee ID',
      NEXT_PUBLIC_ROSTER_REQUIRED_COLUMNS: 'Preferred Name',
    });
    expect(config.identityColumn).toBe('Employee ID');
    expect(config.requiredColumns).toEqual(['Preferred Name', 'Employee ID']);
  });

  it('parses comma lists and ignores blank entries', () => {
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_DATE_COLUMNS: ' Start , ,End ' }).dateColumns).toEqual(['Start', 'End']);
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_DATE_COLUMNS: ' , ' }).dateColumns).toEqual(['Hire Date', 'Course Completion']);
  });

  it('accepts only positive numbers', () => {
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS: '30' }).recentHireWindowDays).toBe(30);
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS: '-5' }).recentHireWindowDays).toBe(90);
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_RECENT_HIRE_DAYS: 'soon' }).recentHireWindowDays).toBe(90);
  });

  it('converts the upload limit from megabytes', () => {
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_MAX_UPLOAD_MB: '2' }).maxUploadBytes).toBe(2097152);
    expect(parseRosterConfig({ NEXT_PUBLIC_ROSTER_MAX_UPLOAD_MB: '0.5' }).maxUploadBytes).toBe(524288);
  });

  it('caps the sheet name at 31 characters', () => {
    const config = parseRosterConfig({ NEXT_PUBLIC_ROSTER_EXPORT_SHEET: 'A'.repeat(40) });
    expect(config.exportSheetName).toBe('A'.repeat(31));
  });

  it('reads the log level case-insensitively', () => {
    expect(parseRosterConfig({ NEXT_PUBLIC_LOG_LEVEL: 'WARN' }).logLevel).toBe('warn');
    expect(parseRosterConfig({ NEXT_PUBLIC_LOG_LEVEL: 'verbose', NODE_ENV: 'development' }).logLevel).toBe('debug');
    expect(parseRosterConfig({ NEXT_PUBLIC_LOG_LEVEL: 'verbose', NODE_ENV: 'production' }).logLevel).toBe('info');
  });
});
