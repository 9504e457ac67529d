/**
 * @fileoverview CSV parsing and serialization for roster files.
 *
 * Handles quoted fields, doubled quotes, commas and line breaks inside
 * quotes, CRLF line endings and a leading byte-order mark.
 *
 * @module lib/csv-parser
 *
 * @example
 * ```ts
 * import { parseCSVRows } from '@/lib/csv-parser';
 *
 * parseCSVRows('Name,Email\n"Doe, Jane",jane@example.com');
 * // [["Name", "Email"], ["Doe, Jane", "jane@example.com"]]
 * ```
 */

// ============================================================================
// PARSING
// ============================================================================

/**
 * Split CSV text into rows of raw field strings.
 * Lines that are entirely empty are skipped.
 *
 * @example
 * ```ts
 * parseCSVRows('"Quote ""test""",value');
 * // [['Quote "test"', 'value']]
 * ```
 */
export function parseCSVRows(csvText: string): string[][] {
  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;
  let rowHasContent = false;

  const endField = () => {
    row.push(current);
    current = '';
  };
  const endRow = () => {
    endField();
    if (rowHasContent || row.length > 1) rows.push(row);
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const nextChar = text[i + 1];

    if (inQuotes) {
      if (char === '"') {
        if (nextChar === '"') {
          // Escaped quote (doubled)
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      rowHasContent = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && nextChar === '\n') i++;
      endRow();
    } else {
      current += char;
      rowHasContent = true;
    }
  }

  // Last row without a trailing newline
  if (current !== '' || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Quote a field when it contains a comma, a quote or a line break.
 */
export function escapeCSVField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Join rows of field text into CSV, one line per row. */
export function rowsToCSV(rows: readonly (readonly string[])[]): string {
  return rows.map((fields) => fields.map(escapeCSVField).join(',')).join('\n');
}
