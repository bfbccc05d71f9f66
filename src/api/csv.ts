/**
 * CSV helpers for panel, contact and response imports.
 *
 * The platform reads comma separated files with `"` for encapsulation.
 */

export type CsvRow = Record<string, string | number | boolean | null | undefined>;

export const CONTACT_HEADERS = ['Email', 'FirstName', 'LastName', 'ExternalRef'] as const;

export type ContactColumn = (typeof CONTACT_HEADERS)[number];

const LINE_END = '\r\n';

function escapeCell(value: CsvRow[string]): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'boolean' ? (value ? '1' : '0') : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serializes rows under a header line. Missing fields become empty cells;
 * fields not named in `headers` are rejected.
 */
export function toCsv(rows: readonly CsvRow[], headers: readonly string[]): string {
  const lines = [headers.map(escapeCell).join(',')];
  for (const row of rows) {
    const unknown = Object.keys(row).filter((key) => !headers.includes(key));
    if (unknown.length > 0) {
      throw new RangeError(`Fields not in headers: ${unknown.join(', ')}`);
    }
    lines.push(headers.map((header) => escapeCell(row[header])).join(','));
  }
  return lines.join(LINE_END) + LINE_END;
}

/** Splits a CSV document into records of cells. Blank lines are skipped. */
export function parseCsv(csv: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = '';
  let quoted = false;

  const endRecord = () => {
    record.push(cell);
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
    cell = '';
  };

  for (let i = 0; i < csv.length; i++) {
    const char = csv[i];
    if (quoted) {
      if (char === '"' && csv[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      record.push(cell);
      cell = '';
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && csv[i + 1] === '\n') i++;
      endRecord();
    } else {
      cell += char;
    }
  }
  if (cell !== '' || record.length > 0) {
    endRecord();
  }
  return records;
}

export function readHeaderRow(csv: string): string[] {
  return parseCsv(csv)[0] ?? [];
}

export type ColumnIndexes = Partial<Record<ContactColumn, number>>;

/**
 * 1-based column positions of the contact fields found in the header row.
 */
export function contactColumns(csv: string): ColumnIndexes {
  const headers = readHeaderRow(csv);
  const columns: ColumnIndexes = {};
  for (const name of CONTACT_HEADERS) {
    const index = headers.indexOf(name);
    if (index >= 0) {
      columns[name] = index + 1;
    }
  }
  return columns;
}
