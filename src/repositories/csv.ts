/**
 * Minimal RFC 4180 helpers for tier-list files.
 */

export function escapeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCsvLine(fields: ReadonlyArray<string | number | null | undefined>): string {
  return fields.map(escapeCsvField).join(',');
}

/**
 * Split CSV text into rows of fields. Handles quoted fields with embedded
 * commas, doubled quotes and line breaks; skips blank lines.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
    field = '';
  };

  // Strip a UTF-8 BOM left by spreadsheet exports
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;

  while (i < input.length) {
    const ch = input[i];

    if (quoted) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      endRow();
      if (ch === '\r' && input[i + 1] === '\n') i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== '' || row.length > 0) endRow();
  return rows;
}
