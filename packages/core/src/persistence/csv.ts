/**
 * Minimal RFC 4180 CSV codec: comma separator, CRLF row endings,
 * double-quote escaping for fields holding commas, quotes or line breaks.
 */

const NEEDS_QUOTING_RE = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING_RE.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function stringifyCsv(rows: readonly (readonly string[])[]): string {
  return rows.map(row => row.map(escapeCsvField).join(',') + '\r\n').join('');
}

/**
 * Split CSV text into rows of raw cells. Quoted cells may span lines.
 * A trailing line break does not produce an empty final row.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowStarted = false;
  let fieldStart = true;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case '"':
        // Only a leading quote opens a quoted field; elsewhere it is literal (27" monitor)
        if (fieldStart) inQuotes = true;
        else field += ch;
        rowStarted = true;
        fieldStart = false;
        break;
      case ',':
        row.push(field);
        field = '';
        rowStarted = true;
        fieldStart = true;
        break;
      case '\r':
        if (input[i + 1] === '\n') i++;
        // falls through
      case '\n':
        row.push(field);
        rows.push(row);
        row = [];
        field = '';
        rowStarted = false;
        fieldStart = true;
        break;
      default:
        field += ch;
        rowStarted = true;
        fieldStart = false;
    }
  }

  if (rowStarted) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

/**
 * Parse CSV with a header row into objects keyed by column name.
 * Blank lines are dropped; cells beyond the header are ignored and
 * missing trailing cells are left out of the object.
 */
export function parseCsvRecords(text: string): Record<string, string>[] {
  const [header, ...body] = parseCsv(text);
  if (!header) return [];

  return body
    .filter(cells => !(cells.length === 1 && cells[0] === ''))
    .map(cells => {
      // fromEntries defines own properties, so a '__proto__' column stays data
      const entries: [string, string][] = [];
      header.forEach((column, idx) => {
        const cell = cells[idx];
        if (cell !== undefined) entries.push([column, cell]);
      });
      return Object.fromEntries(entries);
    });
}
