export type CsvRow = Record<string, string>;

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsv(header: string[], rows: string[][]): string {
  const lines = [header, ...rows].map(row => row.map(escapeField).join(','));
  return `${lines.join('\r\n')}\r\n`;
}

function escapeField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Splits CSV text into rows of fields, honouring quoted fields. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter(fields => fields.some(value => value !== ''));
}

/** Rows keyed by the header line. */
export function parseCsvRecords(text: string): CsvRow[] {
  const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ''));
  if (!header) return [];

  return rows.map(fields => {
    const record: CsvRow = {};
    header.forEach((name, i) => {
      record[name.trim()] = fields[i] ?? '';
    });
    return record;
  });
}
