export function escapeCsvField(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

export interface CsvRow {
  /** 1-based line on which the row starts */
  line: number;
  fields: string[];
}

export class CsvSyntaxError extends Error {
  constructor(
    readonly line: number,
    message: string,
  ) {
    super(message);
    this.name = 'CsvSyntaxError';
  }
}

/**
 * Parses comma-separated text with double-quote quoting. Quoted fields may
 * contain commas, doubled quotes and line breaks. Blank lines yield no row.
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = [];
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;

  let fields: string[] = [];
  let field = '';
  let quoted = false;
  let fieldStarted = false;
  let rowStarted = false;
  let line = 1;
  let rowLine = 1;
  let i = 0;

  const endField = () => {
    fields.push(field);
    field = '';
    fieldStarted = false;
  };

  const endRow = () => {
    if (rowStarted || fieldStarted) {
      endField();
      rows.push({ line: rowLine, fields });
    }
    fields = [];
    field = '';
    fieldStarted = false;
    rowStarted = false;
  };

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
        i++;
        const next = input[i];
        if (next !== undefined && next !== ',' && next !== '\n' && next !== '\r') {
          throw new CsvSyntaxError(line, `unexpected character after closing quote`);
        }
        continue;
      }
      if (ch === '\n') {
        line++;
      }
      field += ch;
      i++;
      continue;
    }

    if (ch === '"' && !fieldStarted) {
      quoted = true;
      fieldStarted = true;
      rowStarted = true;
      i++;
      continue;
    }

    if (ch === ',') {
      endField();
      rowStarted = true;
      i++;
      continue;
    }

    if (ch === '\r' || ch === '\n') {
      endRow();
      i += ch === '\r' && input[i + 1] === '\n' ? 2 : 1;
      line++;
      rowLine = line;
      continue;
    }

    field += ch;
    fieldStarted = true;
    rowStarted = true;
    i++;
  }

  if (quoted) {
    throw new CsvSyntaxError(rowLine, 'unterminated quoted field');
  }
  endRow();

  return rows;
}
