/**
 * Minimal RFC 4180 CSV codec for the record files.
 *
 * Fields containing a comma, quote, CR or LF are quoted; embedded quotes are doubled.
 * The parser accepts CRLF or LF line endings, a leading BOM, and quoted fields that
 * span lines. Blank lines are skipped.
 */

export class CsvSyntaxError extends Error {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`${message} (line ${line})`);
    this.name = 'CsvSyntaxError';
  }
}

export function parseCsv(text: string): string[][] {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];

  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldWasQuoted = false;
  let line = 1;
  let quoteOpenedAt = 0;

  const endField = () => {
    row.push(fieldWasQuoted ? field : field.trim());
    field = '';
    fieldWasQuoted = false;
  };

  const endRow = () => {
    endField();
    const blank = row.length === 1 && row[0] === '';
    if (!blank) rows.push(row);
    row = [];
  };

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === '"') {
      if (field.trim() !== '') {
        throw new CsvSyntaxError('Unexpected quote inside unquoted field', line);
      }
      field = '';
      inQuotes = true;
      fieldWasQuoted = true;
      quoteOpenedAt = line;
    } else if (char === ',') {
      endField();
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && source[i + 1] === '\n') i++;
      endRow();
      line++;
    } else if (fieldWasQuoted) {
      if (char.trim() !== '') {
        throw new CsvSyntaxError('Unexpected character after closing quote', line);
      }
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvSyntaxError('Unterminated quoted field', quoteOpenedAt);
  }
  if (field !== '' || fieldWasQuoted || row.length > 0) {
    endRow();
  }

  return rows;
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  return [header, ...rows].map((row) => row.map(escapeField).join(',')).join('\n') + '\n';
}
