export type CsvValue = string | number | null | undefined;

export type CsvRow = Record<string, string>;

function formatField(value: CsvValue): string {
  if (value == null) return '';
  const text = typeof value === 'number' ? (Number.isFinite(value) ? String(value) : '') : value;
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Serializes rows under `header`; `null`/`undefined` become empty fields.
 * @returns CSV text with a trailing newline.
 */
export function toCsv<T extends Record<string, CsvValue>>(header: ReadonlyArray<keyof T & string>, rows: T[]): string {
  const lines = [header.map((name) => formatField(name)).join(',')];
  for (const row of rows) {
    lines.push(header.map((name) => formatField(row[name])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

function splitRecords(content: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    if (quoted) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

/**
 * Parses CSV text into a header and one record per non-blank line.
 * Missing trailing fields read as empty strings.
 */
export function parseCsv(content: string): { header: string[]; rows: CsvRow[] } {
  // Strip potential UTF-8 BOM
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const records = splitRecords(text).filter((record) => !(record.length === 1 && record[0]?.trim() === ''));
  const [headerRecord, ...body] = records;
  if (!headerRecord) return { header: [], rows: [] };

  const header = headerRecord.map((name) => name.trim());
  const rows = body.map((record) => {
    const row: CsvRow = {};
    header.forEach((name, index) => {
      row[name] = record[index] ?? '';
    });
    return row;
  });
  return { header, rows };
}
