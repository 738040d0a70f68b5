import * as XLSX from 'xlsx';

export const DEFAULT_ID_COLUMN = 'steam64_id';

export class MissingColumnError extends Error {
  readonly name = 'MissingColumnError';

  constructor(
    readonly column: string,
    readonly headers: string[],
  ) {
    super(
      `Column '${column}' not found in CSV headers: [${headers.join(', ')}]`,
    );
  }
}

/**
 * Reads the named column out of CSV text. The first row is the header row.
 * Cells are kept as raw text so 17-digit ids never pass through a number.
 */
export function extractIdentifierColumn(
  csvContent: string,
  column: string = DEFAULT_ID_COLUMN,
): string[] {
  const content = csvContent.replace(/^\uFEFF/, '');
  const workbook = XLSX.read(content, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new MissingColumnError(column, []);
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: '',
    blankrows: false,
  });

  const headers = (rows[0] ?? []).map((cell) => String(cell).trim());
  const index = headers.indexOf(column.trim());
  if (index === -1) {
    throw new MissingColumnError(column, headers);
  }

  return rows
    .slice(1)
    .map((row) => String(row[index] ?? '').trim())
    .filter((value) => value.length > 0);
}
