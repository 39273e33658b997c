/**
 * Spreadsheet import for call logs (.csv or .xlsx).
 * The first sheet is read; headers are matched loosely (case, spaces, underscores).
 */
import * as XLSX from 'xlsx';
import { ValidationError } from '../errors';
import { isDateKey } from '../utils/dates';

export type SheetFormat = 'csv' | 'xlsx';

// how a date such as 03/04/2026 is read
export type SlashDateOrder = 'DMY' | 'MDY';

export const TEMPLATE_HEADERS = ['employee_id', 'date', 'duration_minutes', 'call_count', 'source'];

export type ParsedCallLogRow =
  | { rowNumber: number; entry: Record<string, unknown> }
  | { rowNumber: number; error: string; employeeId?: string };

type Field = 'employeeId' | 'date' | 'durationMinutes' | 'callCount' | 'source';

const HEADER_MAP: Record<string, Field> = {
  employee_id: 'employeeId',
  employee: 'employeeId',
  emp_id: 'employeeId',
  date: 'date',
  call_date: 'date',
  duration_minutes: 'durationMinutes',
  call_duration_minutes: 'durationMinutes',
  minutes: 'durationMinutes',
  call_count: 'callCount',
  calls: 'callCount',
  source: 'source',
};

const REQUIRED: Field[] = ['employeeId', 'date', 'durationMinutes'];

function normalizeHeader(h: string): string {
  return h.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

export function normalizeSheetDate(raw: unknown, order: SlashDateOrder = 'DMY'): string {
  if (typeof raw === 'number') {
    const d = XLSX.SSF.parse_date_code(raw);
    if (d) {
      return `${String(d.y).padStart(4, '0')}-${String(d.m).padStart(2, '0')}-${String(d.d).padStart(2, '0')}`;
    }
  }

  const s = String(raw ?? '').trim();
  if (/^\d{4}-\d{2}-\d{2}$/.test(s)) return s;

  const ymd = s.match(/^(\d{4})[/.-](\d{1,2})[/.-](\d{1,2})$/);
  if (ymd) return `${ymd[1]}-${ymd[2].padStart(2, '0')}-${ymd[3].padStart(2, '0')}`;

  const short = s.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/);
  if (short) {
    const [day, month] = order === 'DMY' ? [short[1], short[2]] : [short[2], short[1]];
    return `${short[3]}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  }

  return '';
}

function toWholeNumber(raw: unknown): number | undefined {
  const s = String(raw ?? '').trim();
  if (!/^\d+$/.test(s)) return undefined;
  return Number(s);
}

function readWorkbook(data: Buffer, format: SheetFormat): XLSX.WorkBook {
  if (format === 'csv') return XLSX.read(data.toString('utf8'), { type: 'string', raw: true });
  return XLSX.read(data, { type: 'buffer', cellDates: false });
}

export function parseCallLogSheet(
  data: Buffer,
  format: SheetFormat,
  defaultSource: string,
  dateOrder: SlashDateOrder = 'DMY',
): ParsedCallLogRow[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = readWorkbook(data, format);
  } catch (err) {
    throw new ValidationError(`Could not read ${format} file`, String(err));
  }

  const sheetName = workbook.SheetNames[0];
  if (!sheetName) throw new ValidationError('The file contains no sheet');
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: '',
    raw: true,
  });
  if (rows.length === 0) return [];

  const columns = new Map<Field, string>();
  for (const header of Object.keys(rows[0])) {
    const field = HEADER_MAP[normalizeHeader(header)];
    if (field && !columns.has(field)) columns.set(field, header);
  }
  const missing = REQUIRED.filter((f) => !columns.has(f));
  if (missing.length > 0) {
    throw new ValidationError(`Missing columns: ${missing.join(', ')}`, { missing });
  }

  const cell = (row: Record<string, unknown>, field: Field): unknown => {
    const header = columns.get(field);
    return header === undefined ? '' : row[header];
  };

  return rows.map((row, idx): ParsedCallLogRow => {
    // header is row 1
    const rowNumber = idx + 2;
    const employeeId = String(cell(row, 'employeeId')).trim();
    const date = normalizeSheetDate(cell(row, 'date'), dateOrder);
    const durationMinutes = toWholeNumber(cell(row, 'durationMinutes'));
    const rawCount = String(cell(row, 'callCount')).trim();
    const callCount = rawCount === '' ? 0 : toWholeNumber(rawCount);
    const source = String(cell(row, 'source')).trim() || defaultSource;

    if (!employeeId) return { rowNumber, error: `Row ${rowNumber}: employee_id is required` };
    if (!isDateKey(date)) return { rowNumber, employeeId, error: `Row ${rowNumber}: invalid date` };
    if (durationMinutes === undefined) {
      return { rowNumber, employeeId, error: `Row ${rowNumber}: duration_minutes must be a whole number` };
    }
    if (callCount === undefined) {
      return { rowNumber, employeeId, error: `Row ${rowNumber}: call_count must be a whole number` };
    }

    return { rowNumber, entry: { employeeId, date, durationMinutes, callCount, source } };
  });
}

/** Empty upload sheet with the accepted headers, plus a notes sheet on the formats. */
export function buildCallLogTemplate(dateOrder: SlashDateOrder): Buffer {
  const shortDate = dateOrder === 'DMY' ? 'DD/MM/YYYY' : 'MM/DD/YYYY';
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, XLSX.utils.aoa_to_sheet([TEMPLATE_HEADERS]), 'Call logs');
  XLSX.utils.book_append_sheet(
    book,
    XLSX.utils.aoa_to_sheet([
      ['column', 'format'],
      ['employee_id', 'directory id, required'],
      ['date', `YYYY-MM-DD or ${shortDate}, required`],
      ['duration_minutes', 'whole minutes on calls that day, required'],
      ['call_count', 'whole number, optional'],
      ['source', 'e.g. DIALER; defaults to CSV'],
    ]),
    'Notes',
  );
  const out: unknown = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('xlsx did not produce a buffer');
  return out;
}
