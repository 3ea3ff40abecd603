import ExcelJS from 'exceljs';
import type { CellValue, Fill, Font, Workbook, Worksheet } from 'exceljs';
import { ENTRY_STATUS, EXPORT_COLUMNS, SUMMARY_COLUMNS, SYNC_STATUS } from '../types/index.js';
import type {
  ExportColumn,
  ExportRow,
  MutationResult,
  ParsedRow,
  SummaryColumn,
  SummaryRow,
} from '../types/index.js';
import { WorkbookError, errorMessage } from '../utils/errors.js';
import { parseHours, truncate } from '../utils/formatters.js';

export const SHEETS = {
  export: 'Work Logs',
  summary: 'Worklog Summary',
  instructions: 'Instructions',
} as const;

interface InstructionRow {
  column: string;
  description: string;
  flag: 'Yes' | 'No';
}

interface SheetLayout<C extends string> {
  sheet: string;
  columns: readonly C[];
  widths: Record<C, number>;
  required: readonly C[];   // reading fails when one of these headers is absent
  readOnly: readonly C[];   // shaded gray
  hours: readonly C[];      // written as numbers, displayed with two decimals
  flagHeader: 'Required' | 'Editable';
  instructions: InstructionRow[];
}

export const EXPORT_LAYOUT: SheetLayout<ExportColumn> = {
  sheet: SHEETS.export,
  columns: EXPORT_COLUMNS,
  widths: {
    'Issue Key': 15,
    'Summary': 50,
    'Type': 15,
    'Status': 15,
    'Project': 12,
    'Time Logged (hours)': 18,
    'Date': 15,
    'Comment': 40,
    'Sync Status': 30,
  },
  required: ['Issue Key', 'Time Logged (hours)', 'Date'],
  readOnly: [],
  hours: ['Time Logged (hours)'],
  flagHeader: 'Required',
  instructions: [
    { column: 'Issue Key', description: 'Jira issue key (read-only)', flag: 'Yes' },
    { column: 'Summary', description: 'Issue summary (read-only)', flag: 'No' },
    { column: 'Type', description: 'Issue type (read-only)', flag: 'No' },
    { column: 'Status', description: 'Issue status at export time (read-only)', flag: 'No' },
    { column: 'Project', description: 'Project key (read-only)', flag: 'No' },
    { column: 'Time Logged (hours)', description: 'Time logged in hours (decimal, e.g. 2.5)', flag: 'Yes' },
    { column: 'Date', description: 'Work log date (YYYY-MM-DD)', flag: 'Yes' },
    { column: 'Comment', description: 'Work log comment (optional)', flag: 'No' },
    { column: 'Sync Status', description: 'Filled in after import', flag: 'No' },
  ],
};

export const SUMMARY_LAYOUT: SheetLayout<SummaryColumn> = {
  sheet: SHEETS.summary,
  columns: SUMMARY_COLUMNS,
  widths: {
    'Hierarchy': 12,
    'Worklog ID': 15,
    'Issue Key': 15,
    'Summary': 50,
    'Type': 15,
    'Parent Key': 20,
    'Parent Type': 15,
    'Time Logged (hours)': 18,
    'Original Time (hours)': 20,
    'Date': 15,
    'Comment': 40,
    'Original Comment': 40,
    'Author': 20,
    'Status': 15,
  },
  required: [
    'Worklog ID',
    'Issue Key',
    'Time Logged (hours)',
    'Original Time (hours)',
    'Date',
    'Comment',
    'Original Comment',
  ],
  readOnly: ['Original Time (hours)', 'Original Comment'],
  hours: ['Time Logged (hours)', 'Original Time (hours)'],
  flagHeader: 'Editable',
  instructions: [
    { column: 'Hierarchy', description: 'Position in the Epic tree, e.g. 1.2.1 (read-only)', flag: 'No' },
    { column: 'Worklog ID', description: 'Jira worklog ID (read-only)', flag: 'No' },
    { column: 'Issue Key', description: 'Jira issue key (read-only)', flag: 'No' },
    { column: 'Summary', description: 'Issue summary, indented by level (read-only)', flag: 'No' },
    { column: 'Type', description: 'Issue type (read-only)', flag: 'No' },
    { column: 'Parent Key', description: 'Parent issue key (read-only)', flag: 'No' },
    { column: 'Parent Type', description: 'Parent issue type (read-only)', flag: 'No' },
    { column: 'Time Logged (hours)', description: 'Time logged in hours - EDIT THIS (decimal, e.g. 2.5)', flag: 'Yes' },
    { column: 'Original Time (hours)', description: 'Original time logged (read-only, gray background)', flag: 'No' },
    { column: 'Date', description: 'Work log date (YYYY-MM-DD)', flag: 'Yes' },
    { column: 'Comment', description: 'Work log comment - EDIT THIS', flag: 'Yes' },
    { column: 'Original Comment', description: 'Original comment (read-only, gray background)', flag: 'No' },
    { column: 'Author', description: 'Work log author (read-only)', flag: 'No' },
    { column: 'Status', description: `${ENTRY_STATUS.original}, ${ENTRY_STATUS.sentinel} or the import result`, flag: 'No' },
  ],
};

const HEADER_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF366092' } };
const HEADER_FONT: Partial<Font> = { bold: true, color: { argb: 'FFFFFFFF' } };
const READ_ONLY_FILL: Fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFF0F0F0' } };
const SUCCESS_FONT: Partial<Font> = { color: { argb: 'FF00AA00' } };
const FAILURE_FONT: Partial<Font> = { color: { argb: 'FFFF0000' } };
const HOURS_FORMAT = '0.00';

function styleHeader(sheet: Worksheet): void {
  const header = sheet.getRow(1);
  header.eachCell((cell) => {
    cell.fill = HEADER_FILL;
    cell.font = HEADER_FONT;
  });
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
}

/**
 * Hours go in as numbers so Excel formats and sums them; anything that does
 * not parse is kept as typed.
 */
function cellValueFor<C extends string>(layout: SheetLayout<C>, column: C, text: string): CellValue {
  if (layout.hours.includes(column) && text !== '') {
    return parseHours(text) ?? text;
  }
  return text;
}

function addInstructions<C extends string>(workbook: Workbook, layout: SheetLayout<C>): void {
  const sheet = workbook.addWorksheet(SHEETS.instructions);
  sheet.columns = [
    { header: 'Column', key: 'column', width: 25 },
    { header: 'Description', key: 'description', width: 60 },
    { header: layout.flagHeader, key: 'flag', width: 15 },
  ];
  for (const row of layout.instructions) {
    sheet.addRow([row.column, row.description, row.flag]);
  }
  styleHeader(sheet);
}

function buildWorkbook<C extends string>(
  layout: SheetLayout<C>,
  rows: Array<Record<C, string>>
): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'worklog-bridge';
  workbook.created = new Date();

  const sheet = workbook.addWorksheet(layout.sheet);
  sheet.columns = layout.columns.map((column) => ({
    header: column,
    key: column,
    width: layout.widths[column],
  }));

  for (const row of rows) {
    const added = sheet.addRow(layout.columns.map((column) => cellValueFor(layout, column, row[column])));
    layout.columns.forEach((column, index) => {
      const cell = added.getCell(index + 1);
      if (layout.hours.includes(column)) {
        cell.numFmt = HOURS_FORMAT;
      }
      if (layout.readOnly.includes(column)) {
        cell.fill = READ_ONLY_FILL;
      }
    });
  }

  styleHeader(sheet);
  addInstructions(workbook, layout);
  return workbook;
}

export function buildExportWorkbook(rows: ExportRow[]): Workbook {
  return buildWorkbook(EXPORT_LAYOUT, rows);
}

export function buildSummaryWorkbook(rows: SummaryRow[]): Workbook {
  return buildWorkbook(SUMMARY_LAYOUT, rows);
}

export async function writeWorkbook(workbook: Workbook, file: string): Promise<void> {
  try {
    await workbook.xlsx.writeFile(file);
  } catch (err) {
    throw new WorkbookError(`Cannot write workbook ${file}: ${errorMessage(err)}`, file);
  }
}

export async function loadWorkbook(file: string): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(file);
  } catch (err) {
    throw new WorkbookError(`Cannot read workbook ${file}: ${errorMessage(err)}`, file);
  }
  return workbook;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Cell content as text. Dates come back from Excel as UTC midnight and are
 * written as YYYY-MM-DD; formulas contribute their cached result.
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
  }
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? '' : cellText(value.result);
  }
  if ('hyperlink' in value) return value.text;
  return '';
}

function worksheetFor<C extends string>(workbook: Workbook, layout: SheetLayout<C>): Worksheet {
  const sheet = workbook.getWorksheet(layout.sheet);
  if (!sheet) {
    throw new WorkbookError(`Sheet "${layout.sheet}" not found in workbook`);
  }
  return sheet;
}

function columnIndexes<C extends string>(sheet: Worksheet, layout: SheetLayout<C>): Map<C, number> {
  const byHeader = new Map<string, number>();
  sheet.getRow(1).eachCell((cell, colNumber) => {
    byHeader.set(cellText(cell.value).trim(), colNumber);
  });

  const indexes = new Map<C, number>();
  for (const column of layout.columns) {
    const index = byHeader.get(column);
    if (index !== undefined) indexes.set(column, index);
  }

  const missing = layout.required.filter((column) => !indexes.has(column));
  if (missing.length > 0) {
    throw new WorkbookError(`Sheet "${layout.sheet}" is missing required columns: ${missing.join(', ')}`);
  }
  return indexes;
}

/**
 * Data rows keyed by column name. Blank rows are dropped; row numbers are the
 * spreadsheet's own (the header is row 1).
 */
function readRows<C extends string>(workbook: Workbook, layout: SheetLayout<C>): ParsedRow<C>[] {
  const sheet = worksheetFor(workbook, layout);
  const indexes = columnIndexes(sheet, layout);
  const rows: ParsedRow<C>[] = [];

  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const values: Partial<Record<C, string>> = {};
    let blank = true;

    for (const [column, index] of indexes) {
      const text = cellText(row.getCell(index).value);
      values[column] = text;
      if (text.trim() !== '') blank = false;
    }

    if (!blank) rows.push({ rowNumber, values });
  }

  return rows;
}

export function readExportRows(workbook: Workbook): ParsedRow<ExportColumn>[] {
  return readRows(workbook, EXPORT_LAYOUT);
}

export function readSummaryRows(workbook: Workbook): ParsedRow<SummaryColumn>[] {
  return readRows(workbook, SUMMARY_LAYOUT);
}

export interface RowResult {
  row: number;
  result: MutationResult;
}

function failureText(result: MutationResult): string {
  return `${SYNC_STATUS.failed} ${truncate(result.message, 30)}`;
}

/**
 * Writes the outcome of each created entry into the Sync Status column.
 */
export function markExportResults(workbook: Workbook, results: RowResult[]): void {
  const sheet = worksheetFor(workbook, EXPORT_LAYOUT);
  const statusIndex = EXPORT_COLUMNS.indexOf('Sync Status') + 1;

  for (const { row, result } of results) {
    const cell = sheet.getRow(row).getCell(statusIndex);
    cell.value = result.success ? SYNC_STATUS.synced : failureText(result);
    cell.font = result.success ? SUCCESS_FONT : FAILURE_FONT;
  }
}

/**
 * Updated rows take their edited values as the new originals, so the synced
 * copy diffs empty against Jira; failed rows keep their edits.
 */
export function markSummaryResults(workbook: Workbook, results: RowResult[]): void {
  const sheet = worksheetFor(workbook, SUMMARY_LAYOUT);
  const indexes = columnIndexes(sheet, SUMMARY_LAYOUT);
  const index = (column: SummaryColumn): number | undefined => indexes.get(column);

  for (const { row, result } of results) {
    const sheetRow = sheet.getRow(row);
    const statusIndex = index('Status');

    if (result.success) {
      const pairs: Array<[SummaryColumn, SummaryColumn]> = [
        ['Time Logged (hours)', 'Original Time (hours)'],
        ['Comment', 'Original Comment'],
      ];
      for (const [edited, original] of pairs) {
        const from = index(edited);
        const to = index(original);
        if (from !== undefined && to !== undefined) {
          sheetRow.getCell(to).value = sheetRow.getCell(from).value;
        }
      }
    }

    if (statusIndex !== undefined) {
      const cell = sheetRow.getCell(statusIndex);
      cell.value = result.success ? ENTRY_STATUS.updated : failureText(result);
      cell.font = result.success ? SUCCESS_FONT : FAILURE_FONT;
    }
  }
}

/**
 * report.xlsx -> report_synced.xlsx
 */
export function syncedPath(file: string): string {
  return /\.xlsx$/i.test(file) ? file.replace(/\.xlsx$/i, '_synced.xlsx') : `${file}_synced.xlsx`;
}
