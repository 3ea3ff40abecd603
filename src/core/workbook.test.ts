import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import {
  SHEETS,
  buildExportWorkbook,
  buildSummaryWorkbook,
  cellText,
  loadWorkbook,
  markExportResults,
  markSummaryResults,
  readExportRows,
  readSummaryRows,
  syncedPath,
  writeWorkbook,
} from './workbook.js';
import { diffRows, summaryRowToDiffInput } from './diff-engine.js';
import { WorkbookError } from '../utils/errors.js';
import type { ExportRow, MutationResult, SummaryRow } from '../types/index.js';

function summaryRow(overrides: Partial<SummaryRow> = {}): SummaryRow {
  return {
    'Hierarchy': '1.1',
    'Worklog ID': '100',
    'Issue Key': 'PROJ-2',
    'Summary': '└─ Login page',
    'Type': 'Story',
    'Parent Key': 'PROJ-1 (Epic)',
    'Parent Type': 'Epic',
    'Time Logged (hours)': '2.5',
    'Original Time (hours)': '2.5',
    'Date': '2024-03-05',
    'Comment': 'pairing',
    'Original Comment': 'pairing',
    'Author': 'Dana',
    'Status': 'Original',
    ...overrides,
  };
}

function exportRow(overrides: Partial<ExportRow> = {}): ExportRow {
  return {
    'Issue Key': 'PROJ-7',
    'Summary': 'Fix login',
    'Type': 'Bug',
    'Status': 'To Do',
    'Project': 'PROJ',
    'Time Logged (hours)': '',
    'Date': '',
    'Comment': '',
    'Sync Status': '',
    ...overrides,
  };
}

function worksheet(workbook: Workbook, name: string): Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) throw new Error(`missing sheet ${name}`);
  return sheet;
}

function result(success: boolean, message: string): MutationResult {
  return { issueKey: 'PROJ-2', entryId: '100', success, message, operation: 'update' };
}

describe('workbook', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'worklog-workbook-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read back the summary rows it wrote', () => {
    const rows = [summaryRow(), summaryRow({ 'Worklog ID': '', 'Time Logged (hours)': '0', 'Original Time (hours)': '0', 'Status': 'No Worklog' })];
    const workbook = buildSummaryWorkbook(rows);

    const parsed = readSummaryRows(workbook);

    expect(parsed.map((r) => r.rowNumber)).toEqual([2, 3]);
    expect(parsed[0].values).toEqual(rows[0]);
    expect(parsed[1].values['Time Logged (hours)']).toBe('0');
    expect(parsed[1].values['Status']).toBe('No Worklog');
  });

  it('should keep unrounded hours through a file', async () => {
    const file = join(tempDir, 'summary.xlsx');
    const hours = '0.3333333333333333';
    await writeWorkbook(
      buildSummaryWorkbook([summaryRow({ 'Time Logged (hours)': hours, 'Original Time (hours)': hours })]),
      file
    );

    const [row] = readSummaryRows(await loadWorkbook(file));

    expect(row.values['Time Logged (hours)']).toBe(hours);
    expect(diffRows([summaryRowToDiffInput(row)]).unchanged).toBe(1);
  });

  it('should write hours as numbers and add instructions', () => {
    const workbook = buildSummaryWorkbook([summaryRow()]);
    const sheet = worksheet(workbook, SHEETS.summary);

    expect(sheet.getRow(2).getCell(8).value).toBe(2.5);
    expect(sheet.getRow(2).getCell(8).numFmt).toBe('0.00');
    expect(worksheet(workbook, SHEETS.instructions).getRow(1).getCell(3).value).toBe('Editable');
  });

  it('should round-trip a template through a file', async () => {
    const file = join(tempDir, 'worklog.xlsx');
    await writeWorkbook(buildExportWorkbook([exportRow(), exportRow({ 'Issue Key': 'PROJ-8' })]), file);

    const workbook = await loadWorkbook(file);
    worksheet(workbook, SHEETS.export).getRow(2).getCell(6).value = 1.5;
    const rows = readExportRows(workbook);

    expect(rows.map((r) => r.values['Issue Key'])).toEqual(['PROJ-7', 'PROJ-8']);
    expect(rows[0].values['Time Logged (hours)']).toBe('1.5');
    expect(rows[1].values['Time Logged (hours)']).toBe('');
  });

  it('should skip blank rows but keep sheet row numbers', () => {
    const workbook = buildExportWorkbook([exportRow(), exportRow({ 'Issue Key': '', 'Summary': '', 'Type': '', 'Status': '', 'Project': '' }), exportRow({ 'Issue Key': 'PROJ-9' })]);

    expect(readExportRows(workbook).map((r) => [r.rowNumber, r.values['Issue Key']])).toEqual([
      [2, 'PROJ-7'],
      [4, 'PROJ-9'],
    ]);
  });

  it('should reject a workbook without the expected sheet', () => {
    const workbook = buildExportWorkbook([exportRow()]);
    expect(() => readSummaryRows(workbook)).toThrow('Sheet "Worklog Summary" not found in workbook');
  });

  it('should reject a sheet missing required columns', () => {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet(SHEETS.summary);
    sheet.addRow(['Worklog ID', 'Issue Key', 'Time Logged (hours)', 'Original Time (hours)', 'Date']);

    expect(() => readSummaryRows(workbook)).toThrow(WorkbookError);
    expect(() => readSummaryRows(workbook)).toThrow(
      'Sheet "Worklog Summary" is missing required columns: Comment, Original Comment'
    );
  });

  it('should report an unreadable file', async () => {
    await expect(loadWorkbook(join(tempDir, 'missing.xlsx'))).rejects.toBeInstanceOf(WorkbookError);
  });

  it('should mark template rows with their sync status', () => {
    const workbook = buildExportWorkbook([exportRow(), exportRow({ 'Issue Key': 'PROJ-8' })]);

    markExportResults(workbook, [
      { row: 2, result: result(true, 'Work log added (1.5h on 2024-03-05)') },
      { row: 3, result: result(false, 'Issue PROJ-8 not found') },
    ]);

    const rows = readExportRows(workbook);
    expect(rows.map((r) => r.values['Sync Status'])).toEqual(['✓ Synced', '✗ Issue PROJ-8 not found']);
  });

  it('should promote edits to originals on success only', () => {
    const workbook = buildSummaryWorkbook([summaryRow(), summaryRow({ 'Worklog ID': '101' })]);
    const sheet = worksheet(workbook, SHEETS.summary);
    sheet.getRow(2).getCell(8).value = 3;
    sheet.getRow(3).getCell(8).value = 4;

    markSummaryResults(workbook, [
      { row: 2, result: result(true, 'Work log updated (2.5h -> 3h)') },
      { row: 3, result: result(false, 'Failed to update work log: Issue is closed') },
    ]);

    const rows = readSummaryRows(workbook);
    expect(rows[0].values['Original Time (hours)']).toBe('3');
    expect(rows[0].values['Status']).toBe('Updated');
    expect(rows[1].values['Original Time (hours)']).toBe('2.5');
    expect(rows[1].values['Status']).toBe('✗ Failed to update work log: ...');

    const report = diffRows(rows.map(summaryRowToDiffInput));
    expect(report.unchanged).toBe(1);
    expect(report.changes.map((c) => c.entryId)).toEqual(['101']);
  });

  it('should read cell values as text', () => {
    expect(cellText(null)).toBe('');
    expect(cellText(2.5)).toBe('2.5');
    expect(cellText(new Date(Date.UTC(2024, 2, 5)))).toBe('2024-03-05');
    expect(cellText({ richText: [{ text: 'PROJ' }, { text: '-1' }] })).toBe('PROJ-1');
    expect(cellText({ text: 'PROJ-1', hyperlink: 'https://example.atlassian.net/browse/PROJ-1' })).toBe('PROJ-1');
    expect(cellText({ error: '#N/A' })).toBe('');
  });

  it('should name the synced copy after the input', () => {
    expect(syncedPath('march.xlsx')).toBe('march_synced.xlsx');
    expect(syncedPath('dir/March.XLSX')).toBe('dir/March_synced.xlsx');
    expect(syncedPath('report')).toBe('report_synced.xlsx');
  });
});
