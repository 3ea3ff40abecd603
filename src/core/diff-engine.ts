import { ENTRY_STATUS, SYNC_STATUS } from '../types/index.js';
import type {
  ChangeRecord,
  DiffReport,
  EntryParseReport,
  ExportColumn,
  NewEntry,
  ParsedRow,
  RowProblem,
  SummaryColumn,
} from '../types/index.js';
import { hoursToSeconds, parseDate, parseHours } from '../utils/formatters.js';
import { hoursViolation, isValidIssueKey, normalizeIssueKey } from '../utils/validators.js';

/**
 * One edited summary row reduced to the values the diff looks at.
 */
export interface DiffInput {
  rowNumber: number;
  entryId: string;
  issueKey: string;
  originalHours: string;
  newHours: string;
  originalNote: string;
  newNote: string;
  date: string;
  status: string;
}

export function summaryRowToDiffInput(row: ParsedRow<SummaryColumn>): DiffInput {
  const value = (column: SummaryColumn): string => (row.values[column] ?? '').trim();
  return {
    rowNumber: row.rowNumber,
    entryId: value('Worklog ID'),
    issueKey: value('Issue Key'),
    originalHours: value('Original Time (hours)'),
    newHours: value('Time Logged (hours)'),
    originalNote: row.values['Original Comment'] ?? '',
    newNote: row.values['Comment'] ?? '',
    date: value('Date'),
    status: value('Status'),
  };
}

export function normalizeNote(note: string | undefined): string {
  return (note ?? '').trim();
}

type Comparable = Pick<ChangeRecord, 'originalHours' | 'newHours' | 'originalNote' | 'newNote'>;

/**
 * Durations are compared at whole-second resolution so 2.5 and 2.50 agree.
 */
export function hasChanges(record: Comparable): boolean {
  return (
    hoursToSeconds(record.newHours) !== hoursToSeconds(record.originalHours) ||
    normalizeNote(record.newNote) !== normalizeNote(record.originalNote)
  );
}

export function formatProblem(problem: RowProblem): string {
  return `Row ${problem.row}: ${problem.message}`;
}

function invalidHours(text: string): string {
  return `Invalid time value "${text}"`;
}

function invalidDate(text: string): string {
  return `Invalid date "${text}" (expected YYYY-MM-DD)`;
}

type RowOutcome =
  | { kind: 'skipped'; problem: RowProblem }
  | { kind: 'error'; problem: RowProblem }
  | { kind: 'unchanged' }
  | { kind: 'change'; change: ChangeRecord };

function diffRow(input: DiffInput): RowOutcome {
  const row = input.rowNumber;

  if (!input.entryId && input.status === ENTRY_STATUS.sentinel) {
    return {
      kind: 'skipped',
      problem: { row, issueKey: input.issueKey || undefined, message: 'no worklog to update' },
    };
  }

  const missing: string[] = [];
  if (!input.entryId) missing.push('Worklog ID');
  if (!input.issueKey) missing.push('Issue Key');
  if (!input.newHours) missing.push('Time Logged (hours)');
  if (!input.originalHours) missing.push('Original Time (hours)');
  if (missing.length > 0) {
    return {
      kind: 'skipped',
      problem: { row, issueKey: input.issueKey || undefined, message: `missing ${missing.join(', ')}` },
    };
  }

  const issueKey = normalizeIssueKey(input.issueKey);
  const fail = (message: string): RowOutcome => ({
    kind: 'error',
    problem: { row, issueKey, message },
  });

  if (!isValidIssueKey(issueKey)) {
    return fail(`Invalid issue key "${input.issueKey}"`);
  }

  const originalHours = parseHours(input.originalHours);
  if (originalHours === undefined) return fail(invalidHours(input.originalHours));

  const newHours = parseHours(input.newHours);
  if (newHours === undefined) return fail(invalidHours(input.newHours));

  const violation = hoursViolation(newHours);
  if (violation) return fail(violation);

  const date = parseDate(input.date);
  if (date === undefined) return fail(invalidDate(input.date));

  const change: ChangeRecord = {
    entryId: input.entryId,
    issueKey,
    originalHours,
    newHours,
    originalNote: normalizeNote(input.originalNote),
    newNote: normalizeNote(input.newNote),
    date,
    row,
  };

  return hasChanges(change) ? { kind: 'change', change } : { kind: 'unchanged' };
}

/**
 * Minimal changeset for an edited summary sheet. Every row lands in exactly
 * one of changes, unchanged, skipped or errors.
 */
export function diffRows(rows: DiffInput[]): DiffReport {
  const report: DiffReport = { changes: [], unchanged: 0, skipped: [], errors: [] };

  for (const input of rows) {
    const outcome = diffRow(input);
    switch (outcome.kind) {
      case 'change':
        report.changes.push(outcome.change);
        break;
      case 'unchanged':
        report.unchanged++;
        break;
      case 'skipped':
        report.skipped.push(outcome.problem);
        break;
      case 'error':
        report.errors.push(outcome.problem);
        break;
    }
  }

  return report;
}

/**
 * New worklogs from the "Work Logs" template sheet.
 */
export function parseEntryRows(rows: ParsedRow<ExportColumn>[]): EntryParseReport {
  const report: EntryParseReport = { entries: [], skipped: [], errors: [] };

  for (const { rowNumber: row, values } of rows) {
    const rawKey = (values['Issue Key'] ?? '').trim();
    const rawHours = (values['Time Logged (hours)'] ?? '').trim();
    const rawDate = (values['Date'] ?? '').trim();
    const issueKey = rawKey ? normalizeIssueKey(rawKey) : undefined;

    if ((values['Sync Status'] ?? '').trim() === SYNC_STATUS.synced) {
      report.skipped.push({ row, issueKey, message: 'already synced' });
      continue;
    }

    const missing: string[] = [];
    if (!rawKey) missing.push('Issue Key');
    if (!rawHours) missing.push('Time Logged (hours)');
    if (!rawDate) missing.push('Date');
    if (missing.length > 0) {
      report.skipped.push({ row, issueKey, message: `missing ${missing.join(', ')}` });
      continue;
    }

    if (!issueKey || !isValidIssueKey(issueKey)) {
      report.errors.push({ row, issueKey, message: `Invalid issue key "${rawKey}"` });
      continue;
    }

    const hours = parseHours(rawHours);
    if (hours === undefined) {
      report.errors.push({ row, issueKey, message: invalidHours(rawHours) });
      continue;
    }

    const violation = hoursViolation(hours);
    if (violation) {
      report.errors.push({ row, issueKey, message: violation });
      continue;
    }

    const date = parseDate(rawDate);
    if (date === undefined) {
      report.errors.push({ row, issueKey, message: invalidDate(rawDate) });
      continue;
    }

    const note = normalizeNote(values['Comment']);
    const entry: NewEntry = { issueKey, hours, date, row };
    if (note) entry.note = note;
    report.entries.push(entry);
  }

  return report;
}
