import type {
  ChangeRecord,
  DiffReport,
  EntryParseReport,
  ExportColumn,
  ExportRow,
  Issue,
  MutationResult,
  NewEntry,
  ParsedRow,
  QueryOptions,
  SummaryColumn,
  SummaryRow,
  TimeEntry,
  TimeRange,
  UserIdentity,
} from '../types/index.js';
import { JiraApiError, errorMessage } from '../utils/errors.js';
import { formatHours, hoursToSeconds, entryDate, inWindow, monthWindow } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import { diffRows, parseEntryRows, summaryRowToDiffInput } from './diff-engine.js';
import { resolveQueryJql } from './filters.js';
import { countGroupIssues, groupByHierarchy, isOrphanGroupKey, sortedGroups } from './hierarchy.js';
import { userId } from './jira-mappers.js';
import type { RemoteSource } from './remote-source.js';
import { Session } from './session.js';
import { DEFAULT_FLATTEN_OPTIONS, flattenFlat, flattenGroups } from './tree-flattener.js';
import type { FlattenOptions } from './tree-flattener.js';

export interface CollectOptions {
  allUsers?: boolean;
  timeRange?: TimeRange;
  now?: Date;
}

export interface SummaryBuildOptions extends CollectOptions {
  groupByHierarchy?: boolean;
  issuesOnly?: boolean;
  includeOrphans?: boolean;
  indentUnit?: string;
  connector?: string;
}

export interface SummaryTotals {
  entries: number;
  issuesWithTime: number;
  issuesWithoutTime: number;
  totalSeconds: number;
}

export interface SummaryExport {
  jql: string;
  issues: Issue[];
  entries: TimeEntry[];
  rows: SummaryRow[];
  totals: SummaryTotals;
  epicGroups: number;
  // issues left out because they belong to no Epic and orphans were not requested
  omittedOrphans: number;
}

export interface ApplyOptions {
  dryRun?: boolean;
  onProgress?: (done: number, total: number) => void;
}

export interface ImportRunOptions<R> extends ApplyOptions {
  // asked once the workbook is parsed; false leaves Jira untouched
  beforeApply?: (report: R) => Promise<boolean>;
}

export interface ImportOutcome<R> {
  report: R;
  results: MutationResult[];
  cancelled: boolean;
}

function hoursLabel(hours: number): string {
  return `${formatHours(hoursToSeconds(hours))}h`;
}

export function summarizeTotals(issues: Issue[], entries: TimeEntry[]): SummaryTotals {
  const timed = new Set<string>();
  let totalSeconds = 0;

  for (const entry of entries) {
    if (entry.durationSeconds > 0) {
      timed.add(entry.issueKey);
      totalSeconds += entry.durationSeconds;
    }
  }

  const issueKeys = new Set(issues.map((issue) => issue.key));
  const issuesWithoutTime = [...issueKeys].filter((key) => !timed.has(key)).length;

  return {
    entries: entries.length,
    issuesWithTime: timed.size,
    issuesWithoutTime,
    totalSeconds,
  };
}

/**
 * Sequences export (query -> entries -> rows) and import (rows -> diff ->
 * remote writes). One failing record never stops the batch; each considered
 * record yields exactly one MutationResult.
 */
export class Reconciler {
  constructor(
    private readonly source: RemoteSource,
    private readonly session: Session = new Session()
  ) {}

  currentUser(): Promise<UserIdentity> {
    return this.session.currentUser.get(() => this.source.getCurrentUser());
  }

  async collectIssues(query: QueryOptions): Promise<{ jql: string; issues: Issue[] }> {
    const jql = await resolveQueryJql(query, this.source, this.session);
    logger.debug('Listing issues', { jql });
    const issues = await this.source.listIssues(jql);
    logger.debug(`Found ${issues.length} issue(s)`);
    return { jql, issues };
  }

  async collectEntries(issues: Issue[], options: CollectOptions = {}): Promise<TimeEntry[]> {
    const user = options.allUsers ? undefined : await this.currentUser();
    const me = user ? userId(user) : undefined;
    const window = options.timeRange ? monthWindow(options.timeRange, options.now) : undefined;

    const isMine = (entry: TimeEntry): boolean => {
      if (!user) return true;
      return me ? entry.authorId === me : entry.authorName === user.displayName;
    };

    const collected: TimeEntry[] = [];
    for (const issue of issues) {
      let entries: TimeEntry[];
      try {
        entries = await this.source.listEntries(issue.key);
      } catch (err) {
        logger.warn(`Could not list work logs for ${issue.key}, treating it as having none`, {
          error: errorMessage(err),
        });
        continue;
      }

      for (const entry of entries) {
        if (!isMine(entry)) continue;
        if (window && !inWindow(entryDate(entry.started), window)) continue;
        collected.push(entry);
      }
    }

    logger.debug(`Collected ${collected.length} work log(s)`, {
      allUsers: options.allUsers ?? false,
      timeRange: options.timeRange ?? 'all',
    });
    return collected;
  }

  async exportSummary(query: QueryOptions, options: SummaryBuildOptions = {}): Promise<SummaryExport> {
    const { jql, issues } = await this.collectIssues(query);
    const entries = await this.collectEntries(issues, options);

    const flatten: FlattenOptions = {
      indentUnit: options.indentUnit ?? DEFAULT_FLATTEN_OPTIONS.indentUnit,
      connector: options.connector ?? DEFAULT_FLATTEN_OPTIONS.connector,
      issuesOnly: options.issuesOnly,
      includeOrphans: options.includeOrphans,
    };

    let rows: SummaryRow[];
    let epicGroups = 0;
    let omittedOrphans = 0;

    if (options.groupByHierarchy) {
      const groups = sortedGroups(groupByHierarchy(issues, entries));
      rows = flattenGroups(groups, entries, flatten);
      for (const [key, group] of groups) {
        if (!isOrphanGroupKey(key)) {
          epicGroups++;
        } else if (!options.includeOrphans) {
          omittedOrphans += countGroupIssues(group);
        }
      }
      logger.debug(`Grouped ${issues.length} issue(s) into ${groups.length} group(s)`);
    } else {
      rows = flattenFlat(issues, entries, flatten);
    }

    return {
      jql,
      issues,
      entries,
      rows,
      totals: summarizeTotals(issues, entries),
      epicGroups,
      omittedOrphans,
    };
  }

  /**
   * One row per issue, ready for time to be filled in.
   */
  async exportTemplate(query: QueryOptions): Promise<ExportRow[]> {
    const { issues } = await this.collectIssues(query);
    return issues.map((issue) => ({
      'Issue Key': issue.key,
      'Summary': issue.title,
      'Type': issue.type,
      'Status': issue.status ?? '',
      'Project': issue.project ?? '',
      'Time Logged (hours)': '',
      'Date': '',
      'Comment': '',
      'Sync Status': '',
    }));
  }

  private async applyChange(change: ChangeRecord, dryRun: boolean): Promise<MutationResult> {
    const base = { issueKey: change.issueKey, entryId: change.entryId, operation: 'update' as const };
    const delta = `${hoursLabel(change.originalHours)} -> ${hoursLabel(change.newHours)}`;

    if (dryRun) {
      try {
        await this.source.getEntry(change.issueKey, change.entryId);
        return { ...base, success: true, message: `Validation passed (${delta})` };
      } catch (err) {
        const message = err instanceof JiraApiError && err.notFound
          ? `Work log ${change.entryId} not found`
          : `Validation error: ${errorMessage(err)}`;
        return { ...base, success: false, message };
      }
    }

    try {
      await this.source.replaceEntry(
        change.issueKey,
        change.entryId,
        hoursToSeconds(change.newHours),
        change.newNote ?? '',
        change.date
      );
      return { ...base, success: true, message: `Work log updated (${delta})` };
    } catch (err) {
      return { ...base, success: false, message: `Failed to update work log: ${errorMessage(err)}` };
    }
  }

  /**
   * Exactly one remote call per change: a full replace, or an existence
   * check when dry-running.
   */
  async applyChanges(changes: ChangeRecord[], options: ApplyOptions = {}): Promise<MutationResult[]> {
    const results: MutationResult[] = [];
    for (const change of changes) {
      const result = await this.applyChange(change, options.dryRun ?? false);
      logger.debug(result.message, { issueKey: result.issueKey, entryId: result.entryId });
      results.push(result);
      options.onProgress?.(results.length, changes.length);
    }
    return results;
  }

  private async createEntry(entry: NewEntry, dryRun: boolean): Promise<MutationResult> {
    const base = { issueKey: entry.issueKey, operation: 'create' as const };
    const detail = `${hoursLabel(entry.hours)} on ${entry.date}`;

    if (dryRun) {
      try {
        const issue = await this.source.getIssue(entry.issueKey);
        return issue
          ? { ...base, success: true, message: `Validation passed (${detail})` }
          : { ...base, success: false, message: `Issue ${entry.issueKey} not found` };
      } catch (err) {
        return { ...base, success: false, message: `Validation error: ${errorMessage(err)}` };
      }
    }

    try {
      const entryId = await this.source.createEntry(
        entry.issueKey,
        hoursToSeconds(entry.hours),
        entry.note ?? '',
        entry.date
      );
      return { ...base, entryId, success: true, message: `Work log added (${detail})` };
    } catch (err) {
      return { ...base, success: false, message: `Failed to add work log: ${errorMessage(err)}` };
    }
  }

  async createEntries(entries: NewEntry[], options: ApplyOptions = {}): Promise<MutationResult[]> {
    const results: MutationResult[] = [];
    for (const entry of entries) {
      const result = await this.createEntry(entry, options.dryRun ?? false);
      logger.debug(result.message, { issueKey: result.issueKey, entryId: result.entryId });
      results.push(result);
      options.onProgress?.(results.length, entries.length);
    }
    return results;
  }

  private async runImport<R, T>(
    report: R,
    pending: T[],
    apply: (items: T[], options: ApplyOptions) => Promise<MutationResult[]>,
    options: ImportRunOptions<R>
  ): Promise<ImportOutcome<R>> {
    if (pending.length > 0 && options.beforeApply && !(await options.beforeApply(report))) {
      return { report, results: [], cancelled: true };
    }
    const results = await apply(pending, options);
    return { report, results, cancelled: false };
  }

  async importSummary(
    rows: ParsedRow<SummaryColumn>[],
    options: ImportRunOptions<DiffReport> = {}
  ): Promise<ImportOutcome<DiffReport>> {
    const report = diffRows(rows.map(summaryRowToDiffInput));
    return this.runImport(report, report.changes, (items, opts) => this.applyChanges(items, opts), options);
  }

  async importTemplate(
    rows: ParsedRow<ExportColumn>[],
    options: ImportRunOptions<EntryParseReport> = {}
  ): Promise<ImportOutcome<EntryParseReport>> {
    const report = parseEntryRows(rows);
    return this.runImport(report, report.entries, (items, opts) => this.createEntries(items, opts), options);
  }
}
