import { ENTRY_STATUS } from '../types/index.js';
import type { HierarchicalGroup, Issue, SummaryRow, TimeEntry } from '../types/index.js';
import { entryDate, exactHours } from '../utils/formatters.js';
import { MAX_HIERARCHY_DEPTH, groupIssues, isOrphanGroupKey } from './hierarchy.js';

export interface FlattenOptions {
  indentUnit: string;
  connector: string;
  issuesOnly?: boolean;       // drop rows for issues without time logged
  includeOrphans?: boolean;   // append issues outside any Epic after the tree
}

export const DEFAULT_FLATTEN_OPTIONS: FlattenOptions = {
  indentUnit: '  ',
  connector: '└─ ',
};

export type EntriesByIssue = Map<string, TimeEntry[]>;

interface ParentCell {
  key: string;
  type: string;
}

export function indexEntries(entries: TimeEntry[]): EntriesByIssue {
  const byIssue: EntriesByIssue = new Map();
  for (const entry of entries) {
    const list = byIssue.get(entry.issueKey) ?? [];
    list.push(entry);
    byIssue.set(entry.issueKey, list);
  }
  return byIssue;
}

/**
 * Title as shown in the Summary column. The Epic (depth 0) and its direct
 * children are unindented apart from the connector.
 */
export function displayTitle(title: string, depth: number, options: FlattenOptions): string {
  if (depth <= 0) return title;
  return `${options.indentUnit.repeat(depth - 1)}${options.connector}${title}`;
}

export function sentinelEntry(issueKey: string): TimeEntry {
  return { issueKey, durationSeconds: 0, note: '', started: '' };
}

export function isSentinel(entry: TimeEntry): boolean {
  return entry.id === undefined && entry.durationSeconds === 0;
}

function entryRow(
  issue: Issue,
  entry: TimeEntry,
  hierarchy: string,
  title: string,
  parent: ParentCell | undefined
): SummaryRow {
  const sentinel = isSentinel(entry);
  const hours = exactHours(entry.durationSeconds);

  return {
    'Hierarchy': hierarchy,
    'Worklog ID': entry.id ?? '',
    'Issue Key': issue.key,
    'Summary': title,
    'Type': issue.type,
    'Parent Key': parent?.key ?? '',
    'Parent Type': parent?.type ?? '',
    'Time Logged (hours)': hours,
    'Original Time (hours)': hours,
    'Date': sentinel ? '' : entryDate(entry.started),
    'Comment': entry.note,
    'Original Comment': entry.note,
    'Author': entry.authorName ?? entry.authorId ?? '',
    'Status': sentinel ? ENTRY_STATUS.sentinel : ENTRY_STATUS.original,
  };
}

/**
 * One row per entry, or a single sentinel row when the issue has none
 * (omitted under `issuesOnly`).
 */
function issueRows(
  issue: Issue,
  entriesByIssue: EntriesByIssue,
  hierarchy: string,
  title: string,
  parent: ParentCell | undefined,
  options: FlattenOptions
): SummaryRow[] {
  const entries = entriesByIssue.get(issue.key) ?? [];
  if (entries.length === 0) {
    return options.issuesOnly
      ? []
      : [entryRow(issue, sentinelEntry(issue.key), hierarchy, title, parent)];
  }
  return entries.map((entry) => entryRow(issue, entry, hierarchy, title, parent));
}

function flattenNode(
  issue: Issue,
  depth: number,
  hierarchy: string,
  parent: ParentCell | undefined,
  group: HierarchicalGroup,
  entriesByIssue: EntriesByIssue,
  visited: Set<string>,
  options: FlattenOptions
): SummaryRow[] {
  if (depth > MAX_HIERARCHY_DEPTH || visited.has(issue.key)) {
    return [];
  }
  visited.add(issue.key);

  const rows = issueRows(
    issue,
    entriesByIssue,
    hierarchy,
    displayTitle(issue.title, depth, options),
    parent,
    options
  );

  const children = depth === 0
    ? group.children
    : group.childrenByParent.get(issue.key) ?? [];

  // Only the first level names the Epic with an annotation
  const childParent: ParentCell = depth === 0
    ? { key: `${issue.key} (Epic)`, type: 'Epic' }
    : { key: issue.key, type: issue.type };

  let sibling = 0;
  for (const child of children) {
    if (visited.has(child.key)) continue;
    sibling++;
    rows.push(
      ...flattenNode(
        child,
        depth + 1,
        `${hierarchy}.${sibling}`,
        childParent,
        group,
        entriesByIssue,
        visited,
        options
      )
    );
  }

  return rows;
}

/**
 * Pre-order rows for one Epic group, numbered from `epicIndex` (1-based).
 * Orphan groups have no root and yield nothing here.
 */
export function flattenGroup(
  group: HierarchicalGroup,
  epicIndex: number,
  entriesByIssue: EntriesByIssue,
  options: FlattenOptions = DEFAULT_FLATTEN_OPTIONS
): SummaryRow[] {
  if (!group.root) return [];
  return flattenNode(
    group.root,
    0,
    String(epicIndex),
    undefined,
    group,
    entriesByIssue,
    new Set(),
    options
  );
}

function flatParent(issue: Issue): ParentCell | undefined {
  const key = issue.parentKey ?? issue.epicLinkKey;
  if (!key) return undefined;
  return { key, type: issue.parentType ?? '' };
}

/**
 * Rows for every Epic group in the given order, numbered 1..n, then the
 * orphan issues as an unnumbered section when `includeOrphans` is set.
 */
export function flattenGroups(
  groups: Array<[string, HierarchicalGroup]>,
  entries: TimeEntry[],
  options: FlattenOptions = DEFAULT_FLATTEN_OPTIONS
): SummaryRow[] {
  const entriesByIssue = indexEntries(entries);
  const rows: SummaryRow[] = [];

  let epicIndex = 0;
  for (const [key, group] of groups) {
    if (isOrphanGroupKey(key) || !group.root) continue;
    epicIndex++;
    rows.push(...flattenGroup(group, epicIndex, entriesByIssue, options));
  }

  if (options.includeOrphans) {
    for (const [key, group] of groups) {
      if (!isOrphanGroupKey(key)) continue;
      for (const issue of groupIssues(group)) {
        rows.push(...issueRows(issue, entriesByIssue, '', issue.title, flatParent(issue), options));
      }
    }
  }

  return rows;
}

/**
 * Non-hierarchical rows in retrieval order. Entries whose issue is not in
 * the batch still get rows, keyed by the issue key alone.
 */
export function flattenFlat(
  issues: Issue[],
  entries: TimeEntry[],
  options: FlattenOptions = DEFAULT_FLATTEN_OPTIONS
): SummaryRow[] {
  const entriesByIssue = indexEntries(entries);
  const rows: SummaryRow[] = [];
  const seen = new Set<string>();

  for (const issue of issues) {
    if (seen.has(issue.key)) continue;
    seen.add(issue.key);
    rows.push(...issueRows(issue, entriesByIssue, '', issue.title, flatParent(issue), options));
  }

  for (const [issueKey, issueEntries] of entriesByIssue) {
    if (seen.has(issueKey)) continue;
    seen.add(issueKey);
    const stub: Issue = { key: issueKey, title: issueKey, type: '' };
    rows.push(...issueEntries.map((entry) => entryRow(stub, entry, '', stub.title, undefined)));
  }

  return rows;
}
