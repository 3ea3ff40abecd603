// Issue types
export type IssueType =
  | 'Epic'
  | 'Story'
  | 'Task'
  | 'Subtask'
  | 'Bug'
  | (string & {});   // any other type name Jira reports

export interface Issue {
  key: string;
  title: string;
  type: IssueType;
  status?: string;
  project?: string;
  assignee?: string;
  parentKey?: string;      // direct parent (Task under Story, Subtask under Task)
  epicLinkKey?: string;    // owning Epic when linked directly
  // Filled in by the hierarchy resolver once the whole batch is known
  parentType?: IssueType;
  depth?: number;
}

// Worklog types
export interface TimeEntry {
  id?: string;             // absent only for synthesized sentinel entries
  issueKey: string;
  durationSeconds: number;
  note: string;
  started: string;         // ISO timestamp
  authorId?: string;
  authorName?: string;
}

export interface UserIdentity {
  accountId?: string;
  name?: string;
  displayName: string;
  email?: string;
}

export interface SavedFilter {
  id: string;
  name: string;
  jql: string;
  description?: string;
}

export interface HierarchicalGroup {
  root?: Issue;                              // absent for the orphan bucket
  children: Issue[];
  childrenByParent: Map<string, Issue[]>;
  entries: TimeEntry[];
}

// Diff types
export interface ChangeRecord {
  entryId: string;
  issueKey: string;
  originalHours: number;
  newHours: number;
  originalNote?: string;
  newNote?: string;
  date: string;            // YYYY-MM-DD
  row?: number;            // workbook row the change was read from
}

export interface NewEntry {
  issueKey: string;
  hours: number;
  date: string;
  note?: string;
  row?: number;
}

export interface RowProblem {
  row: number;
  issueKey?: string;
  message: string;
}

export interface DiffReport {
  changes: ChangeRecord[];
  unchanged: number;
  skipped: RowProblem[];
  errors: RowProblem[];
}

export interface EntryParseReport {
  entries: NewEntry[];
  skipped: RowProblem[];
  errors: RowProblem[];
}

export type MutationOperation = 'create' | 'update';

export interface MutationResult {
  issueKey: string;
  entryId?: string;
  success: boolean;
  message: string;
  operation: MutationOperation;
}

// Workbook row shapes
export const EXPORT_COLUMNS = [
  'Issue Key',
  'Summary',
  'Type',
  'Status',
  'Project',
  'Time Logged (hours)',
  'Date',
  'Comment',
  'Sync Status',
] as const;

export const SUMMARY_COLUMNS = [
  'Hierarchy',
  'Worklog ID',
  'Issue Key',
  'Summary',
  'Type',
  'Parent Key',
  'Parent Type',
  'Time Logged (hours)',
  'Original Time (hours)',
  'Date',
  'Comment',
  'Original Comment',
  'Author',
  'Status',
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];
export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string>;
export type SummaryRow = Record<SummaryColumn, string>;

// Rows read back from a workbook: any column may be missing or blank
export interface ParsedRow<C extends string> {
  rowNumber: number;
  values: Partial<Record<C, string>>;
}

export const ENTRY_STATUS = {
  original: 'Original',
  sentinel: 'No Worklog',
  updated: 'Updated',
} as const;

// Written to the status column of a workbook after import
export const SYNC_STATUS = {
  synced: '✓ Synced',
  failed: '✗',     // followed by the failure message
} as const;

export type TimeRange = 'current' | 'previous';

// Config types
export interface JiraConfig {
  server: string;
  email: string;
  apiToken: string;
  apiVersion: string;
  epicLinkField?: string;   // e.g. customfield_10014; discovered by name when unset
  pageSize: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface ExportConfig {
  templateOutput: string;
  summaryOutput: string;
  indentUnit: string;
  connector: string;
}

export interface BridgeConfig {
  jira: JiraConfig;
  export: ExportConfig;
}

// Command options
export interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
}

export interface QueryOptions {
  filter?: string[];
  jql?: string;
}

export interface TemplateExportOptions extends GlobalOptions, QueryOptions {
  output?: string;
}

export interface SummaryExportOptions extends GlobalOptions, QueryOptions {
  output?: string;
  timeRange?: TimeRange;
  allUsers?: boolean;
  issuesOnly?: boolean;
  groupByHierarchy?: boolean;
  includeOrphans?: boolean;
}

export interface ImportOptions extends GlobalOptions {
  input: string;
  dryRun?: boolean;
  yes?: boolean;
}
