import type { Issue, SavedFilter, TimeEntry, UserIdentity } from '../types/index.js';

/**
 * Everything the reconciler needs from the issue tracker. JiraClient is the
 * production implementation; tests use an in-memory one.
 */
export interface RemoteSource {
  listIssues(jql: string): Promise<Issue[]>;
  /** Resolves undefined when the issue does not exist or is not visible. */
  getIssue(key: string): Promise<Issue | undefined>;
  listEntries(issueKey: string): Promise<TimeEntry[]>;
  getEntry(issueKey: string, entryId: string): Promise<TimeEntry>;
  getCurrentUser(): Promise<UserIdentity>;
  getFilterJql(filterId: string): Promise<string | undefined>;
  listFilters(): Promise<SavedFilter[]>;
  /** Resolves the id of the created entry. */
  createEntry(issueKey: string, seconds: number, note: string, date: string): Promise<string>;
  /** Full replace of duration, note and start date. */
  replaceEntry(
    issueKey: string,
    entryId: string,
    seconds: number,
    note: string,
    date: string
  ): Promise<void>;
}
