import type { RemoteSource } from '../src/core/remote-source.js';
import type { Issue, SavedFilter, TimeEntry, UserIdentity } from '../src/types/index.js';
import { JiraApiError } from '../src/utils/errors.js';
import { toJiraStarted } from '../src/utils/formatters.js';

export interface RecordedCall {
  method: keyof RemoteSource;
  args: unknown[];
}

/**
 * In-memory stand-in for Jira. Issues listed in `failingIssues` reject every
 * write; every call is recorded.
 */
export class FakeRemoteSource implements RemoteSource {
  readonly calls: RecordedCall[] = [];
  readonly failingIssues = new Set<string>();
  readonly unlistableIssues = new Set<string>();
  readonly filters = new Map<string, SavedFilter>();
  private readonly issues = new Map<string, Issue>();
  private readonly entries = new Map<string, TimeEntry[]>();
  private nextId = 1000;

  constructor(
    private readonly user: UserIdentity = { accountId: 'acc-me', displayName: 'Me Myself' },
    private readonly jqlResults = new Map<string, string[]>()
  ) {}

  addIssue(issue: Issue): this {
    this.issues.set(issue.key, issue);
    return this;
  }

  addEntry(entry: TimeEntry): this {
    const list = this.entries.get(entry.issueKey) ?? [];
    list.push(entry);
    this.entries.set(entry.issueKey, list);
    return this;
  }

  setQuery(jql: string, keys: string[]): this {
    this.jqlResults.set(jql, keys);
    return this;
  }

  entriesFor(issueKey: string): TimeEntry[] {
    return this.entries.get(issueKey) ?? [];
  }

  callsTo(method: keyof RemoteSource): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async listIssues(jql: string): Promise<Issue[]> {
    this.calls.push({ method: 'listIssues', args: [jql] });
    const keys = this.jqlResults.get(jql) ?? [...this.issues.keys()];
    return keys.flatMap((key) => {
      const issue = this.issues.get(key);
      return issue ? [{ ...issue }] : [];
    });
  }

  async getIssue(key: string): Promise<Issue | undefined> {
    this.calls.push({ method: 'getIssue', args: [key] });
    return this.issues.get(key);
  }

  async listEntries(issueKey: string): Promise<TimeEntry[]> {
    this.calls.push({ method: 'listEntries', args: [issueKey] });
    if (this.unlistableIssues.has(issueKey)) {
      throw new JiraApiError(403, ['You do not have permission to view work logs'], `/issue/${issueKey}/worklog`);
    }
    return this.entriesFor(issueKey).map((entry) => ({ ...entry }));
  }

  async getEntry(issueKey: string, entryId: string): Promise<TimeEntry> {
    this.calls.push({ method: 'getEntry', args: [issueKey, entryId] });
    const entry = this.entriesFor(issueKey).find((e) => e.id === entryId);
    if (!entry) {
      throw new JiraApiError(404, ['Cannot find worklog'], `/issue/${issueKey}/worklog/${entryId}`);
    }
    return { ...entry };
  }

  async getCurrentUser(): Promise<UserIdentity> {
    this.calls.push({ method: 'getCurrentUser', args: [] });
    return this.user;
  }

  async getFilterJql(filterId: string): Promise<string | undefined> {
    this.calls.push({ method: 'getFilterJql', args: [filterId] });
    return this.filters.get(filterId)?.jql;
  }

  async listFilters(): Promise<SavedFilter[]> {
    this.calls.push({ method: 'listFilters', args: [] });
    return [...this.filters.values()];
  }

  async createEntry(issueKey: string, seconds: number, note: string, date: string): Promise<string> {
    this.calls.push({ method: 'createEntry', args: [issueKey, seconds, note, date] });
    if (this.failingIssues.has(issueKey)) {
      throw new JiraApiError(400, ['Issue is closed'], `/issue/${issueKey}/worklog`);
    }
    const id = String(this.nextId++);
    this.addEntry({
      id,
      issueKey,
      durationSeconds: seconds,
      note,
      started: toJiraStarted(date),
      authorId: this.user.accountId,
      authorName: this.user.displayName,
    });
    return id;
  }

  async replaceEntry(
    issueKey: string,
    entryId: string,
    seconds: number,
    note: string,
    date: string
  ): Promise<void> {
    this.calls.push({ method: 'replaceEntry', args: [issueKey, entryId, seconds, note, date] });
    if (this.failingIssues.has(issueKey)) {
      throw new JiraApiError(400, ['Issue is closed'], `/issue/${issueKey}/worklog/${entryId}`);
    }
    const entry = this.entriesFor(issueKey).find((e) => e.id === entryId);
    if (!entry) {
      throw new JiraApiError(404, ['Cannot find worklog'], `/issue/${issueKey}/worklog/${entryId}`);
    }
    entry.durationSeconds = seconds;
    entry.note = note;
    entry.started = toJiraStarted(date);
  }
}
