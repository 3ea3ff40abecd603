import { setTimeout as delay } from 'timers/promises';
import type { Issue, JiraConfig, SavedFilter, TimeEntry, UserIdentity } from '../types/index.js';
import { JiraApiError, errorMessage } from '../utils/errors.js';
import { toJiraStarted } from '../utils/formatters.js';
import { logger } from '../utils/logger.js';
import {
  errorMessages,
  mapFilter,
  mapIssue,
  mapUser,
  mapWorklog,
  toJiraComment,
} from './jira-mappers.js';
import type {
  JiraFieldResponse,
  JiraFilterResponse,
  JiraIssueResponse,
  JiraSearchResponse,
  JiraServerInfo,
  JiraUserResponse,
  JiraWorklogPage,
  JiraWorklogResponse,
} from './jira-mappers.js';
import type { RemoteSource } from './remote-source.js';
import { Session } from './session.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface JiraClientOptions {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  session?: Session;
}

type HttpMethod = 'GET' | 'POST' | 'PUT';
type Query = Record<string, string | number | undefined>;

interface RequestOptions {
  query?: Query;
  body?: unknown;
}

const ISSUE_FIELDS = ['summary', 'issuetype', 'status', 'assignee', 'parent'];
const EPIC_LINK_FIELD_NAME = 'epic link';

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Retry-After is either delay-seconds or an HTTP date.
 */
export function retryAfterMs(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;

  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

function parseBody(text: string): unknown {
  if (text === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Jira REST client with Basic auth. Transient failures (429, 5xx, network)
 * are retried with exponential backoff; everything else surfaces as a
 * JiraApiError.
 */
export class JiraClient implements RemoteSource {
  readonly baseUrl: string;
  readonly session: Session;
  private readonly authHeader: string;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: JiraConfig,
    options: JiraClientOptions = {}
  ) {
    this.baseUrl = `${config.server.replace(/\/+$/, '')}/rest/api/${config.apiVersion}`;
    const credentials = Buffer.from(`${config.email}:${config.apiToken}`).toString('base64');
    this.authHeader = `Basic ${credentials}`;
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.session = options.session ?? new Session();
  }

  private url(path: string, query: Query = {}): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private backoff(attempt: number): number {
    return this.config.retryDelayMs * 2 ** attempt;
  }

  private async send(method: HttpMethod, url: string, body: unknown): Promise<Response> {
    const init: RequestInit = {
      method,
      headers: {
        'Authorization': this.authHeader,
        'Accept': 'application/json',
        'Content-Type': 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    };

    for (let attempt = 0; ; attempt++) {
      const canRetry = attempt < this.config.maxRetries;
      let response: Response;

      try {
        response = await this.fetchFn(url, init);
      } catch (err) {
        if (!canRetry) {
          throw new JiraApiError(0, [`Network error: ${errorMessage(err)}`], url);
        }
        const wait = this.backoff(attempt);
        logger.debug('Jira request failed, retrying', { method, url, wait, error: errorMessage(err) });
        await this.sleep(wait);
        continue;
      }

      if (!isRetryable(response.status) || !canRetry) {
        return response;
      }

      const wait = retryAfterMs(response.headers.get('retry-after')) ?? this.backoff(attempt);
      logger.debug('Jira request throttled, retrying', { method, url, status: response.status, wait });
      await this.sleep(wait);
    }
  }

  private async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const url = this.url(path, options.query);
    logger.debug(`${method} ${url}`);

    const response = await this.send(method, url, options.body);
    const body = parseBody(await response.text());

    if (!response.ok) {
      const messages = errorMessages(body);
      if (messages.length === 0 && response.statusText) {
        messages.push(response.statusText);
      }
      throw new JiraApiError(response.status, messages, url);
    }

    // Response bodies are trusted to match the documented REST shapes
    return body as T;
  }

  async getServerInfo(): Promise<JiraServerInfo> {
    return this.request<JiraServerInfo>('GET', '/serverInfo');
  }

  async getCurrentUser(): Promise<UserIdentity> {
    const raw = await this.request<JiraUserResponse>('GET', '/myself');
    return mapUser(raw);
  }

  /**
   * The Epic Link custom field id: configured, or found by name. Servers
   * without the field (team-managed projects) resolve undefined.
   */
  epicLinkField(): Promise<string | undefined> {
    if (this.config.epicLinkField) {
      return Promise.resolve(this.config.epicLinkField);
    }
    return this.session.epicLinkField.get(async () => {
      try {
        const fields = await this.request<JiraFieldResponse[]>('GET', '/field');
        const field = fields.find((f) => f.name.toLowerCase() === EPIC_LINK_FIELD_NAME);
        logger.debug('Epic Link field discovery', { field: field?.id ?? 'none' });
        return field?.id;
      } catch (err) {
        logger.warn('Could not discover the Epic Link field; epic links come from parents only', {
          error: errorMessage(err),
        });
        return undefined;
      }
    });
  }

  private issueFields(epicField: string | undefined): string {
    return (epicField ? [...ISSUE_FIELDS, epicField] : ISSUE_FIELDS).join(',');
  }

  async listIssues(jql: string): Promise<Issue[]> {
    const epicField = await this.epicLinkField();
    const fields = this.issueFields(epicField);
    const raw = this.config.apiVersion === '3'
      ? await this.searchByToken(jql, fields)
      : await this.searchByOffset(jql, fields);
    return raw.map((issue) => mapIssue(issue, epicField));
  }

  private async searchByOffset(jql: string, fields: string): Promise<JiraIssueResponse[]> {
    const issues: JiraIssueResponse[] = [];
    let startAt = 0;

    for (;;) {
      const page = await this.request<JiraSearchResponse>('GET', '/search', {
        query: { jql, fields, startAt, maxResults: this.config.pageSize },
      });
      issues.push(...page.issues);
      startAt += page.issues.length;

      const total = page.total ?? startAt;
      if (page.issues.length === 0 || startAt >= total) break;
    }

    return issues;
  }

  private async searchByToken(jql: string, fields: string): Promise<JiraIssueResponse[]> {
    const issues: JiraIssueResponse[] = [];
    let nextPageToken: string | undefined;

    do {
      const page: JiraSearchResponse = await this.request<JiraSearchResponse>('GET', '/search/jql', {
        query: { jql, fields, maxResults: this.config.pageSize, nextPageToken },
      });
      issues.push(...page.issues);
      nextPageToken = page.isLast === false ? page.nextPageToken : undefined;
    } while (nextPageToken);

    return issues;
  }

  async getIssue(key: string): Promise<Issue | undefined> {
    const epicField = await this.epicLinkField();
    const fields = this.issueFields(epicField);
    try {
      const raw = await this.request<JiraIssueResponse>('GET', `/issue/${encodeURIComponent(key)}`, {
        query: { fields },
      });
      return mapIssue(raw, epicField);
    } catch (err) {
      if (err instanceof JiraApiError && err.notFound) return undefined;
      throw err;
    }
  }

  async listEntries(issueKey: string): Promise<TimeEntry[]> {
    const entries: TimeEntry[] = [];
    const path = `/issue/${encodeURIComponent(issueKey)}/worklog`;
    let startAt = 0;

    for (;;) {
      const page = await this.request<JiraWorklogPage>('GET', path, {
        query: { startAt, maxResults: this.config.pageSize },
      });
      entries.push(...page.worklogs.map((raw) => mapWorklog(raw, issueKey)));
      startAt += page.worklogs.length;

      const total = page.total ?? startAt;
      if (page.worklogs.length === 0 || startAt >= total) break;
    }

    return entries;
  }

  async getEntry(issueKey: string, entryId: string): Promise<TimeEntry> {
    const raw = await this.request<JiraWorklogResponse>(
      'GET',
      `/issue/${encodeURIComponent(issueKey)}/worklog/${encodeURIComponent(entryId)}`
    );
    return mapWorklog(raw, issueKey);
  }

  async listFilters(): Promise<SavedFilter[]> {
    const raw = await this.request<JiraFilterResponse[]>('GET', '/filter/favourite');
    return raw.map(mapFilter);
  }

  async getFilterJql(filterId: string): Promise<string | undefined> {
    try {
      const raw = await this.request<JiraFilterResponse>('GET', `/filter/${encodeURIComponent(filterId)}`);
      return mapFilter(raw).jql || undefined;
    } catch (err) {
      if (err instanceof JiraApiError && err.notFound) return undefined;
      throw err;
    }
  }

  private worklogBody(seconds: number, note: string, date: string): Record<string, unknown> {
    return {
      timeSpentSeconds: seconds,
      comment: toJiraComment(note, this.config.apiVersion),
      started: toJiraStarted(date),
    };
  }

  async createEntry(issueKey: string, seconds: number, note: string, date: string): Promise<string> {
    const created = await this.request<JiraWorklogResponse>(
      'POST',
      `/issue/${encodeURIComponent(issueKey)}/worklog`,
      { body: this.worklogBody(seconds, note, date) }
    );
    return String(created.id);
  }

  async replaceEntry(
    issueKey: string,
    entryId: string,
    seconds: number,
    note: string,
    date: string
  ): Promise<void> {
    await this.request<unknown>(
      'PUT',
      `/issue/${encodeURIComponent(issueKey)}/worklog/${encodeURIComponent(entryId)}`,
      { body: this.worklogBody(seconds, note, date) }
    );
  }
}
