import type { Issue, IssueType, SavedFilter, TimeEntry, UserIdentity } from '../types/index.js';

// Response shapes, limited to the fields this tool reads

export interface JiraUserResponse {
  accountId?: string;
  name?: string;
  key?: string;
  displayName?: string;
  emailAddress?: string;
}

export interface JiraIssueTypeResponse {
  name?: string;
  subtask?: boolean;
}

export interface JiraParentResponse {
  key: string;
  fields?: {
    summary?: string;
    issuetype?: JiraIssueTypeResponse;
  };
}

export interface JiraIssueFields {
  summary?: string;
  issuetype?: JiraIssueTypeResponse;
  status?: { name?: string };
  assignee?: JiraUserResponse | null;
  parent?: JiraParentResponse;
  [customField: string]: unknown;
}

export interface JiraIssueResponse {
  id?: string;
  key: string;
  fields: JiraIssueFields;
}

export interface JiraSearchResponse {
  startAt?: number;
  maxResults?: number;
  total?: number;
  issues: JiraIssueResponse[];
  // token paging of the v3 /search/jql endpoint
  nextPageToken?: string;
  isLast?: boolean;
}

export interface JiraWorklogResponse {
  id: string | number;
  timeSpentSeconds?: number;
  comment?: unknown;         // plain text (v2) or an Atlassian document (v3)
  started?: string;
  author?: JiraUserResponse;
}

export interface JiraWorklogPage {
  startAt?: number;
  maxResults?: number;
  total?: number;
  worklogs: JiraWorklogResponse[];
}

export interface JiraFilterResponse {
  id: string | number;
  name?: string;
  jql?: string;
  description?: string;
}

export interface JiraFieldResponse {
  id: string;
  name: string;
  custom?: boolean;
}

export interface JiraServerInfo {
  baseUrl?: string;
  version?: string;
  serverTitle?: string;
  deploymentType?: string;
}

export interface AdfNode {
  type: string;
  text?: string;
  content?: AdfNode[];
}

export interface AdfDocument extends AdfNode {
  type: 'doc';
  version: 1;
  content: AdfNode[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function adfText(node: unknown): string {
  if (!isRecord(node)) return '';
  if (node.type === 'text') {
    return typeof node.text === 'string' ? node.text : '';
  }
  if (node.type === 'hardBreak') return '\n';

  const children = Array.isArray(node.content) ? node.content : [];
  const separator = node.type === 'doc' ? '\n' : '';
  return children.map(adfText).join(separator);
}

/**
 * Worklog comment as plain text, whichever form the API returned it in.
 */
export function commentText(comment: unknown): string {
  if (typeof comment === 'string') return comment;
  if (isRecord(comment) && comment.type === 'doc') return adfText(comment);
  return '';
}

/**
 * v3 of the REST API only takes Atlassian documents; older versions take text.
 * Each line becomes its own paragraph.
 */
export function toJiraComment(note: string, apiVersion: string): string | AdfDocument {
  if (apiVersion !== '3') return note;

  const content: AdfNode[] = note === ''
    ? []
    : note.split('\n').map((line) => ({
        type: 'paragraph',
        content: line === '' ? [] : [{ type: 'text', text: line }],
      }));

  return { type: 'doc', version: 1, content };
}

export function mapIssueType(issueType: JiraIssueTypeResponse | undefined): IssueType {
  const name = issueType?.name ?? 'Unknown';
  const lower = name.toLowerCase();
  if (issueType?.subtask || lower === 'sub-task' || lower === 'subtask') {
    return 'Subtask';
  }
  return name;
}

/**
 * The Epic Link custom field holds a key on most servers; some return the
 * linked issue as an object.
 */
function epicLinkValue(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (isRecord(value) && typeof value.key === 'string') return value.key;
  return undefined;
}

export function mapIssue(raw: JiraIssueResponse, epicLinkField?: string): Issue {
  const { key, fields } = raw;
  const type = mapIssueType(fields.issuetype);
  const summary = fields.summary?.trim();

  const issue: Issue = {
    key,
    title: summary ? summary : key,
    type,
    status: fields.status?.name,
    project: key.includes('-') ? key.split('-')[0] : undefined,
    assignee: fields.assignee?.displayName,
  };

  if (type === 'Epic') {
    return issue;
  }

  const parent = fields.parent;
  if (parent) {
    if (mapIssueType(parent.fields?.issuetype).toLowerCase() === 'epic') {
      issue.epicLinkKey = parent.key;
    } else {
      issue.parentKey = parent.key;
    }
  }

  if (!issue.epicLinkKey && epicLinkField) {
    issue.epicLinkKey = epicLinkValue(fields[epicLinkField]);
  }

  return issue;
}

export function mapUser(raw: JiraUserResponse): UserIdentity {
  return {
    accountId: raw.accountId,
    name: raw.name,
    displayName: raw.displayName ?? raw.name ?? raw.accountId ?? '',
    email: raw.emailAddress,
  };
}

/**
 * Cloud identifies users by accountId, Server/Data Center by username.
 */
export function userId(user: JiraUserResponse | UserIdentity): string | undefined {
  return user.accountId ?? user.name;
}

export function mapWorklog(raw: JiraWorklogResponse, issueKey: string): TimeEntry {
  return {
    id: String(raw.id),
    issueKey,
    durationSeconds: raw.timeSpentSeconds ?? 0,
    note: commentText(raw.comment),
    started: raw.started ?? '',
    authorId: raw.author ? userId(raw.author) : undefined,
    authorName: raw.author?.displayName,
  };
}

export function mapFilter(raw: JiraFilterResponse): SavedFilter {
  return {
    id: String(raw.id),
    name: raw.name ?? '',
    jql: raw.jql ?? '',
    description: raw.description || undefined,
  };
}

/**
 * Jira reports failures as `errorMessages` and/or per-field `errors`.
 */
export function errorMessages(body: unknown): string[] {
  if (!isRecord(body)) return [];

  const messages: string[] = [];
  if (Array.isArray(body.errorMessages)) {
    for (const message of body.errorMessages) {
      if (typeof message === 'string' && message !== '') messages.push(message);
    }
  }
  if (messages.length === 0 && isRecord(body.errors)) {
    for (const [field, message] of Object.entries(body.errors)) {
      if (typeof message === 'string') messages.push(`${field}: ${message}`);
    }
  }
  return messages;
}
