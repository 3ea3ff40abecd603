import { describe, it, expect } from 'vitest';
import {
  commentText,
  errorMessages,
  mapFilter,
  mapIssue,
  mapIssueType,
  mapUser,
  mapWorklog,
  toJiraComment,
} from './jira-mappers.js';

describe('mapIssue', () => {
  it('should map the basic fields', () => {
    const issue = mapIssue({
      key: 'PROJ-7',
      fields: {
        summary: ' Fix login ',
        issuetype: { name: 'Bug' },
        status: { name: 'In Progress' },
        assignee: { displayName: 'Dana' },
      },
    });

    expect(issue).toEqual({
      key: 'PROJ-7',
      title: 'Fix login',
      type: 'Bug',
      status: 'In Progress',
      project: 'PROJ',
      assignee: 'Dana',
    });
  });

  it('should fall back to the key for an empty summary', () => {
    expect(mapIssue({ key: 'PROJ-7', fields: { summary: '  ' } }).title).toBe('PROJ-7');
  });

  it('should treat a parent Epic as the epic link', () => {
    const issue = mapIssue({
      key: 'PROJ-2',
      fields: { issuetype: { name: 'Story' }, parent: { key: 'PROJ-1', fields: { issuetype: { name: 'Epic' } } } },
    });

    expect(issue.epicLinkKey).toBe('PROJ-1');
    expect(issue.parentKey).toBeUndefined();
  });

  it('should keep other parents and read the epic link field', () => {
    const issue = mapIssue(
      {
        key: 'PROJ-3',
        fields: {
          issuetype: { name: 'Sub-task', subtask: true },
          parent: { key: 'PROJ-2', fields: { issuetype: { name: 'Story' } } },
          customfield_10014: 'PROJ-1',
        },
      },
      'customfield_10014'
    );

    expect(issue.type).toBe('Subtask');
    expect(issue.parentKey).toBe('PROJ-2');
    expect(issue.epicLinkKey).toBe('PROJ-1');
  });

  it('should accept an epic link given as an object', () => {
    const issue = mapIssue(
      { key: 'PROJ-3', fields: { issuetype: { name: 'Task' }, customfield_10014: { key: 'PROJ-1' } } },
      'customfield_10014'
    );
    expect(issue.epicLinkKey).toBe('PROJ-1');
  });

  it('should drop links on Epics', () => {
    const issue = mapIssue(
      {
        key: 'PROJ-1',
        fields: { issuetype: { name: 'Epic' }, parent: { key: 'PROJ-0' }, customfield_10014: 'PROJ-9' },
      },
      'customfield_10014'
    );

    expect(issue.parentKey).toBeUndefined();
    expect(issue.epicLinkKey).toBeUndefined();
  });
});

describe('mapIssueType', () => {
  it('should normalise sub-task spellings', () => {
    expect(mapIssueType({ name: 'Sub-task' })).toBe('Subtask');
    expect(mapIssueType({ name: 'Technical subtask', subtask: true })).toBe('Subtask');
    expect(mapIssueType({ name: 'Story' })).toBe('Story');
    expect(mapIssueType(undefined)).toBe('Unknown');
  });
});

describe('comments', () => {
  it('should flatten an Atlassian document to text', () => {
    const text = commentText({
      type: 'doc',
      version: 1,
      content: [
        {
          type: 'paragraph',
          content: [{ type: 'text', text: 'first' }, { type: 'hardBreak' }, { type: 'text', text: 'second' }],
        },
        { type: 'paragraph', content: [{ type: 'text', text: 'third' }] },
      ],
    });

    expect(text).toBe('first\nsecond\nthird');
  });

  it('should pass plain comments through', () => {
    expect(commentText('plain')).toBe('plain');
    expect(commentText(undefined)).toBe('');
  });

  it('should write documents for API v3 only', () => {
    expect(toJiraComment('one\ntwo', '2')).toBe('one\ntwo');
    expect(toJiraComment('one\n\ntwo', '3')).toEqual({
      type: 'doc',
      version: 1,
      content: [
        { type: 'paragraph', content: [{ type: 'text', text: 'one' }] },
        { type: 'paragraph', content: [] },
        { type: 'paragraph', content: [{ type: 'text', text: 'two' }] },
      ],
    });
    expect(toJiraComment('', '3')).toEqual({ type: 'doc', version: 1, content: [] });
  });
});

describe('other mappers', () => {
  it('should map worklogs with their author', () => {
    const entry = mapWorklog(
      {
        id: 10042,
        timeSpentSeconds: 5400,
        comment: 'review',
        started: '2024-03-05T09:00:00.000+0000',
        author: { accountId: 'acc-1', displayName: 'Dana' },
      },
      'PROJ-7'
    );

    expect(entry).toEqual({
      id: '10042',
      issueKey: 'PROJ-7',
      durationSeconds: 5400,
      note: 'review',
      started: '2024-03-05T09:00:00.000+0000',
      authorId: 'acc-1',
      authorName: 'Dana',
    });
  });

  it('should identify server users by name', () => {
    expect(mapUser({ name: 'dana', displayName: 'Dana' })).toEqual({
      accountId: undefined,
      name: 'dana',
      displayName: 'Dana',
      email: undefined,
    });
  });

  it('should map filters', () => {
    expect(mapFilter({ id: 10100, name: 'Mine', jql: 'assignee = currentUser()', description: '' })).toEqual({
      id: '10100',
      name: 'Mine',
      jql: 'assignee = currentUser()',
      description: undefined,
    });
  });

  it('should collect error messages and field errors', () => {
    expect(errorMessages({ errorMessages: ['Issue does not exist'] })).toEqual(['Issue does not exist']);
    expect(errorMessages({ errorMessages: [], errors: { timeSpent: 'Invalid time' } })).toEqual([
      'timeSpent: Invalid time',
    ]);
    expect(errorMessages('<html>')).toEqual([]);
  });
});
