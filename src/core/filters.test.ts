import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  combineFilterJql,
  combineJql,
  parseFilterIds,
  resolveQueryJql,
  stripOrderBy,
} from './filters.js';
import { Session } from './session.js';
import { QueryError } from '../utils/errors.js';
import { setLogLevel } from '../utils/logger.js';
import { FakeRemoteSource } from '../../tests/fake-remote-source.js';

describe('filters', () => {
  let source: FakeRemoteSource;

  beforeEach(() => {
    setLogLevel('error');
    source = new FakeRemoteSource();
    source.filters.set('10', { id: '10', name: 'Mine', jql: 'assignee = currentUser() ORDER BY updated DESC' });
    source.filters.set('11', { id: '11', name: 'Team', jql: 'project = OPS' });
  });

  afterEach(() => {
    setLogLevel('info');
  });

  it('should split, trim and dedupe filter ids', () => {
    expect(parseFilterIds(['10,11', ' 12 ', '11', ''])).toEqual(['10', '11', '12']);
    expect(parseFilterIds('10')).toEqual(['10']);
    expect(parseFilterIds(undefined)).toEqual([]);
  });

  it('should strip ORDER BY clauses', () => {
    expect(stripOrderBy('project = A order by created DESC')).toBe('project = A');
    expect(stripOrderBy('project = A')).toBe('project = A');
  });

  it('should pass a single query through unchanged', () => {
    expect(combineJql(['project = A ORDER BY rank'])).toBe('project = A ORDER BY rank');
  });

  it('should OR several queries and order by key', () => {
    expect(combineJql(['project = A ORDER BY rank', 'project = B', '  '])).toBe(
      '(project = A) OR (project = B) ORDER BY key ASC'
    );
  });

  it('should refuse to combine nothing', () => {
    expect(() => combineJql([])).toThrow(QueryError);
  });

  it('should skip filters that cannot be resolved', async () => {
    const jql = await combineFilterJql(['10', '404'], source);
    expect(jql).toBe('assignee = currentUser() ORDER BY updated DESC');
  });

  it('should fail when no filter resolves', async () => {
    await expect(combineFilterJql(['404', '405'], source)).rejects.toThrow(
      'None of the filters could be resolved: 404, 405'
    );
  });

  it('should look each filter up once per session', async () => {
    const session = new Session();

    await combineFilterJql(['10', '11'], source, session);
    await combineFilterJql(['11'], source, session);

    expect(source.callsTo('getFilterJql').map((c) => c.args[0])).toEqual(['10', '11']);
  });

  it('should prefer filters over raw JQL', async () => {
    const jql = await resolveQueryJql({ filter: ['10,11'], jql: 'project = IGNORED' }, source);
    expect(jql).toBe('(assignee = currentUser()) OR (project = OPS) ORDER BY key ASC');
  });

  it('should use raw JQL without filters', async () => {
    expect(await resolveQueryJql({ filter: [], jql: ' project = A ' }, source)).toBe('project = A');
    await expect(resolveQueryJql({}, source)).rejects.toBeInstanceOf(QueryError);
  });
});
