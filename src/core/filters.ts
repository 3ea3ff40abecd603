import type { QueryOptions } from '../types/index.js';
import { QueryError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { RemoteSource } from './remote-source.js';
import { Session } from './session.js';

const ORDER_BY = /\s+ORDER\s+BY\s+[\s\S]*$/i;

/**
 * `--filter 1,2 --filter 3` -> ['1', '2', '3'], blanks and repeats dropped.
 */
export function parseFilterIds(values: string | string[] | undefined): string[] {
  const raw = typeof values === 'string' ? [values] : values ?? [];
  const ids = raw
    .flatMap((value) => value.split(','))
    .map((id) => id.trim())
    .filter((id) => id !== '');
  return [...new Set(ids)];
}

export function stripOrderBy(jql: string): string {
  return jql.replace(ORDER_BY, '').trim();
}

/**
 * A single query passes through untouched. Several are OR-ed together; their
 * own ORDER BY clauses are not valid inside parentheses, so the combined
 * query orders by key instead.
 */
export function combineJql(queries: string[]): string {
  const clauses = queries.map((q) => q.trim()).filter((q) => q !== '');
  if (clauses.length === 0) {
    throw new QueryError('No JQL to combine');
  }
  if (clauses.length === 1) {
    return clauses[0];
  }
  return `${clauses.map((q) => `(${stripOrderBy(q)})`).join(' OR ')} ORDER BY key ASC`;
}

export async function combineFilterJql(
  filterIds: string[],
  source: RemoteSource,
  session: Session = new Session()
): Promise<string> {
  const queries: string[] = [];

  for (const id of filterIds) {
    const jql = await session.filterJql(id).get(() => source.getFilterJql(id));
    if (jql) {
      queries.push(jql);
    } else {
      logger.warn(`Filter ${id} not found or has no JQL query, skipping it`);
    }
  }

  if (queries.length === 0) {
    throw new QueryError(`None of the filters could be resolved: ${filterIds.join(', ')}`);
  }

  const combined = combineJql(queries);
  logger.debug('Resolved filter query', { filters: filterIds, jql: combined });
  return combined;
}

/**
 * Saved filters take precedence over a raw `--jql` query.
 */
export async function resolveQueryJql(
  query: QueryOptions,
  source: RemoteSource,
  session: Session = new Session()
): Promise<string> {
  const filterIds = parseFilterIds(query.filter);
  const jql = query.jql?.trim();

  if (filterIds.length > 0) {
    if (jql) {
      logger.warn('Both --filter and --jql given; using the filters');
    }
    return combineFilterJql(filterIds, source, session);
  }

  if (jql) {
    return jql;
  }

  throw new QueryError('Provide saved filter ids with --filter or a query with --jql');
}
