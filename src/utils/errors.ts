/**
 * Raised for any non-2xx response from the Jira REST API.
 * `messages` carries Jira's `errorMessages` plus any field errors.
 */
export class JiraApiError extends Error {
  constructor(
    readonly status: number,
    readonly messages: string[],
    readonly url: string
  ) {
    super(messages.length > 0 ? messages.join(' ') : `Jira API error (${status})`);
    this.name = 'JiraApiError';
  }

  get notFound(): boolean {
    return this.status === 404;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class WorkbookError extends Error {
  constructor(
    message: string,
    readonly file?: string
  ) {
    super(message);
    this.name = 'WorkbookError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The command line did not resolve to a runnable JQL query.
 */
export class QueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueryError';
  }
}
