import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import { createInterface } from 'readline';
import { JiraClient } from '../core/jira-client.js';
import { Reconciler } from '../core/reconciler.js';
import { Session } from '../core/session.js';
import type { BridgeConfig, GlobalOptions, MutationResult, RowProblem } from '../types/index.js';
import { loadConfig, requireCredentials } from '../utils/config.js';
import { ConfigError, JiraApiError, QueryError, WorkbookError, errorMessage } from '../utils/errors.js';
import { truncate } from '../utils/formatters.js';
import { isJsonMode, logger, setJsonMode, setLogLevel } from '../utils/logger.js';

export interface CommandContext {
  config: BridgeConfig;
  client: JiraClient;
  reconciler: Reconciler;
}

export function setupOutput(options: GlobalOptions): void {
  if (options.verbose) {
    setLogLevel('debug');
  }
  if (options.json) {
    setJsonMode(true);
  }
}

/**
 * Config, a Jira client and a reconciler sharing one session.
 */
export function createContext(options: GlobalOptions): CommandContext {
  setupOutput(options);
  const config = loadConfig();
  const jira = requireCredentials(config.jira);
  const session = new Session();
  const client = new JiraClient(jira, { session });

  logger.debug('Using Jira', { baseUrl: client.baseUrl });
  return { config, client, reconciler: new Reconciler(client, session) };
}

export function createSpinner(text: string): Ora {
  return ora({ text, isSilent: isJsonMode() });
}

export function spinner(text: string): Ora {
  return createSpinner(text).start();
}

/**
 * Runs a remote phase behind a spinner. `succeed` returns the success line;
 * undefined just clears the spinner.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  succeed: (value: T) => string | undefined,
  failText: string
): Promise<T> {
  const progress = spinner(text);
  try {
    const value = await task();
    const line = succeed(value);
    if (line) {
      progress.succeed(line);
    } else {
      progress.stop();
    }
    return value;
  } catch (err) {
    progress.fail(failText);
    throw err;
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await new Promise<string>((resolve) => {
      rl.question(`${question} ${chalk.dim('[y/N]')} `, resolve);
    });
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

/**
 * Writes go ahead without asking under --yes, in dry runs and when no one is
 * at the terminal to answer.
 */
export function confirmWrites(
  options: { dryRun?: boolean; yes?: boolean },
  question: string
): Promise<boolean> {
  if (options.dryRun || options.yes || isJsonMode() || !process.stdin.isTTY) {
    return Promise.resolve(true);
  }
  return confirm(question);
}

export function printProblems(skipped: RowProblem[], errors: RowProblem[]): void {
  for (const problem of skipped) {
    logger.row('skipped', problem.row, problem.message);
  }
  for (const problem of errors) {
    logger.row('invalid', problem.row, problem.message);
  }
}

export function padRight(str: string, len: number): string {
  const plainStr = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - plainStr.length);
  return str + ' '.repeat(padding);
}

export function printResults(results: MutationResult[], title: string): void {
  if (results.length === 0) return;

  console.log(chalk.bold(`\n${title}\n`));
  console.log(
    chalk.bold(padRight('Issue Key', 14) + padRight('Worklog', 12) + padRight('Status', 10) + 'Message')
  );
  console.log(chalk.dim('─'.repeat(80)));

  for (const result of results) {
    const status = result.success ? chalk.green('✓ OK') : chalk.red('✗ Failed');
    console.log(
      padRight(result.issueKey, 14) +
        padRight(result.entryId ?? chalk.dim('-'), 12) +
        padRight(status, 10) +
        truncate(result.message, 60)
    );
  }

  const succeeded = results.filter((r) => r.success).length;
  const failed = results.length - succeeded;
  console.log(
    `\n${chalk.green(`${succeeded} succeeded`)}` +
      (failed > 0 ? `, ${chalk.red(`${failed} failed`)}` : '')
  );
}

/**
 * Logs an error that stops the command and marks the process as failed.
 */
export function handleError(err: unknown): void {
  if (err instanceof ConfigError || err instanceof QueryError || err instanceof WorkbookError) {
    logger.error(err.message);
  } else if (err instanceof JiraApiError) {
    logger.error(`Jira API error: ${err.message}`, { status: err.status, url: err.url });
  } else {
    logger.error(`Unexpected error: ${errorMessage(err)}`);
    if (err instanceof Error && err.stack) {
      logger.debug(err.stack);
    }
  }
  process.exitCode = 1;
}
