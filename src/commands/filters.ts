import chalk from 'chalk';
import type { GlobalOptions } from '../types/index.js';
import { truncate } from '../utils/formatters.js';
import { createContext, handleError, padRight, printJson, withSpinner } from './shared.js';

export async function listFilters(options: GlobalOptions): Promise<void> {
  try {
    const { client } = createContext(options);
    const filters = await withSpinner(
      'Fetching favourite filters...',
      () => client.listFilters(),
      () => undefined,
      'Could not list filters'
    );

    if (options.json) {
      printJson(filters);
      return;
    }

    if (filters.length === 0) {
      console.log(chalk.dim('No favourite filters found.'));
      console.log(chalk.dim('Star a filter in Jira to make it available here.'));
      return;
    }

    console.log(chalk.bold('\nFavourite filters\n'));
    console.log(chalk.bold(padRight('ID', 10) + padRight('Name', 30) + 'JQL'));
    console.log(chalk.dim('─'.repeat(80)));

    for (const filter of filters) {
      console.log(
        padRight(chalk.cyan(filter.id), 10) +
          padRight(truncate(filter.name, 28), 30) +
          chalk.dim(truncate(filter.jql, 50))
      );
    }

    console.log(chalk.dim(`\n${filters.length} filter(s). Use --filter <id> to export issues.`));
  } catch (err) {
    handleError(err);
  }
}
