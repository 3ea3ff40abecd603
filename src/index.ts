#!/usr/bin/env node

import { Command, Option } from 'commander';
import { testConnection } from './commands/connection.js';
import { exportTemplate } from './commands/export.js';
import { listFilters } from './commands/filters.js';
import { importWorklogs } from './commands/import.js';
import { exportSummary } from './commands/summary.js';
import { updateWorklogs } from './commands/update.js';
import type {
  GlobalOptions,
  ImportOptions,
  SummaryExportOptions,
  TemplateExportOptions,
} from './types/index.js';

const program = new Command();

program
  .name('worklog-bridge')
  .description('Round-trip Jira worklogs through an Excel workbook')
  .version('0.1.0');

// --filter may be repeated and each value may hold a comma-separated list
const collectFilters = (value: string, previous: string[]): string[] => [...previous, value];

// Common options for every command
const commonOptions = (cmd: Command) =>
  cmd
    .option('--verbose', 'Show debug logging, including every Jira request')
    .option('--json', 'Output in JSON format');

const queryOptions = (cmd: Command) =>
  cmd
    .option('-f, --filter <ids>', 'Saved filter id(s), comma-separated or repeated', collectFilters, [])
    .option('-q, --jql <query>', 'JQL query (used when no filter is given)')
    .option('-o, --output <file>', 'Workbook to write');

const importOptions = (cmd: Command) =>
  cmd
    .requiredOption('-i, --input <file>', 'Workbook to read')
    .option('--dry-run', 'Validate against Jira without writing anything')
    .option('-y, --yes', 'Do not ask for confirmation before writing');

commonOptions(
  program
    .command('test')
    .description('Check the Jira connection and credentials')
)
  .action(async (options: GlobalOptions) => {
    await testConnection(options);
  });

commonOptions(
  program
    .command('filters')
    .description('List your favourite Jira filters')
)
  .action(async (options: GlobalOptions) => {
    await listFilters(options);
  });

commonOptions(
  queryOptions(
    program
      .command('export')
      .description('Export issues to a workbook template for logging new time')
  )
)
  .action(async (options: TemplateExportOptions) => {
    await exportTemplate(options);
  });

commonOptions(
  importOptions(
    program
      .command('import')
      .description('Add the work logs filled into a template workbook')
  )
)
  .action(async (options: ImportOptions) => {
    await importWorklogs(options);
  });

commonOptions(
  queryOptions(
    program
      .command('summary')
      .description('Export existing work logs to a workbook for editing')
  )
    .addOption(
      new Option('-t, --time-range <range>', 'Only work logs from this calendar month')
        .choices(['current', 'previous'])
    )
    .option('--all-users', "Include other users' work logs")
    .option('--issues-only', 'Leave out issues without work logs')
    .option('--group-by-hierarchy', 'Arrange rows as an Epic > Story > Subtask tree')
    .option('--include-orphans', 'With --group-by-hierarchy, also list issues outside any Epic')
)
  .action(async (options: SummaryExportOptions) => {
    await exportSummary(options);
  });

commonOptions(
  importOptions(
    program
      .command('update')
      .description('Push edits made in a summary workbook back to Jira')
  )
)
  .action(async (options: ImportOptions) => {
    await updateWorklogs(options);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
