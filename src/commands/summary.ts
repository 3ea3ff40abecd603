import chalk from 'chalk';
import { buildSummaryWorkbook, writeWorkbook } from '../core/workbook.js';
import type { SummaryExportOptions } from '../types/index.js';
import { formatHours } from '../utils/formatters.js';
import { createContext, handleError, printJson, withSpinner } from './shared.js';

/**
 * Exports existing worklogs for editing, optionally as an Epic tree.
 */
export async function exportSummary(options: SummaryExportOptions): Promise<void> {
  try {
    const { config, reconciler } = createContext(options);
    const output = options.output ?? config.export.summaryOutput;

    const summary = await withSpinner(
      'Fetching issues and work logs from Jira...',
      () =>
        reconciler.exportSummary(options, {
          allUsers: options.allUsers,
          timeRange: options.timeRange,
          groupByHierarchy: options.groupByHierarchy,
          issuesOnly: options.issuesOnly,
          includeOrphans: options.includeOrphans,
          indentUnit: config.export.indentUnit,
          connector: config.export.connector,
        }),
      (result) => `Found ${result.issues.length} issue(s) and ${result.entries.length} work log(s)`,
      'Could not fetch work logs'
    );

    if (summary.rows.length === 0) {
      console.error(chalk.yellow('No work logs found to export.'));
      console.error(chalk.dim('Check the query, the time range and whether --all-users is needed.'));
      process.exitCode = 1;
      return;
    }

    await writeWorkbook(buildSummaryWorkbook(summary.rows), output);
    const { totals } = summary;

    if (options.json) {
      printJson({
        success: true,
        output,
        rows: summary.rows.length,
        epicGroups: summary.epicGroups,
        omittedOrphans: summary.omittedOrphans,
        totals: { ...totals, totalHours: formatHours(totals.totalSeconds) },
      });
      return;
    }

    console.log(chalk.green(`\n✓ Worklog summary written to ${chalk.cyan(output)}`));
    console.log(`  Total entries: ${chalk.green(String(totals.entries))}`);
    console.log(`    Issues with work logs: ${chalk.cyan(String(totals.issuesWithTime))}`);
    console.log(`    Issues without work logs: ${chalk.yellow(String(totals.issuesWithoutTime))}`);
    console.log(`  Total time logged: ${chalk.green(`${formatHours(totals.totalSeconds)} hours`)}`);
    if (options.timeRange) {
      console.log(`  Time range: ${chalk.cyan(`${options.timeRange} month`)}`);
    }
    if (!options.allUsers) {
      console.log(`  User filter: ${chalk.cyan('current user only')}`);
    }
    if (options.groupByHierarchy) {
      console.log(`  Epics: ${chalk.cyan(String(summary.epicGroups))}`);
      if (summary.omittedOrphans > 0) {
        console.log(
          chalk.yellow(`  ${summary.omittedOrphans} issue(s) outside any Epic left out; add --include-orphans to list them`)
        );
      }
    }

    console.log(chalk.dim('\nEdit Time Logged (hours) and Comment (originals stay in the gray columns), then run:'));
    console.log(chalk.dim(`  worklog-bridge update --input ${output} --dry-run`));
  } catch (err) {
    handleError(err);
  }
}
