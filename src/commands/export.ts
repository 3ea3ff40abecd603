import chalk from 'chalk';
import { buildExportWorkbook, writeWorkbook } from '../core/workbook.js';
import type { TemplateExportOptions } from '../types/index.js';
import { createContext, handleError, printJson, withSpinner } from './shared.js';

/**
 * Writes one row per matching issue for first-time time logging.
 */
export async function exportTemplate(options: TemplateExportOptions): Promise<void> {
  try {
    const { config, reconciler } = createContext(options);
    const output = options.output ?? config.export.templateOutput;
    const rows = await withSpinner(
      'Fetching issues from Jira...',
      () => reconciler.exportTemplate(options),
      (found) => `Found ${found.length} issue(s)`,
      'Could not fetch issues'
    );

    if (rows.length === 0) {
      console.error(chalk.yellow('No issues matched the query; nothing exported.'));
      process.exitCode = 1;
      return;
    }

    await writeWorkbook(buildExportWorkbook(rows), output);

    if (options.json) {
      printJson({ success: true, output, issues: rows.length });
      return;
    }

    console.log(chalk.green(`✓ Exported ${rows.length} issue(s) to ${chalk.cyan(output)}`));
    console.log(chalk.dim(`Fill in 'Time Logged (hours)', 'Date' and optionally 'Comment', then run:`));
    console.log(chalk.dim(`  worklog-bridge import --input ${output}`));
  } catch (err) {
    handleError(err);
  }
}
