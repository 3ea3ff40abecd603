import chalk from 'chalk';
import { formatProblem } from '../core/diff-engine.js';
import type { RowResult } from '../core/workbook.js';
import {
  loadWorkbook,
  markExportResults,
  readExportRows,
  syncedPath,
  writeWorkbook,
} from '../core/workbook.js';
import type { ImportOptions } from '../types/index.js';
import { logger } from '../utils/logger.js';
import {
  confirmWrites,
  createContext,
  createSpinner,
  handleError,
  printJson,
  printProblems,
  printResults,
} from './shared.js';

/**
 * Creates worklogs from a filled-in "Work Logs" template.
 */
export async function importWorklogs(options: ImportOptions): Promise<void> {
  try {
    const { reconciler } = createContext(options);
    const workbook = await loadWorkbook(options.input);
    const rows = readExportRows(workbook);
    logger.debug(`Read ${rows.length} row(s) from ${options.input}`);

    const progress = createSpinner(options.dryRun ? 'Validating work logs...' : 'Adding work logs...');

    const outcome = await reconciler.importTemplate(rows, {
      dryRun: options.dryRun,
      beforeApply: async (report) => {
        printProblems(report.skipped, report.errors);
        const ok = await confirmWrites(options, `Add ${report.entries.length} work log(s) to Jira?`);
        if (ok) progress.start();
        return ok;
      },
      onProgress: (done, total) => {
        progress.text = `${options.dryRun ? 'Validating' : 'Adding'} work logs (${done}/${total})...`;
      },
    });
    progress.stop();

    const { report, results, cancelled } = outcome;
    if (report.entries.length === 0) {
      printProblems(report.skipped, report.errors);
    }

    if (options.json) {
      printJson({
        dryRun: options.dryRun ?? false,
        cancelled,
        results,
        skipped: report.skipped.map(formatProblem),
        errors: report.errors.map(formatProblem),
      });
    } else if (cancelled) {
      console.log(chalk.yellow('Cancelled; nothing was written to Jira.'));
    } else if (report.entries.length === 0) {
      console.log(chalk.yellow('No valid work log entries found in the workbook.'));
    } else {
      if (options.dryRun) {
        console.log(chalk.yellow('DRY RUN: no work logs were added.'));
      }
      printResults(results, options.dryRun ? 'Validation results' : 'Import results');
    }

    if (!options.dryRun && results.length > 0) {
      const rowResults: RowResult[] = [];
      results.forEach((result, index) => {
        const row = report.entries[index]?.row;
        if (row !== undefined) rowResults.push({ row, result });
      });
      markExportResults(workbook, rowResults);
      const output = syncedPath(options.input);
      await writeWorkbook(workbook, output);
      logger.info(`Sync status written to ${output}`);
    }

    if (report.errors.length > 0 || results.some((r) => !r.success)) {
      process.exitCode = 1;
    }
  } catch (err) {
    handleError(err);
  }
}
