import chalk from 'chalk';
import { formatProblem } from '../core/diff-engine.js';
import type { RowResult } from '../core/workbook.js';
import {
  loadWorkbook,
  markSummaryResults,
  readSummaryRows,
  syncedPath,
  writeWorkbook,
} from '../core/workbook.js';
import type { ChangeRecord, ImportOptions } from '../types/index.js';
import { logger } from '../utils/logger.js';
import {
  confirmWrites,
  createContext,
  createSpinner,
  handleError,
  padRight,
  printJson,
  printProblems,
  printResults,
} from './shared.js';

function printChanges(changes: ChangeRecord[]): void {
  console.log(chalk.bold(`\n${changes.length} change(s) detected\n`));
  for (const change of changes) {
    const hours = change.originalHours === change.newHours
      ? chalk.dim(`${change.newHours}h`)
      : `${chalk.dim(`${change.originalHours}h`)} -> ${chalk.green(`${change.newHours}h`)}`;
    const note = change.originalNote === change.newNote ? '' : chalk.dim(' (comment changed)');
    console.log(`  ${padRight(change.issueKey, 14)}${padRight(change.entryId, 12)}${hours}${note}`);
  }
}

/**
 * Diffs an edited "Worklog Summary" workbook and pushes the changed rows.
 */
export async function updateWorklogs(options: ImportOptions): Promise<void> {
  try {
    const { reconciler } = createContext(options);
    const workbook = await loadWorkbook(options.input);
    const rows = readSummaryRows(workbook);
    logger.debug(`Read ${rows.length} row(s) from ${options.input}`);

    const progress = createSpinner(options.dryRun ? 'Validating changes...' : 'Updating work logs...');

    const { report, results, cancelled } = await reconciler.importSummary(rows, {
      dryRun: options.dryRun,
      beforeApply: async (diff) => {
        printProblems(diff.skipped, diff.errors);
        if (!options.json) printChanges(diff.changes);
        const ok = await confirmWrites(options, `Update ${diff.changes.length} work log(s) in Jira?`);
        if (ok) progress.start();
        return ok;
      },
      onProgress: (done, total) => {
        progress.text = `${options.dryRun ? 'Validating' : 'Updating'} work logs (${done}/${total})...`;
      },
    });
    progress.stop();

    if (report.changes.length === 0) {
      printProblems(report.skipped, report.errors);
    }

    if (options.json) {
      printJson({
        dryRun: options.dryRun ?? false,
        cancelled,
        unchanged: report.unchanged,
        results,
        skipped: report.skipped.map(formatProblem),
        errors: report.errors.map(formatProblem),
      });
    } else if (cancelled) {
      console.log(chalk.yellow('Cancelled; nothing was written to Jira.'));
    } else if (report.changes.length === 0) {
      console.log(chalk.yellow(`No changes detected (${report.unchanged} row(s) unchanged).`));
    } else {
      if (options.dryRun) {
        console.log(chalk.yellow('DRY RUN: no work logs were updated.'));
      }
      printResults(results, options.dryRun ? 'Validation results' : 'Update results');
      console.log(chalk.dim(`${report.unchanged} row(s) unchanged`));
    }

    if (!options.dryRun && results.length > 0) {
      const rowResults: RowResult[] = [];
      results.forEach((result, index) => {
        const row = report.changes[index]?.row;
        if (row !== undefined) rowResults.push({ row, result });
      });
      markSummaryResults(workbook, rowResults);
      const output = syncedPath(options.input);
      await writeWorkbook(workbook, output);
      logger.info(`Update status written to ${output}`);
    }

    if (report.errors.length > 0 || results.some((r) => !r.success)) {
      process.exitCode = 1;
    }
  } catch (err) {
    handleError(err);
  }
}
