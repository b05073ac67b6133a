import process from 'node:process';

import { loadMergedConfig } from '../../config/configLoad.js';
import { generateReport } from '../../core/output/reportGenerate.js';
import { writeOutputToDisk } from '../../core/output/writeOutputToDisk.js';
import { type PruneEvaluation, evaluatePrune } from '../../core/pruner.js';
import { logger } from '../../shared/logger.js';
import { printCompletion, printSummary } from '../cliPrint.js';
import type { CliOptions } from '../types.js';

/**
 * Evaluates the configured namespace and reports which resources are unused.
 * Sets a non-zero exit code when any candidate could not be decided.
 */
export const runPruneAction = async (options: CliOptions, cwd = process.cwd()): Promise<PruneEvaluation> => {
  logger.trace('CLI options received:', options);

  const config = await loadMergedConfig(options, cwd);

  const evaluation = await evaluatePrune(config, (message) => logger.info(message));
  const report = generateReport(evaluation, config.output.style);

  let reportPath: string | undefined;
  if (config.output.filePath) {
    reportPath = await writeOutputToDisk(report, config);
  } else {
    process.stdout.write(report);
  }

  // Machine-readable reports on stdout stay clean
  if (reportPath || config.output.style === 'text') {
    logger.log('');
    printSummary(evaluation, config, reportPath);
    logger.log('');
    printCompletion(evaluation);
  }

  if (evaluation.counts.error > 0) {
    process.exitCode = 1;
  }

  return evaluation;
};
