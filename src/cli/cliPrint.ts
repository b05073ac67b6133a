import pc from 'picocolors';

import type { KubePruneConfigMerged } from '../config/configSchema.js';
import type { PruneEvaluation } from '../core/pruner.js';
import { logger } from '../shared/logger.js';

const formatNumber = (num: number): string => num.toLocaleString();

/**
 * Prints a summary of the prune evaluation to the console.
 */
export const printSummary = (evaluation: PruneEvaluation, config: KubePruneConfigMerged, reportPath?: string) => {
  const { counts } = evaluation;

  logger.log(pc.white('📊 Prune Summary:'));
  logger.log(pc.dim('─────────────────'));
  logger.log(`${pc.white('      Namespace:')} ${pc.white(evaluation.namespace)}`);
  logger.log(`${pc.white('          Kinds:')} ${pc.white(evaluation.kinds.join(', '))}`);
  logger.log(`${pc.white('     Candidates:')} ${pc.white(formatNumber(evaluation.decisions.length))}`);
  logger.log(`${pc.white('      Prunable:')} ${pc.yellow(formatNumber(counts.prune))}`);
  logger.log(`${pc.white('         In use:')} ${pc.green(formatNumber(counts.keep))}`);

  if (counts.skipped > 0) {
    logger.log(`${pc.white('        Skipped:')} ${pc.dim(formatNumber(counts.skipped))}`);
  }
  if (counts.error > 0) {
    logger.log(`${pc.white('         Errors:')} ${pc.red(formatNumber(counts.error))}`);
  }
  if (reportPath) {
    logger.log(`${pc.white('    Report File:')} ${pc.white(reportPath)}`);
  }
  logger.log(`${pc.white('   Report Style:')} ${pc.white(config.output.style)}`);
};

export const printCompletion = (evaluation: PruneEvaluation) => {
  if (evaluation.counts.error > 0) {
    logger.warn('⚠️  Some resources could not be evaluated. See the errors above.');
    return;
  }
  logger.log(pc.green('🎉 All Done!'));
  logger.log(pc.white('Nothing was deleted; review the report before pruning.'));
};
