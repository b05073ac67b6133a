import process from 'node:process';
import { Command, Option } from 'commander';
import pc from 'picocolors';

import { TOOL_NAME, TOOL_VERSION } from '../shared/constants.js';
import { handleError } from '../shared/errorHandle.js';
import { kubePruneLogLevels, logger } from '../shared/logger.js';
import { runPruneAction } from './actions/pruneAction.js';
import type { CliOptions } from './types.js';

const commanderActionEndpoint = async (options: CliOptions = {}) => {
  await runCli(options);
};

/**
 * Builds the command line program. The action runs the prune report.
 */
export const createProgram = (): Command =>
  new Command()
    .name(TOOL_NAME)
    .description(`${TOOL_NAME} - Report ConfigMaps, Secrets, PVCs, Pods and PodDisruptionBudgets no longer in use`)
    .version(TOOL_VERSION)
    .option('-n, --namespace <name>', 'Namespace to evaluate (default: default)')
    .option(
      '--kinds <kind1,kind2,...>',
      'Kinds to evaluate (comma-separated; configmaps, secrets, pvc, pods, pdb; default: all)',
    )
    .option('--exclude <name1,name2,...>', 'Resource names never reported as prunable (comma-separated)')
    .option('--kubeconfig <path>', 'Path to the kubeconfig file')
    .option('--context <name>', 'Kubernetes context to use')
    .option('--timeout <ms>', 'Abort listing cluster resources after this many milliseconds')
    .option('--style <type>', 'Report style: text, json or yaml (default: text)')
    .option('-o, --output <file>', 'Write the report to a file instead of stdout')
    .option('-c, --config <path>', 'Path to a custom config file')
    .addOption(new Option('--verbose', 'Enable verbose logging').conflicts('quiet'))
    .addOption(new Option('--quiet', 'Disable informational output').conflicts('verbose'))
    .action(commanderActionEndpoint);

export const run = async (argv: string[] = process.argv) => {
  try {
    const program = createProgram();
    await program.parseAsync(argv);
  } catch (error) {
    handleError(error);
    process.exit(1);
  }
};

export const runCli = async (options: CliOptions) => {
  if (options.quiet) {
    logger.setLogLevel(kubePruneLogLevels.SILENT);
  } else if (options.verbose) {
    logger.setLogLevel(kubePruneLogLevels.DEBUG);
  } else {
    logger.setLogLevel(kubePruneLogLevels.INFO);
  }

  logger.trace('cwd:', process.cwd());
  logger.trace('options:', options);

  logger.log(pc.dim(`\n✂️  ${TOOL_NAME} v${TOOL_VERSION}\n`));

  await runPruneAction(options);
};
