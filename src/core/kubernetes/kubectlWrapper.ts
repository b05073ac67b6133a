import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { KubePruneError, KubectlError } from '../../shared/errorHandle.js';
import { logger } from '../../shared/logger.js';

const execFileAsync = promisify(execFile);

// Pod lists of large namespaces easily exceed the default 1 MiB
const KUBECTL_MAX_BUFFER = 64 * 1024 * 1024;

export interface KubectlResult {
  stdout: string;
  stderr: string;
  command: string; // The exact command string executed
}

export interface KubectlOptions {
  kubeconfigPath?: string;
  context?: string;
  signal?: AbortSignal;
}

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || ('code' in error && error.code === 'ABORT_ERR'));

/**
 * Executes a kubectl command with the given arguments.
 *
 * @param args - Command arguments (e.g., ['get', 'pods', '-n', 'default']).
 * @param options - kubeconfig/context selection and an optional abort signal.
 * @throws KubePruneError if kubectl is not found or the command is aborted.
 * @throws KubectlError if kubectl exits with an error.
 */
export const executeKubectlCommand = async (args: string[], options: KubectlOptions = {}): Promise<KubectlResult> => {
  const commandArgs: string[] = [];

  if (options.kubeconfigPath) {
    commandArgs.push('--kubeconfig', options.kubeconfigPath);
  }
  if (options.context) {
    commandArgs.push('--context', options.context);
  }

  commandArgs.push(...args);

  const commandString = `kubectl ${commandArgs.join(' ')}`;
  logger.trace(`Executing: ${commandString}`);

  try {
    const { stdout, stderr } = await execFileAsync('kubectl', commandArgs, {
      encoding: 'utf8',
      maxBuffer: KUBECTL_MAX_BUFFER,
      signal: options.signal,
    });

    if (stderr) {
      logger.warn(`kubectl stderr for command "${commandString}":\n${stderr}`);
    }

    logger.trace(`kubectl stdout for command "${commandString}": ${stdout.length} chars`);
    return { stdout, stderr, command: commandString };
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';

    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new KubePruneError('kubectl command not found. Please ensure kubectl is installed and in your PATH.', 500);
    }

    if (isAbortError(error)) {
      throw new KubePruneError(`kubectl command "${commandString}" was aborted`, 499, { cause: error });
    }

    logger.debug(`kubectl command "${commandString}" failed:`, errorMessage);

    // execFile errors carry the child's stderr
    let stderrOutput = '';
    let detailedError: string;
    if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
      stderrOutput = error.stderr.trim();
      detailedError = `kubectl command failed: ${stderrOutput || errorMessage}`;
    } else {
      detailedError = `kubectl command failed: ${errorMessage}`;
    }

    throw new KubectlError(detailedError, stderrOutput, commandString);
  }
};

/**
 * Runs `kubectl get <resource> -n <namespace> -o json` and returns the parsed JSON.
 *
 * @param resource - One resource name or a comma-separated list (e.g. 'configmaps,secrets').
 */
export const getResourcesJson = async (
  resource: string,
  namespace: string,
  options: KubectlOptions = {},
): Promise<unknown> => {
  logger.debug(`Fetching ${resource} in namespace '${namespace}'...`);
  const { stdout, command } = await executeKubectlCommand(['get', resource, '-n', namespace, '-o', 'json'], options);

  try {
    return JSON.parse(stdout);
  } catch (error) {
    throw new KubePruneError(
      `Invalid JSON from "${command}": ${error instanceof Error ? error.message : 'Unknown error'}`,
      500,
    );
  }
};
