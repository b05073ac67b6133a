import * as fs from 'node:fs/promises';
import path from 'node:path';

import { resolveKindAlias } from '../core/kubernetes/resourceKinds.js';
import {
  KubePruneConfigValidationError,
  KubePruneError,
  rethrowValidationErrorIfZodError,
} from '../shared/errorHandle.js';
import { logger } from '../shared/logger.js';
import {
  type KubePruneConfigCli,
  type KubePruneConfigFile,
  type KubePruneConfigMerged,
  defaultConfig,
  kubePruneConfigCliSchema,
  kubePruneConfigFileSchema,
  kubePruneConfigMergedSchema,
  kubePruneOutputStyleSchema,
} from './configSchema.js';

export const defaultConfigFileName = 'kubeprune.config.json';

const isErrnoError = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

// Loads config from a file path, validates it against the schema
const loadAndValidateConfig = async (filePath: string): Promise<KubePruneConfigFile> => {
  try {
    const fileContent = await fs.readFile(filePath, 'utf-8');
    const configData: unknown = JSON.parse(fileContent);
    return kubePruneConfigFileSchema.parse(configData);
  } catch (error: unknown) {
    rethrowValidationErrorIfZodError(error, `Invalid configuration in ${filePath}`);
    if (error instanceof SyntaxError) {
      throw new KubePruneError(`Invalid JSON syntax in config file ${filePath}: ${error.message}`);
    }
    if (error instanceof Error && 'code' in error && error.code !== 'ENOENT') {
      throw new KubePruneError(`Error reading config file ${filePath}: ${error.message}`);
    }
    throw new KubePruneError(
      `Failed to load config from ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
};

/**
 * Loads the config file given by --config, or kubeprune.config.json from rootDir when present.
 *
 * @returns The validated file config, or an empty object when no default config file exists.
 */
export const loadConfig = async (rootDir: string, cliConfigPath: string | null): Promise<KubePruneConfigFile> => {
  const isExplicitPath = cliConfigPath !== null;
  const configPathToTry = path.resolve(rootDir, cliConfigPath ?? defaultConfigFileName);
  logger.trace(`Attempting to load ${isExplicitPath ? 'explicit' : 'default local'} config from: ${configPathToTry}`);

  try {
    const stats = await fs.stat(configPathToTry);
    if (stats.isFile()) {
      return await loadAndValidateConfig(configPathToTry);
    }
  } catch (error: unknown) {
    if (!isErrnoError(error, 'ENOENT')) {
      throw error;
    }
  }

  if (isExplicitPath) {
    throw new KubePruneError(`Specified config file not found at ${configPathToTry}`);
  }

  logger.trace(`No local config found at ${configPathToTry}. Using default settings.`);
  return {};
};

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Later sources win; nested objects merge, arrays and scalars replace
const deepMerge = (target: PlainObject, source: unknown): PlainObject => {
  if (!isPlainObject(source)) {
    return target;
  }
  const result: PlainObject = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
};

/**
 * Merges default, file and CLI configuration.
 * CLI kinds replace file kinds; CLI excluded names are added to the file's.
 */
export const mergeConfigs = (
  cwd: string,
  fileConfig: KubePruneConfigFile,
  cliConfig: KubePruneConfigCli,
): KubePruneConfigMerged => {
  logger.trace('Merging configurations...');
  logger.trace('Default config:', defaultConfig);
  logger.trace('File config:', fileConfig);
  logger.trace('CLI config:', cliConfig);

  let merged = deepMerge(deepMerge({}, defaultConfig), fileConfig);

  const excludeNames = new Set<string>([
    ...(fileConfig.prune?.excludeNames ?? []),
    ...(cliConfig.prune?.excludeNames ?? []),
  ]);
  merged = deepMerge(merged, cliConfig);
  merged = deepMerge(merged, { prune: { excludeNames: [...excludeNames] }, cwd });

  try {
    const finalConfig = kubePruneConfigMergedSchema.parse(merged);
    logger.trace('Final merged config:', finalConfig);
    return finalConfig;
  } catch (error) {
    rethrowValidationErrorIfZodError(error, 'Invalid merged configuration');
    throw new KubePruneError(
      `Configuration merging failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }
};

// Options as they come from the command line parser
export interface CliInputOptions {
  namespace?: string;
  kinds?: string;
  exclude?: string;
  kubeconfig?: string;
  context?: string;
  style?: string;
  output?: string;
  timeout?: string | number;
  config?: string;
  [key: string]: unknown;
}

const splitList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

/**
 * Builds a partial configuration object from CLI options.
 *
 * @throws KubePruneConfigValidationError for unknown kinds or a non-positive timeout.
 */
export const buildCliConfig = (options: CliInputOptions): KubePruneConfigCli => {
  const cliConfig: KubePruneConfigCli = {};

  if (options.output) {
    cliConfig.output = { ...cliConfig.output, filePath: options.output };
  }
  if (options.style) {
    const style = kubePruneOutputStyleSchema.safeParse(options.style.toLowerCase());
    if (style.success) {
      cliConfig.output = { ...cliConfig.output, style: style.data };
    } else {
      logger.warn(`Invalid style specified: ${options.style}. Defaulting to text.`);
    }
  }

  if (options.kubeconfig) {
    cliConfig.kubernetes = { ...cliConfig.kubernetes, kubeconfigPath: options.kubeconfig };
  }
  if (options.context) {
    cliConfig.kubernetes = { ...cliConfig.kubernetes, context: options.context };
  }
  if (options.namespace) {
    cliConfig.kubernetes = { ...cliConfig.kubernetes, namespace: options.namespace.trim() };
  }

  if (options.kinds) {
    const kinds = splitList(options.kinds).map((input) => {
      const kind = resolveKindAlias(input);
      if (!kind) {
        throw new KubePruneConfigValidationError(
          `Unknown resource kind: ${input}. Supported kinds: configmaps, secrets, persistentvolumeclaims, pods, poddisruptionbudgets`,
        );
      }
      return kind;
    });
    if (kinds.length) {
      cliConfig.prune = { ...cliConfig.prune, kinds: [...new Set(kinds)] };
      logger.debug(`Evaluating kinds from CLI: ${kinds.join(', ')}`);
    }
  }

  if (options.exclude) {
    const excludeNames = splitList(options.exclude);
    if (excludeNames.length) {
      cliConfig.prune = { ...cliConfig.prune, excludeNames };
      logger.debug(`Excluding names from CLI: ${excludeNames.join(', ')}`);
    }
  }

  if (options.timeout !== undefined) {
    const timeoutMs = Number.parseInt(options.timeout.toString(), 10);
    if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
      throw new KubePruneConfigValidationError(`Invalid timeout value: ${options.timeout}. Expected milliseconds > 0.`);
    }
    cliConfig.prune = { ...cliConfig.prune, timeoutMs };
  }

  try {
    return kubePruneConfigCliSchema.parse(cliConfig);
  } catch (error) {
    rethrowValidationErrorIfZodError(error, 'Invalid CLI arguments');
    throw error;
  }
};

/**
 * Loads and merges config in one go. Used by CLI actions.
 */
export const loadMergedConfig = async (options: CliInputOptions, cwd = process.cwd()): Promise<KubePruneConfigMerged> => {
  const fileConfig = await loadConfig(cwd, options.config ?? null);
  const cliConfig = buildCliConfig(options);
  return mergeConfigs(cwd, fileConfig, cliConfig);
};
