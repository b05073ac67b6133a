// src/core/output/writeOutputToDisk.ts
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { KubePruneConfigMerged } from '../../config/configSchema.js';
import { KubePruneError } from '../../shared/errorHandle.js';
import { logger } from '../../shared/logger.js';

/**
 * Writes the report to output.filePath, creating missing directories.
 *
 * @returns The absolute path written to.
 */
export const writeOutputToDisk = async (outputString: string, config: KubePruneConfigMerged): Promise<string> => {
  const outputPath = config.output.filePath;
  if (!outputPath) {
    throw new KubePruneError('Output file path is not defined in configuration');
  }

  const absoluteOutputPath = path.isAbsolute(outputPath) ? outputPath : path.resolve(config.cwd, outputPath);

  try {
    await mkdir(path.dirname(absoluteOutputPath), { recursive: true });
    await writeFile(absoluteOutputPath, outputString, 'utf8');
    logger.debug(`Report written to: ${absoluteOutputPath}`);
    return absoluteOutputPath;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to write report to ${absoluteOutputPath}: ${message}`);
    throw new KubePruneError(`Failed to write output file: ${message}`);
  }
};
