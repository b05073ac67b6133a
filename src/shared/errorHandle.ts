// src/shared/errorHandle.ts
import { z } from 'zod';

import { kubePruneLogLevels, logger } from './logger.js';

// Base class for application-specific errors
export class KubePruneError extends Error {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KubePruneError';
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, KubePruneError.prototype);
  }
}

// Configuration file or CLI arguments failed validation
export class KubePruneConfigValidationError extends KubePruneError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'KubePruneConfigValidationError';
    Object.setPrototypeOf(this, KubePruneConfigValidationError.prototype);
  }
}

// kubectl exited with an error
export class KubectlError extends KubePruneError {
  public readonly stderr?: string;
  public readonly command?: string;

  constructor(message: string, stderr?: string, command?: string) {
    super(message, 500);
    this.name = 'KubectlError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, KubectlError.prototype);
  }
}

// Listing pods, service accounts or candidates failed
export class FetchError extends KubePruneError {
  public readonly resource: string;
  public readonly namespace: string;

  constructor(resource: string, namespace: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to list ${resource} in namespace '${namespace}': ${reason}`, 502, { cause });
    this.name = 'FetchError';
    this.resource = resource;
    this.namespace = namespace;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

// A resource payload does not have the shape its kind implies
export class ConversionError extends KubePruneError {
  public readonly kind: string;
  public readonly resourceName: string;

  constructor(kind: string, resourceName: string, reason: string) {
    super(`Cannot read ${kind}/${resourceName} as a ${kind}: ${reason}`, 422);
    this.name = 'ConversionError';
    this.kind = kind;
    this.resourceName = resourceName;
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

// A PodDisruptionBudget carries a label selector that cannot be compiled
export class SelectorError extends KubePruneError {
  public readonly podDisruptionBudget: string;

  constructor(podDisruptionBudget: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`invalid label selector (${podDisruptionBudget}): ${reason}`, 422, { cause });
    this.name = 'SelectorError';
    this.podDisruptionBudget = podDisruptionBudget;
    Object.setPrototypeOf(this, SelectorError.prototype);
  }
}

export class UnsupportedKindError extends KubePruneError {
  public readonly kind: string;
  public readonly resourceName: string;

  constructor(kind: string, resourceName: string) {
    super(`unsupported kind: ${kind}/${resourceName}`, 400);
    this.name = 'UnsupportedKindError';
    this.kind = kind;
    this.resourceName = resourceName;
    Object.setPrototypeOf(this, UnsupportedKindError.prototype);
  }
}

/**
 * Handles errors caught at the top level.
 * Logs the error appropriately and provides user feedback.
 */
export const handleError = (error: unknown): void => {
  logger.log('');

  if (error instanceof KubePruneError) {
    logger.error(`✖ ${error.message}`);
    if (error instanceof KubectlError && error.stderr) {
      logger.error(`Command stderr:\n${error.stderr}`);
    }
    if (error instanceof FetchError && error.cause instanceof KubectlError && error.cause.stderr) {
      logger.error(`Command stderr:\n${error.cause.stderr}`);
    }
    // Stack traces for known errors only in debug mode
    if (logger.getLogLevel() >= kubePruneLogLevels.DEBUG) {
      logger.debug('Stack trace:', error.stack);
    }
  } else if (error instanceof Error) {
    logger.error(`✖ Unexpected error: ${error.message}`);
    logger.note('Stack trace:', error.stack);
    if (logger.getLogLevel() < kubePruneLogLevels.DEBUG) {
      logger.log('');
      logger.note('For more detailed information, run with the --verbose flag.');
    }
  } else {
    logger.error('✖ An unknown error occurred.');
    logger.error('Error details:', error);
    if (logger.getLogLevel() < kubePruneLogLevels.DEBUG) {
      logger.log('');
      logger.note('For more detailed information, run with the --verbose flag.');
    }
  }
};

/**
 * Formats zod issues as `[path]: message` lines.
 */
export const formatZodIssues = (error: z.ZodError, rootLabel = 'config'): string =>
  error.errors.map((err) => `[${err.path.join('.') || rootLabel}]: ${err.message}`).join('\n  ');

/**
 * Checks if an error is a Zod validation error and throws a
 * KubePruneConfigValidationError if it is.
 *
 * @param error - The error object caught.
 * @param message - A prefix message for the validation error.
 */
export const rethrowValidationErrorIfZodError = (error: unknown, message: string): void => {
  if (error instanceof z.ZodError) {
    throw new KubePruneConfigValidationError(
      `${message}\n\n  ${formatZodIssues(error)}\n\nPlease check your configuration and try again.`,
    );
  }
};
