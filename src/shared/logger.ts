// src/shared/logger.ts
import util from 'node:util';
import pc from 'picocolors';

// Log levels as an enum-like constant object
export const kubePruneLogLevels = {
  SILENT: -1, // No output at all
  ERROR: 0, // Only errors
  WARN: 1, // Errors and warnings
  INFO: 2, // Errors, warnings, and informational messages (default)
  DEBUG: 3, // Everything, including debug and trace
} as const;

export type KubePruneLogLevel = (typeof kubePruneLogLevels)[keyof typeof kubePruneLogLevels];

class KubePruneLogger {
  private level: KubePruneLogLevel = kubePruneLogLevels.INFO;

  constructor() {
    this.init();
  }

  init() {
    this.setLogLevel(kubePruneLogLevels.INFO);
  }

  setLogLevel(level: KubePruneLogLevel) {
    this.level = level;
  }

  getLogLevel(): KubePruneLogLevel {
    return this.level;
  }

  error(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.ERROR) {
      console.error(pc.red(this.formatArgs(args)));
    }
  }

  warn(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.WARN) {
      console.warn(pc.yellow(this.formatArgs(args)));
    }
  }

  info(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.INFO) {
      console.log(pc.cyan(this.formatArgs(args)));
    }
  }

  // Plain output without styling
  log(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.INFO) {
      console.log(this.formatArgs(args));
    }
  }

  // Less important informational messages
  note(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.INFO) {
      console.log(pc.dim(this.formatArgs(args)));
    }
  }

  debug(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.DEBUG) {
      console.log(pc.blue(`[DEBUG] ${this.formatArgs(args)}`));
    }
  }

  trace(...args: unknown[]) {
    if (this.level >= kubePruneLogLevels.DEBUG) {
      console.log(pc.gray(`[TRACE] ${this.formatArgs(args)}`));
    }
  }

  // Objects go through util.inspect so nested manifests stay readable
  private formatArgs(args: unknown[]): string {
    return args
      .map((arg) =>
        typeof arg === 'object' && arg !== null ? util.inspect(arg, { depth: null, colors: pc.isColorSupported }) : arg,
      )
      .join(' ');
  }
}

export const logger = new KubePruneLogger();

export const setLogLevel = (level: KubePruneLogLevel) => {
  logger.setLogLevel(level);
};
