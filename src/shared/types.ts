// src/shared/types.ts

/**
 * Callback for reporting progress during long operations.
 *
 * @param message - The progress message to report.
 */
export type ProgressCallback = (message: string) => void;
