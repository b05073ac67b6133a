// src/shared/constants.ts

export const TOOL_NAME = 'kubeprune';
export const TOOL_VERSION = '0.1.0';

// Phase a pod must report to count as live
export const POD_PHASE_RUNNING = 'Running';
