import { z } from 'zod';
import { prunableKinds } from '../core/kubernetes/resourceKinds.js';

// --- Output Configuration ---

export const kubePruneOutputStyleSchema = z.enum(['text', 'json', 'yaml']);
export type KubePruneOutputStyle = z.infer<typeof kubePruneOutputStyleSchema>;

const outputConfigSchema = z.object({
  filePath: z.string().optional().describe('Write the report to this file instead of stdout'),
  style: kubePruneOutputStyleSchema.optional().describe('Report format'),
});

// --- Kubernetes Configuration ---

const kubernetesConfigSchema = z.object({
  kubeconfigPath: z.string().optional().describe('Path to the kubeconfig file'),
  context: z.string().optional().describe('Specific Kubernetes context to use'),
  namespace: z.string().min(1).optional().describe('Namespace whose resources are evaluated'),
});

// --- Prune Configuration ---

export const prunableKindSchema = z.enum(prunableKinds);

const pruneConfigSchema = z.object({
  kinds: z.array(prunableKindSchema).optional().describe('Resource kinds to evaluate'),
  excludeNames: z.array(z.string()).optional().describe('Resource names that are never reported as prunable'),
  timeoutMs: z.number().int().positive().optional().describe('Abort cluster listing after this many milliseconds'),
});

// --- Base Configuration Schema (Common Structure) ---

// Shared by the config file and the CLI partial config
export const kubePruneConfigBaseSchema = z.object({
  output: outputConfigSchema.strict().optional(),
  kubernetes: kubernetesConfigSchema.strict().optional(),
  prune: pruneConfigSchema.strict().optional(),
});

// --- Default Configuration Schema ---

export const kubePruneConfigDefaultSchema = z.object({
  output: outputConfigSchema
    .extend({
      style: kubePruneOutputStyleSchema.default('text'),
    })
    .default({}),
  kubernetes: kubernetesConfigSchema
    .extend({
      namespace: z.string().min(1).default('default'),
    })
    .default({}),
  prune: pruneConfigSchema
    .extend({
      kinds: z.array(prunableKindSchema).default([...prunableKinds]),
      excludeNames: z.array(z.string()).default([]),
    })
    .default({}),
});

// --- Specific Configuration Schemas ---

// kubeprune.config.json
export const kubePruneConfigFileSchema = kubePruneConfigBaseSchema;

export const kubePruneConfigCliSchema = kubePruneConfigBaseSchema;

// --- Merged Configuration Schema ---

// The final, validated and defaulted configuration
export const kubePruneConfigMergedSchema = kubePruneConfigDefaultSchema.extend({
  cwd: z.string().describe('Current working directory where the tool was invoked'),
});

// --- Exported Types ---

export type KubePruneConfigDefault = z.infer<typeof kubePruneConfigDefaultSchema>;
export type KubePruneConfigFile = z.infer<typeof kubePruneConfigFileSchema>;
export type KubePruneConfigCli = z.infer<typeof kubePruneConfigCliSchema>;
export type KubePruneConfigMerged = z.infer<typeof kubePruneConfigMergedSchema>;

export const defaultConfig = kubePruneConfigDefaultSchema.parse({});
