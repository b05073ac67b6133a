// src/index.ts - programmatic entry point; the CLI starts from bin.ts

export { run } from './cli/cliRun.js';

// Liveness determination
export { Determiner, createDeterminer, requiredIndicesFor } from './core/liveness/determiner.js';
export type { ClusterClient, DeterminerOptions, RequiredIndices } from './core/liveness/determiner.js';
export {
  detectUsedConfigMaps,
  detectUsedPersistentVolumeClaims,
  detectUsedSecrets,
} from './core/liveness/usedReferences.js';
export type { NameSet } from './core/liveness/nameSet.js';
export { isPodDisruptionBudgetUsed } from './core/liveness/podDisruptionBudget.js';
export { LabelSelectorSyntaxError, compileLabelSelector } from './core/liveness/labelSelector.js';
export type { LabelSelectorMatcher, Labels } from './core/liveness/labelSelector.js';

// Kubernetes resources
export { createKubectlClient } from './core/kubernetes/kubectlClient.js';
export type { KubectlClient, KubectlClientOptions } from './core/kubernetes/kubectlClient.js';
export { prunableKinds, isPrunableKind } from './core/kubernetes/resourceKinds.js';
export type { PrunableKind } from './core/kubernetes/resourceKinds.js';
export {
  descriptorToPod,
  descriptorToPodDisruptionBudget,
  toResourceDescriptor,
} from './core/kubernetes/resourceConvert.js';
export type {
  Container,
  LabelSelector,
  Pod,
  PodDisruptionBudget,
  ResourceDescriptor,
  ServiceAccount,
  Volume,
} from './core/kubernetes/resourceSchema.js';

// Prune evaluation and reporting
export { evaluatePrune, decideCandidates } from './core/pruner.js';
export type { CandidateDecision, PruneEvaluation, PruneVerdict } from './core/pruner.js';
export { generateReport } from './core/output/reportGenerate.js';

export type { KubePruneConfigMerged } from './config/configSchema.js';

export {
  ConversionError,
  FetchError,
  KubePruneError,
  KubectlError,
  SelectorError,
  UnsupportedKindError,
} from './shared/errorHandle.js';
