// src/core/kubernetes/resourceKinds.ts

// The only kinds kubeprune knows how to judge
export const prunableKinds = ['ConfigMap', 'Secret', 'PersistentVolumeClaim', 'Pod', 'PodDisruptionBudget'] as const;

export type PrunableKind = (typeof prunableKinds)[number];

export const isPrunableKind = (kind: string): kind is PrunableKind => prunableKinds.some((known) => known === kind);

// Resource names passed to `kubectl get`
export const kubectlResourceNames: Record<PrunableKind, string> = {
  ConfigMap: 'configmaps',
  Secret: 'secrets',
  PersistentVolumeClaim: 'persistentvolumeclaims',
  Pod: 'pods',
  PodDisruptionBudget: 'poddisruptionbudgets',
};

// Lower-case spellings accepted on the command line, including kubectl short names
const kindAliases: Record<string, PrunableKind> = {
  configmap: 'ConfigMap',
  configmaps: 'ConfigMap',
  cm: 'ConfigMap',
  secret: 'Secret',
  secrets: 'Secret',
  persistentvolumeclaim: 'PersistentVolumeClaim',
  persistentvolumeclaims: 'PersistentVolumeClaim',
  pvc: 'PersistentVolumeClaim',
  pod: 'Pod',
  pods: 'Pod',
  po: 'Pod',
  poddisruptionbudget: 'PodDisruptionBudget',
  poddisruptionbudgets: 'PodDisruptionBudget',
  pdb: 'PodDisruptionBudget',
};

/**
 * Resolves a user-supplied kind name (`cm`, `Secrets`, `PodDisruptionBudget`...) to its canonical kind.
 *
 * @returns The canonical kind, or undefined when the name is not a prunable kind.
 */
export const resolveKindAlias = (input: string): PrunableKind | undefined => {
  const normalized = input.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(kindAliases, normalized) ? kindAliases[normalized] : undefined;
};
