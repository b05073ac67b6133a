// src/core/pruner.ts

import type { KubePruneConfigMerged } from '../config/configSchema.js';
import { logger } from '../shared/logger.js';
import type { ProgressCallback } from '../shared/types.js';
import * as kubectlClient from './kubernetes/kubectlClient.js';
import type { PrunableKind } from './kubernetes/resourceKinds.js';
import type { ResourceDescriptor } from './kubernetes/resourceSchema.js';
import * as determiner from './liveness/determiner.js';

export type PruneVerdict = 'prune' | 'keep' | 'skipped' | 'error';

export interface CandidateDecision {
  kind: string;
  name: string;
  verdict: PruneVerdict;
  // Set when verdict is 'error'
  error?: string;
}

export interface PruneEvaluation {
  namespace: string;
  kinds: PrunableKind[];
  decisions: CandidateDecision[];
  counts: Record<PruneVerdict, number>;
}

/**
 * Judges every candidate against a ready determiner. A failing candidate is
 * recorded as an error and the remaining ones are still evaluated.
 */
export const decideCandidates = (
  ready: determiner.Determiner,
  candidates: readonly ResourceDescriptor[],
  excludeNames: ReadonlySet<string> = new Set(),
): CandidateDecision[] =>
  candidates.map((candidate): CandidateDecision => {
    const { kind, name } = candidate;
    if (excludeNames.has(name)) {
      logger.debug(`Skipping excluded ${kind}/${name}`);
      return { kind, name, verdict: 'skipped' };
    }
    try {
      const prune = ready.determinePrune(candidate);
      logger.trace(`${kind}/${name}: ${prune ? 'prune' : 'keep'}`);
      return { kind, name, verdict: prune ? 'prune' : 'keep' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not decide ${kind}/${name}: ${message}`);
      return { kind, name, verdict: 'error', error: message };
    }
  });

export const countVerdicts = (decisions: readonly CandidateDecision[]): Record<PruneVerdict, number> => {
  const counts: Record<PruneVerdict, number> = { prune: 0, keep: 0, skipped: 0, error: 0 };
  for (const decision of decisions) {
    counts[decision.verdict]++;
  }
  return counts;
};

/**
 * Lists the candidates of the configured kinds in the configured namespace,
 * builds a determiner for them and decides each one.
 *
 * @param config - The merged configuration object.
 * @param progressCallback - Optional callback for reporting progress.
 * @param deps - Dependency injection for testing.
 */
export const evaluatePrune = async (
  config: KubePruneConfigMerged,
  progressCallback: ProgressCallback = () => {},
  deps = {
    createKubectlClient: kubectlClient.createKubectlClient,
    createDeterminer: determiner.createDeterminer,
  },
): Promise<PruneEvaluation> => {
  const { namespace, kubeconfigPath, context } = config.kubernetes;
  const { kinds, excludeNames, timeoutMs } = config.prune;
  const signal = timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs);

  const client = deps.createKubectlClient({ kubeconfigPath, context });

  progressCallback(`Listing ${kinds.join(', ')} in namespace '${namespace}'...`);
  const candidates = await client.listCandidates(namespace, kinds, signal);
  logger.info(`Found ${candidates.length} candidate resources in namespace '${namespace}'.`);

  progressCallback('Collecting references from pods and service accounts...');
  const ready = await deps.createDeterminer(client, candidates, namespace, { signal });

  progressCallback('Deciding which resources are unused...');
  const decisions = decideCandidates(ready, candidates, new Set(excludeNames));

  return {
    namespace,
    kinds,
    decisions,
    counts: countVerdicts(decisions),
  };
};
