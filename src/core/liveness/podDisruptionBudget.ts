// src/core/liveness/podDisruptionBudget.ts

import { SelectorError } from '../../shared/errorHandle.js';
import { logger } from '../../shared/logger.js';
import type { Pod, PodDisruptionBudget } from '../kubernetes/resourceSchema.js';
import { type LabelSelectorMatcher, compileLabelSelector } from './labelSelector.js';

/**
 * Decides whether a PodDisruptionBudget still guards anything: its selector must
 * match at least one pod, whatever that pod's phase.
 *
 * @throws SelectorError when the budget's selector is invalid.
 */
export const isPodDisruptionBudgetUsed = (pdb: PodDisruptionBudget, pods: readonly Pod[]): boolean => {
  let selector: LabelSelectorMatcher;
  try {
    selector = compileLabelSelector(pdb.spec.selector);
  } catch (error) {
    throw new SelectorError(pdb.metadata.name, error);
  }

  if (selector.matchesEverything) {
    logger.trace(`PodDisruptionBudget ${pdb.metadata.name} selects every pod; ${pods.length} pods listed`);
    return pods.length > 0;
  }

  const match = pods.find((pod) => selector.matches(pod.metadata.labels));
  if (match) {
    logger.trace(`PodDisruptionBudget ${pdb.metadata.name} (${selector.toString()}) matches pod ${match.metadata.name}`);
    return true;
  }

  logger.trace(`PodDisruptionBudget ${pdb.metadata.name} (${selector.toString()}) matches no pod`);
  return false;
};
