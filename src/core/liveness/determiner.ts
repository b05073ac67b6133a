// src/core/liveness/determiner.ts

import { POD_PHASE_RUNNING } from '../../shared/constants.js';
import { UnsupportedKindError } from '../../shared/errorHandle.js';
import { logger } from '../../shared/logger.js';
import { type PrunableKind, isPrunableKind } from '../kubernetes/resourceKinds.js';
import { descriptorToPod, descriptorToPodDisruptionBudget } from '../kubernetes/resourceConvert.js';
import type { Pod, ResourceDescriptor, ServiceAccount } from '../kubernetes/resourceSchema.js';
import type { NameSet } from './nameSet.js';
import { isPodDisruptionBudgetUsed } from './podDisruptionBudget.js';
import { detectUsedConfigMaps, detectUsedPersistentVolumeClaims, detectUsedSecrets } from './usedReferences.js';

/**
 * What the determiner needs from the cluster. Both calls receive the caller's
 * abort signal and may reject; rejections reach the caller unchanged.
 */
export interface ClusterClient {
  listPods(namespace: string, signal?: AbortSignal): Promise<Pod[]>;
  listServiceAccounts(namespace: string, signal?: AbortSignal): Promise<ServiceAccount[]>;
}

export interface DeterminerOptions {
  signal?: AbortSignal;
}

// Which indices a set of candidate kinds calls for
export interface RequiredIndices {
  configMaps: boolean;
  secrets: boolean;
  persistentVolumeClaims: boolean;
  podDisruptionBudgets: boolean;
}

interface DeterminerState {
  pods: readonly Pod[];
  usedConfigMaps?: NameSet;
  usedSecrets?: NameSet;
  usedPersistentVolumeClaims?: NameSet;
}

export const requiredIndicesFor = (kinds: Iterable<string>): RequiredIndices => {
  const required: RequiredIndices = {
    configMaps: false,
    secrets: false,
    persistentVolumeClaims: false,
    podDisruptionBudgets: false,
  };

  for (const kind of kinds) {
    switch (kind) {
      case 'ConfigMap':
        required.configMaps = true;
        break;
      case 'Secret':
        required.secrets = true;
        break;
      case 'PersistentVolumeClaim':
        required.persistentVolumeClaims = true;
        break;
      case 'PodDisruptionBudget':
        required.podDisruptionBudgets = true;
        break;
    }
  }

  return required;
};

const assertNever = (kind: never): never => {
  throw new Error(`Unhandled kind: ${String(kind)}`);
};

/**
 * Answers "may this resource be pruned?" for the candidates it was built for.
 * Every index is built during construction; decisions only read them.
 */
export class Determiner {
  private readonly pods: readonly Pod[];
  // An index that was never requested stays undefined; lookups then treat every name as unused
  private readonly usedConfigMaps?: NameSet;
  private readonly usedSecrets?: NameSet;
  private readonly usedPersistentVolumeClaims?: NameSet;

  private constructor(state: DeterminerState) {
    this.pods = state.pods;
    this.usedConfigMaps = state.usedConfigMaps;
    this.usedSecrets = state.usedSecrets;
    this.usedPersistentVolumeClaims = state.usedPersistentVolumeClaims;
    Object.freeze(this);
  }

  /**
   * Fetches what the candidate kinds need, at most once each, and builds the matching indices.
   *
   * @param client - Lists pods and service accounts.
   * @param candidates - The resources that will later be passed to {@link Determiner.determinePrune}.
   * @param namespace - Namespace the candidates live in.
   * @throws Whatever the client rejects with; no determiner is returned in that case.
   */
  static async create(
    client: ClusterClient,
    candidates: Iterable<ResourceDescriptor>,
    namespace: string,
    options: DeterminerOptions = {},
  ): Promise<Determiner> {
    const kinds = new Set<string>();
    for (const candidate of candidates) {
      kinds.add(candidate.kind);
    }

    const required = requiredIndicesFor(kinds);
    const needsPods =
      required.configMaps || required.secrets || required.persistentVolumeClaims || required.podDisruptionBudgets;
    logger.debug(`Required indices for namespace '${namespace}':`, required);

    let pods: Pod[] = [];
    if (needsPods) {
      pods = await client.listPods(namespace, options.signal);
      logger.debug(`Listed ${pods.length} pods in namespace '${namespace}'`);
    }

    let serviceAccounts: ServiceAccount[] = [];
    if (required.secrets) {
      serviceAccounts = await client.listServiceAccounts(namespace, options.signal);
      logger.debug(`Listed ${serviceAccounts.length} service accounts in namespace '${namespace}'`);
    }

    // The client's array stays the caller's; the determiner keeps its own frozen copy
    const state: DeterminerState = { pods: Object.freeze([...pods]) };

    if (required.configMaps) {
      state.usedConfigMaps = detectUsedConfigMaps(pods);
      logger.trace(`ConfigMaps in use: ${[...state.usedConfigMaps].join(', ') || '<none>'}`);
    }

    if (required.secrets) {
      state.usedSecrets = detectUsedSecrets(pods, serviceAccounts);
      logger.trace(`Secrets in use: ${[...state.usedSecrets].join(', ') || '<none>'}`);
    }

    if (required.persistentVolumeClaims) {
      state.usedPersistentVolumeClaims = detectUsedPersistentVolumeClaims(pods);
      logger.trace(
        `PersistentVolumeClaims in use: ${[...state.usedPersistentVolumeClaims].join(', ') || '<none>'}`,
      );
    }

    return new Determiner(state);
  }

  /**
   * Decides whether a resource should be pruned.
   *
   * @returns true when nothing uses the resource (or, for a Pod, when it is not Running).
   * @throws ConversionError, SelectorError or UnsupportedKindError for this candidate only.
   */
  determinePrune(descriptor: ResourceDescriptor): boolean {
    const { kind, name } = descriptor;
    if (!isPrunableKind(kind)) {
      throw new UnsupportedKindError(kind, name);
    }
    return this.determinePruneForKind(kind, descriptor);
  }

  private determinePruneForKind(kind: PrunableKind, descriptor: ResourceDescriptor): boolean {
    switch (kind) {
      case 'ConfigMap':
        return !isUsed(this.usedConfigMaps, descriptor.name);

      case 'Secret':
        return !isUsed(this.usedSecrets, descriptor.name);

      case 'PersistentVolumeClaim':
        return !isUsed(this.usedPersistentVolumeClaims, descriptor.name);

      case 'Pod': {
        // Nothing references a pod; its own phase decides
        const pod = descriptorToPod(descriptor);
        return pod.status?.phase !== POD_PHASE_RUNNING;
      }

      case 'PodDisruptionBudget': {
        const pdb = descriptorToPodDisruptionBudget(descriptor);
        return !isPodDisruptionBudgetUsed(pdb, this.pods);
      }

      default:
        return assertNever(kind);
    }
  }
}

const isUsed = (index: NameSet | undefined, name: string): boolean => index?.has(name) ?? false;

/**
 * Builds a {@link Determiner}; see {@link Determiner.create}.
 */
export const createDeterminer = (
  client: ClusterClient,
  candidates: Iterable<ResourceDescriptor>,
  namespace: string,
  options: DeterminerOptions = {},
): Promise<Determiner> => Determiner.create(client, candidates, namespace, options);
