// src/core/kubernetes/kubectlClient.ts

import type { z } from 'zod';
import { FetchError, KubePruneError, formatZodIssues } from '../../shared/errorHandle.js';
import { logger } from '../../shared/logger.js';
import type { ClusterClient } from '../liveness/determiner.js';
import { type KubectlOptions, getResourcesJson } from './kubectlWrapper.js';
import { toResourceDescriptor } from './resourceConvert.js';
import { type PrunableKind, kubectlResourceNames } from './resourceKinds.js';
import {
  type Pod,
  type ResourceDescriptor,
  type ServiceAccount,
  kubernetesListSchema,
  podSchema,
  serviceAccountSchema,
} from './resourceSchema.js';

export interface KubectlClientOptions {
  kubeconfigPath?: string;
  context?: string;
}

export interface KubectlClient extends ClusterClient {
  listCandidates(namespace: string, kinds: readonly PrunableKind[], signal?: AbortSignal): Promise<ResourceDescriptor[]>;
}

const readListItems = (json: unknown): unknown[] => {
  const result = kubernetesListSchema.safeParse(json);
  if (!result.success) {
    throw new KubePruneError(`kubectl did not return a List:\n  ${formatZodIssues(result.error, 'list')}`);
  }
  return result.data.items;
};

const parseItems = <T>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string): T[] =>
  items.map((item, index) => {
    const result = schema.safeParse(item);
    if (!result.success) {
      throw new KubePruneError(`Malformed ${kind} at index ${index}:\n  ${formatZodIssues(result.error, kind)}`);
    }
    return result.data;
  });

/**
 * A {@link ClusterClient} backed by the kubectl binary.
 * Every listing failure is reported as a FetchError.
 */
export const createKubectlClient = (clientOptions: KubectlClientOptions = {}): KubectlClient => {
  const kubectlOptions = (signal?: AbortSignal): KubectlOptions => ({ ...clientOptions, signal });

  const listItems = async (resource: string, namespace: string, signal?: AbortSignal): Promise<unknown[]> => {
    try {
      return readListItems(await getResourcesJson(resource, namespace, kubectlOptions(signal)));
    } catch (error) {
      throw new FetchError(resource, namespace, error);
    }
  };

  return {
    async listPods(namespace, signal) {
      const items = await listItems('pods', namespace, signal);
      try {
        return parseItems<Pod>(items, podSchema, 'Pod');
      } catch (error) {
        throw new FetchError('pods', namespace, error);
      }
    },

    async listServiceAccounts(namespace, signal) {
      const items = await listItems('serviceaccounts', namespace, signal);
      try {
        return parseItems<ServiceAccount>(items, serviceAccountSchema, 'ServiceAccount');
      } catch (error) {
        throw new FetchError('serviceaccounts', namespace, error);
      }
    },

    async listCandidates(namespace, kinds, signal) {
      if (kinds.length === 0) {
        return [];
      }
      const resource = kinds.map((kind) => kubectlResourceNames[kind]).join(',');
      const items = await listItems(resource, namespace, signal);
      try {
        const candidates = items.map(toResourceDescriptor);
        logger.debug(`Found ${candidates.length} candidates (${resource}) in namespace '${namespace}'`);
        return candidates;
      } catch (error) {
        throw new FetchError(resource, namespace, error);
      }
    },
  };
};
