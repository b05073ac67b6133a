// src/core/kubernetes/resourceConvert.ts

import type { z } from 'zod';
import { ConversionError, KubePruneError, formatZodIssues } from '../../shared/errorHandle.js';
import type { PrunableKind } from './resourceKinds.js';
import {
  type Pod,
  type PodDisruptionBudget,
  type ResourceDescriptor,
  podDisruptionBudgetSchema,
  podSchema,
  resourceHeaderSchema,
} from './resourceSchema.js';

/**
 * Wraps a raw manifest in a descriptor, reading its kind and name.
 *
 * @param object - A parsed manifest, typically one item of a `kubectl get -o json` List.
 * @throws KubePruneError if the manifest has no kind or no name.
 */
export const toResourceDescriptor = (object: unknown): ResourceDescriptor => {
  const result = resourceHeaderSchema.safeParse(object);
  if (!result.success) {
    throw new KubePruneError(`Not a Kubernetes resource:\n  ${formatZodIssues(result.error, 'resource')}`);
  }
  const { kind, metadata } = result.data;
  return {
    kind,
    name: metadata.name,
    namespace: metadata.namespace,
    object,
  };
};

const convertDescriptor = <T extends { kind?: string }>(
  descriptor: ResourceDescriptor,
  expectedKind: PrunableKind,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T => {
  if (descriptor.kind !== expectedKind) {
    throw new ConversionError(expectedKind, descriptor.name, `descriptor declares kind ${descriptor.kind}`);
  }

  const result = schema.safeParse(descriptor.object);
  if (!result.success) {
    throw new ConversionError(expectedKind, descriptor.name, formatZodIssues(result.error, 'object'));
  }

  // A payload without a kind is accepted; one naming another kind is not
  if (result.data.kind !== undefined && result.data.kind !== expectedKind) {
    throw new ConversionError(expectedKind, descriptor.name, `payload is a ${result.data.kind}`);
  }

  return result.data;
};

export const descriptorToPod = (descriptor: ResourceDescriptor): Pod =>
  convertDescriptor(descriptor, 'Pod', podSchema);

export const descriptorToPodDisruptionBudget = (descriptor: ResourceDescriptor): PodDisruptionBudget =>
  convertDescriptor(descriptor, 'PodDisruptionBudget', podDisruptionBudgetSchema);
