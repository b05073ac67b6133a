// src/core/kubernetes/resourceSchema.ts
//
// zod schemas for the parts of Kubernetes manifests kubeprune reads.
// Fields outside these shapes pass through untouched.

import { z } from 'zod';

// --- Shared building blocks ---

export const objectMetaSchema = z
  .object({
    name: z.string(),
    namespace: z.string().optional(),
    labels: z.record(z.string()).optional(),
  })
  .passthrough();

// LocalObjectReference / ConfigMapEnvSource / SecretEnvSource / projections all name their target
const localObjectReferenceSchema = z
  .object({
    name: z.string().optional(),
  })
  .passthrough();

// ConfigMapKeySelector / SecretKeySelector
const keySelectorSchema = localObjectReferenceSchema.extend({
  key: z.string().optional(),
});

// --- Label selectors ---

export const labelSelectorRequirementSchema = z.object({
  key: z.string(),
  operator: z.string(),
  values: z.array(z.string()).optional(),
});

export const labelSelectorSchema = z.object({
  matchLabels: z.record(z.string()).optional(),
  matchExpressions: z.array(labelSelectorRequirementSchema).optional(),
});

// --- Pod ---

const envVarSchema = z
  .object({
    name: z.string(),
    value: z.string().optional(),
    valueFrom: z
      .object({
        configMapKeyRef: keySelectorSchema.optional(),
        secretKeyRef: keySelectorSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const envFromSourceSchema = z
  .object({
    prefix: z.string().optional(),
    configMapRef: localObjectReferenceSchema.optional(),
    secretRef: localObjectReferenceSchema.optional(),
  })
  .passthrough();

export const containerSchema = z
  .object({
    name: z.string(),
    image: z.string().optional(),
    env: z.array(envVarSchema).optional(),
    envFrom: z.array(envFromSourceSchema).optional(),
  })
  .passthrough();

const volumeProjectionSchema = z
  .object({
    configMap: localObjectReferenceSchema.optional(),
    secret: localObjectReferenceSchema.optional(),
  })
  .passthrough();

export const volumeSchema = z
  .object({
    name: z.string(),
    configMap: localObjectReferenceSchema.optional(),
    secret: z
      .object({
        secretName: z.string().optional(),
      })
      .passthrough()
      .optional(),
    persistentVolumeClaim: z
      .object({
        claimName: z.string(),
        readOnly: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    projected: z
      .object({
        sources: z.array(volumeProjectionSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const podSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: objectMetaSchema,
    spec: z
      .object({
        containers: z.array(containerSchema).default([]),
        volumes: z.array(volumeSchema).optional(),
        serviceAccountName: z.string().optional(),
      })
      .passthrough()
      .default({}),
    status: z
      .object({
        phase: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

// --- ServiceAccount ---

export const serviceAccountSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: objectMetaSchema,
    secrets: z.array(localObjectReferenceSchema).optional(),
  })
  .passthrough();

// --- PodDisruptionBudget (policy/v1 and policy/v1beta1 share this shape) ---

export const podDisruptionBudgetSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: objectMetaSchema,
    spec: z
      .object({
        selector: labelSelectorSchema.nullable().optional(),
        minAvailable: z.union([z.number(), z.string()]).optional(),
        maxUnavailable: z.union([z.number(), z.string()]).optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

// --- Generic manifests ---

// Just enough of a manifest to know what it is
export const resourceHeaderSchema = z
  .object({
    kind: z.string().min(1),
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

// `kubectl get ... -o json` always answers with a List
export const kubernetesListSchema = z
  .object({
    items: z.array(z.unknown()),
  })
  .passthrough();

// --- Exported types ---

export type LabelSelectorRequirement = z.infer<typeof labelSelectorRequirementSchema>;
export type LabelSelector = z.infer<typeof labelSelectorSchema>;
export type Container = z.infer<typeof containerSchema>;
export type Volume = z.infer<typeof volumeSchema>;
export type Pod = z.infer<typeof podSchema>;
export type ServiceAccount = z.infer<typeof serviceAccountSchema>;
export type PodDisruptionBudget = z.infer<typeof podDisruptionBudgetSchema>;

/**
 * A visited resource: its kind and name, plus the raw manifest it was read from.
 * The manifest stays opaque until a decision needs it as a concrete type.
 */
export interface ResourceDescriptor {
  kind: string;
  name: string;
  namespace?: string;
  object: unknown;
}
