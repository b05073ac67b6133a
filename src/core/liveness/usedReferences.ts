// src/core/liveness/usedReferences.ts
//
// Reference indices built from the live pod population.
// Only regular containers are scanned, not init or ephemeral containers.

import type { Pod, ServiceAccount } from '../kubernetes/resourceSchema.js';
import { type NameSet, NameSetBuilder } from './nameSet.js';

/**
 * Collects the ConfigMaps referenced by pods through envFrom, env valueFrom,
 * configMap volumes and projected volume sources.
 */
export const detectUsedConfigMaps = (pods: readonly Pod[]): NameSet => {
  const usedConfigMaps = new NameSetBuilder();

  for (const pod of pods) {
    for (const container of pod.spec.containers) {
      for (const envFrom of container.envFrom ?? []) {
        usedConfigMaps.add(envFrom.configMapRef?.name);
      }

      for (const env of container.env ?? []) {
        usedConfigMaps.add(env.valueFrom?.configMapKeyRef?.name);
      }
    }

    for (const volume of pod.spec.volumes ?? []) {
      usedConfigMaps.add(volume.configMap?.name);

      for (const source of volume.projected?.sources ?? []) {
        usedConfigMaps.add(source.configMap?.name);
      }
    }
  }

  return usedConfigMaps.build();
};

/**
 * Collects the Secrets referenced by pods (the same four reference kinds as ConfigMaps)
 * together with every Secret listed on a service account.
 */
export const detectUsedSecrets = (pods: readonly Pod[], serviceAccounts: readonly ServiceAccount[]): NameSet => {
  const usedSecrets = new NameSetBuilder();

  for (const pod of pods) {
    for (const container of pod.spec.containers) {
      for (const envFrom of container.envFrom ?? []) {
        usedSecrets.add(envFrom.secretRef?.name);
      }

      for (const env of container.env ?? []) {
        usedSecrets.add(env.valueFrom?.secretKeyRef?.name);
      }
    }

    for (const volume of pod.spec.volumes ?? []) {
      usedSecrets.add(volume.secret?.secretName);

      for (const source of volume.projected?.sources ?? []) {
        usedSecrets.add(source.secret?.name);
      }
    }
  }

  // A token Secret may be attached to a service account without being mounted anywhere
  for (const serviceAccount of serviceAccounts) {
    for (const secret of serviceAccount.secrets ?? []) {
      usedSecrets.add(secret.name);
    }
  }

  return usedSecrets.build();
};

export const detectUsedPersistentVolumeClaims = (pods: readonly Pod[]): NameSet => {
  const usedClaims = new NameSetBuilder();

  for (const pod of pods) {
    for (const volume of pod.spec.volumes ?? []) {
      if (!volume.persistentVolumeClaim) {
        continue;
      }
      usedClaims.add(volume.persistentVolumeClaim.claimName);
    }
  }

  return usedClaims.build();
};
