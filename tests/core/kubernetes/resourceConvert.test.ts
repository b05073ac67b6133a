import { describe, expect, it } from 'vitest';
import {
  descriptorToPod,
  descriptorToPodDisruptionBudget,
  toResourceDescriptor,
} from '../../../src/core/kubernetes/resourceConvert.js';
import { ConversionError, KubePruneError } from '../../../src/shared/errorHandle.js';
import { descriptorFor } from '../../testUtils.js';

describe('toResourceDescriptor', () => {
  it('reads kind, name and namespace from a manifest', () => {
    const manifest = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'app-config', namespace: 'apps' } };
    expect(toResourceDescriptor(manifest)).toEqual({
      kind: 'ConfigMap',
      name: 'app-config',
      namespace: 'apps',
      object: manifest,
    });
  });

  it('rejects objects without a kind', () => {
    expect(() => toResourceDescriptor({ metadata: { name: 'x' } })).toThrow(KubePruneError);
  });
});

describe('descriptorToPod', () => {
  it('fills in defaults for a sparse pod', () => {
    const pod = descriptorToPod(descriptorFor('Pod', 'web-0', { kind: 'Pod', metadata: { name: 'web-0' } }));
    expect(pod.metadata.name).toBe('web-0');
    expect(pod.spec.containers).toEqual([]);
    expect(pod.status).toBeUndefined();
  });

  it('keeps fields it does not model', () => {
    const pod = descriptorToPod(
      descriptorFor('Pod', 'web-0', {
        kind: 'Pod',
        metadata: { name: 'web-0', uid: '1234' },
        spec: { containers: [], nodeName: 'node-a' },
        status: { phase: 'Running' },
      }),
    );
    expect(pod.metadata.uid).toBe('1234');
    expect(pod.spec.nodeName).toBe('node-a');
    expect(pod.status?.phase).toBe('Running');
  });

  it('rejects a descriptor declaring another kind', () => {
    expect(() => descriptorToPod(descriptorFor('Secret', 'web-0'))).toThrow(
      'Cannot read Pod/web-0 as a Pod: descriptor declares kind Secret',
    );
  });

  it('rejects a payload of another kind', () => {
    expect(() =>
      descriptorToPod(descriptorFor('Pod', 'web-0', { kind: 'Service', metadata: { name: 'web-0' } })),
    ).toThrow('Cannot read Pod/web-0 as a Pod: payload is a Service');
  });

  it('rejects a payload that is not an object', () => {
    expect(() => descriptorToPod(descriptorFor('Pod', 'web-0', 'not a pod'))).toThrow(ConversionError);
  });
});

describe('descriptorToPodDisruptionBudget', () => {
  it('reads the selector', () => {
    const pdb = descriptorToPodDisruptionBudget(
      descriptorFor('PodDisruptionBudget', 'web-pdb', {
        apiVersion: 'policy/v1',
        kind: 'PodDisruptionBudget',
        metadata: { name: 'web-pdb' },
        spec: { maxUnavailable: '25%', selector: { matchLabels: { app: 'web' } } },
      }),
    );
    expect(pdb.spec.selector).toEqual({ matchLabels: { app: 'web' } });
  });

  it('rejects a malformed selector', () => {
    expect(() =>
      descriptorToPodDisruptionBudget(
        descriptorFor('PodDisruptionBudget', 'web-pdb', {
          kind: 'PodDisruptionBudget',
          metadata: { name: 'web-pdb' },
          spec: { selector: { matchLabels: { app: 3 } } },
        }),
      ),
    ).toThrow(ConversionError);
  });
});
