import { describe, expect, it, vi } from 'vitest';
import { type ClusterClient, createDeterminer, requiredIndicesFor } from '../../../src/core/liveness/determiner.js';
import type { Pod, ServiceAccount } from '../../../src/core/kubernetes/resourceSchema.js';
import {
  ConversionError,
  FetchError,
  SelectorError,
  UnsupportedKindError,
} from '../../../src/shared/errorHandle.js';
import { createPod, createPodDisruptionBudget, createServiceAccount, descriptorFor } from '../../testUtils.js';

vi.mock('../../../src/shared/logger.js', () => ({
  kubePruneLogLevels: { SILENT: -1, ERROR: 0, WARN: 1, INFO: 2, DEBUG: 3 },
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    log: vi.fn(),
  },
}));

const createFakeClient = (pods: Pod[], serviceAccounts: ServiceAccount[] = []) => {
  const listPods = vi.fn<ClusterClient['listPods']>().mockResolvedValue(pods);
  const listServiceAccounts = vi.fn<ClusterClient['listServiceAccounts']>().mockResolvedValue(serviceAccounts);
  const client: ClusterClient = { listPods, listServiceAccounts };
  return { client, listPods, listServiceAccounts };
};

describe('requiredIndicesFor', () => {
  it('flags only the kinds present', () => {
    expect(requiredIndicesFor(['Secret', 'Pod', 'Deployment'])).toEqual({
      configMaps: false,
      secrets: true,
      persistentVolumeClaims: false,
      podDisruptionBudgets: false,
    });
  });
});

describe('createDeterminer', () => {
  it('does not list anything when only pods are candidates', async () => {
    const { client, listPods, listServiceAccounts } = createFakeClient([]);
    await createDeterminer(client, [descriptorFor('Pod', 'web-0')], 'default');
    expect(listPods).not.toHaveBeenCalled();
    expect(listServiceAccounts).not.toHaveBeenCalled();
  });

  it('lists pods once but not service accounts for ConfigMaps, PVCs and PDBs', async () => {
    const { client, listPods, listServiceAccounts } = createFakeClient([]);
    await createDeterminer(
      client,
      [
        descriptorFor('ConfigMap', 'a'),
        descriptorFor('ConfigMap', 'b'),
        descriptorFor('PersistentVolumeClaim', 'c'),
        descriptorFor('PodDisruptionBudget', 'd'),
      ],
      'apps',
    );
    expect(listPods).toHaveBeenCalledTimes(1);
    expect(listPods).toHaveBeenCalledWith('apps', undefined);
    expect(listServiceAccounts).not.toHaveBeenCalled();
  });

  it('lists service accounts when Secrets are candidates and passes the abort signal', async () => {
    const { client, listPods, listServiceAccounts } = createFakeClient([]);
    const controller = new AbortController();
    await createDeterminer(client, [descriptorFor('Secret', 's')], 'apps', { signal: controller.signal });
    expect(listPods).toHaveBeenCalledWith('apps', controller.signal);
    expect(listServiceAccounts).toHaveBeenCalledTimes(1);
    expect(listServiceAccounts).toHaveBeenCalledWith('apps', controller.signal);
  });

  it('leaves the pod list returned by the client unfrozen', async () => {
    const pods = [createPod('web-0')];
    const { client } = createFakeClient(pods);
    await createDeterminer(client, [descriptorFor('ConfigMap', 'app-config')], 'default');
    expect(Object.isFrozen(pods)).toBe(false);
  });

  it('propagates pod listing failures unchanged', async () => {
    const failure = new FetchError('pods', 'default', new Error('connection refused'));
    const { client, listServiceAccounts } = createFakeClient([]);
    vi.mocked(client.listPods).mockRejectedValue(failure);
    await expect(createDeterminer(client, [descriptorFor('Secret', 's')], 'default')).rejects.toBe(failure);
    expect(listServiceAccounts).not.toHaveBeenCalled();
  });

  it('propagates service account listing failures unchanged', async () => {
    const failure = new FetchError('serviceaccounts', 'default', new Error('forbidden'));
    const { client } = createFakeClient([]);
    vi.mocked(client.listServiceAccounts).mockRejectedValue(failure);
    await expect(createDeterminer(client, [descriptorFor('Secret', 's')], 'default')).rejects.toBe(failure);
  });
});

describe('Determiner.determinePrune', () => {
  it('keeps a ConfigMap referenced through envFrom and prunes an orphan', async () => {
    const pod = createPod('web-0', {
      containers: [{ name: 'web', envFrom: [{ configMapRef: { name: 'app-config' } }] }],
    });
    const candidates = [descriptorFor('ConfigMap', 'app-config'), descriptorFor('ConfigMap', 'orphan-config')];
    const determiner = await createDeterminer(createFakeClient([pod]).client, candidates, 'default');

    expect(determiner.determinePrune(candidates[0])).toBe(false);
    expect(determiner.determinePrune(candidates[1])).toBe(true);
  });

  it('keeps a Secret listed only on a service account', async () => {
    const candidate = descriptorFor('Secret', 'default-token');
    const { client } = createFakeClient([createPod('web-0')], [createServiceAccount('default', ['default-token'])]);
    const determiner = await createDeterminer(client, [candidate], 'default');

    expect(determiner.determinePrune(candidate)).toBe(false);
    expect(determiner.determinePrune(descriptorFor('Secret', 'stale-token'))).toBe(true);
  });

  it('decides PersistentVolumeClaims by pod volumes', async () => {
    const pod = createPod('db-0', { volumes: [{ name: 'data', persistentVolumeClaim: { claimName: 'db-data' } }] });
    const candidates = [descriptorFor('PersistentVolumeClaim', 'db-data'), descriptorFor('PersistentVolumeClaim', 'old')];
    const determiner = await createDeterminer(createFakeClient([pod]).client, candidates, 'default');

    expect(determiner.determinePrune(candidates[0])).toBe(false);
    expect(determiner.determinePrune(candidates[1])).toBe(true);
  });

  it('prunes a PodDisruptionBudget whose selector matches no pod', async () => {
    const pdb = createPodDisruptionBudget('web-pdb', { matchLabels: { app: 'web' } });
    const candidate = descriptorFor('PodDisruptionBudget', 'web-pdb', pdb);
    const { client } = createFakeClient([createPod('db-0', { labels: { app: 'db' } })]);
    const determiner = await createDeterminer(client, [candidate], 'default');

    expect(determiner.determinePrune(candidate)).toBe(true);
  });

  it('keeps a PodDisruptionBudget whose selector matches a pod', async () => {
    const pdb = createPodDisruptionBudget('web-pdb', { matchLabels: { app: 'web' } });
    const candidate = descriptorFor('PodDisruptionBudget', 'web-pdb', pdb);
    const { client } = createFakeClient([createPod('web-0', { labels: { app: 'web' } })]);
    const determiner = await createDeterminer(client, [candidate], 'default');

    expect(determiner.determinePrune(candidate)).toBe(false);
  });

  it('surfaces invalid PodDisruptionBudget selectors as SelectorError', async () => {
    const pdb = createPodDisruptionBudget('broken', { matchExpressions: [{ key: 'app', operator: 'In' }] });
    const candidate = descriptorFor('PodDisruptionBudget', 'broken', pdb);
    const determiner = await createDeterminer(createFakeClient([createPod('web-0')]).client, [candidate], 'default');

    expect(() => determiner.determinePrune(candidate)).toThrow(SelectorError);
  });

  it('prunes pods that are not Running', async () => {
    const pending = descriptorFor('Pod', 'web-0', createPod('web-0', { phase: 'Pending' }));
    const running = descriptorFor('Pod', 'web-1', createPod('web-1', { phase: 'Running' }));
    const determiner = await createDeterminer(createFakeClient([]).client, [pending, running], 'default');

    expect(determiner.determinePrune(pending)).toBe(true);
    expect(determiner.determinePrune(running)).toBe(false);
  });

  it('prunes a pod that reports no phase', async () => {
    const candidate = descriptorFor('Pod', 'new', { kind: 'Pod', metadata: { name: 'new' } });
    const determiner = await createDeterminer(createFakeClient([]).client, [candidate], 'default');

    expect(determiner.determinePrune(candidate)).toBe(true);
  });

  it('raises ConversionError for a pod payload of the wrong shape', async () => {
    const candidate = descriptorFor('Pod', 'web-0', { kind: 'Pod', metadata: { labels: {} } });
    const determiner = await createDeterminer(createFakeClient([]).client, [candidate], 'default');

    expect(() => determiner.determinePrune(candidate)).toThrow(ConversionError);
  });

  it('raises UnsupportedKindError naming kind and resource', async () => {
    const candidate = descriptorFor('Deployment', 'web');
    const { client, listPods } = createFakeClient([]);
    const determiner = await createDeterminer(client, [candidate], 'default');

    expect(listPods).not.toHaveBeenCalled();
    expect(() => determiner.determinePrune(candidate)).toThrow(UnsupportedKindError);
    expect(() => determiner.determinePrune(candidate)).toThrow('unsupported kind: Deployment/web');
  });

  it('treats every name of a kind it was not built for as unused', async () => {
    const pod = createPod('web-0', {
      containers: [{ name: 'web', envFrom: [{ configMapRef: { name: 'app-config' } }] }],
    });
    const determiner = await createDeterminer(
      createFakeClient([pod]).client,
      [descriptorFor('PersistentVolumeClaim', 'data')],
      'default',
    );

    expect(determiner.determinePrune(descriptorFor('ConfigMap', 'app-config'))).toBe(true);
  });

  it('returns the same answer on repeated calls', async () => {
    const pod = createPod('web-0', { volumes: [{ name: 'cfg', configMap: { name: 'app-config' } }] });
    const candidate = descriptorFor('ConfigMap', 'app-config');
    const determiner = await createDeterminer(createFakeClient([pod]).client, [candidate], 'default');

    expect(determiner.determinePrune(candidate)).toBe(false);
    expect(determiner.determinePrune(candidate)).toBe(false);
    expect(Object.isFrozen(determiner)).toBe(true);
  });
});
