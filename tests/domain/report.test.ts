import { describe, expect, it } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/types.js';
import { adviseNodeRightsize } from '../../src/domain/nodeRightsize.js';
import { advisePodResize } from '../../src/domain/podResize.js';
import {
  HPA_MATCHING_LIMITATION,
  MEMORY_PRESSURE_LIMITATION,
  buildSummary,
  collectLimitations,
  finiteOrNull,
  sortRecommendations,
  toPodFacts,
} from '../../src/domain/report.js';
import type { PodResizeRecommendation } from '../../src/domain/types.js';
import { GIB, MIB, nodeProfile, podProfile, stats } from '../fixtures.js';

const config = DEFAULT_ENGINE_CONFIG;

const resizeFor = (namespace: string, pod: string, cpuRequest: number, memoryRequest: number): PodResizeRecommendation => {
  const rec = advisePodResize(
    podProfile({ namespace, pod, cpuRequest, memoryRequest, cpu: stats(0.5), memory: stats(200 * MIB) }),
    'prod',
    config,
  );
  if (!rec) throw new Error(`expected a resize for ${namespace}/${pod}`);
  return rec;
};

describe('finiteOrNull', () => {
  it('maps non-finite and missing values to null', () => {
    expect(finiteOrNull(1.5)).toBe(1.5);
    expect(finiteOrNull(Number.POSITIVE_INFINITY)).toBeNull();
    expect(finiteOrNull(Number.NaN)).toBeNull();
    expect(finiteOrNull(undefined)).toBeNull();
  });
});

describe('toPodFacts', () => {
  it('writes infinite ratios as null', () => {
    const facts = toPodFacts(podProfile({ cpuOverprovisionRatio: Number.POSITIVE_INFINITY, cpuRequest: 1 }));
    expect(facts.cpuOverprovisionRatio).toBeNull();
    expect(facts.cpuRequest).toBe(1);
    expect(facts.cpu).toBeNull();
  });
});

describe('sortRecommendations', () => {
  it('orders by type, then namespace and name', () => {
    const nodes = ['n1', 'n2', 'n3', 'n4'].map((node) => nodeProfile({ node }));
    const node = adviseNodeRightsize(nodes, [podProfile({ cpuRequest: 1, memoryRequest: GIB })], [], 'prod', config);
    if (!node) throw new Error('expected a node recommendation');
    const sorted = sortRecommendations([node, resizeFor('z', 'a', 2, GIB), resizeFor('a', 'b', 2, GIB), resizeFor('a', 'B', 2, GIB)]);
    expect(sorted.map((rec) => (rec.type === 'POD_RESIZE' ? `${rec.namespace}/${rec.pod}` : rec.type))).toEqual([
      'a/B',
      'a/b',
      'z/a',
      'NODE_RIGHTSIZE',
    ]);
  });
});

describe('collectLimitations', () => {
  it('lists the static caveats and per-entity gaps in order', () => {
    const limitations = collectLimitations({
      pods: [podProfile(), podProfile({ pod: 'web-2', insufficientData: true })],
      nodes: [nodeProfile({ cpuFragmentation: 0.5 }), nodeProfile({ node: 'n2', cpuFragmentation: 0.5, memoryFragmentation: 0.5, insufficientData: true })],
      hpaCount: 1,
      resizes: [resizeFor('shop', 'web-1', 2, 256 * MIB)],
      attributions: [],
    });
    expect(limitations).toEqual([
      MEMORY_PRESSURE_LIMITATION,
      HPA_MATCHING_LIMITATION,
      'Memory fragmentation undefined on node n1 (no memory requests or allocatable)',
      '1 of 2 pod(s) have insufficient data and received no resize recommendation',
      '1 of 2 node(s) have insufficient data; node recommendations are low confidence',
    ]);
  });

  it('is empty for a clean cluster without HPAs or resizes', () => {
    expect(
      collectLimitations({
        pods: [podProfile()],
        nodes: [nodeProfile({ cpuFragmentation: 0.1, memoryFragmentation: 0.1 })],
        hpaCount: 0,
        resizes: [],
        attributions: [],
      }),
    ).toEqual([]);
  });
});

describe('buildSummary', () => {
  it('totals savings across resizes', () => {
    const summary = buildSummary({
      podCount: 5,
      nodeCount: 3,
      hpaCount: 2,
      resizes: [resizeFor('shop', 'cpu-heavy', 2, 256 * MIB), resizeFor('shop', 'memory-heavy', 0.6, GIB)],
      nodeRightsize: undefined,
      hpaMisalignments: [],
      fragmentedNodes: 1,
    });
    expect(summary.totalRecommendations).toBe(2);
    expect(summary.pods.text).toBe('2 of 5 pods need resizing');
    expect(summary.nodes.text).toBe('node pool of 3: no change');
    expect(summary.hpa.text).toBe('0 of 2 HPAs misaligned');
    expect(summary.potentialSavings).toEqual({
      cpuCores: 1.4,
      memoryBytes: 768 * MIB,
      memoryMiB: 768,
      memoryGiB: 0.75,
      text: '1.40 CPU cores, 0.75 GiB memory',
    });
  });
});
