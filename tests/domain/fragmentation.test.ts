import { describe, expect, it } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/types.js';
import {
  attributeFragmentation,
  budgetCovers,
  constraintsFromLabels,
  describeFreeBlocks,
  isFragmented,
  largestFreeNode,
} from '../../src/domain/fragmentation.js';
import { podKey } from '../../src/domain/profiles.js';
import type { PodResourceProfile } from '../../src/domain/types.js';
import { GIB, nodeProfile, podProfile } from '../fixtures.js';

const config = DEFAULT_ENGINE_CONFIG;

const big = podProfile({
  namespace: 'a',
  pod: 'big',
  node: 'n1',
  ownerName: 'big',
  cpuRequest: 2,
  memoryRequest: 2 * GIB,
  labels: { app: 'big', 'topology.kubernetes.io/zone': 'z1' },
});
const logs = podProfile({
  namespace: 'a',
  pod: 'logs-abc',
  node: 'n1',
  ownerKind: 'daemonset',
  ownerName: 'logs',
  cpuRequest: 0.8,
  memoryRequest: GIB,
});
const mid = podProfile({ namespace: 'a', pod: 'mid', node: 'n2', ownerName: 'mid', cpuRequest: 3, memoryRequest: 4 * GIB });
const wide = podProfile({ namespace: 'a', pod: 'wide', node: 'n3', ownerName: 'wide', cpuRequest: 1.5, memoryRequest: 14 * GIB });

const podsByKey = new Map<string, PodResourceProfile>(
  [big, logs, mid, wide].map((pod) => [podKey(pod.namespace, pod.pod), pod]),
);

const nodes = [
  nodeProfile({
    node: 'n1',
    cpuAllocatable: 4,
    memoryAllocatable: 16 * GIB,
    cpuRequested: 2.8,
    memoryRequested: 3 * GIB,
    cpuFragmentation: 0.3,
    memoryFragmentation: 0.8125,
    pods: ['a/big', 'a/logs-abc'],
  }),
  nodeProfile({
    node: 'n2',
    cpuAllocatable: 4,
    memoryAllocatable: 16 * GIB,
    cpuRequested: 3,
    memoryRequested: 4 * GIB,
    cpuFragmentation: 0.25,
    memoryFragmentation: 0.75,
    pods: ['a/mid'],
  }),
  nodeProfile({
    node: 'n3',
    cpuAllocatable: 4,
    memoryAllocatable: 16 * GIB,
    cpuRequested: 1.5,
    memoryRequested: 14 * GIB,
    cpuFragmentation: 0.625,
    memoryFragmentation: 0.125,
    pods: ['a/wide'],
  }),
];

const budgets = [{ namespace: 'a', name: 'big-pdb', disruptionsAllowed: 0, matchLabels: { app: 'big' } }];

describe('describeFreeBlocks', () => {
  it('classifies which dimension is fragmented', () => {
    expect(describeFreeBlocks([1, 1, 1], [10]).fragmentationType).toBe('CPU');
    expect(describeFreeBlocks([10], [1, 1, 1]).fragmentationType).toBe('Memory');
    expect(describeFreeBlocks([2, 2], [3, 3]).fragmentationType).toBe('Both');
    expect(describeFreeBlocks([5, 1], [1, 5]).fragmentationType).toBe('None');
  });

  it('handles many free blocks', () => {
    const cpuBlocks = Array.from({ length: 200_000 }, (_, i) => (i === 123 ? 3 : 1));
    const summary = describeFreeBlocks(cpuBlocks, [1]);
    expect(summary.largestFreeCpuBlock).toBe(3);
    expect(summary.totalFreeCpu).toBe(200_002);
    expect(summary.fragmentationType).toBe('CPU');
  });

  it('handles no free capacity', () => {
    expect(describeFreeBlocks([], [])).toEqual({
      largestFreeCpuBlock: 0,
      largestFreeMemoryBlock: 0,
      totalFreeCpu: 0,
      totalFreeMemory: 0,
      fragmentationType: 'None',
    });
  });
});

describe('isFragmented', () => {
  it('needs a known ratio at or above the threshold', () => {
    expect(isFragmented(nodeProfile({ cpuFragmentation: 0.3 }), 0.3)).toBe(true);
    expect(isFragmented(nodeProfile({ cpuFragmentation: 0.1, memoryFragmentation: 0.2 }), 0.3)).toBe(false);
    expect(isFragmented(nodeProfile(), 0.3)).toBe(false);
  });
});

describe('largestFreeNode', () => {
  it('picks the node with the largest normalized free share', () => {
    expect(largestFreeNode(nodes[0], nodes)?.node).toBe('n2');
  });

  it('breaks ties by name', () => {
    const self = nodeProfile({ node: 'self' });
    expect(largestFreeNode(self, [self, nodeProfile({ node: 'b' }), nodeProfile({ node: 'a' })])?.node).toBe('a');
  });

  it('is undefined for a single node', () => {
    expect(largestFreeNode(nodes[0], [nodes[0]])).toBeUndefined();
  });
});

describe('constraintsFromLabels', () => {
  it('reports topology and zone labels independently', () => {
    expect(constraintsFromLabels({ app: 'big', 'topology.kubernetes.io/zone': 'z1' })).toEqual([
      { type: 'topologySpreadConstraints', summary: 'topology labels: topology.kubernetes.io/zone=z1' },
      { type: 'zoneAffinity', summary: 'zone/region labels: topology.kubernetes.io/zone=z1' },
    ]);
    expect(constraintsFromLabels({ app: 'web' })).toEqual([]);
  });
});

describe('budgetCovers', () => {
  it('matches the selector within the namespace', () => {
    expect(budgetCovers(budgets[0], big)).toBe(true);
    expect(budgetCovers(budgets[0], mid)).toBe(false);
    expect(budgetCovers({ ...budgets[0], namespace: 'b' }, big)).toBe(false);
  });

  it('covers the whole namespace without a selector', () => {
    expect(budgetCovers({ namespace: 'a', name: 'all', disruptionsAllowed: 0 }, mid)).toBe(true);
  });
});

describe('attributeFragmentation', () => {
  const attributions = attributeFragmentation(nodes, podsByKey, budgets, config);
  const n1 = attributions.find((entry) => entry.node === 'n1');

  it('attributes every fragmented node', () => {
    expect(attributions.map((entry) => entry.node)).toEqual(['n1', 'n2', 'n3']);
  });

  it('finds large pods and where they could go', () => {
    expect(n1?.largeRequestPods).toEqual([
      {
        pod: 'big',
        namespace: 'a',
        workloadKind: 'deployment',
        workloadName: 'big',
        requestCpu: 2,
        requestMemory: 2 * GIB,
        canFitElsewhere: false,
        candidateNode: 'n2',
        reason: 'CPU request 2.000 cores exceeds 25% of node allocatable; does not fit on n2, the node with the largest free block',
      },
    ]);
  });

  it('lists label-visible constraints before unknown ones', () => {
    expect(n1?.constraintBlockers.map((entry) => [entry.pod, entry.constraintVisibility])).toEqual([
      ['big', 'labels'],
      ['logs-abc', 'unknown'],
    ]);
  });

  it('measures DaemonSet overhead', () => {
    expect(n1?.daemonsetOverhead).toEqual({
      cpuPercent: 20,
      memoryPercent: 6.25,
      exceedsThreshold: true,
      contributingDaemonSets: ['logs'],
    });
  });

  it('blocks scale-down on a zero-disruption budget', () => {
    expect(n1?.scaleDownBlockers).toEqual([
      {
        pod: 'big',
        namespace: 'a',
        workloadKind: 'deployment',
        workloadName: 'big',
        requestCpu: 2,
        requestMemory: 2 * GIB,
        reasons: ['DISRUPTION_BUDGET'],
        blockingReason: 'disruption budget a/big-pdb allows 0 disruptions',
      },
    ]);
  });

  it('flags pods that fit nowhere else', () => {
    const n2 = attributions.find((entry) => entry.node === 'n2');
    expect(n2?.scaleDownBlockers[0]?.reasons).toEqual(['NO_FIT_ELSEWHERE']);
    expect(n2?.scaleDownBlockers[0]?.blockingReason).toBe('requests do not fit on any other node');
  });
});
