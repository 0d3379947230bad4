import { describe, expect, it } from 'vitest';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/types.js';
import { adviseNodeRightsize, efficiencyState, podDemand, requiredNodes } from '../../src/domain/nodeRightsize.js';
import { advisePodResize } from '../../src/domain/podResize.js';
import { GIB, MIB, nodeProfile, podProfile, stats } from '../fixtures.js';

const config = DEFAULT_ENGINE_CONFIG;

const pods = (count: number, cpuRequest: number, memoryRequest: number) =>
  Array.from({ length: count }, (_, i) => podProfile({ pod: `p${i}`, cpuRequest, memoryRequest }));

const smallNodes = () => [
  nodeProfile({ node: 'n1', cpuAllocatable: 4, memoryAllocatable: 16 * GIB }),
  nodeProfile({ node: 'n2', cpuAllocatable: 4, memoryAllocatable: 16 * GIB }),
];

const bigNode = () =>
  nodeProfile({
    node: 'big',
    cpuAllocatable: 64,
    memoryAllocatable: 256 * GIB,
    cpu: stats(8),
    memory: stats(20 * GIB),
  });

describe('requiredNodes', () => {
  it('never drops below one node', () => {
    expect(requiredNodes({ cpu: 0, memory: 0 }, 8, 32 * GIB, 0.8)).toBe(1);
  });

  it('takes the tighter dimension', () => {
    expect(requiredNodes({ cpu: 7, memory: 4 * GIB }, 4, 16 * GIB, 0.8)).toBe(3);
    expect(requiredNodes({ cpu: 1, memory: 30 * GIB }, 4, 16 * GIB, 0.8)).toBe(3);
  });

  it('does not decrease as demand grows', () => {
    let previous = 0;
    for (let cpu = 0; cpu <= 40; cpu += 2.5) {
      const next = requiredNodes({ cpu, memory: GIB }, 8, 32 * GIB, 0.8);
      expect(next).toBeGreaterThanOrEqual(previous);
      previous = next;
    }
  });

  it('does not increase as more of each node becomes usable', () => {
    const demand = { cpu: 20, memory: 60 * GIB };
    let previous = Number.POSITIVE_INFINITY;
    for (const factor of [0.5, 0.6, 0.7, 0.8, 0.9, 1]) {
      const next = requiredNodes(demand, 8, 32 * GIB, factor);
      expect(next).toBeLessThanOrEqual(previous);
      previous = next;
    }
  });
});

describe('efficiencyState', () => {
  it('maps efficiency to a state', () => {
    expect(efficiencyState(0.1, config)).toBe('highly_oversized');
    expect(efficiencyState(0.4, config)).toBe('moderately_oversized');
    expect(efficiencyState(0.8, config)).toBe('right_sized');
    expect(efficiencyState(0.9, config)).toBe('saturated');
  });
});

describe('podDemand', () => {
  const profile = podProfile({ cpuRequest: 2, memoryRequest: 256 * MIB, cpu: stats(0.5), memory: stats(200 * MIB) });

  it('prefers the resize recommendation', () => {
    const resize = advisePodResize(profile, 'prod', config);
    expect(podDemand(profile, resize, 'prod', config)).toEqual({ cpu: 0.6, memory: 256 * MIB });
  });

  it('computes sizing from stats without a recommendation', () => {
    expect(podDemand(profile, undefined, 'nonprod', config).memory).toBe(256 * MIB);
  });

  it('falls back to current requests, then zero', () => {
    expect(podDemand(podProfile({ cpuRequest: 1 }), undefined, 'prod', config)).toEqual({ cpu: 1, memory: 0 });
  });
});

describe('adviseNodeRightsize', () => {
  it('consolidates an oversized pool', () => {
    const nodes = ['n1', 'n2', 'n3', 'n4'].map((node) => nodeProfile({ node }));
    const rec = adviseNodeRightsize(nodes, pods(4, 1, 2 * GIB), [], 'prod', config);
    expect(rec).toBeDefined();
    if (!rec) return;
    expect(rec.direction).toBe('down');
    expect(rec.strategy).toBe('consolidate');
    expect(rec.rule).toBe('LOW_UTILIZATION');
    expect(rec.confidence).toBe('high');
    expect(rec.metrics.requiredNodes).toBe(1);
    expect(rec.metrics.consolidationPossible).toBe(true);
    expect(rec.metrics.nodeEfficiency).toBe(0.125);
    expect(rec.metrics.efficiencyState).toBe('highly_oversized');
    expect(rec.metrics.cpuPressure).toBe(0.125);
    expect(rec.example).toBe('consolidate 4 -> 1 node(s) of 8 cores / 32.0GiB');
    expect(rec.reason.startsWith('CPU pressure 12.5%')).toBe(true);
    expect(rec.safety).toEqual({ riskLevel: 'Low', confidenceLevel: 'High', safeToResize: true });
  });

  it('adds capacity when CPU pressure is high', () => {
    const rec = adviseNodeRightsize(smallNodes(), pods(1, 7, 4 * GIB), [], 'prod', config);
    expect(rec?.direction).toBe('up');
    expect(rec?.rule).toBe('HIGH_UTILIZATION');
    expect(rec?.confidence).toBe('medium');
    expect(rec?.example).toBe('add 1 node(s) of 4 cores / 16.0GiB');
  });

  it('reshapes a CPU-heavy pool', () => {
    const rec = adviseNodeRightsize(smallNodes(), pods(1, 5.6, 6 * GIB), [], 'prod', config);
    expect(rec?.direction).toBe('right-size');
    expect(rec?.strategy).toBe('reshape');
    expect(rec?.metrics.shape).toBe('cpu-heavy');
    expect(rec?.example).toBe('compute-optimized instance type');
  });

  it('suggests smaller nodes when the count cannot drop', () => {
    const rec = adviseNodeRightsize([bigNode()], pods(20, 0.5, GIB), [], 'prod', config);
    expect(rec?.strategy).toBe('smaller_nodes');
    expect(rec?.confidence).toBe('medium');
    expect(rec?.metrics.smallerNodesFeasible).toBe(true);
    expect(rec?.example).toBe('use nodes of 32 cores / 128.0GiB');
  });

  it('reports an underused pool without an example', () => {
    const rec = adviseNodeRightsize([bigNode()], pods(1, 10, 20 * GIB), [], 'prod', config);
    expect(rec?.strategy).toBe('underused');
    expect(rec?.confidence).toBe('low');
    expect(rec?.example).toBeNull();
  });

  it('lowers confidence when a node lacks data', () => {
    const nodes = ['n1', 'n2', 'n3', 'n4'].map((node) => nodeProfile({ node, insufficientData: node === 'n2' }));
    const rec = adviseNodeRightsize(nodes, pods(4, 1, 2 * GIB), [], 'prod', config);
    expect(rec?.confidence).toBe('low');
    expect(rec?.metrics.nodesWithInsufficientData).toEqual(['n2']);
    expect(rec?.reason.endsWith('; insufficient data on n2')).toBe(true);
    expect(rec?.safety.safeToResize).toBe(false);
  });

  it('lowers confidence when a contributing pod lacks data', () => {
    const nodes = ['n1', 'n2', 'n3', 'n4'].map((node) => nodeProfile({ node }));
    const contributing = pods(4, 1, 2 * GIB).map((pod) => (pod.pod === 'p0' ? { ...pod, insufficientData: true } : pod));
    const rec = adviseNodeRightsize(nodes, contributing, [], 'prod', config);
    expect(rec?.strategy).toBe('consolidate');
    expect(rec?.confidence).toBe('low');
    expect(rec?.metrics.nodesWithInsufficientData).toEqual([]);
    expect(rec?.metrics.podsWithInsufficientData).toEqual(['shop/p0']);
    expect(rec?.reason.endsWith('; insufficient data on pods shop/p0')).toBe(true);
    expect(rec?.safety).toEqual({ riskLevel: 'Low', confidenceLevel: 'Low', safeToResize: false });
  });

  it('returns nothing without node usage', () => {
    const nodes = [nodeProfile({ cpu: undefined, memory: undefined })];
    expect(adviseNodeRightsize(nodes, pods(1, 1, GIB), [], 'prod', config)).toBeUndefined();
  });

  it('returns nothing for a balanced, moderately used pool', () => {
    expect(adviseNodeRightsize(smallNodes(), pods(1, 4, 8 * GIB), [], 'prod', config)).toBeUndefined();
  });
});
