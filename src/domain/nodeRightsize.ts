import type { EngineConfig, Environment } from '../config/types.js';
import { debug } from '../debug.js';
import { computePodSizing } from './podResize.js';
import { compareText, podKey } from './profiles.js';
import { classifySafety, overprovisionRatio } from './safety.js';
import type {
  EfficiencyState,
  NodeResourceProfile,
  NodeRightsizeRecommendation,
  NodeShape,
  PodResizeRecommendation,
  PodResourceProfile,
} from './types.js';

const GIB = 1024 ** 3;

export interface PodDemand {
  cpu: number;
  memory: number;
}

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

const ratio = (numerator: number, denominator: number): number => (denominator > 0 ? numerator / denominator : 0);

/**
 * What a pod will ask the scheduler for once resizes land: the resize
 * recommendation when there is one, else freshly computed sizing, else the
 * current request.
 */
export const podDemand = (
  profile: PodResourceProfile,
  resize: PodResizeRecommendation | undefined,
  env: Environment,
  config: EngineConfig,
): PodDemand => {
  if (resize) {
    return { cpu: resize.recommended.cpuRequest, memory: resize.recommended.memoryRequest };
  }
  if (profile.cpu && profile.memory) {
    const sizing = computePodSizing(profile.cpu, profile.memory, env, config);
    return { cpu: sizing.cpuRequest, memory: sizing.memoryRequest };
  }
  return { cpu: profile.cpuRequest ?? 0, memory: profile.memoryRequest ?? 0 };
};

const nodesFor = (demand: number, perNode: number, usableCapacityFactor: number): number => {
  const usable = perNode * usableCapacityFactor;
  return usable > 0 ? Math.ceil(demand / usable) : 0;
};

/** Nodes of the given shape needed to hold the demand at the usable capacity factor; never below one. */
export const requiredNodes = (
  demand: PodDemand,
  nodeCpu: number,
  nodeMemory: number,
  usableCapacityFactor: number,
): number =>
  Math.max(
    1,
    nodesFor(demand.cpu, nodeCpu, usableCapacityFactor),
    nodesFor(demand.memory, nodeMemory, usableCapacityFactor),
  );

export const efficiencyState = (efficiency: number, config: EngineConfig): EfficiencyState => {
  if (efficiency < config.node.highlyOversizedEfficiency) return 'highly_oversized';
  if (efficiency < config.node.moderatelyOversizedEfficiency) return 'moderately_oversized';
  if (efficiency <= config.node.usableCapacityFactor) return 'right_sized';
  return 'saturated';
};

const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;

const describeShape = (cpuCores: number, memoryBytes: number): string =>
  `${round4(cpuCores)} cores / ${(memoryBytes / GIB).toFixed(1)}GiB`;

interface Decision {
  direction: NodeRightsizeRecommendation['direction'];
  strategy: NodeRightsizeRecommendation['strategy'];
  rule: NodeRightsizeRecommendation['rule'];
  confidence: NodeRightsizeRecommendation['confidence'];
}

export const adviseNodeRightsize = (
  nodes: readonly NodeResourceProfile[],
  pods: readonly PodResourceProfile[],
  resizes: readonly PodResizeRecommendation[],
  env: Environment,
  config: EngineConfig,
): NodeRightsizeRecommendation | undefined => {
  debug('adviseNodeRightsize start', { nodes: nodes.length, pods: pods.length, resizes: resizes.length });
  const withData = nodes.filter((node) => node.cpu !== undefined || node.memory !== undefined);
  const totalCpuAllocatable = nodes.reduce((sum, node) => sum + node.cpuAllocatable, 0);
  const totalMemoryAllocatable = nodes.reduce((sum, node) => sum + node.memoryAllocatable, 0);
  if (withData.length === 0 || totalCpuAllocatable <= 0 || totalMemoryAllocatable <= 0) {
    debug('adviseNodeRightsize end', { recommendation: false, reason: 'no usable node data' });
    return undefined;
  }

  const resizeByKey = new Map(resizes.map((rec) => [podKey(rec.namespace, rec.pod), rec]));
  const demand = pods.reduce<PodDemand>(
    (acc, pod) => {
      const next = podDemand(pod, resizeByKey.get(podKey(pod.namespace, pod.pod)), env, config);
      return { cpu: acc.cpu + next.cpu, memory: acc.memory + next.memory };
    },
    { cpu: 0, memory: 0 },
  );

  const nodeCount = nodes.length;
  const nodeCpuCapacity = totalCpuAllocatable / nodeCount;
  const nodeMemoryCapacity = totalMemoryAllocatable / nodeCount;

  const nodeCpuP95 = nodes.reduce((sum, node) => sum + (node.cpu?.p95 ?? 0), 0);
  const nodeMemoryP95 = nodes.reduce((sum, node) => sum + (node.memory?.p95 ?? 0), 0);
  const cpuEfficiency = ratio(nodeCpuP95, totalCpuAllocatable);
  const memoryEfficiency = ratio(nodeMemoryP95, totalMemoryAllocatable);
  const nodeEfficiency = 0.5 * cpuEfficiency + 0.5 * memoryEfficiency;

  const required = requiredNodes(demand, nodeCpuCapacity, nodeMemoryCapacity, config.node.usableCapacityFactor);
  const consolidationPossible = required < nodeCount;

  const cpuPressure = ratio(demand.cpu, totalCpuAllocatable);
  const memoryPressure = ratio(demand.memory, totalMemoryAllocatable);
  const shapeImbalanced = Math.abs(cpuPressure - memoryPressure) > config.node.shapeImbalanceThreshold;
  let shape: NodeShape = 'balanced';
  if (shapeImbalanced) shape = cpuPressure > memoryPressure ? 'cpu-heavy' : 'memory-heavy';

  const podCount = pods.length;
  const avgPodCpu = podCount > 0 ? demand.cpu / podCount : 0;
  const avgPodMemory = podCount > 0 ? demand.memory / podCount : 0;
  // zero average demand places no bound on that dimension
  const podsPerNodeCpu = avgPodCpu > 0 ? nodeCpuCapacity / avgPodCpu : Number.POSITIVE_INFINITY;
  const podsPerNodeMemory = avgPodMemory > 0 ? nodeMemoryCapacity / avgPodMemory : Number.POSITIVE_INFINITY;
  const smallerNodesFeasible =
    podCount > 0 &&
    nodeEfficiency < config.node.moderatelyOversizedEfficiency &&
    podsPerNodeCpu > config.node.minPodsPerNode &&
    podsPerNodeMemory > config.node.minPodsPerNode;

  const cpuHigh = cpuPressure * 100 > config.node.cpuHighPct;
  const memoryHigh = memoryPressure * 100 > config.node.memoryHighPct;
  const cpuLow = cpuPressure * 100 < config.node.cpuLowPct;
  const memoryLow = memoryPressure * 100 < config.node.memoryLowPct;

  let decision: Decision | undefined;
  if (cpuHigh || memoryHigh) {
    decision = {
      direction: 'up',
      strategy: 'add_capacity',
      rule: 'HIGH_UTILIZATION',
      confidence: cpuHigh && memoryHigh ? 'high' : 'medium',
    };
  } else if (cpuLow && memoryLow) {
    if (consolidationPossible) {
      decision = { direction: 'down', strategy: 'consolidate', rule: 'LOW_UTILIZATION', confidence: 'high' };
    } else if (smallerNodesFeasible) {
      decision = { direction: 'down', strategy: 'smaller_nodes', rule: 'LOW_UTILIZATION', confidence: 'medium' };
    } else {
      decision = { direction: 'down', strategy: 'underused', rule: 'LOW_UTILIZATION', confidence: 'low' };
    }
  } else if (shapeImbalanced) {
    decision = { direction: 'right-size', strategy: 'reshape', rule: 'SHAPE_IMBALANCE', confidence: 'medium' };
  }

  if (!decision) {
    debug('adviseNodeRightsize end', { recommendation: false, cpuPressure, memoryPressure });
    return undefined;
  }

  const nodesWithInsufficientData = nodes
    .filter((node) => node.insufficientData)
    .map((node) => node.node)
    .sort();
  // insufficient pods still contribute demand
  const podsWithInsufficientData = pods
    .filter((pod) => pod.insufficientData)
    .map((pod) => podKey(pod.namespace, pod.pod))
    .sort(compareText);
  const insufficientData = nodesWithInsufficientData.length > 0 || podsWithInsufficientData.length > 0;
  if (insufficientData) decision.confidence = 'low';

  const currentCpuRequests = pods.reduce((sum, pod) => sum + (pod.cpuRequest ?? 0), 0);
  const currentMemoryRequests = pods.reduce((sum, pod) => sum + (pod.memoryRequest ?? 0), 0);

  const pressureText = `CPU pressure ${pct(cpuPressure)}, memory pressure ${pct(memoryPressure)} of ${nodeCount} node(s) after resizes`;
  let reason = pressureText;
  let example: string | null = null;
  switch (decision.strategy) {
    case 'add_capacity':
      reason += `; above the high-utilization threshold`;
      example = `add ${Math.max(1, required - nodeCount)} node(s) of ${describeShape(nodeCpuCapacity, nodeMemoryCapacity)}`;
      break;
    case 'consolidate':
      reason += `; demand fits on ${required} node(s) at ${pct(config.node.usableCapacityFactor)} usable capacity`;
      example = `consolidate ${nodeCount} -> ${required} node(s) of ${describeShape(nodeCpuCapacity, nodeMemoryCapacity)}`;
      break;
    case 'smaller_nodes':
      reason += `; node count cannot drop but average pod size allows more than ${config.node.minPodsPerNode} pods on half-size nodes`;
      example = `use nodes of ${describeShape(nodeCpuCapacity / 2, nodeMemoryCapacity / 2)}`;
      break;
    case 'underused':
      reason += `; capacity is underused but neither consolidation nor smaller nodes is feasible`;
      break;
    case 'reshape':
      reason += `; ${shape} demand differs by more than ${pct(config.node.shapeImbalanceThreshold)}`;
      example = shape === 'cpu-heavy' ? 'compute-optimized instance type' : 'memory-optimized instance type';
      break;
  }
  if (podsWithInsufficientData.length > 0) {
    reason += `; insufficient data on pods ${podsWithInsufficientData.join(', ')}`;
  }
  if (nodesWithInsufficientData.length > 0) {
    reason += `; insufficient data on ${nodesWithInsufficientData.join(', ')}`;
  }

  const recommendation: NodeRightsizeRecommendation = {
    type: 'NODE_RIGHTSIZE',
    scope: 'cluster',
    ...decision,
    metrics: {
      currentNodeCount: nodeCount,
      requiredNodes: required,
      consolidationPossible,
      podCount,
      nodeCpuCapacity: round4(nodeCpuCapacity),
      nodeMemoryCapacity: Math.round(nodeMemoryCapacity),
      totalCpuRequired: round4(demand.cpu),
      totalMemoryRequired: Math.round(demand.memory),
      cpuEfficiency: round4(cpuEfficiency),
      memoryEfficiency: round4(memoryEfficiency),
      nodeEfficiency: round4(nodeEfficiency),
      efficiencyState: efficiencyState(nodeEfficiency, config),
      cpuPressure: round4(cpuPressure),
      memoryPressure: round4(memoryPressure),
      shapeImbalanced,
      shape,
      smallerNodesFeasible,
      nodesWithInsufficientData,
      podsWithInsufficientData,
    },
    reason,
    example,
    safety: classifySafety(
      {
        cpuOverprovisionRatio: overprovisionRatio(currentCpuRequests, nodeCpuP95),
        memoryOverprovisionRatio: overprovisionRatio(currentMemoryRequests, nodeMemoryP95),
        insufficientData,
      },
      config.maxOverprovisionRatio,
    ),
  };
  debug('adviseNodeRightsize end', { recommendation: true, direction: recommendation.direction, strategy: recommendation.strategy });
  return recommendation;
};
