import type { EngineConfig } from '../config/types.js';
import { debug } from '../debug.js';
import type { DisruptionBudgetInput } from './snapshot.js';
import { maxOf } from './statistics.js';
import type {
  ConstraintBlocker,
  DaemonSetOverhead,
  FragmentationAttribution,
  LargeRequestPod,
  NodeResourceProfile,
  PodResourceProfile,
  ScaleDownBlocker,
} from './types.js';

const GIB = 1024 ** 3;

export type FragmentationType = 'CPU' | 'Memory' | 'Both' | 'None';

export interface FreeBlockSummary {
  largestFreeCpuBlock: number;
  largestFreeMemoryBlock: number;
  totalFreeCpu: number;
  totalFreeMemory: number;
  fragmentationType: FragmentationType;
}

/** Free capacity is fragmented on a dimension when its largest block holds at most half of the total. */
export const describeFreeBlocks = (cpuBlocks: readonly number[], memoryBlocks: readonly number[]): FreeBlockSummary => {
  const totalFreeCpu = cpuBlocks.reduce((sum, value) => sum + value, 0);
  const totalFreeMemory = memoryBlocks.reduce((sum, value) => sum + value, 0);
  const largestFreeCpuBlock = maxOf(cpuBlocks) ?? 0;
  const largestFreeMemoryBlock = maxOf(memoryBlocks) ?? 0;
  const cpuFragmented = totalFreeCpu > 0 && largestFreeCpuBlock <= 0.5 * totalFreeCpu;
  const memoryFragmented = totalFreeMemory > 0 && largestFreeMemoryBlock <= 0.5 * totalFreeMemory;

  let fragmentationType: FragmentationType = 'None';
  if (cpuFragmented && memoryFragmented) fragmentationType = 'Both';
  else if (cpuFragmented) fragmentationType = 'CPU';
  else if (memoryFragmented) fragmentationType = 'Memory';

  return { largestFreeCpuBlock, largestFreeMemoryBlock, totalFreeCpu, totalFreeMemory, fragmentationType };
};

export const isFragmented = (node: NodeResourceProfile, threshold: number): boolean =>
  (node.cpuFragmentation !== null && node.cpuFragmentation >= threshold) ||
  (node.memoryFragmentation !== null && node.memoryFragmentation >= threshold);

interface FreeCapacity {
  cpu: number;
  memory: number;
}

const freeCapacity = (node: NodeResourceProfile): FreeCapacity => ({
  cpu: Math.max(0, node.cpuAllocatable - node.cpuRequested),
  memory: Math.max(0, node.memoryAllocatable - node.memoryRequested),
});

const freeShare = (node: NodeResourceProfile): number => {
  const free = freeCapacity(node);
  const cpuShare = node.cpuAllocatable > 0 ? free.cpu / node.cpuAllocatable : 0;
  const memoryShare = node.memoryAllocatable > 0 ? free.memory / node.memoryAllocatable : 0;
  return cpuShare + memoryShare;
};

/** The other node with the largest normalized free block; ties go to the lexically first name. */
export const largestFreeNode = (
  node: NodeResourceProfile,
  nodes: readonly NodeResourceProfile[],
): NodeResourceProfile | undefined => {
  let best: NodeResourceProfile | undefined;
  let bestShare = Number.NEGATIVE_INFINITY;
  for (const candidate of nodes) {
    if (candidate.node === node.node) continue;
    const share = freeShare(candidate);
    if (share > bestShare || (share === bestShare && best !== undefined && candidate.node < best.node)) {
      best = candidate;
      bestShare = share;
    }
  }
  return best;
};

const fits = (pod: PodResourceProfile, target: NodeResourceProfile): boolean => {
  const free = freeCapacity(target);
  return (pod.cpuRequest ?? 0) <= free.cpu && (pod.memoryRequest ?? 0) <= free.memory;
};

const workloadName = (pod: PodResourceProfile): string | null => pod.ownerName ?? null;

const findLargeRequestPods = (
  node: NodeResourceProfile,
  members: readonly PodResourceProfile[],
  nodes: readonly NodeResourceProfile[],
  config: EngineConfig,
): LargeRequestPod[] => {
  const pct = config.fragmentation.largePodRequestPct;
  const cpuThreshold = node.cpuAllocatable * (pct / 100);
  const memoryThreshold = node.memoryAllocatable * (pct / 100);
  const candidate = largestFreeNode(node, nodes);

  const out: LargeRequestPod[] = [];
  for (const pod of members) {
    const requestCpu = pod.cpuRequest ?? 0;
    const requestMemory = pod.memoryRequest ?? 0;
    const reasons: string[] = [];
    if (requestCpu > cpuThreshold) {
      reasons.push(`CPU request ${requestCpu.toFixed(3)} cores exceeds ${pct}% of node allocatable`);
    }
    if (requestMemory > memoryThreshold) {
      reasons.push(`Memory request ${(requestMemory / GIB).toFixed(2)}GiB exceeds ${pct}% of node allocatable`);
    }
    if (reasons.length === 0) continue;

    const canFitElsewhere = candidate !== undefined && fits(pod, candidate);
    if (candidate === undefined) reasons.push('no other node to compare against');
    else reasons.push(canFitElsewhere ? `fits on ${candidate.node}` : `does not fit on ${candidate.node}, the node with the largest free block`);

    out.push({
      pod: pod.pod,
      namespace: pod.namespace,
      workloadKind: pod.ownerKind,
      workloadName: workloadName(pod),
      requestCpu,
      requestMemory,
      canFitElsewhere,
      candidateNode: candidate?.node ?? null,
      reason: reasons.join('; '),
    });
  }
  return out.slice(0, config.fragmentation.topN);
};

export const constraintsFromLabels = (labels: Readonly<Record<string, string>>): ConstraintBlocker['constraints'] => {
  const constraints: ConstraintBlocker['constraints'] = [];
  const keys = Object.keys(labels).sort();
  const topology = keys.filter((key) => key.toLowerCase().includes('topology'));
  const zone = keys.filter((key) => {
    const lower = key.toLowerCase();
    return lower.includes('zone') || lower.includes('region');
  });
  if (topology.length > 0) {
    constraints.push({
      type: 'topologySpreadConstraints',
      summary: `topology labels: ${topology.map((key) => `${key}=${labels[key]}`).join(', ')}`,
    });
  }
  if (zone.length > 0) {
    constraints.push({
      type: 'zoneAffinity',
      summary: `zone/region labels: ${zone.map((key) => `${key}=${labels[key]}`).join(', ')}`,
    });
  }
  return constraints;
};

const findConstraintBlockers = (members: readonly PodResourceProfile[], topN: number): ConstraintBlocker[] => {
  const detected: ConstraintBlocker[] = [];
  const unknown: ConstraintBlocker[] = [];
  for (const pod of members) {
    const constraints = constraintsFromLabels(pod.labels);
    const blocker: ConstraintBlocker = {
      pod: pod.pod,
      namespace: pod.namespace,
      workloadKind: pod.ownerKind,
      workloadName: workloadName(pod),
      constraints,
      constraintVisibility: constraints.length > 0 ? 'labels' : 'unknown',
    };
    (constraints.length > 0 ? detected : unknown).push(blocker);
  }
  return [...detected, ...unknown].slice(0, topN);
};

const round2 = (value: number): number => Math.round(value * 100) / 100;

const calculateDaemonSetOverhead = (
  node: NodeResourceProfile,
  members: readonly PodResourceProfile[],
  thresholdPct: number,
): DaemonSetOverhead => {
  const daemonPods = members.filter((pod) => pod.ownerKind === 'daemonset');
  const cpu = daemonPods.reduce((sum, pod) => sum + (pod.cpuRequest ?? 0), 0);
  const memory = daemonPods.reduce((sum, pod) => sum + (pod.memoryRequest ?? 0), 0);
  const cpuPercent = node.cpuAllocatable > 0 ? (cpu / node.cpuAllocatable) * 100 : 0;
  const memoryPercent = node.memoryAllocatable > 0 ? (memory / node.memoryAllocatable) * 100 : 0;
  const exceedsThreshold = cpuPercent > thresholdPct || memoryPercent > thresholdPct;
  const names = exceedsThreshold ? [...new Set(daemonPods.map((pod) => pod.ownerName ?? pod.pod))].sort() : [];
  return {
    cpuPercent: round2(cpuPercent),
    memoryPercent: round2(memoryPercent),
    exceedsThreshold,
    contributingDaemonSets: names,
  };
};

/** A budget with no selector covers its whole namespace. */
export const budgetCovers = (budget: DisruptionBudgetInput, pod: PodResourceProfile): boolean => {
  if (budget.namespace !== pod.namespace) return false;
  const selector = Object.entries(budget.matchLabels ?? {});
  return selector.every(([key, value]) => pod.labels[key] === value);
};

const findScaleDownBlockers = (
  node: NodeResourceProfile,
  members: readonly PodResourceProfile[],
  nodes: readonly NodeResourceProfile[],
  budgets: readonly DisruptionBudgetInput[],
  topN: number,
): ScaleDownBlocker[] => {
  const others = nodes.filter((other) => other.node !== node.node);
  const out: ScaleDownBlocker[] = [];
  for (const pod of members) {
    if (pod.ownerKind === 'daemonset') continue;
    const reasons: ScaleDownBlocker['reasons'] = [];
    const messages: string[] = [];
    if (!others.some((other) => fits(pod, other))) {
      reasons.push('NO_FIT_ELSEWHERE');
      messages.push('requests do not fit on any other node');
    }
    const budget = budgets.find((candidate) => candidate.disruptionsAllowed === 0 && budgetCovers(candidate, pod));
    if (budget) {
      reasons.push('DISRUPTION_BUDGET');
      messages.push(`disruption budget ${budget.namespace}/${budget.name} allows 0 disruptions`);
    }
    if (reasons.length === 0) continue;
    out.push({
      pod: pod.pod,
      namespace: pod.namespace,
      workloadKind: pod.ownerKind,
      workloadName: workloadName(pod),
      requestCpu: pod.cpuRequest ?? 0,
      requestMemory: pod.memoryRequest ?? 0,
      reasons,
      blockingReason: messages.join('; '),
    });
    if (out.length >= topN) break;
  }
  return out;
};

export const attributeNodeFragmentation = (
  node: NodeResourceProfile,
  nodes: readonly NodeResourceProfile[],
  podsByKey: ReadonlyMap<string, PodResourceProfile>,
  budgets: readonly DisruptionBudgetInput[],
  config: EngineConfig,
): FragmentationAttribution | undefined => {
  if (!isFragmented(node, config.fragmentation.fragmentationThreshold)) return undefined;
  const members = node.pods.flatMap((key) => {
    const pod = podsByKey.get(key);
    return pod ? [pod] : [];
  });
  const { topN } = config.fragmentation;
  return {
    node: node.node,
    cpuFragmentation: node.cpuFragmentation,
    memoryFragmentation: node.memoryFragmentation,
    largeRequestPods: findLargeRequestPods(node, members, nodes, config),
    constraintBlockers: findConstraintBlockers(members, topN),
    daemonsetOverhead: calculateDaemonSetOverhead(node, members, config.fragmentation.daemonsetOverheadPct),
    scaleDownBlockers: findScaleDownBlockers(node, members, nodes, budgets, topN),
  };
};

/** Runs once every node profile exists; free capacity is compared across the whole node set. */
export const attributeFragmentation = (
  nodes: readonly NodeResourceProfile[],
  podsByKey: ReadonlyMap<string, PodResourceProfile>,
  budgets: readonly DisruptionBudgetInput[],
  config: EngineConfig,
): FragmentationAttribution[] => {
  debug('attributeFragmentation start', { nodes: nodes.length, budgets: budgets.length });
  const out: FragmentationAttribution[] = [];
  for (const node of nodes) {
    const attribution = attributeNodeFragmentation(node, nodes, podsByKey, budgets, config);
    if (attribution) out.push(attribution);
  }
  debug('attributeFragmentation end', { fragmentedNodes: out.length });
  return out;
};
