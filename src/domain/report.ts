import { compareText } from './profiles.js';
import type { HpaInput } from './snapshot.js';
import type {
  FragmentationAttribution,
  HpaFacts,
  HpaFlag,
  HpaMisalignmentRecommendation,
  NodeFacts,
  NodeResourceProfile,
  NodeRightsizeRecommendation,
  PodFacts,
  PodResizeRecommendation,
  PodResourceProfile,
  Recommendation,
  ReportSummary,
  ResourceStats,
  StatsFacts,
} from './types.js';

const MIB = 1024 * 1024;
const GIB = 1024 * MIB;

export const MEMORY_PRESSURE_LIMITATION =
  'Memory recommendations use working-set usage only; node memory pressure and eviction history are not considered.';

export const HPA_MATCHING_LIMITATION =
  'HPA to pod mapping is heuristic and depends on naming conventions: pods match when the HPA target name is a substring of the pod name.';

export const finiteOrNull = (value: number | null | undefined): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const round2 = (value: number): number => Math.round(value * 100) / 100;

const statsFacts = (stats: ResourceStats | undefined): StatsFacts | null => {
  if (!stats) return null;
  const { avg, p95, p99, p100 } = stats;
  if (![avg, p95, p99, p100].every(Number.isFinite)) return null;
  return { avg, p95, p99, p100 };
};

export const toPodFacts = (profile: PodResourceProfile): PodFacts => ({
  namespace: profile.namespace,
  pod: profile.pod,
  node: profile.node ?? null,
  ownerKind: profile.ownerKind,
  ownerName: profile.ownerName ?? null,
  insufficientData: profile.insufficientData,
  evidence: [...profile.evidence],
  cpu: statsFacts(profile.cpu),
  memory: statsFacts(profile.memory),
  cpuRequest: finiteOrNull(profile.cpuRequest),
  memoryRequest: finiteOrNull(profile.memoryRequest),
  cpuSpikeRatio: finiteOrNull(profile.cpuSpikeRatio),
  cpuBursty: profile.cpuBursty,
  memoryBursty: profile.memoryBursty,
  cpuOverprovisionRatio: finiteOrNull(profile.cpuOverprovisionRatio),
  memoryOverprovisionRatio: finiteOrNull(profile.memoryOverprovisionRatio),
});

export const toNodeFacts = (profile: NodeResourceProfile, attribution: FragmentationAttribution | undefined): NodeFacts => ({
  node: profile.node,
  insufficientData: profile.insufficientData,
  evidence: [...profile.evidence],
  cpuAllocatable: profile.cpuAllocatable,
  memoryAllocatable: profile.memoryAllocatable,
  cpuRequested: profile.cpuRequested,
  memoryRequested: profile.memoryRequested,
  cpu: statsFacts(profile.cpu),
  memory: statsFacts(profile.memory),
  cpuFragmentation: finiteOrNull(profile.cpuFragmentation),
  memoryFragmentation: finiteOrNull(profile.memoryFragmentation),
  podCount: profile.pods.length,
  fragmentationAttribution: attribution ?? null,
});

export const toHpaFacts = (hpa: HpaInput, flags: HpaFlag[], matchedPods: string[]): HpaFacts => ({
  namespace: hpa.namespace,
  name: hpa.name,
  targetName: hpa.targetName,
  flags,
  matchedPods,
  matchProvenance: 'heuristic',
});

const TYPE_ORDER: Record<Recommendation['type'], number> = {
  POD_RESIZE: 0,
  NODE_RIGHTSIZE: 1,
  HPA_MISALIGNMENT: 2,
};

const sortKey = (rec: Recommendation): string => {
  switch (rec.type) {
    case 'POD_RESIZE':
      return `${rec.namespace}/${rec.pod}`;
    case 'NODE_RIGHTSIZE':
      return rec.scope;
    case 'HPA_MISALIGNMENT':
      return `${rec.namespace}/${rec.hpa}`;
  }
};

/** Type first (pod, node, HPA), then namespace/name. */
export const sortRecommendations = (recommendations: readonly Recommendation[]): Recommendation[] =>
  [...recommendations].sort((a, b) => TYPE_ORDER[a.type] - TYPE_ORDER[b.type] || compareText(sortKey(a), sortKey(b)));

export interface LimitationInputs {
  pods: readonly PodResourceProfile[];
  nodes: readonly NodeResourceProfile[];
  hpaCount: number;
  resizes: readonly PodResizeRecommendation[];
  attributions: readonly FragmentationAttribution[];
  rejected?: readonly string[];
}

export const collectLimitations = ({
  pods,
  nodes,
  hpaCount,
  resizes,
  attributions,
  rejected = [],
}: LimitationInputs): string[] => {
  const limitations: string[] = [];
  if (resizes.length > 0) limitations.push(MEMORY_PRESSURE_LIMITATION);
  if (hpaCount > 0) limitations.push(HPA_MATCHING_LIMITATION);

  for (const node of nodes) {
    if (node.cpuFragmentation === null) {
      limitations.push(`CPU fragmentation undefined on node ${node.node} (no CPU requests or allocatable)`);
    }
    if (node.memoryFragmentation === null) {
      limitations.push(`Memory fragmentation undefined on node ${node.node} (no memory requests or allocatable)`);
    }
  }

  const insufficientPods = pods.filter((pod) => pod.insufficientData).length;
  if (insufficientPods > 0) {
    limitations.push(`${insufficientPods} of ${pods.length} pod(s) have insufficient data and received no resize recommendation`);
  }
  const insufficientNodes = nodes.filter((node) => node.insufficientData).length;
  if (insufficientNodes > 0) {
    limitations.push(`${insufficientNodes} of ${nodes.length} node(s) have insufficient data; node recommendations are low confidence`);
  }

  const unknownConstraints = attributions.reduce(
    (sum, attribution) =>
      sum + attribution.constraintBlockers.filter((blocker) => blocker.constraintVisibility === 'unknown').length,
    0,
  );
  if (unknownConstraints > 0) {
    limitations.push(
      `Scheduling constraints are inferred from pod labels only; ${unknownConstraints} pod(s) on fragmented nodes show no constraint signal`,
    );
  }
  for (const line of rejected) limitations.push(line);
  return limitations;
};

export interface SummaryInputs {
  podCount: number;
  nodeCount: number;
  hpaCount: number;
  resizes: readonly PodResizeRecommendation[];
  nodeRightsize: NodeRightsizeRecommendation | undefined;
  hpaMisalignments: readonly HpaMisalignmentRecommendation[];
  fragmentedNodes: number;
}

export const buildSummary = (inputs: SummaryInputs): ReportSummary => {
  const { podCount, nodeCount, hpaCount, resizes, nodeRightsize, hpaMisalignments, fragmentedNodes } = inputs;
  const cpuCores = round2(resizes.reduce((sum, rec) => sum + rec.savings.cpuCores, 0));
  const memoryBytes = resizes.reduce((sum, rec) => sum + rec.savings.memoryBytes, 0);
  const memoryGiB = round2(memoryBytes / GIB);
  const nodesAffected = nodeRightsize ? nodeCount : 0;

  return {
    totalRecommendations: resizes.length + (nodeRightsize ? 1 : 0) + hpaMisalignments.length,
    pods: {
      affected: resizes.length,
      total: podCount,
      text: `${resizes.length} of ${podCount} pods need resizing`,
    },
    nodes: {
      affected: nodesAffected,
      total: nodeCount,
      text: nodeRightsize
        ? `node pool of ${nodeCount}: ${nodeRightsize.direction} (${nodeRightsize.strategy})`
        : `node pool of ${nodeCount}: no change`,
    },
    hpa: {
      affected: hpaMisalignments.length,
      total: hpaCount,
      text: `${hpaMisalignments.length} of ${hpaCount} HPAs misaligned`,
    },
    fragmentedNodes,
    potentialSavings: {
      cpuCores,
      memoryBytes,
      memoryMiB: round2(memoryBytes / MIB),
      memoryGiB,
      text: `${cpuCores.toFixed(2)} CPU cores, ${memoryGiB.toFixed(2)} GiB memory`,
    },
  };
};
