import { DEFAULT_ENGINE_CONFIG } from '../config/types.js';
import type { EngineConfig } from '../config/types.js';
import { debug } from '../debug.js';
import { attributeFragmentation } from './fragmentation.js';
import { detectHpaMisalignments, hpaConfigFlags, matchHpaPods } from './hpa.js';
import { adviseNodeRightsize } from './nodeRightsize.js';
import { advisePodResizes } from './podResize.js';
import { buildNodeProfile, buildPodProfile, compareText, inferWorkloadKind, podKey } from './profiles.js';
import {
  buildSummary,
  collectLimitations,
  sortRecommendations,
  toHpaFacts,
  toNodeFacts,
  toPodFacts,
} from './report.js';
import type { ClusterSnapshot, NodeInput, PodInput } from './snapshot.js';
import type { AnalysisReport, NodeResourceProfile, PodResourceProfile, Recommendation } from './types.js';

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// Contract violations are caller bugs and must surface; anything else is confined to the entity.
const isolate = <T>(work: () => T, fallback: (message: string) => T): T => {
  try {
    return work();
  } catch (error) {
    if (error instanceof RangeError) throw error;
    return fallback(errorMessage(error));
  }
};

const failedPodProfile = (input: PodInput, message: string): PodResourceProfile => ({
  namespace: input.namespace,
  pod: input.pod,
  node: input.node,
  ownerKind: inferWorkloadKind(input.ownerKind),
  ownerName: input.ownerName,
  labels: { ...(input.labels ?? {}) },
  cpuRequest: input.cpuRequest,
  cpuLimit: input.cpuLimit,
  memoryRequest: input.memoryRequest,
  memoryLimit: input.memoryLimit,
  cpuBursty: false,
  memoryBursty: false,
  insufficientData: true,
  evidence: [`profiling failed: ${message}`],
});

const failedNodeProfile = (input: NodeInput, message: string): NodeResourceProfile => ({
  node: input.node,
  labels: { ...(input.labels ?? {}) },
  cpuAllocatable: input.cpuAllocatable,
  memoryAllocatable: input.memoryAllocatable,
  cpuCapacity: input.cpuCapacity ?? input.cpuAllocatable,
  memoryCapacity: input.memoryCapacity ?? input.memoryAllocatable,
  cpuRequested: 0,
  memoryRequested: 0,
  cpuFragmentation: null,
  memoryFragmentation: null,
  pods: [],
  insufficientData: true,
  evidence: [`profiling failed: ${message}`],
});

/**
 * One synchronous pass from a snapshot to the report. The output depends only
 * on the snapshot and the config, so repeated runs are byte-identical.
 */
export const analyzeCluster = (snapshot: ClusterSnapshot, config: EngineConfig = DEFAULT_ENGINE_CONFIG): AnalysisReport => {
  debug('analyzeCluster start', {
    cluster: snapshot.cluster,
    env: snapshot.env,
    pods: snapshot.pods.length,
    nodes: snapshot.nodes.length,
    hpas: snapshot.hpas.length,
  });
  const { env } = snapshot;

  const podInputs = [...snapshot.pods].sort((a, b) => compareText(podKey(a.namespace, a.pod), podKey(b.namespace, b.pod)));
  const pods = podInputs.map((input) =>
    isolate(
      () => buildPodProfile(input, config),
      (message) => failedPodProfile(input, message),
    ),
  );
  const podsByKey = new Map(pods.map((pod) => [podKey(pod.namespace, pod.pod), pod]));

  // every node profile must exist before the cross-node passes below
  const nodeInputs = [...snapshot.nodes].sort((a, b) => compareText(a.node, b.node));
  const nodes = nodeInputs.map((input) =>
    isolate(
      () => buildNodeProfile(input, pods, config),
      (message) => failedNodeProfile(input, message),
    ),
  );

  const resizes = advisePodResizes(pods, env, config);
  const nodeRightsize = adviseNodeRightsize(nodes, pods, resizes, env, config);
  const attributions = attributeFragmentation(nodes, podsByKey, snapshot.disruptionBudgets, config);
  const attributionByNode = new Map(attributions.map((attribution) => [attribution.node, attribution]));

  const hpaInputs = [...snapshot.hpas].sort((a, b) =>
    compareText(`${a.namespace}/${a.name}`, `${b.namespace}/${b.name}`),
  );
  const hpaMisalignments = detectHpaMisalignments(hpaInputs, pods, config);

  const recommendations: Recommendation[] = sortRecommendations([
    ...resizes,
    ...(nodeRightsize ? [nodeRightsize] : []),
    ...hpaMisalignments,
  ]);

  const report: AnalysisReport = {
    cluster: snapshot.cluster,
    env,
    generatedAt: snapshot.collectedAt ?? null,
    window: snapshot.window ?? null,
    pods: pods.map(toPodFacts),
    nodes: nodes.map((node) => toNodeFacts(node, attributionByNode.get(node.node))),
    hpas: hpaInputs.map((hpa) =>
      toHpaFacts(
        hpa,
        hpaConfigFlags(hpa),
        matchHpaPods(hpa, pods).pods.map((pod) => podKey(pod.namespace, pod.pod)),
      ),
    ),
    recommendations,
    limitations: collectLimitations({
      pods,
      nodes,
      hpaCount: hpaInputs.length,
      resizes,
      attributions,
      rejected: snapshot.rejected,
    }),
    summary: buildSummary({
      podCount: pods.length,
      nodeCount: nodes.length,
      hpaCount: hpaInputs.length,
      resizes,
      nodeRightsize,
      hpaMisalignments,
      fragmentedNodes: attributions.length,
    }),
  };
  debug('analyzeCluster end', { recommendations: recommendations.length, limitations: report.limitations.length });
  return report;
};
