import type { Environment } from '../config/types.js';
import { debug } from '../debug.js';
import type {
  ClusterSnapshot,
  DisruptionBudgetInput,
  HpaInput,
  NodeInput,
  PodInput,
} from '../domain/snapshot.js';
import type { InstantVector, PrometheusClient, RangeMatrix } from './client.js';

export type MetricsSource = Pick<PrometheusClient, 'queryInstant' | 'queryRange'>;

export interface CollectOptions {
  cluster: string;
  env: Environment;
  /** Lookback such as `7d`, `12h` or `30m`. */
  window: string;
  step: string;
  excludeNamespaces?: readonly string[];
  now?: Date;
}

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

export const parseDuration = (value: string): number => {
  const match = /^(\d+)([smhd])$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }
  return Number(match[1]) * UNIT_SECONDS[match[2]];
};

const CONTAINER_FILTER = 'container!="",container!="POD"';

export const QUERIES = {
  podInfo: 'kube_pod_info',
  podLabels: 'kube_pod_labels',
  podRequests: 'sum by (namespace, pod, resource) (kube_pod_container_resource_requests{resource=~"cpu|memory"})',
  podLimits: 'sum by (namespace, pod, resource) (kube_pod_container_resource_limits{resource=~"cpu|memory"})',
  podCpuUsage: `sum by (namespace, pod) (rate(container_cpu_usage_seconds_total{${CONTAINER_FILTER}}[5m]))`,
  podMemoryUsage: `sum by (namespace, pod) (container_memory_working_set_bytes{${CONTAINER_FILTER}})`,
  nodeAllocatable: 'kube_node_status_allocatable{resource=~"cpu|memory"}',
  nodeCapacity: 'kube_node_status_capacity{resource=~"cpu|memory"}',
  nodeLabels: 'kube_node_labels',
  nodeCpuUsage: `sum by (node) (rate(container_cpu_usage_seconds_total{${CONTAINER_FILTER}}[5m]))`,
  nodeMemoryUsage: `sum by (node) (container_memory_working_set_bytes{${CONTAINER_FILTER}})`,
  hpaInfo: 'kube_horizontalpodautoscaler_info',
  hpaMinReplicas: 'kube_horizontalpodautoscaler_spec_min_replicas',
  hpaMaxReplicas: 'kube_horizontalpodautoscaler_spec_max_replicas',
  hpaCurrentReplicas: 'kube_horizontalpodautoscaler_status_current_replicas',
  hpaDesiredReplicas: 'kube_horizontalpodautoscaler_status_desired_replicas',
  hpaTargetMetric: 'kube_horizontalpodautoscaler_spec_target_metric',
  pdbDisruptionsAllowed: 'kube_poddisruptionbudget_status_pod_disruptions_allowed',
} as const;

const podId = (metric: Record<string, string>): string | undefined =>
  metric.namespace && metric.pod ? `${metric.namespace}/${metric.pod}` : undefined;

const hpaId = (metric: Record<string, string>): string | undefined =>
  metric.namespace && metric.horizontalpodautoscaler ? `${metric.namespace}/${metric.horizontalpodautoscaler}` : undefined;

const sampleValue = (value: [number, string]): number | undefined => {
  const parsed = Number(value[1]);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const indexInstant = (
  vector: InstantVector,
  keyOf: (metric: Record<string, string>) => string | undefined,
): Map<string, number> => {
  const out = new Map<string, number>();
  for (const sample of vector) {
    const key = keyOf(sample.metric);
    const value = sampleValue(sample.value);
    if (key !== undefined && value !== undefined) out.set(key, value);
  }
  return out;
};

const indexByResource = (
  vector: InstantVector,
  keyOf: (metric: Record<string, string>) => string | undefined,
): { cpu: Map<string, number>; memory: Map<string, number> } => ({
  cpu: indexInstant(vector, (metric) => (metric.resource === 'cpu' ? keyOf(metric) : undefined)),
  memory: indexInstant(vector, (metric) => (metric.resource === 'memory' ? keyOf(metric) : undefined)),
});

const indexRange = (
  matrix: RangeMatrix,
  keyOf: (metric: Record<string, string>) => string | undefined,
): Map<string, Array<[number, string]>> => {
  const out = new Map<string, Array<[number, string]>>();
  for (const series of matrix) {
    const key = keyOf(series.metric);
    if (key !== undefined) out.set(key, [...(out.get(key) ?? []), ...series.values]);
  }
  return out;
};

/** kube-state-metrics exposes Kubernetes labels as `label_<sanitized key>`. */
export const stripLabelPrefix = (metric: Record<string, string>): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(metric)) {
    if (key.startsWith('label_') && value !== '') out[key.slice('label_'.length)] = value;
  }
  return out;
};

const indexLabels = (
  vector: InstantVector,
  keyOf: (metric: Record<string, string>) => string | undefined,
): Map<string, Record<string, string>> => {
  const out = new Map<string, Record<string, string>>();
  for (const sample of vector) {
    const key = keyOf(sample.metric);
    if (key !== undefined) out.set(key, stripLabelPrefix(sample.metric));
  }
  return out;
};

const metricTypeFor = (name: string | undefined): HpaInput['metricType'] => {
  if (name === 'cpu' || name === 'memory') return name;
  return 'custom';
};

export const collectSnapshot = async (source: MetricsSource, options: CollectOptions): Promise<ClusterSnapshot> => {
  const now = options.now ?? new Date();
  const end = Math.floor(now.getTime() / 1000);
  const range = { start: end - parseDuration(options.window), end, step: options.step };
  const excluded = new Set(options.excludeNamespaces ?? []);
  debug('collectSnapshot start', { cluster: options.cluster, window: options.window, step: options.step, excluded: excluded.size });

  const [
    podInfo,
    podLabels,
    podRequests,
    podLimits,
    podCpu,
    podMemory,
    nodeAllocatable,
    nodeCapacity,
    nodeLabels,
    nodeCpu,
    nodeMemory,
    hpaInfo,
    hpaMin,
    hpaMax,
    hpaCurrent,
    hpaDesired,
    hpaTargetMetric,
    hpaHistory,
    pdbAllowed,
  ] = await Promise.all([
    source.queryInstant(QUERIES.podInfo),
    source.queryInstant(QUERIES.podLabels),
    source.queryInstant(QUERIES.podRequests),
    source.queryInstant(QUERIES.podLimits),
    source.queryRange(QUERIES.podCpuUsage, range),
    source.queryRange(QUERIES.podMemoryUsage, range),
    source.queryInstant(QUERIES.nodeAllocatable),
    source.queryInstant(QUERIES.nodeCapacity),
    source.queryInstant(QUERIES.nodeLabels),
    source.queryRange(QUERIES.nodeCpuUsage, range),
    source.queryRange(QUERIES.nodeMemoryUsage, range),
    source.queryInstant(QUERIES.hpaInfo),
    source.queryInstant(QUERIES.hpaMinReplicas),
    source.queryInstant(QUERIES.hpaMaxReplicas),
    source.queryInstant(QUERIES.hpaCurrentReplicas),
    source.queryInstant(QUERIES.hpaDesiredReplicas),
    source.queryInstant(QUERIES.hpaTargetMetric),
    source.queryRange(QUERIES.hpaCurrentReplicas, range),
    source.queryInstant(QUERIES.pdbDisruptionsAllowed),
  ]);

  const requests = indexByResource(podRequests, podId);
  const limits = indexByResource(podLimits, podId);
  const labelsByPod = indexLabels(podLabels, podId);
  const cpuByPod = indexRange(podCpu, podId);
  const memoryByPod = indexRange(podMemory, podId);

  const pods: PodInput[] = [];
  const seenPods = new Set<string>();
  for (const { metric } of podInfo) {
    const key = podId(metric);
    if (key === undefined || seenPods.has(key) || excluded.has(metric.namespace)) continue;
    seenPods.add(key);
    pods.push({
      namespace: metric.namespace,
      pod: metric.pod,
      node: metric.node || undefined,
      ownerKind: metric.created_by_kind || undefined,
      ownerName: metric.created_by_name || undefined,
      labels: labelsByPod.get(key),
      cpuRequest: requests.cpu.get(key),
      cpuLimit: limits.cpu.get(key),
      memoryRequest: requests.memory.get(key),
      memoryLimit: limits.memory.get(key),
      cpuSeries: cpuByPod.get(key),
      memorySeries: memoryByPod.get(key),
    });
  }

  const nodeKey = (metric: Record<string, string>): string | undefined => metric.node || undefined;
  const allocatable = indexByResource(nodeAllocatable, nodeKey);
  const capacity = indexByResource(nodeCapacity, nodeKey);
  const labelsByNode = indexLabels(nodeLabels, nodeKey);
  const cpuByNode = indexRange(nodeCpu, nodeKey);
  const memoryByNode = indexRange(nodeMemory, nodeKey);

  const nodeNames = [...new Set([...allocatable.cpu.keys(), ...allocatable.memory.keys()])].sort();
  const nodes: NodeInput[] = nodeNames.map((node) => ({
    node,
    cpuAllocatable: allocatable.cpu.get(node) ?? 0,
    memoryAllocatable: allocatable.memory.get(node) ?? 0,
    cpuCapacity: capacity.cpu.get(node),
    memoryCapacity: capacity.memory.get(node),
    labels: labelsByNode.get(node),
    cpuSeries: cpuByNode.get(node),
    memorySeries: memoryByNode.get(node),
  }));

  const minReplicas = indexInstant(hpaMin, hpaId);
  const maxReplicas = indexInstant(hpaMax, hpaId);
  const currentReplicas = indexInstant(hpaCurrent, hpaId);
  const desiredReplicas = indexInstant(hpaDesired, hpaId);
  const replicaHistory = indexRange(hpaHistory, hpaId);
  const metricNames = new Map<string, string>();
  for (const { metric } of hpaTargetMetric) {
    const key = hpaId(metric);
    if (key !== undefined && !metricNames.has(key)) metricNames.set(key, metric.metric_name);
  }

  const hpas: HpaInput[] = [];
  for (const { metric } of hpaInfo) {
    const key = hpaId(metric);
    if (key === undefined || excluded.has(metric.namespace)) continue;
    const history = (replicaHistory.get(key) ?? []).map(sampleValue).filter((value): value is number => value !== undefined);
    hpas.push({
      namespace: metric.namespace,
      name: metric.horizontalpodautoscaler,
      targetKind: metric.scaletargetref_kind || undefined,
      targetName: metric.scaletargetref_name ?? '',
      metricType: metricNames.has(key) ? metricTypeFor(metricNames.get(key)) : 'cpu',
      minReplicas: minReplicas.get(key),
      maxReplicas: maxReplicas.get(key),
      currentReplicas: currentReplicas.get(key),
      desiredReplicas: desiredReplicas.get(key),
      replicaHistory: history.length > 0 ? history : undefined,
    });
  }

  // kube-state-metrics does not export PDB selectors, so budgets cover their namespace
  const disruptionBudgets: DisruptionBudgetInput[] = [];
  for (const sample of pdbAllowed) {
    const { namespace, poddisruptionbudget: name } = sample.metric;
    const allowed = sampleValue(sample.value);
    if (!namespace || !name || allowed === undefined || excluded.has(namespace)) continue;
    disruptionBudgets.push({ namespace, name, disruptionsAllowed: Math.max(0, Math.floor(allowed)) });
  }

  const snapshot: ClusterSnapshot = {
    cluster: options.cluster,
    env: options.env,
    collectedAt: now.toISOString(),
    window: options.window,
    pods,
    nodes,
    hpas,
    disruptionBudgets,
  };
  debug('collectSnapshot end', {
    pods: pods.length,
    nodes: nodes.length,
    hpas: hpas.length,
    disruptionBudgets: disruptionBudgets.length,
  });
  return snapshot;
};
