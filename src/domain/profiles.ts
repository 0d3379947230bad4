import type { EngineConfig } from '../config/types.js';
import { debug } from '../debug.js';
import type { NodeInput, PodInput } from './snapshot.js';
import { overprovisionRatio } from './safety.js';
import { isBursty, spikeRatio, sustainedPercentile, toResourceStats } from './statistics.js';
import type { MetricSample, MetricSeries, NodeResourceProfile, PodResourceProfile, ResourceStats, WorkloadKind } from './types.js';

export const podKey = (namespace: string, pod: string): string => `${namespace}/${pod}`;

/** Code-unit ordering, independent of the host locale. */
export const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const toFiniteNumber = (value: unknown): number | undefined => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const toSample = (entry: unknown): MetricSample | undefined => {
  let rawTimestamp: unknown;
  let rawValue: unknown;
  if (Array.isArray(entry)) {
    if (entry.length !== 2) return undefined;
    [rawTimestamp, rawValue] = entry;
  } else if (typeof entry === 'object' && entry !== null && 'timestamp' in entry && 'value' in entry) {
    rawTimestamp = entry.timestamp;
    rawValue = entry.value;
  } else {
    return undefined;
  }
  const timestamp = toFiniteNumber(rawTimestamp);
  const value = toFiniteNumber(rawValue);
  if (timestamp === undefined || value === undefined) return undefined;
  return { timestamp, value };
};

/** Drops malformed and non-finite entries; order and duplicates are kept. */
export const cleanSeries = (raw: readonly unknown[]): MetricSeries => {
  const out: MetricSeries = [];
  for (const entry of raw) {
    const sample = toSample(entry);
    if (sample) out.push(sample);
  }
  return out;
};

export const seriesValues = (series: MetricSeries): number[] => series.map((sample) => sample.value);

const seriesSpanSeconds = (series: MetricSeries): number => {
  if (series.length === 0) return 0;
  let min = series[0].timestamp;
  let max = series[0].timestamp;
  for (const { timestamp } of series) {
    if (timestamp < min) min = timestamp;
    if (timestamp > max) max = timestamp;
  }
  return max - min;
};

export const isWindowSufficient = (series: MetricSeries, minSamples: number, minDurationSeconds: number): boolean => {
  if (series.length === 0 || series.length < minSamples) return false;
  return seriesSpanSeconds(series) >= minDurationSeconds;
};

export const inferWorkloadKind = (kind: string | undefined): WorkloadKind => {
  const normalized = (kind ?? '').trim().toLowerCase();
  if (normalized.includes('deployment')) return 'deployment';
  if (normalized.includes('replicaset')) return 'replicaset';
  if (normalized.includes('stateful')) return 'statefulset';
  if (normalized.includes('daemon')) return 'daemonset';
  if (normalized.includes('cron')) return 'cronjob';
  if (normalized === 'job') return 'job';
  return 'other';
};

interface SignalAssessment {
  stats?: ResourceStats;
  values: number[];
  sufficient: boolean;
  evidence: string;
}

const assessSignal = (label: string, raw: readonly unknown[] | undefined, config: EngineConfig): SignalAssessment => {
  if (raw === undefined || raw.length === 0) {
    return { values: [], sufficient: false, evidence: `${label} series missing` };
  }
  const series = cleanSeries(raw);
  const values = seriesValues(series);
  const stats = toResourceStats(values);
  const dropped = raw.length - series.length;
  const droppedNote = dropped > 0 ? `, ${dropped} invalid dropped` : '';
  const span = Math.round(seriesSpanSeconds(series));

  if (!isWindowSufficient(series, config.minSamples, config.minObservationSeconds)) {
    return {
      stats,
      values,
      sufficient: false,
      evidence: `${label} series insufficient: ${series.length} samples over ${span}s${droppedNote} (need ${config.minSamples} over ${config.minObservationSeconds}s)`,
    };
  }
  return {
    stats,
    values,
    sufficient: true,
    evidence: `${label} series: ${series.length} samples over ${span}s${droppedNote}`,
  };
};

export const buildPodProfile = (input: PodInput, config: EngineConfig): PodResourceProfile => {
  const cpu = assessSignal('cpu usage', input.cpuSeries, config);
  const memory = assessSignal('memory usage', input.memorySeries, config);
  const insufficientData = !cpu.sufficient || !memory.sufficient;

  const cpuSustainedP95 = sustainedPercentile(cpu.values, 95, config.cpuBurstRatioThreshold);
  const memorySustainedP95 = sustainedPercentile(memory.values, 95, config.memoryBurstRatioThreshold);

  const profile: PodResourceProfile = {
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
    cpu: cpu.stats,
    memory: memory.stats,
    cpuSustainedP95,
    memorySustainedP95,
    cpuSpikeRatio: spikeRatio(cpu.values),
    cpuBursty: isBursty(cpu.values, config.cpuBurstRatioThreshold),
    memoryBursty: isBursty(memory.values, config.memoryBurstRatioThreshold),
    cpuOverprovisionRatio: overprovisionRatio(input.cpuRequest, cpuSustainedP95),
    memoryOverprovisionRatio: overprovisionRatio(input.memoryRequest, memorySustainedP95),
    insufficientData,
    evidence: [cpu.evidence, memory.evidence],
  };

  if (input.cpuRequest === undefined) profile.evidence.push('cpu request not set');
  if (input.memoryRequest === undefined) profile.evidence.push('memory request not set');
  return profile;
};

const fragmentationRatio = (allocatable: number, requested: number): number | null => {
  if (allocatable <= 0 || requested <= 0) return null;
  return Math.max(0, (allocatable - requested) / allocatable);
};

/**
 * Node profile from its own series plus the pods scheduled on it. Requested
 * totals are current pod requests, i.e. what the scheduler sees today.
 */
export const buildNodeProfile = (
  input: NodeInput,
  pods: readonly PodResourceProfile[],
  config: EngineConfig,
): NodeResourceProfile => {
  const cpu = assessSignal('node cpu usage', input.cpuSeries, config);
  const memory = assessSignal('node memory usage', input.memorySeries, config);
  const members = pods.filter((pod) => pod.node === input.node);
  const cpuRequested = members.reduce((sum, pod) => sum + (pod.cpuRequest ?? 0), 0);
  const memoryRequested = members.reduce((sum, pod) => sum + (pod.memoryRequest ?? 0), 0);
  const evidence = [cpu.evidence, memory.evidence, `${members.length} pod(s) scheduled`];

  const cpuFragmentation = fragmentationRatio(input.cpuAllocatable, cpuRequested);
  const memoryFragmentation = fragmentationRatio(input.memoryAllocatable, memoryRequested);
  if (cpuFragmentation === null) evidence.push('cpu fragmentation undefined (no cpu requests or allocatable)');
  if (memoryFragmentation === null) evidence.push('memory fragmentation undefined (no memory requests or allocatable)');

  const profile: NodeResourceProfile = {
    node: input.node,
    labels: { ...(input.labels ?? {}) },
    cpuAllocatable: input.cpuAllocatable,
    memoryAllocatable: input.memoryAllocatable,
    cpuCapacity: input.cpuCapacity ?? input.cpuAllocatable,
    memoryCapacity: input.memoryCapacity ?? input.memoryAllocatable,
    cpu: cpu.stats,
    memory: memory.stats,
    cpuRequested,
    memoryRequested,
    cpuFragmentation,
    memoryFragmentation,
    pods: members.map((pod) => podKey(pod.namespace, pod.pod)).sort(),
    insufficientData: !cpu.sufficient || !memory.sufficient,
    evidence,
  };
  debug('buildNodeProfile', { node: profile.node, pods: profile.pods.length, insufficientData: profile.insufficientData });
  return profile;
};
