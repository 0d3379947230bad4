import type { EngineConfig } from '../config/types.js';
import { debug } from '../debug.js';
import { compareText, podKey } from './profiles.js';
import { classifySafety, overprovisionRatio } from './safety.js';
import type { HpaInput } from './snapshot.js';
import { maxOf } from './statistics.js';
import type { HpaFlag, HpaMisalignmentReason, HpaMisalignmentRecommendation, PodResourceProfile } from './types.js';

export interface HpaPodMatch {
  pods: PodResourceProfile[];
  provenance: 'heuristic';
}

/**
 * Pods in the HPA namespace whose name contains the scale target name. Naming
 * conventions are all there is to go on, hence the heuristic provenance.
 */
export const matchHpaPods = (hpa: HpaInput, pods: readonly PodResourceProfile[]): HpaPodMatch => {
  const matched =
    hpa.targetName.length === 0
      ? []
      : pods.filter((pod) => pod.namespace === hpa.namespace && pod.pod.includes(hpa.targetName));
  return {
    pods: [...matched].sort((a, b) => compareText(a.pod, b.pod)),
    provenance: 'heuristic',
  };
};

export const hpaConfigFlags = (hpa: HpaInput): HpaFlag[] => {
  const { currentReplicas: current, desiredReplicas: desired, minReplicas: min, maxReplicas: max } = hpa;
  const flags: HpaFlag[] = [];
  if (current === undefined || desired === undefined) {
    flags.push('INSUFFICIENT_DATA');
    return flags;
  }

  if (current !== desired) {
    if (max !== undefined && desired > max) flags.push('SCALING_BEYOND_MAX');
    else if (min !== undefined && desired < min) flags.push('SCALING_BELOW_MIN');
    else if (current < desired) flags.push('SCALING_UP_PENDING');
    else flags.push('SCALING_DOWN_IN_PROGRESS');
  }
  if (max !== undefined && current === max) flags.push('AT_MAX_REPLICAS');
  if (min !== undefined && current === min) flags.push('AT_MIN_REPLICAS');
  if (min !== undefined && max !== undefined) {
    if (min > max) flags.push('INVALID_CONFIG_MIN_GT_MAX');
    if (max - min < 2) flags.push('LIMITED_SCALING_RANGE');
  }
  return flags;
};

const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

const round4 = (value: number): number => Math.round(value * 10_000) / 10_000;

const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;

export const detectHpaMisalignment = (
  hpa: HpaInput,
  pods: readonly PodResourceProfile[],
  config: EngineConfig,
): HpaMisalignmentRecommendation | undefined => {
  const match = matchHpaPods(hpa, pods);
  if (match.pods.length === 0) return undefined;

  const thresholds = config.hpa;
  const avgCpuUsage = mean(match.pods.map((pod) => pod.cpu?.p95 ?? 0));
  const avgCpuRequest = mean(match.pods.map((pod) => pod.cpuRequest ?? 0));
  const avgMemoryUsage = mean(match.pods.map((pod) => pod.memory?.p95 ?? 0));
  const avgMemoryRequest = mean(match.pods.map((pod) => pod.memoryRequest ?? 0));
  const cpuUtilization = avgCpuRequest > 0 ? avgCpuUsage / avgCpuRequest : null;
  const memoryUtilization = avgMemoryRequest > 0 ? avgMemoryUsage / avgMemoryRequest : null;
  const peakReplicas = maxOf(hpa.replicaHistory ?? []) ?? null;
  const scalesOnCpu = hpa.metricType === 'cpu';

  const reasons: HpaMisalignmentReason[] = [];
  if (scalesOnCpu && cpuUtilization !== null && cpuUtilization * 100 < thresholds.cpuLowUtilPct) {
    const veryLow = cpuUtilization * 100 < thresholds.cpuVeryLowUtilPct ? ', very low' : '';
    reasons.push({
      code: 'CPU_FAR_BELOW_REQUEST',
      message: `CPU-based HPA with low CPU usage (${avgCpuUsage.toFixed(3)} cores vs ${avgCpuRequest.toFixed(3)} request, ${pct(cpuUtilization)}${veryLow})`,
    });
  }
  if (
    scalesOnCpu &&
    cpuUtilization !== null &&
    memoryUtilization !== null &&
    memoryUtilization * 100 > thresholds.memoryHighUtilPct &&
    cpuUtilization * 100 < thresholds.cpuLowUtilPct
  ) {
    reasons.push({
      code: 'MEMORY_BOUND_CPU_SCALING',
      message: `Memory-bound workload (memory ${pct(memoryUtilization)} of request) but HPA scales on CPU (${pct(cpuUtilization)} of request)`,
    });
  }
  const utilization = cpuUtilization ?? 0;
  if (
    hpa.minReplicas !== undefined &&
    hpa.minReplicas > thresholds.highMinReplicas &&
    hpa.currentReplicas === hpa.minReplicas &&
    utilization * 100 < thresholds.minReplicasLowUtilPct
  ) {
    reasons.push({
      code: 'HIGH_MIN_REPLICAS',
      message: `High minReplicas (${hpa.minReplicas}) blocking consolidation with low utilization (${pct(utilization)})`,
    });
  }
  if (
    hpa.maxReplicas !== undefined &&
    peakReplicas !== null &&
    peakReplicas < hpa.maxReplicas * (thresholds.maxReplicasApproachPct / 100)
  ) {
    reasons.push({
      code: 'MAX_REPLICAS_UNUSED',
      message: `Peak replicas (${peakReplicas}) stayed below ${thresholds.maxReplicasApproachPct}% of maxReplicas (${hpa.maxReplicas})`,
    });
  }
  if (reasons.length === 0) return undefined;

  const flags = hpaConfigFlags(hpa);
  const insufficientData = flags.includes('INSUFFICIENT_DATA') || match.pods.some((pod) => pod.insufficientData);
  const safety = classifySafety(
    {
      cpuOverprovisionRatio: overprovisionRatio(avgCpuRequest, avgCpuUsage),
      memoryOverprovisionRatio: overprovisionRatio(avgMemoryRequest, avgMemoryUsage),
      insufficientData,
    },
    config.maxOverprovisionRatio,
  );

  return {
    type: 'HPA_MISALIGNMENT',
    namespace: hpa.namespace,
    hpa: hpa.name,
    target: { kind: hpa.targetKind ?? null, name: hpa.targetName },
    config: {
      minReplicas: hpa.minReplicas ?? null,
      maxReplicas: hpa.maxReplicas ?? null,
      currentReplicas: hpa.currentReplicas ?? null,
      metricType: hpa.metricType,
    },
    metrics: {
      avgCpuUsage: round4(avgCpuUsage),
      avgCpuRequest: round4(avgCpuRequest),
      avgMemoryUsage: Math.round(avgMemoryUsage),
      avgMemoryRequest: Math.round(avgMemoryRequest),
      cpuUtilization: cpuUtilization === null ? null : round4(cpuUtilization),
      memoryUtilization: memoryUtilization === null ? null : round4(memoryUtilization),
      matchedPodCount: match.pods.length,
      peakReplicas,
    },
    matchedPods: match.pods.map((pod) => podKey(pod.namespace, pod.pod)),
    matchProvenance: match.provenance,
    flags,
    reasons,
    advisory: true,
    explanation: reasons.map((reason) => reason.message).join('; '),
    safety: flags.includes('INVALID_CONFIG_MIN_GT_MAX') ? { ...safety, safeToResize: false } : safety,
  };
};

export const detectHpaMisalignments = (
  hpas: readonly HpaInput[],
  pods: readonly PodResourceProfile[],
  config: EngineConfig,
): HpaMisalignmentRecommendation[] => {
  debug('detectHpaMisalignments start', { hpas: hpas.length, pods: pods.length });
  const out: HpaMisalignmentRecommendation[] = [];
  for (const hpa of hpas) {
    const rec = detectHpaMisalignment(hpa, pods, config);
    if (rec) out.push(rec);
  }
  debug('detectHpaMisalignments end', { recommendations: out.length });
  return out;
};
