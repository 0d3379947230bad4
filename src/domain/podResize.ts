import type { EngineConfig, Environment } from '../config/types.js';
import { debug } from '../debug.js';
import { classifySafety } from './safety.js';
import type { PodResizeRecommendation, PodResourceProfile, PodSizing, ResourceStats } from './types.js';

const MIB = 1024 * 1024;

const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const finiteOrNull = (value: number | undefined): number | null =>
  value !== undefined && Number.isFinite(value) ? value : null;

export const cpuFloorFor = (env: Environment, config: EngineConfig): number =>
  env === 'prod' ? config.cpuFloorProd : config.cpuFloorNonprod;

export const safetyFactorFor = (env: Environment, config: EngineConfig): number =>
  env === 'prod' ? config.safetyFactorProd : config.safetyFactorNonprod;

/**
 * Smallest bucket whose buffered size still holds `bytes`; the bucket itself is
 * returned. Values above the largest buffered bucket are left as they are.
 */
export const normalizeMemoryToBucket = (
  bytes: number,
  buckets: readonly number[],
  buffer: number,
): { value: number; bucket: number | null } => {
  for (const bucket of buckets) {
    if (bytes <= bucket * buffer) {
      return { value: bucket, bucket };
    }
  }
  return { value: bytes, bucket: null };
};

export const computePodSizing = (
  cpu: ResourceStats,
  memory: ResourceStats,
  env: Environment,
  config: EngineConfig,
): PodSizing => {
  const cpuRequest = Math.max(cpu.p99 * config.cpuRequestMultiplier, cpuFloorFor(env, config));
  const cpuLimit = Math.max(
    cpuRequest * config.cpuLimitRequestMultiplier,
    (cpu.p100 || cpu.p99) * config.cpuLimitP100Multiplier,
  );

  const memoryRaw = memory.p99 * safetyFactorFor(env, config);
  const normalized = normalizeMemoryToBucket(memoryRaw, config.memoryBuckets, config.memoryBucketBuffer);
  const memoryRequest = Math.ceil(normalized.value);
  const memoryLimit = Math.ceil(
    Math.max(
      memoryRequest * config.memoryLimitRequestMultiplier,
      (memory.p100 || memory.p99) * config.memoryLimitP100Multiplier,
    ),
  );

  return { cpuRequest, cpuLimit, memoryRequest, memoryLimit, memoryBucket: normalized.bucket };
};

/** Relative change against the current value; an unset or zero current value is a full change. */
export const relativeChange = (current: number | undefined, recommended: number): number => {
  if (current === undefined || current <= 0) return 1;
  return Math.abs(recommended - current) / current;
};

const describeChange = (
  label: string,
  current: number | undefined,
  recommended: number,
  p99: number,
  format: (value: number) => string,
): string => {
  if (current === undefined || current <= 0) {
    return `Set ${label} request to ${format(recommended)} based on P99 usage (${format(p99)})`;
  }
  const change = ((recommended - current) / current) * 100;
  if (change === 0) return `${label} request unchanged, P99 usage ${format(p99)}`;
  const direction = change > 0 ? 'increase' : 'decrease';
  return `${label} request ${direction} by ${Math.abs(change).toFixed(1)}% based on P99 usage (${format(p99)})`;
};

const formatCores = (value: number): string => `${value.toFixed(3)} cores`;
const formatMiB = (value: number): string => `${(value / MIB).toFixed(1)}MiB`;

export const advisePodResize = (
  profile: PodResourceProfile,
  env: Environment,
  config: EngineConfig,
): PodResizeRecommendation | undefined => {
  const { cpu, memory } = profile;
  if (profile.insufficientData || !cpu || !memory) {
    debug('advisePodResize skip', { pod: `${profile.namespace}/${profile.pod}`, insufficientData: profile.insufficientData });
    return undefined;
  }

  const sizing = computePodSizing(cpu, memory, env, config);
  const cpuRequestChange = relativeChange(profile.cpuRequest, sizing.cpuRequest);
  const memoryRequestChange = relativeChange(profile.memoryRequest, sizing.memoryRequest);
  if (cpuRequestChange <= config.changeTolerance && memoryRequestChange <= config.changeTolerance) {
    return undefined;
  }

  const safetyFactor = safetyFactorFor(env, config);
  const explanation = [
    describeChange('CPU', profile.cpuRequest, sizing.cpuRequest, cpu.p99, formatCores),
    describeChange('Memory', profile.memoryRequest, sizing.memoryRequest, memory.p99, formatMiB),
    sizing.memoryBucket === null
      ? 'memory request above the largest bucket, not normalized'
      : `memory request normalized to the ${formatMiB(sizing.memoryBucket)} bucket`,
    `safety factor ${env} (${safetyFactor.toFixed(2)}x)`,
  ].join('; ');

  return {
    type: 'POD_RESIZE',
    namespace: profile.namespace,
    pod: profile.pod,
    node: profile.node ?? null,
    current: {
      cpuRequest: profile.cpuRequest ?? null,
      cpuLimit: profile.cpuLimit ?? null,
      memoryRequest: profile.memoryRequest ?? null,
      memoryLimit: profile.memoryLimit ?? null,
    },
    recommended: {
      cpuRequest: roundTo(sizing.cpuRequest, 4),
      cpuLimit: roundTo(sizing.cpuLimit, 4),
      memoryRequest: sizing.memoryRequest,
      memoryLimit: sizing.memoryLimit,
    },
    savings: {
      cpuCores: roundTo((profile.cpuRequest ?? 0) - sizing.cpuRequest, 4),
      memoryBytes: Math.round((profile.memoryRequest ?? 0) - sizing.memoryRequest),
    },
    usage: {
      cpuP95: cpu.p95,
      cpuP99: cpu.p99,
      cpuP100: cpu.p100,
      memoryP95: memory.p95,
      memoryP99: memory.p99,
      memoryP100: memory.p100,
    },
    rationale: {
      env,
      safetyFactor,
      cpuFloor: cpuFloorFor(env, config),
      cpuRequestChange: roundTo(cpuRequestChange, 4),
      memoryRequestChange: roundTo(memoryRequestChange, 4),
      changeTolerance: config.changeTolerance,
      memoryBucket: sizing.memoryBucket,
      cpuOverprovisionRatio: finiteOrNull(profile.cpuOverprovisionRatio),
      memoryOverprovisionRatio: finiteOrNull(profile.memoryOverprovisionRatio),
      cpuBursty: profile.cpuBursty,
    },
    explanation,
    safety: classifySafety(
      {
        cpuOverprovisionRatio: profile.cpuOverprovisionRatio,
        memoryOverprovisionRatio: profile.memoryOverprovisionRatio,
        insufficientData: profile.insufficientData,
      },
      config.maxOverprovisionRatio,
    ),
  };
};

export const advisePodResizes = (
  profiles: readonly PodResourceProfile[],
  env: Environment,
  config: EngineConfig,
): PodResizeRecommendation[] => {
  debug('advisePodResizes start', { pods: profiles.length, env });
  const out: PodResizeRecommendation[] = [];
  for (const profile of profiles) {
    const rec = advisePodResize(profile, env, config);
    if (rec) out.push(rec);
  }
  debug('advisePodResizes end', { recommendations: out.length });
  return out;
};
