import { z } from 'zod';

const MIB = 1024 * 1024;

export const EnvironmentSchema = z.enum(['prod', 'nonprod']);
export type Environment = z.infer<typeof EnvironmentSchema>;

const pct = z.number().min(0).max(100);

export const NodeThresholdsSchema = z
  .object({
    cpuLowPct: pct.default(30),
    cpuHighPct: pct.default(80),
    memoryLowPct: pct.default(30),
    memoryHighPct: pct.default(85),
    usableCapacityFactor: z.number().gt(0).max(1).default(0.8),
    shapeImbalanceThreshold: z.number().min(0).max(1).default(0.25),
    highlyOversizedEfficiency: z.number().min(0).max(1).default(0.3),
    moderatelyOversizedEfficiency: z.number().min(0).max(1).default(0.5),
    minPodsPerNode: z.number().int().min(1).default(10),
  })
  .default({});

export const HpaThresholdsSchema = z
  .object({
    cpuLowUtilPct: pct.default(20),
    cpuVeryLowUtilPct: pct.default(10),
    memoryHighUtilPct: pct.default(90),
    highMinReplicas: z.number().int().min(1).default(2),
    minReplicasLowUtilPct: pct.default(30),
    maxReplicasApproachPct: pct.default(80),
  })
  .default({});

export const FragmentationThresholdsSchema = z
  .object({
    fragmentationThreshold: z.number().min(0).max(1).default(0.3),
    largePodRequestPct: pct.default(25),
    daemonsetOverheadPct: pct.default(15),
    topN: z.number().int().min(1).default(10),
  })
  .default({});

export const EngineConfigSchema = z
  .object({
    cpuFloorProd: z.number().min(0).default(0.1),
    cpuFloorNonprod: z.number().min(0).default(0.05),
    safetyFactorProd: z.number().min(1).default(1.15),
    safetyFactorNonprod: z.number().min(1).default(1.1),
    cpuRequestMultiplier: z.number().min(1).default(1.2),
    cpuLimitRequestMultiplier: z.number().min(1).default(1.5),
    cpuLimitP100Multiplier: z.number().min(1).default(1.25),
    memoryLimitRequestMultiplier: z.number().min(1).default(1.5),
    memoryLimitP100Multiplier: z.number().min(1).default(1.25),
    changeTolerance: z.number().min(0).max(1).default(0.1),
    memoryBucketsMiB: z
      .array(z.number().positive())
      .default([64, 128, 256, 512, 768, 1024, 1536, 2048, 3072, 4096, 6144, 8192, 12288, 16384]),
    memoryBucketBuffer: z.number().gt(0).max(1).default(0.98),
    maxOverprovisionRatio: z.number().gt(1).default(5),
    cpuBurstRatioThreshold: z.number().gt(1).default(2),
    memoryBurstRatioThreshold: z.number().gt(1).default(2),
    minSamples: z.number().int().min(1).default(5),
    minObservationSeconds: z.number().min(0).default(600),
    node: NodeThresholdsSchema,
    hpa: HpaThresholdsSchema,
    fragmentation: FragmentationThresholdsSchema,
  })
  .default({});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

type ParsedEngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfig = Readonly<
  Omit<ParsedEngineConfig, 'memoryBucketsMiB' | 'node' | 'hpa' | 'fragmentation'> & {
    memoryBucketsMiB: readonly number[];
    /** Bucket ladder in bytes, ascending. */
    memoryBuckets: readonly number[];
    node: Readonly<ParsedEngineConfig['node']>;
    hpa: Readonly<ParsedEngineConfig['hpa']>;
    fragmentation: Readonly<ParsedEngineConfig['fragmentation']>;
  }
>;

/**
 * Validates threshold overrides and freezes the result so a single value can be
 * shared between concurrent analyses.
 */
export const resolveEngineConfig = (input: EngineConfigInput = {}): EngineConfig => {
  const parsed = EngineConfigSchema.parse(input);
  const memoryBucketsMiB = [...parsed.memoryBucketsMiB].sort((a, b) => a - b);
  return Object.freeze({
    ...parsed,
    memoryBucketsMiB: Object.freeze(memoryBucketsMiB),
    memoryBuckets: Object.freeze(memoryBucketsMiB.map((mib) => mib * MIB)),
    node: Object.freeze({ ...parsed.node }),
    hpa: Object.freeze({ ...parsed.hpa }),
    fragmentation: Object.freeze({ ...parsed.fragmentation }),
  });
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = resolveEngineConfig();

export const RetryPolicySchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(3),
    backoffBaseMs: z.number().int().min(0).default(500),
    maxBackoffMs: z.number().int().min(0).default(8000),
  })
  .default({});

export const AppConfigSchema = z.object({
  cluster: z.string().min(1),
  env: EnvironmentSchema.default('nonprod'),
  prometheus: z
    .object({
      endpoint: z.string().url().default('http://localhost:9090'),
      token: z.string().optional(),
      timeoutMs: z.number().int().positive().default(30000),
      retry: RetryPolicySchema,
    })
    .default({}),
  timeWindow: z.string().regex(/^\d+[mhd]$/).default('7d'),
  step: z.string().regex(/^\d+[smh]$/).default('5m'),
  excludeNamespaces: z.array(z.string().min(1)).default(['kube-system', 'kube-public', 'istio-system']),
  outputPath: z.string().min(1).default('./output/analysis.json'),
  htmlOutputPath: z.string().min(1).optional(),
  thresholds: EngineConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface ConfigOverrides {
  window?: string;
  outputPath?: string;
  htmlOutputPath?: string;
  env?: string;
}
