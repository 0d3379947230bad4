import type { NodeResourceProfile, PodResourceProfile, ResourceStats } from '../src/domain/types.js';

export const MIB = 1024 * 1024;
export const GIB = 1024 * MIB;

const T0 = 1_700_000_000;

/** `[timestamp, value]` tuples spaced `stepSeconds` apart. */
export const series = (values: number[], stepSeconds = 300): Array<[number, number]> =>
  values.map((value, index) => [T0 + index * stepSeconds, value]);

export const stats = (p99: number, overrides: Partial<ResourceStats> = {}): ResourceStats => ({
  avg: p99 / 2,
  p95: p99,
  p99,
  p100: p99,
  ...overrides,
});

export const podProfile = (overrides: Partial<PodResourceProfile> = {}): PodResourceProfile => ({
  namespace: 'shop',
  pod: 'web-1',
  node: 'n1',
  ownerKind: 'deployment',
  ownerName: 'web',
  labels: {},
  cpuBursty: false,
  memoryBursty: false,
  insufficientData: false,
  evidence: [],
  ...overrides,
});

export const nodeProfile = (overrides: Partial<NodeResourceProfile> = {}): NodeResourceProfile => ({
  node: 'n1',
  labels: {},
  cpuAllocatable: 8,
  memoryAllocatable: 32 * GIB,
  cpuCapacity: 8,
  memoryCapacity: 32 * GIB,
  cpu: stats(1),
  memory: stats(4 * GIB),
  cpuRequested: 0,
  memoryRequested: 0,
  cpuFragmentation: null,
  memoryFragmentation: null,
  pods: [],
  insufficientData: false,
  evidence: [],
  ...overrides,
});
