import { z } from 'zod';
import { EnvironmentSchema } from '../config/types.js';
import { debug } from '../debug.js';

// Entries stay unknown here; malformed samples are dropped by cleanSeries, not rejected.
const RawSeriesSchema = z.array(z.unknown());

const optionalAmount = z.number().nonnegative().optional();

export const PodInputSchema = z.object({
  namespace: z.string().min(1),
  pod: z.string().min(1),
  node: z.string().min(1).optional(),
  ownerKind: z.string().optional(),
  ownerName: z.string().optional(),
  labels: z.record(z.string()).optional(),
  cpuRequest: optionalAmount,
  cpuLimit: optionalAmount,
  memoryRequest: optionalAmount,
  memoryLimit: optionalAmount,
  cpuSeries: RawSeriesSchema.optional(),
  memorySeries: RawSeriesSchema.optional(),
});

export const NodeInputSchema = z.object({
  node: z.string().min(1),
  cpuAllocatable: z.number().nonnegative(),
  memoryAllocatable: z.number().nonnegative(),
  cpuCapacity: optionalAmount,
  memoryCapacity: optionalAmount,
  labels: z.record(z.string()).optional(),
  cpuSeries: RawSeriesSchema.optional(),
  memorySeries: RawSeriesSchema.optional(),
});

export const HpaInputSchema = z.object({
  namespace: z.string().min(1),
  name: z.string().min(1),
  targetKind: z.string().optional(),
  targetName: z.string().default(''),
  metricType: z.enum(['cpu', 'memory', 'custom']).default('cpu'),
  minReplicas: z.number().int().nonnegative().optional(),
  maxReplicas: z.number().int().nonnegative().optional(),
  currentReplicas: z.number().int().nonnegative().optional(),
  desiredReplicas: z.number().int().nonnegative().optional(),
  replicaHistory: z.array(z.number().nonnegative()).optional(),
});

export const DisruptionBudgetInputSchema = z.object({
  namespace: z.string().min(1),
  name: z.string().min(1),
  disruptionsAllowed: z.number().int().nonnegative(),
  matchLabels: z.record(z.string()).optional(),
});

export const ClusterSnapshotSchema = z.object({
  cluster: z.string().min(1),
  env: EnvironmentSchema.default('nonprod'),
  collectedAt: z.string().optional(),
  window: z.string().optional(),
  pods: z.array(PodInputSchema).default([]),
  nodes: z.array(NodeInputSchema).default([]),
  hpas: z.array(HpaInputSchema).default([]),
  disruptionBudgets: z.array(DisruptionBudgetInputSchema).default([]),
});

export type PodInput = z.infer<typeof PodInputSchema>;
export type NodeInput = z.infer<typeof NodeInputSchema>;
export type HpaInput = z.infer<typeof HpaInputSchema>;
export type DisruptionBudgetInput = z.infer<typeof DisruptionBudgetInputSchema>;
export type ClusterSnapshot = z.infer<typeof ClusterSnapshotSchema> & {
  /** Entries dropped by parseSnapshot, one line each with the validation issues. */
  rejected?: string[];
};

// Entity lists stay unknown here; acceptEntries validates each entry on its own.
const SnapshotEnvelopeSchema = ClusterSnapshotSchema.extend({
  pods: z.array(z.unknown()).default([]),
  nodes: z.array(z.unknown()).default([]),
  hpas: z.array(z.unknown()).default([]),
  disruptionBudgets: z.array(z.unknown()).default([]),
});

const describeIssue = (issue: z.ZodIssue): string =>
  issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

const entryName = (entry: unknown, fields: readonly string[], index: number): string => {
  if (typeof entry !== 'object' || entry === null) return `#${index}`;
  const parts: unknown[] = fields.map((field) => Reflect.get(entry, field));
  return parts.every((part): part is string => typeof part === 'string' && part.length > 0)
    ? parts.join('/')
    : `#${index}`;
};

const acceptEntries = <T>(
  kind: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  entries: readonly unknown[],
  nameFields: readonly string[],
  rejected: string[],
): T[] => {
  const accepted: T[] = [];
  entries.forEach((entry, index) => {
    const result = schema.safeParse(entry);
    if (result.success) {
      accepted.push(result.data);
      return;
    }
    const issues = result.error.issues.map(describeIssue).join('; ');
    rejected.push(`${kind} ${entryName(entry, nameFields, index)} rejected: ${issues}`);
  });
  return accepted;
};

/**
 * Validates the snapshot envelope strictly and each entity on its own. Invalid
 * entities are left out and listed in `rejected`.
 */
export const parseSnapshot = (input: unknown): ClusterSnapshot => {
  debug('parseSnapshot start');
  const envelope = SnapshotEnvelopeSchema.parse(input);
  const rejected: string[] = [];
  const snapshot: ClusterSnapshot = {
    ...envelope,
    pods: acceptEntries('pod', PodInputSchema, envelope.pods, ['namespace', 'pod'], rejected),
    nodes: acceptEntries('node', NodeInputSchema, envelope.nodes, ['node'], rejected),
    hpas: acceptEntries('hpa', HpaInputSchema, envelope.hpas, ['namespace', 'name'], rejected),
    disruptionBudgets: acceptEntries(
      'disruption budget',
      DisruptionBudgetInputSchema,
      envelope.disruptionBudgets,
      ['namespace', 'name'],
      rejected,
    ),
    rejected,
  };
  debug('parseSnapshot end', {
    cluster: snapshot.cluster,
    pods: snapshot.pods.length,
    nodes: snapshot.nodes.length,
    hpas: snapshot.hpas.length,
    disruptionBudgets: snapshot.disruptionBudgets.length,
    rejected: rejected.length,
  });
  return snapshot;
};
