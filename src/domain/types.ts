import type { Environment } from '../config/types.js';

export interface MetricSample {
  /** Seconds since epoch. */
  timestamp: number;
  value: number;
}

export type MetricSeries = MetricSample[];

export interface ResourceStats {
  avg: number;
  p95: number;
  p99: number;
  p100: number;
}

export type WorkloadKind = 'deployment' | 'replicaset' | 'statefulset' | 'daemonset' | 'job' | 'cronjob' | 'other';

export interface PodResourceProfile {
  namespace: string;
  pod: string;
  node?: string;
  ownerKind: WorkloadKind;
  ownerName?: string;
  labels: Record<string, string>;
  cpuRequest?: number;
  cpuLimit?: number;
  memoryRequest?: number;
  memoryLimit?: number;
  cpu?: ResourceStats;
  memory?: ResourceStats;
  /** P95 with transient spikes removed; denominator of the overprovision ratios. */
  cpuSustainedP95?: number;
  memorySustainedP95?: number;
  cpuSpikeRatio?: number;
  cpuBursty: boolean;
  memoryBursty: boolean;
  cpuOverprovisionRatio?: number;
  memoryOverprovisionRatio?: number;
  insufficientData: boolean;
  evidence: string[];
}

export interface NodeResourceProfile {
  node: string;
  labels: Record<string, string>;
  cpuAllocatable: number;
  memoryAllocatable: number;
  cpuCapacity: number;
  memoryCapacity: number;
  cpu?: ResourceStats;
  memory?: ResourceStats;
  cpuRequested: number;
  memoryRequested: number;
  /** `null` when undefined (no requests or no allocatable), never a silent zero. */
  cpuFragmentation: number | null;
  memoryFragmentation: number | null;
  /** Pod keys (`namespace/pod`) scheduled on this node. */
  pods: string[];
  insufficientData: boolean;
  evidence: string[];
}

export type RiskLevel = 'Low' | 'Medium' | 'High';
export type ConfidenceLevel = 'Low' | 'Medium' | 'High';
export type SafeToResize = true | false | 'partial_only';

export interface SafetyClassification {
  riskLevel: RiskLevel;
  confidenceLevel: ConfidenceLevel;
  safeToResize: SafeToResize;
}

export interface ResourceSettings {
  cpuRequest: number | null;
  cpuLimit: number | null;
  memoryRequest: number | null;
  memoryLimit: number | null;
}

export interface PodSizing {
  cpuRequest: number;
  cpuLimit: number;
  memoryRequest: number;
  memoryLimit: number;
  /** Bucket the memory request was normalized to, `null` above the ladder. */
  memoryBucket: number | null;
}

export interface PodResizeRecommendation {
  type: 'POD_RESIZE';
  namespace: string;
  pod: string;
  node: string | null;
  current: ResourceSettings;
  recommended: Omit<PodSizing, 'memoryBucket'>;
  savings: {
    cpuCores: number;
    memoryBytes: number;
  };
  usage: {
    cpuP95: number;
    cpuP99: number;
    cpuP100: number;
    memoryP95: number;
    memoryP99: number;
    memoryP100: number;
  };
  rationale: {
    env: Environment;
    safetyFactor: number;
    cpuFloor: number;
    cpuRequestChange: number;
    memoryRequestChange: number;
    changeTolerance: number;
    memoryBucket: number | null;
    cpuOverprovisionRatio: number | null;
    memoryOverprovisionRatio: number | null;
    cpuBursty: boolean;
  };
  explanation: string;
  safety: SafetyClassification;
}

export type NodeDirection = 'up' | 'down' | 'right-size';
export type NodeStrategy = 'add_capacity' | 'consolidate' | 'smaller_nodes' | 'underused' | 'reshape';
export type NodeRule = 'HIGH_UTILIZATION' | 'LOW_UTILIZATION' | 'SHAPE_IMBALANCE';
export type EfficiencyState = 'highly_oversized' | 'moderately_oversized' | 'right_sized' | 'saturated';
export type NodeShape = 'balanced' | 'cpu-heavy' | 'memory-heavy';

export interface NodeRightsizeMetrics {
  currentNodeCount: number;
  requiredNodes: number;
  consolidationPossible: boolean;
  podCount: number;
  nodeCpuCapacity: number;
  nodeMemoryCapacity: number;
  totalCpuRequired: number;
  totalMemoryRequired: number;
  cpuEfficiency: number;
  memoryEfficiency: number;
  nodeEfficiency: number;
  efficiencyState: EfficiencyState;
  cpuPressure: number;
  memoryPressure: number;
  shapeImbalanced: boolean;
  shape: NodeShape;
  smallerNodesFeasible: boolean;
  nodesWithInsufficientData: string[];
  podsWithInsufficientData: string[];
}

export interface NodeRightsizeRecommendation {
  type: 'NODE_RIGHTSIZE';
  scope: 'cluster';
  direction: NodeDirection;
  strategy: NodeStrategy;
  rule: NodeRule;
  confidence: 'low' | 'medium' | 'high';
  metrics: NodeRightsizeMetrics;
  reason: string;
  example: string | null;
  safety: SafetyClassification;
}

export type HpaReasonCode =
  | 'CPU_FAR_BELOW_REQUEST'
  | 'MEMORY_BOUND_CPU_SCALING'
  | 'HIGH_MIN_REPLICAS'
  | 'MAX_REPLICAS_UNUSED';

export interface HpaMisalignmentReason {
  code: HpaReasonCode;
  message: string;
}

export type HpaFlag =
  | 'INSUFFICIENT_DATA'
  | 'SCALING_BEYOND_MAX'
  | 'SCALING_BELOW_MIN'
  | 'SCALING_UP_PENDING'
  | 'SCALING_DOWN_IN_PROGRESS'
  | 'AT_MAX_REPLICAS'
  | 'AT_MIN_REPLICAS'
  | 'INVALID_CONFIG_MIN_GT_MAX'
  | 'LIMITED_SCALING_RANGE';

export interface HpaMisalignmentRecommendation {
  type: 'HPA_MISALIGNMENT';
  namespace: string;
  hpa: string;
  target: { kind: string | null; name: string };
  config: {
    minReplicas: number | null;
    maxReplicas: number | null;
    currentReplicas: number | null;
    metricType: 'cpu' | 'memory' | 'custom';
  };
  metrics: {
    avgCpuUsage: number;
    avgCpuRequest: number;
    avgMemoryUsage: number;
    avgMemoryRequest: number;
    cpuUtilization: number | null;
    memoryUtilization: number | null;
    matchedPodCount: number;
    peakReplicas: number | null;
  };
  matchedPods: string[];
  matchProvenance: 'heuristic';
  flags: HpaFlag[];
  reasons: HpaMisalignmentReason[];
  advisory: true;
  explanation: string;
  safety: SafetyClassification;
}

export type Recommendation = PodResizeRecommendation | NodeRightsizeRecommendation | HpaMisalignmentRecommendation;

export type RecommendationType = Recommendation['type'];

export interface LargeRequestPod {
  pod: string;
  namespace: string;
  workloadKind: WorkloadKind;
  workloadName: string | null;
  requestCpu: number;
  requestMemory: number;
  canFitElsewhere: boolean;
  candidateNode: string | null;
  reason: string;
}

export interface ConstraintBlocker {
  pod: string;
  namespace: string;
  workloadKind: WorkloadKind;
  workloadName: string | null;
  constraints: Array<{ type: 'topologySpreadConstraints' | 'zoneAffinity'; summary: string }>;
  constraintVisibility: 'labels' | 'unknown';
}

export interface DaemonSetOverhead {
  cpuPercent: number;
  memoryPercent: number;
  exceedsThreshold: boolean;
  contributingDaemonSets: string[];
}

export interface ScaleDownBlocker {
  pod: string;
  namespace: string;
  workloadKind: WorkloadKind;
  workloadName: string | null;
  requestCpu: number;
  requestMemory: number;
  reasons: Array<'NO_FIT_ELSEWHERE' | 'DISRUPTION_BUDGET'>;
  blockingReason: string;
}

export interface FragmentationAttribution {
  node: string;
  cpuFragmentation: number | null;
  memoryFragmentation: number | null;
  largeRequestPods: LargeRequestPod[];
  constraintBlockers: ConstraintBlocker[];
  daemonsetOverhead: DaemonSetOverhead;
  scaleDownBlockers: ScaleDownBlocker[];
}

export interface StatsFacts {
  avg: number;
  p95: number;
  p99: number;
  p100: number;
}

export interface PodFacts {
  namespace: string;
  pod: string;
  node: string | null;
  ownerKind: WorkloadKind;
  ownerName: string | null;
  insufficientData: boolean;
  evidence: string[];
  cpu: StatsFacts | null;
  memory: StatsFacts | null;
  cpuRequest: number | null;
  memoryRequest: number | null;
  cpuSpikeRatio: number | null;
  cpuBursty: boolean;
  memoryBursty: boolean;
  cpuOverprovisionRatio: number | null;
  memoryOverprovisionRatio: number | null;
}

export interface NodeFacts {
  node: string;
  insufficientData: boolean;
  evidence: string[];
  cpuAllocatable: number;
  memoryAllocatable: number;
  cpuRequested: number;
  memoryRequested: number;
  cpu: StatsFacts | null;
  memory: StatsFacts | null;
  cpuFragmentation: number | null;
  memoryFragmentation: number | null;
  podCount: number;
  fragmentationAttribution: FragmentationAttribution | null;
}

export interface HpaFacts {
  namespace: string;
  name: string;
  targetName: string;
  flags: HpaFlag[];
  matchedPods: string[];
  matchProvenance: 'heuristic';
}

export interface CountSummary {
  affected: number;
  total: number;
  text: string;
}

export interface ReportSummary {
  totalRecommendations: number;
  pods: CountSummary;
  nodes: CountSummary;
  hpa: CountSummary;
  fragmentedNodes: number;
  potentialSavings: {
    cpuCores: number;
    memoryBytes: number;
    memoryMiB: number;
    memoryGiB: number;
    text: string;
  };
}

export interface AnalysisReport {
  cluster: string;
  env: Environment;
  generatedAt: string | null;
  window: string | null;
  pods: PodFacts[];
  nodes: NodeFacts[];
  hpas: HpaFacts[];
  recommendations: Recommendation[];
  limitations: string[];
  summary: ReportSummary;
}
