import type { SafetyClassification } from './types.js';

export interface SafetyInputs {
  cpuOverprovisionRatio?: number | null;
  memoryOverprovisionRatio?: number | null;
  /** True when any contributing entity lacked a sufficient observation window. */
  insufficientData: boolean;
}

/**
 * Request divided by observed usage. `undefined` when either side is unknown or
 * the request is not positive; `Infinity` when usage is zero.
 */
export const overprovisionRatio = (request: number | undefined, usage: number | undefined): number | undefined => {
  if (request === undefined || usage === undefined || request <= 0) return undefined;
  if (usage <= 0) return Number.POSITIVE_INFINITY;
  return request / usage;
};

const known = (value: number | null | undefined): value is number => typeof value === 'number' && !Number.isNaN(value);

const baseClassification = (inputs: SafetyInputs, maxOverprovisionRatio: number): SafetyClassification => {
  const ratios = [inputs.cpuOverprovisionRatio, inputs.memoryOverprovisionRatio].filter(known);
  if (ratios.length === 0) {
    return { riskLevel: 'Medium', confidenceLevel: 'Low', safeToResize: false };
  }
  if (ratios.some((ratio) => ratio > maxOverprovisionRatio)) {
    return { riskLevel: 'High', confidenceLevel: 'Medium', safeToResize: false };
  }
  if (ratios.length === 1) {
    return { riskLevel: 'Low', confidenceLevel: 'Medium', safeToResize: 'partial_only' };
  }
  return { riskLevel: 'Low', confidenceLevel: 'High', safeToResize: true };
};

export const classifySafety = (inputs: SafetyInputs, maxOverprovisionRatio: number): SafetyClassification => {
  const classification = baseClassification(inputs, maxOverprovisionRatio);
  if (!inputs.insufficientData) return classification;
  return { ...classification, confidenceLevel: 'Low', safeToResize: false };
};
