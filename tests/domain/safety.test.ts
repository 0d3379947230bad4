import { describe, expect, it } from 'vitest';
import { classifySafety, overprovisionRatio } from '../../src/domain/safety.js';

describe('overprovisionRatio', () => {
  it('divides request by usage', () => {
    expect(overprovisionRatio(2, 0.5)).toBe(4);
  });

  it('is infinite for zero usage and undefined without a request', () => {
    expect(overprovisionRatio(1, 0)).toBe(Number.POSITIVE_INFINITY);
    expect(overprovisionRatio(undefined, 1)).toBeUndefined();
    expect(overprovisionRatio(0, 1)).toBeUndefined();
    expect(overprovisionRatio(1, undefined)).toBeUndefined();
  });
});

describe('classifySafety', () => {
  it('is low risk with both ratios in range', () => {
    expect(classifySafety({ cpuOverprovisionRatio: 2, memoryOverprovisionRatio: 1.5, insufficientData: false }, 5)).toEqual({
      riskLevel: 'Low',
      confidenceLevel: 'High',
      safeToResize: true,
    });
  });

  it('allows a partial resize with one known ratio', () => {
    expect(classifySafety({ cpuOverprovisionRatio: 2, insufficientData: false }, 5)).toEqual({
      riskLevel: 'Low',
      confidenceLevel: 'Medium',
      safeToResize: 'partial_only',
    });
  });

  it('flags ratios above the maximum, including infinity', () => {
    expect(classifySafety({ cpuOverprovisionRatio: 6, memoryOverprovisionRatio: 1, insufficientData: false }, 5)).toEqual({
      riskLevel: 'High',
      confidenceLevel: 'Medium',
      safeToResize: false,
    });
    expect(
      classifySafety({ cpuOverprovisionRatio: Number.POSITIVE_INFINITY, insufficientData: false }, 5).riskLevel,
    ).toBe('High');
  });

  it('has low confidence without ratios', () => {
    expect(classifySafety({ cpuOverprovisionRatio: null, insufficientData: false }, 5)).toEqual({
      riskLevel: 'Medium',
      confidenceLevel: 'Low',
      safeToResize: false,
    });
  });

  it('forces low confidence on insufficient data', () => {
    expect(classifySafety({ cpuOverprovisionRatio: 2, memoryOverprovisionRatio: 2, insufficientData: true }, 5)).toEqual({
      riskLevel: 'Low',
      confidenceLevel: 'Low',
      safeToResize: false,
    });
  });
});
