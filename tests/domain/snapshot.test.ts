import { describe, expect, it } from 'vitest';
import { parseSnapshot } from '../../src/domain/snapshot.js';

describe('parseSnapshot', () => {
  it('keeps valid entities and lists the rejected ones', () => {
    const snapshot = parseSnapshot({
      cluster: 'c',
      pods: [
        { namespace: 'a', pod: 'good', cpuRequest: 1 },
        { namespace: 'a', pod: 'bad', cpuRequest: -1 },
      ],
      nodes: ['oops'],
      hpas: [{ namespace: 'shop' }],
    });
    expect(snapshot.pods.map((pod) => pod.pod)).toEqual(['good']);
    expect(snapshot.nodes).toEqual([]);
    expect(snapshot.hpas).toEqual([]);
    expect(snapshot.rejected).toEqual([
      'pod a/bad rejected: cpuRequest: Number must be greater than or equal to 0',
      'node #0 rejected: Expected object, received string',
      'hpa #0 rejected: name: Required',
    ]);
  });

  it('applies entity defaults', () => {
    const snapshot = parseSnapshot({ cluster: 'c', hpas: [{ namespace: 'shop', name: 'web' }] });
    expect(snapshot.env).toBe('nonprod');
    expect(snapshot.disruptionBudgets).toEqual([]);
    expect(snapshot.hpas).toEqual([{ namespace: 'shop', name: 'web', targetName: '', metricType: 'cpu' }]);
    expect(snapshot.rejected).toEqual([]);
  });

  it('still rejects a snapshot without a cluster name', () => {
    expect(() => parseSnapshot({ pods: [] })).toThrow();
  });
});
