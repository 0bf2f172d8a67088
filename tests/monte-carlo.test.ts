import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import { runSweep } from '../src/monte-carlo.js';

describe('runSweep', () => {
  it('reports one point per (retransmissions, loss rate) pair', () => {
    const points = runSweep({ lossRates: [0, 1], maxTransmissions: [1], trials: 3, base: { maxHops: 1 } });

    expect(points).toHaveLength(2);
    expect(points[0]).toEqual({
      maxTransmissions: 1,
      lossRate: 0,
      trials: 3,
      successProbability: 1,
      meanCoverage: 1,
      meanTransmissions: 10,
    });
    expect(points[1]?.successProbability).toBe(0);
    expect(points[1]?.meanCoverage).toBeCloseTo(1 / 9, 12);
    expect(points[1]?.meanTransmissions).toBe(2);
  });

  it('orders points by retransmission count, then loss rate', () => {
    const points = runSweep({ lossRates: [0.2, 0.4], maxTransmissions: [0, 2], trials: 1, base: { maxHops: 1 } });
    expect(points.map(p => [p.maxTransmissions, p.lossRate])).toEqual([[0, 0.2], [0, 0.4], [2, 0.2], [2, 0.4]]);
  });

  it('rejects a trial count below one', () => {
    expect(() => runSweep({ lossRates: [0.5], maxTransmissions: [1], trials: 0 })).toThrow(ConfigurationError);
  });
});
