import { describe, it, expect } from 'vitest';
import { validateSimulationParams } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { Simulation } from '../src/simulation.js';

describe('validateSimulationParams', () => {
  it('fills in defaults', () => {
    expect(validateSimulationParams({})).toEqual({
      maxTransmissions: 1,
      lossRate: 0.6,
      maxHops: 4,
      guardTime: 100,
      debugMode: false,
      interference: true,
      txRange: 1.5,
      channel: 7,
      endpointCapacity: Infinity,
      floodStartTime: 100,
    });
  });

  it('reports every out-of-range parameter', () => {
    let caught: unknown;
    try {
      validateSimulationParams({ maxTransmissions: -1, lossRate: 1.5, maxHops: 0, guardTime: 0 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError && caught.issues).toEqual([
      'maxTransmissions: transmission count must be greater or equal to 0',
      'lossRate: loss rate must be between 0.0 and 1.0',
      'maxHops: hop count must be greater or equal to 1',
      'guardTime: guard time must be greater or equal to 1',
    ]);
  });

  it('accepts the bounds', () => {
    const params = validateSimulationParams({ maxTransmissions: 0, lossRate: 1, maxHops: 1, guardTime: 1 });
    expect(params.lossRate).toBe(1);
    expect(validateSimulationParams({ lossRate: 0 }).lossRate).toBe(0);
  });

  it('rejects fractional counts', () => {
    expect(() => validateSimulationParams({ guardTime: 1.5 })).toThrow('guard time must be an integer');
    expect(() => validateSimulationParams({ endpointCapacity: 2.5 })).toThrow('endpoint capacity must be an integer');
  });

  it('fails before the simulation is built', () => {
    expect(() => new Simulation({ lossRate: -0.1 })).toThrow(ConfigurationError);
  });
});
