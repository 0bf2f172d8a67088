import type { SimulationInput } from './config.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import { runSimulation } from './simulation.js';

export interface SweepOptions {
  lossRates: number[];
  maxTransmissions: number[];
  trials: number;
  base?: Omit<SimulationInput, 'lossRate' | 'maxTransmissions' | 'seed' | 'debugMode'>;
}

export interface SweepPoint {
  maxTransmissions: number;
  lossRate: number;
  trials: number;
  successProbability: number;
  meanCoverage: number;
  meanTransmissions: number;
}

/**
 * Flood success probability over a grid of (retransmissions, loss rate) pairs.
 * Trial `i` of every pair runs with seed `i`, so pairs are compared on the same
 * sequence of seeds.
 */
export function runSweep(options: SweepOptions): SweepPoint[] {
  const { lossRates, maxTransmissions, trials, base = {} } = options;
  if (!Number.isInteger(trials) || trials < 1) {
    throw new ConfigurationError([`trials: must be a positive integer, got ${trials}`]);
  }

  const points: SweepPoint[] = [];
  for (const m of maxTransmissions) {
    for (const lossRate of lossRates) {
      let successes = 0;
      let coverage = 0;
      let transmissions = 0;
      for (let seed = 0; seed < trials; seed++) {
        const result = runSimulation({ ...base, maxTransmissions: m, lossRate, seed });
        if (result.floodSuccess) successes++;
        coverage += result.floodCoverage;
        transmissions += result.totalTransmissions;
      }
      const point: SweepPoint = {
        maxTransmissions: m,
        lossRate,
        trials,
        successProbability: successes / trials,
        meanCoverage: coverage / trials,
        meanTransmissions: transmissions / trials,
      };
      logger.debug({ ...point }, 'sweep point');
      points.push(point);
    }
  }
  return points;
}
