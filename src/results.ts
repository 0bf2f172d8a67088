import { logger } from './logger.js';
import type { RadioNode } from './node.js';
import type { SimulationResults } from './types.js';

export interface ResultParams {
  maxTransmissions: number;
  lossRate: number;
  guardTime: number;
  seed: number;
  maxHops: number;
}

/**
 * Summarise the final bookkeeping of every node. Read only: nothing here feeds
 * back into the kernel.
 */
export function collectResults(params: ResultParams, nodes: readonly RadioNode[]): SimulationResults {
  const deviceCount = nodes.length;
  const reached = nodes.filter(node => node.floodBeaconIds.size > 0);
  const floodCoverage = deviceCount > 0 ? reached.length / deviceCount : 0;
  const floodSuccess = floodCoverage === 1;

  let completionTime = 0;
  if (floodSuccess) {
    for (const node of reached) {
      for (const times of node.floodBeaconTimes.values()) {
        if (times.size > 0) {
          completionTime = Math.max(completionTime, Math.min(...times));
        }
      }
    }
  }

  const totalTransmissions = nodes.reduce((sum, node) => sum + node.localTxCount, 0);

  return Object.freeze({
    maxTransmissions: params.maxTransmissions,
    lossRate: params.lossRate,
    guardTime: params.guardTime,
    seed: params.seed,
    maxHops: params.maxHops,
    deviceCount,
    floodSuccess,
    floodCoverage,
    completionTime,
    totalTransmissions,
  });
}

export type ResultRow = [
  maxTransmissions: number,
  lossRate: number,
  guardTime: number,
  seed: number,
  maxHops: number,
  deviceCount: number,
  floodSuccess: boolean,
  floodCoverage: number,
  completionTime: number,
  totalTransmissions: number,
];

// Fixed column order for CSV-style export.
export const resultsToRow = (r: SimulationResults): ResultRow => [
  r.maxTransmissions,
  r.lossRate,
  r.guardTime,
  r.seed,
  r.maxHops,
  r.deviceCount,
  r.floodSuccess,
  r.floodCoverage,
  r.completionTime,
  r.totalTransmissions,
];

export const logResults = (results: SimulationResults): void => {
  logger.info({ ...results }, 'simulation results');
};
