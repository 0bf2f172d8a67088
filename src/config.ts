import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_CHANNEL, DEFAULT_FLOOD_START, DEFAULT_TX_RANGE } from './types.js';

export const DEFAULTS = {
  maxTransmissions: 1,
  lossRate: 0.6,
  maxHops: 4,
  guardTime: 100,
  debugMode: false,
  interference: true,
  txRange: DEFAULT_TX_RANGE,
  channel: DEFAULT_CHANNEL,
  endpointCapacity: Infinity,
  floodStartTime: DEFAULT_FLOOD_START,
};

export const simulationParamsSchema = z.object({
  maxTransmissions: z.number()
    .int('transmission count must be an integer')
    .min(0, 'transmission count must be greater or equal to 0')
    .default(DEFAULTS.maxTransmissions),
  lossRate: z.number()
    .min(0, 'loss rate must be between 0.0 and 1.0')
    .max(1, 'loss rate must be between 0.0 and 1.0')
    .default(DEFAULTS.lossRate),
  maxHops: z.number()
    .int('hop count must be an integer')
    .min(1, 'hop count must be greater or equal to 1')
    .default(DEFAULTS.maxHops),
  guardTime: z.number()
    .int('guard time must be an integer')
    .min(1, 'guard time must be greater or equal to 1')
    .default(DEFAULTS.guardTime),
  seed: z.number().int('seed must be an integer').optional(),
  debugMode: z.boolean().default(DEFAULTS.debugMode),
  interference: z.boolean().default(DEFAULTS.interference),
  txRange: z.number().positive('radio range must be positive').default(DEFAULTS.txRange),
  channel: z.number().int('channel must be an integer').default(DEFAULTS.channel),
  endpointCapacity: z.number()
    .min(1, 'endpoint capacity must be at least 1')
    .refine(v => v === Infinity || Number.isInteger(v), 'endpoint capacity must be an integer')
    .default(DEFAULTS.endpointCapacity),
  floodStartTime: z.number()
    .finite('flood start time must be finite')
    .min(0, 'flood start time must be greater or equal to 0')
    .default(DEFAULTS.floodStartTime),
});

export type SimulationParams = z.output<typeof simulationParamsSchema>;
export type SimulationInput = z.input<typeof simulationParamsSchema>;

/** Validate run parameters. Fails fast, before anything is scheduled. */
export const validateSimulationParams = (input: SimulationInput): SimulationParams => {
  const parsed = simulationParamsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
};
