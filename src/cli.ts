#!/usr/bin/env node
import { Command, Option } from 'commander';
import { DEFAULTS } from './config.js';
import { logger, makeLogger, LOG_LEVELS, LOG_TARGETS } from './logger.js';
import type { LogLevel, LogTarget } from './logger.js';
import { runSweep } from './monte-carlo.js';
import { logResults } from './results.js';
import { Simulation } from './simulation.js';

interface CommonOptions {
  maxHops: string;
  guardTime: string;
  txRange: string;
  interference: boolean;
  logLevel: LogLevel;
  logTarget: LogTarget;
}

interface RunOptions extends CommonOptions {
  maxTransmissions: string;
  lossRate: string;
  seed?: string;
  debugMode: boolean;
}

interface SweepCliOptions extends CommonOptions {
  lossRates: string;
  maxTransmissions: string;
  trials: string;
}

const parseList = (value: string): number[] =>
  value.split(',').map(v => v.trim()).filter(v => v !== '').map(Number);

const withCommonOptions = (command: Command): Command =>
  command
    .option('-m, --max-hops <number>', 'Maximum hop (Chebyshev) distance from the sink', String(DEFAULTS.maxHops))
    .option('-g, --guard-time <ticks>', 'Guard time between consecutive retransmissions', String(DEFAULTS.guardTime))
    .option('--tx-range <distance>', 'Radio transmission range', String(DEFAULTS.txRange))
    .option('--no-interference', 'Treat identical concurrent frames as a collision')
    .addOption(
      new Option('--log-level <level>', 'Log level')
        .choices(LOG_LEVELS)
        .default('info')
    )
    .addOption(
      new Option('--log-target <target>', 'Log target')
        .choices(LOG_TARGETS)
        .default('pino-pretty')
    );

const fail = (error: unknown): never => {
  logger.fatal({ err: error }, 'simulation failed');
  process.exit(1);
};

const program = new Command();

program
  .name('floodsim')
  .description('Discrete-event simulator of flooding over a slotted half-duplex broadcast medium')
  .version('1.0.0');

withCommonOptions(
  program
    .command('run', { isDefault: true })
    .description('Run a single flood')
    .option('-t, --max-transmissions <number>', 'Retransmissions after first reception of a flood', String(DEFAULTS.maxTransmissions))
    .option('-l, --loss-rate <rate>', 'Loss rate of a single transmission (0.0 - 1.0)', String(DEFAULTS.lossRate))
    .option('-s, --seed <number>', 'Random seed (random if omitted)')
    .option('-d, --debug-mode', 'Seed with 0 and log at debug level', false)
).action((opts: RunOptions) => {
  try {
    makeLogger(opts.debugMode ? 'debug' : opts.logLevel, opts.logTarget);
    const sim = new Simulation({
      maxTransmissions: Number(opts.maxTransmissions),
      lossRate: Number(opts.lossRate),
      maxHops: Number(opts.maxHops),
      guardTime: Number(opts.guardTime),
      txRange: Number(opts.txRange),
      interference: opts.interference,
      seed: opts.seed === undefined ? undefined : Number(opts.seed),
      debugMode: opts.debugMode,
    });
    logger.info({ ...sim.params, seed: sim.seed, nodes: sim.registry.size, links: sim.registry.linkCount }, 'configuration');
    logResults(sim.run());
  } catch (error) {
    fail(error);
  }
});

withCommonOptions(
  program
    .command('sweep')
    .description('Monte Carlo flood success probability over loss rates and retransmission counts')
    .option('--loss-rates <list>', 'Comma-separated loss rates', '0.5,0.6,0.7')
    .option('--max-transmissions <list>', 'Comma-separated retransmission counts', '1,2,4')
    .option('--trials <number>', 'Simulations per pair', '500')
).action((opts: SweepCliOptions) => {
  try {
    makeLogger(opts.logLevel, opts.logTarget);
    const t0 = performance.now();
    const points = runSweep({
      lossRates: parseList(opts.lossRates),
      maxTransmissions: parseList(opts.maxTransmissions),
      trials: Number(opts.trials),
      base: {
        maxHops: Number(opts.maxHops),
        guardTime: Number(opts.guardTime),
        txRange: Number(opts.txRange),
        interference: opts.interference,
      },
    });
    for (const point of points) {
      logger.info({ ...point }, 'flood success');
    }
    logger.info({ pairs: points.length, wallTime_s: ((performance.now() - t0) / 1000).toFixed(2) }, 'sweep complete');
  } catch (error) {
    fail(error);
  }
});

program.parse(process.argv);
