/**
 * Run Registry - In-memory set of simulations served by the API.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { SimulationConfig } from '../types/domain.js';
import { SimulationError } from '../types/errors.js';
import { createSimulation, Simulation } from '../kernel/simulation.js';
import { generateId } from '../utils/hash.js';

export const DEFAULT_MAX_RUNS = 100;

export interface RunRegistryOptions {
  logger?: FastifyBaseLogger;
  /** Runs held at once; creating beyond this throws RUN_LIMIT_REACHED */
  maxRuns?: number;
}

export interface CreateRunOptions {
  /** Random when omitted */
  seed?: number;
  runId?: string;
}

export interface RunRegistry {
  create(config: SimulationConfig, options?: CreateRunOptions): Simulation;
  /** Throws RUN_NOT_FOUND for unknown ids */
  get(runId: string): Simulation;
  /** Drop a run and its event log; throws RUN_NOT_FOUND for unknown ids */
  remove(runId: string): void;
  list(): Simulation[];
  size(): number;
}

export function createRunRegistry(options: RunRegistryOptions = {}): RunRegistry {
  const { logger } = options;
  const maxRuns = options.maxRuns ?? DEFAULT_MAX_RUNS;
  const runs = new Map<string, Simulation>();

  function create(config: SimulationConfig, createOptions: CreateRunOptions = {}): Simulation {
    if (runs.size >= maxRuns) {
      throw new SimulationError(
        'RUN_LIMIT_REACHED',
        `Registry holds ${runs.size} runs (limit ${maxRuns}); delete one first`
      );
    }

    const runId = createOptions.runId ?? generateId();
    if (runs.has(runId)) {
      throw new SimulationError('INVALID_CONFIG', `Run ${runId} already exists`);
    }

    const seed = createOptions.seed ?? Math.floor(Math.random() * 2147483647);
    const simulation = createSimulation(config, {
      seed,
      runId,
      logger: logger?.child({ runId }),
    });

    runs.set(runId, simulation);
    return simulation;
  }

  function get(runId: string): Simulation {
    const simulation = runs.get(runId);
    if (!simulation) {
      throw new SimulationError('RUN_NOT_FOUND', `Run not found: ${runId}`);
    }
    return simulation;
  }

  function remove(runId: string): void {
    if (!runs.delete(runId)) {
      throw new SimulationError('RUN_NOT_FOUND', `Run not found: ${runId}`);
    }
    logger?.info({ runId }, 'Run removed');
  }

  function list(): Simulation[] {
    return Array.from(runs.values());
  }

  function size(): number {
    return runs.size;
  }

  return {
    create,
    get,
    remove,
    list,
    size,
  };
}
