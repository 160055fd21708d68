/**
 * HTTP API Server for simulation runs.
 * Fastify-based REST API with WebSocket support.
 */

import Fastify, { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import type { RawData } from 'ws';
import { parseConfigOverrides, resolveConfig } from '../config.js';
import type { SimulationErrorCode } from '../types/errors.js';
import { isSimulationError, SimulationError } from '../types/errors.js';
import type { Simulation, TickResult } from '../kernel/simulation.js';
import { createRunRegistry, RunRegistry } from './run-registry.js';

export interface ApiServerConfig {
  port: number;
  host: string;
  /** Fastify logger option; false silences request logs */
  logger?: boolean | { level: string };
  /** Runs held at once */
  maxRuns?: number;
}

export interface ApiServer {
  /** Register plugins and routes once, then wait for Fastify to be ready */
  ready(): Promise<FastifyInstance>;
  start(): Promise<void>;
  stop(): Promise<void>;
  getApp(): FastifyInstance;
  getRegistry(): RunRegistry;
}

interface RunParams {
  runId: string;
}

interface CreateRunBody {
  seed?: number;
  run?: boolean;
  config?: unknown;
}

interface StepBody {
  ticks?: number;
}

interface TradesQuery {
  limit?: number;
  from_tick?: number;
}

/** Ticks one request may run, whether through `run: true` or a step */
export const MAX_TICKS_PER_REQUEST = 10_000;

const createRunSchema = {
  body: {
    type: 'object',
    properties: {
      seed: { type: 'integer', minimum: 0, maximum: 4294967295 },
      run: { type: 'boolean' },
      config: { type: 'object' },
    },
    additionalProperties: false,
  },
} as const;

const stepSchema = {
  body: {
    type: 'object',
    properties: {
      ticks: { type: 'integer', minimum: 1, maximum: MAX_TICKS_PER_REQUEST },
    },
    additionalProperties: false,
  },
} as const;

const tradesSchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 1000 },
      from_tick: { type: 'integer', minimum: 0 },
    },
  },
} as const;

function statusCodeFor(code: SimulationErrorCode): number {
  switch (code) {
    case 'RUN_NOT_FOUND':
      return 404;
    case 'RUN_FINISHED':
      return 409;
    case 'INVALID_CONFIG':
    case 'TICK_LIMIT_EXCEEDED':
      return 400;
    case 'RUN_LIMIT_REACHED':
      return 429;
    default:
      return 500;
  }
}

function runStatus(simulation: Simulation) {
  const summary = simulation.getSummary();
  return {
    run_id: summary.runId,
    seed: summary.seed,
    status: summary.status,
    current_tick: summary.ticksCompleted,
    ticks: summary.ticks,
    bankrupt_at_tick: summary.bankruptAtTick,
    price: summary.finalPrice,
    portfolio_value: summary.finalPortfolioValue,
    total_trades: summary.totalTrades,
    event_count: summary.totalEvents,
    last_event_hash: summary.finalEventHash,
  };
}

function tickMessage(runId: string, result: TickResult) {
  return {
    type: 'tick',
    run_id: runId,
    tick_id: result.tickId,
    price: result.price,
    orders_placed: result.ordersPlaced,
    trades: result.trades.map((t) => ({ price: t.price, size: t.size })),
    portfolio_value: result.portfolioValue,
    status: result.status,
  };
}

/**
 * Create an API server hosting any number of runs.
 */
export function createApiServer(config: ApiServerConfig): ApiServer {
  const app = Fastify({ logger: config.logger ?? true });
  const registry = createRunRegistry({ logger: app.log, maxRuns: config.maxRuns });
  let setup: Promise<void> | null = null;

  const setupRoutes = async () => {
    await app.register(cors, { origin: true });
    await app.register(websocket);

    app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      if (isSimulationError(error)) {
        const statusCode = statusCodeFor(error.code);
        if (statusCode >= 500) {
          request.log.error({ err: error }, 'Simulation invariant violated');
        }
        return reply.code(statusCode).send({ error: { code: error.code, message: error.message } });
      }

      if (error.validation) {
        return reply.code(400).send({ error: { code: 'INVALID_REQUEST', message: error.message } });
      }

      request.log.error({ err: error }, 'Unhandled error');
      return reply
        .code(error.statusCode ?? 500)
        .send({ error: { code: error.code || 'INTERNAL_ERROR', message: error.message } });
    });

    // Health check
    app.get('/health', async () => ({ status: 'ok', runs: registry.size() }));

    // === Runs ===

    app.post<{ Body: CreateRunBody }>('/v1/runs', { schema: createRunSchema }, async (request, reply) => {
      const body = request.body;
      const simulationConfig = resolveConfig(parseConfigOverrides(body.config));
      if (body.run && simulationConfig.ticks > MAX_TICKS_PER_REQUEST) {
        throw new SimulationError(
          'TICK_LIMIT_EXCEEDED',
          `run: true allows at most ${MAX_TICKS_PER_REQUEST} ticks, got ${simulationConfig.ticks}; create the run and step it instead`
        );
      }

      const simulation = registry.create(simulationConfig, { seed: body.seed });

      if (body.run) {
        simulation.run();
      }

      return reply.code(201).send(runStatus(simulation));
    });

    app.get('/v1/runs', async () => ({
      runs: registry.list().map((simulation) => ({
        run_id: simulation.runId,
        status: simulation.getStatus(),
        current_tick: simulation.getCurrentTick(),
        ticks: simulation.config.ticks,
      })),
    }));

    app.get<{ Params: RunParams }>('/v1/runs/:runId', async (request) => {
      return runStatus(registry.get(request.params.runId));
    });

    app.delete<{ Params: RunParams }>('/v1/runs/:runId', async (request, reply) => {
      registry.remove(request.params.runId);
      return reply.code(204).send();
    });

    app.post<{ Params: RunParams; Body: StepBody }>(
      '/v1/runs/:runId/step',
      { schema: stepSchema },
      async (request) => {
        const simulation = registry.get(request.params.runId);
        if (simulation.isFinished()) {
          throw new SimulationError(
            'RUN_FINISHED',
            `Run ${simulation.runId} is ${simulation.getStatus()}`
          );
        }

        const requested = request.body.ticks ?? 1;
        let stepped = 0;
        while (stepped < requested && !simulation.isFinished()) {
          simulation.step();
          stepped++;
        }

        return { ...runStatus(simulation), ticks_stepped: stepped };
      }
    );

    app.get<{ Params: RunParams }>('/v1/runs/:runId/portfolio', async (request) => {
      const simulation = registry.get(request.params.runId);
      return {
        run_id: simulation.runId,
        tracked_trader: simulation.config.trackedTrader,
        status: simulation.getStatus(),
        bankrupt_at_tick: simulation.getBankruptAtTick(),
        samples: simulation.getPortfolioSamples().map((s) => ({
          tick_id: s.tickId,
          price: s.price,
          value: s.value,
        })),
      };
    });

    app.get<{ Params: RunParams; Querystring: TradesQuery }>(
      '/v1/runs/:runId/trades',
      { schema: tradesSchema },
      async (request) => {
        const simulation = registry.get(request.params.runId);
        const limit = request.query.limit ?? 100;
        const fromTick = request.query.from_tick;

        // Latest trades by default; with from_tick, the first `limit` from that tick on
        const all = simulation.getTrades();
        const trades =
          fromTick === undefined
            ? all.slice(-limit)
            : all.filter((t) => t.tickId >= fromTick).slice(0, limit);

        return {
          run_id: simulation.runId,
          tick_id: simulation.getCurrentTick(),
          trades: trades.map((t) => ({
            tick_id: t.tickId,
            price: t.price,
            size: t.size,
            buyer_id: t.buyerId,
            seller_id: t.sellerId,
            bid_order_id: t.bidOrderId,
            ask_order_id: t.askOrderId,
          })),
        };
      }
    );

    app.get<{ Params: RunParams }>('/v1/runs/:runId/book', async (request) => {
      const simulation = registry.get(request.params.runId);
      const book = simulation.getBook();
      const level = (entry: { orderId: string; ownerId: string; price: number; size: number }) => ({
        order_id: entry.orderId,
        owner_id: entry.ownerId,
        price: entry.price,
        size: entry.size,
      });

      return {
        run_id: simulation.runId,
        tick_id: simulation.getCurrentTick(),
        bids: book.bids.map(level),
        asks: book.asks.map(level),
        best_bid: book.bestBid,
        best_ask: book.bestAsk,
        spread: book.spread,
        mid_price: book.midPrice,
      };
    });

    app.get<{ Params: RunParams }>('/v1/runs/:runId/traders', async (request) => {
      const simulation = registry.get(request.params.runId);
      return {
        run_id: simulation.runId,
        tick_id: simulation.getCurrentTick(),
        traders: simulation.getTraders().map((t) => ({
          trader_id: t.traderId,
          name: t.name,
          strategy: t.strategy,
          cash: t.cash,
          lots: t.lots,
          portfolio_value: t.portfolioValue,
        })),
      };
    });

    // WebSocket endpoint: one message per completed tick
    await app.register(async function (fastify) {
      fastify.get<{ Params: RunParams }>(
        '/v1/runs/:runId/stream',
        { websocket: true },
        (socket, req) => {
          let simulation: Simulation;
          try {
            simulation = registry.get(req.params.runId);
          } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            socket.send(JSON.stringify({ type: 'error', code: 'RUN_NOT_FOUND', message }));
            socket.close();
            return;
          }

          const unsubscribe = simulation.onTick((result) => {
            socket.send(JSON.stringify(tickMessage(simulation.runId, result)));
          });

          socket.send(
            JSON.stringify({
              type: 'connected',
              run_id: simulation.runId,
              tick_id: simulation.getCurrentTick(),
              status: simulation.getStatus(),
            })
          );

          socket.on('message', (message: RawData) => {
            let data: unknown;
            try {
              data = JSON.parse(message.toString());
            } catch {
              socket.send(JSON.stringify({ type: 'error', code: 'INVALID_MESSAGE', message: 'Expected JSON' }));
              return;
            }

            if (typeof data === 'object' && data !== null && 'type' in data && data.type === 'ping') {
              socket.send(JSON.stringify({ type: 'pong', tick_id: simulation.getCurrentTick() }));
            }
          });

          socket.on('close', () => {
            unsubscribe();
          });
        }
      );
    });
  };

  async function ready(): Promise<FastifyInstance> {
    if (!setup) {
      setup = setupRoutes();
    }
    await setup;
    await app.ready();
    return app;
  }

  async function start(): Promise<void> {
    await ready();
    await app.listen({ port: config.port, host: config.host });
  }

  async function stop(): Promise<void> {
    await app.close();
  }

  function getApp(): FastifyInstance {
    return app;
  }

  return {
    ready,
    start,
    stop,
    getApp,
    getRegistry: () => registry,
  };
}
