/**
 * Simulation - Orchestrates tick progression for one run.
 *
 * Per tick: advance the price, collect orders from each trader in
 * configuration order (inserting them as they arrive), match, settle,
 * sample the tracked trader, check bankruptcy, clear the book.
 */

import type { FastifyBaseLogger } from 'fastify';
import type {
  ExecutedTrade,
  OrderBookSnapshot,
  PortfolioSample,
  RunStatus,
  SimulationConfig,
  TraderSnapshot,
} from '../types/domain.js';
import { SimulationError } from '../types/errors.js';
import type { EventData, EventStore } from './event-store.js';
import { createEventStore } from './event-store.js';
import { settleTrade } from './settlement.js';
import { validateConfig } from '../config.js';
import { createOrderBook } from '../market/order-book.js';
import { createMatchingEngine } from '../market/matching-engine.js';
import { createRandomWalk } from '../market/price-process.js';
import type { Trader, MarketState, TraderAccount } from '../traders/base-trader.js';
import { MarketMaker, NoiseTrader } from '../traders/strategies.js';
import { createRNG } from '../utils/rng.js';
import { createDeterministicIdGenerator, generateId } from '../utils/hash.js';

export interface SimulationOptions {
  seed: number;
  /** Included in every event hash; replaying a run needs the same id */
  runId?: string;
  logger?: FastifyBaseLogger;
}

export interface TickResult {
  tickId: number;
  price: number;
  ordersPlaced: number;
  trades: ExecutedTrade[];
  portfolioValue: number;
  /** Book after matching, before it is cleared */
  book: OrderBookSnapshot;
  status: RunStatus;
}

export interface RunSummary {
  runId: string;
  seed: number;
  status: RunStatus;
  ticks: number;
  ticksCompleted: number;
  bankruptAtTick: number | null;
  finalPrice: number;
  finalPortfolioValue: number | null;
  totalTrades: number;
  totalEvents: number;
  finalEventHash: string;
}

export type TickListener = (result: TickResult) => void;

export interface Simulation {
  readonly runId: string;
  readonly seed: number;
  readonly config: SimulationConfig;

  getStatus(): RunStatus;
  isFinished(): boolean;
  /** Number of completed ticks; also the id of the last one */
  getCurrentTick(): number;
  getBankruptAtTick(): number | null;
  getPrice(): number;

  /** Tracked trader's portfolio value, one entry per completed tick */
  getPortfolioSeries(): number[];
  getPortfolioSamples(): PortfolioSample[];
  getTrades(): ExecutedTrade[];
  /** Book as it stood after the last tick's matching */
  getBook(): OrderBookSnapshot;
  getTraders(): TraderSnapshot[];
  getTrackedTrader(): Trader;
  getEventStore(): EventStore;
  getSummary(): RunSummary;

  /** Advance one tick; throws RUN_FINISHED once completed or bankrupt */
  step(): TickResult;
  /** Run the remaining ticks, stopping early on bankruptcy */
  run(progressCallback?: (result: TickResult) => void): RunSummary;
  /** Subscribe to completed ticks; returns an unsubscribe function */
  onTick(listener: TickListener): () => void;
}

function findTrader(traders: readonly Trader[], name: string): Trader {
  const trader = traders.find((t) => t.name === name);
  if (!trader) {
    throw new SimulationError('INVALID_CONFIG', `Tracked trader not found: ${name}`);
  }
  return trader;
}

/**
 * Create a simulation. Every random draw and identifier derives from the seed.
 */
export function createSimulation(config: SimulationConfig, options: SimulationOptions): Simulation {
  validateConfig(config);

  const { seed, logger } = options;
  const runId = options.runId ?? generateId();
  const rng = createRNG(seed);
  const ids = createDeterministicIdGenerator(seed);

  const eventStore = createEventStore();
  const book = createOrderBook();
  const matchingEngine = createMatchingEngine();
  const priceProcess = createRandomWalk(config.price, rng.fork());

  // Balances live here; traders get read-only views and settlement writes them
  const accounts = new Map<string, TraderAccount>();
  function openAccount(traderId: string, cash: number, lots: number): TraderAccount {
    const account: TraderAccount = { cash, lots };
    accounts.set(traderId, account);
    return account;
  }

  // Fixed solicitation order: market maker first, then noise traders as declared
  const marketMakerId = ids();
  const traders: Trader[] = [
    new MarketMaker(
      {
        id: marketMakerId,
        name: config.marketMaker.name,
        generateId: ids,
        account: openAccount(marketMakerId, config.marketMaker.initialCash, config.marketMaker.initialLots),
      },
      config.marketMaker.markup,
      config.marketMaker.quoteSize
    ),
    ...config.noiseTraders.map((noise) => {
      const id = ids();
      return new NoiseTrader(
        {
          id,
          name: noise.name,
          generateId: ids,
          account: openAccount(id, noise.initialCash, noise.initialLots),
        },
        rng.fork(),
        noise.orderSize,
        noise.volatility
      );
    }),
  ];

  const tracked = findTrader(traders, config.trackedTrader);

  const fullDetail = config.eventDetail === 'full';
  const samples: PortfolioSample[] = [];
  const trades: ExecutedTrade[] = [];
  const listeners = new Set<TickListener>();

  let status: RunStatus = 'created';
  let currentTick = 0;
  let bankruptAtTick: number | null = null;
  let lastBook: OrderBookSnapshot = book.snapshot();

  emit({
    runId,
    tickId: 0,
    eventType: 'RUN_CREATED',
    traderId: null,
    payload: { config, seed },
  });

  function emit(data: EventData): void {
    eventStore.append(data);
  }

  function isFinished(): boolean {
    return status === 'completed' || status === 'bankrupt';
  }

  function start(): void {
    status = 'running';
    emit({ runId, tickId: 0, eventType: 'RUN_STARTED', traderId: null, payload: {} });
    logger?.info({ runId, seed, ticks: config.ticks }, 'Simulation started');

    if (config.ticks === 0) {
      finish('completed');
    }
  }

  function finish(finalStatus: 'completed' | 'bankrupt'): void {
    status = finalStatus;
    emit({
      runId,
      tickId: currentTick,
      eventType: 'RUN_COMPLETED',
      traderId: null,
      payload: { status: finalStatus, ticksCompleted: currentTick, totalTrades: trades.length },
    });
    logger?.info(
      { runId, status: finalStatus, ticksCompleted: currentTick, totalTrades: trades.length },
      'Simulation finished'
    );
  }

  function step(): TickResult {
    if (status === 'created') {
      start();
    }
    if (isFinished()) {
      throw new SimulationError('RUN_FINISHED', `Run ${runId} is ${status}`);
    }

    const tickId = currentTick + 1;
    const price = priceProcess.next();
    emit({ runId, tickId, eventType: 'TICK_START', traderId: null, payload: { tickId, price } });

    // Orders go into the book as soon as they are generated so later traders see them
    const marketState: MarketState = { book: book.asReadonly(), truePrice: price, tickId };
    let ordersPlaced = 0;

    for (const trader of traders) {
      for (const order of trader.generateOrders(marketState)) {
        book.insert(order);
        ordersPlaced++;

        if (fullDetail) {
          emit({
            runId,
            tickId,
            eventType: 'ORDER_PLACED',
            traderId: trader.id,
            payload: {
              orderId: order.id,
              traderId: trader.id,
              side: order.side,
              price: order.price,
              size: order.size,
            },
          });
        }
      }
    }

    const tickTrades: ExecutedTrade[] = [];
    for (const trade of matchingEngine.match(book)) {
      const executed: ExecutedTrade = { ...trade, tickId };
      tickTrades.push(executed);
      trades.push(executed);

      emit({
        runId,
        tickId,
        eventType: 'TRADE_EXECUTED',
        traderId: null,
        payload: {
          price: trade.price,
          size: trade.size,
          buyerId: trade.buyerId,
          sellerId: trade.sellerId,
          bidOrderId: trade.bidOrderId,
          askOrderId: trade.askOrderId,
        },
      });

      for (const update of settleTrade(accounts, trade, config.settlement)) {
        if (fullDetail) {
          emit({
            runId,
            tickId,
            eventType: 'BALANCE_UPDATED',
            traderId: update.traderId,
            payload: update,
          });
        }
      }
    }

    lastBook = book.snapshot();
    const portfolioValue = tracked.portfolioValue(price);
    samples.push({ tickId, price, value: portfolioValue });
    currentTick = tickId;

    emit({
      runId,
      tickId,
      eventType: 'TICK_END',
      traderId: null,
      payload: { tickId, ordersPlaced, tradesExecuted: tickTrades.length, portfolioValue },
    });
    logger?.debug(
      { runId, tickId, price, ordersPlaced, trades: tickTrades.length, portfolioValue },
      'Tick completed'
    );

    if (portfolioValue < 0) {
      bankruptAtTick = tickId;
      emit({
        runId,
        tickId,
        eventType: 'TRADER_BANKRUPT',
        traderId: tracked.id,
        payload: {
          traderId: tracked.id,
          portfolioValue,
          cash: tracked.account.cash,
          lots: tracked.account.lots,
        },
      });
      logger?.warn({ runId, tickId, trader: tracked.name, portfolioValue }, 'Tracked trader bankrupt');
      finish('bankrupt');
    } else {
      book.clear();
      if (tickId === config.ticks) {
        finish('completed');
      }
    }

    const result: TickResult = {
      tickId,
      price,
      ordersPlaced,
      trades: tickTrades,
      portfolioValue,
      book: lastBook,
      status,
    };

    for (const listener of listeners) {
      listener(result);
    }

    return result;
  }

  function run(progressCallback?: (result: TickResult) => void): RunSummary {
    if (status === 'created') {
      start();
    }

    while (!isFinished()) {
      const result = step();
      progressCallback?.(result);
    }

    return getSummary();
  }

  function onTick(listener: TickListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function getSummary(): RunSummary {
    const last = samples[samples.length - 1];
    return {
      runId,
      seed,
      status,
      ticks: config.ticks,
      ticksCompleted: currentTick,
      bankruptAtTick,
      finalPrice: priceProcess.current(),
      finalPortfolioValue: last ? last.value : null,
      totalTrades: trades.length,
      totalEvents: eventStore.getCount(),
      finalEventHash: eventStore.getLastHash(),
    };
  }

  return {
    runId,
    seed,
    config,
    getStatus: () => status,
    isFinished,
    getCurrentTick: () => currentTick,
    getBankruptAtTick: () => bankruptAtTick,
    getPrice: () => priceProcess.current(),
    getPortfolioSeries: () => samples.map((s) => s.value),
    getPortfolioSamples: () => [...samples],
    getTrades: () => [...trades],
    getBook: () => lastBook,
    getTraders: () => traders.map((t) => t.snapshot(priceProcess.current())),
    getTrackedTrader: () => tracked,
    getEventStore: () => eventStore,
    getSummary,
    step,
    run,
    onTick,
  };
}
