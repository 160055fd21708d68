/**
 * Data persistence for simulation runs.
 * Saves run data to disk as JSON/JSONL/CSV files.
 */

import { mkdirSync, writeFileSync, appendFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Simulation } from './kernel/simulation.js';

/**
 * Save all run data to `{outputDir}/{runId}/` and return that directory.
 */
export function saveRunData(simulation: Simulation, outputDir: string): string {
  const runDir = join(outputDir, simulation.runId);
  mkdirSync(runDir, { recursive: true });

  const eventStore = simulation.getEventStore();
  const summary = simulation.getSummary();

  // summary.json
  writeFileSync(
    join(runDir, 'summary.json'),
    JSON.stringify(
      {
        run_id: summary.runId,
        seed: summary.seed,
        config: simulation.config,
        status: summary.status,
        ticks: summary.ticks,
        ticks_completed: summary.ticksCompleted,
        bankrupt_at_tick: summary.bankruptAtTick,
        tracked_trader: simulation.config.trackedTrader,
        final_price: summary.finalPrice,
        final_portfolio_value: summary.finalPortfolioValue,
        total_trades: summary.totalTrades,
        event_count: summary.totalEvents,
        final_event_hash: summary.finalEventHash,
        saved_at: new Date().toISOString(),
      },
      null,
      2
    ) + '\n'
  );

  // traders.json
  const trades = simulation.getTrades();
  const traders = simulation.getTraders().map((trader) => ({
    trader_id: trader.traderId,
    name: trader.name,
    strategy: trader.strategy,
    cash: trader.cash,
    lots: trader.lots,
    portfolio_value: trader.portfolioValue,
    trade_count: trades.filter((t) => t.buyerId === trader.traderId || t.sellerId === trader.traderId)
      .length,
  }));

  writeFileSync(join(runDir, 'traders.json'), JSON.stringify(traders, null, 2) + '\n');

  // portfolio.csv
  const rows = simulation
    .getPortfolioSamples()
    .map((sample) => `${sample.tickId},${sample.price},${sample.value}`);
  writeFileSync(join(runDir, 'portfolio.csv'), ['tick,price,portfolio_value', ...rows].join('\n') + '\n');

  // trades.jsonl
  const tradesPath = join(runDir, 'trades.jsonl');
  writeFileSync(tradesPath, ''); // truncate
  for (const trade of trades) {
    const line = JSON.stringify({
      tick_id: trade.tickId,
      price: trade.price,
      size: trade.size,
      buyer_id: trade.buyerId,
      seller_id: trade.sellerId,
      bid_order_id: trade.bidOrderId,
      ask_order_id: trade.askOrderId,
    });
    appendFileSync(tradesPath, line + '\n');
  }

  // events.jsonl
  writeFileSync(join(runDir, 'events.jsonl'), eventStore.exportJsonl() + '\n');

  return runDir;
}
