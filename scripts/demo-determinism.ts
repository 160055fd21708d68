#!/usr/bin/env npx tsx

/**
 * Determinism Demo
 *
 * Runs the same seed twice and compares final event hashes, then shows that a
 * different seed diverges.
 */

import { resolveConfig } from '../src/config.js';
import { createSimulation, RunSummary } from '../src/kernel/simulation.js';
import type { TraderSnapshot } from '../src/types/domain.js';

const CONFIG = resolveConfig({ ticks: 2_000 });

function runWithSeed(seed: number): { summary: RunSummary; traders: TraderSnapshot[] } {
  // The run id is part of every hash, so replays share it
  const simulation = createSimulation(CONFIG, { seed, runId: `determinism-${seed}` });

  console.log(`Running simulation with seed=${seed}, ticks=${CONFIG.ticks}`);

  const summary = simulation.run((result) => {
    if (result.tickId % 100 === 0) {
      process.stdout.write(`\r  Tick ${result.tickId}/${CONFIG.ticks}`);
    }
  });

  console.log(''); // New line after progress

  return { summary, traders: simulation.getTraders() };
}

function report(summary: RunSummary): void {
  console.log(`  Status: ${summary.status}`);
  console.log(`  Total Trades: ${summary.totalTrades}`);
  console.log(`  Total Events: ${summary.totalEvents}`);
  console.log(`  Final Hash: ${summary.finalEventHash}`);
  console.log('');
}

async function main() {
  console.log('='.repeat(60));
  console.log('Double-Auction Determinism Demonstration');
  console.log('='.repeat(60));
  console.log('');

  const SEED = 42;

  console.log('-'.repeat(60));
  console.log('RUN 1');
  console.log('-'.repeat(60));
  const run1 = runWithSeed(SEED);
  report(run1.summary);

  console.log('-'.repeat(60));
  console.log('RUN 2 (same seed)');
  console.log('-'.repeat(60));
  const run2 = runWithSeed(SEED);
  report(run2.summary);

  console.log('='.repeat(60));
  console.log('COMPARISON');
  console.log('='.repeat(60));

  const hashMatch = run1.summary.finalEventHash === run2.summary.finalEventHash;
  const tradesMatch = run1.summary.totalTrades === run2.summary.totalTrades;
  const eventsMatch = run1.summary.totalEvents === run2.summary.totalEvents;

  console.log(`  Hashes match: ${hashMatch ? 'YES' : 'NO'}`);
  console.log(`  Trade counts match: ${tradesMatch ? 'YES' : 'NO'}`);
  console.log(`  Event counts match: ${eventsMatch ? 'YES' : 'NO'}`);
  console.log('');

  if (hashMatch && tradesMatch && eventsMatch) {
    console.log('DETERMINISM VERIFIED');
  } else {
    console.log('DETERMINISM FAILED');
    process.exit(1);
  }

  console.log('');

  const DIFFERENT_SEED = 43;
  console.log('-'.repeat(60));
  console.log(`RUN 3 (different seed: ${DIFFERENT_SEED})`);
  console.log('-'.repeat(60));
  const run3 = runWithSeed(DIFFERENT_SEED);
  report(run3.summary);

  const differentHash = run1.summary.finalEventHash !== run3.summary.finalEventHash;
  console.log(`  Different seed produces different hash: ${differentHash ? 'YES' : 'NO'}`);
  console.log('');

  console.log('='.repeat(60));
  console.log('TRADER RESULTS (from Run 1)');
  console.log('='.repeat(60));
  console.log('');
  console.log('Name'.padEnd(15) + 'Cash'.padStart(20) + 'Lots'.padStart(20) + 'Value'.padStart(20));
  console.log('-'.repeat(75));

  for (const trader of run1.traders) {
    console.log(
      trader.name.padEnd(15) +
        trader.cash.toFixed(2).padStart(20) +
        trader.lots.toFixed(0).padStart(20) +
        trader.portfolioValue.toFixed(2).padStart(20)
    );
  }

  console.log('');
  console.log('Demo complete!');
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
