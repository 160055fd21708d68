#!/usr/bin/env node

/**
 * double-auction-sim CLI
 * Run simulations to completion or serve them over HTTP.
 */

import { createApiServer } from '../api/server.js';
import { DEFAULT_CONFIG, readConfigFile, resolveConfig, ConfigOverrides } from '../config.js';
import { createSimulation } from '../kernel/simulation.js';
import { saveRunData } from '../persistence.js';
import { hashSeed } from '../utils/rng.js';

// CLI argument parsing
const args = process.argv.slice(2);
const command = args[0];

function flag(name: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

function intFlag(name: string): number | undefined {
  const raw = flag(name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`--${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/** Integer seeds pass through; any other string is hashed to one */
function seedFlag(): number | undefined {
  const raw = flag('seed');
  if (raw === undefined) return undefined;
  return /^\d+$/.test(raw) ? Number(raw) >>> 0 : hashSeed(raw);
}

function runCommand(): void {
  const configPath = flag('config');
  const overrides: ConfigOverrides = configPath ? readConfigFile(configPath) : {};

  const ticks = intFlag('ticks');
  if (ticks !== undefined) overrides.ticks = ticks;
  if (args.includes('--summary-events')) overrides.eventDetail = 'summary';

  const config = resolveConfig(overrides);
  const seed = seedFlag() ?? Math.floor(Math.random() * 2147483647);
  const simulation = createSimulation(config, { seed });

  console.log(`Run ${simulation.runId}`);
  console.log(`  Seed: ${seed}`);
  console.log(`  Ticks: ${config.ticks}`);
  console.log(`  Tracked trader: ${config.trackedTrader}`);
  console.log(`  Settlement: ${config.settlement}`);

  const reportEvery = Math.max(1, Math.floor(config.ticks / 10));
  const summary = simulation.run((result) => {
    if (result.tickId % reportEvery === 0) {
      process.stdout.write(
        `\r  Tick ${result.tickId}/${config.ticks}, Trades: ${simulation.getTrades().length}`
      );
    }
  });
  console.log('');

  console.log(`Status: ${summary.status.toUpperCase()}`);
  if (summary.bankruptAtTick !== null) {
    console.log(`  Bankrupt at tick ${summary.bankruptAtTick}`);
  }
  console.log(`  Ticks completed: ${summary.ticksCompleted}`);
  console.log(`  Final price: ${summary.finalPrice.toFixed(3)}`);
  console.log(`  Final portfolio value: ${summary.finalPortfolioValue?.toFixed(2) ?? 'n/a'}`);
  console.log(`  Trades: ${summary.totalTrades}`);
  console.log(`  Events: ${summary.totalEvents}`);
  console.log(`  Final hash: ${summary.finalEventHash}`);

  const verification = simulation.getEventStore().verifyChain();
  if (verification.valid) {
    console.log('Event chain verified: VALID');
  } else {
    console.error(`Event chain INVALID at event ${verification.errorAt}`);
    process.exitCode = 1;
  }

  const outDir = flag('out');
  if (outDir) {
    const runDir = saveRunData(simulation, outDir);
    console.log(`Saved run data to ${runDir}`);
  }
}

async function serveCommand(): Promise<void> {
  const port = intFlag('port') ?? 3000;
  const host = flag('host') ?? '0.0.0.0';
  const server = createApiServer({ port, host });

  await server.start();

  console.log(`Serving on http://${host}:${port}`);
  console.log('  POST /v1/runs                 - Create a run');
  console.log('  POST /v1/runs/:runId/step     - Advance a run');
  console.log('  GET  /v1/runs/:runId/portfolio - Tracked portfolio series');
  console.log('  WS   /v1/runs/:runId/stream   - Tick stream');

  process.on('SIGINT', () => {
    console.log('\nShutting down...');
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Error during shutdown:', err);
        process.exit(1);
      }
    );
  });
}

function showHelp(): void {
  console.log('double-auction-sim CLI');
  console.log('');
  console.log('Usage: double-auction-sim <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  run [--seed=N|WORD] [--ticks=N] [--config=FILE] [--out=DIR] [--summary-events]');
  console.log('                                   Run a simulation to completion');
  console.log(`                                   (default ${DEFAULT_CONFIG.ticks} ticks)`);
  console.log('  serve [--port=N] [--host=HOST]   Start the API server');
  console.log('  help                             Show this message');
  console.log('');
}

async function main() {
  switch (command) {
    case 'run':
      runCommand();
      break;

    case 'serve':
      await serveCommand();
      break;

    default:
      showHelp();
      break;
  }
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
