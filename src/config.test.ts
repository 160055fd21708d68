import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  parseConfigOverrides,
  resolveConfig,
  ConfigOverrides,
} from './config.js';
import { SimulationError } from './types/errors.js';

function rejection(overrides: ConfigOverrides): string {
  try {
    resolveConfig(overrides);
  } catch (error) {
    if (error instanceof SimulationError && error.code === 'INVALID_CONFIG') {
      return error.message;
    }
    throw error;
  }
  return 'accepted';
}

describe('resolveConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges nested overrides field by field', () => {
    const config = resolveConfig({ ticks: 10, price: { volatility: 1 }, marketMaker: { markup: 0.02 } });

    expect(config.ticks).toBe(10);
    expect(config.price).toEqual({ initialPrice: 100, drift: 0, volatility: 1 });
    expect(config.marketMaker).toMatchObject({ markup: 0.02, quoteSize: 100 });
  });

  it('names noise traders and tracks the first by default', () => {
    const config = resolveConfig({ noiseTraders: [{ orderSize: 2 }, { volatility: 5 }] });

    expect(config.noiseTraders.map((n) => n.name)).toEqual(['noise-1', 'noise-2']);
    expect(config.noiseTraders[0]).toEqual({
      name: 'noise-1',
      orderSize: 2,
      volatility: 25,
      initialCash: 50_000,
      initialLots: 100,
    });
    expect(config.trackedTrader).toBe('noise-1');
  });

  it('can track the market maker', () => {
    expect(resolveConfig({ trackedTrader: 'market-maker' }).trackedTrader).toBe('market-maker');
  });

  it('does not share noise trader objects with the defaults', () => {
    const config = resolveConfig();
    expect(config.noiseTraders[0]).not.toBe(DEFAULT_CONFIG.noiseTraders[0]);
  });

  it('rejects invalid values', () => {
    expect(rejection({ ticks: -1 })).toBe('ticks must be a non-negative integer');
    expect(rejection({ ticks: 1.5 })).toBe('ticks must be a non-negative integer');
    expect(rejection({ price: { initialPrice: 0 } })).toBe('price.initialPrice must be positive');
    expect(rejection({ price: { drift: Number.POSITIVE_INFINITY } })).toBe('price.drift must be finite');
    expect(rejection({ price: { volatility: -0.1 } })).toBe('price.volatility must be non-negative');
    expect(rejection({ marketMaker: { markup: 1 } })).toBe('marketMaker.markup must be in [0, 1)');
    expect(rejection({ marketMaker: { quoteSize: 0 } })).toBe('marketMaker.quoteSize must be positive');
    expect(rejection({ marketMaker: { name: '' } })).toBe('marketMaker.name must not be empty');
    expect(rejection({ noiseTraders: [] })).toBe('noiseTraders must contain at least one trader');
    expect(rejection({ noiseTraders: [{ orderSize: -5 }] })).toBe(
      'noiseTraders[0].orderSize must be positive'
    );
  });

  it('rejects names that clash or track nobody', () => {
    expect(rejection({ trackedTrader: 'nobody' })).toBe(
      'trackedTrader must name a configured trader, got nobody'
    );
    expect(rejection({ noiseTraders: [{ name: 'market-maker' }] })).toBe(
      'noiseTraders[0].name must be unique, got market-maker'
    );
    expect(rejection({ noiseTraders: [{ name: 'twin' }, { name: 'twin' }] })).toBe(
      'noiseTraders[1].name must be unique, got twin'
    );
  });

  it('accepts a zero markup and zero volatility', () => {
    expect(rejection({ marketMaker: { markup: 0 }, price: { volatility: 0 } })).toBe('accepted');
  });
});

describe('parseConfigOverrides', () => {
  it('treats a missing value as no overrides', () => {
    expect(parseConfigOverrides(undefined)).toEqual({});
    expect(parseConfigOverrides(null)).toEqual({});
  });

  it('reads every section', () => {
    const overrides = parseConfigOverrides({
      ticks: 5,
      settlement: 'notional',
      eventDetail: 'summary',
      price: { drift: 0.1 },
      marketMaker: { quoteSize: 10 },
      noiseTraders: [{ name: 'alice' }],
      trackedTrader: 'alice',
    });

    const config = resolveConfig(overrides);
    expect(config).toMatchObject({
      ticks: 5,
      settlement: 'notional',
      eventDetail: 'summary',
      trackedTrader: 'alice',
    });
    expect(config.price.drift).toBe(0.1);
    expect(config.marketMaker.quoteSize).toBe(10);
    expect(config.noiseTraders.map((n) => n.name)).toEqual(['alice']);
  });

  it('rejects wrongly typed fields', () => {
    expect(() => parseConfigOverrides([])).toThrow('config must be an object');
    expect(() => parseConfigOverrides({ price: 3 })).toThrow('price must be an object');
    expect(() => parseConfigOverrides({ marketMaker: { markup: '1%' } })).toThrow(
      'marketMaker.markup must be a number'
    );
    expect(() => parseConfigOverrides({ noiseTraders: {} })).toThrow('noiseTraders must be an array');
    expect(() => parseConfigOverrides({ noiseTraders: [{ volatility: null }] })).toThrow(
      'noiseTraders[0].volatility must be a number'
    );
    expect(() => parseConfigOverrides({ settlement: 'gross' })).toThrow(
      'settlement must be one of per-unit, notional'
    );
  });

  it('checks ranges before the defaults are merged in', () => {
    expect(() => parseConfigOverrides({ price: { volatility: -1 } })).toThrow(
      'price.volatility must be non-negative'
    );
  });

  it('rejects unknown fields at any depth', () => {
    expect(() => parseConfigOverrides({ tick: 5 })).toThrow('config has unknown fields: tick');
    expect(() => parseConfigOverrides({ marketMaker: { spread: 0.1 } })).toThrow(
      'marketMaker has unknown fields: spread'
    );
  });

  it('raises INVALID_CONFIG', () => {
    let caught: unknown;
    try {
      parseConfigOverrides({ ticks: 'soon' });
    } catch (error) {
      caught = error;
    }

    expect(caught instanceof SimulationError && caught.code).toBe('INVALID_CONFIG');
    expect(caught instanceof Error && caught.message).toBe('ticks must be a number');
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'double-auction-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('resolves a JSON file against the defaults', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ ticks: 250, price: { initialPrice: 50 } }));

    const config = loadConfigFile(path);
    expect(config.ticks).toBe(250);
    expect(config.price.initialPrice).toBe(50);
    expect(config.marketMaker).toEqual(DEFAULT_CONFIG.marketMaker);
  });

  it('reports unreadable files as invalid configuration', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');

    expect(() => loadConfigFile(path)).toThrow(SimulationError);
    expect(() => loadConfigFile(join(dir, 'missing.json'))).toThrow(SimulationError);
  });
});
