/**
 * Simulation configuration: defaults, overrides and validation.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { NoiseTraderConfig, SimulationConfig } from './types/domain.js';
import { SimulationError } from './types/errors.js';

export const DEFAULT_NOISE_TRADER: NoiseTraderConfig = {
  name: 'noise-1',
  orderSize: 5,
  volatility: 25,
  initialCash: 50_000,
  initialLots: 100,
};

export const DEFAULT_CONFIG: SimulationConfig = {
  ticks: 100_000,
  price: {
    initialPrice: 100,
    drift: 0,
    volatility: 0.25,
  },
  marketMaker: {
    name: 'market-maker',
    markup: 0.01,
    quoteSize: 100,
    initialCash: 1e11,
    initialLots: 1e11,
  },
  noiseTraders: [DEFAULT_NOISE_TRADER],
  trackedTrader: 'noise-1',
  settlement: 'per-unit',
  eventDetail: 'full',
};

// =============================================================================
// Schemas
// =============================================================================

const finite = () => z.number({ invalid_type_error: 'must be a number' }).finite('must be finite');
const positive = () => finite().positive('must be positive');
const nonNegative = () => finite().nonnegative('must be non-negative');
const traderName = () => z.string({ invalid_type_error: 'must be a string' }).min(1, 'must not be empty');
const section = { invalid_type_error: 'must be an object' };

const priceSchema = z
  .object(
    {
      initialPrice: positive(),
      drift: finite(),
      volatility: nonNegative(),
    },
    section
  )
  .strict();

const marketMakerSchema = z
  .object(
    {
      name: traderName(),
      markup: finite().min(0, 'must be in [0, 1)').lt(1, 'must be in [0, 1)'),
      quoteSize: positive(),
      initialCash: finite(),
      initialLots: finite(),
    },
    section
  )
  .strict();

const noiseTraderSchema = z
  .object(
    {
      name: traderName(),
      orderSize: positive(),
      volatility: nonNegative(),
      initialCash: finite(),
      initialLots: finite(),
    },
    section
  )
  .strict();

const configShape = {
  ticks: finite().int('must be a non-negative integer').nonnegative('must be a non-negative integer'),
  price: priceSchema,
  marketMaker: marketMakerSchema,
  noiseTraders: z
    .array(noiseTraderSchema, { invalid_type_error: 'must be an array' })
    .min(1, 'must contain at least one trader'),
  trackedTrader: traderName(),
  settlement: z.enum(['per-unit', 'notional'], {
    errorMap: () => ({ message: 'must be one of per-unit, notional' }),
  }),
  eventDetail: z.enum(['full', 'summary'], {
    errorMap: () => ({ message: 'must be one of full, summary' }),
  }),
};

interface NamedTraders {
  marketMaker: { name: string };
  noiseTraders: Array<{ name: string }>;
  trackedTrader: string;
}

function checkTraderNames(config: NamedTraders, ctx: z.RefinementCtx): void {
  const names = new Set([config.marketMaker.name]);
  config.noiseTraders.forEach((noise, i) => {
    if (names.has(noise.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['noiseTraders', i, 'name'],
        message: `must be unique, got ${noise.name}`,
      });
    }
    names.add(noise.name);
  });

  if (!names.has(config.trackedTrader)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['trackedTrader'],
      message: `must name a configured trader, got ${config.trackedTrader}`,
    });
  }
}

/** A complete configuration, including the rules that span traders. */
export const simulationConfigSchema = z
  .object(configShape, section)
  .strict()
  .superRefine(checkTraderNames);

/** Partial input from JSON files and request bodies; unknown fields are rejected. */
export const configOverridesSchema = z
  .object(
    {
      ...configShape,
      price: priceSchema.partial(),
      marketMaker: marketMakerSchema.partial(),
      /** Each entry is merged onto the default noise trader; unnamed entries become noise-<n> */
      noiseTraders: z.array(noiseTraderSchema.partial(), { invalid_type_error: 'must be an array' }),
    },
    section
  )
  .strict()
  .partial();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;
type NoiseTraderOverrides = NonNullable<ConfigOverrides['noiseTraders']>[number];

function invalid(message: string): SimulationError {
  return new SimulationError('INVALID_CONFIG', message);
}

function formatPath(path: ReadonlyArray<string | number>): string {
  const joined = path.reduce<string>((out, key) => {
    if (typeof key === 'number') return `${out}[${key}]`;
    return out ? `${out}.${key}` : key;
  }, '');
  return joined || 'config';
}

function describeIssue(issue: z.ZodIssue): string {
  const where = formatPath(issue.path);
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return `${where} has unknown fields: ${issue.keys.join(', ')}`;
  }
  return `${where} ${issue.message}`;
}

/** INVALID_CONFIG carrying the first issue zod reports */
function configError(error: z.ZodError): SimulationError {
  const [first] = error.issues;
  return invalid(first ? describeIssue(first) : 'configuration is invalid');
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Undefined fields fall back to the default.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): SimulationConfig {
  const noiseTraders = overrides.noiseTraders
    ? overrides.noiseTraders.map((entry, i) => mergeNoiseTrader(entry, `noise-${i + 1}`))
    : DEFAULT_CONFIG.noiseTraders.map((entry) => ({ ...entry }));

  const price = overrides.price ?? {};
  const mm = overrides.marketMaker ?? {};
  const defaults = DEFAULT_CONFIG;

  const config: SimulationConfig = {
    ticks: overrides.ticks ?? defaults.ticks,
    price: {
      initialPrice: price.initialPrice ?? defaults.price.initialPrice,
      drift: price.drift ?? defaults.price.drift,
      volatility: price.volatility ?? defaults.price.volatility,
    },
    marketMaker: {
      name: mm.name ?? defaults.marketMaker.name,
      markup: mm.markup ?? defaults.marketMaker.markup,
      quoteSize: mm.quoteSize ?? defaults.marketMaker.quoteSize,
      initialCash: mm.initialCash ?? defaults.marketMaker.initialCash,
      initialLots: mm.initialLots ?? defaults.marketMaker.initialLots,
    },
    noiseTraders,
    trackedTrader: overrides.trackedTrader ?? noiseTraders[0]?.name ?? defaults.trackedTrader,
    settlement: overrides.settlement ?? defaults.settlement,
    eventDetail: overrides.eventDetail ?? defaults.eventDetail,
  };

  validateConfig(config);
  return config;
}

function mergeNoiseTrader(entry: NoiseTraderOverrides, fallbackName: string): NoiseTraderConfig {
  return {
    name: entry.name ?? fallbackName,
    orderSize: entry.orderSize ?? DEFAULT_NOISE_TRADER.orderSize,
    volatility: entry.volatility ?? DEFAULT_NOISE_TRADER.volatility,
    initialCash: entry.initialCash ?? DEFAULT_NOISE_TRADER.initialCash,
    initialLots: entry.initialLots ?? DEFAULT_NOISE_TRADER.initialLots,
  };
}

/**
 * Throws INVALID_CONFIG on the first violated constraint.
 */
export function validateConfig(config: SimulationConfig): void {
  const result = simulationConfigSchema.safeParse(config);
  if (!result.success) {
    throw configError(result.error);
  }
}

/**
 * Narrow an untyped value (JSON file, request body) to config overrides.
 */
export function parseConfigOverrides(input: unknown): ConfigOverrides {
  if (input === undefined || input === null) {
    return {};
  }

  const result = configOverridesSchema.safeParse(input);
  if (!result.success) {
    throw configError(result.error);
  }
  return result.data;
}

/**
 * Read a JSON config file as overrides, without resolving it.
 */
export function readConfigFile(path: string): ConfigOverrides {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalid(`Cannot read config file ${path}: ${reason}`);
  }

  return parseConfigOverrides(parsed);
}

/**
 * Read a JSON config file and resolve it against the defaults.
 */
export function loadConfigFile(path: string): SimulationConfig {
  return resolveConfig(readConfigFile(path));
}
