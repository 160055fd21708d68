/**
 * Reference price process driving the market maker's quotes.
 */

import type { PriceProcessConfig } from '../types/domain.js';
import type { RNG } from '../utils/rng.js';

export interface PriceProcess {
  /** Price after the most recent step (the initial price before any step) */
  current(): number;
  /** Advance one step and return the new price */
  next(): number;
}

/**
 * Arithmetic random walk: each step adds Normal(drift, volatility).
 * The price is not floored and may go negative over long horizons.
 */
export function createRandomWalk(config: PriceProcessConfig, rng: RNG): PriceProcess {
  let price = config.initialPrice;

  return {
    current: () => price,
    next: () => {
      price += rng.nextGaussian(config.drift, config.volatility);
      return price;
    },
  };
}
