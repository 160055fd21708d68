/**
 * Trader strategies.
 */

import { BaseTrader, MarketState, TraderConfig } from './base-trader.js';
import type { ReadonlyOrderBook } from '../market/order-book.js';
import type { Order, StrategyKind } from '../types/domain.js';
import type { RNG } from '../utils/rng.js';

/**
 * Market Maker: quotes both sides around the reference price every tick.
 */
export class MarketMaker extends BaseTrader {
  public readonly strategy: StrategyKind = 'market_maker';
  private readonly markup: number;
  private readonly quoteSize: number;

  constructor(config: TraderConfig, markup: number, quoteSize = 100) {
    super(config);
    this.markup = markup;
    this.quoteSize = quoteSize;
  }

  generateOrders(state: MarketState): Order[] {
    return [
      this.placeBid(state.truePrice * (1 - this.markup), this.quoteSize),
      this.placeAsk(state.truePrice * (1 + this.markup), this.quoteSize),
    ];
  }
}

/**
 * Noise Trader: one order on a random side, priced around the book mid.
 * Abstains when the book has no quotes at all.
 */
export class NoiseTrader extends BaseTrader {
  public readonly strategy: StrategyKind = 'noise_trader';
  private readonly rng: RNG;
  private readonly orderSize: number;
  private readonly volatility: number;

  constructor(config: TraderConfig, rng: RNG, orderSize = 5, volatility = 25) {
    super(config);
    this.rng = rng;
    this.orderSize = orderSize;
    this.volatility = volatility;
  }

  generateOrders(state: MarketState): Order[] {
    // Fair coin from a symmetric draw
    const buy = this.rng.nextGaussian() > 0;

    const mid = referencePrice(state.book);
    if (mid === null) {
      return [];
    }

    const price = this.rng.nextGaussian(mid, this.volatility);
    return [buy ? this.placeBid(price, this.orderSize) : this.placeAsk(price, this.orderSize)];
  }
}

/**
 * Mid of best bid and best ask, falling back to whichever side is quoted.
 */
export function referencePrice(book: ReadonlyOrderBook): number | null {
  const bid = book.bestBid();
  const ask = book.bestAsk();

  if (bid && ask) return (bid.price + ask.price) / 2;
  if (bid) return bid.price;
  if (ask) return ask.price;
  return null;
}
