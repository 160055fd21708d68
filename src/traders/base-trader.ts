/**
 * Base trader class for strategy agents.
 */

import type { Order, StrategyKind, TraderSnapshot } from '../types/domain.js';
import type { ReadonlyOrderBook } from '../market/order-book.js';
import { createOrder } from '../market/order.js';
import type { IdGenerator } from '../utils/hash.js';

export interface TraderConfig {
  id: string;
  name: string;
  /** Source of ids for the orders this trader creates */
  generateId: IdGenerator;
  /** Balances owned by the simulation; the trader only reads them */
  account: TraderAccount;
}

/** What a trader may observe when deciding on orders. */
export interface MarketState {
  book: ReadonlyOrderBook;
  truePrice: number;
  tickId: number;
}

/** Cash and position; written only by settlement. */
export interface TraderAccount {
  cash: number;
  lots: number;
}

export interface Trader {
  readonly id: string;
  readonly name: string;
  readonly strategy: StrategyKind;
  readonly account: Readonly<TraderAccount>;
  generateOrders(state: MarketState): Order[];
  portfolioValue(price: number): number;
  snapshot(price: number): TraderSnapshot;
}

export abstract class BaseTrader implements Trader {
  public readonly id: string;
  public readonly name: string;
  public abstract readonly strategy: StrategyKind;
  public readonly account: Readonly<TraderAccount>;
  private readonly generateId: IdGenerator;

  constructor(config: TraderConfig) {
    this.id = config.id;
    this.name = config.name;
    this.generateId = config.generateId;
    this.account = config.account;
  }

  abstract generateOrders(state: MarketState): Order[];

  portfolioValue(price: number): number {
    return this.account.cash + this.account.lots * price;
  }

  snapshot(price: number): TraderSnapshot {
    return {
      traderId: this.id,
      name: this.name,
      strategy: this.strategy,
      cash: this.account.cash,
      lots: this.account.lots,
      portfolioValue: this.portfolioValue(price),
    };
  }

  protected placeBid(price: number, size: number): Order {
    return createOrder({ ownerId: this.id, side: 'bid', price, size }, this.generateId);
  }

  protected placeAsk(price: number, size: number): Order {
    return createOrder({ ownerId: this.id, side: 'ask', price, size }, this.generateId);
  }
}
