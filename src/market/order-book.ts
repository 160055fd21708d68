/**
 * Order Book - Resting bids and asks for a single instrument.
 *
 * Each side is an unordered collection kept in insertion order. Best-price
 * queries scan the side; on equal prices the earliest inserted order wins.
 * An amended order counts as newly inserted.
 */

import type { BookEntry, Order, OrderBookSnapshot, OrderSide } from '../types/domain.js';
import { SimulationError, invalidSide } from '../types/errors.js';
import { formatOrder } from './order.js';

/** Query surface handed to traders; exposes no mutation. */
export interface ReadonlyOrderBook {
  /** Highest-priced bid, or null when there are no bids */
  bestBid(): Order | null;
  /** Lowest-priced ask, or null when there are no asks */
  bestAsk(): Order | null;
  /** Bids in insertion order */
  getBids(): Order[];
  /** Asks in insertion order */
  getAsks(): Order[];
  getOrder(orderId: string): Order | undefined;
  /** Number of resting orders on both sides */
  size(): number;
  snapshot(): OrderBookSnapshot;
  toString(): string;
}

export interface OrderBook extends ReadonlyOrderBook {
  insert(order: Order): void;
  /** Remove by id; returns false (and does nothing) when absent */
  cancel(orderId: string): boolean;
  /** Cancel by id, then insert the given order */
  amend(order: Order): void;
  clear(): void;
  asReadonly(): ReadonlyOrderBook;
}

/**
 * Create an empty order book.
 */
export function createOrderBook(): OrderBook {
  let bids: Order[] = [];
  let asks: Order[] = [];
  const index = new Map<string, Order>();

  function sideOf(side: OrderSide): Order[] {
    switch (side) {
      case 'bid':
        return bids;
      case 'ask':
        return asks;
      default:
        return invalidSide(side);
    }
  }

  function insert(order: Order): void {
    const orders = sideOf(order.side);

    if (index.has(order.id)) {
      throw new SimulationError('DUPLICATE_ORDER', `Order ${order.id} already exists`);
    }

    orders.push(order);
    index.set(order.id, order);
  }

  function cancel(orderId: string): boolean {
    const order = index.get(orderId);
    if (!order) {
      return false;
    }

    if (order.side === 'bid') {
      bids = bids.filter((o) => o.id !== orderId);
    } else {
      asks = asks.filter((o) => o.id !== orderId);
    }
    index.delete(orderId);
    return true;
  }

  function amend(order: Order): void {
    cancel(order.id);
    insert(order);
  }

  function clear(): void {
    bids = [];
    asks = [];
    index.clear();
  }

  function bestBid(): Order | null {
    let best: Order | null = null;
    for (const order of bids) {
      if (best === null || order.price > best.price) {
        best = order;
      }
    }
    return best;
  }

  function bestAsk(): Order | null {
    let best: Order | null = null;
    for (const order of asks) {
      if (best === null || order.price < best.price) {
        best = order;
      }
    }
    return best;
  }

  function getBids(): Order[] {
    return [...bids];
  }

  function getAsks(): Order[] {
    return [...asks];
  }

  function getOrder(orderId: string): Order | undefined {
    return index.get(orderId);
  }

  function size(): number {
    return index.size;
  }

  function snapshot(): OrderBookSnapshot {
    const toEntry = (o: Order): BookEntry => ({
      orderId: o.id,
      ownerId: o.ownerId,
      price: o.price,
      size: o.size,
    });

    // Array.prototype.sort is stable, so equal prices keep insertion order
    const sortedBids = [...bids].sort((a, b) => b.price - a.price).map(toEntry);
    const sortedAsks = [...asks].sort((a, b) => a.price - b.price).map(toEntry);

    const bid = bestBid();
    const ask = bestAsk();

    return {
      bids: sortedBids,
      asks: sortedAsks,
      bestBid: bid ? bid.price : null,
      bestAsk: ask ? ask.price : null,
      spread: bid && ask ? ask.price - bid.price : null,
      midPrice: bid && ask ? (bid.price + ask.price) / 2 : null,
    };
  }

  function toString(): string {
    const bid = bestBid();
    const ask = bestAsk();
    return `Best bid is ${bid ? formatOrder(bid) : 'none'} and best ask is ${ask ? formatOrder(ask) : 'none'}`;
  }

  const readonlyView: ReadonlyOrderBook = {
    bestBid,
    bestAsk,
    getBids,
    getAsks,
    getOrder,
    size,
    snapshot,
    toString,
  };

  return {
    ...readonlyView,
    insert,
    cancel,
    amend,
    clear,
    asReadonly: () => readonlyView,
  };
}
