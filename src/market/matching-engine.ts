/**
 * Matching Engine - Pure, deterministic call-auction crossing.
 * Repeatedly crosses the best bid against the best ask at the midpoint.
 */

import type { Order, Trade } from '../types/domain.js';
import type { OrderBook } from './order-book.js';
import { reduceOrder } from './order.js';

export interface MatchingEngine {
  /**
   * Cross the book until the best bid is below the best ask or a side runs out.
   * Fully filled orders leave the book; a partially filled order is amended
   * in place with its remaining size.
   */
  match(book: OrderBook): Trade[];
}

/**
 * Trade between a crossing bid and ask: midpoint price, smaller of the two sizes.
 */
export function crossOrders(bid: Order, ask: Order): Trade {
  return {
    buyerId: bid.ownerId,
    sellerId: ask.ownerId,
    size: Math.min(bid.size, ask.size),
    price: (bid.price + ask.price) / 2,
    bidOrderId: bid.id,
    askOrderId: ask.id,
  };
}

/**
 * Create a matching engine instance.
 */
export function createMatchingEngine(): MatchingEngine {
  function match(book: OrderBook): Trade[] {
    const trades: Trade[] = [];

    // Best-first working copies; sort is stable so equal prices keep book order
    const bids = book.getBids().sort((a, b) => b.price - a.price);
    const asks = book.getAsks().sort((a, b) => a.price - b.price);

    let bidIdx = 0;
    let askIdx = 0;
    let bid = bids[bidIdx];
    let ask = asks[askIdx];

    if (!bid || !ask) {
      return trades;
    }

    while (bid.price >= ask.price) {
      const trade = crossOrders(bid, ask);
      trades.push(trade);

      if (bid.size > ask.size) {
        book.cancel(ask.id);
        bid = reduceOrder(bid, trade.size);

        const nextAsk = asks[++askIdx];
        if (!nextAsk) break;
        ask = nextAsk;
      } else if (bid.size < ask.size) {
        book.cancel(bid.id);
        ask = reduceOrder(ask, trade.size);

        const nextBid = bids[++bidIdx];
        if (!nextBid) break;
        bid = nextBid;
      } else {
        book.cancel(bid.id);
        book.cancel(ask.id);

        const nextBid = bids[++bidIdx];
        const nextAsk = asks[++askIdx];
        if (!nextBid || !nextAsk) break;
        bid = nextBid;
        ask = nextAsk;
      }
    }

    writeBack(book, bid);
    writeBack(book, ask);

    return trades;
  }

  /**
   * Push a working order's reduced size back into the book.
   * Orders already removed (fully filled) or untouched are left alone.
   */
  function writeBack(book: OrderBook, working: Order): void {
    const resting = book.getOrder(working.id);
    if (resting && resting.size !== working.size) {
      book.amend(working);
    }
  }

  return {
    match,
  };
}
