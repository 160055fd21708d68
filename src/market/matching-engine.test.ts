import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { createMatchingEngine, crossOrders, MatchingEngine } from './matching-engine.js';
import { createOrderBook, OrderBook } from './order-book.js';
import { createOrder } from './order.js';
import type { Order, OrderSide } from '../types/domain.js';
import { createDeterministicIdGenerator } from '../utils/hash.js';

function order(id: string, side: OrderSide, price: number, size: number, ownerId?: string): Order {
  return { id, ownerId: ownerId ?? (side === 'bid' ? 'buyer' : 'seller'), side, price, size };
}

describe('MatchingEngine', () => {
  let engine: MatchingEngine;
  let book: OrderBook;

  beforeEach(() => {
    engine = createMatchingEngine();
    book = createOrderBook();
  });

  describe('crossOrders', () => {
    it('trades the smaller size at the midpoint', () => {
      const trade = crossOrders(order('b1', 'bid', 101, 10), order('a1', 'ask', 100, 4));

      expect(trade).toEqual({
        buyerId: 'buyer',
        sellerId: 'seller',
        size: 4,
        price: 100.5,
        bidOrderId: 'b1',
        askOrderId: 'a1',
      });
    });
  });

  describe('empty sides', () => {
    it('returns no trades on an empty book', () => {
      expect(engine.match(book)).toEqual([]);
    });

    it('leaves bids untouched when there are no asks', () => {
      book.insert(order('b1', 'bid', 101, 10));
      book.insert(order('b2', 'bid', 100, 3));

      expect(engine.match(book)).toEqual([]);
      expect(book.getBids()).toEqual([order('b1', 'bid', 101, 10), order('b2', 'bid', 100, 3)]);
    });

    it('leaves asks untouched when there are no bids', () => {
      book.insert(order('a1', 'ask', 100, 10));

      expect(engine.match(book)).toEqual([]);
      expect(book.getAsks()).toEqual([order('a1', 'ask', 100, 10)]);
    });
  });

  describe('single cross', () => {
    it('fills equal sizes completely and empties the book', () => {
      book.insert(order('b1', 'bid', 101, 10));
      book.insert(order('a1', 'ask', 100, 10));

      const trades = engine.match(book);

      expect(trades).toHaveLength(1);
      expect(trades[0]).toMatchObject({ price: 100.5, size: 10, buyerId: 'buyer', sellerId: 'seller' });
      expect(book.size()).toBe(0);
      expect(book.bestBid()).toBeNull();
      expect(book.bestAsk()).toBeNull();
    });

    it('leaves the remainder of a larger bid resting', () => {
      book.insert(order('b1', 'bid', 101, 10));
      book.insert(order('a1', 'ask', 100, 4));

      const trades = engine.match(book);

      expect(trades).toHaveLength(1);
      expect(trades[0]).toMatchObject({ price: 100.5, size: 4 });
      expect(book.getBids()).toEqual([order('b1', 'bid', 101, 6)]);
      expect(book.getAsks()).toEqual([]);
    });

    it('leaves the remainder of a larger ask resting', () => {
      book.insert(order('b1', 'bid', 101, 3));
      book.insert(order('a1', 'ask', 99, 8));

      const trades = engine.match(book);

      expect(trades).toHaveLength(1);
      expect(trades[0]).toMatchObject({ price: 100, size: 3 });
      expect(book.getBids()).toEqual([]);
      expect(book.getAsks()).toEqual([order('a1', 'ask', 99, 5)]);
    });

    it('crosses when bid equals ask', () => {
      book.insert(order('b1', 'bid', 100, 2));
      book.insert(order('a1', 'ask', 100, 2));

      const trades = engine.match(book);

      expect(trades).toEqual([
        { buyerId: 'buyer', sellerId: 'seller', size: 2, price: 100, bidOrderId: 'b1', askOrderId: 'a1' },
      ]);
      expect(book.size()).toBe(0);
    });

    it('does not trade when bid is below ask', () => {
      book.insert(order('b1', 'bid', 99, 5));
      book.insert(order('a1', 'ask', 101, 5));

      expect(engine.match(book)).toEqual([]);
      expect(book.size()).toBe(2);
      expect(book.getOrder('b1')?.size).toBe(5);
      expect(book.getOrder('a1')?.size).toBe(5);
    });
  });

  describe('multiple crosses', () => {
    it('walks the ask side from the best price', () => {
      book.insert(order('b1', 'bid', 102, 10));
      book.insert(order('a2', 'ask', 101, 3));
      book.insert(order('a1', 'ask', 100, 4));
      book.insert(order('a3', 'ask', 103, 5));

      const trades = engine.match(book);

      expect(trades.map((t) => [t.askOrderId, t.price, t.size])).toEqual([
        ['a1', 101, 4],
        ['a2', 101.5, 3],
      ]);
      expect(book.getBids()).toEqual([order('b1', 'bid', 102, 3)]);
      expect(book.getAsks()).toEqual([order('a3', 'ask', 103, 5)]);
    });

    it('walks the bid side from the best price', () => {
      book.insert(order('b1', 'bid', 100, 2));
      book.insert(order('b2', 'bid', 104, 2));
      book.insert(order('a1', 'ask', 99, 10));

      const trades = engine.match(book);

      expect(trades.map((t) => [t.bidOrderId, t.price, t.size])).toEqual([
        ['b2', 101.5, 2],
        ['b1', 99.5, 2],
      ]);
      expect(book.getBids()).toEqual([]);
      expect(book.getAsks()).toEqual([order('a1', 'ask', 99, 6)]);
    });

    it('advances both sides after an equal fill', () => {
      book.insert(order('b1', 'bid', 105, 5));
      book.insert(order('b2', 'bid', 103, 5));
      book.insert(order('a1', 'ask', 100, 5));
      book.insert(order('a2', 'ask', 102, 2));

      const trades = engine.match(book);

      expect(trades.map((t) => [t.bidOrderId, t.askOrderId, t.price, t.size])).toEqual([
        ['b1', 'a1', 102.5, 5],
        ['b2', 'a2', 102.5, 2],
      ]);
      expect(book.getBids()).toEqual([order('b2', 'bid', 103, 3)]);
      expect(book.getAsks()).toEqual([]);
    });

    it('keeps the untouched side resting when an equal fill exhausts the other', () => {
      book.insert(order('b1', 'bid', 101, 5));
      book.insert(order('a1', 'ask', 100, 5));
      book.insert(order('a2', 'ask', 100.5, 7));

      const trades = engine.match(book);

      expect(trades).toHaveLength(1);
      expect(book.getBids()).toEqual([]);
      expect(book.getAsks()).toEqual([order('a2', 'ask', 100.5, 7)]);
    });

    it('stops once the spread reopens and amends the partial order', () => {
      book.insert(order('b1', 'bid', 101, 10));
      book.insert(order('b2', 'bid', 98, 1));
      book.insert(order('a1', 'ask', 100, 4));
      book.insert(order('a2', 'ask', 102, 1));

      const trades = engine.match(book);

      expect(trades).toHaveLength(1);
      expect(book.bestBid()).toEqual(order('b1', 'bid', 101, 6));
      expect(book.bestAsk()).toEqual(order('a2', 'ask', 102, 1));
      expect(book.getOrder('b2')).toEqual(order('b2', 'bid', 98, 1));
    });

    it('matches equal-priced bids in book order', () => {
      book.insert(order('b1', 'bid', 101, 1, 'first'));
      book.insert(order('b2', 'bid', 101, 1, 'second'));
      book.insert(order('a1', 'ask', 100, 1));

      const trades = engine.match(book);

      expect(trades).toHaveLength(1);
      expect(trades[0]?.buyerId).toBe('first');
      expect(book.getBids()).toEqual([order('b2', 'bid', 101, 1, 'second')]);
    });
  });

  describe('properties on random books', () => {
    const orderSpec = fc.record({
      side: fc.constantFrom<OrderSide>('bid', 'ask'),
      owner: fc.integer({ min: 0, max: 3 }),
      cents: fc.integer({ min: 9_000, max: 11_000 }),
      size: fc.integer({ min: 1, max: 20 }),
    });

    it('conserves size, prices at the midpoint and leaves no crossable pair', () => {
      fc.assert(
        fc.property(fc.array(orderSpec, { minLength: 1, maxLength: 12 }), (specs) => {
          const book = createOrderBook();
          const generateId = createDeterministicIdGenerator(specs.length);
          const placed = specs.map((spec) =>
            createOrder(
              { ownerId: `t${spec.owner}`, side: spec.side, price: spec.cents / 100, size: spec.size },
              generateId
            )
          );
          placed.forEach((o) => book.insert(o));

          const sizeBefore = book.size();
          const trades = engine.match(book);

          // Every iteration removes at least one order
          expect(book.size()).toBeLessThanOrEqual(sizeBefore - trades.length);

          const originals = new Map(placed.map((o) => [o.id, o]));
          const filled = new Map<string, number>();

          for (const trade of trades) {
            const bid = originals.get(trade.bidOrderId);
            const ask = originals.get(trade.askOrderId);
            expect(bid?.side).toBe('bid');
            expect(ask?.side).toBe('ask');
            if (!bid || !ask) continue;

            expect(bid.price).toBeGreaterThanOrEqual(ask.price);
            expect(trade.price).toBe((bid.price + ask.price) / 2);
            expect(trade.size).toBeGreaterThan(0);

            filled.set(bid.id, (filled.get(bid.id) ?? 0) + trade.size);
            filled.set(ask.id, (filled.get(ask.id) ?? 0) + trade.size);
          }

          // Filled plus resting equals what was placed, order by order
          for (const o of placed) {
            expect((filled.get(o.id) ?? 0) + (book.getOrder(o.id)?.size ?? 0)).toBe(o.size);
          }

          const bestBid = book.bestBid();
          const bestAsk = book.bestAsk();
          if (bestBid && bestAsk) {
            expect(bestBid.price).toBeLessThan(bestAsk.price);
          }
        }),
        { numRuns: 200 }
      );
    });

    it('trades the smaller of the two crossing sizes each time', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 500 }),
          fc.integer({ min: 1, max: 500 }),
          fc.integer({ min: 0, max: 1_000 }),
          (bidSize, askSize, premiumCents) => {
            const book = createOrderBook();
            book.insert(order('b', 'bid', 100 + premiumCents / 100, bidSize));
            book.insert(order('a', 'ask', 100, askSize));

            const [trade, ...rest] = engine.match(book);

            expect(rest).toEqual([]);
            expect(trade?.size).toBe(Math.min(bidSize, askSize));
            expect(book.size()).toBe(bidSize === askSize ? 0 : 1);
          }
        )
      );
    });
  });
});
