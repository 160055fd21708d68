/**
 * Settlement - moves cash and lots between the counterparties of a trade.
 */

import type { SettlementMode, Trade } from '../types/domain.js';
import { SimulationError } from '../types/errors.js';
import type { TraderAccount } from '../traders/base-trader.js';

export interface BalanceUpdate {
  traderId: string;
  cashDelta: number;
  lotsDelta: number;
  newCash: number;
  newLots: number;
}

/**
 * Cash that changes hands for a trade.
 * 'per-unit' moves the execution price once, whatever the size.
 */
export function tradeCash(trade: Trade, mode: SettlementMode): number {
  switch (mode) {
    case 'per-unit':
      return trade.price;
    case 'notional':
      return trade.price * trade.size;
    default: {
      const unknown: never = mode;
      throw new SimulationError('INVALID_CONFIG', `Unknown settlement mode: ${String(unknown)}`);
    }
  }
}

/** Mutable balances by trader id; the only writer is this module. */
export type AccountLedger = ReadonlyMap<string, TraderAccount>;

function lookup(accounts: AccountLedger, traderId: string): TraderAccount {
  const account = accounts.get(traderId);
  if (!account) {
    throw new SimulationError('UNKNOWN_TRADER', `Trade references unknown trader ${traderId}`);
  }
  return account;
}

function apply(traderId: string, account: TraderAccount, cashDelta: number, lotsDelta: number): BalanceUpdate {
  account.cash += cashDelta;
  account.lots += lotsDelta;

  return { traderId, cashDelta, lotsDelta, newCash: account.cash, newLots: account.lots };
}

/**
 * Settle one trade. Returns the buyer's update, then the seller's.
 * Both counterparties are resolved before either account changes.
 */
export function settleTrade(
  accounts: AccountLedger,
  trade: Trade,
  mode: SettlementMode
): BalanceUpdate[] {
  const buyer = lookup(accounts, trade.buyerId);
  const seller = lookup(accounts, trade.sellerId);
  const cash = tradeCash(trade, mode);

  return [
    apply(trade.buyerId, buyer, -cash, trade.size),
    apply(trade.sellerId, seller, cash, -trade.size),
  ];
}

/**
 * Settle trades in execution order.
 */
export function settleTrades(
  accounts: AccountLedger,
  trades: readonly Trade[],
  mode: SettlementMode
): BalanceUpdate[] {
  return trades.flatMap((trade) => settleTrade(accounts, trade, mode));
}
