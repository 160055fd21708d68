/**
 * Core domain types for the double-auction simulation.
 */

// =============================================================================
// Orders & Trades
// =============================================================================

export type OrderSide = 'bid' | 'ask';

export interface Order {
  readonly id: string;
  /** Trader that submitted the order */
  readonly ownerId: string;
  readonly side: OrderSide;
  readonly price: number;
  /** Remaining size; always > 0 while resting */
  readonly size: number;
}

export interface Trade {
  readonly buyerId: string;
  readonly sellerId: string;
  readonly size: number;
  /** Execution price (midpoint of the crossing bid and ask) */
  readonly price: number;
  readonly bidOrderId: string;
  readonly askOrderId: string;
}

export interface ExecutedTrade extends Trade {
  readonly tickId: number;
}

export interface BookEntry {
  orderId: string;
  ownerId: string;
  price: number;
  size: number;
}

export interface OrderBookSnapshot {
  /** Best first */
  bids: BookEntry[];
  /** Best first */
  asks: BookEntry[];
  bestBid: number | null;
  bestAsk: number | null;
  spread: number | null;
  midPrice: number | null;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * How a trade moves cash between counterparties.
 * 'per-unit' debits/credits the execution price once per trade regardless of size.
 * 'notional' moves price * size.
 */
export type SettlementMode = 'per-unit' | 'notional';

/** 'summary' drops per-order and per-balance events from the log */
export type EventDetail = 'full' | 'summary';

export interface PriceProcessConfig {
  initialPrice: number;
  /** Mean of each additive step */
  drift: number;
  /** Standard deviation of each additive step */
  volatility: number;
}

export interface MarketMakerConfig {
  name: string;
  /** Fractional offset from the reference price, e.g. 0.01 quotes +/-1% */
  markup: number;
  quoteSize: number;
  initialCash: number;
  initialLots: number;
}

export interface NoiseTraderConfig {
  name: string;
  orderSize: number;
  /** Standard deviation of the offered price around the book mid */
  volatility: number;
  initialCash: number;
  initialLots: number;
}

export interface SimulationConfig {
  ticks: number;
  price: PriceProcessConfig;
  marketMaker: MarketMakerConfig;
  noiseTraders: NoiseTraderConfig[];
  /** Name of the trader whose portfolio value is sampled each tick */
  trackedTrader: string;
  settlement: SettlementMode;
  eventDetail: EventDetail;
}

// =============================================================================
// Runs & Traders
// =============================================================================

export type RunStatus = 'created' | 'running' | 'completed' | 'bankrupt';

export type StrategyKind = 'market_maker' | 'noise_trader';

export interface TraderSnapshot {
  traderId: string;
  name: string;
  strategy: StrategyKind;
  cash: number;
  lots: number;
  portfolioValue: number;
}

export interface PortfolioSample {
  tickId: number;
  price: number;
  value: number;
}

// =============================================================================
// Events
// =============================================================================

export type EventType =
  | 'RUN_CREATED'
  | 'RUN_STARTED'
  | 'TICK_START'
  | 'TICK_END'
  | 'ORDER_PLACED'
  | 'TRADE_EXECUTED'
  | 'BALANCE_UPDATED'
  | 'TRADER_BANKRUPT'
  | 'RUN_COMPLETED';

export interface BaseEvent {
  id: number;
  runId: string;
  tickId: number;
  eventSeq: number;
  eventType: EventType;
  traderId: string | null;
  prevHash: string;
  eventHash: string;
}

export interface RunCreatedEvent extends BaseEvent {
  eventType: 'RUN_CREATED';
  payload: { config: SimulationConfig; seed: number };
}

export interface RunStartedEvent extends BaseEvent {
  eventType: 'RUN_STARTED';
  payload: Record<string, never>;
}

export interface TickStartEvent extends BaseEvent {
  eventType: 'TICK_START';
  payload: { tickId: number; price: number };
}

export interface TickEndEvent extends BaseEvent {
  eventType: 'TICK_END';
  payload: { tickId: number; ordersPlaced: number; tradesExecuted: number; portfolioValue: number };
}

export interface OrderPlacedEvent extends BaseEvent {
  eventType: 'ORDER_PLACED';
  payload: { orderId: string; traderId: string; side: OrderSide; price: number; size: number };
}

export interface TradeExecutedEvent extends BaseEvent {
  eventType: 'TRADE_EXECUTED';
  payload: {
    price: number;
    size: number;
    buyerId: string;
    sellerId: string;
    bidOrderId: string;
    askOrderId: string;
  };
}

export interface BalanceUpdatedEvent extends BaseEvent {
  eventType: 'BALANCE_UPDATED';
  payload: {
    traderId: string;
    cashDelta: number;
    lotsDelta: number;
    newCash: number;
    newLots: number;
  };
}

export interface TraderBankruptEvent extends BaseEvent {
  eventType: 'TRADER_BANKRUPT';
  payload: { traderId: string; portfolioValue: number; cash: number; lots: number };
}

export interface RunCompletedEvent extends BaseEvent {
  eventType: 'RUN_COMPLETED';
  payload: { status: RunStatus; ticksCompleted: number; totalTrades: number };
}

export type Event =
  | RunCreatedEvent
  | RunStartedEvent
  | TickStartEvent
  | TickEndEvent
  | OrderPlacedEvent
  | TradeExecutedEvent
  | BalanceUpdatedEvent
  | TraderBankruptEvent
  | RunCompletedEvent;

export type EventPayload<T extends EventType> = Extract<Event, { eventType: T }>['payload'];
