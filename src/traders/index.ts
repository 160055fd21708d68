export * from './base-trader.js';
export * from './strategies.js';
