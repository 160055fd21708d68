export * from './order.js';
export * from './order-book.js';
export * from './matching-engine.js';
export * from './price-process.js';
