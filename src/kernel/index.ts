export * from './event-store.js';
export * from './settlement.js';
export * from './simulation.js';
