/**
 * double-auction-sim - Seeded double-auction market simulation
 *
 * Main entry point exports.
 */

// Core types
export * from './types/index.js';

// Utilities
export * from './utils/index.js';

// Configuration
export * from './config.js';

// Market
export * from './market/index.js';

// Traders
export * from './traders/index.js';

// Kernel
export * from './kernel/index.js';

// Persistence
export * from './persistence.js';

// API
export * from './api/index.js';
