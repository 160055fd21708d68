export * from './run-registry.js';
export * from './server.js';
