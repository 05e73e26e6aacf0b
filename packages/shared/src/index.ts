// Utilities
export * from './utils/logger.js';
