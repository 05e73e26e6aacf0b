// Test setup file for vitest

// Set test environment variables
process.env.NODE_ENV = 'test';

// Suppress noisy logs during tests
process.env.LOG_LEVEL = 'error';
