/**
 * Test environment
 * Runs before each test file, ahead of env.ts being imported
 */
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.STORAGE_DRIVER = 'memory';
process.env.METRICS_TYPE = 'noop';
