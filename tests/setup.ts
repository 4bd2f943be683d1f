/**
 * Vitest global test setup
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.DATABASE_PATH = ':memory:';
process.env.FRONTEND_AUTOGENERATE = 'false';
