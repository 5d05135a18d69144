// Jest setup file for test configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LEDGER_STORE = 'memory';
process.env.ALERT_EMITTER = 'log';

// Set test timeout
jest.setTimeout(10000);
