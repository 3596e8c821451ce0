import { jest } from '@jest/globals';

// Loggers created without an explicit level stay quiet during tests
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';

jest.setTimeout(10000);

export {};
