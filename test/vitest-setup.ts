import { Logger } from '@nestjs/common';
import { vi } from 'vitest';

// Placeholders for the environment schema; the e2e database is in-process PGlite
process.env.DB_HOST ??= 'localhost';
process.env.DB_USER ??= 'tutor';
process.env.DB_PASSWORD ??= 'test-password';
process.env.DB_NAME ??= 'tutor_log_test';
process.env.JWT_ACCESS_SECRET ??= 'test-access-secret';
process.env.JWT_REFRESH_SECRET ??= 'test-refresh-secret';
process.env.NODE_ENV = 'test';

// Suppress NestJS logs below warnings in test environment
Logger.overrideLogger(['error', 'warn']);

// Set global timeout for E2E tests
vi.setConfig({ testTimeout: 60000 });
