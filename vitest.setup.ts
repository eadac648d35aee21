import { beforeEach } from 'vitest';

// Quiet module loggers before any test file imports them
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'silent';

beforeEach(() => {
  process.env.NODE_ENV = 'test';
});
