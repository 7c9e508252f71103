import { afterEach, vi } from 'vitest';
import { resetConfigForTests } from './services/sentinel/src/config';

process.env.STORAGE_DRIVER ??= 'memory';
process.env.LOG_LEVEL ??= 'error';

afterEach(() => {
  vi.restoreAllMocks();
  resetConfigForTests();
});
