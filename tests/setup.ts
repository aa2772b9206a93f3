import { afterEach, vi } from 'vitest';

// Restore mocks and environment stubs after each test
afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});
