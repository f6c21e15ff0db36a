import { afterEach, vi } from 'vitest';

// Reset mock call history and any stubbed env between tests.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
  vi.useRealTimers();
});
