import { beforeEach, afterEach, vi } from 'vitest';

// Global test setup
beforeEach(() => {
  // Clear all mocks before each test to ensure clean state
  vi.clearAllMocks();
});

afterEach(() => {
  // Restore spies, stubbed globals (fetch) and stubbed env vars
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
});
