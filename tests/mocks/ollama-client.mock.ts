import { vi } from 'vitest';

export interface MockOllamaClient {
  isInstalled: ReturnType<typeof vi.fn>;
  getVersion: ReturnType<typeof vi.fn>;
  listModels: ReturnType<typeof vi.fn>;
  isModelInstalled: ReturnType<typeof vi.fn>;
  pull: ReturnType<typeof vi.fn>;
  run: ReturnType<typeof vi.fn>;
  runPrompt: ReturnType<typeof vi.fn>;
  show: ReturnType<typeof vi.fn>;
  showSummary: ReturnType<typeof vi.fn>;
  remove: ReturnType<typeof vi.fn>;
  isServing: ReturnType<typeof vi.fn>;
  startServe: ReturnType<typeof vi.fn>;
}

export function createMockOllamaClient(
  overrides?: Partial<MockOllamaClient>
): MockOllamaClient {
  return {
    isInstalled: vi.fn().mockResolvedValue(true),
    getVersion: vi.fn().mockResolvedValue('0.3.12'),
    listModels: vi.fn().mockResolvedValue([]),
    isModelInstalled: vi.fn().mockResolvedValue(true),
    pull: vi.fn().mockResolvedValue(0),
    run: vi.fn().mockResolvedValue(0),
    runPrompt: vi.fn().mockResolvedValue(0),
    show: vi.fn().mockResolvedValue(''),
    showSummary: vi.fn().mockResolvedValue(''),
    remove: vi.fn().mockResolvedValue(undefined),
    isServing: vi.fn().mockResolvedValue(true),
    startServe: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}
