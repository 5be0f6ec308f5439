import { describe, it, expect, beforeEach, vi } from 'vitest';
import { searchCommand } from './search';
import { modelCatalog } from '../lib/model-catalog';
import { ollamaClient } from '../lib/ollama-client';

vi.mock('../lib/ollama-client', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../lib/ollama-client')>();
  const { createMockOllamaClient } = await import('../../tests/mocks');
  return { ...actual, ollamaClient: createMockOllamaClient() };
});

vi.mock('../lib/model-catalog', () => ({
  modelCatalog: {
    writeSnapshot: vi.fn(),
    search: vi.fn(),
  },
}));

describe('searchCommand', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.mocked(modelCatalog.writeSnapshot).mockResolvedValue(undefined);
    vi.mocked(ollamaClient.listModels).mockResolvedValue(['phi3:latest']);
  });

  it('should refresh the catalog snapshot before searching', async () => {
    vi.mocked(modelCatalog.search).mockReturnValue([]);

    await searchCommand('phi');

    expect(modelCatalog.writeSnapshot).toHaveBeenCalledTimes(1);
    expect(modelCatalog.search).toHaveBeenCalledWith('phi');
    expect(vi.mocked(modelCatalog.writeSnapshot).mock.invocationCallOrder[0]).toBeLessThan(
      vi.mocked(modelCatalog.search).mock.invocationCallOrder[0]
    );
  });

  it('should look up installed models only when there are matches', async () => {
    vi.mocked(modelCatalog.search).mockReturnValue([
      { name: 'phi3', size: '3.8B', ramReq: 4, vramReq: 0, category: 'chat', description: 'Small chat model' },
    ]);

    await searchCommand('phi');

    expect(ollamaClient.listModels).toHaveBeenCalledTimes(1);
  });
});
