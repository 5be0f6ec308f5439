import { describe, it, expect, beforeEach, vi } from 'vitest';
import { benchCommand } from './bench';
import { ollamaClient } from '../lib/ollama-client';
import { modelManagementService, DEFAULT_BENCHMARK_PROMPT } from '../lib/model-management-service';
import { prompt } from '../utils/prompt-utils';

vi.mock('../lib/ollama-client', async () => {
  const { createMockOllamaClient } = await import('../../tests/mocks');
  return { ollamaClient: createMockOllamaClient() };
});

vi.mock('../lib/model-management-service', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../lib/model-management-service')>();
  return { ...actual, modelManagementService: { benchmark: vi.fn() } };
});

vi.mock('../utils/prompt-utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/prompt-utils')>();
  return { ...actual, prompt: vi.fn() };
});

describe('benchCommand', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.mocked(ollamaClient.listModels).mockResolvedValue(['codellama:7b', 'llama3.1:latest', 'phi3:latest']);
    vi.mocked(modelManagementService.benchmark).mockImplementation(async (model: string) => ({
      model,
      seconds: 3,
      exitCode: 0,
    }));
  });

  it('should test every selected model in turn', async () => {
    vi.mocked(prompt).mockResolvedValue('3 1');

    await benchCommand();

    expect(vi.mocked(modelManagementService.benchmark).mock.calls).toEqual([
      ['phi3:latest', DEFAULT_BENCHMARK_PROMPT],
      ['codellama:7b', DEFAULT_BENCHMARK_PROMPT],
    ]);
  });

  it('should take models and prompt from the command line without asking', async () => {
    await benchCommand(['phi3:latest', 'llama3.1:latest'], { prompt: 'Say hi' });

    expect(prompt).not.toHaveBeenCalled();
    expect(vi.mocked(modelManagementService.benchmark).mock.calls).toEqual([
      ['phi3:latest', 'Say hi'],
      ['llama3.1:latest', 'Say hi'],
    ]);
  });

  it('should run nothing when no number is valid', async () => {
    vi.mocked(prompt).mockResolvedValue('7');

    await benchCommand();

    expect(modelManagementService.benchmark).not.toHaveBeenCalled();
  });

  it('should finish the batch before reporting failed models', async () => {
    vi.mocked(modelManagementService.benchmark).mockImplementation(async (model: string) => ({
      model,
      seconds: 0,
      exitCode: model === 'codellama:7b' ? 1 : 0,
    }));

    await expect(benchCommand(['codellama:7b', 'phi3:latest'])).rejects.toThrow(
      'Performance test failed for: codellama:7b'
    );
    expect(modelManagementService.benchmark).toHaveBeenCalledTimes(2);
  });
});
