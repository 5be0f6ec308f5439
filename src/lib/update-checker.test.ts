import { describe, it, expect, beforeEach, vi } from 'vitest';
import { UpdateChecker, LATEST_RELEASE_URL } from './update-checker';
import { ollamaClient } from './ollama-client';
import { usageLogger } from './usage-logger';
import { runInteractive } from '../utils/process-utils';

vi.mock('./ollama-client', async () => {
  const { createMockOllamaClient } = await import('../../tests/mocks');
  return { ollamaClient: createMockOllamaClient() };
});

vi.mock('./usage-logger', async () => {
  const { createMockUsageLogger } = await import('../../tests/mocks');
  return { usageLogger: createMockUsageLogger() };
});

vi.mock('../utils/process-utils', () => ({
  runInteractive: vi.fn(),
}));

function jsonResponse(body: unknown, ok = true): Response {
  return new Response(JSON.stringify(body), { status: ok ? 200 : 403 });
}

describe('UpdateChecker', () => {
  let checker: UpdateChecker;
  const mockFetch = vi.fn();

  beforeEach(() => {
    checker = new UpdateChecker();
    vi.stubGlobal('fetch', mockFetch);
    vi.mocked(ollamaClient.getVersion).mockResolvedValue('0.3.10');
  });

  describe('getLatestVersion', () => {
    it('should strip the leading v from the release tag', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ tag_name: 'v0.3.12' }));

      expect(await checker.getLatestVersion()).toBe('0.3.12');
      expect(mockFetch).toHaveBeenCalledWith(LATEST_RELEASE_URL, expect.any(Object));
    });

    it('should return null on HTTP errors', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ message: 'API rate limit exceeded' }, false));

      expect(await checker.getLatestVersion()).toBeNull();
    });

    it('should return null on network failures', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      expect(await checker.getLatestVersion()).toBeNull();
    });

    it('should return null when the tag is missing', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ name: 'release' }));

      expect(await checker.getLatestVersion()).toBeNull();
    });
  });

  describe('check', () => {
    it('should report an available update', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ tag_name: 'v0.3.12' }));

      expect(await checker.check()).toEqual({
        current: '0.3.10',
        latest: '0.3.12',
        updateAvailable: true,
      });
    });

    it('should report no update when versions match', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ tag_name: 'v0.3.10' }));

      expect((await checker.check()).updateAvailable).toBe(false);
    });

    it('should report no update when the latest version is unknown', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'));

      expect(await checker.check()).toEqual({
        current: '0.3.10',
        latest: null,
        updateAvailable: false,
      });
    });
  });

  describe('applyUpdate', () => {
    it('should log the new version after a successful install', async () => {
      vi.mocked(runInteractive).mockResolvedValue(0);

      await checker.applyUpdate('0.3.12');

      expect(usageLogger.log).toHaveBeenCalledWith('Ollama updated to 0.3.12');
    });

    it('should throw when the installer fails', async () => {
      vi.mocked(runInteractive).mockResolvedValue(1);

      await expect(checker.applyUpdate('0.3.12')).rejects.toThrow('Ollama update failed (exit code 1)');
      expect(usageLogger.log).not.toHaveBeenCalled();
    });
  });
});
