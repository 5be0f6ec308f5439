import { ollamaClient } from './ollama-client';
import { usageLogger } from './usage-logger';
import { runInteractive } from '../utils/process-utils';
import { OLLAMA_INSTALL_SCRIPT } from './installer';

export const LATEST_RELEASE_URL = 'https://api.github.com/repos/ollama/ollama/releases/latest';

export interface UpdateStatus {
  current: string | null;
  latest: string | null;
  updateAvailable: boolean;
}

export class UpdateChecker {
  /**
   * Latest released ollama version without the leading "v"
   * Null when GitHub is unreachable or rate-limited
   */
  async getLatestVersion(): Promise<string | null> {
    try {
      const response = await fetch(LATEST_RELEASE_URL, {
        headers: { Accept: 'application/vnd.github+json', 'User-Agent': 'ollama-manager' },
        signal: AbortSignal.timeout(10000),
      });

      if (!response.ok) {
        return null;
      }

      const release: unknown = await response.json();
      if (
        typeof release !== 'object' ||
        release === null ||
        !('tag_name' in release) ||
        typeof release.tag_name !== 'string' ||
        !release.tag_name
      ) {
        return null;
      }
      return release.tag_name.replace(/^v/, '');
    } catch {
      return null;
    }
  }

  async check(): Promise<UpdateStatus> {
    const [current, latest] = await Promise.all([
      ollamaClient.getVersion(),
      this.getLatestVersion(),
    ]);

    return {
      current,
      latest,
      updateAvailable: latest !== null && current !== latest,
    };
  }

  /**
   * Re-run the official install script, which upgrades in place
   */
  async applyUpdate(version: string): Promise<void> {
    const code = await runInteractive(OLLAMA_INSTALL_SCRIPT, [], { shell: true });
    if (code !== 0) {
      throw new Error(`Ollama update failed (exit code ${code})`);
    }
    await usageLogger.log(`Ollama updated to ${version}`);
  }
}

export const updateChecker = new UpdateChecker();
