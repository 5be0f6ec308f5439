import { commandExists, runInteractive } from '../utils/process-utils';
import { ollamaClient } from './ollama-client';
import { usageLogger } from './usage-logger';

export const OLLAMA_INSTALL_SCRIPT = 'curl -fsSL https://ollama.com/install.sh | sh';
export const OLLAMA_DOWNLOAD_URL = 'https://ollama.com/download';

export const RECOMMENDED_TOOLS = ['curl', 'git'];
export const OPTIONAL_TOOLS = ['htop', 'nvidia-smi', 'crontab', 'lsof'];

const LINUX_OLLAMA_OS = ['ubuntu', 'debian', 'fedora', 'centos', 'rhel', 'arch', 'manjaro'];

export interface DependencyReport {
  missingRecommended: string[];
  optional: { name: string; available: boolean }[];
}

export type OllamaInstallMethod = 'script' | 'homebrew' | 'manual';

/**
 * Installs system packages and ollama itself through the platform's package manager
 */
export class Installer {
  async checkDependencies(): Promise<DependencyReport> {
    const missingRecommended: string[] = [];
    for (const tool of RECOMMENDED_TOOLS) {
      if (!(await commandExists(tool))) {
        missingRecommended.push(tool);
      }
    }

    const optional: DependencyReport['optional'] = [];
    for (const tool of OPTIONAL_TOOLS) {
      optional.push({ name: tool, available: await commandExists(tool) });
    }

    return { missingRecommended, optional };
  }

  /**
   * Shell command installing packages on the given OS, or null if unsupported
   */
  packageInstallCommand(osId: string, packages: string[]): string | null {
    const list = packages.join(' ');
    switch (osId) {
      case 'ubuntu':
      case 'debian':
        return `sudo apt update && sudo apt install -y ${list}`;
      case 'arch':
      case 'manjaro':
        return `sudo pacman -S --needed ${list}`;
      case 'fedora':
        return `sudo dnf install -y ${list}`;
      case 'centos':
      case 'rhel':
        return `sudo yum install -y ${list}`;
      case 'macos':
        return `brew install ${list}`;
      default:
        return null;
    }
  }

  async installPackages(osId: string, packages: string[]): Promise<void> {
    if (packages.length === 0) return;

    if (osId === 'macos' && !(await commandExists('brew'))) {
      throw new Error('Homebrew not found. Please install manually: ' + packages.join(' '));
    }

    const command = this.packageInstallCommand(osId, packages);
    if (!command) {
      throw new Error(`Unsupported OS. Please install manually: ${packages.join(' ')}`);
    }

    const code = await runInteractive(command, [], { shell: true });
    if (code !== 0) {
      throw new Error(`Package installation failed (exit code ${code}): ${packages.join(' ')}`);
    }
  }

  /**
   * How ollama gets installed on this OS; null when unsupported
   */
  ollamaInstallMethod(osId: string, useHomebrew: boolean): OllamaInstallMethod | null {
    if (LINUX_OLLAMA_OS.includes(osId)) return 'script';
    if (osId === 'macos') return useHomebrew ? 'homebrew' : 'manual';
    return null;
  }

  /**
   * Install ollama
   * Returns false when the user was sent to the download page instead
   */
  async installOllama(osId: string, useHomebrew = true): Promise<boolean> {
    const method = this.ollamaInstallMethod(osId, useHomebrew);

    if (method === null) {
      throw new Error('Unsupported OS. Please install manually: https://ollama.com');
    }

    if (method === 'manual') {
      await runInteractive('open', [OLLAMA_DOWNLOAD_URL]);
      return false;
    }

    const command = method === 'script' ? OLLAMA_INSTALL_SCRIPT : 'brew install ollama';
    const code = await runInteractive(command, [], { shell: true });
    if (code !== 0) {
      throw new Error(`Ollama installation failed (exit code ${code})`);
    }

    await usageLogger.log('Ollama installed');
    return true;
  }

  /**
   * Start `ollama serve` if no daemon is running
   * Returns true when a daemon was started
   */
  async ensureServing(): Promise<boolean> {
    if (await ollamaClient.isServing()) {
      return false;
    }
    await ollamaClient.startServe();
    return true;
  }
}

export const installer = new Installer();
