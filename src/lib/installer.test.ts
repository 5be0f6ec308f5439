import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Installer, OLLAMA_INSTALL_SCRIPT, OLLAMA_DOWNLOAD_URL } from './installer';
import { ollamaClient } from './ollama-client';
import { usageLogger } from './usage-logger';
import { commandExists, runInteractive } from '../utils/process-utils';

vi.mock('../utils/process-utils', () => ({
  commandExists: vi.fn(),
  runInteractive: vi.fn(),
}));

vi.mock('./ollama-client', async () => {
  const { createMockOllamaClient } = await import('../../tests/mocks');
  return { ollamaClient: createMockOllamaClient() };
});

vi.mock('./usage-logger', async () => {
  const { createMockUsageLogger } = await import('../../tests/mocks');
  return { usageLogger: createMockUsageLogger() };
});

describe('Installer', () => {
  let installer: Installer;

  beforeEach(() => {
    installer = new Installer();
    vi.mocked(runInteractive).mockResolvedValue(0);
    vi.mocked(commandExists).mockResolvedValue(true);
  });

  describe('checkDependencies', () => {
    it('should report missing recommended and optional tools', async () => {
      vi.mocked(commandExists).mockImplementation(async (tool: string) => !['git', 'htop', 'lsof'].includes(tool));

      expect(await installer.checkDependencies()).toEqual({
        missingRecommended: ['git'],
        optional: [
          { name: 'htop', available: false },
          { name: 'nvidia-smi', available: true },
          { name: 'crontab', available: true },
          { name: 'lsof', available: false },
        ],
      });
    });
  });

  describe('packageInstallCommand', () => {
    it.each([
      ['ubuntu', 'sudo apt update && sudo apt install -y curl git'],
      ['debian', 'sudo apt update && sudo apt install -y curl git'],
      ['arch', 'sudo pacman -S --needed curl git'],
      ['manjaro', 'sudo pacman -S --needed curl git'],
      ['fedora', 'sudo dnf install -y curl git'],
      ['centos', 'sudo yum install -y curl git'],
      ['rhel', 'sudo yum install -y curl git'],
      ['macos', 'brew install curl git'],
    ])('should use the %s package manager', (osId, expected) => {
      expect(installer.packageInstallCommand(osId, ['curl', 'git'])).toBe(expected);
    });

    it('should return null for unsupported systems', () => {
      expect(installer.packageInstallCommand('gentoo', ['curl'])).toBeNull();
    });
  });

  describe('installPackages', () => {
    it('should run the package manager through the shell', async () => {
      await installer.installPackages('fedora', ['git']);

      expect(runInteractive).toHaveBeenCalledWith('sudo dnf install -y git', [], { shell: true });
    });

    it('should require Homebrew on macOS', async () => {
      vi.mocked(commandExists).mockResolvedValue(false);

      await expect(installer.installPackages('macos', ['git'])).rejects.toThrow(
        'Homebrew not found. Please install manually: git'
      );
    });

    it('should reject unsupported systems', async () => {
      await expect(installer.installPackages('gentoo', ['curl', 'git'])).rejects.toThrow(
        'Unsupported OS. Please install manually: curl git'
      );
    });

    it('should fail on a non-zero exit code', async () => {
      vi.mocked(runInteractive).mockResolvedValue(100);

      await expect(installer.installPackages('ubuntu', ['curl'])).rejects.toThrow(
        'Package installation failed (exit code 100): curl'
      );
    });

    it('should do nothing for an empty list', async () => {
      await installer.installPackages('gentoo', []);

      expect(runInteractive).not.toHaveBeenCalled();
    });
  });

  describe('ollamaInstallMethod', () => {
    it('should use the install script on supported Linux distributions', () => {
      expect(installer.ollamaInstallMethod('ubuntu', true)).toBe('script');
      expect(installer.ollamaInstallMethod('arch', false)).toBe('script');
    });

    it('should use Homebrew on macOS unless declined', () => {
      expect(installer.ollamaInstallMethod('macos', true)).toBe('homebrew');
      expect(installer.ollamaInstallMethod('macos', false)).toBe('manual');
    });

    it('should return null elsewhere', () => {
      expect(installer.ollamaInstallMethod('freebsd', true)).toBeNull();
    });
  });

  describe('installOllama', () => {
    it('should run the install script and log it', async () => {
      expect(await installer.installOllama('debian')).toBe(true);

      expect(runInteractive).toHaveBeenCalledWith(OLLAMA_INSTALL_SCRIPT, [], { shell: true });
      expect(usageLogger.log).toHaveBeenCalledWith('Ollama installed');
    });

    it('should open the download page when Homebrew is declined', async () => {
      expect(await installer.installOllama('macos', false)).toBe(false);

      expect(runInteractive).toHaveBeenCalledWith('open', [OLLAMA_DOWNLOAD_URL]);
      expect(usageLogger.log).not.toHaveBeenCalled();
    });

    it('should throw on unsupported systems', async () => {
      await expect(installer.installOllama('windows')).rejects.toThrow(
        'Unsupported OS. Please install manually: https://ollama.com'
      );
    });
  });

  describe('ensureServing', () => {
    it('should leave a running daemon alone', async () => {
      vi.mocked(ollamaClient.isServing).mockResolvedValue(true);

      expect(await installer.ensureServing()).toBe(false);
      expect(ollamaClient.startServe).not.toHaveBeenCalled();
    });

    it('should start the daemon when it is down', async () => {
      vi.mocked(ollamaClient.isServing).mockResolvedValue(false);

      expect(await installer.ensureServing()).toBe(true);
      expect(ollamaClient.startServe).toHaveBeenCalled();
    });
  });
});
