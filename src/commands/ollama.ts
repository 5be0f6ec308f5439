import chalk from 'chalk';
import { ollamaClient } from '../lib/ollama-client';
import { installer } from '../lib/installer';
import { updateChecker } from '../lib/update-checker';
import { configStore } from '../lib/config-store';
import { systemDetector } from '../lib/system-detector';
import { confirm } from '../utils/prompt-utils';
import { printHeader, printInfo, printSuccess, printWarning } from '../utils/console-utils';

/**
 * Check for a newer ollama release and apply it (automatically when autoUpdate is on)
 */
export async function checkForUpdates(): Promise<void> {
  printInfo('Checking for Ollama updates...');
  const status = await updateChecker.check();

  if (status.latest === null) {
    printWarning('Could not reach GitHub to check for updates');
    return;
  }
  if (!status.updateAvailable) {
    printSuccess(`Ollama is up to date (${status.current ?? 'unknown'})`);
    return;
  }

  printInfo(`Update available: ${status.current ?? 'unknown'} → ${chalk.bold(status.latest)}`);

  const autoUpdate = await configStore.get('autoUpdate');
  if (autoUpdate || (await confirm('Update Ollama now?', true))) {
    await updateChecker.applyUpdate(status.latest);
    printSuccess(`Ollama updated to ${status.latest}`);
  }
}

/**
 * Make sure ollama is installed, current, and serving
 */
export async function ollamaCommand(): Promise<void> {
  printHeader('🦙 Ollama Installation');

  if (await ollamaClient.isInstalled()) {
    const version = await ollamaClient.getVersion();
    printSuccess(`Ollama is installed (${version ?? 'unknown version'})`);
    await checkForUpdates();
  } else {
    printInfo('Ollama not found. Installing...');
    const osId = await systemDetector.detectOs();
    const useHomebrew = osId === 'macos' ? await confirm('Install with Homebrew?', true) : true;
    const installed = await installer.installOllama(osId, useHomebrew);
    if (!installed) {
      printWarning('Download Ollama from the opened page, then run this again');
      return;
    }
    printSuccess('Ollama installed');
  }

  if (await installer.ensureServing()) {
    printSuccess('Started ollama serve');
  } else {
    printInfo('Ollama service is already running');
  }
}
