#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { configStore } from './lib/config-store';
import { usageLogger } from './lib/usage-logger';
import { backupManager } from './lib/backup-manager';
import { MANAGER_VERSION } from './types/manager-config';
import { ensureDir, getOllamaDataDir } from './utils/file-utils';
import { confirm } from './utils/prompt-utils';
import { printWarning } from './utils/console-utils';
import { menuCommand } from './commands/menu';
import { quickStartCommand } from './commands/quick-start';
import { installCommand } from './commands/install';
import { switchCommand } from './commands/switch';
import { listCommand } from './commands/list';
import { searchCommand } from './commands/search';
import { benchCommand } from './commands/bench';
import { specsCommand, recommendCommand, analysisCommand } from './commands/specs';
import { optimizeCommand } from './commands/optimize';
import { ollamaCommand } from './commands/ollama';
import { depsCommand } from './commands/deps';
import {
  bulkCommand,
  bulkUpdateCommand,
  bulkUnusedCommand,
  bulkExportCommand,
  bulkImportCommand,
  bulkClearCacheCommand,
} from './commands/bulk';
import {
  backupCommand,
  backupCreateCommand,
  backupListCommand,
  backupRestoreCommand,
  backupScheduleCommand,
} from './commands/backup';
import { analyticsCommand } from './commands/analytics';
import { uiCommand } from './commands/ui';
import {
  monitorCommand,
  resourceMonitorCommand,
  gpuMonitorCommand,
  processMonitorCommand,
  performanceMonitorCommand,
} from './commands/monitor';
import { configShowCommand, configGetCommand, configSetCommand } from './commands/config';
import { helpCommand } from './commands/help';

interface LegacyOptions {
  autoBackup?: boolean;
  quickSetup?: boolean;
  monitor?: boolean;
  optimize?: boolean;
}

async function fail(error: unknown): Promise<never> {
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : String(error));
  await usageLogger.log('Script error: exit code 1');
  process.exit(1);
}

/**
 * Wrap a command action so any failure is reported, logged and exits with code 1
 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void> | void): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      await fail(error);
    }
  };
}

const program = new Command();

program
  .name('ollama-manager')
  .description('Install, tune and manage local ollama models')
  .version(`Ollama Manager v${MANAGER_VERSION}`, '-v, --version')
  .option('--auto-backup', 'Create a backup without prompts (used by cron)')
  .option('--quick-setup', 'Run the quick start setup')
  .option('--monitor', 'Open the system monitor')
  .option('--optimize', 'Apply system optimizations');

program.hook('preAction', async (thisCommand) => {
  // cron runs --auto-backup unattended, possibly as root
  const unattended = thisCommand.opts<LegacyOptions>().autoBackup === true;
  if (!unattended && typeof process.getuid === 'function' && process.getuid() === 0) {
    printWarning('Running as root is not recommended for Ollama operations');
    if (!(await confirm('Continue anyway?'))) {
      process.exit(1);
    }
  }
  await ensureDir(getOllamaDataDir());
});

// Interactive menu, or one of the legacy flags
program.action(
  action(async (options: LegacyOptions) => {
    if (options.autoBackup) {
      await backupManager.createBackup();
      return;
    }
    if (options.quickSetup) {
      await quickStartCommand();
      return;
    }
    if (options.monitor) {
      await monitorCommand();
      return;
    }
    if (options.optimize) {
      await optimizeCommand();
      return;
    }

    const firstRun = await configStore.initialize();
    if (firstRun) {
      console.log(chalk.cyan('👋 First run detected, starting quick start...'));
      await quickStartCommand();
    }
    await menuCommand();
  })
);

program
  .command('quick-start')
  .description('Dependencies, Ollama, hardware analysis and starter models in one go')
  .action(action(quickStartCommand));

program
  .command('install')
  .description('Install models (interactive when no models are given)')
  .argument('[models...]', 'Model names, e.g. llama3.1 phi3')
  .option('-c, --category <category>', 'Preselect a category (all, chat, coding, creative, vision, embedding)')
  .action(action(installCommand));

program
  .command('switch')
  .description('Start a chat with an installed model')
  .argument('[model]', 'Model name (prompted when omitted)')
  .option('--tui', 'Use the full-screen picker')
  .action(action(switchCommand));

program
  .command('ls')
  .description('List installed models')
  .action(action(listCommand));

program
  .command('search')
  .description('Search the model catalog by name, category or description')
  .argument('[term]', 'Search term (regular expression or literal text)')
  .action(action(searchCommand));

program
  .command('bench')
  .description('Time one response from each model')
  .argument('[models...]', 'Model names (prompted when omitted)')
  .option('-p, --prompt <text>', 'Prompt to send')
  .action(action(benchCommand));

program
  .command('specs')
  .description('Show hardware specifications and AI performance rating')
  .action(action(specsCommand));

program
  .command('recommend')
  .description('Recommend catalog models for this hardware')
  .action(action(recommendCommand));

program
  .command('analyze')
  .description('Hardware analysis followed by recommendations')
  .action(action(analysisCommand));

program
  .command('optimize')
  .description('Swap, GPU, CPU governor and Ollama tuning')
  .option('-y, --yes', 'Apply every applicable optimization without asking')
  .action(action(optimizeCommand));

program
  .command('ollama')
  .description('Install or update Ollama and make sure it is serving')
  .action(action(ollamaCommand));

program
  .command('deps')
  .description('Check recommended and optional system tools')
  .action(action(depsCommand));

// Bulk operations
const bulk = program
  .command('bulk')
  .description('Bulk model operations')
  .action(action(bulkCommand));

bulk.command('update').description('Re-pull every installed model').action(action(bulkUpdateCommand));
bulk.command('unused').description('Remove models not used recently').action(action(bulkUnusedCommand));
bulk
  .command('export')
  .description('Export installed model names to a file')
  .argument('[dir]', 'Target directory (default: home directory)')
  .action(action(bulkExportCommand));
bulk
  .command('import')
  .description('Install every model listed in a file')
  .argument('[file]', 'Model list file')
  .action(action(bulkImportCommand));
bulk.command('clear-cache').description('Delete temporary download files').action(action(bulkClearCacheCommand));

// Backups
const backup = program
  .command('backup')
  .description('Backup and restore models and configuration')
  .action(action(backupCommand));

backup.command('create').description('Create a backup archive').action(action(backupCreateCommand));
backup.command('list').description('List backup archives').action(action(backupListCommand));
backup
  .command('restore')
  .description('Restore a backup archive')
  .argument('[file]', 'Archive path (prompted when omitted)')
  .action(action(backupRestoreCommand));
backup
  .command('schedule')
  .description('Schedule automatic backups with cron')
  .argument('[frequency]', 'daily, weekly, monthly or disable')
  .action(action(backupScheduleCommand));

program
  .command('analytics')
  .description('Usage statistics from the usage log')
  .action(action(analyticsCommand));

program
  .command('ui')
  .description('Choose the model picker interface')
  .argument('[mode]', 'cli or tui')
  .action(action(uiCommand));

// Monitors
const monitor = program
  .command('monitor')
  .description('System monitors')
  .action(action(monitorCommand));

monitor.command('resources').description('htop (or top)').action(action(resourceMonitorCommand));
monitor.command('gpu').description('Live nvidia-smi').action(action(gpuMonitorCommand));
monitor.command('processes').description('Ollama processes and port listeners').action(action(processMonitorCommand));
monitor.command('performance').description('Live CPU, RAM and GPU charts').action(action(performanceMonitorCommand));

// Configuration
const config = program
  .command('config')
  .description('Show or change preferences')
  .action(action(configShowCommand));

config
  .command('get')
  .description('Print one configuration value')
  .argument('<key>', 'Configuration key')
  .action(action(configGetCommand));

config
  .command('set')
  .description('Change one configuration value')
  .argument('<key>', 'Configuration key')
  .argument('<value>', 'New value (lists are comma-separated)')
  .action(action(configSetCommand));

program
  .command('help')
  .description('Show the user guide')
  .action(action(helpCommand));

program.parseAsync().catch(fail);
