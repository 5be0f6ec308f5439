import * as os from 'os';
import chalk from 'chalk';
import { modelManagementService, InstallModelResult } from '../lib/model-management-service';
import { choose, confirm, prompt } from '../utils/prompt-utils';
import { expandHome } from '../utils/file-utils';
import { withInterrupt } from '../utils/process-utils';
import { printError, printHeader, printInfo, printSuccess, printWarning } from '../utils/console-utils';

const BULK_ACTIONS = [
  'Update all models',
  'Remove unused models',
  'Export model list',
  'Import model list',
  'Clear model cache',
] as const;

function printProgress(line: string): void {
  process.stdout.write(`\r\x1b[K${chalk.cyan(line)}`);
}

function reportInstalls(results: InstallModelResult[]): void {
  process.stdout.write('\n');
  for (const result of results) {
    if (result.success) {
      printSuccess(`Installed ${result.model}`);
    } else {
      printError(result.error ?? `Failed to install ${result.model}`);
    }
  }
}

export async function bulkUpdateCommand(): Promise<void> {
  printInfo('Updating all models...');
  const { models, interrupted } = await withInterrupt(async (signal) => {
    const updated = await modelManagementService.updateAll((model, exitCode) => {
      if (exitCode === 0) {
        printSuccess(`Updated ${model}`);
      } else {
        printError(`Failed to update ${model} (exit code ${exitCode})`);
      }
    }, signal);
    return { models: updated, interrupted: signal.aborted };
  });

  if (models.length === 0) {
    printWarning('No models installed');
    return;
  }
  if (interrupted) {
    printWarning('Update interrupted');
    return;
  }
  printSuccess('All models updated');
}

export async function bulkUnusedCommand(): Promise<void> {
  printInfo('Finding unused models...');
  const unused = await modelManagementService.findUnusedModels();

  if (unused === null) {
    printWarning('No usage history available');
    return;
  }
  if (unused.length === 0) {
    printSuccess('No unused models found');
    return;
  }

  console.log(chalk.cyan('Unused models:'));
  unused.forEach((model) => console.log(`  ${chalk.gray('•')} ${model}`));

  for (const model of unused) {
    if (await confirm(`Remove ${model}?`)) {
      await modelManagementService.removeModel(model);
      printSuccess(`Removed ${model}`);
    }
  }
}

export async function bulkExportCommand(dir: string = os.homedir()): Promise<void> {
  const exportPath = await modelManagementService.exportList(expandHome(dir));
  printSuccess(`Model list exported to: ${exportPath}`);
}

export async function bulkImportCommand(file?: string): Promise<void> {
  const filePath = file ?? (await prompt('Enter path to model list file:'));
  if (!filePath) {
    printError('No file given');
    return;
  }

  const results = await withInterrupt((signal) =>
    modelManagementService.importList(
      expandHome(filePath),
      (model) => printInfo(`Installing ${model}...`),
      printProgress,
      signal
    )
  );
  reportInstalls(results);
}

export async function bulkClearCacheCommand(): Promise<void> {
  printInfo('Clearing model cache...');
  const removed = await modelManagementService.clearCache();
  printSuccess(`Cache cleared (${removed} temporary file(s) removed)`);
}

export async function bulkCommand(): Promise<void> {
  printHeader('📦 Bulk Model Operations');

  const index = await choose('Select operation:', [...BULK_ACTIONS]);
  switch (index) {
    case 0:
      await bulkUpdateCommand();
      break;
    case 1:
      await bulkUnusedCommand();
      break;
    case 2:
      await bulkExportCommand();
      break;
    case 3:
      await bulkImportCommand();
      break;
    case 4:
      await bulkClearCacheCommand();
      break;
    default:
      printError('Invalid selection');
  }
}
