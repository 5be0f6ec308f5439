import chalk from 'chalk';
import { modelCatalog } from '../lib/model-catalog';
import { systemDetector } from '../lib/system-detector';
import { modelManagementService, InstallModelResult } from '../lib/model-management-service';
import { ModelCategory, isModelCategory } from '../types/model-catalog';
import { choose, prompt, parseMultiChoice } from '../utils/prompt-utils';
import { withInterrupt } from '../utils/process-utils';
import { printError, printHeader, printInfo, printSuccess, printWarning } from '../utils/console-utils';

const CATEGORY_CHOICES = ['All', 'Chat', 'Coding', 'Creative', 'Vision', 'Embedding'];

interface InstallOptions {
  category?: string;
}

/**
 * Pull models with a single-line progress display
 * Ctrl-C stops the current pull and skips the rest of the list
 */
export async function installModels(models: string[]): Promise<InstallModelResult[]> {
  return withInterrupt(async (signal) => {
    const results: InstallModelResult[] = [];

    for (const model of models) {
      if (signal.aborted) {
        printWarning('Installation interrupted');
        break;
      }

      printInfo(`Installing ${model}...`);
      const result = await modelManagementService.installModel(
        model,
        (line) => {
          process.stdout.write(`\r\x1b[K${chalk.cyan(line)}`);
        },
        signal
      );
      process.stdout.write('\n');

      if (result.success) {
        printSuccess(`Successfully installed ${model}`);
      } else {
        printError(result.error ?? `Failed to install ${model}`);
      }
      results.push(result);
    }

    return results;
  });
}

export async function installCommand(models: string[], options: InstallOptions = {}): Promise<void> {
  if (models.length > 0) {
    const results = await installModels(models);
    const failed = results.filter((r) => !r.success);
    if (failed.length > 0) {
      throw new Error(`Failed to install: ${failed.map((r) => r.model).join(', ')}`);
    }
    return;
  }

  await interactiveInstaller(options.category);
}

async function pickCategory(preset?: string): Promise<ModelCategory | undefined | null> {
  if (preset !== undefined) {
    const lower = preset.toLowerCase();
    if (lower === 'all') return undefined;
    if (!isModelCategory(lower)) {
      throw new Error(`Unknown category: ${preset}. Use one of: ${CATEGORY_CHOICES.join(', ').toLowerCase()}`);
    }
    return lower;
  }

  const index = await choose('Select category:', CATEGORY_CHOICES);
  if (index === null) return null;
  if (index === 0) return undefined;

  const lower = CATEGORY_CHOICES[index].toLowerCase();
  return isModelCategory(lower) ? lower : undefined;
}

export async function interactiveInstaller(presetCategory?: string): Promise<void> {
  printHeader('📥 Interactive Model Installer');

  await modelCatalog.writeSnapshot();

  const category = await pickCategory(presetCategory);
  if (category === null) {
    printError('Invalid selection');
    return;
  }

  const ramGb = systemDetector.getRamGb();
  const models = modelCatalog.compatible(ramGb, category);

  if (models.length === 0) {
    printWarning('No compatible models found');
    return;
  }

  console.log(chalk.cyan('\nAvailable models for installation:'));
  models.forEach((model, i) => {
    console.log(
      `${chalk.gray(`[${i + 1}]`)} ${chalk.bold(model.name)} ${chalk.gray(`(${model.size}, ${model.ramReq}GB RAM)`)}`
    );
    console.log(`    ${chalk.dim(model.description)}`);
  });

  const answer = await prompt("\nEnter model numbers to install (space-separated, or 'all'):");
  const selected = parseMultiChoice(answer, models.length).map((i) => models[i].name);

  if (selected.length === 0) {
    printWarning('No models selected');
    return;
  }

  await installModels(selected);
}
