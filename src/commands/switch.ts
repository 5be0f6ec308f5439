import chalk from 'chalk';
import blessed from 'blessed';
import { ollamaClient } from '../lib/ollama-client';
import { configStore } from '../lib/config-store';
import { modelManagementService } from '../lib/model-management-service';
import { pickModelUI } from '../tui/ModelPickerApp';
import { choose } from '../utils/prompt-utils';
import { truncate } from '../utils/format-utils';
import { printError, printHeader, printInfo, printWarning } from '../utils/console-utils';

interface SwitchOptions {
  tui?: boolean;
}

async function pickWithPrompt(models: string[], lastUsed: string): Promise<string | null> {
  const labels: string[] = [];
  for (const model of models) {
    const summary = await ollamaClient.showSummary(model);
    const marker = model === lastUsed ? ` ${chalk.green('[LAST USED]')}` : '';
    labels.push(`${chalk.bold(model)}${marker}${summary ? chalk.gray(` - ${truncate(summary, 60)}`) : ''}`);
  }

  const index = await choose('Select model:', labels);
  return index === null ? null : models[index];
}

async function pickWithTui(models: string[], lastUsed: string): Promise<string | null> {
  const screen = blessed.screen({
    smartCSR: true,
    title: 'Ollama Model Switcher',
    fullUnicode: true,
  });
  return pickModelUI(screen, models, lastUsed);
}

export async function switchCommand(model: string | undefined, options: SwitchOptions = {}): Promise<void> {
  printHeader('🔄 Model Switcher');

  const models = await ollamaClient.listModels();
  if (models.length === 0) {
    printWarning("No models installed. Use 'install' to add models.");
    return;
  }

  const config = await configStore.load();
  const useTui = options.tui ?? config.uiMode === 'tui';

  let selected: string | null;
  if (model) {
    if (!(await ollamaClient.isModelInstalled(model))) {
      throw new Error(`Model not installed: ${model}`);
    }
    selected = model;
  } else if (useTui) {
    selected = await pickWithTui(models, config.lastUsedModel);
  } else {
    selected = await pickWithPrompt(models, config.lastUsedModel);
  }

  if (!selected) {
    printError('Invalid selection');
    return;
  }

  printInfo(`Starting ${selected}...`);
  console.log(chalk.gray("Type '/bye' to exit\n"));
  await modelManagementService.switchModel(selected, useTui && !model ? 'tui' : 'cli');
}
