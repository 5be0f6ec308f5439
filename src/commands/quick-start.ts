import chalk from 'chalk';
import { configStore } from '../lib/config-store';
import { modelCatalog } from '../lib/model-catalog';
import { systemDetector } from '../lib/system-detector';
import { usageLogger } from '../lib/usage-logger';
import { depsCommand } from './deps';
import { ollamaCommand } from './ollama';
import { specsCommand } from './specs';
import { installModels } from './install';
import { uiCommand } from './ui';
import { optimizeCommand } from './optimize';
import { confirm } from '../utils/prompt-utils';
import { printHeader, printSuccess } from '../utils/console-utils';

export async function quickStartCommand(): Promise<void> {
  printHeader('🚀 Quick Start');

  await configStore.initialize();
  await depsCommand();
  await ollamaCommand();
  await specsCommand();

  const starters = modelCatalog.quickStartSet(systemDetector.getRamGb());
  console.log(chalk.cyan(`Recommended starter models: ${starters.join(', ')}`));
  if (await confirm('Install recommended models?', true)) {
    await installModels(starters);
  }

  await uiCommand();

  if (await confirm('Run system optimizations?')) {
    await optimizeCommand();
  }

  await usageLogger.log('Quick start completed');
  printSuccess('Quick start completed');
}
