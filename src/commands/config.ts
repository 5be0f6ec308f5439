import chalk from 'chalk';
import { configStore } from '../lib/config-store';
import { isConfigKey } from '../types/manager-config';

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.length > 0 ? value.join(', ') : chalk.gray('(none)');
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  if (value === '') {
    return chalk.gray('(not set)');
  }
  return String(value);
}

export async function configShowCommand(): Promise<void> {
  const config = await configStore.load();

  console.log(chalk.blue('⚙️  Ollama Manager Configuration\n'));
  console.log(chalk.dim(`File: ${configStore.configPath}\n`));
  console.log(`  ${chalk.bold('preferredModels')}  ${formatValue(config.preferredModels)}`);
  console.log(`  ${chalk.bold('autoUpdate')}       ${formatValue(config.autoUpdate)}`);
  console.log(`  ${chalk.bold('lastUsedModel')}    ${formatValue(config.lastUsedModel)}`);
  console.log(`  ${chalk.bold('uiMode')}           ${formatValue(config.uiMode)}`);
  console.log(`  ${chalk.bold('gpuOptimization')}  ${formatValue(config.gpuOptimization)}`);
  console.log(`  ${chalk.bold('version')}          ${formatValue(config.version)}`);
  console.log();
  console.log(chalk.dim('Change a value: ollama-manager config set <key> <value>'));
}

export async function configGetCommand(key: string): Promise<void> {
  if (!isConfigKey(key)) {
    throw new Error(`Unknown config key: ${key}`);
  }
  const value = await configStore.get(key);
  console.log(typeof value === 'string' ? value : JSON.stringify(value));
}

export async function configSetCommand(key: string, value: string): Promise<void> {
  await configStore.setFromString(key, value);
  console.log(chalk.green(`✅ ${key} updated`));
  if (isConfigKey(key)) {
    console.log(chalk.dim(`   New value: ${formatValue(await configStore.get(key))}`));
  }
}
