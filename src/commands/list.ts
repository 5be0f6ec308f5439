import chalk from 'chalk';
import Table from 'cli-table3';
import { ollamaClient } from '../lib/ollama-client';
import { configStore } from '../lib/config-store';

export async function listCommand(): Promise<void> {
  console.log(chalk.blue('📦 Installed models\n'));

  const models = await ollamaClient.listModels();

  if (models.length === 0) {
    console.log(chalk.yellow('No models installed.'));
    console.log(chalk.dim('\nInstall models with: ollama-manager install'));
    return;
  }

  const config = await configStore.load();
  const table = new Table({
    head: ['MODEL', 'LAST USED', 'PREFERRED'],
    colWidths: [40, 11, 11],
  });

  for (const model of models) {
    table.push([
      model,
      model === config.lastUsedModel ? chalk.green('✓') : '',
      config.preferredModels.some((p) => model.startsWith(p)) ? chalk.cyan('✓') : '',
    ]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\nTotal: ${models.length} models`));
  console.log(chalk.dim('\nStart a chat: ollama-manager switch <model>'));
}
