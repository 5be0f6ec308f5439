import chalk from 'chalk';
import Table from 'cli-table3';
import { modelCatalog } from '../lib/model-catalog';
import { ollamaClient, isListed } from '../lib/ollama-client';
import { prompt } from '../utils/prompt-utils';
import { printHeader, printWarning } from '../utils/console-utils';

export async function searchCommand(term?: string): Promise<void> {
  printHeader('🔍 Model Search');
  await modelCatalog.writeSnapshot();

  const query = term ?? (await prompt('Enter search term (name, category, or description):'));
  if (!query) {
    printWarning('No search term given');
    return;
  }

  const results = modelCatalog.search(query);
  if (results.length === 0) {
    printWarning(`No models found matching "${query}"`);
    return;
  }

  const installed = new Set(await ollamaClient.listModels());
  const table = new Table({
    head: ['MODEL', 'SIZE', 'RAM', 'CATEGORY', 'STATUS', 'DESCRIPTION'],
    colWidths: [22, 8, 7, 11, 12, 44],
    wordWrap: true,
  });

  for (const model of results) {
    table.push([
      model.name,
      model.size,
      `${model.ramReq}GB`,
      model.category,
      isListed(installed, model.name) ? chalk.green('installed') : chalk.gray('available'),
      model.description,
    ]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\n${results.length} model(s) found. Install with: ollama-manager install <model>`));
}
