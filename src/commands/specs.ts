import chalk from 'chalk';
import { systemDetector } from '../lib/system-detector';
import { modelCatalog } from '../lib/model-catalog';
import { ollamaClient, isListed } from '../lib/ollama-client';
import { configStore } from '../lib/config-store';
import { PerformanceRating } from '../types/system-info';
import { printHeader } from '../utils/console-utils';
import { capitalize } from '../utils/format-utils';

const RATING_STYLE: Record<PerformanceRating, { color: chalk.Chalk; icon: string }> = {
  Excellent: { color: chalk.green, icon: '🔥' },
  'Very Good': { color: chalk.cyan, icon: '⭐' },
  Good: { color: chalk.yellow, icon: '✅' },
  Limited: { color: chalk.red, icon: '❌' },
};

export async function specsCommand(): Promise<void> {
  printHeader('⚙️  System Analysis & Compatibility Check');

  const profile = await systemDetector.analyze();
  const border = chalk.cyan;

  console.log(border('┌─ Hardware Specifications ─────────────────────────────────┐'));
  console.log(`${border('│')} 🔧 CPU      : ${profile.cpu}`);
  console.log(`${border('│')} 📦 RAM      : ${profile.ramGb} GB`);
  console.log(`${border('│')} 🎮 GPU      : ${profile.gpu.description}`);
  console.log(`${border('│')} ⚙️  OS       : ${profile.os}`);
  console.log(border('└───────────────────────────────────────────────────────────┘'));

  const style = RATING_STYLE[profile.rating];
  console.log(`\n${chalk.bold('AI Performance Rating:')} ${style.color(`${profile.rating} ${style.icon}`)}\n`);
}

export async function recommendCommand(): Promise<void> {
  printHeader('🧠 Intelligent Model Recommendations');

  const ramGb = systemDetector.getRamGb();
  const vramGb = await configStore.getVramSize();
  const installed = new Set(await ollamaClient.listModels());
  await modelCatalog.writeSnapshot();

  console.log(chalk.cyan(`Based on your system specs (${ramGb}GB RAM, ${vramGb}GB VRAM):\n`));

  for (const [category, models] of modelCatalog.recommendByCategory(ramGb)) {
    console.log(chalk.magenta.bold(`${capitalize(category)} Models:`));

    if (models.length === 0) {
      console.log(chalk.gray('  No compatible models found for this category'));
    }

    for (const model of models) {
      const status = isListed(installed, model.name)
        ? chalk.green('[INSTALLED]')
        : chalk.gray('[AVAILABLE]');
      console.log(`  ${chalk.cyan('•')} ${chalk.bold(model.name)} ${chalk.gray(`(${model.size})`)} ${status}`);
      console.log(`    ${chalk.dim(model.description)}`);
    }
    console.log();
  }
}

export async function analysisCommand(): Promise<void> {
  await specsCommand();
  await recommendCommand();
}
