import chalk from 'chalk';
import { ollamaClient } from '../lib/ollama-client';
import { modelManagementService, DEFAULT_BENCHMARK_PROMPT } from '../lib/model-management-service';
import { prompt, parseMultiChoice } from '../utils/prompt-utils';
import { printError, printHeader, printInfo, printSuccess, printWarning } from '../utils/console-utils';

interface BenchOptions {
  prompt?: string;
}

async function pickModels(installed: string[]): Promise<string[]> {
  console.log(chalk.cyan('Installed models:'));
  installed.forEach((model, i) => {
    console.log(`${chalk.gray(`[${i + 1}]`)} ${model}`);
  });

  const answer = await prompt("\nEnter model numbers to test (space-separated, or 'all'):");
  return parseMultiChoice(answer, installed.length).map((i) => installed[i]);
}

/**
 * Time one response from each selected model, one after another
 */
export async function benchCommand(models: string[] = [], options: BenchOptions = {}): Promise<void> {
  printHeader('⚡ Performance Test');

  let selected = models;
  if (selected.length === 0) {
    const installed = await ollamaClient.listModels();
    if (installed.length === 0) {
      printWarning('No models installed');
      return;
    }
    selected = await pickModels(installed);
  }

  if (selected.length === 0) {
    printError('Invalid selection');
    return;
  }

  const promptText = options.prompt ?? DEFAULT_BENCHMARK_PROMPT;
  const failed: string[] = [];

  for (const model of selected) {
    printInfo(`Testing ${model} with prompt: "${promptText}"`);
    const result = await modelManagementService.benchmark(model, promptText);

    if (result.exitCode === 0) {
      printSuccess(`${model}: ${chalk.bold(`${result.seconds}s`)}`);
    } else {
      printError(`${model}: ollama run exited with code ${result.exitCode}`);
      failed.push(model);
    }
  }

  if (failed.length > 0) {
    throw new Error(`Performance test failed for: ${failed.join(', ')}`);
  }
}
