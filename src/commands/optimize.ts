import chalk from 'chalk';
import { optimizer, GPU_ENV, OLLAMA_ENV, RECOMMENDED_RAM_GB, RECOMMENDED_SWAP_GB } from '../lib/optimizer';
import { configStore } from '../lib/config-store';
import { confirm } from '../utils/prompt-utils';
import { printHeader, printInfo, printSuccess, printWarning } from '../utils/console-utils';

interface OptimizeOptions {
  yes?: boolean;
}

async function approve(question: string, options: OptimizeOptions): Promise<boolean> {
  return options.yes === true || confirm(question);
}

export async function optimizeCommand(options: OptimizeOptions = {}): Promise<void> {
  printHeader('🚀 System Optimization');

  const report = await optimizer.analyze();
  console.log(chalk.cyan('Analyzing system for optimization opportunities...\n'));

  if (report.ramLow) {
    printWarning(`Low RAM detected (${report.ramGb}GB). Recommended: ${RECOMMENDED_RAM_GB}GB+`);

    if (report.swapLow) {
      printInfo(`Swap is ${report.swapGb}GB. Consider increasing swap to ${RECOMMENDED_SWAP_GB}GB`);
      if (await approve(`Create ${RECOMMENDED_SWAP_GB}GB swap file?`, options)) {
        await optimizer.createSwapFile();
        printSuccess('Swap file created and enabled');
      }
    }
  }

  const gpuOptimization = await configStore.get('gpuOptimization');
  if (report.gpuTunable && gpuOptimization) {
    printInfo(`GPU detected with ${report.vramGb}GB VRAM`);
    if (await approve('Apply GPU optimizations?', options)) {
      optimizer.applyEnv(GPU_ENV);
      const profile = await optimizer.saveEnvToProfile('Ollama GPU Optimizations', GPU_ENV);
      printSuccess(`GPU optimizations saved to ${profile}`);
    }
  }

  if (report.governorTunable) {
    printInfo(`CPU governor is "${report.governor}"`);
    if (await approve('Set CPU governor to performance mode?', options)) {
      await optimizer.setPerformanceGovernor();
      printSuccess('CPU governor set to performance');
    }
  }

  if (await approve('Apply Ollama performance settings?', options)) {
    optimizer.applyEnv(OLLAMA_ENV);
    const profile = await optimizer.saveEnvToProfile('Ollama Performance Settings', OLLAMA_ENV);
    printSuccess(`Ollama settings saved to ${profile}`);
  }

  printSuccess('System optimization completed');
  console.log(chalk.dim('Restart your shell (or ollama serve) for the settings to take effect.'));
}
