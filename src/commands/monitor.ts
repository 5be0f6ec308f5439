import blessed from 'blessed';
import chalk from 'chalk';
import Table from 'cli-table3';
import { systemDetector } from '../lib/system-detector';
import { installer } from '../lib/installer';
import { createPerformanceMonitorUI } from '../tui/PerformanceMonitorApp';
import { choose, confirm } from '../utils/prompt-utils';
import { commandExists, runInteractive, tryExecCommand } from '../utils/process-utils';
import { truncate } from '../utils/format-utils';
import { printError, printHeader, printWarning } from '../utils/console-utils';

const MONITOR_ACTIONS = ['Resource usage', 'GPU monitoring', 'Ollama processes', 'Model performance'];

/**
 * Port of the ollama API, from OLLAMA_HOST ("host:port" or a URL), default 11434
 */
export function ollamaPort(host: string | undefined = process.env.OLLAMA_HOST): number {
  const match = host?.match(/:(\d+)\/?$/);
  return match ? parseInt(match[1], 10) : 11434;
}

export async function resourceMonitorCommand(): Promise<void> {
  let tool = 'htop';
  if (!(await commandExists('htop'))) {
    if (await confirm('htop is not installed. Install it now?', true)) {
      const osId = await systemDetector.detectOs();
      await installer.installPackages(osId, ['htop']);
    } else {
      tool = 'top';
    }
  }
  await runInteractive(tool, []);
}

export async function gpuMonitorCommand(): Promise<void> {
  if (!(await commandExists('nvidia-smi'))) {
    throw new Error('nvidia-smi not available');
  }
  await runInteractive('watch', ['-n', '1', 'nvidia-smi']);
}

export async function processMonitorCommand(): Promise<void> {
  const processes = await systemDetector.listOllamaProcesses();

  if (processes.length === 0) {
    printWarning('No ollama processes running');
  } else {
    const table = new Table({
      head: ['PID', 'CPU%', 'MEM%', 'COMMAND'],
      colWidths: [10, 8, 8, 60],
    });
    for (const proc of processes) {
      table.push([proc.pid, proc.cpu.toFixed(1), proc.mem.toFixed(1), truncate(proc.command, 56)]);
    }
    console.log(table.toString());
  }

  const port = ollamaPort();
  console.log(chalk.cyan.bold(`\nListening on port ${port}:`));
  const listeners =
    (await tryExecCommand(`lsof -i :${port}`)) ??
    (await tryExecCommand(`ss -ltnp 'sport = :${port}'`));
  console.log(listeners ?? chalk.gray('  Nothing listening'));
}

export async function performanceMonitorCommand(): Promise<void> {
  const screen = blessed.screen({
    smartCSR: true,
    title: 'Ollama Performance Monitor',
    fullUnicode: true,
  });
  await createPerformanceMonitorUI(screen);
}

export async function monitorCommand(): Promise<void> {
  printHeader('📈 System Monitor');

  const index = await choose('Select monitor:', MONITOR_ACTIONS);
  switch (index) {
    case 0:
      await resourceMonitorCommand();
      break;
    case 1:
      await gpuMonitorCommand();
      break;
    case 2:
      await processMonitorCommand();
      break;
    case 3:
      await performanceMonitorCommand();
      break;
    default:
      printError('Invalid selection');
  }
}
