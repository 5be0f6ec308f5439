import chalk from 'chalk';
import { MANAGER_VERSION } from '../types/manager-config';
import { getBackupsDir, getConfigDir } from '../utils/file-utils';

const SECTIONS: { title: string; lines: string[] }[] = [
  {
    title: 'Quick Start',
    lines: [
      'Run the quick start on a new machine. It checks dependencies, installs or',
      'updates Ollama, analyzes your hardware and installs a starter set of models.',
    ],
  },
  {
    title: 'Model Management',
    lines: [
      'install [models...]   Install models (interactive installer without arguments)',
      'switch [model]        Start a chat with an installed model',
      'search [term]         Search the model catalog (regular expressions allowed)',
      'bench [model]         Time one response from a model',
      'bulk                  Update, prune, export, import or clean models',
    ],
  },
  {
    title: 'System',
    lines: [
      'specs / recommend     Hardware analysis and model recommendations',
      'optimize              Swap, GPU, CPU governor and Ollama tuning',
      'monitor               Resource, GPU, process and performance monitors',
    ],
  },
  {
    title: 'Data',
    lines: [
      'backup                Create, restore, list or schedule backups',
      'analytics             Usage statistics from the usage log',
      'config                Show or change preferences',
      'ui [cli|tui]          Choose the model picker interface',
    ],
  },
];

export function helpCommand(): void {
  console.log(chalk.cyan.bold(`\nOllama Manager v${MANAGER_VERSION} - Guide\n`));

  for (const section of SECTIONS) {
    console.log(chalk.magenta.bold(section.title));
    for (const line of section.lines) {
      console.log(`  ${line}`);
    }
    console.log();
  }

  console.log(chalk.bold('Files'));
  console.log(`  Config:  ${getConfigDir()}`);
  console.log(`  Backups: ${getBackupsDir()}`);
  console.log();
  console.log(chalk.dim('Run without a command to open the interactive menu.'));
}
