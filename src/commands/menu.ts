import chalk from 'chalk';
import { MANAGER_VERSION } from '../types/manager-config';
import { quickStartCommand } from './quick-start';
import { interactiveInstaller } from './install';
import { switchCommand } from './switch';
import { analysisCommand } from './specs';
import { optimizeCommand } from './optimize';
import { searchCommand } from './search';
import { benchCommand } from './bench';
import { bulkCommand } from './bulk';
import { backupCommand } from './backup';
import { analyticsCommand } from './analytics';
import { uiCommand } from './ui';
import { monitorCommand } from './monitor';
import { helpCommand } from './help';
import { prompt, parseChoice, pressEnter } from '../utils/prompt-utils';
import { printError } from '../utils/console-utils';

interface MenuEntry {
  label: string;
  action: (() => Promise<void> | void) | null;    // null exits the menu
}

export const MENU_ENTRIES: MenuEntry[] = [
  { label: '🚀 Quick Start', action: quickStartCommand },
  { label: '📥 Smart Model Installer', action: () => interactiveInstaller() },
  { label: '🔄 Model Switcher', action: () => switchCommand(undefined) },
  { label: '⚙️  System Analysis', action: analysisCommand },
  { label: '🔧 System Optimization', action: () => optimizeCommand() },
  { label: '🔍 Search Models', action: () => searchCommand() },
  { label: '⚡ Performance Test', action: () => benchCommand() },
  { label: '📦 Bulk Operations', action: bulkCommand },
  { label: '💾 Backup & Restore', action: backupCommand },
  { label: '📊 Usage Analytics', action: analyticsCommand },
  { label: '🎨 UI Configuration', action: () => uiCommand() },
  { label: '📈 System Monitor', action: monitorCommand },
  { label: '❓ Help', action: helpCommand },
  { label: '👋 Exit', action: null },
];

function printMenu(): void {
  console.log(chalk.cyan.bold(`\n🦙 Ollama Manager v${MANAGER_VERSION}\n`));
  MENU_ENTRIES.forEach((entry, i) => {
    console.log(`${chalk.gray(`[${String(i + 1).padStart(2)}]`)} ${entry.label}`);
  });
}

/**
 * Interactive main menu; returns when the user picks Exit
 */
export async function menuCommand(): Promise<void> {
  for (;;) {
    printMenu();
    const answer = await prompt(`\nSelect option ${chalk.gray(`[1-${MENU_ENTRIES.length}]`)}:`);
    const index = parseChoice(answer, MENU_ENTRIES.length);

    if (index === null) {
      printError('Invalid selection');
      continue;
    }

    const { action } = MENU_ENTRIES[index];
    if (action === null) {
      console.log(chalk.cyan('Goodbye! 👋'));
      return;
    }

    try {
      await action();
    } catch (error) {
      printError((error as Error).message);
    }
    await pressEnter();
  }
}
