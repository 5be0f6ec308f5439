import chalk from 'chalk';
import { configStore } from '../lib/config-store';
import { usageLogger } from '../lib/usage-logger';
import { UI_MODES, UiMode, isUiMode } from '../types/manager-config';
import { choose } from '../utils/prompt-utils';
import { printError, printHeader, printSuccess } from '../utils/console-utils';

const MODE_LABELS: Record<UiMode, string> = {
  cli: 'CLI mode (numbered prompts)',
  tui: 'TUI mode (interactive list with model preview)',
};

export async function setUiMode(mode: UiMode): Promise<void> {
  await configStore.set('uiMode', mode);
  await usageLogger.log(`UI mode changed to: ${mode}`);
  printSuccess(`UI mode set to: ${mode}`);
}

export async function uiCommand(mode?: string): Promise<void> {
  printHeader('🎨 UI Configuration');

  if (mode !== undefined) {
    if (!isUiMode(mode)) {
      throw new Error(`Invalid UI mode: ${mode}. Must be cli or tui.`);
    }
    await setUiMode(mode);
    return;
  }

  const current = await configStore.get('uiMode');
  console.log(`Current mode: ${chalk.bold(current)}\n`);

  const index = await choose('Select interface mode:', UI_MODES.map((m) => MODE_LABELS[m]));
  if (index === null) {
    printError('Invalid selection');
    return;
  }
  await setUiMode(UI_MODES[index]);
}
