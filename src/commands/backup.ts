import chalk from 'chalk';
import Table from 'cli-table3';
import { backupManager } from '../lib/backup-manager';
import { BACKUP_FREQUENCIES, isBackupFrequency } from '../types/backup-types';
import { choose } from '../utils/prompt-utils';
import { expandHome } from '../utils/file-utils';
import { formatTimestamp } from '../utils/format-utils';
import { printError, printHeader, printInfo, printSuccess, printWarning } from '../utils/console-utils';

const BACKUP_ACTIONS = ['Create backup', 'Restore backup', 'List backups', 'Schedule automatic backups'];

/**
 * Command line that cron should run to reach this same CLI
 */
export function selfCommand(): string {
  return `${process.execPath} ${process.argv[1]}`;
}

export async function backupCreateCommand(): Promise<void> {
  printInfo('Creating backup...');
  const result = await backupManager.createBackup();
  printSuccess(`Backup created: ${result.archivePath}`);
  console.log(chalk.dim(`  ${result.manifest.models.length} model(s) recorded`));
}

export async function backupListCommand(): Promise<void> {
  const backups = await backupManager.listBackups();
  if (backups.length === 0) {
    printWarning('No backups found');
    return;
  }

  const table = new Table({
    head: ['BACKUP', 'SIZE', 'MODIFIED'],
    colWidths: [40, 12, 22],
  });
  for (const backup of backups) {
    table.push([backup.name, backup.sizeFormatted, formatTimestamp(backup.modified)]);
  }
  console.log(table.toString());
}

export async function backupRestoreCommand(file?: string): Promise<void> {
  let archivePath = file ? expandHome(file) : undefined;

  if (!archivePath) {
    const backups = await backupManager.listBackups();
    if (backups.length === 0) {
      printWarning('No backups found');
      return;
    }
    const index = await choose('Select backup to restore:', backups.map((b) => `${b.name} ${chalk.gray(`(${b.sizeFormatted})`)}`));
    if (index === null) {
      printError('Invalid selection');
      return;
    }
    archivePath = backups[index].path;
  }

  printInfo(`Restoring from ${archivePath}...`);
  const result = await backupManager.restoreBackup(
    archivePath,
    (model) => printInfo(`Installing ${model}...`),
    (line) => process.stdout.write(`\r\x1b[K${chalk.cyan(line)}`)
  );
  process.stdout.write('\n');

  for (const model of result.models.filter((m) => !m.success)) {
    printError(model.error ?? `Failed to install ${model.model}`);
  }
  if (result.configRestored) {
    printSuccess('Configuration restored');
  }
  printSuccess(`Backup restored: ${result.name}`);
}

export async function backupScheduleCommand(frequency?: string): Promise<void> {
  let value = frequency;
  if (!value) {
    const index = await choose('Backup frequency:', [...BACKUP_FREQUENCIES]);
    value = index === null ? undefined : BACKUP_FREQUENCIES[index];
  }

  if (!value || !isBackupFrequency(value)) {
    throw new Error(`Invalid frequency: ${value ?? ''}. Use one of: ${BACKUP_FREQUENCIES.join(', ')}`);
  }

  await backupManager.schedule(value, selfCommand());
  if (value === 'disable') {
    printSuccess('Automatic backups disabled');
  } else {
    printSuccess(`Automatic ${value} backups scheduled`);
  }
}

export async function backupCommand(): Promise<void> {
  printHeader('💾 Backup & Restore');

  const index = await choose('Select operation:', BACKUP_ACTIONS);
  switch (index) {
    case 0:
      await backupCreateCommand();
      break;
    case 1:
      await backupRestoreCommand();
      break;
    case 2:
      await backupListCommand();
      break;
    case 3:
      await backupScheduleCommand();
      break;
    default:
      printError('Invalid selection');
  }
}
