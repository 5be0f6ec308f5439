import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ollamaClient } from './ollama-client';
import { usageLogger } from './usage-logger';
import { modelManagementService, InstallModelResult } from './model-management-service';
import { BackupFrequency, BackupInfo, BackupManifest } from '../types/backup-types';
import { MANAGER_VERSION } from '../types/manager-config';
import {
  copyDir,
  ensureDir,
  fileExists,
  getBackupsDir,
  getConfigDir,
  getOllamaDataDir,
  writeJsonAtomic,
} from '../utils/file-utils';
import { formatBytes, formatDateTimeStamp, formatIsoSeconds } from '../utils/format-utils';
import { commandExists, execFileAsync, runWithLines, tryExecCommand } from '../utils/process-utils';

const ARCHIVE_SUFFIX = '.tar.gz';

/**
 * The ollama blob store holds multi-GB model layers; models are re-pulled from models.txt instead
 */
const OLLAMA_EXCLUDES = ['models'];

const CRON_SCHEDULES: Record<Exclude<BackupFrequency, 'disable'>, string> = {
  daily: '0 2 * * *',     // Daily at 2 AM
  weekly: '0 2 * * 0',    // Sundays at 2 AM
  monthly: '0 2 1 * *',   // 1st of the month at 2 AM
};

export interface CreateBackupResult {
  name: string;
  archivePath: string;
  manifest: BackupManifest;
}

export interface RestoreBackupResult {
  name: string;
  models: InstallModelResult[];
  configRestored: boolean;
}

export class BackupManager {
  private backupsDir: string;

  constructor(backupsDir: string = getBackupsDir()) {
    this.backupsDir = backupsDir;
  }

  get directory(): string {
    return this.backupsDir;
  }

  backupName(date: Date = new Date()): string {
    return `ollama-backup-${formatDateTimeStamp(date)}`;
  }

  buildManifest(models: string[], date: Date = new Date()): BackupManifest {
    return {
      created: formatIsoSeconds(date),
      hostname: os.hostname(),
      models,
      version: MANAGER_VERSION,
    };
  }

  /**
   * Archive the model list, manager config and ollama settings into
   * <backups>/ollama-backup-YYYYMMDD-HHMMSS.tar.gz
   */
  async createBackup(date: Date = new Date()): Promise<CreateBackupResult> {
    const name = this.backupName(date);
    const stagePath = path.join(this.backupsDir, name);
    const archivePath = path.join(this.backupsDir, `${name}${ARCHIVE_SUFFIX}`);

    await ensureDir(stagePath);

    try {
      const models = await ollamaClient.listModels();
      await fs.writeFile(
        path.join(stagePath, 'models.txt'),
        models.length > 0 ? models.join('\n') + '\n' : '',
        'utf-8'
      );

      if (await fileExists(getConfigDir())) {
        await copyDir(getConfigDir(), path.join(stagePath, 'config'));
      }

      const ollamaDir = getOllamaDataDir();
      if (await fileExists(ollamaDir)) {
        await copyDir(ollamaDir, path.join(stagePath, 'ollama-config'), OLLAMA_EXCLUDES);
      }

      const manifest = this.buildManifest(models, date);
      await writeJsonAtomic(path.join(stagePath, 'manifest.json'), manifest);

      await execFileAsync('tar', ['-czf', archivePath, '-C', this.backupsDir, name]);

      await usageLogger.log(`Backup created: ${name}`);
      return { name, archivePath, manifest };
    } finally {
      await fs.rm(stagePath, { recursive: true, force: true });
    }
  }

  /**
   * Backup archives, oldest first
   */
  async listBackups(): Promise<BackupInfo[]> {
    if (!(await fileExists(this.backupsDir))) {
      throw new Error(`No backups directory found: ${this.backupsDir}`);
    }

    const files = (await fs.readdir(this.backupsDir))
      .filter((f) => f.endsWith(ARCHIVE_SUFFIX))
      .sort();

    const backups: BackupInfo[] = [];
    for (const file of files) {
      const filePath = path.join(this.backupsDir, file);
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) continue;

      backups.push({
        name: path.basename(file, ARCHIVE_SUFFIX),
        path: filePath,
        size: stats.size,
        sizeFormatted: formatBytes(stats.size),
        modified: stats.mtime,
      });
    }

    return backups;
  }

  /**
   * Extract an archive, re-pull its models and copy its config back
   */
  async restoreBackup(
    archivePath: string,
    onModel?: (model: string) => void,
    onProgress?: (line: string) => void
  ): Promise<RestoreBackupResult> {
    const name = path.basename(archivePath, ARCHIVE_SUFFIX);
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ollama-restore-'));

    try {
      await execFileAsync('tar', ['-xzf', archivePath, '-C', tempDir]);
      const extracted = path.join(tempDir, name);

      let models: InstallModelResult[] = [];
      const modelsFile = path.join(extracted, 'models.txt');
      if (await fileExists(modelsFile)) {
        models = await modelManagementService.importList(modelsFile, onModel, onProgress);
      }

      let configRestored = false;
      const configBackup = path.join(extracted, 'config');
      if (await fileExists(configBackup)) {
        await ensureDir(getConfigDir());
        await fs.cp(configBackup, getConfigDir(), { recursive: true, force: true });
        configRestored = true;
      }

      await usageLogger.log(`Backup restored: ${name}`);
      return { name, models, configRestored };
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  /**
   * Crontab line running the auto-backup, or null for "disable"
   */
  cronEntry(frequency: BackupFrequency, cliCommand: string): string | null {
    if (frequency === 'disable') return null;
    return `${CRON_SCHEDULES[frequency]} ${cliCommand} --auto-backup`;
  }

  /**
   * New crontab content: existing lines minus any previous auto-backup entry, plus the new one
   */
  updateCrontab(current: string, frequency: BackupFrequency, cliCommand: string): string {
    const marker = `${cliCommand} --auto-backup`;
    const lines = current
      .split('\n')
      .filter((line) => line.trim().length > 0 && !line.includes(marker));

    const entry = this.cronEntry(frequency, cliCommand);
    if (entry) lines.push(entry);

    return lines.length > 0 ? lines.join('\n') + '\n' : '';
  }

  async schedule(frequency: BackupFrequency, cliCommand: string): Promise<void> {
    if (!(await commandExists('crontab'))) {
      throw new Error('Crontab not available. Please install cron.');
    }

    // `crontab -l` exits non-zero when the user has no crontab yet
    const current = (await tryExecCommand('crontab -l 2>/dev/null')) ?? '';
    const updated = this.updateCrontab(current, frequency, cliCommand);

    const code = await runWithLines('crontab', ['-'], (line) => console.error(line), { input: updated });
    if (code !== 0) {
      throw new Error(`Failed to update crontab (exit code ${code})`);
    }
  }
}

export const backupManager = new BackupManager();
