import * as fs from 'fs/promises';
import { ensureDir, getConfigDir, getUsageLogPath } from '../utils/file-utils';
import { formatTimestamp } from '../utils/format-utils';

/**
 * Append-only usage log: one "YYYY-MM-DD HH:MM:SS - message" line per event
 */
export class UsageLogger {
  async log(message: string): Promise<void> {
    const line = `${formatTimestamp()} - ${message}\n`;
    try {
      await ensureDir(getConfigDir());
      await fs.appendFile(getUsageLogPath(), line, 'utf-8');
    } catch (error) {
      console.error('[Usage Log] Failed to write to log file:', (error as Error).message);
    }
  }

  /**
   * Read log lines, newest last
   * @param limit - Only return the last N lines
   */
  async readLines(limit?: number): Promise<string[]> {
    let content: string;
    try {
      content = await fs.readFile(getUsageLogPath(), 'utf-8');
    } catch {
      return [];
    }

    const lines = content.split('\n').filter((line) => line.trim().length > 0);
    if (limit && limit > 0) {
      return lines.slice(-limit);
    }
    return lines;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(getUsageLogPath());
      return true;
    } catch {
      return false;
    }
  }
}

export const usageLogger = new UsageLogger();
