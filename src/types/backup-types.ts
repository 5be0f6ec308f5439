export interface BackupManifest {
  created: string;      // ISO-8601 UTC, second precision
  hostname: string;
  models: string[];
  version: string;
}

export interface BackupInfo {
  name: string;         // Archive name without .tar.gz
  path: string;
  size: number;
  sizeFormatted: string;
  modified: Date;
}

export type BackupFrequency = 'daily' | 'weekly' | 'monthly' | 'disable';

export const BACKUP_FREQUENCIES: readonly BackupFrequency[] = ['daily', 'weekly', 'monthly', 'disable'];

export function isBackupFrequency(value: string): value is BackupFrequency {
  return BACKUP_FREQUENCIES.some((frequency) => frequency === value);
}
