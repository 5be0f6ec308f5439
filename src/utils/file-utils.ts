import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
}

/**
 * Write a file atomically (write to temp, then rename)
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, filePath);
}

/**
 * Write JSON to a file atomically
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const content = JSON.stringify(data, null, 2);
  await writeFileAtomic(filePath, content);
}

/**
 * Read and parse JSON file
 */
export async function readJson<T>(filePath: string): Promise<T> {
  const content = await fs.readFile(filePath, 'utf-8');
  return JSON.parse(content) as T;
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the manager config directory (~/.config/ollama-manager)
 * OLLAMA_MANAGER_HOME overrides it
 */
export function getConfigDir(): string {
  return process.env.OLLAMA_MANAGER_HOME || path.join(os.homedir(), '.config', 'ollama-manager');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Catalog snapshot, rewritten on every catalog load
 */
export function getCatalogCachePath(): string {
  return path.join(getConfigDir(), 'models.json');
}

export function getUsageLogPath(): string {
  return path.join(getConfigDir(), 'usage.log');
}

export function getVramCachePath(): string {
  return path.join(getConfigDir(), 'vram_size');
}

/**
 * Get the ollama data directory (~/.ollama)
 */
export function getOllamaDataDir(): string {
  return path.join(os.homedir(), '.ollama');
}

/**
 * Get the backups directory (~/.ollama-backups)
 */
export function getBackupsDir(): string {
  return path.join(os.homedir(), '.ollama-backups');
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Recursively collect files under a directory whose names end with a suffix
 * Unreadable directories are skipped
 */
export async function findFilesBySuffix(dirPath: string, suffix: string): Promise<string[]> {
  let entries: import('fs').Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }

  const found: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await findFilesBySuffix(entryPath, suffix)));
    } else if (entry.isFile() && entry.name.endsWith(suffix)) {
      found.push(entryPath);
    }
  }
  return found;
}

/**
 * Copy a directory tree, skipping top-level entries listed in `exclude`
 */
export async function copyDir(src: string, dest: string, exclude: string[] = []): Promise<void> {
  await ensureDir(dest);
  const entries = await fs.readdir(src, { withFileTypes: true });

  for (const entry of entries) {
    if (exclude.includes(entry.name)) continue;
    await fs.cp(path.join(src, entry.name), path.join(dest, entry.name), { recursive: true });
  }
}
