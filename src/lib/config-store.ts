import * as fs from 'fs/promises';
import {
  ManagerConfig,
  ConfigKey,
  DEFAULT_MANAGER_CONFIG,
  isUiMode,
} from '../types/manager-config';
import {
  ensureDir,
  writeJsonAtomic,
  readJson,
  fileExists,
  getConfigDir,
  getConfigPath,
  getCatalogCachePath,
  getVramCachePath,
} from '../utils/file-utils';

// Keys editable from `config set`
const BOOLEAN_KEYS: readonly string[] = ['autoUpdate', 'gpuOptimization'];
const LIST_KEYS: readonly string[] = ['preferredModels'];
const STRING_KEYS: readonly string[] = ['lastUsedModel', 'uiMode'];

export class ConfigStore {
  /**
   * Paths are resolved per call so OLLAMA_MANAGER_HOME can change between runs (tests)
   */
  get configDir(): string {
    return getConfigDir();
  }

  get configPath(): string {
    return getConfigPath();
  }

  /**
   * Create the config directory and default config file
   * Returns true when the config file did not exist yet (first run)
   */
  async initialize(): Promise<boolean> {
    await ensureDir(this.configDir);

    if (await fileExists(this.configPath)) {
      return false;
    }

    await this.save(structuredClone(DEFAULT_MANAGER_CONFIG));
    return true;
  }

  /**
   * Load configuration, filling keys missing from older files with defaults
   */
  async load(): Promise<ManagerConfig> {
    await this.initialize();
    const stored = await readJson<Partial<ManagerConfig>>(this.configPath);

    const defaults = structuredClone(DEFAULT_MANAGER_CONFIG);
    return {
      ...defaults,
      ...stored,
      preferredModels: Array.isArray(stored.preferredModels) ? stored.preferredModels : [],
      uiMode: stored.uiMode && isUiMode(stored.uiMode) ? stored.uiMode : defaults.uiMode,
      modelCategories: {
        ...defaults.modelCategories,
        ...stored.modelCategories,
      },
    };
  }

  async save(config: ManagerConfig): Promise<void> {
    await ensureDir(this.configDir);
    await writeJsonAtomic(this.configPath, config);
  }

  async get<K extends ConfigKey>(key: K): Promise<ManagerConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends ConfigKey>(key: K, value: ManagerConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = value;
    await this.save(config);
  }

  /**
   * Set a key from its command-line string form
   */
  async setFromString(key: string, rawValue: string): Promise<void> {
    const config = await this.load();
    const value = rawValue.trim();

    if (BOOLEAN_KEYS.includes(key)) {
      if (value !== 'true' && value !== 'false') {
        throw new Error(`Invalid value for ${key}: ${value}. Must be true or false.`);
      }
      if (key === 'autoUpdate') config.autoUpdate = value === 'true';
      else config.gpuOptimization = value === 'true';
    } else if (LIST_KEYS.includes(key)) {
      config.preferredModels = value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
    } else if (STRING_KEYS.includes(key)) {
      if (key === 'uiMode') {
        if (!isUiMode(value)) {
          throw new Error(`Invalid value for uiMode: ${value}. Must be cli or tui.`);
        }
        config.uiMode = value;
      } else {
        config.lastUsedModel = value;
      }
    } else {
      throw new Error(
        `Unknown config key: ${key}. Valid keys: ${[...BOOLEAN_KEYS, ...LIST_KEYS, ...STRING_KEYS].join(', ')}`
      );
    }

    await this.save(config);
  }

  /**
   * Record a model as preferred (no duplicates)
   * Returns false if it was already listed
   */
  async addPreferredModel(model: string): Promise<boolean> {
    const config = await this.load();
    if (config.preferredModels.includes(model)) {
      return false;
    }
    config.preferredModels.push(model);
    await this.save(config);
    return true;
  }

  async saveVramSize(vramGb: number): Promise<void> {
    await ensureDir(this.configDir);
    await fs.writeFile(getVramCachePath(), `${vramGb}\n`, 'utf-8');
  }

  /**
   * VRAM in GB from the last GPU detection, 0 when never detected
   */
  async getVramSize(): Promise<number> {
    try {
      const content = await fs.readFile(getVramCachePath(), 'utf-8');
      const value = parseInt(content.trim(), 10);
      return isNaN(value) ? 0 : value;
    } catch {
      return 0;
    }
  }

  /**
   * Remove the catalog snapshot and VRAM cache
   */
  async clearCache(): Promise<void> {
    await fs.rm(getCatalogCachePath(), { force: true });
    await fs.rm(getVramCachePath(), { force: true });
  }
}

// Export singleton instance
export const configStore = new ConfigStore();
