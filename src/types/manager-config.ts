export type UiMode = 'cli' | 'tui';

export const UI_MODES: readonly UiMode[] = ['cli', 'tui'];

export interface ManagerConfig {
  version: string;
  preferredModels: string[];    // Models installed through the manager
  autoUpdate: boolean;          // Update ollama without asking when a release is out
  lastUsedModel: string;        // '' until a model is switched to
  uiMode: UiMode;
  gpuOptimization: boolean;
  modelCategories: {
    coding: string[];
    chat: string[];
    creative: string[];
  };
}

export type ConfigKey = keyof ManagerConfig;

/**
 * Manager version, also written into backup manifests
 */
export const MANAGER_VERSION = '2.0.0';

/**
 * Default manager configuration
 */
export const DEFAULT_MANAGER_CONFIG: ManagerConfig = {
  version: MANAGER_VERSION,
  preferredModels: [],
  autoUpdate: true,
  lastUsedModel: '',
  uiMode: 'cli',
  gpuOptimization: true,
  modelCategories: {
    coding: [],
    chat: [],
    creative: [],
  },
};

export function isUiMode(value: string): value is UiMode {
  return UI_MODES.some((mode) => mode === value);
}

export function isConfigKey(value: string): value is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_MANAGER_CONFIG, value);
}
