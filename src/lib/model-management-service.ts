import * as fs from 'fs/promises';
import * as path from 'path';
import { ollamaClient } from './ollama-client';
import { configStore } from './config-store';
import { usageLogger } from './usage-logger';
import { switchedModel } from './usage-analytics';
import {
  fileExists,
  findFilesBySuffix,
  getOllamaDataDir,
  writeFileAtomic,
} from '../utils/file-utils';
import { formatDateStamp } from '../utils/format-utils';

export const DEFAULT_BENCHMARK_PROMPT = 'Explain quantum computing in simple terms.';

/**
 * How many trailing usage-log lines count as "recent" when looking for unused models
 */
const RECENT_USAGE_LINES = 100;

export interface InstallModelResult {
  model: string;
  success: boolean;
  error?: string;
}

export interface BenchmarkResult {
  model: string;
  seconds: number;
  exitCode: number;
}

export type SwitchSource = 'cli' | 'tui';

/**
 * Model lifecycle operations shared by the menu, subcommands and quick start
 */
export class ModelManagementService {
  /**
   * Pull a model, verify it shows up in `ollama list`, and remember it as preferred
   */
  async installModel(
    model: string,
    onProgress?: (line: string) => void,
    signal?: AbortSignal
  ): Promise<InstallModelResult> {
    await usageLogger.log(`Installing model: ${model}`);

    try {
      await ollamaClient.pull(model, { onProgress, signal });
    } catch (error) {
      if (signal?.aborted) {
        return { model, success: false, error: `Installation of ${model} interrupted` };
      }
      return { model, success: false, error: (error as Error).message };
    }

    if (!(await ollamaClient.isModelInstalled(model))) {
      return { model, success: false, error: `Failed to install ${model}` };
    }

    await configStore.addPreferredModel(model);
    return { model, success: true };
  }

  /**
   * Install several models one after another; failures do not stop the batch,
   * an aborted signal does (models not yet started are left out of the results)
   */
  async installMany(
    models: string[],
    onStart?: (model: string) => void,
    onProgress?: (line: string) => void,
    signal?: AbortSignal
  ): Promise<InstallModelResult[]> {
    const results: InstallModelResult[] = [];
    for (const model of models) {
      if (signal?.aborted) break;
      onStart?.(model);
      results.push(await this.installModel(model, onProgress, signal));
    }
    return results;
  }

  /**
   * Record the switch, then open an interactive session with the model
   */
  async switchModel(model: string, source: SwitchSource = 'cli'): Promise<number> {
    await configStore.set('lastUsedModel', model);
    await usageLogger.log(
      source === 'tui' ? `Switched to model (tui): ${model}` : `Switched to model: ${model}`
    );
    return ollamaClient.run(model);
  }

  /**
   * Time a single prompt against a model, in whole seconds
   */
  async benchmark(model: string, promptText: string = DEFAULT_BENCHMARK_PROMPT): Promise<BenchmarkResult> {
    const start = Date.now();
    const exitCode = await ollamaClient.runPrompt(model, promptText);
    const seconds = Math.floor((Date.now() - start) / 1000);

    await usageLogger.log(`Performance test: ${model} - ${seconds}s`);
    return { model, seconds, exitCode };
  }

  /**
   * Installed models that were not switched to in the recent usage log
   * Returns null when there is no usage log at all
   */
  async findUnusedModels(): Promise<string[] | null> {
    if (!(await usageLogger.exists())) {
      return null;
    }

    const recent = await usageLogger.readLines(RECENT_USAGE_LINES);
    const used = new Set(
      recent.map(switchedModel).filter((m): m is string => m !== null)
    );

    const installed = await ollamaClient.listModels();
    return installed.filter((model) => !used.has(model));
  }

  /**
   * Re-pull every installed model
   */
  async updateAll(
    onEach?: (model: string, exitCode: number) => void,
    signal?: AbortSignal
  ): Promise<string[]> {
    const models = await ollamaClient.listModels();
    for (const model of models) {
      if (signal?.aborted) break;
      let exitCode: number;
      try {
        exitCode = await ollamaClient.pull(model, { signal });
      } catch (error) {
        if (signal?.aborted) break;
        throw error;
      }
      onEach?.(model, exitCode);
    }
    return models;
  }

  async removeModel(model: string): Promise<void> {
    await ollamaClient.remove(model);
    await usageLogger.log(`Removed model: ${model}`);
  }

  /**
   * Write installed model names to <dir>/ollama-models-YYYYMMDD.txt
   */
  async exportList(dir: string, date: Date = new Date()): Promise<string> {
    const models = await ollamaClient.listModels();
    const exportPath = path.join(dir, `ollama-models-${formatDateStamp(date)}.txt`);
    await writeFileAtomic(exportPath, models.length > 0 ? models.join('\n') + '\n' : '');
    return exportPath;
  }

  /**
   * Model names from a list file (one per line, blanks ignored)
   */
  async readModelList(filePath: string): Promise<string[]> {
    if (!(await fileExists(filePath))) {
      throw new Error(`File not found: ${filePath}`);
    }
    const content = await fs.readFile(filePath, 'utf-8');
    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async importList(
    filePath: string,
    onStart?: (model: string) => void,
    onProgress?: (line: string) => void,
    signal?: AbortSignal
  ): Promise<InstallModelResult[]> {
    const models = await this.readModelList(filePath);
    return this.installMany(models, onStart, onProgress, signal);
  }

  /**
   * Delete leftover *.tmp files under ~/.ollama and the manager's own cache
   * Returns the number of temp files removed
   */
  async clearCache(ollamaDir: string = getOllamaDataDir()): Promise<number> {
    const tmpFiles = await findFilesBySuffix(ollamaDir, '.tmp');
    let removed = 0;
    for (const file of tmpFiles) {
      try {
        await fs.unlink(file);
        removed++;
      } catch {
        // Removed concurrently or not ours to delete
      }
    }

    await configStore.clearCache();
    return removed;
  }
}

export const modelManagementService = new ModelManagementService();
