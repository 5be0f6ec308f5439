import catalogData from '../data/model-catalog.json';
import {
  CatalogModel,
  ModelCatalogFile,
  ModelCategory,
  MODEL_CATEGORIES,
  isModelCategory,
  RawCatalogFile,
} from '../types/model-catalog';
import { ensureDir, getConfigDir, getCatalogCachePath, writeJsonAtomic } from '../utils/file-utils';

const RECOMMENDATIONS_PER_CATEGORY = 5;

/**
 * Static catalog of known ollama models with their resource requirements
 */
export class ModelCatalog {
  private models: CatalogModel[];

  constructor(data: RawCatalogFile = catalogData) {
    this.models = Object.entries(data.models).map(([name, entry]) => {
      if (!isModelCategory(entry.category)) {
        throw new Error(`Invalid category for catalog model ${name}: ${entry.category}`);
      }
      return { name, ...entry, category: entry.category };
    });
  }

  all(): CatalogModel[] {
    return [...this.models];
  }

  find(name: string): CatalogModel | undefined {
    return this.models.find((m) => m.name === name);
  }

  toFile(): ModelCatalogFile {
    const models: ModelCatalogFile['models'] = {};
    for (const { name, ...entry } of this.models) {
      models[name] = entry;
    }
    return { models };
  }

  /**
   * Write the catalog snapshot (models.json) into the config directory
   */
  async writeSnapshot(): Promise<void> {
    await ensureDir(getConfigDir());
    await writeJsonAtomic(getCatalogCachePath(), this.toFile());
  }

  /**
   * Models whose RAM requirement fits, in catalog order
   */
  compatible(ramGb: number, category?: ModelCategory): CatalogModel[] {
    return this.models.filter(
      (m) => m.ramReq <= ramGb && (category === undefined || m.category === category)
    );
  }

  /**
   * Up to five compatible models for every category (empty lists included)
   */
  recommendByCategory(ramGb: number): Map<ModelCategory, CatalogModel[]> {
    const result = new Map<ModelCategory, CatalogModel[]>();
    for (const category of MODEL_CATEGORIES) {
      result.set(category, this.compatible(ramGb, category).slice(0, RECOMMENDATIONS_PER_CATEGORY));
    }
    return result;
  }

  /**
   * Match name, category or description
   * The term is used as a case-insensitive regex, or literally if it is not valid regex syntax
   */
  search(term: string): CatalogModel[] {
    const trimmed = term.trim();
    if (!trimmed) return [];

    let pattern: RegExp;
    try {
      pattern = new RegExp(trimmed, 'i');
    } catch {
      pattern = new RegExp(trimmed.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'i');
    }

    return this.models.filter(
      (m) => pattern.test(m.name) || pattern.test(m.category) || pattern.test(m.description)
    );
  }

  /**
   * Starter set installed by quick start, by RAM tier
   */
  quickStartSet(ramGb: number): string[] {
    if (ramGb >= 32) return ['llama3.1', 'mistral', 'codellama', 'phi3'];
    if (ramGb >= 16) return ['llama3.1', 'phi3', 'codellama'];
    if (ramGb >= 8) return ['phi3', 'gemma2'];
    return ['tinydolphin', 'orca-mini'];
  }
}

export const modelCatalog = new ModelCatalog();
