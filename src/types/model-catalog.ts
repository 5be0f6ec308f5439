export type ModelCategory = 'chat' | 'coding' | 'creative' | 'vision' | 'embedding';

export const MODEL_CATEGORIES: readonly ModelCategory[] = [
  'chat',
  'coding',
  'creative',
  'vision',
  'embedding',
];

export interface CatalogEntry {
  size: string;         // Parameter count label, e.g. "8B"
  ramReq: number;       // Minimum system RAM in GB
  vramReq: number;      // Minimum VRAM in GB (0 = runs on CPU)
  category: ModelCategory;
  description: string;
}

export interface CatalogModel extends CatalogEntry {
  name: string;         // ollama model tag, e.g. "llama3.1:70b"
}

export interface ModelCatalogFile {
  models: Record<string, CatalogEntry>;
}

export function isModelCategory(value: string): value is ModelCategory {
  return MODEL_CATEGORIES.some((category) => category === value);
}

/**
 * Catalog as read from JSON, before categories are validated
 */
export interface RawCatalogFile {
  models: Record<string, Omit<CatalogEntry, 'category'> & { category: string }>;
}
