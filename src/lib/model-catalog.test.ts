import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ModelCatalog } from './model-catalog';

describe('ModelCatalog', () => {
  const catalog = new ModelCatalog();
  const names = (models: { name: string }[]) => models.map((m) => m.name);

  it('should load the bundled catalog', () => {
    expect(catalog.all()).toHaveLength(26);
    expect(catalog.find('phi3')).toEqual({
      name: 'phi3',
      size: '3.8B',
      ramReq: 4,
      vramReq: 0,
      category: 'chat',
      description: 'Small but capable Microsoft model',
    });
  });

  it('should reject entries with an unknown category', () => {
    expect(
      () =>
        new ModelCatalog({
          models: {
            broken: { size: '1B', ramReq: 1, vramReq: 0, category: 'audio', description: 'x' },
          },
        })
    ).toThrow('Invalid category for catalog model broken: audio');
  });

  describe('compatible', () => {
    it('should filter by RAM in catalog order', () => {
      expect(names(catalog.compatible(4))).toEqual([
        'phi3',
        'nomic-embed-text',
        'all-minilm',
        'orca-mini',
        'tinydolphin',
        'stable-code',
      ]);
    });

    it('should filter by category', () => {
      expect(names(catalog.compatible(8, 'coding'))).toEqual([
        'codellama',
        'deepseek-coder',
        'stable-code',
        'magicoder',
      ]);
    });
  });

  describe('recommendByCategory', () => {
    it('should cap each category at five models', () => {
      const recommended = catalog.recommendByCategory(8);

      expect([...recommended.keys()]).toEqual(['chat', 'coding', 'creative', 'vision', 'embedding']);
      expect(names(recommended.get('chat') ?? [])).toEqual([
        'llama3.1',
        'mistral',
        'phi3',
        'qwen2',
        'neural-chat',
      ]);
      expect(names(recommended.get('vision') ?? [])).toEqual(['llava']);
    });

    it('should keep empty categories on small machines', () => {
      const recommended = catalog.recommendByCategory(1);

      expect(recommended.get('chat')).toEqual([]);
      expect(names(recommended.get('embedding') ?? [])).toEqual(['all-minilm']);
    });
  });

  describe('search', () => {
    it('should match category', () => {
      expect(names(catalog.search('vision'))).toEqual(['llava']);
    });

    it('should treat the term as a regular expression', () => {
      expect(names(catalog.search('^code'))).toEqual(['codellama', 'codellama:13b']);
    });

    it('should be case-insensitive', () => {
      expect(names(catalog.search('MULTILINGUAL'))).toEqual(['qwen2', 'yi']);
    });

    it('should fall back to a literal match for invalid patterns', () => {
      expect(catalog.search('c++(')).toEqual([]);
    });

    it('should match tagged names', () => {
      expect(names(catalog.search('llama3.1:'))).toEqual(['llama3.1:70b']);
    });

    it('should return nothing for a blank term', () => {
      expect(catalog.search('   ')).toEqual([]);
    });
  });

  describe('quickStartSet', () => {
    it.each([
      [64, 'llama3.1,mistral,codellama,phi3'],
      [32, 'llama3.1,mistral,codellama,phi3'],
      [16, 'llama3.1,phi3,codellama'],
      [8, 'phi3,gemma2'],
      [4, 'tinydolphin,orca-mini'],
    ])('should pick the starter set for %iGB RAM', (ram, expected) => {
      expect(catalog.quickStartSet(Number(ram)).join(',')).toBe(expected);
    });
  });

  describe('writeSnapshot', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'catalog-test-'));
      vi.stubEnv('OLLAMA_MANAGER_HOME', tempDir);
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should write models.json keyed by model name', async () => {
      await catalog.writeSnapshot();

      const written = JSON.parse(await fs.readFile(path.join(tempDir, 'models.json'), 'utf-8'));
      expect(Object.keys(written.models)).toHaveLength(26);
      expect(written.models.llava).toEqual({
        size: '7B',
        ramReq: 8,
        vramReq: 0,
        category: 'vision',
        description: 'Vision-language model',
      });
    });
  });
});
