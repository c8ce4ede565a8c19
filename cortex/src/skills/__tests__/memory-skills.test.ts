import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getMemoryManager, initMemoryManager, resetMemoryManager } from '../../memory/index.js';
import { ScriptedExtractor, StubEmbedder } from '../../memory/__tests__/helpers.js';
import { getAllSkills, getSkill, getSkillsAsTools } from '../index.js';
import { forgetMemorySkill, queryMemorySkill, storeMemorySkill } from '../memory/index.js';

const DARK_MODE = 'User prefers dark mode';
const TEA = 'User drinks green tea';
const COFFEE = 'User drinks coffee at work';
const OAT_MILK = 'User wants oat milk in drinks';

async function storeDarkMode(): Promise<string> {
  const result = await storeMemorySkill.execute({ content: DARK_MODE, kind: 'preference' });
  const id = result.metadata?.memoryId;
  if (typeof id !== 'string') throw new Error('expected a memory id');
  return id;
}

describe('memory skills', () => {
  beforeEach(() => {
    initMemoryManager({
      dbPath: ':memory:',
      logLevel: 'error',
      embedder: new StubEmbedder({
        [DARK_MODE]: [0, 1, 0, 0],
        'dark mode': [0, 1, 0, 0],
        drinks: [1, 0, 0, 0],
        [TEA]: [1, 0, 0, 0],
        [COFFEE]: [0.8, 0.6, 0, 0],
        [OAT_MILK]: [0.6, 0, 0.8, 0],
      }),
      extractor: new ScriptedExtractor(),
    });
  });

  afterEach(() => {
    resetMemoryManager();
  });

  it('registers the three memory skills', () => {
    expect(getAllSkills().map(skill => skill.name)).toEqual(['store_memory', 'query_memory', 'forget_memory']);
    expect(getSkill('query_memory')).toBe(queryMemorySkill);
    expect(getSkillsAsTools()[0]).toMatchObject({ name: 'store_memory', input_schema: { required: ['content'] } });
  });

  describe('store_memory', () => {
    it('stores a memory and reports its id', async () => {
      const result = await storeMemorySkill.execute({ content: `  ${DARK_MODE} `, kind: 'preference', importance: 0.7 });

      expect(result.success).toBe(true);
      const id = result.metadata?.memoryId;
      expect(id).toMatch(/^mem_/);
      expect(result.output).toBe(`Memory stored successfully.\nID: ${id}\nKind: preference\nContent: "${DARK_MODE}"`);
      expect(result.metadata?.deduplicated).toBe(false);
    });

    it('reports a near-duplicate instead of storing it', async () => {
      const id = await storeDarkMode();
      const result = await storeMemorySkill.execute({ content: DARK_MODE });

      expect(result).toEqual({
        success: true,
        output: `Similar memory already exists (ID: ${id}, 100% similar). Nothing new stored.`,
        metadata: { memoryId: id, deduplicated: true, similarity: 1 },
      });
    });

    it('validates parameters', async () => {
      await expect(storeMemorySkill.execute({ content: '   ' })).resolves.toEqual({
        success: false,
        error: 'Invalid parameters: content: content must not be empty',
      });

      const badKind = await storeMemorySkill.execute({ content: DARK_MODE, kind: 'hobby' });
      expect(badKind.success).toBe(false);
      expect(badKind.error?.startsWith('Invalid parameters: kind: ')).toBe(true);

      const badImportance = await storeMemorySkill.execute({ content: DARK_MODE, importance: 2 });
      expect(badImportance.success).toBe(false);
      expect(badImportance.error?.startsWith('Invalid parameters: importance: ')).toBe(true);
    });
  });

  describe('query_memory', () => {
    it('searches semantically', async () => {
      const id = await storeDarkMode();
      const result = await queryMemorySkill.execute({ query: 'dark mode' });

      expect(result.success).toBe(true);
      expect(result.output).toBe(`Found 1 relevant memories:\n\n1. [preference] (100% match) ${DARK_MODE} (id: ${id})`);
    });

    it('reports when nothing matches', async () => {
      await storeDarkMode();
      const result = await queryMemorySkill.execute({ query: 'favourite food' });

      expect(result).toEqual({
        success: true,
        output: 'No relevant memories found for: "favourite food"',
        metadata: { count: 0 },
      });
    });

    it('filters search results by kind', async () => {
      await storeDarkMode();
      const result = await queryMemorySkill.execute({ query: 'dark mode', kind: 'skill' });

      expect(result.output).toBe('No relevant memories found for: "dark mode"');
    });

    it('applies the kind before the result limit', async () => {
      await storeMemorySkill.execute({ content: TEA });
      await storeMemorySkill.execute({ content: COFFEE });
      const stored = await storeMemorySkill.execute({ content: OAT_MILK, kind: 'preference' });
      const id = stored.metadata?.memoryId;

      const result = await queryMemorySkill.execute({ query: 'drinks', kind: 'preference', limit: 1 });

      expect(result.output).toBe(`Found 1 relevant memories:\n\n1. [preference] (60% match) ${OAT_MILK} (id: ${id})`);
      const facts = await getMemoryManager().listMemories('fact');
      expect(facts.map(entry => entry.accessCount)).toEqual([0, 0]);
    });

    it('applies a minimum importance', async () => {
      await storeMemorySkill.execute({ content: TEA, importance: 0.3 });
      const stored = await storeMemorySkill.execute({ content: OAT_MILK, kind: 'preference', importance: 0.9 });
      const id = stored.metadata?.memoryId;

      const result = await queryMemorySkill.execute({ query: 'drinks', min_importance: 0.5 });

      expect(result.output).toBe(`Found 1 relevant memories:\n\n1. [preference] (60% match) ${OAT_MILK} (id: ${id})`);
    });

    it('lists by kind when no query is given', async () => {
      const id = await storeDarkMode();
      const result = await queryMemorySkill.execute({ kind: 'preference', limit: 50 });

      expect(result.output).toBe(`Found 1 preference memories:\n\n1. ${DARK_MODE} (id: ${id}, importance: 0.80)`);
      await expect(queryMemorySkill.execute({ kind: 'context' })).resolves.toEqual({
        success: true,
        output: 'No context memories stored',
        metadata: { count: 0 },
      });
    });

    it('needs a query or a kind', async () => {
      await expect(queryMemorySkill.execute({})).resolves.toEqual({
        success: false,
        error: 'Invalid parameters: Either query or kind must be provided',
      });
    });
  });

  describe('forget_memory', () => {
    it('deletes by id', async () => {
      const id = await storeDarkMode();

      await expect(forgetMemorySkill.execute({ id })).resolves.toEqual({
        success: true,
        output: `Deleted memory with ID: ${id}`,
        metadata: { deleted: 1, ids: [id] },
      });
      await expect(forgetMemorySkill.execute({ id })).resolves.toEqual({
        success: false,
        error: `No memory found with ID: ${id}`,
      });
    });

    it('requires an id', async () => {
      await expect(forgetMemorySkill.execute({})).resolves.toEqual({
        success: false,
        error: 'Invalid parameters: id: Required',
      });
    });
  });

  it('reports a missing memory manager', async () => {
    resetMemoryManager();

    await expect(storeMemorySkill.execute({ content: DARK_MODE })).resolves.toEqual({
      success: false,
      error: 'Failed to store memory: Memory manager not initialized. Call initMemoryManager() first.',
    });
  });
});
