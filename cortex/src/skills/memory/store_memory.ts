/**
 * Store Memory Skill - Save facts to long-term memory
 *
 * Near-duplicates of an existing entry are not stored again; the
 * existing entry's ID is reported instead.
 */

import { z } from 'zod';
import { SkillDefinition } from '../../types.js';
import { getMemoryManager } from '../../memory/index.js';
import { errorMessage } from '../../memory/errors.js';
import { memoryKindSchema, parseParams } from './params.js';

const storeParamsSchema = z.object({
  content: z.string().trim().min(1, 'content must not be empty'),
  kind: memoryKindSchema.default('fact'),
  importance: z.number().min(0).max(1).default(0.8),
});

export const storeMemorySkill: SkillDefinition = {
  name: 'store_memory',
  description:
    'Store important information in long-term memory. Use this to remember user preferences, facts, skills, or ongoing context. Similar memories are detected and not stored twice.',
  parameters: {
    type: 'object',
    properties: {
      content: {
        type: 'string',
        description:
          'The information to remember. Should be a clear, concise statement (e.g., "User prefers dark mode", "Project uses TypeScript")',
      },
      kind: {
        type: 'string',
        description:
          'Kind of memory: fact (general info), preference (likes/dislikes), skill (what the user knows or can do), context (ongoing projects or situations). Default: fact',
        enum: memoryKindSchema.options,
      },
      importance: {
        type: 'number',
        description: 'How important this is (0-1). Higher = more important. Default: 0.8',
        minimum: 0,
        maximum: 1,
      },
    },
    required: ['content'],
  },
  execute: async (params: Record<string, unknown>) => {
    const parsed = parseParams(storeParamsSchema, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }
    const { content, kind, importance } = parsed.data;

    try {
      const result = await getMemoryManager().addMemory(content, kind, importance);

      if (result.status === 'deduplicated') {
        const percent = Math.round(result.similarity * 100);
        return {
          success: true,
          output: `Similar memory already exists (ID: ${result.existingId}, ${percent}% similar). Nothing new stored.`,
          metadata: { memoryId: result.existingId, deduplicated: true, similarity: result.similarity },
        };
      }

      return {
        success: true,
        output: `Memory stored successfully.\nID: ${result.entry.id}\nKind: ${kind}\nContent: "${result.entry.content}"`,
        metadata: { memoryId: result.entry.id, kind, deduplicated: false },
      };
    } catch (error) {
      return {
        success: false,
        error: `Failed to store memory: ${errorMessage(error)}`,
      };
    }
  },
};
