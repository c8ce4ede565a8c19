/**
 * Query Memory Skill - Search long-term memory
 *
 * Semantic search when a query is given; listing by kind (most
 * important first) when only a kind is given.
 */

import { z } from 'zod';
import { SkillDefinition, SkillResult } from '../../types.js';
import { getMemoryManager } from '../../memory/index.js';
import { errorMessage } from '../../memory/errors.js';
import type { MemoryKind } from '../../memory/types.js';
import { memoryKindSchema, parseParams } from './params.js';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 20;

const queryParamsSchema = z
  .object({
    query: z.string().trim().min(1).optional(),
    kind: memoryKindSchema.optional(),
    limit: z.number().optional(),
    min_similarity: z.number().min(-1).max(1).optional(),
    min_importance: z.number().min(0).max(1).optional(),
  })
  .refine(params => params.query !== undefined || params.kind !== undefined, {
    message: 'Either query or kind must be provided',
  });

async function listByKind(kind: MemoryKind, limit: number, minImportance = 0): Promise<SkillResult> {
  // Listed most important first, so the floor only trims the tail
  const entries = (await getMemoryManager().listMemories(kind, limit)).filter(
    entry => entry.importance >= minImportance
  );
  if (entries.length === 0) {
    return { success: true, output: `No ${kind} memories stored`, metadata: { count: 0 } };
  }

  const lines = entries.map(
    (entry, index) => `${index + 1}. ${entry.content} (id: ${entry.id}, importance: ${entry.importance.toFixed(2)})`
  );
  return {
    success: true,
    output: `Found ${entries.length} ${kind} memories:\n\n${lines.join('\n')}`,
    metadata: {
      count: entries.length,
      memories: entries.map(entry => ({ id: entry.id, content: entry.content, kind: entry.kind })),
    },
  };
}

export const queryMemorySkill: SkillDefinition = {
  name: 'query_memory',
  description:
    'Search long-term memory for relevant information. Use this when you need context from previous conversations or stored knowledge. Give a query for semantic search, or only a kind to list memories of that kind.',
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'What to search for, in natural language.',
      },
      kind: {
        type: 'string',
        description: 'Optional: restrict to one kind (fact, preference, skill, context)',
        enum: memoryKindSchema.options,
      },
      limit: {
        type: 'number',
        description: `Maximum number of results to return (default: ${DEFAULT_LIMIT}, max: ${MAX_LIMIT})`,
        minimum: 1,
        maximum: MAX_LIMIT,
      },
      min_similarity: {
        type: 'number',
        description: 'Optional: minimum similarity (0-1) for search results',
      },
      min_importance: {
        type: 'number',
        description: 'Optional: only return memories at least this important (0-1)',
        minimum: 0,
        maximum: 1,
      },
    },
  },
  execute: async (params: Record<string, unknown>) => {
    const parsed = parseParams(queryParamsSchema, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }
    const { query, kind, min_similarity: minSimilarity, min_importance: minImportance } = parsed.data;

    // Clamp limit
    const limit = Math.min(Math.max(1, Math.floor(parsed.data.limit ?? DEFAULT_LIMIT)), MAX_LIMIT);

    try {
      if (query === undefined) {
        return await listByKind(kind ?? 'fact', limit, minImportance);
      }

      const results = await getMemoryManager().searchMemories(query, limit, minSimilarity, { kind, minImportance });

      if (results.length === 0) {
        return {
          success: true,
          output: `No relevant memories found for: "${query}"`,
          metadata: { count: 0 },
        };
      }

      const lines = results.map(({ entry, similarity }, index) => {
        const percent = (similarity * 100).toFixed(0);
        return `${index + 1}. [${entry.kind}] (${percent}% match) ${entry.content} (id: ${entry.id})`;
      });

      return {
        success: true,
        output: `Found ${results.length} relevant memories:\n\n${lines.join('\n')}`,
        metadata: {
          count: results.length,
          memories: results.map(({ entry, similarity }) => ({
            id: entry.id,
            content: entry.content,
            kind: entry.kind,
            score: similarity,
          })),
        },
      };
    } catch (error) {
      return {
        success: false,
        error: `Failed to query memory: ${errorMessage(error)}`,
      };
    }
  },
};
