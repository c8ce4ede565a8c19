/**
 * Forget Memory Skill - Delete a long-term memory by ID
 */

import { z } from 'zod';
import { SkillDefinition } from '../../types.js';
import { getMemoryManager } from '../../memory/index.js';
import { errorMessage } from '../../memory/errors.js';
import { parseParams } from './params.js';

const forgetParamsSchema = z.object({
  id: z.string().trim().min(1, 'id must not be empty'),
});

export const forgetMemorySkill: SkillDefinition = {
  name: 'forget_memory',
  description:
    'Delete a memory by ID. Use this to remove outdated, incorrect, or unwanted information. Find the ID with query_memory first.',
  parameters: {
    type: 'object',
    properties: {
      id: {
        type: 'string',
        description: 'ID of the memory to delete (from a previous query_memory result)',
      },
    },
    required: ['id'],
  },
  execute: async (params: Record<string, unknown>) => {
    const parsed = parseParams(forgetParamsSchema, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }
    const { id } = parsed.data;

    try {
      const deleted = await getMemoryManager().deleteMemory(id);
      if (!deleted) {
        return { success: false, error: `No memory found with ID: ${id}` };
      }

      return {
        success: true,
        output: `Deleted memory with ID: ${id}`,
        metadata: { deleted: 1, ids: [id] },
      };
    } catch (error) {
      return {
        success: false,
        error: `Failed to delete memory: ${errorMessage(error)}`,
      };
    }
  },
};
