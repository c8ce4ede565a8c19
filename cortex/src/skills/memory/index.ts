/**
 * Memory Skills - store, query and forget long-term memories
 */

import { SkillDefinition } from '../../types.js';
import { storeMemorySkill } from './store_memory.js';
import { queryMemorySkill } from './query_memory.js';
import { forgetMemorySkill } from './forget_memory.js';

export const memorySkills: SkillDefinition[] = [storeMemorySkill, queryMemorySkill, forgetMemorySkill];

export { storeMemorySkill, queryMemorySkill, forgetMemorySkill };
