/**
 * Skill Registry - Central registry for the memory management skills
 */

import { SkillDefinition } from "../types.js";
import {
  memorySkills,
  storeMemorySkill,
  queryMemorySkill,
  forgetMemorySkill,
} from "./memory/index.js";

// Registry of all available skills
const skillRegistry = new Map<string, SkillDefinition>();

for (const skill of memorySkills) {
  skillRegistry.set(skill.name, skill);
}

export function getSkill(name: string): SkillDefinition | undefined {
  return skillRegistry.get(name);
}

export function getAllSkills(): SkillDefinition[] {
  return Array.from(skillRegistry.values());
}

/**
 * Skills in the Anthropic tool format, for an agent loop that calls Claude directly
 */
export function getSkillsAsTools(): Array<{
  name: string;
  description: string;
  input_schema: SkillDefinition["parameters"];
}> {
  return getAllSkills().map((skill) => ({
    name: skill.name,
    description: skill.description,
    input_schema: skill.parameters,
  }));
}

export {
  storeMemorySkill,
  queryMemorySkill,
  forgetMemorySkill,
};
