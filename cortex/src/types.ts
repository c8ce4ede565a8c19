/**
 * Skill type definitions shared by the skill registry and the MCP server
 */

export interface SkillParameter {
  type: string;
  description: string;
  enum?: readonly string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

export interface SkillDefinition {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, SkillParameter>;
    required?: string[];
  };
  execute: (params: Record<string, unknown>) => Promise<SkillResult>;
}

export interface SkillResult {
  success: boolean;
  output?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}
