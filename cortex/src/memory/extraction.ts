/**
 * Structured Extraction - schema-validated LLM output for summaries and facts
 *
 * Both the summarization agent and the fact extractor go through the same
 * `StructuredExtractor` capability. The default implementation forces a
 * single Claude tool call whose input schema is the requested shape, then
 * validates the tool input with zod and fails closed on anything else.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { z } from 'zod';
import { DEFAULT_EXTRACTION_MODEL } from './config.js';
import { ExtractionError, errorMessage } from './errors.js';
import { MEMORY_KINDS, MemoryKind, Turn } from './types.js';

const MAX_TOKENS = 2048;
const MAX_CONVERSATION_CHARS = 10_000;

/**
 * What to extract and how to validate it
 */
export interface ExtractionSpec<T> {
  /** Tool name presented to the model */
  name: string;
  /** System instructions */
  instructions: string;
  /** JSON schema of the tool input, shown to the model */
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
  /** Validator for the model's output */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface StructuredExtractor {
  extract<T>(spec: ExtractionSpec<T>, turns: readonly Turn[]): Promise<T>;
}

// ============================================================
// SUMMARY EXTRACTION
// ============================================================

const stringList = z.array(z.string()).default([]);

const summaryResponseSchema = z.object({
  summary: z.string().trim().min(1),
  keyFacts: z.array(z.string()),
  decisions: stringList,
  toolsUsed: stringList,
  topics: stringList,
});

export type SummaryResponse = z.infer<typeof summaryResponseSchema>;

export const SUMMARY_EXTRACTION: ExtractionSpec<SummaryResponse> = {
  name: 'record_summary',
  instructions: `Extract a structured summary from the conversation below.

Return:
1. summary: A concise narrative of what was discussed (2-4 sentences)
2. keyFacts: Durable facts learned about the user or the topics discussed, each a single clear statement
3. decisions: Decisions or conclusions that were reached
4. toolsUsed: Tools that were used or mentioned
5. topics: Main topics covered

Be concise but thorough. Use empty arrays when nothing applies.`,
  inputSchema: {
    type: 'object',
    properties: {
      summary: { type: 'string', description: 'Concise narrative of the conversation' },
      keyFacts: { type: 'array', items: { type: 'string' }, description: 'Key facts worth remembering' },
      decisions: { type: 'array', items: { type: 'string' }, description: 'Decisions or conclusions reached' },
      toolsUsed: { type: 'array', items: { type: 'string' }, description: 'Tools used or mentioned' },
      topics: { type: 'array', items: { type: 'string' }, description: 'Main topics discussed' },
    },
    required: ['summary', 'keyFacts'],
  },
  schema: summaryResponseSchema,
};

// ============================================================
// FACT EXTRACTION
// ============================================================

/**
 * Map a model-supplied kind onto a MemoryKind; unknown values become 'fact'
 */
export function normalizeMemoryKind(value: string): MemoryKind {
  const lowered = value.trim().toLowerCase();
  return MEMORY_KINDS.find(kind => kind === lowered) ?? 'fact';
}

const factResponseSchema = z.object({
  facts: z.array(
    z.object({
      content: z.string().trim().min(1),
      kind: z.string().default('fact').transform(normalizeMemoryKind),
      importance: z.number().finite().transform(value => Math.min(1, Math.max(0, value))),
    })
  ),
});

export type FactExtractionResponse = z.infer<typeof factResponseSchema>;

export const FACT_EXTRACTION: ExtractionSpec<FactExtractionResponse> = {
  name: 'record_facts',
  instructions: `You are a memory extraction assistant. Identify durable facts, preferences, skills and context from this exchange that would be valuable in future conversations.

Kinds:
- fact: Factual information about the user or their world
- preference: Likes, dislikes, workflow or style choices
- skill: Things the user knows or can do
- context: Ongoing projects or situations

Rules:
- Each fact is a single, clear statement
- Assign importance (0-1) by how likely it is to matter again
- Do NOT extract transient information (like "user asked about X")
- If there's nothing worth remembering, return an empty list`,
  inputSchema: {
    type: 'object',
    properties: {
      facts: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            content: { type: 'string' },
            kind: { type: 'string', enum: [...MEMORY_KINDS] },
            importance: { type: 'number', minimum: 0, maximum: 1 },
          },
          required: ['content', 'kind', 'importance'],
        },
      },
    },
    required: ['facts'],
  },
  schema: factResponseSchema,
};

// ============================================================
// CLAUDE-BACKED EXTRACTOR
// ============================================================

/**
 * The slice of the Anthropic client the extractor needs
 */
export interface MessagesClient {
  messages: {
    create(params: MessageCreateParamsNonStreaming): Promise<{
      content: Array<{ type: string; name?: string; input?: unknown }>;
    }>;
  };
}

/**
 * Render turns as "Role: content" lines, truncated for the extraction prompt
 */
export function formatConversation(turns: readonly Turn[]): string {
  const labels: Record<Turn['role'], string> = { user: 'User', agent: 'Assistant', system: 'System' };
  const text = turns.map(turn => `${labels[turn.role]}: ${turn.content}`).join('\n\n');

  if (text.length > MAX_CONVERSATION_CHARS) {
    return text.substring(0, MAX_CONVERSATION_CHARS) + '\n\n[...truncated...]';
  }
  return text;
}

/**
 * Validate raw output against a spec, throwing ExtractionError on mismatch
 */
export function parseExtraction<T>(spec: ExtractionSpec<T>, raw: unknown): T {
  const result = spec.schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ExtractionError(`Malformed ${spec.name} output: ${issues.join('; ')}`);
  }
  return result.data;
}

export interface AnthropicExtractorOptions {
  apiKey?: string;
  model?: string;
  client?: MessagesClient;
}

export class AnthropicExtractor implements StructuredExtractor {
  private readonly client: MessagesClient;
  private readonly model: string;

  constructor(options: AnthropicExtractorOptions = {}) {
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_EXTRACTION_MODEL;
  }

  async extract<T>(spec: ExtractionSpec<T>, turns: readonly Turn[]): Promise<T> {
    if (turns.length === 0) {
      throw new ExtractionError(`Nothing to extract for ${spec.name}: no turns given`);
    }

    let response: Awaited<ReturnType<MessagesClient['messages']['create']>>;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: MAX_TOKENS,
        system: spec.instructions,
        tools: [
          {
            name: spec.name,
            description: `Record the extracted ${spec.name.replace(/^record_/, '')}`,
            input_schema: spec.inputSchema,
          },
        ],
        tool_choice: { type: 'tool', name: spec.name },
        messages: [
          {
            role: 'user',
            content: formatConversation(turns),
          },
        ],
      });
    } catch (error) {
      throw new ExtractionError(`Extraction request failed: ${errorMessage(error)}`, { cause: error });
    }

    const toolUse = response.content.find(block => block.type === 'tool_use' && block.name === spec.name);
    if (!toolUse) {
      throw new ExtractionError(`Model did not call ${spec.name}`);
    }

    return parseExtraction(spec, toolUse.input);
  }
}
