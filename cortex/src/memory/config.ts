/**
 * Memory configuration
 *
 * Every policy constant of the tiered memory is configurable here.
 * Values come from code (resolveMemoryConfig) or from the environment
 * (loadMemoryConfigFromEnv); both paths are validated with zod.
 */

import * as path from 'path';
import { z } from 'zod';
import type { LogLevel } from './logger.js';

export const DEFAULT_DB_DIR = '.cortex';
export const DEFAULT_EXTRACTION_MODEL = 'claude-3-haiku-20240307';

export interface MemoryConfig {
  agentId: string;
  /** Directory holding the database file. Ignored when dbPath is set. */
  dbDir: string;
  /** Explicit database path; ':memory:' keeps everything in process. */
  dbPath?: string;
  apiKey?: string;
  extractionModel: string;
  logLevel: LogLevel;

  // Working memory
  tokenBudget: number;
  fillRatio: number;
  evictionBatchRatio: number;
  minRetainedTurns: number;

  // Long-term memory
  dedupThreshold: number;

  // Summarization
  keyFactImportance: number;
  summaryMaxAttempts: number;
  summaryTimeoutMs: number;
  summaryRetryDelayMs: number;

  // Fact extraction
  minExchangeChars: number;

  // Context assembly
  recentSummaryCount: number;
  relevantSummaryMinSimilarity: number;
  longTermLimit: number;
  longTermMinSimilarity: number;
  contextTokenBudget: number;
  modelContextTokens: number;
}

export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
  agentId: 'default',
  dbDir: DEFAULT_DB_DIR,
  extractionModel: DEFAULT_EXTRACTION_MODEL,
  logLevel: 'info',
  tokenBudget: 8000,
  fillRatio: 0.7,
  evictionBatchRatio: 0.3,
  minRetainedTurns: 2,
  dedupThreshold: 0.92,
  keyFactImportance: 0.6,
  summaryMaxAttempts: 3,
  summaryTimeoutMs: 30_000,
  summaryRetryDelayMs: 500,
  minExchangeChars: 50,
  recentSummaryCount: 3,
  relevantSummaryMinSimilarity: 0.6,
  longTermLimit: 5,
  longTermMinSimilarity: 0.4,
  contextTokenBudget: 1500,
  modelContextTokens: 200_000,
};

const ratio = z.number().gt(0).lte(1);
const similarity = z.number().gte(-1).lte(1);
const unit = z.number().gte(0).lte(1);
const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const memoryConfigSchema = z.object({
  agentId: z.string().min(1),
  dbDir: z.string().min(1),
  dbPath: z.string().min(1).optional(),
  apiKey: z.string().optional(),
  extractionModel: z.string().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  tokenBudget: positiveInt,
  fillRatio: ratio,
  evictionBatchRatio: ratio,
  minRetainedTurns: nonNegativeInt,
  dedupThreshold: similarity,
  keyFactImportance: unit,
  summaryMaxAttempts: positiveInt,
  summaryTimeoutMs: positiveInt,
  summaryRetryDelayMs: nonNegativeInt,
  minExchangeChars: nonNegativeInt,
  recentSummaryCount: nonNegativeInt,
  relevantSummaryMinSimilarity: similarity,
  longTermLimit: nonNegativeInt,
  longTermMinSimilarity: similarity,
  contextTokenBudget: positiveInt,
  modelContextTokens: positiveInt,
});

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveMemoryConfig(overrides: Partial<MemoryConfig> = {}): MemoryConfig {
  const merged: MemoryConfig = { ...DEFAULT_MEMORY_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  const result = memoryConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid memory configuration: ${issues}`);
  }
  return result.data;
}

const optionalNumber = z.coerce.number().optional();

const envSchema = z.object({
  MEMORY_AGENT_ID: z.string().min(1).optional(),
  MEMORY_DB_DIR: z.string().min(1).optional(),
  MEMORY_DB_PATH: z.string().min(1).optional(),
  MEMORY_EXTRACTION_MODEL: z.string().min(1).optional(),
  MEMORY_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  MEMORY_TOKEN_BUDGET: optionalNumber,
  MEMORY_FILL_RATIO: optionalNumber,
  MEMORY_EVICTION_BATCH_RATIO: optionalNumber,
  MEMORY_DEDUP_THRESHOLD: optionalNumber,
  MEMORY_CONTEXT_TOKEN_BUDGET: optionalNumber,
  ANTHROPIC_API_KEY: z.string().optional(),
});

/**
 * Build a config from MEMORY_* environment variables
 */
export function loadMemoryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MemoryConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid memory environment: ${issues}`);
  }

  const vars = parsed.data;
  return resolveMemoryConfig({
    agentId: vars.MEMORY_AGENT_ID,
    dbDir: vars.MEMORY_DB_DIR,
    dbPath: vars.MEMORY_DB_PATH,
    extractionModel: vars.MEMORY_EXTRACTION_MODEL,
    logLevel: vars.MEMORY_LOG_LEVEL,
    tokenBudget: vars.MEMORY_TOKEN_BUDGET,
    fillRatio: vars.MEMORY_FILL_RATIO,
    evictionBatchRatio: vars.MEMORY_EVICTION_BATCH_RATIO,
    dedupThreshold: vars.MEMORY_DEDUP_THRESHOLD,
    contextTokenBudget: vars.MEMORY_CONTEXT_TOKEN_BUDGET,
    apiKey: vars.ANTHROPIC_API_KEY,
  });
}

/**
 * Database file location for a config
 */
export function resolveDbPath(config: Pick<MemoryConfig, 'dbDir' | 'dbPath'>): string {
  if (config.dbPath) return config.dbPath;
  const dir = path.isAbsolute(config.dbDir) ? config.dbDir : path.join(process.cwd(), config.dbDir);
  return path.join(dir, 'memory.db');
}
