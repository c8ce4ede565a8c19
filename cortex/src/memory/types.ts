/**
 * Type definitions for the tiered memory system
 *
 * - Turn: one conversation message (hot tier while resident)
 * - Summary: condensed replacement for an evicted span of turns (warm tier)
 * - MemoryEntry: a single embedded fact/preference/skill/context (cold tier)
 */

export type TurnRole = 'user' | 'agent' | 'system';

export const TURN_ROLES: readonly TurnRole[] = ['user', 'agent', 'system'];

export type MemoryKind = 'fact' | 'preference' | 'skill' | 'context';

export const MEMORY_KINDS: readonly MemoryKind[] = ['fact', 'preference', 'skill', 'context'];

export interface Turn {
  id: string;
  role: TurnRole;
  content: string;
  createdAt: string;           // ISO timestamp
  importance: number;          // 0-1, default 0.5
  summaryId?: string;          // Set once the turn is folded into a summary
}

export interface Summary {
  id: string;
  spanStartTurnId: string;
  spanEndTurnId: string;
  text: string;
  keyFacts: string[];
  decisions: string[];
  toolsMentioned: string[];
  topics: string[];
  embedding?: number[];        // Absent on legacy rows
  turnCount: number;
  tokenSavings: number;
  createdAt: string;
}

export interface MemoryEntry {
  id: string;
  content: string;
  embedding: number[];
  kind: MemoryKind;
  importance: number;
  sourceTurnId?: string;       // Provenance only
  createdAt: string;
  lastAccessed: string;
  accessCount: number;
}

export interface ScoredMemoryEntry {
  entry: MemoryEntry;
  similarity: number;
}

export interface ScoredSummary {
  summary: Summary;
  similarity: number;
}

/**
 * Outcome of a long-term store call. A near-duplicate is a normal
 * outcome, not an error.
 */
export type StoreResult =
  | { status: 'stored'; entry: MemoryEntry }
  | { status: 'deduplicated'; existingId: string; similarity: number };

export interface MemoryStats {
  agentId: string;
  residentTurns: number;
  workingMemoryTokens: number;
  workingMemoryUtilization: number;
  summaries: number;
  memoryEntries: number;
  pendingExtractions: number;
}
