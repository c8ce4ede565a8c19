/**
 * Database Schema for the memory system
 *
 * Defines row types and DDL for the SQLite tables:
 * - turns: every conversation message, with a backlink once summarized
 * - summaries: condensed spans of evicted turns
 * - memory_entries: embedded long-term facts
 *
 * Every row is scoped by agent_id; one database may hold several agents
 * but they never see each other's rows.
 */

export interface TurnRow {
  id: string;
  agent_id: string;
  role: string;
  content: string;
  importance: number;
  created_at: string;
  summary_id: string | null;
}

export interface SummaryRow {
  id: string;
  agent_id: string;
  span_start_turn_id: string;
  span_end_turn_id: string;
  text: string;
  key_facts: string;           // JSON array
  decisions: string;           // JSON array
  tools_mentioned: string;     // JSON array
  topics: string;              // JSON array
  embedding: Buffer | null;    // float32 LE blob
  turn_count: number;
  token_savings: number;
  created_at: string;
}

export interface MemoryEntryRow {
  id: string;
  agent_id: string;
  content: string;
  embedding: Buffer;           // float32 LE blob
  kind: string;
  importance: number;
  source_turn_id: string | null;
  created_at: string;
  last_accessed: string;
  access_count: number;
}

/**
 * SQL table creation statements
 */
export const CREATE_TABLES_SQL = `
-- Turns: the full conversation, hot or folded
CREATE TABLE IF NOT EXISTS turns (
  id TEXT PRIMARY KEY,
  agent_id TEXT NOT NULL,
  role TEXT NOT NULL CHECK(role IN ('user', 'agent', 'system')),
  content TEXT NOT NULL,
  importance REAL NOT NULL DEFAULT 0.5,
  created_at TEXT NOT NULL,
  summary_id TEXT REFERENCES summaries(id)
);

CREATE INDEX IF NOT EXISTS idx_turns_agent_created ON turns(agent_id, created_at);
CREATE INDEX IF NOT EXISTS idx_turns_summary ON turns(summary_id);

-- Summaries: condensed replacements for evicted spans
CREATE TABLE IF NOT EXISTS summaries (
  id TEXT PRIMARY KEY,
  agent_id TEXT NOT NULL,
  span_start_turn_id TEXT NOT NULL,
  span_end_turn_id TEXT NOT NULL,
  text TEXT NOT NULL,
  key_facts TEXT NOT NULL DEFAULT '[]',
  decisions TEXT NOT NULL DEFAULT '[]',
  tools_mentioned TEXT NOT NULL DEFAULT '[]',
  topics TEXT NOT NULL DEFAULT '[]',
  embedding BLOB,
  turn_count INTEGER NOT NULL DEFAULT 0,
  token_savings INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_summaries_agent_created ON summaries(agent_id, created_at DESC);

-- Memory entries: long-term embedded facts
CREATE TABLE IF NOT EXISTS memory_entries (
  id TEXT PRIMARY KEY,
  agent_id TEXT NOT NULL,
  content TEXT NOT NULL,
  embedding BLOB NOT NULL,
  kind TEXT NOT NULL,
  importance REAL NOT NULL DEFAULT 0.5,
  source_turn_id TEXT,
  created_at TEXT NOT NULL,
  last_accessed TEXT NOT NULL,
  access_count INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_memory_entries_agent_kind ON memory_entries(agent_id, kind);
CREATE INDEX IF NOT EXISTS idx_memory_entries_importance ON memory_entries(importance DESC);
`;
