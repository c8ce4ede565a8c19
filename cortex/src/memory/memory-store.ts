/**
 * Memory Store - per-agent repository over the SQLite tables
 *
 * Maps rows to domain objects for turns, summaries and memory entries.
 * Every query is scoped to the agent this store was created for.
 */

import { MemoryDatabase } from './db.js';
import { MemoryError } from './errors.js';
import { bufferToEmbedding, embeddingToBuffer } from './embedding-service.js';
import { MemoryEntryRow, SummaryRow, TurnRow } from './schema.js';
import {
  MEMORY_KINDS,
  MemoryEntry,
  MemoryKind,
  Summary,
  TURN_ROLES,
  Turn,
  TurnRole,
} from './types.js';

function parseStringList(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json || '[]');
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
  } catch {
    return [];
  }
}

function toRole(value: string): TurnRole {
  const role = TURN_ROLES.find(candidate => candidate === value);
  if (!role) {
    throw new MemoryError(`Unknown turn role in store: ${value}`);
  }
  return role;
}

function toKind(value: string): MemoryKind {
  return MEMORY_KINDS.find(candidate => candidate === value) ?? 'fact';
}

function rowToTurn(row: TurnRow): Turn {
  return {
    id: row.id,
    role: toRole(row.role),
    content: row.content,
    createdAt: row.created_at,
    importance: row.importance,
    summaryId: row.summary_id ?? undefined,
  };
}

function rowToSummary(row: SummaryRow): Summary {
  return {
    id: row.id,
    spanStartTurnId: row.span_start_turn_id,
    spanEndTurnId: row.span_end_turn_id,
    text: row.text,
    keyFacts: parseStringList(row.key_facts),
    decisions: parseStringList(row.decisions),
    toolsMentioned: parseStringList(row.tools_mentioned),
    topics: parseStringList(row.topics),
    embedding: row.embedding ? bufferToEmbedding(row.embedding) : undefined,
    turnCount: row.turn_count,
    tokenSavings: row.token_savings,
    createdAt: row.created_at,
  };
}

function rowToEntry(row: MemoryEntryRow): MemoryEntry {
  return {
    id: row.id,
    content: row.content,
    embedding: bufferToEmbedding(row.embedding),
    kind: toKind(row.kind),
    importance: row.importance,
    sourceTurnId: row.source_turn_id ?? undefined,
    createdAt: row.created_at,
    lastAccessed: row.last_accessed,
    accessCount: row.access_count,
  };
}

export class MemoryStore {
  constructor(private readonly db: MemoryDatabase, readonly agentId: string) {}

  // ============================================================
  // TURNS
  // ============================================================

  async insertTurn(turn: Turn): Promise<void> {
    const stmt = this.db.prepare<[string, string, string, string, number, string]>(`
      INSERT INTO turns (id, agent_id, role, content, importance, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    await this.db.writeWithRetry(() =>
      stmt.run(turn.id, this.agentId, turn.role, turn.content, turn.importance, turn.createdAt)
    );
  }

  getTurn(id: string): Turn | null {
    const row = this.db
      .prepare<[string, string], TurnRow>('SELECT * FROM turns WHERE id = ? AND agent_id = ?')
      .get(id, this.agentId);
    return row ? rowToTurn(row) : null;
  }

  /**
   * Turns not yet folded into a summary, oldest first
   */
  listUnsummarizedTurns(): Turn[] {
    const rows = this.db
      .prepare<[string], TurnRow>(`
        SELECT * FROM turns
        WHERE agent_id = ? AND summary_id IS NULL
        ORDER BY created_at ASC, rowid ASC
      `)
      .all(this.agentId);
    return rows.map(rowToTurn);
  }

  countTurns(): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM turns WHERE agent_id = ?')
      .get(this.agentId);
    return row?.count ?? 0;
  }

  // ============================================================
  // SUMMARIES
  // ============================================================

  /**
   * Insert a summary and link the turns it replaces, atomically.
   *
   * A turn is folded at most once: if any listed turn is missing or
   * already linked, nothing is written.
   */
  async saveSummary(summary: Summary, turnIds: readonly string[]): Promise<void> {
    const insert = this.db.prepare<[
      string, string, string, string, string, string, string, string, string, Buffer | null, number, number, string,
    ]>(`
      INSERT INTO summaries
      (id, agent_id, span_start_turn_id, span_end_turn_id, text, key_facts, decisions,
       tools_mentioned, topics, embedding, turn_count, token_savings, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const link = this.db.prepare<[string, string, string]>(`
      UPDATE turns SET summary_id = ?
      WHERE id = ? AND agent_id = ? AND summary_id IS NULL
    `);

    await this.db.writeWithRetry(() =>
      this.db.transaction(() => {
        insert.run(
          summary.id,
          this.agentId,
          summary.spanStartTurnId,
          summary.spanEndTurnId,
          summary.text,
          JSON.stringify(summary.keyFacts),
          JSON.stringify(summary.decisions),
          JSON.stringify(summary.toolsMentioned),
          JSON.stringify(summary.topics),
          summary.embedding ? embeddingToBuffer(summary.embedding) : null,
          summary.turnCount,
          summary.tokenSavings,
          summary.createdAt
        );

        for (const turnId of turnIds) {
          const result = link.run(summary.id, turnId, this.agentId);
          if (result.changes !== 1) {
            throw new MemoryError(`Turn ${turnId} is unknown or already summarized`);
          }
        }
      })
    );
  }

  /**
   * Most recent summaries, newest first
   */
  getRecentSummaries(limit: number): Summary[] {
    if (limit <= 0) return [];
    const rows = this.db
      .prepare<[string, number], SummaryRow>(`
        SELECT * FROM summaries
        WHERE agent_id = ?
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
      `)
      .all(this.agentId, limit);
    return rows.map(rowToSummary);
  }

  /**
   * Summaries that carry an embedding, newest first
   */
  listEmbeddedSummaries(): Summary[] {
    const rows = this.db
      .prepare<[string], SummaryRow>(`
        SELECT * FROM summaries
        WHERE agent_id = ? AND embedding IS NOT NULL
        ORDER BY created_at DESC, rowid DESC
      `)
      .all(this.agentId);
    return rows.map(rowToSummary);
  }

  countSummaries(): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM summaries WHERE agent_id = ?')
      .get(this.agentId);
    return row?.count ?? 0;
  }

  // ============================================================
  // MEMORY ENTRIES
  // ============================================================

  async insertEntry(entry: MemoryEntry): Promise<void> {
    const stmt = this.db.prepare<[
      string, string, string, Buffer, string, number, string | null, string, string, number,
    ]>(`
      INSERT INTO memory_entries
      (id, agent_id, content, embedding, kind, importance, source_turn_id, created_at, last_accessed, access_count)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    await this.db.writeWithRetry(() =>
      stmt.run(
        entry.id,
        this.agentId,
        entry.content,
        embeddingToBuffer(entry.embedding),
        entry.kind,
        entry.importance,
        entry.sourceTurnId ?? null,
        entry.createdAt,
        entry.lastAccessed,
        entry.accessCount
      )
    );
  }

  getEntry(id: string): MemoryEntry | null {
    const row = this.db
      .prepare<[string, string], MemoryEntryRow>('SELECT * FROM memory_entries WHERE id = ? AND agent_id = ?')
      .get(id, this.agentId);
    return row ? rowToEntry(row) : null;
  }

  /**
   * Every entry of this agent, in insertion order
   */
  listEntries(): MemoryEntry[] {
    const rows = this.db
      .prepare<[string], MemoryEntryRow>('SELECT * FROM memory_entries WHERE agent_id = ? ORDER BY rowid ASC')
      .all(this.agentId);
    return rows.map(rowToEntry);
  }

  entriesByKind(kind: MemoryKind, limit: number): MemoryEntry[] {
    const rows = this.db
      .prepare<[string, string, number], MemoryEntryRow>(`
        SELECT * FROM memory_entries
        WHERE agent_id = ? AND kind = ?
        ORDER BY importance DESC, created_at DESC, rowid DESC
        LIMIT ?
      `)
      .all(this.agentId, kind, limit);
    return rows.map(rowToEntry);
  }

  async deleteEntry(id: string): Promise<boolean> {
    const stmt = this.db.prepare<[string, string]>('DELETE FROM memory_entries WHERE id = ? AND agent_id = ?');
    const result = await this.db.writeWithRetry(() => stmt.run(id, this.agentId));
    return result.changes > 0;
  }

  /**
   * Bump access bookkeeping for retrieved entries
   */
  async touchEntries(ids: readonly string[], accessedAt: string): Promise<void> {
    if (ids.length === 0) return;

    const stmt = this.db.prepare<[string, string, string]>(`
      UPDATE memory_entries
      SET access_count = access_count + 1, last_accessed = ?
      WHERE id = ? AND agent_id = ?
    `);
    await this.db.writeWithRetry(() =>
      this.db.transaction(() => {
        for (const id of ids) {
          stmt.run(accessedAt, id, this.agentId);
        }
      })
    );
  }

  countEntries(): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM memory_entries WHERE agent_id = ?')
      .get(this.agentId);
    return row?.count ?? 0;
  }
}
