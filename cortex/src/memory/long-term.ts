/**
 * Long-Term Memory - embedded fact store with near-duplicate suppression
 *
 * Every insert goes through `store`, which embeds the content and then,
 * inside one critical section, scans all entries for a match at or above
 * the dedup threshold and inserts only if none exists. Searches, deletes
 * and access bookkeeping run through the same critical section.
 */

import { CriticalSection } from './critical-section.js';
import { EmbeddingProvider, cosineSimilarity } from './embedding-service.js';
import { MemoryError } from './errors.js';
import { createLogger } from './logger.js';
import { MemoryStore } from './memory-store.js';
import { MemoryEntry, MemoryKind, ScoredMemoryEntry, StoreResult } from './types.js';

export const DEFAULT_DEDUP_THRESHOLD = 0.92;

const log = createLogger('Memory');

export interface LongTermMemoryOptions {
  dedupThreshold?: number;
  now?: () => Date;
}

/**
 * Narrows a search before the top-k cut
 */
export interface SearchFilter {
  kind?: MemoryKind;
  minImportance?: number;
}

interface SimilarMatch {
  id: string;
  similarity: number;
}

function clampImportance(importance: number): number {
  if (!Number.isFinite(importance)) return 0.5;
  return Math.min(1, Math.max(0, importance));
}

/**
 * Newest first, then by id, for entries with equal similarity
 */
function compareScored(a: ScoredMemoryEntry, b: ScoredMemoryEntry): number {
  if (b.similarity !== a.similarity) return b.similarity - a.similarity;
  if (a.entry.createdAt !== b.entry.createdAt) return a.entry.createdAt < b.entry.createdAt ? 1 : -1;
  return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0;
}

export class LongTermMemory {
  private readonly lock = new CriticalSection();
  private readonly dedupThreshold: number;
  private readonly now: () => Date;

  constructor(
    private readonly entries: MemoryStore,
    private readonly embedder: EmbeddingProvider,
    options: LongTermMemoryOptions = {}
  ) {
    this.dedupThreshold = options.dedupThreshold ?? DEFAULT_DEDUP_THRESHOLD;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Generate a unique ID
   */
  private generateId(): string {
    return `mem_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
  }

  /**
   * Embed text with the provider this memory stores with
   */
  embed(text: string): Promise<number[]> {
    return this.embedder.embed(text);
  }

  /**
   * Store a new entry unless a near-duplicate already exists.
   *
   * The existing entry is left untouched on a match.
   */
  async store(
    content: string,
    kind: MemoryKind,
    importance: number,
    sourceTurnId?: string
  ): Promise<StoreResult> {
    const text = content.trim();
    if (!text) {
      throw new MemoryError('Cannot store an empty memory');
    }

    // Embedding stays outside the critical section
    const embedding = await this.embedder.embed(text);

    return this.lock.run(async (): Promise<StoreResult> => {
      const match = this.scanForSimilar(embedding, this.dedupThreshold);
      if (match) {
        log.info(`Skipping duplicate memory (${(match.similarity * 100).toFixed(0)}% similar to ${match.id})`);
        return { status: 'deduplicated', existingId: match.id, similarity: match.similarity };
      }

      const timestamp = this.now().toISOString();
      const entry: MemoryEntry = {
        id: this.generateId(),
        content: text,
        embedding,
        kind,
        importance: clampImportance(importance),
        sourceTurnId,
        createdAt: timestamp,
        lastAccessed: timestamp,
        accessCount: 0,
      };

      await this.entries.insertEntry(entry);
      log.info(`Stored memory ${entry.id} (kind: ${kind}, importance: ${entry.importance.toFixed(2)}): "${text.substring(0, 50)}"`);
      return { status: 'stored', entry };
    });
  }

  /**
   * Id of the most similar entry at or above `threshold`, if any
   */
  async findSimilar(embedding: readonly number[], threshold: number): Promise<string | null> {
    return this.lock.run(() => this.scanForSimilar(embedding, threshold)?.id ?? null);
  }

  /**
   * Exhaustive scan; callers hold the lock
   */
  private scanForSimilar(embedding: readonly number[], threshold: number): SimilarMatch | null {
    let best: SimilarMatch | null = null;
    for (const entry of this.entries.listEntries()) {
      const similarity = cosineSimilarity(embedding, entry.embedding);
      if (similarity >= threshold && (!best || similarity > best.similarity)) {
        best = { id: entry.id, similarity };
      }
    }
    return best;
  }

  /**
   * Top-k entries by cosine similarity, optionally floor-filtered.
   * Kind and importance filters apply before the cut. Returned entries
   * have their access bookkeeping bumped.
   */
  async search(
    queryEmbedding: readonly number[],
    k: number,
    minSimilarity?: number,
    filter: SearchFilter = {}
  ): Promise<ScoredMemoryEntry[]> {
    if (k <= 0) return [];
    const { kind, minImportance } = filter;

    return this.lock.run(async () => {
      const scored: ScoredMemoryEntry[] = [];
      for (const entry of this.entries.listEntries()) {
        if (kind !== undefined && entry.kind !== kind) continue;
        if (minImportance !== undefined && entry.importance < minImportance) continue;

        const similarity = cosineSimilarity(queryEmbedding, entry.embedding);
        if (minSimilarity === undefined || similarity >= minSimilarity) {
          scored.push({ entry, similarity });
        }
      }

      scored.sort(compareScored);
      const top = scored.slice(0, k);
      if (top.length === 0) return top;

      const accessedAt = this.now().toISOString();
      await this.entries.touchEntries(top.map(result => result.entry.id), accessedAt);

      return top.map(({ entry, similarity }) => ({
        entry: { ...entry, accessCount: entry.accessCount + 1, lastAccessed: accessedAt },
        similarity,
      }));
    });
  }

  /**
   * Embed a text query and search
   */
  async searchText(
    query: string,
    k: number,
    minSimilarity?: number,
    filter: SearchFilter = {}
  ): Promise<ScoredMemoryEntry[]> {
    const embedding = await this.embedder.embed(query);
    return this.search(embedding, k, minSimilarity, filter);
  }

  /**
   * Hard-delete an entry
   */
  async delete(id: string): Promise<boolean> {
    const deleted = await this.lock.run(() => this.entries.deleteEntry(id));
    if (deleted) {
      log.info(`Deleted memory entry: ${id}`);
    }
    return deleted;
  }

  /**
   * Entries of one kind, most important first
   */
  async searchByKind(kind: MemoryKind, limit: number): Promise<MemoryEntry[]> {
    if (limit <= 0) return [];
    const entries = await this.lock.run(() => this.entries.entriesByKind(kind, limit));
    log.debug(`Found ${entries.length} memories of kind ${kind}`);
    return entries;
  }

  async get(id: string): Promise<MemoryEntry | null> {
    return this.lock.run(() => this.entries.getEntry(id));
  }

  async count(): Promise<number> {
    return this.lock.run(() => this.entries.countEntries());
  }
}
