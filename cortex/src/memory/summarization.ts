/**
 * Summarization Agent - folds evicted working-memory spans into summaries
 *
 * A span is only replaced once its summary is durable: extraction is
 * retried with a per-attempt timeout, and on exhaustion nothing is
 * written and the caller keeps the span resident. After the summary is
 * saved (with the span's turns linked to it in the same transaction),
 * each key fact is promoted into long-term memory through the normal
 * deduplicating store path.
 */

import { sleep } from './db.js';
import { EmbeddingProvider, cosineSimilarity } from './embedding-service.js';
import { MemoryError, SummarizationError, errorMessage } from './errors.js';
import { SUMMARY_EXTRACTION, StructuredExtractor, SummaryResponse } from './extraction.js';
import { createLogger } from './logger.js';
import { LongTermMemory } from './long-term.js';
import { MemoryStore } from './memory-store.js';
import { ScoredSummary, Summary, Turn } from './types.js';
import { TokenEstimator, estimateTurnTokens } from './working-memory.js';

const log = createLogger('Memory');

export interface SummarizationOptions {
  maxAttempts?: number;
  timeoutMs?: number;
  retryDelayMs?: number;
  keyFactImportance?: number;
  estimateTokens?: TokenEstimator;
  now?: () => Date;
}

/**
 * Reject with a timeout error if `promise` does not settle within `ms`
 */
function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new MemoryError(`${label} timed out after ${ms}ms`));
    }, ms);

    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export class SummarizationAgent {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly keyFactImportance: number;
  private readonly estimate: TokenEstimator;
  private readonly now: () => Date;

  constructor(
    private readonly store: MemoryStore,
    private readonly extractor: StructuredExtractor,
    private readonly embedder: EmbeddingProvider,
    private readonly longTerm: LongTermMemory,
    options: SummarizationOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.keyFactImportance = options.keyFactImportance ?? 0.6;
    this.estimate = options.estimateTokens ?? estimateTurnTokens;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Generate a unique ID
   */
  private generateId(): string {
    return `sum_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
  }

  /**
   * Summarize a span and persist the result.
   *
   * Throws SummarizationError when extraction keeps failing; in that case
   * nothing has been written.
   */
  async summarize(span: readonly Turn[]): Promise<Summary> {
    const first = span[0];
    const last = span[span.length - 1];
    if (!first || !last) {
      throw new MemoryError('Cannot summarize an empty span');
    }

    log.info(`Summarizing ${span.length} evicted turns`);
    const extracted = await this.extractWithRetry(span);

    let embedding: number[] | undefined;
    try {
      embedding = await this.embedder.embed(extracted.summary);
    } catch (error) {
      log.warn(`Failed to embed summary, saving without embedding: ${errorMessage(error)}`);
    }

    const originalTokens = span.reduce((sum, turn) => sum + this.estimate(turn), 0);
    const summary: Summary = {
      id: this.generateId(),
      spanStartTurnId: first.id,
      spanEndTurnId: last.id,
      text: extracted.summary,
      keyFacts: extracted.keyFacts.map(fact => fact.trim()).filter(Boolean),
      decisions: extracted.decisions,
      toolsMentioned: extracted.toolsUsed,
      topics: extracted.topics,
      embedding,
      turnCount: span.length,
      tokenSavings: Math.max(0, originalTokens - Math.ceil(extracted.summary.length / 4)),
      createdAt: this.now().toISOString(),
    };

    await this.store.saveSummary(summary, span.map(turn => turn.id));
    log.info(`Saved summary ${summary.id} for ${span.length} turns (saved ~${summary.tokenSavings} tokens)`);

    await this.promoteKeyFacts(summary, last.id);
    return summary;
  }

  private async extractWithRetry(span: readonly Turn[]): Promise<SummaryResponse> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await withTimeout(
          this.extractor.extract(SUMMARY_EXTRACTION, span),
          this.timeoutMs,
          'Summary extraction'
        );
      } catch (error) {
        lastError = error;
        log.warn(`Summary extraction failed (attempt ${attempt}/${this.maxAttempts}): ${errorMessage(error)}`);
        if (attempt < this.maxAttempts && this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    throw new SummarizationError(
      `Summarization failed after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`,
      this.maxAttempts,
      { cause: lastError }
    );
  }

  /**
   * Insert each key fact into long-term memory. The summary is already
   * durable, so failures here are logged and skipped.
   */
  private async promoteKeyFacts(summary: Summary, sourceTurnId: string): Promise<void> {
    let stored = 0;
    for (const fact of summary.keyFacts) {
      try {
        const result = await this.longTerm.store(fact, 'fact', this.keyFactImportance, sourceTurnId);
        if (result.status === 'stored') stored++;
      } catch (error) {
        log.warn(`Failed to promote key fact from summary ${summary.id}: ${errorMessage(error)}`);
      }
    }

    if (summary.keyFacts.length > 0) {
      log.info(`Promoted ${stored}/${summary.keyFacts.length} key facts from summary ${summary.id}`);
    }
  }

  /**
   * Most recent summaries, newest first
   */
  getRecentSummaries(limit: number): Summary[] {
    return this.store.getRecentSummaries(limit);
  }

  /**
   * Summaries most similar to a query embedding. Summaries without an
   * embedding are not considered; equal similarity favours the newer one.
   */
  searchSimilarSummaries(queryEmbedding: readonly number[], k: number, minSimilarity: number): ScoredSummary[] {
    if (k <= 0) return [];

    const scored: ScoredSummary[] = [];
    // Newest first, so a stable sort keeps newer summaries ahead on ties
    for (const summary of this.store.listEmbeddedSummaries()) {
      if (!summary.embedding) continue;
      const similarity = cosineSimilarity(queryEmbedding, summary.embedding);
      if (similarity >= minSimilarity) {
        scored.push({ summary, similarity });
      }
    }

    scored.sort((a, b) => b.similarity - a.similarity);
    return scored.slice(0, k);
  }

  countSummaries(): number {
    return this.store.countSummaries();
  }
}
