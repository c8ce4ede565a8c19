/**
 * Working Memory - token-bounded rolling buffer of recent turns
 *
 * Holds only turns not yet folded into a summary, in arrival order.
 * Eviction is two-phase: `selectEvictionSpan` proposes the oldest span,
 * the caller gets it durably summarized, then `commitEviction` removes it.
 */

import { createLogger } from './logger.js';
import { Turn } from './types.js';

const log = createLogger('Memory');

export type TokenEstimator = (turn: Pick<Turn, 'role' | 'content'>) => number;

/**
 * Rough approximation: ~4 chars per token, plus metadata overhead
 */
export const estimateTurnTokens: TokenEstimator = turn =>
  Math.floor(turn.content.length / 4) + Math.floor(turn.role.length / 4) + 5;

/**
 * Token estimate for a free-standing piece of text
 */
export function estimateTextTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export interface WorkingMemoryOptions {
  tokenBudget: number;
  fillRatio?: number;
  evictionBatchRatio?: number;
  minRetainedTurns?: number;
  estimateTokens?: TokenEstimator;
}

export class WorkingMemory {
  private turns: Turn[] = [];
  private currentTokens = 0;
  readonly tokenBudget: number;
  readonly fillRatio: number;
  readonly evictionBatchRatio: number;
  readonly minRetainedTurns: number;
  private readonly estimate: TokenEstimator;

  constructor(options: WorkingMemoryOptions) {
    this.tokenBudget = options.tokenBudget;
    this.fillRatio = options.fillRatio ?? 0.7;
    this.evictionBatchRatio = options.evictionBatchRatio ?? 0.3;
    this.minRetainedTurns = options.minRetainedTurns ?? 2;
    this.estimate = options.estimateTokens ?? estimateTurnTokens;
  }

  /**
   * Append a turn at the tail. Never fails; retained size is bounded by eviction.
   */
  append(turn: Turn): void {
    this.turns.push(turn);
    this.currentTokens += this.estimate(turn);
  }

  /**
   * Token count above which eviction is due
   */
  get fillThreshold(): number {
    return this.fillRatio * this.tokenBudget;
  }

  shouldEvict(): boolean {
    return this.currentTokens > this.fillThreshold;
  }

  /**
   * Oldest contiguous turns to evict, without removing them.
   *
   * Takes turns until at least `evictionBatchRatio × tokenBudget` tokens are
   * covered and the remainder is at or below the fill threshold. The newest
   * `minRetainedTurns` turns are never included.
   */
  selectEvictionSpan(): Turn[] {
    const batchTokens = this.evictionBatchRatio * this.tokenBudget;
    const removable = Math.max(0, this.turns.length - this.minRetainedTurns);

    let freed = 0;
    let count = 0;
    while (count < removable) {
      if (freed >= batchTokens && this.currentTokens - freed <= this.fillThreshold) break;
      freed += this.estimate(this.turns[count]);
      count++;
    }

    return this.turns.slice(0, count);
  }

  /**
   * Remove a previously selected span from the head of the buffer.
   * The span must still be the oldest run of resident turns.
   */
  commitEviction(span: readonly Turn[]): Turn[] {
    if (span.length === 0) return [];

    const headMatches = span.length <= this.turns.length &&
      span.every((turn, index) => this.turns[index].id === turn.id);
    if (!headMatches) {
      throw new Error('Eviction span is not the oldest run of resident turns');
    }

    const removed = this.turns.splice(0, span.length);
    const freed = removed.reduce((sum, turn) => sum + this.estimate(turn), 0);
    this.currentTokens = Math.max(0, this.currentTokens - freed);

    log.info(`Evicted ${removed.length} turns from working memory (freed ~${freed} tokens)`);
    return removed;
  }

  /**
   * Select and remove the oldest span in one step
   */
  evictOldest(): Turn[] {
    return this.commitEviction(this.selectEvictionSpan());
  }

  /**
   * Restore from persisted turns (chronological order) after a restart.
   *
   * Keeps the newest turns that fit the token budget. Clears any current
   * content first and never triggers summarization.
   */
  loadFrom(turns: readonly Turn[]): void {
    this.clear();

    const kept: Turn[] = [];
    let tokens = 0;
    for (let i = turns.length - 1; i >= 0; i--) {
      const turnTokens = this.estimate(turns[i]);
      if (tokens + turnTokens > this.tokenBudget) {
        log.warn(`Working memory budget reached during load. Loaded ${kept.length}/${turns.length} turns`);
        break;
      }
      kept.push(turns[i]);
      tokens += turnTokens;
    }

    this.turns = kept.reverse();
    this.currentTokens = tokens;

    log.info(
      `Loaded ${this.turns.length} turns into working memory (${this.currentTokens} tokens, ${this.utilization().toFixed(1)}% utilization)`
    );
  }

  /**
   * Resident turns, oldest first
   */
  snapshot(): readonly Turn[] {
    return [...this.turns];
  }

  get size(): number {
    return this.turns.length;
  }

  get tokenCount(): number {
    return this.currentTokens;
  }

  /**
   * Utilization of the token budget, in percent
   */
  utilization(): number {
    if (this.tokenBudget === 0) return 0;
    return (this.currentTokens / this.tokenBudget) * 100;
  }

  clear(): void {
    this.turns = [];
    this.currentTokens = 0;
  }
}
