/**
 * Fact Extractor - background mining of completed exchanges
 *
 * `spawnExtraction` returns immediately; the extraction runs detached and
 * stores candidates through LongTermMemory, so deduplication applies.
 * Failures are logged and never reach the foreground.
 */

import { errorMessage } from './errors.js';
import { FACT_EXTRACTION, StructuredExtractor } from './extraction.js';
import { createLogger } from './logger.js';
import { LongTermMemory } from './long-term.js';
import { Turn } from './types.js';

const log = createLogger('Memory');

export interface FactExtractorOptions {
  /** Exchanges with fewer combined characters are skipped */
  minExchangeChars?: number;
}

export class FactExtractor {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly minExchangeChars: number;
  private closed = false;

  constructor(
    private readonly extractor: StructuredExtractor,
    private readonly longTerm: LongTermMemory,
    options: FactExtractorOptions = {}
  ) {
    this.minExchangeChars = options.minExchangeChars ?? 50;
  }

  /**
   * Start extraction for one user/agent exchange without waiting for it
   */
  spawnExtraction(userTurn: Turn, agentTurn: Turn): void {
    if (this.closed) return;

    const combined = userTurn.content.trim().length + agentTurn.content.trim().length;
    if (combined < this.minExchangeChars) {
      log.debug(`Skipping fact extraction for short exchange (${combined} chars)`);
      return;
    }

    const task = this.extract(userTurn, agentTurn).catch(error => {
      log.warn(`Background fact extraction failed: ${errorMessage(error)}`);
    });
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  private async extract(userTurn: Turn, agentTurn: Turn): Promise<void> {
    const { facts } = await this.extractor.extract(FACT_EXTRACTION, [userTurn, agentTurn]);
    if (facts.length === 0) return;

    let stored = 0;
    for (const fact of facts) {
      // Abandoned units drop whatever they have not written yet
      if (this.closed) return;
      const result = await this.longTerm.store(fact.content, fact.kind, fact.importance, userTurn.id);
      if (result.status === 'stored') stored++;
    }

    log.info(`Extracted ${facts.length} facts from exchange, stored ${stored}`);
  }

  /**
   * Number of extractions still running
   */
  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Resolve once every in-flight extraction has settled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Stop accepting work. In-flight units are not awaited.
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.inFlight.size > 0) {
      log.info(`Abandoning ${this.inFlight.size} in-flight fact extractions`);
    }
  }
}
