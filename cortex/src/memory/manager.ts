/**
 * Memory Manager - orchestration of the tiered memory for one agent
 *
 * - Working memory: recent turns, sent verbatim (hot)
 * - Summaries: evicted spans folded into condensed records (warm)
 * - Long-term memory: embedded facts, deduplicated (cold)
 *
 * The foreground path is recordTurn → (evict → summarize) → buildContext.
 * Fact extraction runs in the background after each completed exchange.
 */

import { ContextBuilder } from './context-builder.js';
import { CriticalSection } from './critical-section.js';
import { MemoryConfig, resolveDbPath, resolveMemoryConfig } from './config.js';
import { MemoryDatabase } from './db.js';
import { EmbeddingProvider, getEmbeddingService } from './embedding-service.js';
import { StoreUnavailableError, SummarizationError, errorMessage } from './errors.js';
import { AnthropicExtractor, StructuredExtractor } from './extraction.js';
import { FactExtractor } from './fact-extractor.js';
import { createLogger, setLogLevel } from './logger.js';
import { LongTermMemory, SearchFilter } from './long-term.js';
import { MemoryStore } from './memory-store.js';
import { SummarizationAgent } from './summarization.js';
import {
  MemoryEntry,
  MemoryKind,
  MemoryStats,
  ScoredMemoryEntry,
  StoreResult,
  Summary,
  Turn,
  TurnRole,
} from './types.js';
import { TokenEstimator, WorkingMemory, estimateTextTokens } from './working-memory.js';

const log = createLogger('Memory');

export interface MemoryManagerConfig extends Partial<MemoryConfig> {
  /** Structured extraction capability; defaults to Claude via the Anthropic SDK */
  extractor?: StructuredExtractor;
  /** Embedding provider; defaults to the shared local embedding service */
  embedder?: EmbeddingProvider;
  estimateTokens?: TokenEstimator;
  now?: () => Date;
}

export interface RecordTurnResult {
  turn: Turn;
  /** Set when this call folded a span into a new summary */
  summary?: Summary;
  /** Set when eviction was due but summarization failed; the span stays resident */
  evictionError?: SummarizationError;
}

export interface BuildContextOptions {
  systemPrompt?: string;
  modelContextTokens?: number;
}

function clampImportance(importance: number): number {
  if (!Number.isFinite(importance)) return 0.5;
  return Math.min(1, Math.max(0, importance));
}

export class MemoryManager {
  readonly config: MemoryConfig;
  private readonly db: MemoryDatabase;
  private readonly store: MemoryStore;
  private readonly workingMemory: WorkingMemory;
  private readonly longTerm: LongTermMemory;
  private readonly summarization: SummarizationAgent;
  private readonly factExtractor: FactExtractor;
  private readonly contextBuilder: ContextBuilder;
  private readonly turnLock = new CriticalSection();
  private readonly now: () => Date;
  private initPromise: Promise<void> | null = null;
  private closed = false;

  constructor(options: MemoryManagerConfig = {}) {
    const { extractor, embedder, estimateTokens, now, ...overrides } = options;
    this.config = resolveMemoryConfig(overrides);
    this.now = now ?? (() => new Date());
    setLogLevel(this.config.logLevel);

    const embeddings = embedder ?? getEmbeddingService();
    const structured = extractor ?? new AnthropicExtractor({
      apiKey: this.config.apiKey,
      model: this.config.extractionModel,
    });

    this.db = new MemoryDatabase(resolveDbPath(this.config));
    this.store = new MemoryStore(this.db, this.config.agentId);
    this.workingMemory = new WorkingMemory({
      tokenBudget: this.config.tokenBudget,
      fillRatio: this.config.fillRatio,
      evictionBatchRatio: this.config.evictionBatchRatio,
      minRetainedTurns: this.config.minRetainedTurns,
      estimateTokens,
    });
    this.longTerm = new LongTermMemory(this.store, embeddings, {
      dedupThreshold: this.config.dedupThreshold,
      now: this.now,
    });
    this.summarization = new SummarizationAgent(this.store, structured, embeddings, this.longTerm, {
      maxAttempts: this.config.summaryMaxAttempts,
      timeoutMs: this.config.summaryTimeoutMs,
      retryDelayMs: this.config.summaryRetryDelayMs,
      keyFactImportance: this.config.keyFactImportance,
      estimateTokens,
      now: this.now,
    });
    this.factExtractor = new FactExtractor(structured, this.longTerm, {
      minExchangeChars: this.config.minExchangeChars,
    });
    this.contextBuilder = new ContextBuilder(this.workingMemory, this.summarization, this.longTerm, {
      recentSummaryCount: this.config.recentSummaryCount,
      relevantSummaryMinSimilarity: this.config.relevantSummaryMinSimilarity,
      longTermLimit: this.config.longTermLimit,
      longTermMinSimilarity: this.config.longTermMinSimilarity,
      defaultTokenBudget: this.config.contextTokenBudget,
    });
  }

  /**
   * Open the store and restore working memory from unsummarized turns
   */
  async init(): Promise<void> {
    if (this.closed) {
      throw new StoreUnavailableError('Memory manager has been shut down');
    }
    if (!this.initPromise) {
      this.initPromise = this.doInit();
      // A failed init can be retried
      void this.initPromise.catch(() => {
        this.initPromise = null;
      });
    }
    return this.initPromise;
  }

  private async doInit(): Promise<void> {
    try {
      await this.db.init();
      this.workingMemory.loadFrom(this.store.listUnsummarizedTurns());
      log.info(`Memory manager initialized for agent ${this.config.agentId}`);
    } catch (error) {
      log.error('Failed to initialize:', error);
      throw error;
    }
  }

  /**
   * Generate a unique turn ID
   */
  private generateTurnId(): string {
    return `turn_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
  }

  // ============================================================
  // CONVERSATION FLOW
  // ============================================================

  /**
   * Persist a turn, append it to working memory and fold the oldest
   * turns into summaries while the fill threshold is exceeded.
   *
   * Store failures propagate, including those hit while saving a summary.
   * An exhausted summarizer does not: the span stays resident and the
   * error is returned in `evictionError`.
   */
  async recordTurn(role: TurnRole, content: string, importance = 0.5): Promise<RecordTurnResult> {
    await this.init();

    return this.turnLock.run(async (): Promise<RecordTurnResult> => {
      const turn: Turn = {
        id: this.generateTurnId(),
        role,
        content,
        createdAt: this.now().toISOString(),
        importance: clampImportance(importance),
      };

      await this.store.insertTurn(turn);
      this.workingMemory.append(turn);

      const result: RecordTurnResult = { turn };
      while (this.workingMemory.shouldEvict()) {
        const span = this.workingMemory.selectEvictionSpan();
        if (span.length === 0) break;

        try {
          result.summary = await this.summarization.summarize(span);
        } catch (error) {
          if (!(error instanceof SummarizationError)) throw error;
          log.warn(`Eviction postponed, keeping ${span.length} turns resident: ${error.message}`);
          result.evictionError = error;
          break;
        }

        this.workingMemory.commitEviction(span);
      }

      return result;
    });
  }

  /**
   * Hand a completed exchange to background fact extraction. Returns at once.
   */
  completeExchange(userTurn: Turn, agentTurn: Turn): void {
    this.factExtractor.spawnExtraction(userTurn, agentTurn);
  }

  /**
   * Memory block for the next model call, sized to what the model window
   * leaves after the system prompt and the resident history. Any failure
   * yields '' so the caller falls back to raw history.
   */
  async buildContext(query: string, options: BuildContextOptions = {}): Promise<string> {
    try {
      await this.init();

      const window = options.modelContextTokens ?? this.config.modelContextTokens;
      const systemTokens = options.systemPrompt ? estimateTextTokens(options.systemPrompt) : 0;
      const remaining = window - systemTokens - this.workingMemory.tokenCount;
      const maxTokens = Math.min(this.config.contextTokenBudget, remaining);
      if (maxTokens <= 0) {
        log.debug('No room left for memory context');
        return '';
      }

      return await this.contextBuilder.build(query, { maxTokens });
    } catch (error) {
      log.warn(`Context assembly failed, using raw history only: ${errorMessage(error)}`);
      return '';
    }
  }

  /**
   * Resident turns, oldest first
   */
  history(): readonly Turn[] {
    return this.workingMemory.snapshot();
  }

  // ============================================================
  // MANUAL MEMORY MANAGEMENT
  // ============================================================

  async addMemory(content: string, kind: MemoryKind = 'fact', importance = 0.8): Promise<StoreResult> {
    await this.init();
    return this.longTerm.store(content, kind, importance);
  }

  async searchMemories(
    query: string,
    limit = 5,
    minSimilarity?: number,
    filter: SearchFilter = {}
  ): Promise<ScoredMemoryEntry[]> {
    await this.init();
    return this.longTerm.searchText(query, limit, minSimilarity ?? this.config.longTermMinSimilarity, filter);
  }

  async deleteMemory(id: string): Promise<boolean> {
    await this.init();
    return this.longTerm.delete(id);
  }

  async listMemories(kind: MemoryKind, limit = 20): Promise<MemoryEntry[]> {
    await this.init();
    return this.longTerm.searchByKind(kind, limit);
  }

  /**
   * Get memory statistics
   */
  async getStats(): Promise<MemoryStats> {
    await this.init();
    return {
      agentId: this.config.agentId,
      residentTurns: this.workingMemory.size,
      workingMemoryTokens: this.workingMemory.tokenCount,
      workingMemoryUtilization: this.workingMemory.utilization(),
      summaries: this.summarization.countSummaries(),
      memoryEntries: await this.longTerm.count(),
      pendingExtractions: this.factExtractor.pending,
    };
  }

  /**
   * Resolve once background extraction has settled
   */
  idle(): Promise<void> {
    return this.factExtractor.idle();
  }

  isInitialized(): boolean {
    return this.db.isInitialized();
  }

  /**
   * Abandon background extraction and close the store
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.factExtractor.shutdown();
    this.db.close();
    log.info('Memory manager shut down');
  }
}

// Singleton instance
let memoryManagerInstance: MemoryManager | null = null;

/**
 * Get the singleton MemoryManager instance
 */
export function getMemoryManager(): MemoryManager {
  if (!memoryManagerInstance) {
    throw new Error('Memory manager not initialized. Call initMemoryManager() first.');
  }
  return memoryManagerInstance;
}

/**
 * Initialize the memory manager with custom config
 */
export function initMemoryManager(config: MemoryManagerConfig = {}): MemoryManager {
  if (memoryManagerInstance) {
    log.info('Memory manager already initialized, returning existing instance');
    return memoryManagerInstance;
  }
  memoryManagerInstance = new MemoryManager(config);
  return memoryManagerInstance;
}

/**
 * Check if memory manager is initialized
 */
export function isMemoryManagerInitialized(): boolean {
  return memoryManagerInstance !== null;
}

/**
 * Shut down and drop the singleton (for testing)
 */
export function resetMemoryManager(): void {
  memoryManagerInstance?.shutdown();
  memoryManagerInstance = null;
}
