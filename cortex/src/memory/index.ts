/**
 * Memory Module - tiered conversational memory
 *
 * Architecture:
 * - Working Memory: recent turns within a token budget (hot)
 * - Summaries: evicted spans condensed by the summarization agent (warm)
 * - Long-Term Memory: deduplicated embedded facts (cold)
 * - Context Builder: assembles all three into one bounded block
 */

export {
  MemoryManager,
  type MemoryManagerConfig,
  type RecordTurnResult,
  type BuildContextOptions,
  getMemoryManager,
  initMemoryManager,
  isMemoryManagerInitialized,
  resetMemoryManager,
} from './manager.js';
export {
  type MemoryConfig,
  DEFAULT_MEMORY_CONFIG,
  resolveMemoryConfig,
  loadMemoryConfigFromEnv,
  resolveDbPath,
} from './config.js';
export { MemoryDatabase } from './db.js';
export { MemoryStore } from './memory-store.js';
export {
  WorkingMemory,
  type WorkingMemoryOptions,
  type TokenEstimator,
  estimateTurnTokens,
  estimateTextTokens,
} from './working-memory.js';
export {
  LongTermMemory,
  type LongTermMemoryOptions,
  type SearchFilter,
  DEFAULT_DEDUP_THRESHOLD,
} from './long-term.js';
export { SummarizationAgent, type SummarizationOptions } from './summarization.js';
export { FactExtractor, type FactExtractorOptions } from './fact-extractor.js';
export {
  ContextBuilder,
  type ContextBuilderOptions,
  type BuildOptions,
  LONG_TERM_HEADER,
  RECENT_SUMMARIES_HEADER,
  RELEVANT_SUMMARY_HEADER,
} from './context-builder.js';
export {
  type ExtractionSpec,
  type StructuredExtractor,
  type MessagesClient,
  type SummaryResponse,
  type FactExtractionResponse,
  AnthropicExtractor,
  SUMMARY_EXTRACTION,
  FACT_EXTRACTION,
  formatConversation,
  parseExtraction,
} from './extraction.js';
export {
  type EmbeddingProvider,
  EmbeddingService,
  getEmbeddingService,
  cosineSimilarity,
} from './embedding-service.js';
export {
  MemoryError,
  ExtractionError,
  SummarizationError,
  StoreUnavailableError,
} from './errors.js';
export { type LogLevel, setLogLevel, createLogger } from './logger.js';
export * from './types.js';
