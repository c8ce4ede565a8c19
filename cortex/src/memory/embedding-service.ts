/**
 * Embedding Service - Local vector embeddings using transformers.js
 *
 * Uses Xenova/all-MiniLM-L6-v2 which produces 384-dimensional embeddings.
 * Model is lazily loaded on first use.
 */

import { createLogger } from './logger.js';

const MODEL_NAME = 'Xenova/all-MiniLM-L6-v2';
const EMBEDDING_DIM = 384;

const log = createLogger('Memory');

/**
 * Anything that turns text into a fixed-length vector, deterministically
 * for a given model version.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

interface TensorLike {
  data: ArrayLike<number>;
}

function isTensorLike(value: unknown): value is TensorLike {
  if (typeof value !== 'object' || value === null || !('data' in value)) return false;
  const data = value.data;
  return typeof data === 'object' && data !== null && 'length' in data;
}

export class EmbeddingService implements EmbeddingProvider {
  private extractor: ((text: string, options: object) => Promise<unknown>) | null = null;
  private initPromise: Promise<void> | null = null;

  constructor(private readonly modelName = MODEL_NAME, private readonly dimension = EMBEDDING_DIM) {}

  /**
   * Initialize the embedding model (lazy - called automatically on first use)
   */
  async init(): Promise<void> {
    if (this.extractor) return;

    // Concurrent first calls share one model load
    if (!this.initPromise) {
      this.initPromise = this.doInit().catch(error => {
        this.initPromise = null;
        throw error;
      });
    }
    await this.initPromise;
  }

  private async doInit(): Promise<void> {
    try {
      const transformers = await import('@huggingface/transformers');

      log.info(`Loading embedding model: ${this.modelName}...`);
      const pipe: unknown = await transformers.pipeline('feature-extraction', this.modelName, {
        dtype: 'q8',
      });
      if (typeof pipe !== 'function') {
        throw new Error('feature-extraction pipeline is not callable');
      }

      this.extractor = async (text, options) => pipe(text, options);
      log.info('Embedding model loaded successfully');
    } catch (error) {
      log.error('Failed to load embedding model:', error);
      throw error;
    }
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string): Promise<number[]> {
    await this.init();

    if (!this.extractor) {
      throw new Error('Embedding model not initialized');
    }

    const output = await this.extractor(text, { pooling: 'mean', normalize: true });
    if (!isTensorLike(output)) {
      throw new Error('Embedding model returned no tensor data');
    }

    const embedding = Array.from(output.data);
    if (embedding.length !== this.dimension) {
      throw new Error(`Unexpected embedding dimension: ${embedding.length}, expected ${this.dimension}`);
    }

    return embedding;
  }

  /**
   * Generate embeddings for multiple texts
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(await this.embed(text));
    }
    return embeddings;
  }

  isInitialized(): boolean {
    return this.extractor !== null;
  }
}

/**
 * Cosine similarity between two embeddings.
 *
 * Returns 0 for a zero vector or mismatched dimensions instead of
 * NaN or an exception.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0 || !Number.isFinite(magnitude)) return 0;

  return dotProduct / magnitude;
}

/**
 * Encode an embedding as a little-endian float32 blob
 */
export function embeddingToBuffer(embedding: readonly number[]): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  embedding.forEach((value, index) => buffer.writeFloatLE(value, index * 4));
  return buffer;
}

/**
 * Decode a little-endian float32 blob
 */
export function bufferToEmbedding(buffer: Buffer): number[] {
  const length = Math.floor(buffer.length / 4);
  const embedding = new Array<number>(length);
  for (let i = 0; i < length; i++) {
    embedding[i] = buffer.readFloatLE(i * 4);
  }
  return embedding;
}

// Singleton instance
let instance: EmbeddingService | null = null;

export function getEmbeddingService(): EmbeddingService {
  if (!instance) {
    instance = new EmbeddingService();
  }
  return instance;
}
