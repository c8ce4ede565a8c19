import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  EmbeddingService,
  bufferToEmbedding,
  cosineSimilarity,
  embeddingToBuffer,
} from '../embedding-service.js';

const { pipeline } = vi.hoisted(() => ({ pipeline: vi.fn() }));

vi.mock('@huggingface/transformers', () => ({ pipeline }));

describe('cosineSimilarity', () => {
  it('scores identical, orthogonal and opposite vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it('ignores magnitude', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('returns 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [0, 0])).toBe(0);
  });

  it('returns 0 for mismatched or empty vectors', () => {
    expect(cosineSimilarity([1, 0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

describe('embedding blob codec', () => {
  it('writes little-endian float32 values', () => {
    const buffer = embeddingToBuffer([0.5, -1.25, 3]);

    expect(buffer.length).toBe(12);
    expect(buffer.readFloatLE(4)).toBe(-1.25);
    expect(bufferToEmbedding(buffer)).toEqual([0.5, -1.25, 3]);
  });

  it('ignores a trailing partial value', () => {
    const buffer = Buffer.concat([embeddingToBuffer([2]), Buffer.from([1, 2])]);
    expect(bufferToEmbedding(buffer)).toEqual([2]);
  });
});

describe('EmbeddingService', () => {
  beforeEach(() => {
    pipeline.mockReset();
  });

  it('loads the model once and returns plain arrays', async () => {
    const extractor = vi.fn().mockResolvedValue({ data: Float32Array.from([0.5, 0.25, 0.125]) });
    pipeline.mockResolvedValue(extractor);
    const service = new EmbeddingService('test-model', 3);

    const [first, second] = await Promise.all([service.embed('alpha'), service.embed('beta')]);

    expect(first).toEqual([0.5, 0.25, 0.125]);
    expect(second).toEqual([0.5, 0.25, 0.125]);
    expect(pipeline).toHaveBeenCalledTimes(1);
    expect(pipeline).toHaveBeenCalledWith('feature-extraction', 'test-model', { dtype: 'q8' });
    expect(extractor).toHaveBeenCalledWith('alpha', { pooling: 'mean', normalize: true });
    expect(service.isInitialized()).toBe(true);
  });

  it('rejects output of the wrong dimension', async () => {
    pipeline.mockResolvedValue(vi.fn().mockResolvedValue({ data: Float32Array.from([1, 0, 0]) }));
    const service = new EmbeddingService('test-model', 4);

    await expect(service.embed('alpha')).rejects.toThrow('Unexpected embedding dimension: 3, expected 4');
  });

  it('can retry after a failed model load', async () => {
    pipeline.mockResolvedValueOnce({});
    pipeline.mockResolvedValueOnce(vi.fn().mockResolvedValue({ data: Float32Array.from([1, 0]) }));
    const service = new EmbeddingService('test-model', 2);

    await expect(service.embed('alpha')).rejects.toThrow('feature-extraction pipeline is not callable');
    expect(service.isInitialized()).toBe(false);

    await expect(service.embed('alpha')).resolves.toEqual([1, 0]);
    expect(pipeline).toHaveBeenCalledTimes(2);
  });

  it('embeds batches in order', async () => {
    const extractor = vi
      .fn()
      .mockResolvedValueOnce({ data: Float32Array.from([1, 0]) })
      .mockResolvedValueOnce({ data: Float32Array.from([0, 1]) });
    pipeline.mockResolvedValue(extractor);
    const service = new EmbeddingService('test-model', 2);

    await expect(service.embedBatch(['a', 'b'])).resolves.toEqual([[1, 0], [0, 1]]);
  });
});
