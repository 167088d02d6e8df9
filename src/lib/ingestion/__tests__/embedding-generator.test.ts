import { afterEach, describe, expect, it, vi } from 'vitest';

describe('createEmbeddingGenerator', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('produces unit-length vectors of the requested dimension', async () => {
    const { createEmbeddingGenerator } = await import('../adapters/embedding-generator');
    const generator = createEmbeddingGenerator('deterministic-emb-v1', 8);
    const result = await generator.embed('chemical safety guidance');

    expect(result.model).toBe('deterministic-emb-v1');
    expect(result.dimensions).toBe(8);
    expect(result.vector).toHaveLength(8);
    const norm = Math.sqrt(result.vector.reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it('maps identical input to identical vectors', async () => {
    const { createEmbeddingGenerator } = await import('../adapters/embedding-generator');
    const generator = createEmbeddingGenerator('deterministic-emb-v1', 4);

    const single = (await generator.embed('a')).vector;
    expect(single[0]).toBeCloseTo(1, 10);
    expect(single.slice(1)).toEqual([0, 0, 0]);
    expect((await generator.embed('same text')).vector).toEqual((await generator.embed('same text')).vector);
    expect((await generator.embed('')).vector).toEqual([0, 0, 0, 0]);
  });

  it('reads the default dimension from EMBEDDING_DIM', async () => {
    vi.stubEnv('EMBEDDING_DIM', '16');
    const { createEmbeddingGenerator } = await import('../adapters/embedding-generator');

    expect(createEmbeddingGenerator('deterministic-emb-v1').dimensions).toBe(16);
  });

  it('rejects unknown providers and invalid dimensions', async () => {
    const { createEmbeddingGenerator } = await import('../adapters/embedding-generator');

    expect(() => createEmbeddingGenerator('remote-emb-v9', 8)).toThrow(
      'Unknown embedding provider "remote-emb-v9"'
    );
    expect(() => createEmbeddingGenerator('deterministic-emb-v1', 0)).toThrow(
      'Embedding dimensions must be a positive integer, got 0'
    );
  });
});
