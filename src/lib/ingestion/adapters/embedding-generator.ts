import type { EmbeddingResult } from '../types';
import { getEmbeddingDimensions } from '../../env';

export interface EmbeddingGenerator {
  id: string;
  dimensions: number;
  embed(input: string): Promise<EmbeddingResult>;
}

/**
 * Folds character codes into a fixed number of buckets and L2-normalizes the
 * result. Identical inputs always map to identical vectors.
 */
class DeterministicEmbeddingGenerator implements EmbeddingGenerator {
  id = 'deterministic-emb-v1';

  constructor(readonly dimensions: number) {}

  async embed(input: string): Promise<EmbeddingResult> {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (let i = 0; i < input.length; i += 1) {
      const vectorIndex = i % this.dimensions;
      const code = input.charCodeAt(i);
      vector[vectorIndex] += (code % 31) / 31;
    }

    const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0)) || 1;
    const normalized = vector.map((value) => value / magnitude);

    return {
      model: this.id,
      dimensions: this.dimensions,
      vector: normalized,
    };
  }
}

export function createEmbeddingGenerator(
  providerId: string,
  dimensions: number = getEmbeddingDimensions()
): EmbeddingGenerator {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new Error(`Embedding dimensions must be a positive integer, got ${dimensions}`);
  }

  if (providerId === 'deterministic-emb-v1') {
    return new DeterministicEmbeddingGenerator(dimensions);
  }

  throw new Error(`Unknown embedding provider "${providerId}"`);
}
