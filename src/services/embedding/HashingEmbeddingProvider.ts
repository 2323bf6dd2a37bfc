import { EmbeddingProvider } from './EmbeddingProvider';

/**
 * Deterministic feature-hashing embeddings. Needs no network access, so it
 * backs demo mode and tests; similarity is lexical only.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'feature-hashing';

  constructor(readonly dimensions: number = 384) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) || [];

    for (const token of tokens) {
      const hash = fnv1a(token);
      const index = hash % this.dimensions;
      // sign from the top hash bit
      vector[index] += (hash & 0x80000000) === 0 ? 1 : -1;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map(value => value / norm);
  }
}

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}
