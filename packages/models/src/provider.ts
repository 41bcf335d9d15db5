import {
  EmbeddingError,
  type ConversationMessage,
  type Embedder,
  type FactCandidate,
  type FactExtractor,
  type ProviderName,
} from '@tempora/shared';

export abstract class EmbeddingProvider implements Embedder {
  abstract readonly name: ProviderName;
  abstract readonly dimension: number;

  abstract embed(text: string): Promise<number[]>;
  abstract embedMany(texts: string[]): Promise<number[][]>;

  /** Every vector handed to the index must match the configured dimension. */
  protected checkDimension(vector: number[]): number[] {
    if (vector.length !== this.dimension) {
      throw new EmbeddingError(
        `${this.name} returned ${vector.length} dimensions, expected ${this.dimension}`,
      );
    }
    return vector;
  }
}

export abstract class FactExtractionProvider implements FactExtractor {
  abstract readonly name: ProviderName;

  abstract extract(messages: ConversationMessage[]): Promise<FactCandidate[]>;
}
