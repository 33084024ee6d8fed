/**
 * Embedding Distance
 *
 * Pairwise evaluator that embeds two predictions and scores how far apart
 * they are. Lower is closer.
 *
 * @module @flowkit/evaluation/embedding-distance
 */

import { z } from 'zod';
import { ConfigurationError, TypeMismatchError } from '@flowkit/core';
import {
  InvokableUnit,
  type ExecutionConfig,
  type WorkUnitOptions,
} from '@flowkit/engine';

// =============================================================================
// Metrics
// =============================================================================

export const EmbeddingDistance = z.enum(['cosine', 'euclidean', 'manhattan', 'chebyshev', 'hamming']);

export type EmbeddingDistance = z.infer<typeof EmbeddingDistance>;

type DistanceFn = (a: number[], b: number[]) => number;

function norm(v: number[]): number {
  return Math.sqrt(v.reduce((sum, x) => sum + x * x, 0));
}

function cosineDistance(a: number[], b: number[]): number {
  const dot = a.reduce((sum, x, i) => sum + x * b[i], 0);
  const similarity = dot / (norm(a) * norm(b));
  // Zero vectors have no direction: treated as dissimilar
  return 1 - (Number.isFinite(similarity) ? similarity : 0);
}

export const DISTANCE_METRICS: Record<EmbeddingDistance, DistanceFn> = {
  cosine: cosineDistance,
  euclidean: (a, b) => norm(a.map((x, i) => x - b[i])),
  manhattan: (a, b) => a.reduce((sum, x, i) => sum + Math.abs(x - b[i]), 0),
  chebyshev: (a, b) => a.reduce((max, x, i) => Math.max(max, Math.abs(x - b[i])), 0),
  hamming: (a, b) => a.filter((x, i) => x !== b[i]).length / a.length,
};

/**
 * Parse a metric name, ignoring case
 *
 * @throws ConfigurationError for an unknown metric
 */
export function parseDistanceMetric(value: string): EmbeddingDistance {
  const result = EmbeddingDistance.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new ConfigurationError(`Invalid metric: ${value}`, {
      fieldErrors: { distanceMetric: `expected one of ${EmbeddingDistance.options.join(', ')}` },
    });
  }
  return result.data;
}

/**
 * Distance between two vectors under a metric
 *
 * @throws TypeMismatchError when the vectors differ in length or are empty
 */
export function computeDistance(metric: EmbeddingDistance, a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    throw new TypeMismatchError(
      `Embeddings must be non-empty vectors of equal length, received ${a.length} and ${b.length}`,
      { expected: 'equal-length vectors', received: `${a.length} and ${b.length}` }
    );
  }
  return DISTANCE_METRICS[metric](a, b);
}

// =============================================================================
// Evaluator
// =============================================================================

/**
 * Embedding model supplied by the caller
 */
export interface Embeddings {
  embedDocuments(texts: string[]): number[][];
  /** Falls back to embedDocuments when absent */
  aembedDocuments?(texts: string[]): Promise<number[][]>;
}

export interface StringPairInput {
  prediction: string;
  predictionB: string;
}

export interface PairwiseScore {
  score: number;
}

export interface PairwiseEmbeddingDistanceOptions extends WorkUnitOptions {
  embeddings: Embeddings;
  /** Metric name, any case (default: cosine) */
  distanceMetric?: string;
}

export class PairwiseEmbeddingDistanceEvaluator extends InvokableUnit<StringPairInput, PairwiseScore> {
  readonly embeddings: Embeddings;
  readonly distanceMetric: EmbeddingDistance;

  constructor(options: PairwiseEmbeddingDistanceOptions) {
    super({ name: options.name ?? 'embedding_distance' });
    this.embeddings = options.embeddings;
    this.distanceMetric = parseDistanceMetric(options.distanceMetric ?? 'cosine');
  }

  evaluateStringPairs(input: StringPairInput, config?: ExecutionConfig): PairwiseScore {
    return this.invoke(input, config);
  }

  aevaluateStringPairs(input: StringPairInput, config?: ExecutionConfig): Promise<PairwiseScore> {
    return this.ainvoke(input, config);
  }

  protected _invoke(input: StringPairInput): PairwiseScore {
    return this.score(this.embeddings.embedDocuments([input.prediction, input.predictionB]));
  }

  protected async _ainvoke(input: StringPairInput): Promise<PairwiseScore> {
    const texts = [input.prediction, input.predictionB];
    const vectors = this.embeddings.aembedDocuments
      ? await this.embeddings.aembedDocuments(texts)
      : this.embeddings.embedDocuments(texts);
    return this.score(vectors);
  }

  private score(vectors: number[][]): PairwiseScore {
    const [a, b] = vectors;
    if (vectors.length !== 2) {
      throw new TypeMismatchError(`Expected 2 embeddings, received ${vectors.length}`, {
        expected: '2 embeddings',
        received: String(vectors.length),
      });
    }
    return { score: computeDistance(this.distanceMetric, a, b) };
  }
}
