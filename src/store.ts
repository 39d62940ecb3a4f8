import { DEFAULT_SCORE_THRESHOLD, DEFAULT_TOP_K } from './config';
import { BackendUnavailableError, DimensionMismatchError } from './errors';
import { createLogger, type Logger } from './logger';
import { dot, normalize } from './vectorizer';
import type { CollectionInfo, FailurePayload, SimilarityResult } from './types';

export type DistanceMetric = 'cosine';

export type QueryOptions = {
  topK?: number;
  scoreThreshold?: number;
};

export interface SimilarityIndex {
  readonly name: string;
  /** Creates the collection when missing; an existing one is left untouched. */
  ensureCollection(dimension: number, distance?: DistanceMetric): Promise<void>;
  upsert(id: string, vector: number[], payload: FailurePayload): Promise<string>;
  /** Up to topK results with score >= scoreThreshold, best first. */
  query(vector: number[], options?: QueryOptions): Promise<SimilarityResult[]>;
  collectionInfo(): Promise<CollectionInfo>;
}

export type IndexDefaults = {
  topK?: number;
  scoreThreshold?: number;
};

type Point = { vector: number[]; payload: FailurePayload };

type Collection = {
  dimension: number;
  distance: DistanceMetric;
  points: Map<string, Point>;
};

function copyPayload(p: FailurePayload): FailurePayload {
  return { ...p, extra: { ...p.extra } };
}

/**
 * Exact nearest-neighbour search held in process memory. Vectors are
 * normalized on write and on query, so the score is a dot product.
 */
export class MemoryIndex implements SimilarityIndex {
  private collection?: Collection;
  private readonly topK: number;
  private readonly scoreThreshold: number;
  private readonly log: Logger;

  constructor(readonly name = 'test_failures', defaults: IndexDefaults = {}, log?: Logger) {
    this.topK = defaults.topK ?? DEFAULT_TOP_K;
    this.scoreThreshold = defaults.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
    this.log = log ?? createLogger('memory-index');
  }

  async ensureCollection(dimension: number, distance: DistanceMetric = 'cosine'): Promise<void> {
    if (this.collection) return;
    this.collection = { dimension, distance, points: new Map() };
    this.log.info({ collection: this.name, dimension, distance }, 'created collection');
  }

  async upsert(id: string, vector: number[], payload: FailurePayload): Promise<string> {
    const c = this.collection;
    if (!c) throw new BackendUnavailableError('memory index', `collection "${this.name}" does not exist`);
    if (vector.length !== c.dimension) throw new DimensionMismatchError(c.dimension, vector.length);

    c.points.set(id, { vector: normalize(vector), payload: copyPayload(payload) });
    return id;
  }

  async query(vector: number[], options: QueryOptions = {}): Promise<SimilarityResult[]> {
    const c = this.collection;
    if (!c) return [];
    if (vector.length !== c.dimension) throw new DimensionMismatchError(c.dimension, vector.length);

    const topK = options.topK ?? this.topK;
    const threshold = options.scoreThreshold ?? this.scoreThreshold;
    const q = normalize(vector);

    const hits: SimilarityResult[] = [];
    for (const [id, point] of c.points) {
      const score = Math.min(1, dot(q, point.vector));
      if (score >= threshold) hits.push({ ...copyPayload(point.payload), id, score });
    }
    // Array#sort is stable: equal scores keep insertion order
    return hits.sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
  }

  async collectionInfo(): Promise<CollectionInfo> {
    return { name: this.name, pointsCount: this.collection?.points.size ?? 0 };
  }
}
