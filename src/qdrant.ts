import axios, { AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { DEFAULT_SCORE_THRESHOLD, DEFAULT_TOP_K } from './config';
import { BackendUnavailableError, DimensionMismatchError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { normalize } from './vectorizer';
import type { DistanceMetric, IndexDefaults, QueryOptions, SimilarityIndex } from './store';
import type { CollectionInfo, FailurePayload, SimilarityResult } from './types';

export type QdrantOptions = IndexDefaults & {
  url: string;
  collection: string;
  apiKey?: string;
  timeoutMs?: number;
};

const PayloadSchema = z.object({
  eventId: z.string().default(''),
  testId: z.string().default(''),
  testName: z.string().default(''),
  className: z.string().default(''),
  suite: z.string().default(''),
  message: z.string().default(''),
  stacktrace: z.string().default(''),
  timestamp: z.string().default(''),
  durationMs: z.number().default(0),
  embeddingText: z.string().default(''),
  extra: z.record(z.string()).default({}),
});

const CollectionResponse = z.object({
  result: z.object({
    points_count: z.number().nullish(),
    config: z
      .object({
        params: z
          .object({ vectors: z.object({ size: z.number().optional() }).optional() })
          .optional(),
      })
      .optional(),
  }),
});

const SearchResponse = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z.unknown(),
    }),
  ),
});

const DISTANCE: Record<DistanceMetric, string> = { cosine: 'Cosine' };

/**
 * Similarity index backed by a Qdrant server over its REST API.
 * Transport failures are reported as BackendUnavailableError, never retried.
 */
export class QdrantIndex implements SimilarityIndex {
  readonly name: string;
  private readonly http: AxiosInstance;
  private readonly topK: number;
  private readonly scoreThreshold: number;
  private readonly log: Logger;
  private dimension?: number;

  constructor(options: QdrantOptions, http?: AxiosInstance, log?: Logger) {
    this.name = options.collection;
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.scoreThreshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
    this.log = log ?? createLogger('qdrant-index');
    this.http =
      http ??
      axios.create({
        baseURL: options.url,
        timeout: options.timeoutMs ?? 10_000,
        headers: {
          'Content-Type': 'application/json',
          ...(options.apiKey ? { 'api-key': options.apiKey } : {}),
        },
      });
  }

  private get path(): string {
    return `/collections/${encodeURIComponent(this.name)}`;
  }

  async ensureCollection(dimension: number, distance: DistanceMetric = 'cosine'): Promise<void> {
    const existing = await this.fetchCollection();
    if (existing) {
      this.dimension = existing.config?.params?.vectors?.size ?? this.dimension;
      this.log.debug({ collection: this.name }, 'collection already exists');
      return;
    }

    await this.call(() =>
      this.http.put(this.path, { vectors: { size: dimension, distance: DISTANCE[distance] } }),
    );
    this.dimension = dimension;
    this.log.info({ collection: this.name, dimension }, 'created collection');
  }

  async upsert(id: string, vector: number[], payload: FailurePayload): Promise<string> {
    if (this.dimension !== undefined && vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
    await this.call(
      () => this.http.put(`${this.path}/points`, { points: [{ id, vector: normalize(vector), payload }] }, {
        params: { wait: true },
      }),
      vector.length,
    );
    return id;
  }

  async query(vector: number[], options: QueryOptions = {}): Promise<SimilarityResult[]> {
    const res = await this.call(
      () => this.http.post(`${this.path}/points/search`, {
        vector: normalize(vector),
        limit: options.topK ?? this.topK,
        score_threshold: options.scoreThreshold ?? this.scoreThreshold,
        with_payload: true,
      }),
      vector.length,
    );

    return SearchResponse.parse(res.data).result.map(hit => ({
      ...PayloadSchema.parse(hit.payload ?? {}),
      id: String(hit.id),
      score: Math.min(1, hit.score),
    }));
  }

  async collectionInfo(): Promise<CollectionInfo> {
    const existing = await this.fetchCollection();
    return { name: this.name, pointsCount: existing?.points_count ?? 0 };
  }

  // null when the collection does not exist
  private async fetchCollection() {
    try {
      const res = await this.http.get(this.path);
      return CollectionResponse.parse(res.data).result;
    } catch (err) {
      if (isAxiosError(err) && err.response?.status === 404) return null;
      throw this.translate(err);
    }
  }

  private async call<T>(fn: () => Promise<T>, vectorLength?: number): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.translate(err, vectorLength);
    }
  }

  private translate(err: unknown, vectorLength?: number): Error {
    if (!isAxiosError(err)) return err instanceof Error ? err : new Error(String(err));

    const status = err.response?.status;
    const body = JSON.stringify(err.response?.data ?? '');
    if (status === 400 && /dimension/i.test(body) && vectorLength !== undefined) {
      const expected = /expected dim: (\d+)/.exec(body);
      return new DimensionMismatchError(expected ? Number(expected[1]) : this.dimension ?? -1, vectorLength);
    }
    const detail = status ? `HTTP ${status} ${body}` : err.code ?? errorMessage(err);
    this.log.warn({ collection: this.name, status, code: err.code }, 'qdrant request failed');
    return new BackendUnavailableError('qdrant', detail, status, { cause: err });
  }
}
