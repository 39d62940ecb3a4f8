import OpenAI from 'openai';
import { BackendUnavailableError, DimensionMismatchError, NotReadyError, errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import { hashingVector, normalize as l2Normalize } from './vectorizer';
import type { EmbeddingSettings } from './config';

export type EmbedOptions = {
  /** L2-normalize the output so cosine similarity is a dot product. Default true. */
  normalize?: boolean;
};

export interface EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;
  readonly ready: boolean;
  init(): Promise<void>;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
  embedMany(texts: string[], options?: EmbedOptions): Promise<number[][]>;
}

/**
 * Load-once lifecycle shared by all providers. The backend is loaded on the
 * first `init()`; later and concurrent calls get the same promise. A failed
 * load stays failed.
 */
export abstract class BaseEmbeddingProvider implements EmbeddingProvider {
  private loading?: Promise<void>;
  private loaded = false;
  protected readonly log: Logger;

  constructor(readonly model: string, readonly dimension: number, log?: Logger) {
    this.log = log ?? createLogger('embeddings');
  }

  get ready(): boolean {
    return this.loaded;
  }

  init(): Promise<void> {
    this.loading ??= this.load().then(
      () => {
        this.loaded = true;
        this.log.info({ model: this.model, dimension: this.dimension }, 'embedding model loaded');
      },
      (err: unknown) => {
        this.log.error({ model: this.model, err }, 'embedding model failed to load');
        throw err instanceof NotReadyError ? err : new NotReadyError(this.model, errorMessage(err), { cause: err });
      },
    );
    return this.loading;
  }

  async embed(text: string, options?: EmbedOptions): Promise<number[]> {
    const [vector] = await this.embedMany([text], options);
    return vector;
  }

  async embedMany(texts: string[], { normalize = true }: EmbedOptions = {}): Promise<number[][]> {
    if (!this.loaded) throw new NotReadyError(this.model);
    if (texts.length === 0) return [];

    const raw = await this.encode(texts);
    return raw.map(v => {
      if (v.length !== this.dimension) throw new DimensionMismatchError(this.dimension, v.length);
      return normalize ? l2Normalize(v) : v;
    });
  }

  protected abstract load(): Promise<void>;
  protected abstract encode(texts: string[]): Promise<number[][]>;
}

/** Deterministic local embeddings: hashed token counts. */
export class HashingEmbeddingProvider extends BaseEmbeddingProvider {
  protected async load(): Promise<void> {
    if (!Number.isInteger(this.dimension) || this.dimension < 1) {
      throw new NotReadyError(this.model, `invalid dimension ${this.dimension}`);
    }
  }

  protected async encode(texts: string[]): Promise<number[][]> {
    return texts.map(t => hashingVector(t, this.dimension));
  }
}

/** The slice of the OpenAI client this provider uses. */
export interface EmbeddingsApi {
  create(body: {
    model: string;
    input: string[];
    dimensions?: number;
  }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
}

export type OpenAIProviderOptions = {
  model: string;
  dimension: number;
  apiKey?: string;
  baseURL?: string;
  /** Pre-built client, otherwise one is created from apiKey on init. */
  client?: EmbeddingsApi;
};

export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
  private api?: EmbeddingsApi;

  constructor(private readonly options: OpenAIProviderOptions, log?: Logger) {
    super(options.model, options.dimension, log);
  }

  protected async load(): Promise<void> {
    if (this.options.client) {
      this.api = this.options.client;
      return;
    }
    if (!this.options.apiKey) throw new NotReadyError(this.model, 'OPENAI_API_KEY is not set');
    this.api = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseURL }).embeddings;
  }

  protected async encode(texts: string[]): Promise<number[][]> {
    if (!this.api) throw new NotReadyError(this.model);
    try {
      const res = await this.api.create({ model: this.model, input: texts, dimensions: this.dimension });
      return [...res.data].sort((a, b) => a.index - b.index).map(d => d.embedding);
    } catch (err) {
      throw new BackendUnavailableError('OpenAI embeddings', errorMessage(err), undefined, { cause: err });
    }
  }
}

export function createEmbeddingProvider(settings: EmbeddingSettings, log?: Logger): EmbeddingProvider {
  switch (settings.provider) {
    case 'openai':
      return new OpenAIEmbeddingProvider(
        {
          model: settings.model,
          dimension: settings.dimension,
          apiKey: settings.openaiApiKey,
          baseURL: settings.openaiBaseUrl,
        },
        log,
      );
    case 'hashing':
      return new HashingEmbeddingProvider(settings.model, settings.dimension, log);
  }
}
