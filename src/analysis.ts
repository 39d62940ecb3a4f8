import { createEmbeddingProvider, type EmbeddingProvider } from './embeddings';
import { NotAFailureError, errorKind, errorMessage } from './errors';
import { embeddingText, isFailure, pointId, toPayload } from './fields';
import { JsonlEventSource, StaticEventSource } from './io';
import { createLogger, type Logger } from './logger';
import { extractPatterns } from './patterns';
import { QdrantIndex } from './qdrant';
import { MemoryIndex, type SimilarityIndex } from './store';
import { recommend } from './classifier';
import { summarize } from './summary';
import { DEFAULT_SCORE_THRESHOLD, DEFAULT_TOP_K, type AppConfig, type IndexSettings } from './config';
import type {
  AnalysisReport,
  EventSource,
  FailureSummary,
  IndexError,
  IndexStats,
  SimilarityResult,
  TestEvent,
} from './types';

export type EngineState = 'uninitialized' | 'indexed';

export type EngineOptions = {
  embeddings: EmbeddingProvider;
  index: SimilarityIndex;
  /** Where `loadAndIndex()` and `summary()` read events when none are passed. */
  source?: EventSource;
  topK?: number;
  scoreThreshold?: number;
  /** Failure texts embedded per provider call. */
  batchSize?: number;
  logger?: Logger;
};

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/**
 * Indexes failure history and answers similarity / analysis queries over it.
 *
 * The first query on an uninitialized engine indexes the source first.
 * Index keys are content hashes, so indexing the same events again replaces
 * their entries instead of duplicating them.
 */
export class AnalysisEngine {
  private readonly embeddings: EmbeddingProvider;
  private readonly index: SimilarityIndex;
  private readonly source: EventSource;
  private readonly topK: number;
  private readonly scoreThreshold: number;
  private readonly batchSize: number;
  private readonly log: Logger;

  private current: EngineState = 'uninitialized';
  private events?: TestEvent[];
  private pending?: Promise<IndexStats>;

  constructor(options: EngineOptions) {
    this.embeddings = options.embeddings;
    this.index = options.index;
    this.source = options.source ?? new StaticEventSource();
    this.topK = options.topK ?? DEFAULT_TOP_K;
    this.scoreThreshold = options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD;
    this.batchSize = Math.max(1, options.batchSize ?? 32);
    this.log = options.logger ?? createLogger('analysis');
  }

  get state(): EngineState {
    return this.current;
  }

  async loadAndIndex(events?: TestEvent[]): Promise<IndexStats> {
    const run = this.indexEvents(events);
    this.pending = run;
    try {
      return await run;
    } finally {
      if (this.pending === run) this.pending = undefined;
    }
  }

  async findSimilar(queryText: string, topK?: number): Promise<SimilarityResult[]> {
    if (this.current === 'uninitialized') await (this.pending ?? this.loadAndIndex());

    const vector = await this.embeddings.embed(queryText);
    const results = await this.index.query(vector, {
      topK: topK ?? this.topK,
      scoreThreshold: this.scoreThreshold,
    });
    this.log.debug({ matches: results.length, top: results[0]?.score }, 'similarity query');
    return results;
  }

  async analyze(event: TestEvent): Promise<AnalysisReport> {
    if (!isFailure(event)) throw new NotAFailureError(event.eventId);

    const similar = await this.findSimilar(embeddingText(event));
    const patterns = extractPatterns(similar);
    return {
      testId: event.testId,
      testName: event.testName,
      className: event.className,
      errorMessage: event.message,
      similarFailures: similar,
      patterns,
      recommendation: recommend(event, patterns),
    };
  }

  async summary(): Promise<FailureSummary> {
    const events = this.events ?? (await this.source.load());
    return summarize(events, await this.index.collectionInfo());
  }

  private async indexEvents(batch?: TestEvent[]): Promise<IndexStats> {
    const events = batch ?? (await this.source.load());
    this.events = events;
    await this.index.ensureCollection(this.embeddings.dimension, 'cosine');

    const failures = events.filter(isFailure);
    const errors: IndexError[] = [];
    const reject = (e: TestEvent, err: unknown) => {
      errors.push({ eventId: e.eventId, testName: e.testName, kind: errorKind(err), message: errorMessage(err) });
      this.log.warn({ eventId: e.eventId, testName: e.testName, err }, 'failed to index failure');
    };

    let indexed = 0;
    for (const group of chunk(failures, this.batchSize)) {
      const vectors = await this.embedGroup(group, reject);
      for (const [i, e] of group.entries()) {
        const vector = vectors[i];
        if (!vector) continue;
        try {
          await this.index.upsert(pointId(e), vector, toPayload(e));
          indexed++;
        } catch (err) {
          reject(e, err);
        }
      }
    }

    this.current = 'indexed';
    const stats: IndexStats = {
      totalEvents: events.length,
      failuresIndexed: indexed,
      passed: events.filter(e => e.status === 'PASSED').length,
      started: events.filter(e => e.status === 'STARTED').length,
      errors,
    };
    this.log.info(
      { totalEvents: stats.totalEvents, failuresIndexed: indexed, errors: errors.length, collection: this.index.name },
      'indexed failure history',
    );
    return stats;
  }

  // A failed batch is retried text by text so only the events that still fail are rejected.
  private async embedGroup(
    group: TestEvent[],
    reject: (e: TestEvent, err: unknown) => void,
  ): Promise<(number[] | undefined)[]> {
    const texts = group.map(embeddingText);
    try {
      return await this.embeddings.embedMany(texts);
    } catch (err) {
      if (group.length === 1) {
        reject(group[0], err);
        return [undefined];
      }
      this.log.debug({ size: group.length, err }, 'batch embedding failed, retrying one by one');
    }

    const vectors: (number[] | undefined)[] = [];
    for (const [i, text] of texts.entries()) {
      try {
        vectors.push(await this.embeddings.embed(text));
      } catch (err) {
        reject(group[i], err);
        vectors.push(undefined);
      }
    }
    return vectors;
  }
}

export function createIndex(settings: IndexSettings, config: AppConfig['analysis'], log?: Logger): SimilarityIndex {
  const defaults = { topK: config.topK, scoreThreshold: config.scoreThreshold };
  if (settings.backend === 'qdrant') {
    return new QdrantIndex(
      { ...defaults, url: settings.url, collection: settings.collection, apiKey: settings.apiKey, timeoutMs: settings.timeoutMs },
      undefined,
      log,
    );
  }
  return new MemoryIndex(settings.collection, defaults, log);
}

/**
 * Wires provider, index and event log from config. The embedding model is
 * loaded here, once; a load failure is fatal (NotReadyError).
 */
export async function createAnalysisEngine(config: AppConfig, logger?: Logger): Promise<AnalysisEngine> {
  const embeddings = createEmbeddingProvider(config.embedding, logger && createLogger('embeddings', logger));
  await embeddings.init();

  return new AnalysisEngine({
    embeddings,
    index: createIndex(config.index, config.analysis, logger && createLogger('index', logger)),
    source: new JsonlEventSource(config.logsPath, logger && createLogger('io', logger)),
    topK: config.analysis.topK,
    scoreThreshold: config.analysis.scoreThreshold,
    batchSize: config.embedding.batchSize,
    logger: logger && createLogger('analysis', logger),
  });
}
