import { test, expect } from '@playwright/test';
import path from 'path';
import { AnalysisEngine, createAnalysisEngine } from '../src/analysis';
import { loadConfig } from '../src/config';
import { HashingEmbeddingProvider } from '../src/embeddings';
import { BackendUnavailableError, DimensionMismatchError, NotAFailureError } from '../src/errors';
import { embeddingText, pointId } from '../src/fields';
import { StaticEventSource } from '../src/io';
import { MemoryIndex, type DistanceMetric } from '../src/store';
import type { EventSource, FailurePayload, TestEvent } from '../src/types';
import { ASSERTION_MESSAGE, makeEvent, makeFailure, silent } from './helpers';

const TIMEOUT_ADVICE = 'Timeout error detected. Consider increasing wait times or checking element locators.';
const ASSERTION_ADVICE = 'Assertion failure. Check expected vs actual values in test data.';

class CountingIndex extends MemoryIndex {
  ensureCalls = 0;
  upserts = 0;

  async ensureCollection(dimension: number, distance?: DistanceMetric): Promise<void> {
    this.ensureCalls++;
    return super.ensureCollection(dimension, distance);
  }

  async upsert(id: string, vector: number[], payload: FailurePayload): Promise<string> {
    this.upserts++;
    return super.upsert(id, vector, payload);
  }
}

class FlakyIndex extends MemoryIndex {
  async upsert(id: string, vector: number[], payload: FailurePayload): Promise<string> {
    if (payload.testName === 'testDashboardTitle') throw new BackendUnavailableError('memory index', 'disk full');
    return super.upsert(id, vector, payload);
  }
}

// Refuses any batch holding a text it cannot embed.
class PickyProvider extends HashingEmbeddingProvider {
  batches = 0;

  protected async encode(texts: string[]): Promise<number[][]> {
    this.batches++;
    if (texts.some(t => t.includes('POISON'))) throw new BackendUnavailableError('embeddings', 'rejected input');
    return super.encode(texts);
  }
}

class CountingSource implements EventSource {
  loads = 0;
  constructor(private readonly events: TestEvent[]) {}

  async load(): Promise<TestEvent[]> {
    this.loads++;
    return this.events;
  }
}

async function provider() {
  const embeddings = new HashingEmbeddingProvider('feature-hash-v1', 384, silent);
  await embeddings.init();
  return embeddings;
}

function history() {
  const f1 = makeFailure();
  const f2 = makeFailure();
  const f3 = makeFailure({
    testId: 'com.example.tests.DashboardTest.testDashboardTitle',
    testName: 'testDashboardTitle',
    className: 'com.example.tests.DashboardTest',
    suite: 'Regression',
    message: ASSERTION_MESSAGE,
  });
  return { f1, f2, f3 };
}

test.describe('AnalysisEngine indexing', () => {
  test('indexes failures only and reports counts', async () => {
    const { f1, f2, f3 } = history();
    const events = [makeEvent({ status: 'STARTED' }), f1, makeEvent(), f2, f3, makeEvent()];
    const index = new MemoryIndex('test_failures', {}, silent);
    const engine = new AnalysisEngine({ embeddings: await provider(), index, logger: silent });

    expect(engine.state).toBe('uninitialized');
    expect(await engine.loadAndIndex(events)).toEqual({
      totalEvents: 6,
      failuresIndexed: 3,
      passed: 2,
      started: 1,
      errors: [],
    });
    expect(engine.state).toBe('indexed');
    expect(await index.collectionInfo()).toEqual({ name: 'test_failures', pointsCount: 3 });
  });

  test('indexing the same events again does not duplicate them', async () => {
    const { f1, f2, f3 } = history();
    const index = new MemoryIndex('test_failures', {}, silent);
    const engine = new AnalysisEngine({ embeddings: await provider(), index, logger: silent });

    await engine.loadAndIndex([f1, f2, f3]);
    await engine.loadAndIndex([f1, f2, f3]);
    expect((await index.collectionInfo()).pointsCount).toBe(3);
  });

  test('keeps going when single upserts fail', async () => {
    const { f1, f2, f3 } = history();
    const index = new FlakyIndex('test_failures', {}, silent);
    const engine = new AnalysisEngine({ embeddings: await provider(), index, logger: silent });

    const stats = await engine.loadAndIndex([f1, f3, f2]);
    expect(stats.failuresIndexed).toBe(2);
    expect(stats.errors).toEqual([
      {
        eventId: f3.eventId,
        testName: 'testDashboardTitle',
        kind: 'BackendUnavailable',
        message: 'memory index unavailable: disk full',
      },
    ]);
    expect((await index.collectionInfo()).pointsCount).toBe(2);
  });

  test('collects NotReady for every failure when the provider was never loaded', async () => {
    const { f1, f2 } = history();
    const embeddings = new HashingEmbeddingProvider('feature-hash-v1', 384, silent);
    const engine = new AnalysisEngine({ embeddings, index: new MemoryIndex('t', {}, silent), logger: silent });

    const stats = await engine.loadAndIndex([f1, makeEvent(), f2]);
    expect(stats.failuresIndexed).toBe(0);
    expect(stats.errors.map(e => [e.eventId, e.kind])).toEqual([
      [f1.eventId, 'NotReady'],
      [f2.eventId, 'NotReady'],
    ]);
    expect(stats.errors[0].message).toBe('Embedding provider "feature-hash-v1" is not ready');
  });

  test('one text the provider refuses does not sink the rest of its batch', async () => {
    const { f1, f2 } = history();
    const poison = makeFailure({ testName: 'testPoison', message: 'POISON payload' });
    const embeddings = new PickyProvider('feature-hash-v1', 384, silent);
    await embeddings.init();
    const index = new MemoryIndex('t', {}, silent);
    const engine = new AnalysisEngine({ embeddings, index, logger: silent });

    const stats = await engine.loadAndIndex([f1, poison, f2]);
    expect(stats.failuresIndexed).toBe(2);
    expect(stats.errors).toEqual([
      {
        eventId: poison.eventId,
        testName: 'testPoison',
        kind: 'BackendUnavailable',
        message: 'embeddings unavailable: rejected input',
      },
    ]);
    // one batch call, then one call per text
    expect(embeddings.batches).toBe(4);
    expect((await index.collectionInfo()).pointsCount).toBe(2);
  });

  test('an existing collection of another dimension rejects every vector', async () => {
    const { f1 } = history();
    const index = new MemoryIndex('test_failures', {}, silent);
    await index.ensureCollection(8);
    const engine = new AnalysisEngine({ embeddings: await provider(), index, logger: silent });

    const stats = await engine.loadAndIndex([f1]);
    expect(stats.errors.map(e => e.kind)).toEqual(['DimensionMismatch']);
    await expect(engine.findSimilar('timeout')).rejects.toBeInstanceOf(DimensionMismatchError);
  });
});

test.describe('AnalysisEngine queries', () => {
  test('an empty engine finds nothing', async () => {
    const engine = new AnalysisEngine({ embeddings: await provider(), index: new MemoryIndex('t', {}, silent), logger: silent });
    expect(await engine.findSimilar('TimeoutException waiting for login')).toEqual([]);
    expect(engine.state).toBe('indexed');
  });

  test('ranks the verbatim assertion above its near-duplicate', async () => {
    const exact = makeFailure({ message: 'AssertionError: expected true' });
    const near = makeFailure({ message: 'AssertionError: expected false' });
    const engine = new AnalysisEngine({ embeddings: await provider(), index: new MemoryIndex('t', {}, silent), logger: silent });

    const stats = await engine.loadAndIndex([near, exact]);
    expect(stats.failuresIndexed).toBe(2);

    const results = await engine.findSimilar('AssertionError: expected true');
    expect(results.map(r => r.eventId)).toEqual([exact.eventId, near.eventId]);
    expect(results[0].score).toBeCloseTo(0.4804, 3);
    expect(results[1].score).toBeCloseTo(0.3203, 3);
  });

  test('the first query indexes the source', async () => {
    const { f1, f2, f3 } = history();
    const engine = new AnalysisEngine({
      embeddings: await provider(),
      index: new MemoryIndex('t', {}, silent),
      source: new StaticEventSource([f1, f2, f3]),
      logger: silent,
    });

    const results = await engine.findSimilar(embeddingText(f1));
    expect(results.map(r => r.id)).toEqual([pointId(f1), pointId(f2), pointId(f3)]);
    expect(results[0].score).toBeCloseTo(1, 6);
    expect(results[2].score).toBeCloseTo(0.45, 6);
    expect(results[2]).toMatchObject({ eventId: f3.eventId, testName: 'testDashboardTitle', message: ASSERTION_MESSAGE });
  });

  test('concurrent first queries share one indexing run', async () => {
    const { f1, f2, f3 } = history();
    const index = new CountingIndex('t', {}, silent);
    const source = new CountingSource([f1, f2, f3]);
    const engine = new AnalysisEngine({ embeddings: await provider(), index, source, logger: silent });

    const [a, b, c] = await Promise.all([
      engine.findSimilar(embeddingText(f1)),
      engine.findSimilar(embeddingText(f3)),
      engine.findSimilar('timeout'),
    ]);
    expect(a).toHaveLength(3);
    expect(b[0].id).toBe(pointId(f3));
    expect(c).toEqual([]);
    expect(source.loads).toBe(1);
    expect(index.ensureCalls).toBe(1);
    expect(index.upserts).toBe(3);
  });

  test('topK limits results, per call or per engine', async () => {
    const { f1, f2, f3 } = history();
    const engine = new AnalysisEngine({
      embeddings: await provider(),
      index: new MemoryIndex('t', {}, silent),
      topK: 1,
      logger: silent,
    });
    await engine.loadAndIndex([f1, f2, f3]);

    expect(await engine.findSimilar(embeddingText(f1))).toHaveLength(1);
    expect(await engine.findSimilar(embeddingText(f1), 2)).toHaveLength(2);
  });

  test('analyze flags a recurring timeout', async () => {
    const { f1, f2, f3 } = history();
    const engine = new AnalysisEngine({ embeddings: await provider(), index: new MemoryIndex('t', {}, silent), logger: silent });
    await engine.loadAndIndex([f1, f2, f3]);

    const report = await engine.analyze(f1);
    expect(report).toMatchObject({
      testId: f1.testId,
      testName: 'testLogin',
      className: 'com.example.tests.LoginTest',
      errorMessage: f1.message,
    });
    expect(report.similarFailures).toHaveLength(3);
    expect(report.patterns).toMatchObject({
      recurring: true,
      frequency: 3,
      affectedTests: [
        { name: 'testLogin', count: 2 },
        { name: 'testDashboardTitle', count: 1 },
      ],
    });
    expect(report.patterns.avgSimilarity).toBeCloseTo(0.8167, 4);
    expect(report.recommendation).toBe(`This appears to be a RECURRING failure. Found 3 similar failures. ${TIMEOUT_ADVICE}`);

    const dashboard = await engine.analyze(f3);
    expect(dashboard.similarFailures.map(s => s.eventId)).toEqual([f3.eventId, f1.eventId, f2.eventId]);
    expect(dashboard.recommendation).toBe(`This appears to be a RECURRING failure. Found 3 similar failures. ${ASSERTION_ADVICE}`);
  });

  test('analyze notes very high similarity when every match is near-identical', async () => {
    const { f1, f2 } = history();
    const engine = new AnalysisEngine({ embeddings: await provider(), index: new MemoryIndex('t', {}, silent), logger: silent });
    await engine.loadAndIndex([f1, f2]);

    expect((await engine.analyze(f1)).recommendation).toBe(
      'This appears to be a RECURRING failure. Found 2 similar failures. ' +
        'Very high similarity with past failures - likely same root cause. ' +
        TIMEOUT_ADVICE,
    );
  });

  test('analyze refuses events that are not failures, before touching the index', async () => {
    const index = new CountingIndex('t', {}, silent);
    const engine = new AnalysisEngine({ embeddings: await provider(), index, logger: silent });

    const passed = makeEvent();
    await expect(engine.analyze(passed)).rejects.toBeInstanceOf(NotAFailureError);
    await expect(engine.analyze(makeEvent({ status: 'FAILED', level: 'WARN' }))).rejects.toBeInstanceOf(NotAFailureError);
    expect(index.ensureCalls).toBe(0);
    expect(engine.state).toBe('uninitialized');
  });

  test('summary covers the indexed events and is repeatable', async () => {
    const { f1, f2, f3 } = history();
    const engine = new AnalysisEngine({ embeddings: await provider(), index: new MemoryIndex('t', {}, silent), logger: silent });
    await engine.loadAndIndex([makeEvent(), f1, f2, f3]);

    const first = await engine.summary();
    expect(first).toMatchObject({ totalEvents: 4, totalTests: 4, totalFailures: 3, failureRate: 75 });
    expect(first.index).toEqual({ name: 't', pointsCount: 3 });
    expect(await engine.summary()).toEqual(first);
  });
});

test.describe('createAnalysisEngine', () => {
  test('wires the event log, provider and memory index from config', async () => {
    const config = loadConfig({
      LOGS_PATH: path.join(__dirname, 'fixtures', 'test-events.jsonl'),
      SIMILARITY_THRESHOLD: '0',
    });
    const engine = await createAnalysisEngine(config, silent);

    const results = await engine.findSimilar('TimeoutException waiting for element');
    expect(results.map(r => r.eventId)).toEqual(['e-2']);
    expect((await engine.summary()).totalEvents).toBe(4);
  });
});
