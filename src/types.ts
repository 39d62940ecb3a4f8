export type TestStatus = 'STARTED' | 'PASSED' | 'FAILED' | 'SKIPPED' | 'OTHER';
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export type TestEvent = {
  eventId: string;
  timestamp: string;
  testId: string;
  testName: string;
  suite: string;
  className: string;
  environment: string;
  level: LogLevel;
  status: TestStatus;
  message: string;
  stacktrace?: string;
  durationMs: number; // 0 = not measured
  service: string;
  attributes: Record<string, string>;
};

// what the index keeps next to each vector
export type FailurePayload = {
  eventId: string;
  testId: string;
  testName: string;
  className: string;
  suite: string;
  message: string;
  stacktrace: string;
  timestamp: string;
  durationMs: number;
  embeddingText: string;
  extra: Record<string, string>;
};

export type SimilarityResult = FailurePayload & {
  id: string;
  score: number;
};

export type FrequencyEntry = { name: string; count: number };

export type PatternSummary = {
  recurring: boolean;
  frequency: number;
  affectedTests: FrequencyEntry[];
  affectedClasses: FrequencyEntry[];
  avgSimilarity: number;
};

export type AnalysisReport = {
  testId: string;
  testName: string;
  className: string;
  errorMessage: string;
  similarFailures: SimilarityResult[];
  patterns: PatternSummary;
  recommendation: string;
};

export type IndexError = {
  eventId: string;
  testName: string;
  kind: string;
  message: string;
};

export type IndexStats = {
  totalEvents: number;
  failuresIndexed: number;
  passed: number;
  started: number;
  errors: IndexError[];
};

export type CollectionInfo = { name: string; pointsCount: number };

export type FailureSummary = {
  totalEvents: number;
  totalTests: number;
  totalFailures: number;
  failureRate: number; // percent of all events
  failuresByClass: FrequencyEntry[];
  failuresByTest: FrequencyEntry[];
  index: CollectionInfo;
};

export interface EventSource {
  load(): Promise<TestEvent[]>;
}
