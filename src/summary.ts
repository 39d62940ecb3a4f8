import { isFailure } from './fields';
import { rankBy } from './patterns';
import type { CollectionInfo, FailureSummary, TestEvent } from './types';

export function summarize(events: TestEvent[], index: CollectionInfo): FailureSummary {
  const failures = events.filter(isFailure);
  return {
    totalEvents: events.length,
    totalTests: events.filter(e => e.status === 'PASSED' || e.status === 'FAILED').length,
    totalFailures: failures.length,
    // rate over every event, STARTED records included
    failureRate: events.length ? (failures.length * 100) / events.length : 0,
    failuresByClass: rankBy(failures, f => f.className),
    failuresByTest: rankBy(failures, f => f.testName),
    index,
  };
}
