import pino from 'pino';
import type { FailurePayload, SimilarityResult, TestEvent } from '../src/types';

export const silent = pino({ level: 'silent' });

export const TIMEOUT_MESSAGE =
  'TimeoutException: Expected condition failed: waiting for visibility of element located by By.id: login-button';
export const ASSERTION_MESSAGE = 'AssertionError: expected [Dashboard] but found [Login]';

let seq = 0;

export function makeEvent(overrides: Partial<TestEvent> = {}): TestEvent {
  seq++;
  return {
    eventId: `evt-${seq}`,
    timestamp: `2024-05-01T10:00:00.${String(seq).padStart(3, '0')}Z`,
    testId: 'com.example.tests.LoginTest.testLogin',
    testName: 'testLogin',
    suite: 'Smoke',
    className: 'com.example.tests.LoginTest',
    environment: 'ci',
    level: 'INFO',
    status: 'PASSED',
    message: 'Test passed successfully',
    durationMs: 1200,
    service: 'selenium-ui-tests',
    attributes: {},
    ...overrides,
  };
}

export function makeFailure(overrides: Partial<TestEvent> = {}): TestEvent {
  return makeEvent({ level: 'ERROR', status: 'FAILED', message: TIMEOUT_MESSAGE, ...overrides });
}

export function makePayload(overrides: Partial<FailurePayload> = {}): FailurePayload {
  return {
    eventId: 'evt',
    testId: 'LoginTest.testLogin',
    testName: 'testLogin',
    className: 'com.example.tests.LoginTest',
    suite: 'Smoke',
    message: 'boom',
    stacktrace: '',
    timestamp: '2024-05-01T10:00:00Z',
    durationMs: 0,
    embeddingText: '',
    extra: {},
    ...overrides,
  };
}

export function makeResult(score: number, overrides: Partial<FailurePayload> = {}): SimilarityResult {
  return { ...makePayload(overrides), id: `pt-${score}`, score };
}
