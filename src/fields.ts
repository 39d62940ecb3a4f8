// Derived views over a TestEvent. Everything here is a pure function of the
// event so embeddings and index keys can be recomputed at any time.

import { createHash } from 'crypto';
import type { FailurePayload, TestEvent } from './types';

export const EMBEDDING_STACK_LINES = 10;
export const SIGNATURE_STACK_LINES = 5;

export function isFailure(e: TestEvent): boolean {
  return e.status === 'FAILED' && e.level === 'ERROR';
}

export function embeddingText(e: TestEvent): string {
  const parts = [
    `Test failure in ${e.testName}`,
    `Class: ${e.className}`,
    `Suite: ${e.suite}`,
    `Error message: ${e.message}`,
  ];
  if (e.stacktrace) {
    const lines = e.stacktrace.split('\n').slice(0, EMBEDDING_STACK_LINES);
    parts.push(`Stacktrace: ${lines.join(' ')}`);
  }
  return parts.join(' ');
}

/** One-line summary for logs and reports; empty for non-failures. */
export function failureSignature(e: TestEvent): string {
  if (!isFailure(e)) return '';
  const parts = [`Test: ${e.testName}`, `Class: ${e.className}`, `Error: ${e.message}`];
  const head = (e.stacktrace ?? '')
    .split('\n')
    .slice(0, SIGNATURE_STACK_LINES)
    .find(line => line.trim() && !line.startsWith('\t'));
  if (head) parts.push(`Exception: ${head.trim()}`);
  return parts.join(' | ');
}

/**
 * Index key for a failure: UUID-shaped SHA-256 of the event id and its
 * embedding text. Indexing the same event twice hits the same key.
 */
export function pointId(e: TestEvent): string {
  const h = createHash('sha256')
    .update(e.eventId)
    .update('\u0000')
    .update(embeddingText(e))
    .digest('hex');
  return [h.slice(0, 8), h.slice(8, 12), h.slice(12, 16), h.slice(16, 20), h.slice(20, 32)].join('-');
}

export function toPayload(e: TestEvent): FailurePayload {
  return {
    eventId: e.eventId,
    testId: e.testId,
    testName: e.testName,
    className: e.className,
    suite: e.suite,
    message: e.message,
    stacktrace: e.stacktrace ?? '',
    timestamp: e.timestamp,
    durationMs: e.durationMs,
    embeddingText: embeddingText(e),
    extra: { ...e.attributes },
  };
}
