import { WebClient } from '@slack/web-api';
import { errorMessage } from './errors';
import { createLogger, type Logger } from './logger';
import type { SlackSettings } from './config';
import type { AnalysisReport, FailureSummary } from './types';

export function formatSlackSummary(summary: FailureSummary, reports: AnalysisReport[] = []): string {
  const recurring = reports.filter(r => r.patterns.recurring).length;
  const top = summary.failuresByTest
    .slice(0, 3)
    .map(t => `${t.name}:${t.count}`)
    .join(', ');
  return (
    `Failure analysis: ${summary.totalTests} tests | ${summary.totalFailures} failures ` +
    `(${summary.failureRate.toFixed(1)}%) | recurring ${recurring}` +
    (top ? ` | top: ${top}` : '')
  );
}

// Best-effort: missing settings skip the post, API errors are logged.
export async function postSlack(text: string, settings: SlackSettings, log: Logger = createLogger('slack')): Promise<boolean> {
  const { token, channel } = settings;
  if (!token || !channel) return false;
  const client = new WebClient(token);
  try {
    await client.chat.postMessage({ channel, text });
    return true;
  } catch (e) {
    log.warn({ channel, error: errorMessage(e) }, 'slack post failed');
    return false;
  }
}
