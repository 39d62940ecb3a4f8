import type { PatternSummary, TestEvent } from './types';

export const VERY_HIGH_SIMILARITY = 0.9;

export type RuleContext = { event: TestEvent; patterns: PatternSummary };

export type RecommendationRule = {
  id: string;
  when: (ctx: RuleContext) => boolean;
  message: (ctx: RuleContext) => string;
};

// Evaluated independently; every rule that holds contributes its message.
export const SIGNAL_RULES: RecommendationRule[] = [
  {
    id: 'recurring',
    when: ({ patterns }) => patterns.recurring,
    message: ({ patterns }) =>
      `This appears to be a RECURRING failure. Found ${patterns.frequency} similar failures.`,
  },
  {
    id: 'high-similarity',
    when: ({ patterns }) => patterns.avgSimilarity > VERY_HIGH_SIMILARITY,
    message: () => 'Very high similarity with past failures - likely same root cause.',
  },
];

// Matched against the error message, first hit wins.
export const ERROR_TYPE_RULES: [RegExp, string, string][] = [
  [/timeout/i, 'timeout', 'Timeout error detected. Consider increasing wait times or checking element locators.'],
  [/element not found|nosuchelement/i, 'locator', 'Element not found. Verify locator strategy and page load state.'],
  [/assertion/i, 'assertion', 'Assertion failure. Check expected vs actual values in test data.'],
];

export const FALLBACK_RULE = {
  id: 'fallback',
  message: 'Review the stack trace for more details on this failure.',
} as const;

export function errorTypeRule(message: string): { id: string; message: string } | undefined {
  for (const [rx, id, text] of ERROR_TYPE_RULES) {
    if (rx.test(message)) return { id, message: text };
  }
  return undefined;
}

/** Fired rules in evaluation order, as (id, message) pairs. */
export function matchRules(ctx: RuleContext): { id: string; message: string }[] {
  const fired = SIGNAL_RULES.filter(r => r.when(ctx)).map(r => ({ id: r.id, message: r.message(ctx) }));
  const errorType = errorTypeRule(ctx.event.message);
  if (errorType) fired.push(errorType);
  if (!fired.length) fired.push({ ...FALLBACK_RULE });
  return fired;
}

export function recommend(event: TestEvent, patterns: PatternSummary): string {
  return matchRules({ event, patterns }).map(r => r.message).join(' ');
}
