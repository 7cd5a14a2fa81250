/**
 * Conversion between tagged query outcomes and the response strings stored in artifacts.
 *
 * Artifacts store one string per (test, model) pair: either the model's text or a sentinel.
 * Keeping the tagged form in memory lets callers branch on the failure kind, and
 * {@link parseResponseEntry} recovers it from a stored snapshot.
 */

import { QueryOutcome } from './types';

export const NO_RESPONSE_SENTINEL = '[NO RESPONSE]';
export const TIMEOUT_SENTINEL = '[TIMEOUT]';

const ERROR_SENTINEL_PATTERN = /^\[ERROR: ([\s\S]*)\]$/;

/**
 * Render an outcome as the string written to the snapshot and table.
 */
export function renderResponseEntry(outcome: QueryOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return outcome.text;
    case 'no_response':
      return NO_RESPONSE_SENTINEL;
    case 'timeout':
      return TIMEOUT_SENTINEL;
    case 'error':
      return `[ERROR: ${outcome.message}]`;
  }
}

/**
 * Classify a stored response string.
 *
 * A model whose literal output equals a sentinel is indistinguishable from the failure it
 * spells, so such text is classified as that failure.
 */
export function parseResponseEntry(entry: string): QueryOutcome {
  if (entry === NO_RESPONSE_SENTINEL) {
    return { kind: 'no_response' };
  }
  if (entry === TIMEOUT_SENTINEL) {
    return { kind: 'timeout' };
  }
  const match = ERROR_SENTINEL_PATTERN.exec(entry);
  if (match) {
    return { kind: 'error', message: match[1] };
  }
  return { kind: 'success', text: entry };
}

/**
 * Short human-readable status for progress lines.
 */
export function describeOutcome(outcome: QueryOutcome): string {
  switch (outcome.kind) {
    case 'success':
      return 'done';
    case 'no_response':
      return 'no response';
    case 'timeout':
      return 'timeout';
    case 'error':
      return `error (${outcome.message})`;
  }
}
