/**
 * Ordered choice with rollback. When every alternative fails, the failure that got
 * furthest into the input is reported.
 */

import type { Cursor } from './cursor.js';
import { isRecoverable, type GuraError } from './errors.js';

export type Rule<T> = (input: Cursor) => T;

/**
 * Tries each rule in order and returns the first success. A failed rule is rolled back
 * (position, line, indentation stack). Errors other than syntax mismatches abort at once.
 */
export function matches<T>(input: Cursor, rules: readonly Rule<T>[]): T {
  let furthest: GuraError | undefined;

  for (const rule of rules) {
    const snapshot = input.snapshot();
    try {
      return rule(input);
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      input.restore(snapshot);
      input.noteFailure(err);
      if (furthest === undefined || err.position > furthest.position) furthest = err;
    }
  }

  throw furthest ?? input.syntaxError('No rule to match');
}

/** Like matches() but a syntax mismatch yields undefined, with the cursor unchanged. */
export function maybeMatch<T>(input: Cursor, rules: readonly Rule<T>[]): T | undefined {
  try {
    return matches(input, rules);
  } catch (err) {
    if (isRecoverable(err)) return undefined;
    throw err;
  }
}
