import { describe, it, expect } from 'vitest';
import { matches, maybeMatch, type Rule } from '../combinator.js';
import { ErrorKind, GuraError } from '../errors.js';
import { cursor, thrown } from './helpers.js';

const aThenX: Rule<number> = (input) => {
  input.char('a');
  input.char('x');
  return 1;
};
const justA: Rule<number> = (input) => {
  input.char('a');
  return 2;
};
const justZ: Rule<number> = (input) => {
  input.char('z');
  return 3;
};

describe('matches', () => {
  it('rolls back a failed rule and takes the next one', () => {
    const input = cursor('ab');
    expect(matches(input, [aThenX, justA])).toBe(2);
    expect(input.pos).toBe(1);
  });

  it('throws the failure that got furthest', () => {
    const input = cursor('ab');
    const err = thrown(() => matches(input, [justZ, aThenX]));
    expect(err).toMatchObject({ message: "Expected '[x]' but got 'b'", position: 1 });
    expect(input.pos).toBe(0);
    expect(input.furthestFailure?.position).toBe(1);
  });

  it('restores the indentation stack', () => {
    const input = cursor('a');
    const pushesThenFails: Rule<number> = (i) => {
      i.indentationLevels.push(4);
      return i.fail('no');
    };
    expect(maybeMatch(input, [pushesThenFails])).toBeUndefined();
    expect(input.indentationLevels).toEqual([]);
  });

  it('lets non-syntax errors through', () => {
    const input = cursor('a');
    const duplicated: Rule<number> = () => {
      throw new GuraError(ErrorKind.DuplicatedKey, 'dup', { position: 0, line: 1 });
    };
    expect(thrown(() => matches(input, [duplicated, justA]))).toMatchObject({ kind: ErrorKind.DuplicatedKey });
    expect(thrown(() => maybeMatch(input, [duplicated]))).toMatchObject({ kind: ErrorKind.DuplicatedKey });
  });

  it('fails without rules', () => {
    expect(thrown(() => matches(cursor('a'), []))).toMatchObject({ message: 'No rule to match' });
  });
});

describe('maybeMatch', () => {
  it('yields undefined and leaves the cursor in place', () => {
    const input = cursor('b');
    expect(maybeMatch(input, [justA])).toBeUndefined();
    expect(input.pos).toBe(0);
  });
});
