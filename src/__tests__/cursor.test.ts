import { describe, it, expect, vi } from 'vitest';
import { graphemes } from '../cursor.js';
import { ErrorKind, GuraError } from '../errors.js';
import { cursor, thrown } from './helpers.js';

describe('graphemes', () => {
  it('keeps \\r\\n and emoji sequences together', () => {
    expect(graphemes('a\r\nb')).toEqual(['a', '\r\n', 'b']);
    expect(graphemes('👨‍👩‍👧x')).toHaveLength(2);
  });
});

describe('Cursor', () => {
  it('steps over graphemes, not code units', () => {
    const input = cursor('é👍a');
    expect(input.char()).toBe('é');
    expect(input.char()).toBe('👍');
    expect(input.char()).toBe('a');
    expect(input.atEnd()).toBe(true);
  });

  it('advances the line on every line terminator', () => {
    const input = cursor('a\r\nb\fc');
    expect(input.char()).toBe('a');
    expect(input.char()).toBe('\r\n');
    expect(input.line).toBe(2);
    input.char();
    input.char();
    expect(input.line).toBe(3);
    expect(input.pos).toBe(4);
  });

  it('matches character ranges', () => {
    const input = cursor('7x');
    expect(input.char('0-9')).toBe('7');
    const err = thrown(() => input.char('0-9'));
    expect(err).toBeInstanceOf(GuraError);
    expect(err).toMatchObject({
      kind: ErrorKind.Syntax,
      message: "Expected '[0-9]' but got 'x'",
      position: 1,
    });
    expect(input.pos).toBe(1);
  });

  it('reports the end of the text', () => {
    expect(thrown(() => cursor('').char())).toMatchObject({
      message: "Expected 'next character' but got end of string",
    });
    expect(thrown(() => cursor('').char('a-z'))).toMatchObject({
      message: "Expected '[a-z]' but got end of string",
    });
  });

  it('treats a trailing dash as a literal', () => {
    expect(cursor('-').char('+._-')).toBe('-');
  });

  it('rejects an inverted range', () => {
    expect(() => cursor('a').char('z-a')).toThrow(RangeError);
  });

  it('consumes the first keyword that matches', () => {
    const input = cursor('"""text');
    expect(input.keyword(['"""', '"'])).toBe('"""');
    expect(input.pos).toBe(3);
    expect(input.maybeKeyword(['x'])).toBeUndefined();
    expect(input.pos).toBe(3);
  });

  it('looks ahead without consuming', () => {
    const input = cursor('],');
    expect(input.lookingAt([',', ']'])).toBe(true);
    expect(input.lookingAt(['['])).toBe(false);
    expect(input.pos).toBe(0);
  });

  it('restores position, line and indentation levels from a snapshot', () => {
    const input = cursor('a\nb');
    input.indentationLevels.push(0);
    const snapshot = input.snapshot();
    input.char();
    input.char();
    input.indentationLevels.push(4);
    input.restore(snapshot);
    expect(input.pos).toBe(0);
    expect(input.line).toBe(1);
    expect(input.indentationLevels).toEqual([0]);
  });

  it('keeps only the deepest failure', () => {
    const input = cursor('abc');
    input.noteFailure(new GuraError(ErrorKind.Syntax, 'first', { position: 2, line: 1 }));
    input.noteFailure(new GuraError(ErrorKind.Syntax, 'second', { position: 2, line: 1 }));
    input.noteFailure(new GuraError(ErrorKind.Syntax, 'third', { position: 1, line: 1 }));
    expect(input.furthestFailure?.message).toBe('first');
  });

  it('starts over on restart', () => {
    const input = cursor('abc');
    input.char();
    input.indentationLevels.push(0);
    input.restart('xy');
    expect(input.pos).toBe(0);
    expect(input.slice(0)).toBe('xy');
    expect(input.indentationLevels).toEqual([]);
    expect(input.furthestFailure).toBeUndefined();
  });

  it('scans optional graphemes without raising errors', () => {
    const input = cursor('ab');
    const raised = vi.spyOn(input, 'syntaxError');
    expect(input.maybeChar('0-9')).toBeUndefined();
    expect(input.maybeKeyword(['b'])).toBeUndefined();
    expect(input.maybeKeyword(['x', 'a'])).toBe('a');
    expect(input.maybeChar()).toBe('b');
    expect(input.maybeChar()).toBeUndefined();
    expect(input.lookingAt(['c'])).toBe(false);
    expect(raised).not.toHaveBeenCalled();
  });

  it('refuses text over the length limit', () => {
    expect(thrown(() => cursor('abc', 2))).toMatchObject({
      kind: ErrorKind.Syntax,
      message: 'Input exceeds maximum length (3 > 2)',
      position: 0,
      line: 1,
    });
  });
});
