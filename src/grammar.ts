/**
 * Gura grammar rules. Each rule consumes from the cursor and either returns its match or
 * throws a syntax GuraError; the combinator takes care of rolling back.
 */

import {
  arrayValue,
  nullValue,
  boolValue,
  objectValue,
  stringValue,
  type GuraObject,
  type GuraValue,
  type VariableValue,
} from './ast.js';
import { matches, maybeMatch } from './combinator.js';
import { isNewLine, NEW_LINE_CHARS, type Cursor } from './cursor.js';
import { ErrorKind, GuraError } from './errors.js';
import { checkChildLevel, enterPair, readIndentation, resetLevel } from './indentation.js';
import { NUMBER_CHARS, parseNumberLiteral } from './number.js';
import { variableText } from './variables.js';

/** Acceptable chars for keys and variable names. */
const KEY_CHARS = '0-9A-Za-z_';
const HEX_DIGITS = '0-9a-fA-F';
const BLANKS = [' ', '\t'];
const WS_AND_NEW_LINES = ' \t' + NEW_LINE_CHARS;
/** A newline right after an opening triple quote is dropped. */
const LEADING_NEW_LINE = '\n\r\n';

const ESCAPE_SEQUENCES: ReadonlyMap<string, string> = new Map([
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['"', '"'],
  ['\\', '\\'],
  ['$', '$'],
]);

/** Ends the object being collected; also stands for an object with no pairs. */
export const BREAK_PARENT: unique symbol = Symbol('breakParent');
export type BreakParent = typeof BREAK_PARENT;

interface Site {
  position: number;
  line: number;
}

export interface Pair {
  type: 'pair';
  key: string;
  value: GuraValue;
  indentation: number;
  keySite: Site;
}

/** An object still tagged with the indentation of its pairs. */
export interface IndentedObject {
  type: 'indentedObject';
  value: GuraObject;
  indentation: number;
}

export interface ImportDirective extends Site {
  type: 'import';
  path: string;
}

export const USELESS_LINE = { type: 'uselessLine' } as const;
export const VARIABLE_DEFINED = { type: 'variableDefined' } as const;

type AnyValue = GuraValue | IndentedObject | BreakParent;
type ObjectItem = Pair | BreakParent | typeof USELESS_LINE | typeof VARIABLE_DEFINED;

function site(input: Cursor): Site {
  return { position: input.pos, line: input.line };
}

/* ---------------------------------------------------------------------------
 * Whitespace, new lines and comments
 * ------------------------------------------------------------------------- */

/** Blanks (spaces and tabs). Never fails. */
export function ws(input: Cursor): void {
  while (input.maybeKeyword(BLANKS) !== undefined) continue;
}

export function newLine(input: Cursor): boolean {
  return input.maybeChar(NEW_LINE_CHARS) !== undefined;
}

export function eatWsAndNewLines(input: Cursor): void {
  while (input.maybeChar(WS_AND_NEW_LINES) !== undefined) continue;
}

/** `#` up to the line terminator, which is left in place. */
export function comment(input: Cursor): true {
  input.keyword(['#']);
  for (;;) {
    const next = input.peek();
    if (next === undefined || isNewLine(next)) return true;
    input.char();
  }
}

/** Blanks, an optional comment, then a line terminator (optional after a final comment). */
export function uselessLine(input: Cursor): typeof USELESS_LINE {
  ws(input);
  const hasComment = input.lookingAt(['#']) && comment(input);
  const hasNewLine = newLine(input);
  if (!hasComment && !hasNewLine) input.fail('Expected a blank line or a comment');
  return USELESS_LINE;
}

/* ---------------------------------------------------------------------------
 * Values
 * ------------------------------------------------------------------------- */

export function anyType(input: Cursor): AnyValue {
  const primitive = maybeMatch(input, [primitiveType]);
  if (primitive !== undefined) return primitive;
  return matches<AnyValue>(input, [list, object]);
}

export function primitiveType(input: Cursor): GuraValue {
  ws(input);
  return matches<GuraValue>(input, [
    nullRule,
    boolean,
    basicString,
    literalString,
    number,
    variableValue,
    emptyObject,
  ]);
}

function nullRule(input: Cursor): GuraValue {
  input.keyword(['null']);
  return nullValue();
}

/** `empty` is the only spelling of an object without pairs. */
function emptyObject(input: Cursor): GuraValue {
  input.keyword(['empty']);
  return objectValue();
}

function boolean(input: Cursor): GuraValue {
  return boolValue(input.keyword(['true', 'false']) === 'true');
}

export function basicString(input: Cursor): GuraValue {
  const quote = input.keyword(['"""', '"']);
  const multiline = quote === '"""';
  if (multiline) input.maybeChar(LEADING_NEW_LINE);

  let result = '';
  for (;;) {
    if (input.maybeKeyword([quote]) !== undefined) break;

    const at = site(input);
    const current = input.char();
    if (current === '\\') {
      const escape = input.char();
      if (multiline && isNewLine(escape)) {
        // Line continuation
        eatWsAndNewLines(input);
      } else if (escape === 'u' || escape === 'U') {
        result += unicodeEscape(input, escape === 'u' ? 4 : 8);
      } else {
        result += ESCAPE_SEQUENCES.get(escape) ?? current + escape;
      }
    } else if (current === '$') {
      const name = variableName(input);
      result += variableText(input.variables.resolve(name, at));
    } else {
      result += current;
    }
  }

  return stringValue(result);
}

function unicodeEscape(input: Cursor, digits: number): string {
  let hex = '';
  for (let i = 0; i < digits; i++) hex += input.char(HEX_DIGITS);
  const codePoint = parseInt(hex, 16);
  if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    input.fail(`Bad hex value '${hex}'`);
  }
  return String.fromCodePoint(codePoint);
}

/** No escaping and no interpolation. */
export function literalString(input: Cursor): GuraValue {
  const quote = input.keyword(["'''", "'"]);
  if (quote === "'''") input.maybeChar(LEADING_NEW_LINE);

  let result = '';
  while (input.maybeKeyword([quote]) === undefined) {
    result += input.char();
  }
  return stringValue(result);
}

export function number(input: Cursor): GuraValue {
  let literal = input.char(NUMBER_CHARS);
  for (;;) {
    const next = input.maybeChar(NUMBER_CHARS);
    if (next === undefined) break;
    literal += next;
  }

  const value = parseNumberLiteral(literal);
  if (value === undefined) input.fail(`'${literal}' is not a valid number`);
  return value;
}

/** `$name` outside a string: the variable's own typed value. */
export function variableValue(input: Cursor): VariableValue {
  const at = site(input);
  input.keyword(['$']);
  const name = matches(input, [unquotedString]);
  return input.variables.resolve(name, at);
}

function variableName(input: Cursor): string {
  let name = '';
  for (;;) {
    const next = input.maybeChar(KEY_CHARS);
    if (next === undefined) return name;
    name += next;
  }
}

export function unquotedString(input: Cursor): string {
  return input.char(KEY_CHARS) + variableName(input);
}

/** An unquoted string followed by a colon. */
export function key(input: Cursor): string {
  const first = input.maybeChar(KEY_CHARS);
  if (first === undefined) input.fail(`Expected string but got '${input.peek() ?? 'end of string'}'`);
  const name = first + variableName(input);
  input.keyword([':']);
  return name;
}

export function list(input: Cursor): GuraValue {
  ws(input);
  input.keyword(['[']);

  const items: GuraValue[] = [];
  for (;;) {
    if (maybeMatch(input, [uselessLine]) !== undefined) continue;

    const item = maybeMatch(input, [anyType]);
    if (item === undefined) break;
    if (item !== BREAK_PARENT) items.push(item.type === 'indentedObject' ? item.value : item);

    ws(input);
    newLine(input);
    if (input.maybeKeyword([',']) === undefined) break;
  }

  ws(input);
  newLine(input);
  input.keyword([']']);
  return arrayValue(items);
}

/* ---------------------------------------------------------------------------
 * Objects and pairs
 * ------------------------------------------------------------------------- */

/**
 * Collects pairs until a shallower pair, a list delimiter or anything that is not a pair,
 * variable or useless line shows up.
 */
export function object(input: Cursor): IndentedObject | BreakParent {
  const entries = new Map<string, GuraValue>();
  let indentation = 0;

  while (!input.atEnd()) {
    const item = maybeMatch<ObjectItem>(input, [variable, pair, uselessLine]);
    if (item === undefined) {
      if (entries.size > 0 && atListDelimiter(input)) input.popIndentationLevel();
      break;
    }
    if (item === BREAK_PARENT) break;

    if (item.type === 'pair') {
      if (entries.has(item.key)) {
        throw new GuraError(
          ErrorKind.DuplicatedKey,
          `The key '${item.key}' has been already defined`,
          item.keySite
        );
      }
      entries.set(item.key, item.value);
      indentation = item.indentation;
    }

    if (entries.size > 0 && atListDelimiter(input)) {
      input.popIndentationLevel();
      break;
    }
  }

  if (entries.size === 0) return BREAK_PARENT;
  return { type: 'indentedObject', value: objectValue(entries), indentation };
}

/** `]` or `,` ahead on this line: the end of an object inside a list. */
function atListDelimiter(input: Cursor): boolean {
  const start = input.snapshot();
  ws(input);
  const found = input.lookingAt([']', ',']);
  input.rewind(start);
  return found;
}

export function pair(input: Cursor): Pair | BreakParent {
  const start = input.snapshot();
  const indentation = readIndentation(input);
  const keySite = site(input);
  const name = matches(input, [key]);
  ws(input);

  if (!enterPair(input, indentation, keySite)) {
    // The pair belongs to an enclosing object, which reads it again
    input.rewind(start);
    return BREAK_PARENT;
  }

  const matched = matches(input, [anyType]);
  if (matched === BREAK_PARENT) input.fail('Invalid pair');

  let value: GuraValue;
  if (matched.type === 'indentedObject') {
    checkChildLevel(name, indentation.level, matched.indentation, keySite);
    value = matched.value;
  } else {
    value = matched;
  }

  if (value.type === 'array') resetLevel(input, indentation.level);

  newLine(input);
  return { type: 'pair', key: name, value, indentation: indentation.level, keySite };
}

/* ---------------------------------------------------------------------------
 * Variables and imports
 * ------------------------------------------------------------------------- */

/** `$name: value`. Stores the variable and contributes nothing to the object. */
export function variable(input: Cursor): typeof VARIABLE_DEFINED {
  const at = site(input);
  input.keyword(['$']);
  const name = matches(input, [key]);
  ws(input);

  const value = matches<GuraValue>(input, [basicString, literalString, number, variableValue]);
  if (value.type !== 'integer' && value.type !== 'float' && value.type !== 'string') {
    input.fail('Invalid variable value');
  }

  input.variables.define(name, value, at);
  return VARIABLE_DEFINED;
}

/** Double quoted, `$name` interpolated, no escapes. */
function quotedStringWithVar(input: Cursor): string {
  input.keyword(['"']);
  let result = '';
  for (;;) {
    const at = site(input);
    const current = input.char();
    if (current === '"') return result;
    if (current === '$') {
      const name = variableName(input);
      result += variableText(input.variables.resolve(name, at));
    } else {
      result += current;
    }
  }
}

/** `import "path"`: exactly one space, then the quoted path. */
export function guraImport(input: Cursor): ImportDirective {
  const at = site(input);
  input.keyword(['import']);
  input.char(' ');
  const path = quotedStringWithVar(input);
  ws(input);
  newLine(input);
  return { type: 'import', path, ...at };
}
