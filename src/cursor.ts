/**
 * Grapheme cursor over Gura text, plus the primitive scanners every rule is built from.
 * Position is a grapheme index; a failed scan leaves the cursor untouched.
 */

import { ErrorKind, GuraError } from './errors.js';
import type { FileSystem } from './files.js';
import type { VariableTable } from './variables.js';

/** Line terminators. `\r\n` is a single grapheme cluster. */
export const NEW_LINE_CHARS = '\n\r\n\f\v';
const NEW_LINES: ReadonlySet<string> = new Set(['\n', '\r\n', '\f', '\v']);

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (s) => s.segment);
}

export function isNewLine(grapheme: string): boolean {
  return NEW_LINES.has(grapheme);
}

/** Shared by the cursor of the document and those of every imported file. */
export interface ParseContext {
  /** Variables of the whole document, imported files included. */
  readonly variables: VariableTable;
  readonly fileSystem: FileSystem;
  /** Absolute paths already spliced in. */
  readonly importedFiles: Set<string>;
  readonly maxInputLength: number;
}

export interface Snapshot {
  readonly pos: number;
  readonly line: number;
  readonly indentationLevels: readonly number[];
}

/** A literal grapheme, or an inclusive [bottom, top] range. */
type CharRange = readonly [string] | readonly [string, string];

export class Cursor {
  private text: string[] = [];
  pos = 0;
  line = 1;
  /** Innermost level last; strictly increasing. */
  indentationLevels: number[] = [];
  /** Deepest recoverable failure seen by the combinator since the last restart. */
  furthestFailure: GuraError | undefined;
  private readonly rangeCache = new Map<string, CharRange[]>();

  constructor(
    text: string,
    readonly context: ParseContext
  ) {
    this.restart(text);
  }

  /** Starts over on new text. Defined variables are kept. */
  restart(text: string): void {
    this.text = graphemes(text);
    if (this.text.length > this.context.maxInputLength) {
      throw new GuraError(
        ErrorKind.Syntax,
        `Input exceeds maximum length (${this.text.length} > ${this.context.maxInputLength})`,
        { position: 0, line: 1 }
      );
    }
    this.pos = 0;
    this.line = 1;
    this.indentationLevels = [];
    this.furthestFailure = undefined;
  }

  get variables(): VariableTable {
    return this.context.variables;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string | undefined {
    return this.text[this.pos];
  }

  /** Text between two grapheme offsets. */
  slice(start: number, end: number = this.text.length): string {
    return this.text.slice(start, end).join('');
  }

  snapshot(): Snapshot {
    return { pos: this.pos, line: this.line, indentationLevels: [...this.indentationLevels] };
  }

  restore(snapshot: Snapshot): void {
    this.pos = snapshot.pos;
    this.line = snapshot.line;
    this.indentationLevels = [...snapshot.indentationLevels];
  }

  /** Moves back to an earlier position, leaving the indentation stack as it is. */
  rewind(to: Pick<Snapshot, 'pos' | 'line'>): void {
    this.pos = to.pos;
    this.line = to.line;
  }

  /** Keeps the failure if it lies deeper than every one seen so far. */
  noteFailure(err: GuraError): void {
    if (this.furthestFailure === undefined || err.position > this.furthestFailure.position) {
      this.furthestFailure = err;
    }
  }

  syntaxError(message: string): GuraError {
    return new GuraError(ErrorKind.Syntax, message, { position: this.pos, line: this.line });
  }

  fail(message: string): never {
    throw this.syntaxError(message);
  }

  lastIndentationLevel(): number | undefined {
    return this.indentationLevels[this.indentationLevels.length - 1];
  }

  popIndentationLevel(): void {
    this.indentationLevels.pop();
  }

  private advance(): string {
    const grapheme = this.text[this.pos] ?? '';
    this.pos++;
    if (NEW_LINES.has(grapheme)) this.line++;
    return grapheme;
  }

  /**
   * Consumes the next grapheme. With `chars`, only if it is listed there;
   * `a-z` style ranges are allowed, a literal `-` must come last.
   */
  char(chars?: string): string {
    const next = this.text[this.pos];
    if (next === undefined) {
      this.fail(`Expected ${chars === undefined ? 'next character' : `'[${chars}]'`} but got end of string`);
    }
    if (!this.accepts(next, chars)) this.fail(`Expected '[${chars}]' but got '${next}'`);
    return this.advance();
  }

  maybeChar(chars?: string): string | undefined {
    const next = this.text[this.pos];
    if (next === undefined || !this.accepts(next, chars)) return undefined;
    return this.advance();
  }

  /** Consumes the first of `keywords` found at the cursor. */
  keyword(keywords: readonly string[]): string {
    if (this.atEnd()) {
      this.fail(`Expected '${keywords.join(', ')}' but got end of string`);
    }
    const found = this.maybeKeyword(keywords);
    if (found === undefined) this.fail(`Expected '${keywords.join(', ')}' but got '${this.peek() ?? ''}'`);
    return found;
  }

  maybeKeyword(keywords: readonly string[]): string | undefined {
    for (const keyword of keywords) {
      const count = this.graphemesMatching(keyword);
      if (count > 0) {
        for (let i = 0; i < count; i++) this.advance();
        return keyword;
      }
    }
    return undefined;
  }

  /** True when one of `keywords` starts at the cursor. Consumes nothing. */
  lookingAt(keywords: readonly string[]): boolean {
    return keywords.some((keyword) => this.graphemesMatching(keyword) > 0);
  }

  private accepts(grapheme: string, chars: string | undefined): boolean {
    if (chars === undefined) return true;
    return this.charRanges(chars).some((range) => inRange(grapheme, range));
  }

  /** Number of graphemes spelling `keyword` at the cursor, or 0. */
  private graphemesMatching(keyword: string): number {
    let spelled = '';
    let i = this.pos;
    while (spelled.length < keyword.length && i < this.text.length) {
      spelled += this.text[i] ?? '';
      i++;
    }
    return spelled === keyword ? i - this.pos : 0;
  }

  private charRanges(chars: string): CharRange[] {
    const cached = this.rangeCache.get(chars);
    if (cached !== undefined) return cached;

    const parts = graphemes(chars);
    const result: CharRange[] = [];
    let index = 0;
    while (index < parts.length) {
      const first = parts[index] ?? '';
      const last = parts[index + 2];
      if (parts[index + 1] === '-' && last !== undefined) {
        if (first >= last) {
          throw new RangeError(`Invalid character range '${first}-${last}' in '${chars}'`);
        }
        result.push([first, last]);
        index += 3;
      } else {
        result.push([first]);
        index++;
      }
    }

    this.rangeCache.set(chars, result);
    return result;
  }
}

function inRange(grapheme: string, range: CharRange): boolean {
  if (range.length === 1) return grapheme === range[0];
  // Ranges compare code points; a multi-code-point cluster never falls inside one.
  return [...grapheme].length === 1 && range[0] <= grapheme && grapheme <= range[1];
}
