/**
 * Gura text parser: expands imports, then reads the document as one top-level object.
 */

import { objectValue, type GuraObject } from './ast.js';
import { matches } from './combinator.js';
import { Cursor } from './cursor.js';
import { nodeFileSystem, type FileSystem } from './files.js';
import { BREAK_PARENT, eatWsAndNewLines, object } from './grammar.js';
import { expandImports } from './imports.js';
import { VariableTable, type Environment } from './variables.js';

export interface ParseOptions {
  /** Looked up when a `$name` is not defined in the document (default process.env). */
  env?: Environment;
  /** File access used by imports (default node:fs). */
  fileSystem?: FileSystem;
  /** Directory top-level imports resolve against (default: working directory). */
  baseDirectory?: string;
  /** Max graphemes in the text, in each imported file and in the text with its imports spliced in (default 1_000_000). */
  maxInputLength?: number;
}

const DEFAULT_MAX_INPUT_LENGTH = 1_000_000;

/**
 * Parses a Gura document. The result is always an object; a document without pairs
 * gives an empty one.
 *
 * @throws GuraError on the first error that no grammar alternative could get past.
 */
export function parse(text: string, options: ParseOptions = {}): GuraObject {
  const input = new Cursor(text, {
    variables: new VariableTable(options.env ?? process.env),
    fileSystem: options.fileSystem ?? nodeFileSystem,
    importedFiles: new Set(),
    maxInputLength: options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH,
  });

  expandImports(input, options.baseDirectory);
  const result = matches(input, [object]);
  eatWsAndNewLines(input);
  assertEnd(input);

  return result === BREAK_PARENT ? objectValue() : result.value;
}

function assertEnd(input: Cursor): void {
  if (input.atEnd()) return;
  const furthest = input.furthestFailure;
  if (furthest !== undefined && furthest.position >= input.pos) throw furthest;
  input.fail(`Expected end of string but got '${input.peek() ?? ''}'`);
}
