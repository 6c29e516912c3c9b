/**
 * Import expansion. Runs before the grammar: the header of a text (imports, variable
 * definitions and useless lines) is read, and the text is replaced by the imported files,
 * each fully expanded, followed by what comes after the header.
 */

import { dirname, resolve } from 'node:path';
import { maybeMatch } from './combinator.js';
import { Cursor } from './cursor.js';
import { ErrorKind, GuraError } from './errors.js';
import {
  guraImport,
  uselessLine,
  variable,
  type ImportDirective,
  type USELESS_LINE,
  type VARIABLE_DEFINED,
} from './grammar.js';

type HeaderItem = ImportDirective | typeof USELESS_LINE | typeof VARIABLE_DEFINED;

/**
 * Consumes the header of the cursor's text. Variables defined there go to the shared
 * table. When the header imports anything, the cursor restarts on the imported content
 * followed by the rest of the text; otherwise it stays right after the header.
 * Relative paths resolve against `originDir` (the importing file's directory); without
 * one they resolve against the working directory.
 */
export function expandImports(input: Cursor, originDir?: string): void {
  const directives: ImportDirective[] = [];

  while (!input.atEnd()) {
    const item = maybeMatch<HeaderItem>(input, [guraImport, variable, uselessLine]);
    if (item === undefined) break;
    if (item.type === 'import') directives.push(item);
  }
  // Failures past the header are met again by the grammar
  input.furthestFailure = undefined;
  if (directives.length === 0) return;

  let expanded = '';
  for (const directive of directives) {
    expanded += importFile(input, directive, originDir) + '\n';
  }
  input.restart(expanded + input.slice(input.pos));
}

function importFile(input: Cursor, directive: ImportDirective, originDir: string | undefined): string {
  const { fileSystem, importedFiles } = input.context;
  const path = originDir === undefined ? directive.path : resolve(originDir, directive.path);
  const id = resolve(path);

  if (importedFiles.has(id)) {
    throw new GuraError(ErrorKind.DuplicatedImport, `The file ${path} has been already imported`, directive);
  }
  // Recorded before expanding so that a cycle is reported as a duplicate
  importedFiles.add(id);

  if (!fileSystem.exists(path)) {
    throw new GuraError(ErrorKind.FileNotFound, `The file ${path} does not exist`, directive);
  }

  let content: string;
  try {
    content = fileSystem.readFile(path);
  } catch (cause) {
    throw new GuraError(ErrorKind.FileNotFound, `The file ${path} could not be read`, {
      position: directive.position,
      line: directive.line,
      cause,
    });
  }

  const nested = new Cursor(content, input.context);
  expandImports(nested, dirname(path));
  return nested.slice(nested.pos);
}
