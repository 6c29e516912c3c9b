/**
 * Indentation levels. Objects nest by indentation, so one stack of levels is shared by
 * the whole document: deeper pairs push, shallower pairs pop and end the block.
 */

import type { Cursor } from './cursor.js';
import { ErrorKind, GuraError } from './errors.js';

export const INDENT = '    ';
export const INDENT_WIDTH = INDENT.length;

interface Site {
  position: number;
  line: number;
}

export interface Indentation {
  /** Leading spaces. */
  level: number;
  /** Where the first tab of the run sits, if any. */
  tab: Site | undefined;
}

/** Consumes the blanks at the start of a line. */
export function readIndentation(input: Cursor): Indentation {
  let level = 0;
  let tab: Site | undefined;
  for (;;) {
    const site = { position: input.pos, line: input.line };
    const blank = input.maybeKeyword([' ', '\t']);
    if (blank === undefined) break;
    if (blank === '\t') tab ??= site;
    else level++;
  }
  return { level, tab };
}

function indentationError(message: string, site: Site): GuraError {
  return new GuraError(ErrorKind.InvalidIndentation, message, site);
}

/**
 * Places a pair at `indentation` on the stack. Returns false when the pair belongs to an
 * enclosing block: the current level is popped and the caller must give the pair back.
 */
export function enterPair(input: Cursor, indentation: Indentation, keySite: Site): boolean {
  if (indentation.tab !== undefined) {
    throw indentationError('Tabs are not allowed to define indentation blocks', indentation.tab);
  }

  const { level } = indentation;
  if (level % INDENT_WIDTH !== 0) {
    throw indentationError(`Indentation block (${level}) must be divisible by ${INDENT_WIDTH}`, keySite);
  }

  const last = input.lastIndentationLevel();
  if (last === undefined) {
    if (level !== 0) {
      throw indentationError(`The first pair must not be indented (found ${level} spaces)`, keySite);
    }
    input.indentationLevels.push(level);
    return true;
  }

  if (level > last) {
    input.indentationLevels.push(level);
  } else if (level < last) {
    input.popIndentationLevel();
    return false;
  }
  return true;
}

/** A nested object must sit exactly one step deeper than the pair that owns it. */
export function checkChildLevel(key: string, parentLevel: number, childLevel: number, keySite: Site): void {
  if (childLevel === parentLevel) {
    throw indentationError(`Wrong level for parent with key ${key}`, keySite);
  }
  if (Math.abs(childLevel - parentLevel) !== INDENT_WIDTH) {
    throw indentationError(
      `Difference between different indentation levels must be ${INDENT_WIDTH}`,
      keySite
    );
  }
}

/** Objects inside a list pop their own levels; puts the owning pair's level back on top. */
export function resetLevel(input: Cursor, level: number): void {
  input.popIndentationLevel();
  input.indentationLevels.push(level);
}
