/**
 * Gura parse errors: one class, discriminated by kind, with grapheme position and line.
 */

export enum ErrorKind {
  Syntax = 'SyntaxError',
  InvalidIndentation = 'InvalidIndentationError',
  DuplicatedKey = 'DuplicatedKeyError',
  DuplicatedVariable = 'DuplicatedVariableError',
  VariableNotDefined = 'VariableNotDefinedError',
  FileNotFound = 'FileNotFoundError',
  DuplicatedImport = 'DuplicatedImportError',
}

type ConstructorOptions = { position: number; line: number; cause?: unknown };

export class GuraError extends Error {
  override readonly name: string = 'GuraError';
  readonly kind: ErrorKind;
  /** Grapheme offset from the start of the text being parsed. */
  readonly position: number;
  /** 1-based line. */
  readonly line: number;

  constructor(kind: ErrorKind, message: string, options: ConstructorOptions) {
    super(message);
    this.kind = kind;
    this.position = options.position;
    this.line = options.line;
    if (options.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, GuraError.prototype);
  }

  /** Only syntax mismatches let the parser try another alternative. */
  get recoverable(): boolean {
    return this.kind === ErrorKind.Syntax;
  }

  /** Human-readable location string */
  get location(): string {
    return `line ${this.line}, position ${this.position}`;
  }

  override toString(): string {
    return `${this.kind}: ${this.message} (${this.location})`;
  }
}

export function isRecoverable(err: unknown): err is GuraError {
  return err instanceof GuraError && err.recoverable;
}
