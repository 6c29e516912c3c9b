/**
 * Document-scoped variables. Write-once; lookups fall back to the environment.
 */

import { stringValue, type VariableValue } from './ast.js';
import { ErrorKind, GuraError } from './errors.js';

export type Environment = Readonly<Record<string, string | undefined>>;

interface Site {
  position: number;
  line: number;
}

export class VariableTable {
  private readonly values = new Map<string, VariableValue>();

  constructor(private readonly env: Environment) {}

  define(name: string, value: VariableValue, site: Site): void {
    if (this.values.has(name)) {
      throw new GuraError(
        ErrorKind.DuplicatedVariable,
        `Variable '${name}' has been already declared`,
        site
      );
    }
    this.values.set(name, value);
  }

  /** In-document value first, then the environment (always a string). */
  resolve(name: string, site: Site): VariableValue {
    const defined = this.values.get(name);
    if (defined !== undefined) return defined;
    const fromEnv = this.env[name];
    if (fromEnv !== undefined) return stringValue(fromEnv);
    throw new GuraError(
      ErrorKind.VariableNotDefined,
      `Variable '${name}' is not defined in Gura nor as environment variable`,
      site
    );
  }
}

/** Text form used when a variable is interpolated into a string. */
export function variableText(value: VariableValue): string {
  return value.type === 'string' ? value.value : String(value.value);
}
