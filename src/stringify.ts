/**
 * Gura value to text. Objects nest by 4-space indentation; lists stay on one line unless
 * they hold a non-empty object.
 */

import type { GuraArray, GuraObject, GuraValue } from './ast.js';
import { INDENT } from './indentation.js';
import { formatFloat } from './pretty-float.js';

const SEQUENCES_TO_ESCAPE: ReadonlyMap<string, string> = new Map([
  ['\b', '\\b'],
  ['\f', '\\f'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
  ['"', '\\"'],
  ['\\', '\\\\'],
  ['$', '\\$'],
]);

function escapeString(s: string): string {
  return s.replace(/[\b\f\n\r\t"\\$]/g, (c) => SEQUENCES_TO_ESCAPE.get(c) ?? c);
}

function indentLines(text: string): string[] {
  return text.split('\n').map((line) => INDENT + line);
}

function isNonEmptyObject(value: GuraValue): boolean {
  return value.type === 'object' && value.value.size > 0;
}

function stringifyObject(obj: GuraObject): string {
  if (obj.value.size === 0) return 'empty';

  let result = '';
  for (const [key, value] of obj.value) {
    result += `${key}:`;
    if (isNonEmptyObject(value)) {
      result += '\n';
      for (const line of indentLines(stringifyValue(value).trimEnd())) result += line + '\n';
    } else {
      result += ` ${stringifyValue(value)}\n`;
    }
  }
  return result;
}

function stringifyArray(array: GuraArray): string {
  if (!array.value.some(isNonEmptyObject)) {
    return `[${array.value.map(stringifyValue).join(', ')}]`;
  }

  const elements = array.value.map((item) => indentLines(stringifyValue(item).trimEnd()).join('\n'));
  return `[\n${elements.join(',\n')}\n]`;
}

function stringifyValue(value: GuraValue): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'integer':
    case 'bigInteger':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'string':
      return `"${escapeString(value.value)}"`;
    case 'array':
      return stringifyArray(value);
    case 'object':
      return stringifyObject(value);
  }
}

/**
 * Serialize a Gura value to text. Parsing the output gives back an equal value.
 */
export function dump(value: GuraValue): string {
  return stringifyValue(value).trim();
}
