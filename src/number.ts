/**
 * Number literal classification: radix integers, decimal integers (64-bit, then 128-bit),
 * floats and the inf/nan spellings.
 */

import {
  bigIntegerValue,
  floatValue,
  I128_MAX,
  I128_MIN,
  I64_MAX,
  I64_MIN,
  type GuraBigInteger,
  type GuraFloat,
  type GuraInteger,
} from './ast.js';

/** Every grapheme a number literal may contain. `-` must stay last. */
export const NUMBER_CHARS = '0-9A-Fa-fxobinEe+._-';

const RADIX_PREFIXES = ['0x', '0o', '0b'];
const DECIMAL_INTEGER = /^[+-]?\d+$/;
const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type NumberValue = GuraInteger | GuraBigInteger | GuraFloat;

/** Returns undefined when the literal is not a number. */
export function parseNumberLiteral(literal: string): NumberValue | undefined {
  const text = literal.replace(/_/g, '');

  if (RADIX_PREFIXES.includes(text.slice(0, 2))) {
    if (text.length === 2) return undefined;
    try {
      return classifyInteger(BigInt(text));
    } catch {
      return undefined;
    }
  }

  if (text.endsWith('inf')) {
    return floatValue(text.startsWith('-') ? -Infinity : Infinity);
  }
  if (text.endsWith('nan')) return floatValue(NaN);

  if (/[Ee.]/.test(text)) {
    return DECIMAL_FLOAT.test(text) ? floatValue(Number(text)) : undefined;
  }
  return DECIMAL_INTEGER.test(text) ? classifyInteger(BigInt(text)) : undefined;
}

function classifyInteger(value: bigint): GuraInteger | GuraBigInteger | undefined {
  if (value >= I64_MIN && value <= I64_MAX) return { type: 'integer', value };
  if (value >= I128_MIN && value <= I128_MAX) return bigIntegerValue(value);
  return undefined;
}
