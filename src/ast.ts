/**
 * Gura value types.
 * Integers keep 64/128-bit precision as bigint; objects keep insertion order.
 */

export interface GuraNull {
  readonly type: 'null';
}

export interface GuraBool {
  readonly type: 'bool';
  readonly value: boolean;
}

/** Signed 64-bit integer. */
export interface GuraInteger {
  readonly type: 'integer';
  readonly value: bigint;
}

/** Signed 128-bit integer, produced when a literal overflows 64 bits. */
export interface GuraBigInteger {
  readonly type: 'bigInteger';
  readonly value: bigint;
}

export interface GuraFloat {
  readonly type: 'float';
  readonly value: number;
}

export interface GuraString {
  readonly type: 'string';
  readonly value: string;
}

export interface GuraArray {
  readonly type: 'array';
  readonly value: GuraValue[];
}

export interface GuraObject {
  readonly type: 'object';
  readonly value: Map<string, GuraValue>;
}

export type GuraValue =
  | GuraNull
  | GuraBool
  | GuraInteger
  | GuraBigInteger
  | GuraFloat
  | GuraString
  | GuraArray
  | GuraObject;

/** Scalar kinds a `$name: value` definition may hold. */
export type VariableValue = GuraInteger | GuraFloat | GuraString;

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;
export const I128_MIN = -(2n ** 127n);
export const I128_MAX = 2n ** 127n - 1n;

export function nullValue(): GuraNull {
  return { type: 'null' };
}

export function boolValue(value: boolean): GuraBool {
  return { type: 'bool', value };
}

export function integerValue(value: number | bigint): GuraInteger {
  return { type: 'integer', value: BigInt(value) };
}

export function bigIntegerValue(value: bigint): GuraBigInteger {
  return { type: 'bigInteger', value };
}

export function floatValue(value: number): GuraFloat {
  return { type: 'float', value };
}

export function stringValue(value: string): GuraString {
  return { type: 'string', value };
}

export function arrayValue(items: Iterable<GuraValue> = []): GuraArray {
  return { type: 'array', value: [...items] };
}

/** Builds an object from entries or a plain record, keeping their order. */
export function objectValue(entries: ObjectEntries = []): GuraObject {
  const source = isEntryIterable(entries) ? entries : Object.entries(entries);
  const map = new Map<string, GuraValue>();
  for (const [key, value] of source) map.set(key, value);
  return { type: 'object', value: map };
}

type ObjectEntries = Iterable<readonly [string, GuraValue]> | Record<string, GuraValue>;

function isEntryIterable(v: ObjectEntries): v is Iterable<readonly [string, GuraValue]> {
  return Symbol.iterator in v;
}

export function isGuraObject(v: GuraValue): v is GuraObject {
  return v.type === 'object';
}

export function isGuraArray(v: GuraValue): v is GuraArray {
  return v.type === 'array';
}

export function isGuraString(v: GuraValue): v is GuraString {
  return v.type === 'string';
}

/** True for both 64-bit and 128-bit integers. */
export function isGuraInteger(v: GuraValue): v is GuraInteger | GuraBigInteger {
  return v.type === 'integer' || v.type === 'bigInteger';
}

export function isGuraFloat(v: GuraValue): v is GuraFloat {
  return v.type === 'float';
}

export function isGuraBool(v: GuraValue): v is GuraBool {
  return v.type === 'bool';
}

export function isGuraNull(v: GuraValue): v is GuraNull {
  return v.type === 'null';
}

/**
 * Structural equality. NaN equals NaN; object key order is not significant.
 */
export function valuesEqual(a: GuraValue, b: GuraValue): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'bool':
      return b.type === 'bool' && b.value === a.value;
    case 'integer':
      return b.type === 'integer' && b.value === a.value;
    case 'bigInteger':
      return b.type === 'bigInteger' && b.value === a.value;
    case 'string':
      return b.type === 'string' && b.value === a.value;
    case 'float':
      if (b.type !== 'float') return false;
      return (Number.isNaN(a.value) && Number.isNaN(b.value)) || a.value === b.value;
    case 'array':
      if (b.type !== 'array' || a.value.length !== b.value.length) return false;
      return a.value.every((item, i) => {
        const other = b.value[i];
        return other !== undefined && valuesEqual(item, other);
      });
    case 'object': {
      if (b.type !== 'object' || a.value.size !== b.value.size) return false;
      for (const [key, item] of a.value) {
        const other = b.value.get(key);
        if (other === undefined || !valuesEqual(item, other)) return false;
      }
      return true;
    }
  }
}
