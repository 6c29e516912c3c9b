import { describe, it, expect } from 'vitest';
import { bigIntegerValue, floatValue, integerValue } from '../ast.js';
import { parseNumberLiteral } from '../number.js';
import { parse } from '../parser.js';

describe('parseNumberLiteral', () => {
  it('reads decimal integers', () => {
    expect(parseNumberLiteral('42')).toEqual(integerValue(42));
    expect(parseNumberLiteral('-17')).toEqual(integerValue(-17));
    expect(parseNumberLiteral('+5')).toEqual(integerValue(5));
    expect(parseNumberLiteral('1_000_000')).toEqual(integerValue(1000000));
  });

  it('reads radix integers', () => {
    expect(parseNumberLiteral('0xDEADBEEF')).toEqual(integerValue(3735928559n));
    expect(parseNumberLiteral('0o755')).toEqual(integerValue(493));
    expect(parseNumberLiteral('0b1101')).toEqual(integerValue(13));
    expect(parseNumberLiteral('0xFFFFFFFFFFFFFFFF')).toEqual(bigIntegerValue(18446744073709551615n));
  });

  it('rejects malformed radix literals', () => {
    expect(parseNumberLiteral('0x')).toBeUndefined();
    expect(parseNumberLiteral('0b102')).toBeUndefined();
  });

  it('widens to 128 bits, then gives up', () => {
    expect(parseNumberLiteral('9223372036854775807')).toEqual(integerValue(9223372036854775807n));
    expect(parseNumberLiteral('9223372036854775808')).toEqual(bigIntegerValue(9223372036854775808n));
    expect(parseNumberLiteral('170141183460469231731687303715884105728')).toBeUndefined();
  });

  it('reads floats', () => {
    expect(parseNumberLiteral('3.14')).toEqual(floatValue(3.14));
    expect(parseNumberLiteral('6.02e23')).toEqual(floatValue(6.02e23));
    expect(parseNumberLiteral('1e5')).toEqual(floatValue(100000));
    expect(parseNumberLiteral('1E-2')).toEqual(floatValue(0.01));
    expect(parseNumberLiteral('1.0')).toEqual(floatValue(1));
    expect(parseNumberLiteral('.5')).toEqual(floatValue(0.5));
    expect(parseNumberLiteral('1_000.5')).toEqual(floatValue(1000.5));
  });

  it('reads inf and nan', () => {
    expect(parseNumberLiteral('inf')).toEqual(floatValue(Infinity));
    expect(parseNumberLiteral('+inf')).toEqual(floatValue(Infinity));
    expect(parseNumberLiteral('-inf')).toEqual(floatValue(-Infinity));
    expect(parseNumberLiteral('nan')).toEqual(floatValue(NaN));
    expect(parseNumberLiteral('-nan')).toEqual(floatValue(NaN));
  });

  it('rejects everything else', () => {
    expect(parseNumberLiteral('1.2.3')).toBeUndefined();
    expect(parseNumberLiteral('12e')).toBeUndefined();
    expect(parseNumberLiteral('12abc')).toBeUndefined();
  });
});

describe('numbers in documents', () => {
  it('parses every kind', () => {
    const doc = parse('hex: 0x1F\nbig: 9223372036854775808\npi: 3.5\nnope: -inf');
    expect(doc.value.get('hex')).toEqual(integerValue(31));
    expect(doc.value.get('big')).toEqual(bigIntegerValue(9223372036854775808n));
    expect(doc.value.get('pi')).toEqual(floatValue(3.5));
    expect(doc.value.get('nope')).toEqual(floatValue(-Infinity));
  });

  it('does not take words for numbers', () => {
    expect(parse('e: empty').value.get('e')).toEqual({ type: 'object', value: new Map() });
  });
});
