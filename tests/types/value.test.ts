import { describe, expect, test } from '@jest/globals';
import { classify, formatValue, isNumericText, kindName, toNumber, valuesEqual } from '../../src/types/value';

describe('types/value', () => {
  test('classify covers the JSON kinds', () => {
    expect(classify(null)).toEqual({ kind: 'null' });
    expect(classify(undefined)).toEqual({ kind: 'null' });
    expect(classify(false)).toEqual({ kind: 'boolean', value: false });
    expect(classify(1.5)).toEqual({ kind: 'number', value: 1.5 });
    expect(classify(BigInt(7))).toEqual({ kind: 'number', value: 7 });
    expect(classify('x')).toEqual({ kind: 'string', value: 'x' });
    expect(classify([1]).kind).toBe('array');
    expect(classify({ a: 1 }).kind).toBe('object');
  });

  test('non-JSON values are unsupported', () => {
    const value = classify(() => undefined);
    expect(value).toEqual({ kind: 'unsupported', typeName: 'function' });
    expect(kindName(value)).toBe('function');
    expect(kindName(classify([]))).toBe('array');
  });

  test('isNumericText accepts decimal and exponent forms', () => {
    expect(['12', '-3', '+4.5', '.5', '6.', '1e3', ' 7 '].every(isNumericText)).toBe(true);
    expect(['', 'abc', '1.2.3', '0x10', 'NaN', 'Infinity', '1e'].some(isNumericText)).toBe(false);
  });

  test('toNumber reads numbers and numeric strings only', () => {
    expect(toNumber(3)).toBe(3);
    expect(toNumber('2.5')).toBe(2.5);
    expect(toNumber('two')).toBeNull();
    expect(toNumber(true)).toBeNull();
    expect(toNumber(null)).toBeNull();
  });

  describe('valuesEqual', () => {
    test('requires matching kinds by default', () => {
      expect(valuesEqual(1, 1.0)).toBe(true);
      expect(valuesEqual(1, '1')).toBe(false);
      expect(valuesEqual(null, undefined)).toBe(true);
      expect(valuesEqual(null, 0)).toBe(false);
      expect(valuesEqual(true, 'true')).toBe(false);
    });

    test('optionally coerces numeric strings', () => {
      expect(valuesEqual(1, '1.0', { coerceNumericStrings: true })).toBe(true);
      expect(valuesEqual('2', 2, { coerceNumericStrings: true })).toBe(true);
      expect(valuesEqual('abc', 2, { coerceNumericStrings: true })).toBe(false);
      expect(valuesEqual('1', '1.0', { coerceNumericStrings: true })).toBe(false);
    });

    test('compares arrays and objects structurally', () => {
      expect(valuesEqual([1, [2, 3]], [1, [2, 3]])).toBe(true);
      expect(valuesEqual([1, 2], [2, 1])).toBe(false);
      expect(valuesEqual({ a: 1, b: [true] }, { b: [true], a: 1 })).toBe(true);
      expect(valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
      expect(valuesEqual({ a: undefined }, { b: undefined })).toBe(false);
    });
  });

  test('formatValue prints strings bare and containers as JSON', () => {
    expect(formatValue('text')).toBe('text');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(2)).toBe('2');
    expect(formatValue([1, 'a'])).toBe('[1,"a"]');
    expect(formatValue({ a: null })).toBe('{"a":null}');
  });
});
