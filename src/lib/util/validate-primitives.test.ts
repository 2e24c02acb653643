
import { describe, it, expect } from 'vitest';
import {
  isBigInt,
  isBoolean,
  isDate,
  isNumber,
  isObject,
  isString,
} from './validate-primitives';

describe('validate-primitives tests', () => {
  it('tests isObject()', () => {
    expect(isObject({})).toBe(true);
    expect(isObject([])).toBe(true);
    expect(isObject(null)).toBe(false);
    expect(isObject('obj')).toBe(false);
  });

  it('tests isNumber() rejects NaN', () => {
    expect(isNumber(1.5)).toBe(true);
    expect(isNumber(NaN)).toBe(false);
    expect(isNumber('1')).toBe(false);
  });

  it('tests isString()', () => {
    expect(isString('')).toBe(true);
    expect(isString(1)).toBe(false);
  });

  it('tests isBigInt() and isBoolean()', () => {
    expect(isBigInt(1n)).toBe(true);
    expect(isBigInt(1)).toBe(false);
    expect(isBoolean(false)).toBe(true);
    expect(isBoolean(0)).toBe(false);
  });

  it('tests isDate()', () => {
    expect(isDate(new Date(0))).toBe(true);
    expect(isDate(0)).toBe(false);
    expect(isDate({ getTime: () => 0 })).toBe(false);
  });
});
