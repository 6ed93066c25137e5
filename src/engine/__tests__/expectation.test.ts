import { describe, it, expect } from 'vitest';
import { evaluateExpectation, formatValue, isStructuredExpectation } from '../expectation.js';
import {
  ComparatorNotFoundError,
  InvalidComparatorError,
  InvalidExpectationError,
  InvalidExpectationTypeError,
} from '../errors.js';

describe('evaluateExpectation', () => {
  describe('boolean expectations', () => {
    it('passes only on the identical boolean', () => {
      expect(evaluateExpectation(true, true)).toBe(true);
      expect(evaluateExpectation(false, false)).toBe(true);
      expect(evaluateExpectation(true, false)).toBe(false);
    });

    it('does not accept truthy or falsy non-booleans', () => {
      expect(evaluateExpectation(true, 1)).toBe(false);
      expect(evaluateExpectation(true, 'yes')).toBe(false);
      expect(evaluateExpectation(false, null)).toBe(false);
      expect(evaluateExpectation(false, 0)).toBe(false);
      expect(evaluateExpectation(false, undefined)).toBe(false);
    });
  });

  describe('structured expectations', () => {
    it('applies the named comparator to (expected, actual)', () => {
      expect(evaluateExpectation({ expected: '2.7.9-1', comparison: 'eq' }, '2.7.9-1')).toBe(true);
      expect(evaluateExpectation({ expected: '2.7.9-1', comparison: 'eq' }, '3.0.0')).toBe(false);
      expect(evaluateExpectation({ expected: 1024, comparison: 'lt' }, 4096)).toBe(true);
    });

    it('ignores the parameter key', () => {
      expect(evaluateExpectation({ parameter: 'sshd', expected: true, comparison: 'is_' }, true)).toBe(true);
    });

    it('accepts an explicitly undefined expected value', () => {
      expect(evaluateExpectation({ expected: undefined, comparison: 'is_' }, undefined)).toBe(true);
    });

    it('rejects unknown comparators', () => {
      expect(() => evaluateExpectation({ expected: 1, comparison: 'frobnicate' }, 1)).toThrow(ComparatorNotFoundError);
    });

    it('rejects a missing comparison', () => {
      expect(() => evaluateExpectation({ expected: 1 }, 1)).toThrow(InvalidComparatorError);
      expect(() => evaluateExpectation({ expected: 1 }, 1)).toThrow('Comparison undefined is not a valid selection');
    });

    it('rejects a missing expected value', () => {
      expect(() => evaluateExpectation({ comparison: 'eq' }, 1)).toThrow(InvalidExpectationError);
      expect(() => evaluateExpectation({ comparison: 'eq' }, 1)).toThrow(
        'The comparison object has no key named "expected": {"comparison":"eq"}',
      );
    });
  });

  describe('other expectation shapes', () => {
    it.each([
      ['a string', 'yes', 'string'],
      ['a number', 1, 'number'],
      ['null', null, 'null'],
      ['an array', [true], 'array'],
    ])('rejects %s', (_label, expectation, typeName) => {
      expect(() => evaluateExpectation(expectation, true)).toThrow(InvalidExpectationTypeError);
      expect(() => evaluateExpectation(expectation, true)).toThrow(
        `Expected boolean or object but received ${typeName}`,
      );
    });
  });
});

describe('isStructuredExpectation', () => {
  it('accepts plain objects only', () => {
    expect(isStructuredExpectation({ expected: 1, comparison: 'eq' })).toBe(true);
    expect(isStructuredExpectation(Object.create(null))).toBe(true);
    expect(isStructuredExpectation(new Map())).toBe(false);
    expect(isStructuredExpectation([])).toBe(false);
    expect(isStructuredExpectation(true)).toBe(false);
  });
});

describe('formatValue', () => {
  it('renders values as JSON where possible', () => {
    expect(formatValue('2.7.9-1')).toBe('"2.7.9-1"');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(null)).toBe('null');
    expect(formatValue({ expected: '2.7.9-1', comparison: 'eq' })).toBe('{"expected":"2.7.9-1","comparison":"eq"}');
  });

  it('renders values JSON cannot', () => {
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue(5n)).toBe('5n');
    expect(formatValue(new Set([22, 80]))).toBe('Set([22,80])');
    expect(formatValue(function probe() {})).toBe('[function probe]');
  });

  it('falls back to String for circular structures', () => {
    const value: Record<string, unknown> = {};
    value.self = value;
    expect(formatValue(value)).toBe('[object Object]');
  });
});
