import { describeType, resolveComparator } from './comparators.js';
import { InvalidComparatorError, InvalidExpectationError, InvalidExpectationTypeError } from './errors.js';
import type { StructuredExpectation } from './types.js';
import { debug } from '../lib/log.js';

export function isStructuredExpectation(value: unknown): value is StructuredExpectation {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Decide whether `actual` satisfies `expectation`.
 *
 * A boolean expectation only accepts that exact boolean: `1` does not satisfy
 * `true` and `null` does not satisfy `false`. A structured expectation applies
 * its named comparator as `comparator(expected, actual)`.
 */
export function evaluateExpectation(expectation: unknown, actual: unknown): boolean {
  debug('expectation', `expected ${formatValue(expectation)}, actual ${formatValue(actual)}`);

  if (typeof expectation === 'boolean') {
    return actual === expectation;
  }

  if (isStructuredExpectation(expectation)) {
    const { comparison } = expectation;
    if (typeof comparison !== 'string') {
      throw new InvalidComparatorError(
        `Comparison ${formatValue(comparison)} is not a valid selection`,
      );
    }
    const comparator = resolveComparator(comparison);
    if (!Object.hasOwn(expectation, 'expected')) {
      throw new InvalidExpectationError(
        `The comparison object has no key named "expected": ${formatValue(expectation)}`,
      );
    }
    return comparator(expectation.expected, actual);
  }

  throw new InvalidExpectationTypeError(describeType(expectation));
}

export function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  if (value instanceof Set || value instanceof Map) {
    return `${value.constructor.name}(${formatValue(Array.from(value))})`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
