import { isDeepStrictEqual } from 'node:util';
import { ComparatorNotFoundError, InvalidComparisonOperandError } from './errors.js';

/**
 * A named binary predicate. Always called as `comparator(expected, actual)`,
 * so `lt` reads "expected is less than actual" and `search` treats
 * `expected` as the pattern.
 */
export type Comparator = (expected: unknown, actual: unknown) => boolean;

// Returns a negative number, zero or a positive number as expected sorts
// before, with or after actual.
function order(name: string, expected: unknown, actual: unknown): number {
  if (typeof expected === 'number' && typeof actual === 'number') {
    return expected - actual;
  }
  if (typeof expected === 'bigint' && typeof actual === 'bigint') {
    return expected < actual ? -1 : expected > actual ? 1 : 0;
  }
  if (typeof expected === 'string' && typeof actual === 'string') {
    return expected < actual ? -1 : expected > actual ? 1 : 0;
  }
  throw new InvalidComparisonOperandError(
    `Comparison ${name} cannot order ${describeType(expected)} and ${describeType(actual)}`,
  );
}

function equals(expected: unknown, actual: unknown): boolean {
  return isDeepStrictEqual(expected, actual);
}

function contains(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      throw new InvalidComparisonOperandError(
        `Comparison contains requires a string to search for in a string, got ${describeType(item)}`,
      );
    }
    return container.includes(item);
  }
  if (Array.isArray(container)) {
    return container.some(element => equals(element, item));
  }
  if (container instanceof Set || container instanceof Map) {
    return container.has(item);
  }
  if (container !== null && typeof container === 'object') {
    return typeof item === 'string' && Object.hasOwn(container, item);
  }
  throw new InvalidComparisonOperandError(
    `Comparison contains requires a string, array, set, map or object as the expected value, got ${describeType(container)}`,
  );
}

function search(pattern: unknown, subject: unknown): boolean {
  if (typeof pattern !== 'string' && !(pattern instanceof RegExp)) {
    throw new InvalidComparisonOperandError(
      `Comparison search requires a pattern as the expected value, got ${describeType(pattern)}`,
    );
  }
  if (typeof subject !== 'string') {
    throw new InvalidComparisonOperandError(
      `Comparison search requires a string result, got ${describeType(subject)}`,
    );
  }
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags);
  return regex.test(subject);
}

const comparators: Readonly<Record<string, Comparator>> = Object.freeze({
  eq: equals,
  ne: (expected, actual) => !equals(expected, actual),
  lt: (expected, actual) => order('lt', expected, actual) < 0,
  le: (expected, actual) => order('le', expected, actual) <= 0,
  gt: (expected, actual) => order('gt', expected, actual) > 0,
  ge: (expected, actual) => order('ge', expected, actual) >= 0,
  is_: (expected, actual) => expected === actual,
  is_not: (expected, actual) => expected !== actual,
  contains,
  search,
} satisfies Record<string, Comparator>);

export function resolveComparator(name: string): Comparator {
  if (!Object.hasOwn(comparators, name)) {
    throw new ComparatorNotFoundError(name);
  }
  return comparators[name];
}

export function listComparators(): string[] {
  return Object.keys(comparators);
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
