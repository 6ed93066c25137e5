import { snakeToCamel } from './naming.js';
import { RESERVED_PREFIX, type DeclaredChecks } from './types.js';

export interface DeclaredCheck {
  name: string;
  expectation: unknown;
}

export interface BoundArguments {
  constructorArgs: Record<string, unknown>;
  remainingChecks: DeclaredCheck[];
}

export function filterReservedChecks(checks: DeclaredChecks): DeclaredCheck[] {
  return Object.entries(checks)
    .filter(([name]) => !name.startsWith(RESERVED_PREFIX))
    .map(([name, expectation]) => ({ name, expectation }));
}

/**
 * Split declared checks into constructor arguments and checks to verify.
 * The first parameter is the subject, which is always passed separately
 * and never taken from the checks.
 */
export function bindArguments(parameters: readonly string[], checks: readonly DeclaredCheck[]): BoundArguments {
  const bindable = new Set(parameters.slice(1));
  const constructorArgs: Record<string, unknown> = {};
  const remainingChecks: DeclaredCheck[] = [];

  for (const check of checks) {
    const key = snakeToCamel(check.name);
    if (bindable.has(key)) {
      constructorArgs[key] = check.expectation;
    } else {
      remainingChecks.push(check);
    }
  }

  return { constructorArgs, remainingChecks };
}
