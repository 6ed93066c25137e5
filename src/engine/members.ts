import { MissingArgumentError, UnknownMemberError } from './errors.js';
import { formatValue, isStructuredExpectation } from './expectation.js';
import { snakeToCamel } from './naming.js';
import type { ResourceHandle } from './types.js';
import { debug } from '../lib/log.js';

export type MemberKind =
  | { kind: 'computed'; read: () => unknown }
  | { kind: 'operation'; invoke: (argument: unknown) => unknown }
  | { kind: 'plain'; value: unknown };

// Own properties every function carries; never resource members.
const FUNCTION_BUILTINS = new Set(['length', 'name', 'prototype', 'caller', 'arguments']);

interface Located {
  descriptor: PropertyDescriptor;
  receiver: object;
}

/**
 * Find `memberName` on a resource and classify it.
 *
 * The class level is searched first (accessors and methods along the
 * prototype chain, then static members), the instance's own properties
 * second. Declared names are snake_case and are looked up in camelCase.
 */
export function resolveMember(handle: ResourceHandle, instance: object, memberName: string): MemberKind {
  const key = snakeToCamel(memberName);
  debug('member', `Trying to call ${key} on ${handle.resourceType}`);

  const located = findOnClass(handle.resourceClass, instance, key) ?? findOnInstance(instance, key);
  if (!located) {
    throw new UnknownMemberError(handle.resourceType, memberName);
  }
  return classify(located);
}

/**
 * Produce the actual result of a member for one check. Operations take their
 * single argument from the expectation's `parameter` key.
 */
export async function readMember(
  member: MemberKind,
  resourceType: string,
  memberName: string,
  expectation: unknown,
): Promise<unknown> {
  switch (member.kind) {
    case 'computed':
      return await member.read();

    case 'operation': {
      if (!isStructuredExpectation(expectation)) {
        throw new MissingArgumentError(
          `${memberName} is a method of the ${resourceType} resource. An argument object is required.`,
        );
      }
      if (!Object.hasOwn(expectation, 'parameter')) {
        throw new MissingArgumentError(
          `The argument object supplied has no key named "parameter": ${formatValue(expectation)}`,
        );
      }
      return await member.invoke(expectation.parameter);
    }

    case 'plain':
      return member.value;
  }
}

function findOnClass(resourceClass: object, instance: object, key: string): Located | undefined {
  const prototype: unknown = Reflect.get(resourceClass, 'prototype');

  if (key !== 'constructor') {
    for (
      let current: unknown = prototype;
      isObject(current) && current !== Object.prototype;
      current = Object.getPrototypeOf(current)
    ) {
      const descriptor = Object.getOwnPropertyDescriptor(current, key);
      if (descriptor) {
        return { descriptor, receiver: instance };
      }
    }
  }

  if (!FUNCTION_BUILTINS.has(key)) {
    for (
      let current: unknown = resourceClass;
      typeof current === 'function' && current !== Function.prototype;
      current = Object.getPrototypeOf(current)
    ) {
      const descriptor = Object.getOwnPropertyDescriptor(current, key);
      if (descriptor) {
        return { descriptor, receiver: resourceClass };
      }
    }
  }

  return undefined;
}

function findOnInstance(instance: object, key: string): Located | undefined {
  const descriptor = Object.getOwnPropertyDescriptor(instance, key);
  return descriptor ? { descriptor, receiver: instance } : undefined;
}

function classify({ descriptor, receiver }: Located): MemberKind {
  const { get } = descriptor;
  if (get || descriptor.set) {
    return { kind: 'computed', read: () => (get ? Reflect.apply(get, receiver, []) : undefined) };
  }

  const value: unknown = descriptor.value;
  if (typeof value === 'function') {
    return { kind: 'operation', invoke: argument => Reflect.apply(value, receiver, [argument]) };
  }
  return { kind: 'plain', value };
}

function isObject(value: unknown): value is object {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}
