import type { Backend } from './backend.js';
import type { ConstructorArgs, ResourceHandle } from '../engine/types.js';

export type ResourceOptions = ConstructorArgs;

// Kept off the instance: every property a resource carries can be declared
// as a check.
const backends = new WeakMap<Resource, Backend>();

/**
 * Base class for built-in resources. Getters are computed attributes, methods
 * taking one argument are operations; both usually return promises since they
 * run commands on the backend. Helpers that must not be checkable are
 * `#private`.
 */
export abstract class Resource {
  // Constructor parameter names after `backend`, subject first.
  static readonly parameters: readonly string[] = [];

  constructor(backend: Backend) {
    backends.set(this, backend);
  }
}

export function backendOf(resource: Resource): Backend {
  const backend = backends.get(resource);
  if (!backend) {
    throw new Error(`${resource.constructor.name} was constructed without a backend`);
  }
  return backend;
}

export interface ResourceClass<T extends Resource> {
  new (backend: Backend, subject: string, options: ResourceOptions): T;
  readonly prototype: T;
  readonly parameters: readonly string[];
}

export interface ResourceProvider {
  // UpperCamelCase type name, e.g. "Package" or "SystemInfo"
  readonly name: string;
  readonly description: string;
  resolve(backend: Backend): Promise<ResourceHandle>;
}

export function bindHandle<T extends Resource>(
  resourceType: string,
  backend: Backend,
  resourceClass: ResourceClass<T>,
): ResourceHandle<T> {
  return {
    resourceType,
    resourceClass,
    parameters: resourceClass.parameters,
    create: (subject = '', args = {}) => new resourceClass(backend, subject, args),
  };
}
