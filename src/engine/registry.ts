import { verifyResource } from './dispatcher.js';
import { camelToSnake, snakeToCamel } from './naming.js';
import type { DeclaredChecks, ProviderDirectory, VerificationReport } from './types.js';

export interface ResourceDispatcher {
  (subject: string, checks: DeclaredChecks): Promise<VerificationReport>;
  readonly resourceType: string;
  readonly description: string;
}

export interface DispatcherOptions {
  backend?: string;
}

export function createDispatcher(
  directory: ProviderDirectory,
  resourceType: string,
  options: DispatcherOptions = {},
): ResourceDispatcher {
  const dispatch = (subject: string, checks: DeclaredChecks): Promise<VerificationReport> =>
    verifyResource({ directory, resourceType, subject, checks, backend: options.backend });

  return Object.assign(dispatch, {
    resourceType,
    description: directory.describe(snakeToCamel(resourceType, true)) ?? '',
  });
}

/** One dispatcher per resource type the directory lists, keyed by snake_case name. */
export function buildRegistry(
  directory: ProviderDirectory,
  options: DispatcherOptions = {},
): ReadonlyMap<string, ResourceDispatcher> {
  const registry = new Map<string, ResourceDispatcher>();

  for (const typeName of directory.listResourceTypes()) {
    const name = camelToSnake(typeName);
    if (registry.has(name)) {
      throw new Error(`Duplicate resource type: ${name}`);
    }
    registry.set(name, createDispatcher(directory, name, options));
  }

  return registry;
}

let globalRegistry: ReadonlyMap<string, ResourceDispatcher> | null = null;

export function initRegistry(
  directory: ProviderDirectory,
  options: DispatcherOptions = {},
): ReadonlyMap<string, ResourceDispatcher> {
  if (globalRegistry) {
    throw new Error('Registry already initialized. Call resetRegistry() first.');
  }
  globalRegistry = buildRegistry(directory, options);
  return globalRegistry;
}

export function getRegistry(): ReadonlyMap<string, ResourceDispatcher> {
  if (!globalRegistry) {
    throw new Error('Registry not initialized. Call initRegistry() first.');
  }
  return globalRegistry;
}

export function getDispatcher(resourceType: string): ResourceDispatcher | undefined {
  return getRegistry().get(resourceType);
}

export function resetRegistry(): void {
  globalRegistry = null;
}
