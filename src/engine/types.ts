/** Expectation attached to one declared check. */
export type Expectation = boolean | StructuredExpectation;

export interface StructuredExpectation {
  expected?: unknown;
  comparison?: unknown;
  parameter?: unknown;
  [key: string]: unknown;
}

/** Declared checks keyed by member name, as they arrive from a declaration. */
export type DeclaredChecks = Readonly<Record<string, unknown>>;

export type ConstructorArgs = Readonly<Record<string, unknown>>;

/**
 * A resolved resource type bound to one backend, not yet instantiated.
 *
 * `resourceClass` is only used for member lookup; instances are built through
 * `create` so the backend binding stays with the provider.
 */
export interface ResourceHandle<T extends object = object> {
  readonly resourceType: string;
  readonly resourceClass: abstract new (...args: never) => T;
  // Constructor parameter names, subject first. Empty for host-wide resources.
  readonly parameters: readonly string[];
  create(subject?: string, args?: ConstructorArgs): T;
}

export interface ResourceBackend {
  readonly selector: string;
  // Rejects with UnsupportedResourceError when the type is unknown or not
  // implemented for the target.
  getModule(resourceType: string): Promise<ResourceHandle>;
}

export interface ProviderDirectory {
  listResourceTypes(): readonly string[];
  // Takes the directory's own (UpperCamelCase) type name
  describe(resourceType: string): string | undefined;
  getBackend(selector: string): ResourceBackend;
}

export interface VerificationReport {
  success: boolean;
  passMessages: string[];
  failMessages: string[];
}

export const DEFAULT_BACKEND = 'local://';

export const RESERVED_PREFIX = '_';
