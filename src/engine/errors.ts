export class HostcheckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Resource/backend/platform combination not implemented. Reported as a failed
// verification rather than thrown.
export class UnsupportedResourceError extends HostcheckError {
  constructor(
    readonly resourceType: string,
    detail?: string,
  ) {
    super(
      `The ${resourceType} resource is not supported for this backend and/or platform` +
        (detail ? `: ${detail}` : ''),
    );
  }
}

export class UnsupportedBackendError extends HostcheckError {}

export class ResourceConstructionError extends HostcheckError {
  constructor(
    readonly resourceType: string,
    cause: unknown,
  ) {
    super(
      `The ${resourceType} resource failed to instantiate: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
  }
}

export class UnknownMemberError extends HostcheckError {
  constructor(
    readonly resourceType: string,
    readonly memberName: string,
  ) {
    super(`The ${resourceType} resource does not have any property or method named ${memberName}`);
  }
}

export class MissingArgumentError extends HostcheckError {}

export class InvalidComparatorError extends HostcheckError {}

export class ComparatorNotFoundError extends InvalidComparatorError {
  constructor(readonly comparison: string) {
    super(`Comparison ${comparison} is not a valid selection`);
  }
}

export class InvalidComparisonOperandError extends HostcheckError {}

export class InvalidExpectationError extends HostcheckError {}

export class InvalidExpectationTypeError extends InvalidExpectationError {
  constructor(readonly receivedType: string) {
    super(`Expected boolean or object but received ${receivedType}`);
  }
}

export class CommandFailedError extends HostcheckError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`Command failed with exit code ${exitCode}: ${command}` + (stderr ? ` (${stderr})` : ''));
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
