import { bindArguments, filterReservedChecks } from './binder.js';
import { ResourceConstructionError, UnsupportedResourceError, errorMessage } from './errors.js';
import { evaluateExpectation, formatValue } from './expectation.js';
import { readMember, resolveMember } from './members.js';
import { snakeToCamel } from './naming.js';
import {
  DEFAULT_BACKEND,
  type ConstructorArgs,
  type DeclaredChecks,
  type ProviderDirectory,
  type ResourceHandle,
  type VerificationReport,
} from './types.js';
import { debug } from '../lib/log.js';

export interface VerifyResourceOptions {
  directory: ProviderDirectory;
  // snake_case resource type name, e.g. "package" or "system_info"
  resourceType: string;
  subject: string;
  checks: DeclaredChecks;
  backend?: string;
}

export async function resolveResource(
  directory: ProviderDirectory,
  resourceType: string,
  selector: string = DEFAULT_BACKEND,
): Promise<ResourceHandle> {
  const backend = directory.getBackend(selector);
  return backend.getModule(snakeToCamel(resourceType, true));
}

/**
 * Verify every declared check against one resource instance.
 *
 * An unsupported resource yields a failed report with no messages. A
 * resource that cannot be constructed throws ResourceConstructionError.
 * Errors raised by a single check are recorded as that check's failure and
 * the remaining checks still run, in declaration order.
 */
export async function verifyResource(options: VerifyResourceOptions): Promise<VerificationReport> {
  const { directory, resourceType, subject, backend = DEFAULT_BACKEND } = options;
  const report: VerificationReport = { success: true, passMessages: [], failMessages: [] };

  let handle: ResourceHandle;
  try {
    debug('dispatch', `Retrieving ${resourceType} resource for ${backend}`);
    handle = await resolveResource(directory, resourceType, backend);
  } catch (err) {
    if (err instanceof UnsupportedResourceError) {
      debug('dispatch', err.message);
      report.success = false;
      return report;
    }
    throw err;
  }

  debug('dispatch', `Parameters accepted by ${handle.resourceType}: ${handle.parameters.join(', ') || '(none)'}`);
  const { constructorArgs, remainingChecks } = bindArguments(handle.parameters, filterReservedChecks(options.checks));
  const instance = construct(handle, subject, constructorArgs);

  for (const { name, expectation } of remainingChecks) {
    const label = `${resourceType} ${subject} ${name} ${formatValue(expectation)}`;
    try {
      const member = resolveMember(handle, instance, name);
      const actual = await readMember(member, handle.resourceType, name, expectation);
      if (evaluateExpectation(expectation, actual)) {
        report.passMessages.push(`Assertion passed: ${label}. Actual result: ${formatValue(actual)}`);
      } else {
        report.success = false;
        report.failMessages.push(`Assertion failed: ${label}. Actual result: ${formatValue(actual)}`);
      }
    } catch (err) {
      report.success = false;
      report.failMessages.push(`Assertion failed: ${label}. Error: ${errorMessage(err)}`);
    }
  }

  return report;
}

function construct(handle: ResourceHandle, subject: string, args: ConstructorArgs): object {
  try {
    return handle.parameters.length > 0 ? handle.create(subject, args) : handle.create();
  } catch (err) {
    throw new ResourceConstructionError(handle.resourceType, err);
  }
}
