import type { ResourceDeclaration } from './config.js';
import { declarationId } from './config.js';
import type { ResourceDispatcher } from '../engine/registry.js';
import type { VerificationReport } from '../engine/types.js';
import { errorMessage } from '../engine/errors.js';

export interface ResourceResult {
  id: string;
  resourceType: string;
  subject: string;
  passed: boolean;
  report: VerificationReport;
  // Set when the resource could not be verified at all
  error?: string;
  durationMs: number;
}

export const DEFAULT_CONCURRENCY = 4;

export interface VerifyRunOptions {
  onResult?: (result: ResourceResult) => void;
  // Resources verified at the same time; each may run several commands
  concurrency?: number;
}

export interface VerifyRunResult {
  passed: number;
  failed: number;
  results: ResourceResult[];
}

/**
 * Run every declared resource through its dispatcher. Up to `concurrency`
 * resources are verified at once; results are reported in declaration order.
 */
export async function runDeclarations(
  registry: ReadonlyMap<string, ResourceDispatcher>,
  declarations: readonly ResourceDeclaration[],
  options: VerifyRunOptions = {},
): Promise<VerifyRunResult> {
  const { onResult, concurrency = DEFAULT_CONCURRENCY } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  const results = new Array<ResourceResult>(declarations.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < declarations.length) {
      const index = next++;
      results[index] = await runDeclaration(registry, declarations[index]);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, declarations.length) }, () => worker()),
  );

  let passed = 0;
  let failed = 0;
  for (const result of results) {
    if (result.passed) {
      passed++;
    } else {
      failed++;
    }
    onResult?.(result);
  }

  return { passed, failed, results };
}

async function runDeclaration(
  registry: ReadonlyMap<string, ResourceDispatcher>,
  declaration: ResourceDeclaration,
): Promise<ResourceResult> {
  const startTime = Date.now();
  const base = {
    id: declarationId(declaration),
    resourceType: declaration.type,
    subject: declaration.name,
  };
  const emptyReport: VerificationReport = { success: false, passMessages: [], failMessages: [] };

  const dispatch = registry.get(declaration.type);
  if (!dispatch) {
    return {
      ...base,
      passed: false,
      report: emptyReport,
      error: `Unknown resource type: ${declaration.type}`,
      durationMs: Date.now() - startTime,
    };
  }

  try {
    const report = await dispatch(declaration.name, declaration.checks);
    const unsupported = !report.success && report.passMessages.length === 0 && report.failMessages.length === 0;
    return {
      ...base,
      passed: report.success,
      report,
      error: unsupported ? `${declaration.type} is not supported on this backend` : undefined,
      durationMs: Date.now() - startTime,
    };
  } catch (err) {
    return {
      ...base,
      passed: false,
      report: emptyReport,
      error: errorMessage(err),
      durationMs: Date.now() - startTime,
    };
  }
}

export function formatResult(result: ResourceResult): string[] {
  const icon = result.passed ? '✓' : '✗';
  const target = result.subject ? `${result.resourceType} ${result.subject}` : result.resourceType;
  const header = `  ${icon} ${result.id} [${target}] (${result.durationMs}ms)`;

  if (result.error) {
    return [`${header}: ${result.error}`];
  }

  return [
    header,
    ...result.report.passMessages.map(message => `      ${message}`),
    ...result.report.failMessages.map(message => `      ${message}`),
  ];
}
