import { describe, it, expect } from 'vitest';
import { formatResult, runDeclarations, type ResourceResult } from '../verify.js';
import { buildRegistry, createDispatcher, type ResourceDispatcher } from '../../engine/registry.js';
import type { VerificationReport } from '../../engine/types.js';
import { fakeDirectory } from '../../engine/__tests__/fixtures.js';

function registry() {
  const directory = fakeDirectory();
  const dispatchers = new Map(buildRegistry(directory));
  dispatchers.set('service', createDispatcher(directory, 'service'));
  return dispatchers;
}

describe('runDeclarations', () => {
  it('reports each resource in declaration order', async () => {
    const seen: string[] = [];

    const { passed, failed, results } = await runDeclarations(
      registry(),
      [
        { type: 'package', name: 'nginx', checks: { is_installed: true } },
        { id: 'ctl', type: 'command', name: 'systemctl', checks: { timeout: 'soon' } },
        { type: 'zfs_pool', name: 'tank', checks: {} },
        { type: 'service', name: 'nginx', checks: { is_running: true } },
      ],
      { onResult: result => seen.push(result.id) },
    );

    expect(passed).toBe(1);
    expect(failed).toBe(3);
    expect(seen).toEqual(['package nginx', 'ctl', 'zfs_pool tank', 'service nginx']);

    expect(results[0].report.passMessages).toEqual([
      'Assertion passed: package nginx is_installed true. Actual result: true',
    ]);
    expect(results.map(result => result.error)).toEqual([
      undefined,
      'The Command resource failed to instantiate: timeout must be a number',
      'Unknown resource type: zfs_pool',
      'service is not supported on this backend',
    ]);
  });

  it('counts failed checks as a failed resource', async () => {
    const { failed, results } = await runDeclarations(registry(), [
      { type: 'package', name: 'nginx', checks: { version: { expected: '1.0', comparison: 'eq' } } },
    ]);

    expect(failed).toBe(1);
    expect(results[0].error).toBeUndefined();
    expect(results[0].report.failMessages).toEqual([
      'Assertion failed: package nginx version {"expected":"1.0","comparison":"eq"}. Actual result: "2.7.9-1"',
    ]);
  });
});

describe('runDeclarations concurrency', () => {
  function trackingRegistry() {
    const state = { inFlight: 0, peak: 0 };
    const dispatch = async (): Promise<VerificationReport> => {
      state.inFlight++;
      state.peak = Math.max(state.peak, state.inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      state.inFlight--;
      return { success: true, passMessages: [], failMessages: [] };
    };
    const dispatcher: ResourceDispatcher = Object.assign(dispatch, { resourceType: 'command', description: '' });
    return { state, registry: new Map([['command', dispatcher]]) };
  }

  const declarations = Array.from({ length: 10 }, (_, i) => ({ type: 'command', name: `step ${i}`, checks: {} }));

  it('verifies at most four resources at once by default', async () => {
    const { state, registry } = trackingRegistry();

    const { passed, results } = await runDeclarations(registry, declarations);

    expect(passed).toBe(10);
    expect(state.peak).toBe(4);
    expect(results.map(result => result.subject)).toEqual(declarations.map(declaration => declaration.name));
  });

  it('honours a lower limit', async () => {
    const { state, registry } = trackingRegistry();

    await runDeclarations(registry, declarations, { concurrency: 1 });

    expect(state.peak).toBe(1);
  });

  it('rejects a limit below one', async () => {
    const { registry } = trackingRegistry();

    await expect(runDeclarations(registry, declarations, { concurrency: 0 })).rejects.toThrow('Invalid concurrency: 0');
  });
});

describe('formatResult', () => {
  const result: ResourceResult = {
    id: 'web',
    resourceType: 'package',
    subject: 'nginx',
    passed: false,
    report: {
      success: false,
      passMessages: ['Assertion passed: package nginx is_installed true. Actual result: true'],
      failMessages: ['Assertion failed: package nginx version "1.0". Actual result: "2.7.9-1"'],
    },
    durationMs: 12,
  };

  it('lists every message under the header', () => {
    expect(formatResult(result)).toEqual([
      '  ✗ web [package nginx] (12ms)',
      '      Assertion passed: package nginx is_installed true. Actual result: true',
      '      Assertion failed: package nginx version "1.0". Actual result: "2.7.9-1"',
    ]);
  });

  it('puts errors on the header line', () => {
    expect(
      formatResult({ ...result, id: 'system_info', resourceType: 'system_info', subject: '', error: 'boom' }),
    ).toEqual(['  ✗ system_info [system_info] (12ms): boom']);
  });
});
