import { describe, it, expect } from 'vitest';
import { FakeExecutor } from './fake-executor.js';
import { BuiltinDirectory } from '../directory.js';
import { DebianPackage, RpmPackage } from '../resources/package.js';
import { resolveResource, verifyResource } from '../../engine/dispatcher.js';

function directoryFor(executor: FakeExecutor): BuiltinDirectory {
  return new BuiltinDirectory(undefined, () => executor);
}

describe('package resource', () => {
  it('uses dpkg-query where it is available', async () => {
    const executor = new FakeExecutor()
      .on("command -v 'dpkg-query' >/dev/null 2>&1")
      .on("dpkg-query -f '${Status}' -W 'nginx'", { stdout: 'install ok installed' })
      .on("dpkg-query -f '${Version}' -W 'nginx'", { stdout: '1.22.1-9' });

    const report = await verifyResource({
      directory: directoryFor(executor),
      resourceType: 'package',
      subject: 'nginx',
      checks: {
        is_installed: true,
        version: { expected: '1.22.1-9', comparison: 'eq' },
      },
    });

    expect(report).toEqual({
      success: true,
      passMessages: [
        'Assertion passed: package nginx is_installed true. Actual result: true',
        'Assertion passed: package nginx version {"expected":"1.22.1-9","comparison":"eq"}. Actual result: "1.22.1-9"',
      ],
      failMessages: [],
    });
  });

  it('reports removed-but-configured packages as not installed', async () => {
    const executor = new FakeExecutor()
      .on("command -v 'dpkg-query' >/dev/null 2>&1")
      .on("dpkg-query -f '${Status}' -W 'apache2'", { stdout: 'deinstall ok config-files' });

    const report = await verifyResource({
      directory: directoryFor(executor),
      resourceType: 'package',
      subject: 'apache2',
      checks: { is_installed: false },
    });

    expect(report.success).toBe(true);
  });

  it('has no release on dpkg systems', async () => {
    const executor = new FakeExecutor().on("command -v 'dpkg-query' >/dev/null 2>&1");

    const report = await verifyResource({
      directory: directoryFor(executor),
      resourceType: 'package',
      subject: 'nginx',
      checks: { release: { expected: '1.el9', comparison: 'eq' } },
    });

    expect(report.failMessages).toEqual([
      'Assertion failed: package nginx release {"expected":"1.el9","comparison":"eq"}. Error: The Package resource does not have any property or method named release',
    ]);
  });

  it('falls back to rpm', async () => {
    const executor = new FakeExecutor()
      .on("command -v 'rpm' >/dev/null 2>&1")
      .on("rpm -q 'nginx'", { stdout: 'nginx-1.20.1-14.el9.x86_64' })
      .on("rpm -q --queryformat '%{VERSION}' 'nginx'", { stdout: '1.20.1' })
      .on("rpm -q --queryformat '%{RELEASE}' 'nginx'", { stdout: '14.el9' });
    const directory = directoryFor(executor);

    const handle = await resolveResource(directory, 'package');
    const report = await verifyResource({
      directory,
      resourceType: 'package',
      subject: 'nginx',
      checks: {
        is_installed: true,
        version: { expected: '1.20', comparison: 'search' },
        release: { expected: '14.el9', comparison: 'eq' },
      },
    });

    expect(handle.resourceClass).toBe(RpmPackage);
    expect(report.success).toBe(true);
    expect(report.passMessages).toHaveLength(3);
  });

  it('prefers dpkg when both tools exist', async () => {
    const executor = new FakeExecutor()
      .on("command -v 'dpkg-query' >/dev/null 2>&1")
      .on("command -v 'rpm' >/dev/null 2>&1");

    const handle = await resolveResource(directoryFor(executor), 'package');

    expect(handle.resourceClass).toBe(DebianPackage);
    expect(handle.parameters).toEqual(['name']);
  });

  it('is unsupported without a package manager', async () => {
    const report = await verifyResource({
      directory: directoryFor(new FakeExecutor()),
      resourceType: 'package',
      subject: 'nginx',
      checks: { is_installed: true },
    });

    expect(report).toEqual({ success: false, passMessages: [], failMessages: [] });
  });

  it('reports a failed version query per check', async () => {
    const executor = new FakeExecutor()
      .on("command -v 'dpkg-query' >/dev/null 2>&1")
      .on("dpkg-query -f '${Version}' -W 'ghost'", {
        exitCode: 1,
        stderr: 'dpkg-query: no packages found matching ghost',
      });

    const report = await verifyResource({
      directory: directoryFor(executor),
      resourceType: 'package',
      subject: 'ghost',
      checks: { version: { expected: '1.0', comparison: 'eq' } },
    });

    expect(report.failMessages).toEqual([
      'Assertion failed: package ghost version {"expected":"1.0","comparison":"eq"}. Error: Command failed with exit code 1: dpkg-query -f \'${Version}\' -W \'ghost\' (dpkg-query: no packages found matching ghost)',
    ]);
  });
});
