import type { ResourceProvider } from './resource.js';
import { CommandFailedError, UnsupportedResourceError } from '../engine/errors.js';
import type { ResourceBackend, ResourceHandle } from '../engine/types.js';
import type { CommandExecutor, CommandResult } from '../runner/executor-interface.js';
import { debug } from '../lib/log.js';
import { shellEscape } from '../lib/shell.js';

export interface HostFacts {
  // Lower-cased kernel name, e.g. "linux" or "darwin"
  type: string;
  distribution: string | null;
  release: string | null;
  codename: string | null;
  arch: string;
  hostname: string;
}

export class Backend implements ResourceBackend {
  private facts: Promise<HostFacts> | null = null;

  constructor(
    readonly selector: string,
    readonly executor: CommandExecutor,
    private readonly providers: ReadonlyMap<string, ResourceProvider>,
  ) {}

  async getModule(resourceType: string): Promise<ResourceHandle> {
    const provider = this.providers.get(resourceType);
    if (!provider) {
      throw new UnsupportedResourceError(resourceType, 'unknown resource type');
    }
    return provider.resolve(this);
  }

  run(command: string): Promise<CommandResult> {
    debug('backend', `${this.executor.target}: ${command}`);
    return this.executor.exec(command);
  }

  async succeeds(command: string): Promise<boolean> {
    const result = await this.run(command);
    return result.exitCode === 0;
  }

  async checkOutput(command: string): Promise<string> {
    const result = await this.run(command);
    if (result.exitCode !== 0) {
      throw new CommandFailedError(command, result.exitCode, result.stderr);
    }
    return result.stdout;
  }

  hasCommand(name: string): Promise<boolean> {
    return this.succeeds(`command -v ${shellEscape(name)} >/dev/null 2>&1`);
  }

  // Facts are read once per backend; a failed read is retried next time.
  hostFacts(): Promise<HostFacts> {
    if (!this.facts) {
      this.facts = this.readHostFacts().catch((err: unknown) => {
        this.facts = null;
        throw err;
      });
    }
    return this.facts;
  }

  async close(): Promise<void> {
    await this.executor.close();
  }

  private async readHostFacts(): Promise<HostFacts> {
    const [kernel, arch, hostname] = await Promise.all([
      this.checkOutput('uname -s'),
      this.checkOutput('uname -m'),
      this.checkOutput('uname -n'),
    ]);
    const osRelease = await this.run('cat /etc/os-release 2>/dev/null');
    const release = osRelease.exitCode === 0 ? parseOsRelease(osRelease.stdout) : new Map<string, string>();

    return {
      type: kernel.trim().toLowerCase(),
      distribution: release.get('ID') ?? null,
      release: release.get('VERSION_ID') ?? null,
      codename: release.get('VERSION_CODENAME') ?? null,
      arch: arch.trim(),
      hostname: hostname.trim(),
    };
  }
}

export function parseOsRelease(content: string): Map<string, string> {
  const values = new Map<string, string>();

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq);
    const value = line.slice(eq + 1).replace(/^(["'])(.*)\1$/, '$2');
    values.set(key, value);
  }

  return values;
}
