import { UnsupportedResourceError } from '../errors.js';
import type { ConstructorArgs, ProviderDirectory, ResourceBackend, ResourceHandle } from '../types.js';

export class FakePackage {
  static readonly parameters: readonly string[] = ['name'];
  static readonly kind = 'package';

  constructor(readonly name: string) {}

  get isInstalled(): boolean {
    return true;
  }

  get isHeld(): Promise<boolean> {
    return Promise.resolve(false);
  }

  get version(): string {
    return '2.7.9-1';
  }

  get epoch(): number {
    return 1;
  }

  get purgedAt(): null {
    return null;
  }

  contains(pattern: unknown): boolean {
    return pattern === 'sshd';
  }

  async sizeOf(file: unknown): Promise<number> {
    return String(file).length;
  }

  explode(): never {
    throw new Error('dpkg database is locked');
  }
}

export class FakeCommand {
  static readonly parameters: readonly string[] = ['command', 'timeout', 'cwd'];

  readonly timeout: number;
  readonly cwd: string;

  constructor(
    readonly command: string,
    args: ConstructorArgs = {},
  ) {
    const { timeout = 30 } = args;
    if (typeof timeout !== 'number') {
      throw new TypeError('timeout must be a number');
    }
    this.timeout = timeout;
    this.cwd = typeof args.cwd === 'string' ? args.cwd : '/';
  }

  get rc(): number {
    return 0;
  }
}

export class FakeSystemInfo {
  static readonly parameters: readonly string[] = [];

  get distribution(): string {
    return 'debian';
  }
}

type Constructs<T> = new (subject: string, args: ConstructorArgs) => T;

export function handleFor<T extends object>(
  resourceType: string,
  resourceClass: Constructs<T> & { readonly parameters: readonly string[] },
  onCreate?: (subject: string | undefined, args: ConstructorArgs | undefined) => void,
): ResourceHandle<T> {
  return {
    resourceType,
    resourceClass,
    parameters: resourceClass.parameters,
    create: (subject, args) => {
      onCreate?.(subject, args);
      return new resourceClass(subject ?? '', args ?? {});
    },
  };
}

export class FakeDirectory implements ProviderDirectory {
  readonly requested: Array<{ selector: string; resourceType: string }> = [];

  constructor(private readonly handles: Readonly<Record<string, ResourceHandle>>) {}

  listResourceTypes(): readonly string[] {
    return Object.keys(this.handles);
  }

  describe(resourceType: string): string | undefined {
    return Object.hasOwn(this.handles, resourceType) ? `${resourceType} resource` : undefined;
  }

  getBackend(selector: string): ResourceBackend {
    return {
      selector,
      getModule: async (resourceType: string) => {
        this.requested.push({ selector, resourceType });
        if (!Object.hasOwn(this.handles, resourceType)) {
          throw new UnsupportedResourceError(resourceType);
        }
        return this.handles[resourceType];
      },
    };
  }
}

export function fakeDirectory(): FakeDirectory {
  return new FakeDirectory({
    Package: handleFor('Package', FakePackage),
    Command: handleFor('Command', FakeCommand),
    SystemInfo: handleFor('SystemInfo', FakeSystemInfo),
  });
}
