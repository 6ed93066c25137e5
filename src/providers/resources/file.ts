import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceProvider } from '../resource.js';
import { UnsupportedResourceError } from '../../engine/errors.js';
import { shellEscape } from '../../lib/shell.js';

/** Files and directories, inspected with GNU coreutils. */
export class File extends Resource {
  static readonly parameters: readonly string[] = ['path'];

  constructor(
    backend: Backend,
    readonly path: string,
  ) {
    super(backend);
  }

  get exists(): Promise<boolean> {
    return this.#test('-e');
  }

  get isFile(): Promise<boolean> {
    return this.#test('-f');
  }

  get isDirectory(): Promise<boolean> {
    return this.#test('-d');
  }

  get isSymlink(): Promise<boolean> {
    return this.#test('-L');
  }

  get linkedTo(): Promise<string> {
    return backendOf(this).checkOutput(`readlink -f ${shellEscape(this.path)}`);
  }

  get user(): Promise<string> {
    return this.#stat('%U');
  }

  get group(): Promise<string> {
    return this.#stat('%G');
  }

  // Permission bits as a number, e.g. 0o644
  get mode(): Promise<number> {
    return this.#stat('%a').then(value => parseInt(value, 8));
  }

  get size(): Promise<number> {
    return this.#stat('%s').then(value => parseInt(value, 10));
  }

  get contentString(): Promise<string> {
    return backendOf(this).checkOutput(`cat -- ${shellEscape(this.path)}`);
  }

  contains(pattern: unknown): Promise<boolean> {
    return backendOf(this).succeeds(`grep -qs -- ${shellEscape(String(pattern))} ${shellEscape(this.path)}`);
  }

  #test(flag: string): Promise<boolean> {
    return backendOf(this).succeeds(`test ${flag} ${shellEscape(this.path)}`);
  }

  #stat(format: string): Promise<string> {
    return backendOf(this).checkOutput(`stat -c ${format} ${shellEscape(this.path)}`);
  }
}

export const fileProvider: ResourceProvider = {
  name: 'File',
  description: 'Files, directories and symlinks',

  async resolve(backend: Backend) {
    const facts = await backend.hostFacts();
    if (facts.type !== 'linux') {
      throw new UnsupportedResourceError('File', `no implementation for ${facts.type}`);
    }
    return bindHandle('File', backend, File);
  },
};
