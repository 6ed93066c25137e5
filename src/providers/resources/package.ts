import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceProvider } from '../resource.js';
import { UnsupportedResourceError } from '../../engine/errors.js';
import { shellEscape } from '../../lib/shell.js';

export abstract class Package extends Resource {
  static readonly parameters: readonly string[] = ['name'];

  constructor(
    backend: Backend,
    readonly name: string,
  ) {
    super(backend);
  }

  abstract get isInstalled(): Promise<boolean>;
  abstract get version(): Promise<string>;
}

export class DebianPackage extends Package {
  get isInstalled(): Promise<boolean> {
    return backendOf(this)
      .run("dpkg-query -f '${Status}' -W " + shellEscape(this.name))
      .then(result => result.exitCode === 0 && /^(install|hold) ok installed$/.test(result.stdout));
  }

  get version(): Promise<string> {
    return backendOf(this).checkOutput("dpkg-query -f '${Version}' -W " + shellEscape(this.name));
  }
}

export class RpmPackage extends Package {
  get isInstalled(): Promise<boolean> {
    return backendOf(this).succeeds(`rpm -q ${shellEscape(this.name)}`);
  }

  get version(): Promise<string> {
    return backendOf(this).checkOutput(`rpm -q --queryformat '%{VERSION}' ${shellEscape(this.name)}`);
  }

  get release(): Promise<string> {
    return backendOf(this).checkOutput(`rpm -q --queryformat '%{RELEASE}' ${shellEscape(this.name)}`);
  }
}

export const packageProvider: ResourceProvider = {
  name: 'Package',
  description: 'Installed system packages (dpkg or rpm)',

  async resolve(backend: Backend) {
    if (await backend.hasCommand('dpkg-query')) {
      return bindHandle('Package', backend, DebianPackage);
    }
    if (await backend.hasCommand('rpm')) {
      return bindHandle('Package', backend, RpmPackage);
    }
    throw new UnsupportedResourceError('Package', 'no dpkg-query or rpm on the target');
  },
};
