import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceProvider } from '../resource.js';
import { UnsupportedResourceError } from '../../engine/errors.js';
import { shellEscape } from '../../lib/shell.js';

export abstract class Service extends Resource {
  static readonly parameters: readonly string[] = ['name'];

  constructor(
    backend: Backend,
    readonly name: string,
  ) {
    super(backend);
  }

  abstract get isRunning(): Promise<boolean>;
  abstract get isEnabled(): Promise<boolean>;
}

export class SystemdService extends Service {
  get isRunning(): Promise<boolean> {
    return backendOf(this).succeeds(`systemctl is-active ${shellEscape(this.name)}`);
  }

  get isEnabled(): Promise<boolean> {
    return backendOf(this).succeeds(`systemctl is-enabled ${shellEscape(this.name)}`);
  }

  get isValid(): Promise<boolean> {
    return backendOf(this).succeeds(`systemd-analyze verify ${shellEscape(unitName(this.name))}`);
  }

  get isMasked(): Promise<boolean> {
    return backendOf(this)
      .run(`systemctl is-enabled ${shellEscape(this.name)}`)
      .then(result => result.stdout === 'masked');
  }
}

export class SysvService extends Service {
  get isRunning(): Promise<boolean> {
    return backendOf(this).succeeds(`service ${shellEscape(this.name)} status`);
  }

  get isEnabled(): Promise<boolean> {
    return backendOf(this).succeeds(`ls /etc/rc?.d/S??${shellEscape(this.name)} >/dev/null 2>&1`);
  }
}

function unitName(name: string): string {
  return name.includes('.') ? name : `${name}.service`;
}

export const serviceProvider: ResourceProvider = {
  name: 'Service',
  description: 'System services (systemd or SysV init)',

  async resolve(backend: Backend) {
    if (await backend.succeeds('test -d /run/systemd/system')) {
      return bindHandle('Service', backend, SystemdService);
    }
    if (await backend.hasCommand('service')) {
      return bindHandle('Service', backend, SysvService);
    }
    throw new UnsupportedResourceError('Service', 'no systemd or SysV init on the target');
  },
};
