import { z } from 'zod';
import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceOptions, type ResourceProvider } from '../resource.js';
import { UnsupportedResourceError } from '../../engine/errors.js';
import { shellEscape } from '../../lib/shell.js';

const InterfaceOptionsSchema = z.object({
  family: z.enum(['inet', 'inet6']).optional(),
});

type AddressFamily = z.infer<typeof InterfaceOptionsSchema>['family'];

// `ip -o addr show` prints one address per line:
//   2: eth0    inet 10.0.0.5/24 brd 10.0.0.255 scope global eth0\       valid_lft ...
export function parseAddresses(output: string, family?: AddressFamily): string[] {
  const addresses: string[] = [];

  for (const line of output.split('\n')) {
    const fields = line.trim().split(/\s+/);
    const familyIndex = fields.findIndex(field => field === 'inet' || field === 'inet6');
    if (familyIndex === -1 || familyIndex + 1 >= fields.length) continue;
    if (family && fields[familyIndex] !== family) continue;

    addresses.push(fields[familyIndex + 1].replace(/\/\d+$/, ''));
  }

  return addresses;
}

/** A network interface, inspected with iproute2. */
export class Interface extends Resource {
  static readonly parameters: readonly string[] = ['name', 'family'];

  readonly family: AddressFamily;

  constructor(
    backend: Backend,
    readonly name: string,
    options: ResourceOptions = {},
  ) {
    super(backend);
    this.family = InterfaceOptionsSchema.parse(options).family;
  }

  get exists(): Promise<boolean> {
    return backendOf(this).succeeds(`ip link show dev ${shellEscape(this.name)}`);
  }

  get addresses(): Promise<string[]> {
    return backendOf(this)
      .checkOutput(`ip -o addr show dev ${shellEscape(this.name)}`)
      .then(output => parseAddresses(output, this.family));
  }

  get mtu(): Promise<number> {
    return backendOf(this)
      .checkOutput(`cat /sys/class/net/${shellEscape(this.name)}/mtu`)
      .then(value => parseInt(value, 10));
  }

  hasAddress(address: unknown): Promise<boolean> {
    return this.addresses.then(addresses => addresses.includes(String(address)));
  }
}

export const interfaceProvider: ResourceProvider = {
  name: 'Interface',
  description: 'Network interfaces and their addresses (via iproute2)',

  async resolve(backend: Backend) {
    const facts = await backend.hostFacts();
    if (facts.type !== 'linux' || !(await backend.hasCommand('ip'))) {
      throw new UnsupportedResourceError('Interface', 'requires linux with iproute2');
    }
    return bindHandle('Interface', backend, Interface);
  },
};
