import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceProvider } from '../resource.js';
import { UnsupportedResourceError } from '../../engine/errors.js';

export type SocketSpec =
  | { protocol: 'tcp' | 'udp'; host: string | null; port: number }
  | { protocol: 'unix'; path: string };

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '*']);

/**
 * Parse `tcp://22`, `tcp://127.0.0.1:8080`, `udp://[::1]:53` or
 * `unix:///run/app.sock`.
 */
export function parseSocketSpec(spec: string): SocketSpec {
  const match = /^(tcp|udp|unix):\/\/(.+)$/.exec(spec);
  if (!match) {
    throw new Error(`Invalid socket ${spec}: expected tcp://, udp:// or unix://`);
  }

  const [, protocol, rest] = match;
  if (protocol === 'unix') {
    return { protocol, path: rest };
  }
  if (protocol !== 'tcp' && protocol !== 'udp') {
    throw new Error(`Invalid socket protocol ${protocol}`);
  }

  const colon = rest.lastIndexOf(':');
  const hostPart = colon === -1 ? null : rest.slice(0, colon).replace(/^\[(.*)\]$/, '$1');
  const portPart = colon === -1 ? rest : rest.slice(colon + 1);
  const port = Number(portPart);
  if (!/^\d+$/.test(portPart) || port < 1 || port > 65535) {
    throw new Error(`Invalid socket ${spec}: bad port ${portPart}`);
  }

  return { protocol, host: hostPart, port };
}

/**
 * Local addresses from `ss -H -l -n` output. The local address is the
 * fourth column for a single inet family; unix sockets carry a Netid column
 * first, so their path is the fifth.
 */
export function parseListening(output: string, protocol: SocketSpec['protocol']): string[] {
  const column = protocol === 'unix' ? 4 : 3;
  return output
    .split('\n')
    .map(line => line.trim().split(/\s+/))
    .filter(fields => fields.length > column)
    .map(fields => fields[column]);
}

export function matchesListening(spec: SocketSpec, address: string): boolean {
  if (spec.protocol === 'unix') {
    return address === spec.path;
  }

  const colon = address.lastIndexOf(':');
  if (colon === -1) return false;

  const host = address.slice(0, colon).replace(/^\[(.*)\]$/, '$1').replace(/%.*$/, '');
  const port = Number(address.slice(colon + 1));
  if (port !== spec.port) return false;

  return spec.host === null || host === spec.host || WILDCARD_HOSTS.has(host);
}

export class Socket extends Resource {
  static readonly parameters: readonly string[] = ['spec'];

  readonly protocol: SocketSpec['protocol'];
  readonly #parsed: SocketSpec;

  constructor(
    backend: Backend,
    readonly spec: string,
  ) {
    super(backend);
    this.#parsed = parseSocketSpec(spec);
    this.protocol = this.#parsed.protocol;
  }

  get isListening(): Promise<boolean> {
    const flag = { tcp: '-t', udp: '-u', unix: '-x' }[this.#parsed.protocol];
    return backendOf(this).checkOutput(`ss -H -l -n ${flag}`).then(output =>
      parseListening(output, this.#parsed.protocol).some(address => matchesListening(this.#parsed, address)),
    );
  }
}

export const socketProvider: ResourceProvider = {
  name: 'Socket',
  description: 'Listening TCP, UDP and unix sockets (via ss)',

  async resolve(backend: Backend) {
    if (!(await backend.hasCommand('ss'))) {
      throw new UnsupportedResourceError('Socket', 'no ss on the target');
    }
    return bindHandle('Socket', backend, Socket);
  },
};
