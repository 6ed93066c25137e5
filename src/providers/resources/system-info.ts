import type { Backend } from '../backend.js';
import { Resource, backendOf, bindHandle, type ResourceProvider } from '../resource.js';

/** Host-wide facts. Takes no subject. */
export class SystemInfo extends Resource {
  static readonly parameters: readonly string[] = [];

  constructor(backend: Backend) {
    super(backend);
  }

  get type(): Promise<string> {
    return backendOf(this).hostFacts().then(facts => facts.type);
  }

  get distribution(): Promise<string | null> {
    return backendOf(this).hostFacts().then(facts => facts.distribution);
  }

  get release(): Promise<string | null> {
    return backendOf(this).hostFacts().then(facts => facts.release);
  }

  get codename(): Promise<string | null> {
    return backendOf(this).hostFacts().then(facts => facts.codename);
  }

  get arch(): Promise<string> {
    return backendOf(this).hostFacts().then(facts => facts.arch);
  }

  get hostname(): Promise<string> {
    return backendOf(this).hostFacts().then(facts => facts.hostname);
  }
}

export const systemInfoProvider: ResourceProvider = {
  name: 'SystemInfo',
  description: 'Operating system, distribution and architecture of the host',

  async resolve(backend: Backend) {
    return bindHandle('SystemInfo', backend, SystemInfo);
  },
};
