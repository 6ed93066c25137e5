import { Backend } from './backend.js';
import type { ResourceProvider } from './resource.js';
import { builtinProviders } from './resources/index.js';
import type { ProviderDirectory } from '../engine/types.js';
import type { CommandExecutor } from '../runner/executor-interface.js';
import { createExecutor } from '../runner/executor-factory.js';
import { parseBackendSelector } from '../runner/target.js';

export type ExecutorFactory = (selector: string) => CommandExecutor;

const defaultExecutorFactory: ExecutorFactory = selector => createExecutor(parseBackendSelector(selector));

/**
 * The built-in resource catalogue. Backends, and with them executor
 * connections and host facts, are kept per selector until close().
 */
export class BuiltinDirectory implements ProviderDirectory {
  private readonly providers: ReadonlyMap<string, ResourceProvider>;
  private readonly backends = new Map<string, Backend>();

  constructor(
    providers: readonly ResourceProvider[] = builtinProviders,
    private readonly executorFactory: ExecutorFactory = defaultExecutorFactory,
  ) {
    const byName = new Map<string, ResourceProvider>();
    for (const provider of providers) {
      if (byName.has(provider.name)) {
        throw new Error(`Duplicate resource provider: ${provider.name}`);
      }
      byName.set(provider.name, provider);
    }
    this.providers = byName;
  }

  listResourceTypes(): readonly string[] {
    return Array.from(this.providers.keys());
  }

  describe(resourceType: string): string | undefined {
    return this.providers.get(resourceType)?.description;
  }

  getBackend(selector: string): Backend {
    let backend = this.backends.get(selector);
    if (!backend) {
      backend = new Backend(selector, this.executorFactory(selector), this.providers);
      this.backends.set(selector, backend);
    }
    return backend;
  }

  async close(): Promise<void> {
    const backends = Array.from(this.backends.values());
    this.backends.clear();
    await Promise.all(backends.map(backend => backend.close()));
  }
}
