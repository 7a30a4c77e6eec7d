// Backend registry - the authoritative name -> backend mapping for a run

import { BackendDescriptor, BackendProvider } from './backend';
import { DuplicateBackendError, RegistryError, errorMessage } from './errors';

export class BackendRegistry {
  private readonly backends: ReadonlyMap<string, BackendDescriptor>;
  private readonly owners: ReadonlyMap<string, string>;

  private constructor(backends: Map<string, BackendDescriptor>, owners: Map<string, string>) {
    this.backends = backends;
    this.owners = owners;
  }

  /**
   * Builds the registry from the provider table, in provider order.
   *
   * Any provider failure, malformed descriptor or repeated name aborts the
   * whole build; a partial registry is never returned.
   */
  static discover(providers: readonly BackendProvider[]): BackendRegistry {
    const backends = new Map<string, BackendDescriptor>();
    const owners = new Map<string, string>();

    for (const provider of providers) {
      let descriptors: BackendDescriptor[];
      try {
        descriptors = provider.backends();
      } catch (error) {
        throw new RegistryError(
          `Backend provider ${provider.name} could not be loaded: ${errorMessage(error)}`
        );
      }

      for (const descriptor of descriptors) {
        if (!descriptor.name || typeof descriptor.executable !== 'function') {
          throw new RegistryError(
            `Backend provider ${provider.name} exposes a backend without a name or executable`
          );
        }

        const owner = owners.get(descriptor.name);
        if (owner !== undefined) {
          throw new DuplicateBackendError(descriptor.name, owner, provider.name);
        }

        backends.set(descriptor.name, Object.freeze({ ...descriptor }));
        owners.set(descriptor.name, provider.name);
      }
    }

    return new BackendRegistry(backends, owners);
  }

  lookup(name: string): BackendDescriptor | undefined {
    return this.backends.get(name);
  }

  has(name: string): boolean {
    return this.backends.has(name);
  }

  // Name of the provider that registered a backend
  providerOf(name: string): string | undefined {
    return this.owners.get(name);
  }

  names(): string[] {
    return Array.from(this.backends.keys());
  }

  descriptors(): BackendDescriptor[] {
    return Array.from(this.backends.values());
  }

  get size(): number {
    return this.backends.size;
  }
}
