import type { ComponentInfo, ContainerGraph } from '../domain/types.js';
import type { Registry } from '../infrastructure/registry.js';

/**
 * Builds introspection data from a Registry.
 * Provides `inspect()`, `describe()` and `toString()`.
 */
export class Introspection {
  constructor(
    private readonly registry: Registry,
    private readonly name?: string,
  ) {}

  /**
   * Returns the full component table as a serializable JSON object.
   */
  inspect(): ContainerGraph {
    const components: Record<string, ComponentInfo> = {};
    for (const name of this.registry.names()) {
      components[name] = this.describe(name);
    }
    return this.name ? { name: this.name, components } : { components };
  }

  /**
   * Returns detailed information about a specific component.
   *
   * @throws NotFoundError if nothing is registered under `name`
   */
  describe(name: string): ComponentInfo {
    const record = this.registry.require(name);
    return { name, state: record.state, pendingConfigurations: record.pending.length };
  }

  /**
   * Returns a human-readable representation of the container.
   */
  toString(): string {
    const parts = this.registry.names().map((name) => `${name} (${this.describe(name).state})`);
    const label = this.name ? `Container(${this.name})` : 'Container';
    return `${label} { ${parts.join(', ')} }`;
  }
}
