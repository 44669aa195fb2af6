import type { ContainerOptions } from '../domain/types.js';
import { Container } from './container.js';

/**
 * Creates a dependency injection container and installs the given providers.
 *
 * @example
 * ```typescript
 * const container = createContainer({
 *   name: 'app',
 *   types: { FileCache, UserRepository },
 *   providers: [new CacheProvider()],
 * });
 *
 * container.register('users', 'UserRepository', { cache: container.ref('cache') });
 * container.get('users'); // UserRepository, built on first use
 * ```
 */
export function createContainer(options: ContainerOptions = {}): Container {
  const container = new Container(options);
  for (const provider of options.providers ?? []) {
    container.add(provider);
  }
  return container;
}
