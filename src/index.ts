/**
 * lazybox: a dependency injection container with lazy components,
 * deferred configuration and boxed references.
 *
 * @example
 * ```typescript
 * import { createContainer, inject } from 'lazybox';
 *
 * class UserService {
 *   constructor(repo: UserRepository, logger: Logger) {}
 * }
 * inject(UserService, 'repo: UserRepository', 'logger: Logger');
 *
 * const container = createContainer({ types: { UserService } });
 * container.register('UserRepository', PgUserRepository);
 * container.set('logger', console);
 * container.register('UserService');
 *
 * container.get('UserService'); // lazy, built once, fully resolved
 * ```
 *
 * @packageDocumentation
 */

// Core API
export { createContainer } from './application/create-container.js';
export { Container, CONTAINER_NAMES } from './application/container.js';
export type { ComponentSource } from './application/container.js';
export { inject, ParameterDescriber } from './infrastructure/parameters.js';
export { Resolver } from './infrastructure/resolver.js';
export { boxed, isBoxedValue, BoxedReference } from './domain/boxed-value.js';
export type { BoxedValue } from './domain/boxed-value.js';

// Types
export type {
  Callable,
  ComponentInfo,
  ComponentState,
  Configurator,
  Constructor,
  ContainerGraph,
  ContainerLogger,
  ContainerOptions,
  Factory,
  IContainer,
  IFactory,
  Invokable,
  IParameterDescriber,
  MethodReference,
  ParameterDescriptor,
  ParameterMap,
  ParameterDeclaration,
  Provider,
} from './domain/types.js';

// Errors (classes, so exported as values)
export {
  ContainerError,
  NotFoundError,
  LifecycleError,
  ResolutionError,
  InvalidArgumentError,
  CircularDependencyError,
} from './domain/errors.js';
export type { InvalidArgumentReason } from './domain/errors.js';
