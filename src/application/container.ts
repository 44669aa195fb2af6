import { BoxedReference } from '../domain/boxed-value.js';
import type { BoxedValue } from '../domain/boxed-value.js';
import { CircularDependencyError, InvalidArgumentError, LifecycleError } from '../domain/errors.js';
import type {
  Callable,
  ComponentInfo,
  Configurator,
  Constructor,
  ContainerGraph,
  ContainerLogger,
  ContainerOptions,
  Factory,
  IContainer,
  IFactory,
  MethodReference,
  Invokable,
  ParameterMap,
  Provider,
} from '../domain/types.js';
import { isInvokable, isMethodReference, isParameterMap } from '../domain/validation.js';
import { CycleDetector } from '../infrastructure/cycle-detector.js';
import { ParameterDescriber, isClass } from '../infrastructure/parameters.js';
import type { PendingConfiguration } from '../infrastructure/registry.js';
import { Registry } from '../infrastructure/registry.js';
import { Resolver } from '../infrastructure/resolver.js';
import { TypeCatalog } from '../infrastructure/type-catalog.js';
import { Introspection } from './introspection.js';

/**
 * Names under which every container registers itself, in addition to its own class name.
 */
export const CONTAINER_NAMES = ['Container', 'IContainer', 'IFactory'] as const;

/**
 * What `register()` accepts as the source of a component:
 * - a factory function, called with resolved arguments
 * - a class, constructed with resolved arguments
 * - a type name, created through `create()`
 * - a parameter map, used to create the type named like the component
 */
export type ComponentSource = Factory | Constructor | string | ParameterMap;

/**
 * Dependency injection container.
 *
 * Components are registered under names and built on first `get()`. Factory and
 * constructor arguments are resolved from the parameter map, then from components
 * registered under the declared type name or the parameter name, then from defaults.
 * Once built, a component is active and can no longer be replaced.
 *
 * @example
 * ```typescript
 * const container = createContainer();
 *
 * container.set('cache.path', '/tmp/cache');
 * container.register('cache', FileCache, { root: container.ref('cache.path') });
 * container.configure('cache', (cache: FileCache) => cache.warm());
 *
 * container.get('cache'); // FileCache, built once, warmed
 * ```
 */
export class Container implements IContainer, IFactory {
  readonly name?: string;

  private readonly registry = new Registry();
  private readonly types = new TypeCatalog();
  private readonly resolver: Resolver;
  private readonly cycleDetector?: CycleDetector;
  private readonly logger?: ContainerLogger;
  private readonly introspection: Introspection;

  constructor(options: ContainerOptions = {}) {
    this.name = options.name;
    this.logger = options.logger;
    this.cycleDetector = options.detectCycles === false ? undefined : new CycleDetector();
    this.resolver = new Resolver({
      container: this,
      describer: options.describer ?? new ParameterDescriber(),
    });
    this.introspection = new Introspection(this.registry, options.name);

    for (const [typeName, ctor] of Object.entries(options.types ?? {})) {
      this.types.define(ctor, typeName);
    }

    for (const selfName of new Set([this.constructor.name, ...CONTAINER_NAMES])) {
      if (!selfName) continue;
      this.registry.putValue(selfName, this);
      this.registry.markActive(selfName);
    }
  }

  /**
   * Registers a component, built on first use.
   *
   * @param name - Component name
   * @param source - Factory, class, type name or parameter map. Defaults to the type named `name`.
   * @param map - Parameter values for the factory or constructor (may contain boxed values)
   *
   * @example
   * ```typescript
   * container.register('FileCache');                            // create('FileCache')
   * container.register('FileCache', ['/tmp']);                  // first constructor argument
   * container.register('Cache', 'FileCache', { root: '/tmp' }); // another type under this name
   * container.register('Cache', FileCache);                     // a class
   * container.register('Cache', (root: string) => new FileCache(root), { root: '/tmp' });
   * ```
   *
   * @throws LifecycleError if the component is already active
   * @throws InvalidArgumentError if `source` is none of the above
   */
  register(name: string, source?: ComponentSource, map: ParameterMap = []): void {
    let factory: Factory;
    let factoryMap: ParameterMap = [];

    if (source === undefined) {
      factory = () => this.create(name, map);
    } else if (typeof source === 'string') {
      const typeName = source;
      factory = () => this.create(typeName, map);
    } else if (typeof source === 'function') {
      if (isClass(source)) {
        const ctor = source;
        factory = () => this.create(ctor, map);
      } else {
        factory = source;
        factoryMap = map;
      }
    } else if (isParameterMap(source)) {
      const constructorMap = source;
      factory = () => this.create(name, constructorMap);
    } else {
      throw new InvalidArgumentError(describeValue(source), 'not_callable');
    }

    this.registry.putFactory(name, factory, factoryMap);
    this.logger?.debug('component registered', { name });
  }

  /**
   * Registers `name` as another name for `target`. The target is fetched on first use of `name`.
   */
  alias(name: string, target: string): void {
    this.register(name, () => this.get(target));
  }

  /**
   * Directly injects an already created value.
   *
   * @throws LifecycleError if the component is already active
   */
  set(name: string, value: unknown): void {
    if (this.registry.isSealed(name)) {
      throw new LifecycleError(name, 'set');
    }
    this.registry.putValue(name, value);
    this.logger?.debug('component injected', { name });
  }

  /**
   * Returns the component, building it on first use. The component is sealed once
   * its queued configuration has been applied; if a configuration throws, the value
   * built so far is kept but stays replaceable.
   *
   * @throws NotFoundError if nothing is registered under `name`
   * @throws ResolutionError if a factory argument cannot be resolved
   * @throws CircularDependencyError if building the component requires itself
   */
  get(name: string): unknown {
    const record = this.registry.require(name);
    if (record.state !== 'registered') {
      return record.value;
    }
    const factory = record.factory;
    if (!factory) {
      throw this.registry.notFound(name);
    }

    if (this.cycleDetector?.isActivating(name)) {
      throw new CircularDependencyError(name, this.cycleDetector.chain());
    }

    let value: unknown;
    this.cycleDetector?.enter(name);
    try {
      value = Reflect.apply(factory, undefined, this.resolver.argumentsFor(factory, record.factoryMap));
    } finally {
      this.cycleDetector?.leave(name);
    }

    this.registry.putValue(name, value);
    for (const entry of this.registry.drainConfigurations(name)) {
      this.applyConfiguration(name, entry);
    }
    this.registry.markActive(name);
    this.logger?.debug('component activated', { name });

    return this.registry.require(name).value;
  }

  /**
   * Registers a configuration function, applied once on first use of the component.
   * If the component is already active, the function is applied immediately.
   *
   * The first parameter receives the component; the others are resolved.
   * Returning a value replaces the component.
   *
   * @example
   * ```typescript
   * container.configure('middleware', (stack: MiddlewareStack, logger: Logger) => {
   *   stack.push(new LoggingMiddleware(logger));
   * });
   * container.configure('kittens', (count: number) => count + 6);
   * ```
   *
   * @throws NotFoundError if nothing is registered under `name`
   */
  configure<T>(name: string, fn: Configurator<T>, map: ParameterMap = []): void {
    if (this.registry.isActive(name)) {
      this.applyConfiguration(name, { fn, map });
      return;
    }
    this.registry.queueConfiguration(name, fn, map);
    this.logger?.debug('configuration queued', { name });
  }

  /** True if a value is stored or a factory is registered under `name`. */
  has(name: string): boolean {
    return this.registry.exists(name);
  }

  /** True if a value is stored under `name`. */
  isActive(name: string): boolean {
    return this.registry.isActive(name);
  }

  /**
   * Calls a function, method or invokable object with resolved arguments.
   *
   * @example
   * ```typescript
   * container.call((db: Database, limit = 10) => db.recent(limit), { limit: 5 });
   * container.call([controller, 'handle']);
   * container.call({ invoke: (logger: Logger) => logger.info('hi') });
   * ```
   *
   * @throws InvalidArgumentError if `callable` cannot be called
   */
  call<T>(callable: Factory<T>, map?: ParameterMap): T;
  call(callable: MethodReference | Invokable, map?: ParameterMap): unknown;
  call(callable: Callable, map: ParameterMap = []): unknown {
    if (typeof callable === 'function') {
      if (isClass(callable)) {
        throw new InvalidArgumentError(`class ${callable.name}`, 'not_callable');
      }
      return Reflect.apply(callable, undefined, this.resolver.argumentsFor(callable, map));
    }

    if (isMethodReference(callable)) {
      const [target, method] = callable;
      const fn: unknown = Reflect.get(target, method);
      if (typeof fn !== 'function') {
        throw new InvalidArgumentError(`${target.constructor.name}.${method}`, 'not_callable');
      }
      return Reflect.apply(fn, target, this.resolver.argumentsFor(fn, map));
    }

    if (isInvokable(callable)) {
      return Reflect.apply(callable.invoke, callable, this.resolver.argumentsFor(callable.invoke, map));
    }

    throw new InvalidArgumentError(describeValue(callable), 'not_callable');
  }

  /**
   * Creates a new instance, resolving the constructor arguments.
   *
   * @param type - A class, or the name of a type known to the container
   *
   * @throws InvalidArgumentError if the type name is unknown or abstract
   */
  create<T = unknown>(type: string | Constructor<T>, map: ParameterMap = []): T {
    if (typeof type !== 'string') {
      return Reflect.construct(type, this.resolver.argumentsFor(type, map));
    }
    const entry = this.types.lookup(type);
    if (!entry) {
      throw new InvalidArgumentError(type, 'unknown');
    }
    if (entry.kind === 'abstract') {
      throw new InvalidArgumentError(type, 'abstract');
    }
    return Reflect.construct(entry.ctor, this.resolver.argumentsFor(entry.ctor, map));
  }

  /**
   * Returns a boxed reference to a component, fetched only when the argument it fills is resolved.
   *
   * @example
   * ```typescript
   * container.register('UserRepo', UserRepo, [container.ref('cache')]);
   * // 'cache' is not built until 'UserRepo' is
   * ```
   */
  ref(name: string): BoxedValue {
    return new BoxedReference(this, name);
  }

  /**
   * Installs a provider's registrations.
   */
  add(provider: Provider): void {
    provider.register(this);
    this.logger?.debug('provider added', { provider: provider.constructor.name });
  }

  /**
   * Makes a class available to `create()` and `register()` by type name.
   */
  define(ctor: Constructor, typeName?: string): void {
    this.types.define(ctor, typeName);
  }

  /**
   * Declares an abstract type name (an interface or base type). `create()` refuses it,
   * but components may still be registered under it.
   */
  declare(typeName: string): void {
    this.types.declare(typeName);
  }

  inspect(): ContainerGraph {
    return this.introspection.inspect();
  }

  describe(name: string): ComponentInfo {
    return this.introspection.describe(name);
  }

  toString(): string {
    return this.introspection.toString();
  }

  private applyConfiguration(name: string, entry: PendingConfiguration): void {
    const current = this.registry.require(name).value;
    const args = this.resolver.argumentsFor(entry.fn, entry.map, [current]);
    const result: unknown = Reflect.apply(entry.fn, undefined, args);
    if (result !== undefined && result !== null) {
      this.registry.putValue(name, result);
    }
    this.logger?.debug('configuration applied', { name, replaced: result !== undefined && result !== null });
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
