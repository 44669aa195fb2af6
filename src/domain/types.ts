import type { Container } from '../application/container.js';

/**
 * A factory function. Its parameters are resolved by the container.
 *
 * @example
 * ```typescript
 * const factory: Factory<UserService> = (repo: UserRepository, logger: Logger) =>
 *   new UserService(repo, logger);
 * ```
 */
export type Factory<T = unknown> = (...deps: never[]) => T;

/** A class constructor whose parameters are resolved by the container. */
export type Constructor<T = unknown> = new (...deps: never[]) => T;

/**
 * A configuration function. The first parameter receives the live component;
 * the rest are resolved. Returning a value other than `undefined` or `null`
 * replaces the component.
 */
export type Configurator<T = unknown> = (component: T, ...deps: never[]) => T | undefined | void;

/** An instance method reference: `[instance, 'methodName']`. */
export type MethodReference = readonly [object, string];

/** An object that can be called through `container.call()`. */
export interface Invokable {
  invoke(...args: never[]): unknown;
}

/** Anything `container.call()` accepts. */
export type Callable = Factory | MethodReference | Invokable;

/**
 * Mixed positional/named parameter values. Arrays supply positional values;
 * object keys are either parameter names or zero-based indices.
 * Values may be boxed (see `container.ref()`), and are unboxed on use.
 *
 * @example
 * ```typescript
 * container.register('cache', FileCache, { 0: '/tmp', ttl: 60 });
 * ```
 */
export type ParameterMap = readonly unknown[] | Readonly<Record<string, unknown>>;

/**
 * Describes one parameter of a callable, in declaration order.
 * `type` is a component name, never a loaded type.
 */
export interface ParameterDescriptor {
  name: string;
  type?: string;
  optional: boolean;
  defaultValue?: unknown;
  /** Collects the remaining arguments. Receives nothing when unresolved. */
  rest?: boolean;
}

/**
 * Shorthand accepted by `inject()`: `'name'`, `'name?'`, `'name: Type'`,
 * `'name?: Type'`, or a full descriptor.
 */
export type ParameterDeclaration =
  | string
  | { name: string; type?: string; optional?: boolean; defaultValue?: unknown; rest?: boolean };

/**
 * Produces parameter descriptors for callables and constructors.
 * Used by the resolver; never instantiates or loads declared types.
 */
export interface IParameterDescriber {
  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor, including bound methods
  describe(target: Function): ParameterDescriptor[];
  /** Best-effort label of where `target` was declared, for diagnostics. */
  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor, including bound methods
  locate(target: Function): string;
}

/**
 * Component lookup contract.
 */
export interface IContainer {
  get(name: string): unknown;
  has(name: string): boolean;
}

/**
 * Instance creation contract.
 */
export interface IFactory {
  create<T = unknown>(type: string | Constructor<T>, map?: ParameterMap): T;
}

/**
 * A packaged set of registrations.
 *
 * @example
 * ```typescript
 * class CacheProvider implements Provider {
 *   register(container: Container) {
 *     container.register('cache', FileCache, { root: container.ref('cache.path') });
 *   }
 * }
 * ```
 */
export interface Provider {
  register(container: Container): void;
}

/**
 * Receives container diagnostics. Silent unless provided through options.
 */
export interface ContainerLogger {
  debug(message: string, details?: Record<string, unknown>): void;
}

/**
 * Options for `createContainer()`.
 */
export interface ContainerOptions {
  /**
   * Optional name, shown by `inspect()` and `String(container)`.
   */
  name?: string;
  /** Parameter introspection. Defaults to `ParameterDescriber`. */
  describer?: IParameterDescriber;
  /** Types available to `create()`, keyed by type name. */
  types?: Record<string, Constructor>;
  logger?: ContainerLogger;
  /** Providers installed by `createContainer()`, in order. */
  providers?: Provider[];
  /**
   * Fail with `CircularDependencyError` when a component's activation
   * re-enters itself. Defaults to `true`; when `false`, cycles recurse
   * until the call stack is exhausted.
   */
  detectCycles?: boolean;
}

/**
 * Lifecycle state of a component:
 * - `registered`: factory present, not yet built
 * - `injected`: raw value supplied through `set()`, still replaceable
 * - `active`: built or bootstrapped, immutable
 */
export type ComponentState = 'registered' | 'injected' | 'active';

/**
 * Detailed metadata about a single component.
 */
export interface ComponentInfo {
  name: string;
  state: ComponentState;
  /** Configuration entries queued and not yet applied. */
  pendingConfigurations: number;
}

/**
 * Full component table of a container.
 */
export interface ContainerGraph {
  name?: string;
  components: Record<string, ComponentInfo>;
}
