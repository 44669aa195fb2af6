/**
 * Base class for all container errors.
 * Every error includes a human-readable `hint` and structured `details`
 * so that callers can diagnose the failure without parsing the message.
 *
 * @example
 * ```typescript
 * try { container.get('cache'); }
 * catch (e) {
 *   if (e instanceof ContainerError) {
 *     console.log(e.hint);    // actionable fix
 *     console.log(e.details); // structured context
 *   }
 * }
 * ```
 */
export abstract class ContainerError extends Error {
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown by `get()` and `configure()` when a name has neither a value nor a factory.
 * Includes a fuzzy suggestion if a similar name is registered.
 *
 * @example
 * ```typescript
 * container.get('userRepo');
 * // NotFoundError: Component 'userRepo' is not defined.
 * // hint: "Did you mean 'userRepository'?"
 * ```
 */
export class NotFoundError extends ContainerError {
  readonly hint: string;
  readonly details: { name: string; registered: string[]; suggestion?: string };

  constructor(name: string, registered: string[], suggestion?: string) {
    const suggestionStr = suggestion ? `\n\nDid you mean '${suggestion}'?` : '';
    super(`Component '${name}' is not defined.${suggestionStr}`);
    this.hint = suggestion
      ? `Did you mean '${suggestion}'? Or register it: container.register('${name}', () => ...)`
      : `Register it first: container.register('${name}', () => ...) or container.set('${name}', value)`;
    this.details = suggestion ? { name, registered, suggestion } : { name, registered };
  }
}

/**
 * Thrown when `register()` or `set()` targets a component that is already active.
 *
 * @example
 * ```typescript
 * container.get('db');
 * container.register('db', () => new OtherDb());
 * // LifecycleError: Cannot re-register active component 'db'.
 * ```
 */
export class LifecycleError extends ContainerError {
  readonly hint: string;
  readonly details: { name: string; operation: 'register' | 'set' };

  constructor(name: string, operation: 'register' | 'set') {
    super(
      operation === 'register'
        ? `Cannot re-register active component '${name}'.`
        : `Cannot overwrite active component '${name}'.`,
    );
    this.hint = `'${name}' was already activated. Register or set it before its first use, or use configure('${name}', fn) to adjust the live value.`;
    this.details = { name, operation };
  }
}

/**
 * Thrown when a parameter cannot be satisfied by an override, a registered
 * component, or a default value.
 *
 * @example
 * ```typescript
 * container.call((cache: Cache) => cache);
 * // ResolutionError: Unable to resolve parameter 'cache' in anonymous function.
 * ```
 */
export class ResolutionError extends ContainerError {
  readonly hint: string;
  readonly details: { parameter: string; type?: string; location: string };

  constructor(parameter: string, type: string | undefined, location: string) {
    const typeStr = type ? ` of type '${type}'` : '';
    super(`Unable to resolve parameter '${parameter}'${typeStr} in ${location}.`);
    this.hint = type
      ? `Register a component named '${type}' or '${parameter}', or pass '${parameter}' in the parameter map.`
      : `Register a component named '${parameter}', or pass '${parameter}' in the parameter map.`;
    this.details = type ? { parameter, type, location } : { parameter, location };
  }
}

export type InvalidArgumentReason = 'unknown' | 'abstract' | 'not_callable' | 'invalid_parameter';

/**
 * Thrown by `call()` and `create()` for values that cannot be invoked or instantiated.
 *
 * @example
 * ```typescript
 * container.create('Repository');
 * // InvalidArgumentError: Unable to create 'Repository': type is abstract.
 * ```
 */
export class InvalidArgumentError extends ContainerError {
  readonly hint: string;
  readonly details: { target: string; reason: InvalidArgumentReason };

  constructor(target: string, reason: InvalidArgumentReason) {
    const messages = {
      unknown: `Unable to create '${target}': type is not defined.`,
      abstract: `Unable to create '${target}': type is abstract.`,
      not_callable: `Expected a callable, got ${target}.`,
      invalid_parameter: `Invalid parameter declaration: '${target}'.`,
    };
    super(messages[reason]);
    const hints = {
      unknown: `Define the type first: container.define(${target})`,
      abstract: `Register a concrete implementation: container.register('${target}', Concrete${target})`,
      not_callable: 'Pass a function, a [instance, "method"] pair or an object with an invoke() method.',
      invalid_parameter: "Use 'name', 'name?', 'name: Type' or 'name?: Type'.",
    };
    this.hint = hints[reason];
    this.details = { target, reason };
  }
}

/**
 * Thrown when a component's activation re-enters itself.
 *
 * @example
 * ```typescript
 * // CircularDependencyError: Circular dependency detected while resolving 'authService'.
 * // Cycle: authService -> userService -> authService
 * ```
 */
export class CircularDependencyError extends ContainerError {
  readonly hint: string;
  readonly details: { name: string; chain: string[]; cycle: string };

  constructor(name: string, chain: string[]) {
    const cycle = [...chain, name].join(' -> ');
    super(`Circular dependency detected while resolving '${chain[0] ?? name}'.\n\nCycle: ${cycle}`);
    this.hint = [
      'To fix:',
      '  1. Extract shared logic into a new component both can use',
      `  2. Inject the container itself and call get('${name}') on first use`,
      '  3. Use configure() to wire one side after both are built',
    ].join('\n');
    this.details = { name, chain, cycle };
  }
}
