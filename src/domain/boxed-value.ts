import type { IContainer } from './types.js';

/**
 * Symbol used to mark a value as boxed.
 * The resolver unboxes marked values when it consumes the argument slot.
 */
export const BOXED_MARKER: unique symbol = Symbol.for('lazybox:boxed');

/**
 * A value whose expansion is deferred until the resolver consumes it.
 */
export interface BoxedValue<T = unknown> {
  readonly [BOXED_MARKER]: true;
  unbox(): T;
}

/** Checks if a value is a boxed value. */
export function isBoxedValue(value: unknown): value is BoxedValue {
  return (
    value !== null &&
    (typeof value === 'object' || typeof value === 'function') &&
    BOXED_MARKER in value &&
    value[BOXED_MARKER] === true &&
    'unbox' in value &&
    typeof value.unbox === 'function'
  );
}

/**
 * Boxed reference to a component, fetched from the container on unbox.
 * Created by `container.ref(name)`.
 */
export class BoxedReference implements BoxedValue {
  readonly [BOXED_MARKER] = true as const;

  constructor(
    private readonly container: Pick<IContainer, 'get'>,
    readonly name: string,
  ) {}

  unbox(): unknown {
    return this.container.get(this.name);
  }

  toString(): string {
    return `ref(${this.name})`;
  }
}

/**
 * Wraps a thunk as a boxed value, evaluated when the argument is consumed.
 *
 * @example
 * ```typescript
 * container.register('cache', FileCache, {
 *   root: boxed(() => path.join(os.tmpdir(), 'cache')),
 * });
 * ```
 */
export function boxed<T>(thunk: () => T): BoxedValue<T> {
  return {
    [BOXED_MARKER]: true,
    unbox: thunk,
  };
}
