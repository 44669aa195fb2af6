import { describe, expectTypeOf, it } from 'vitest';
import { createContainer, inject } from '../src/index.js';
import type { BoxedValue, ComponentInfo, ComponentState, Container } from '../src/index.js';

class Mailer {
  constructor(readonly transport: string) {}
}

describe('TypeScript type inference', () => {
  it('get() returns unknown', () => {
    const container = createContainer();
    container.set('port', 80);
    expectTypeOf(container.get('port')).toEqualTypeOf<unknown>();
  });

  it('call() returns the factory result type', () => {
    const container = createContainer();
    expectTypeOf(container.call(() => 42)).toEqualTypeOf<number>();
    expectTypeOf(container.call((name: string) => ({ name }), ['x'])).toEqualTypeOf<{ name: string }>();
  });

  it('call() returns unknown for methods and invokables', () => {
    const container = createContainer();
    expectTypeOf(container.call({ invoke: () => 1 })).toEqualTypeOf<unknown>();
  });

  it('create() returns the instance type of a class', () => {
    const container = createContainer({ types: { Mailer } });
    expectTypeOf(container.create(Mailer, ['smtp'])).toEqualTypeOf<Mailer>();
    expectTypeOf(container.create<Mailer>('Mailer', ['smtp'])).toEqualTypeOf<Mailer>();
  });

  it('inject() keeps the target type', () => {
    const fn = inject((a: number) => a * 2, 'a');
    expectTypeOf(fn).toEqualTypeOf<(a: number) => number>();
  });

  it('exposes the public types', () => {
    const container = createContainer();
    expectTypeOf(container).toEqualTypeOf<Container>();
    expectTypeOf(container.ref('db')).toEqualTypeOf<BoxedValue>();
    expectTypeOf(container.describe('Container')).toEqualTypeOf<ComponentInfo>();
    expectTypeOf<ComponentInfo['state']>().toEqualTypeOf<ComponentState>();
  });
});
