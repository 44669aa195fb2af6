import { describe, it, expect } from 'vitest';
import { NotFoundError, boxed, createContainer, isBoxedValue } from '../src/index.js';

describe('boxed values', () => {
  it('defers building a referenced component until its consumer is built', () => {
    const container = createContainer();
    let built = 0;
    container.register('expensive', () => {
      built++;
      return { heavy: true };
    });
    container.register('consumer', (dep: unknown) => ({ dep }), { dep: container.ref('expensive') });

    expect(built).toBe(0);
    const consumer = container.get('consumer');
    expect(built).toBe(1);
    expect(consumer).toEqual({ dep: container.get('expensive') });
  });

  it('references components registered later', () => {
    const container = createContainer();
    const later = container.ref('later');
    container.register('uses', (value: string) => value, [later]);
    container.register('later', () => 'registered after the reference');

    expect(container.get('uses')).toBe('registered after the reference');
  });

  it('fails with NotFoundError only when the reference is used', () => {
    const container = createContainer();
    container.register('broken', (value: unknown) => value, [container.ref('missing')]);

    expect(() => container.get('broken')).toThrow(NotFoundError);
  });

  it('evaluates a boxed thunk when its slot is consumed', () => {
    const container = createContainer();
    let calls = 0;
    container.register('counter', (value: number) => value, { value: boxed(() => ++calls) });

    expect(calls).toBe(0);
    expect(container.get('counter')).toBe(1);
    expect(container.get('counter')).toBe(1);
    expect(calls).toBe(1);
  });

  it('unboxes injected values when they fill a parameter', () => {
    const container = createContainer();
    container.set('path', boxed(() => '/var/cache'));
    container.register('cache', (path: string) => ({ path }));

    expect(container.get('cache')).toEqual({ path: '/var/cache' });
  });

  it('recognises boxed values', () => {
    const container = createContainer();

    expect(isBoxedValue(container.ref('db'))).toBe(true);
    expect(isBoxedValue(boxed(() => 1))).toBe(true);
    expect(isBoxedValue({ unbox: () => 1 })).toBe(false);
    expect(isBoxedValue(null)).toBe(false);
  });

  it('renders references by name', () => {
    const container = createContainer();
    expect(String(container.ref('db'))).toBe('ref(db)');
  });
});
