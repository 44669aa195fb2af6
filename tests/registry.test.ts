import { describe, it, expect } from 'vitest';
import { LifecycleError, NotFoundError } from '../src/index.js';
import { Registry } from '../src/infrastructure/registry.js';

describe('Registry', () => {
  it('knows nothing about unregistered names', () => {
    const registry = new Registry();
    expect(registry.exists('db')).toBe(false);
    expect(registry.isActive('db')).toBe(false);
    expect(registry.isSealed('db')).toBe(false);
  });

  it('a registered factory exists but is not active', () => {
    const registry = new Registry();
    registry.putFactory('db', () => 'pg', []);
    expect(registry.exists('db')).toBe(true);
    expect(registry.isActive('db')).toBe(false);
    expect(registry.record('db')?.state).toBe('registered');
  });

  it('a stored value supersedes the factory without removing it', () => {
    const registry = new Registry();
    const factory = () => 'pg';
    registry.putFactory('db', factory, []);
    registry.putValue('db', 'sqlite');

    const record = registry.require('db');
    expect(record.state).toBe('injected');
    expect(record.value).toBe('sqlite');
    expect(record.factory).toBe(factory);
    expect(registry.isActive('db')).toBe(true);
  });

  it('putFactory drops a raw value', () => {
    const registry = new Registry();
    registry.putValue('port', 80);
    registry.putFactory('port', () => 8080, []);
    expect(registry.isActive('port')).toBe(false);
    expect(registry.require('port').value).toBeUndefined();
  });

  it('putFactory fails once the component is sealed', () => {
    const registry = new Registry();
    registry.putValue('db', 'pg');
    registry.markActive('db');
    expect(registry.isSealed('db')).toBe(true);
    expect(() => registry.putFactory('db', () => 'other', [])).toThrow(LifecycleError);
  });

  it('putValue on a sealed record keeps it sealed', () => {
    const registry = new Registry();
    registry.putValue('n', 1);
    registry.markActive('n');
    registry.putValue('n', 2);
    expect(registry.require('n')).toMatchObject({ state: 'active', value: 2 });
  });

  it('queues configuration in order and drains it once', () => {
    const registry = new Registry();
    const first = (n: number) => n + 1;
    const second = (n: number) => n * 2;
    registry.putFactory('n', () => 1, []);
    registry.queueConfiguration('n', first, []);
    registry.queueConfiguration('n', second, { factor: 2 });

    expect(registry.drainConfigurations('n')).toEqual([
      { fn: first, map: [] },
      { fn: second, map: { factor: 2 } },
    ]);
    expect(registry.drainConfigurations('n')).toEqual([]);
  });

  it('keeps queued configuration across re-registration', () => {
    const registry = new Registry();
    const configure = (n: number) => n + 1;
    registry.putFactory('n', () => 1, []);
    registry.queueConfiguration('n', configure, []);
    registry.putFactory('n', () => 5, []);
    expect(registry.require('n').pending).toHaveLength(1);
  });

  it('queueConfiguration fails for unknown names', () => {
    const registry = new Registry();
    expect(() => registry.queueConfiguration('missing', () => undefined, [])).toThrow(NotFoundError);
  });

  it('lists names in registration order', () => {
    const registry = new Registry();
    registry.putFactory('b', () => 1, []);
    registry.putValue('a', 2);
    expect(registry.names()).toEqual(['b', 'a']);
  });
});
