import { describe, it, expect } from 'vitest';
import { NotFoundError, createContainer } from '../src/index.js';

describe('introspection', () => {
  it('inspect() lists every component with its state', () => {
    const container = createContainer({ name: 'app' });
    container.register('db', () => 'pg');
    container.configure('db', (db: string) => db.toUpperCase());
    container.set('port', 80);

    expect(container.inspect()).toEqual({
      name: 'app',
      components: {
        Container: { name: 'Container', state: 'active', pendingConfigurations: 0 },
        IContainer: { name: 'IContainer', state: 'active', pendingConfigurations: 0 },
        IFactory: { name: 'IFactory', state: 'active', pendingConfigurations: 0 },
        db: { name: 'db', state: 'registered', pendingConfigurations: 1 },
        port: { name: 'port', state: 'injected', pendingConfigurations: 0 },
      },
    });
  });

  it('inspect() omits the name of an unnamed container', () => {
    const container = createContainer();
    expect('name' in container.inspect()).toBe(false);
  });

  it('describe() follows activation', () => {
    const container = createContainer();
    container.register('db', () => 'pg');
    container.configure('db', (db: string) => db.toUpperCase());

    expect(container.describe('db')).toEqual({ name: 'db', state: 'registered', pendingConfigurations: 1 });
    container.get('db');
    expect(container.describe('db')).toEqual({ name: 'db', state: 'active', pendingConfigurations: 0 });
  });

  it('describe() throws NotFoundError for unknown names', () => {
    const container = createContainer();
    expect(() => container.describe('missing')).toThrow(NotFoundError);
  });

  it('toString() lists components in registration order', () => {
    const container = createContainer();
    expect(String(container)).toBe('Container { Container (active), IContainer (active), IFactory (active) }');
  });

  it('toString() includes the container name', () => {
    const container = createContainer({ name: 'app' });
    container.register('db', () => 'pg');

    expect(container.toString()).toBe(
      'Container(app) { Container (active), IContainer (active), IFactory (active), db (registered) }',
    );
  });
});
