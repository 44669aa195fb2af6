import { LifecycleError, NotFoundError } from '../domain/errors.js';
import type { ComponentState, Factory, ParameterMap } from '../domain/types.js';
import { Validator } from '../domain/validation.js';

/** A queued configuration function and its parameter values. */
export interface PendingConfiguration {
  fn: Factory;
  map: ParameterMap;
}

/**
 * Everything the container knows about one component.
 * `value` is meaningful whenever `state` is not `registered`.
 */
export interface ComponentRecord {
  state: ComponentState;
  value: unknown;
  factory?: Factory;
  factoryMap: ParameterMap;
  pending: PendingConfiguration[];
}

/**
 * Name-keyed table of component records.
 * One record per name keeps value, factory and queued configuration in sync.
 */
export class Registry {
  private readonly records = new Map<string, ComponentRecord>();
  private readonly validator = new Validator();

  /** True if a value is stored or a factory is registered. */
  exists(name: string): boolean {
    return this.records.has(name);
  }

  /** True if a concrete value is stored, however it got there. */
  isActive(name: string): boolean {
    const record = this.records.get(name);
    return record !== undefined && record.state !== 'registered';
  }

  /** True once the component has been activated; it can no longer be replaced. */
  isSealed(name: string): boolean {
    return this.records.get(name)?.state === 'active';
  }

  /**
   * Stores a value. A registered factory is kept but no longer consulted.
   */
  putValue(name: string, value: unknown): void {
    const record = this.records.get(name);
    if (!record) {
      this.records.set(name, { state: 'injected', value, factoryMap: [], pending: [] });
      return;
    }
    record.value = value;
    if (record.state === 'registered') record.state = 'injected';
  }

  /**
   * Registers a factory, discarding any raw value stored under the same name.
   * Queued configuration is kept.
   */
  putFactory(name: string, factory: Factory, map: ParameterMap): void {
    if (this.isSealed(name)) {
      throw new LifecycleError(name, 'register');
    }
    const pending = this.records.get(name)?.pending ?? [];
    this.records.set(name, { state: 'registered', value: undefined, factory, factoryMap: map, pending });
  }

  /** Seals the component. Irreversible. */
  markActive(name: string): void {
    const record = this.require(name);
    record.state = 'active';
  }

  queueConfiguration(name: string, fn: Factory, map: ParameterMap): void {
    this.require(name).pending.push({ fn, map });
  }

  /** Returns the queued configuration for one-time application and clears the queue. */
  drainConfigurations(name: string): PendingConfiguration[] {
    const record = this.records.get(name);
    if (!record) return [];
    const pending = record.pending;
    record.pending = [];
    return pending;
  }

  /**
   * Returns the record for `name`.
   * @throws NotFoundError if nothing is registered under `name`
   */
  require(name: string): ComponentRecord {
    const record = this.records.get(name);
    if (!record) {
      throw this.notFound(name);
    }
    return record;
  }

  record(name: string): ComponentRecord | undefined {
    return this.records.get(name);
  }

  names(): string[] {
    return [...this.records.keys()];
  }

  notFound(name: string): NotFoundError {
    const registered = this.names();
    return new NotFoundError(name, registered, this.validator.suggestName(name, registered));
  }
}
