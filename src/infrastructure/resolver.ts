import { isBoxedValue } from '../domain/boxed-value.js';
import { ResolutionError } from '../domain/errors.js';
import type {
  IContainer,
  IParameterDescriber,
  ParameterDescriptor,
  ParameterMap,
} from '../domain/types.js';

export interface ResolverDeps {
  container: IContainer;
  describer: IParameterDescriber;
}

type Lookup = { found: true; value: unknown } | { found: false };

const MISSING: Lookup = { found: false };

/**
 * Argument resolution: turns a parameter list and a parameter map into a
 * positional argument list.
 *
 * Per parameter, first match wins:
 * 1. value in the map under the parameter's name
 * 2. value in the map under the parameter's index
 * 3. component registered under the declared type name
 * 4. component registered under the parameter's name
 * 5. default value of an optional parameter
 *
 * A rest parameter takes the elements of an array override, and nothing when unresolved.
 * Boxed values are unboxed when their slot is filled.
 */
export class Resolver {
  private readonly container: IContainer;
  private readonly describer: IParameterDescriber;

  constructor(deps: ResolverDeps) {
    this.container = deps.container;
    this.describer = deps.describer;
  }

  /**
   * Resolves the arguments for calling or constructing `target`.
   * `preset` values fill the leading slots as given, without lookup or unboxing.
   */
  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor
  argumentsFor(target: Function, map: ParameterMap, preset: readonly unknown[] = []): unknown[] {
    return this.resolve(this.describer.describe(target), map, () => this.describer.locate(target), preset);
  }

  /**
   * @throws ResolutionError if a parameter has no override, no component and no default
   */
  resolve(
    params: readonly ParameterDescriptor[],
    map: ParameterMap,
    locate: () => string,
    preset: readonly unknown[] = [],
  ): unknown[] {
    const args: unknown[] = [];

    for (const [index, param] of params.entries()) {
      if (index < preset.length) {
        args.push(preset[index]);
        continue;
      }

      let value: unknown;
      const named = lookupName(map, param.name);
      const positional = named.found ? named : lookupIndex(map, index);

      if (positional.found && param.rest && Array.isArray(positional.value)) {
        args.push(...positional.value.map(unbox));
        continue;
      }

      if (positional.found) {
        value = positional.value;
      } else if (param.type && this.container.has(param.type)) {
        value = this.container.get(param.type);
      } else if (this.container.has(param.name)) {
        value = this.container.get(param.name);
      } else if (param.rest) {
        continue;
      } else if (param.optional) {
        value = param.defaultValue;
      } else {
        throw new ResolutionError(param.name, param.type, locate());
      }

      args.push(unbox(value));
    }

    return args;
  }
}

function unbox(value: unknown): unknown {
  return isBoxedValue(value) ? value.unbox() : value;
}

function lookupName(map: ParameterMap, name: string): Lookup {
  if (Array.isArray(map) || !Object.hasOwn(map, name)) return MISSING;
  return { found: true, value: Reflect.get(map, name) };
}

function lookupIndex(map: ParameterMap, index: number): Lookup {
  if (!Object.hasOwn(map, index)) return MISSING;
  return { found: true, value: Reflect.get(map, index) };
}
