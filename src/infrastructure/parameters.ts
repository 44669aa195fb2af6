import { InvalidArgumentError } from '../domain/errors.js';
import type {
  Constructor,
  Factory,
  IParameterDescriber,
  ParameterDescriptor,
  ParameterDeclaration,
} from '../domain/types.js';

// biome-ignore lint/complexity/noBannedTypes: keyed by any callable or constructor
const declared = new WeakMap<Function, ParameterDescriptor[]>();
// biome-ignore lint/complexity/noBannedTypes: keyed by any callable or constructor
const parsed = new WeakMap<Function, ParameterDescriptor[]>();

const DECLARATION_PATTERN = /^\s*([A-Za-z_$][\w$]*)\s*(\?)?\s*(?::\s*(\S.*?))?\s*$/;

/**
 * Declares the parameters of a factory, function or class explicitly.
 * Declared parameters take precedence over names read from the source,
 * and are the only way to give a parameter a type name.
 *
 * @example
 * ```typescript
 * class UserService {
 *   constructor(repo: UserRepository, logger: Logger, retries = 3) {}
 * }
 * inject(UserService, 'repo: UserRepository', 'logger: Logger', 'retries?');
 * ```
 */
export function inject<T extends Factory | Constructor>(target: T, ...declarations: ParameterDeclaration[]): T {
  declared.set(target, declarations.map(toDescriptor));
  return target;
}

function toDescriptor(declaration: ParameterDeclaration): ParameterDescriptor {
  if (typeof declaration !== 'string') {
    const descriptor: ParameterDescriptor = { name: declaration.name, optional: declaration.optional ?? false };
    if (declaration.type !== undefined) descriptor.type = declaration.type;
    if (declaration.rest) {
      descriptor.optional = true;
      descriptor.rest = true;
    }
    if ('defaultValue' in declaration) {
      descriptor.optional = declaration.optional ?? true;
      descriptor.defaultValue = declaration.defaultValue;
    }
    return descriptor;
  }
  const match = DECLARATION_PATTERN.exec(declaration);
  if (!match) {
    throw new InvalidArgumentError(declaration, 'invalid_parameter');
  }
  const [, name, optional, type] = match;
  return type ? { name, type, optional: optional === '?' } : { name, optional: optional === '?' };
}

/** True if `fn` is a class constructor, judged from its source. */
// biome-ignore lint/complexity/noBannedTypes: any callable
export function isClass(fn: Function): fn is Constructor {
  return /^class[\s{]/.test(Function.prototype.toString.call(fn));
}

/**
 * Default parameter introspection.
 *
 * Uses descriptors declared with `inject()` when present, and otherwise reads
 * parameter names from the callable's source. Parameters with a default
 * initialiser are optional with an `undefined` default, so the initialiser
 * runs when nothing else matches. Destructured parameters are named `$<index>`.
 */
export class ParameterDescriber implements IParameterDescriber {
  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor
  describe(target: Function): ParameterDescriptor[] {
    return this.lookup(target);
  }

  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor
  locate(target: Function): string {
    const name = target.name;
    if (isClass(target)) return `class ${name || '(anonymous)'}`;
    return name ? `function ${name}` : 'anonymous function';
  }

  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor
  private lookup(target: Function): ParameterDescriptor[] {
    const explicit = declared.get(target);
    if (explicit) return explicit;

    const cached = parsed.get(target);
    if (cached) return cached;

    const params = this.parse(target);
    parsed.set(target, params);
    return params;
  }

  // biome-ignore lint/complexity/noBannedTypes: any callable or constructor
  private parse(target: Function): ParameterDescriptor[] {
    const source = Function.prototype.toString.call(target);

    if (/\{\s*\[native code\]\s*\}\s*$/.test(source)) {
      return Array.from({ length: target.length }, (_, i) => ({ name: `$${i}`, optional: false }));
    }

    if (isClass(target)) {
      const list = constructorParameterList(source);
      if (list !== undefined) return splitParameters(list);
      const parent: unknown = Object.getPrototypeOf(target);
      if (typeof parent === 'function' && parent !== Function.prototype) {
        return this.lookup(parent);
      }
      return [];
    }

    const arrow = /^(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/.exec(source);
    if (arrow) return [{ name: arrow[1], optional: false }];

    const list = parameterList(source);
    return list === undefined ? [] : splitParameters(list);
  }
}

/** Text between the parentheses of the first parameter list in a function's source. */
function parameterList(source: string): string | undefined {
  let i = 0;
  if (source.startsWith('[')) {
    // computed method name
    i = findClosing(source, 0) + 1;
    if (i === 0) return undefined;
  }
  const open = source.indexOf('(', i);
  if (open < 0) return undefined;
  const close = findClosing(source, open);
  return close < 0 ? undefined : source.slice(open + 1, close);
}

/** Text of the constructor parameter list at the top level of a class body, if any. */
function constructorParameterList(source: string): string | undefined {
  let i = 0;
  let parens = 0;
  while (i < source.length) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped;
      continue;
    }
    const c = source[i];
    if (c === '(') parens++;
    else if (c === ')') parens--;
    else if (c === '{' && parens === 0) break;
    i++;
  }

  let depth = 0;
  for (i++; i < source.length; i++) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped - 1;
      continue;
    }
    const c = source[i];
    if (c === '{' || c === '(' || c === '[') {
      depth++;
    } else if (c === '}' || c === ')' || c === ']') {
      if (depth === 0) return undefined;
      depth--;
    } else if (depth === 0 && source.startsWith('constructor', i) && !/[\w$]/.test(source[i - 1] ?? '')) {
      const match = /^constructor\s*\(/.exec(source.slice(i));
      if (match) {
        const open = i + match[0].length - 1;
        const close = findClosing(source, open);
        return close < 0 ? undefined : source.slice(open + 1, close);
      }
    }
  }
  return undefined;
}

function splitParameters(list: string): ParameterDescriptor[] {
  const pieces: string[] = [];
  let start = 0;
  let depth = 0;
  for (let i = 0; i < list.length; i++) {
    const skipped = skipLiteral(list, i);
    if (skipped !== i) {
      i = skipped - 1;
      continue;
    }
    const c = list[i];
    if (c === '(' || c === '[' || c === '{') depth++;
    else if (c === ')' || c === ']' || c === '}') depth--;
    else if (c === ',' && depth === 0) {
      pieces.push(list.slice(start, i));
      start = i + 1;
    }
  }
  pieces.push(list.slice(start));

  return pieces
    .map((piece) => stripComments(piece).trim())
    .filter((piece) => piece.length > 0)
    .map((piece, index) => toParameter(piece, index));
}

function toParameter(piece: string, index: number): ParameterDescriptor {
  if (piece.startsWith('...')) {
    const rest = /^\.\.\.\s*([A-Za-z_$][\w$]*)/.exec(piece);
    return { name: rest ? rest[1] : `$${index}`, optional: true, rest: true };
  }
  if (piece.startsWith('{') || piece.startsWith('[')) {
    const close = findClosing(piece, 0);
    const tail = close < 0 ? '' : piece.slice(close + 1).trim();
    return { name: `$${index}`, optional: tail.startsWith('=') };
  }
  const match = /^([A-Za-z_$][\w$]*)\s*(=)?/.exec(piece);
  if (!match) return { name: `$${index}`, optional: false };
  return { name: match[1], optional: match[2] === '=' };
}

function stripComments(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; ) {
    const skipped = skipLiteral(text, i);
    if (skipped === i) {
      out += text[i];
      i++;
    } else {
      if (text.startsWith('//', i) || text.startsWith('/*', i)) out += ' ';
      else out += text.slice(i, skipped);
      i = skipped;
    }
  }
  return out;
}

/** Index of the bracket closing the one at `open`, or -1. */
function findClosing(source: string, open: number): number {
  let depth = 0;
  for (let i = open; i < source.length; i++) {
    const skipped = skipLiteral(source, i);
    if (skipped !== i) {
      i = skipped - 1;
      continue;
    }
    const c = source[i];
    if (c === '(' || c === '[' || c === '{') depth++;
    else if (c === ')' || c === ']' || c === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * If a string, template, regular expression or comment starts at `i`, returns the
 * index just past it. Otherwise returns `i`.
 */
function skipLiteral(source: string, i: number): number {
  const c = source[i];
  if (c === '/' && source[i + 1] !== '/' && source[i + 1] !== '*' && startsExpression(source, i)) {
    return skipRegExp(source, i);
  }
  if (c === '"' || c === "'") {
    let j = i + 1;
    while (j < source.length && source[j] !== c) {
      j += source[j] === '\\' ? 2 : 1;
    }
    return j + 1;
  }
  if (c === '`') {
    let j = i + 1;
    while (j < source.length && source[j] !== '`') {
      if (source[j] === '\\') {
        j += 2;
      } else if (source[j] === '$' && source[j + 1] === '{') {
        const close = findClosing(source, j + 1);
        j = close < 0 ? source.length : close + 1;
      } else {
        j++;
      }
    }
    return j + 1;
  }
  if (c === '/' && source[i + 1] === '/') {
    const end = source.indexOf('\n', i);
    return end < 0 ? source.length : end;
  }
  if (c === '/' && source[i + 1] === '*') {
    const end = source.indexOf('*/', i + 2);
    return end < 0 ? source.length : end + 2;
  }
  return i;
}

/** True if a `/` at `i` opens a regular expression rather than dividing. */
function startsExpression(source: string, i: number): boolean {
  let j = i - 1;
  while (j >= 0 && /\s/.test(source[j])) j--;
  return j < 0 || '(,=:[!&|?{};+-*%<>~^'.includes(source[j]);
}

function skipRegExp(source: string, i: number): number {
  let inClass = false;
  let j = i + 1;
  while (j < source.length) {
    const c = source[j];
    if (c === '\\') {
      j += 2;
      continue;
    }
    if (c === '\n') return j;
    if (c === '[') inClass = true;
    else if (c === ']') inClass = false;
    else if (c === '/' && !inClass) break;
    j++;
  }
  j++;
  while (j < source.length && /[a-z]/i.test(source[j])) j++;
  return j;
}
