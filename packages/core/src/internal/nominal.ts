/**
 * Nominal types - class ancestry plus declared interfaces.
 *
 * The closure of a prototype (every class name on its chain and every
 * interface those classes implement, transitively) is computed once and
 * cached per prototype. Any registry change drops the cache.
 */

import { InvalidArgumentError } from '../errors';
import { NOMINAL_NAME } from './constants';
import { createLogger } from './logger';

type AnyConstructor = abstract new (...args: never[]) => unknown;

const log = createLogger('NominalRegistry');

// interface name → parent interface names
const INTERFACES = new Map<string, readonly string[]>();
// class → interfaces it declares directly
const IMPLEMENTS = new WeakMap<object, string[]>();
// prototype → closure
let CLOSURE_CACHE = new WeakMap<object, ReadonlySet<string>>();

const EMPTY: ReadonlySet<string> = new Set<string>();

function assertName(name: string): void {
  if (!NOMINAL_NAME.test(name)) {
    throw new InvalidArgumentError(`Invalid interface name: '${name}'.`);
  }
}

function invalidate(): void {
  CLOSURE_CACHE = new WeakMap();
}

/**
 * Declares an interface, optionally extending others. Redeclaring replaces
 * the parent list.
 */
export function declareInterface(name: string, options: { extends?: readonly string[] } = {}): void {
  assertName(name);
  const parents = options.extends ?? [];
  parents.forEach(assertName);
  INTERFACES.set(name, [...parents]);
  invalidate();
  log.debug('interface_declared', { name, extends: parents });
}

/**
 * Records that instances of `ctor` (and of its subclasses) satisfy the named
 * interfaces. Undeclared interfaces are declared with no parents.
 */
export function implementInterface(ctor: AnyConstructor, ...names: string[]): void {
  names.forEach(assertName);
  for (const name of names) {
    if (!INTERFACES.has(name)) INTERFACES.set(name, []);
  }
  const existing = IMPLEMENTS.get(ctor) ?? [];
  IMPLEMENTS.set(ctor, [...new Set([...existing, ...names])]);
  invalidate();
  log.debug('interface_implemented', { ctor: ctor.name, names });
}

function addInterface(into: Set<string>, name: string): void {
  if (into.has(name)) return;
  into.add(name);
  for (const parent of INTERFACES.get(name) ?? []) {
    addInterface(into, parent);
  }
}

function closureOf(proto: object | null): ReadonlySet<string> {
  if (proto === null) return EMPTY;

  const cached = CLOSURE_CACHE.get(proto);
  if (cached) return cached;

  const parent: object | null = Object.getPrototypeOf(proto);
  const names = new Set<string>(closureOf(parent));
  if (Object.prototype.hasOwnProperty.call(proto, 'constructor')) {
    const ctor: unknown = proto.constructor;
    if (typeof ctor === 'function') {
      if (ctor.name !== '') names.add(ctor.name);
      for (const iface of IMPLEMENTS.get(ctor) ?? []) {
        addInterface(names, iface);
      }
    }
  }

  CLOSURE_CACHE.set(proto, names);
  return names;
}

/**
 * Every nominal type name an object satisfies.
 */
export function nominalClosure(value: object): ReadonlySet<string> {
  const proto: object | null = Object.getPrototypeOf(value);
  return closureOf(proto);
}

export function satisfiesNominal(value: object, name: string): boolean {
  const dot = name.lastIndexOf('.');
  return nominalClosure(value).has(dot === -1 ? name : name.slice(dot + 1));
}
