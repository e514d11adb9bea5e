/**
 * Unbound method descriptors.
 *
 * A descriptor names a method without tying it to a receiver, so it can
 * be applied later to a shared receiver or to no receiver at all. Being a
 * tagged record rather than a bare function is what keeps a method apart
 * from a free function when both are passed to {@link makeCallback}.
 *
 * @example
 * ```typescript
 * class Counter {
 *   count = 0;
 *   add(n: number): void {
 *     this.count += n;
 *   }
 * }
 *
 * const add = methodOf(Counter.prototype, 'add');
 * // add.name === 'add', add.fn === Counter.prototype.add
 * ```
 */

import { typeName } from '../shared/type-name.js';
import { InvalidCallableError, MethodDispatchError } from './errors.js';

/**
 * Any function, with or without a declared `this`.
 */
export type Method = (...args: never[]) => unknown;

/**
 * Keys of `T` whose values are functions.
 */
export type MethodKeys<T> = {
  [K in keyof T]-?: T[K] extends Method ? K : never;
}[keyof T];

/**
 * Parameter list of the method stored under `K` on `T`.
 */
export type MethodArgs<T, K> = K extends keyof T
  ? T[K] extends (...args: infer A) => unknown
    ? A
    : never
  : never;

/**
 * A method captured without a receiver.
 */
export interface MethodDescriptor<F extends Method = Method> {
  readonly kind: 'method';
  /** Method name, used in logs and `toString()` output */
  readonly name: string;
  /** The unbound function */
  readonly fn: F;
}

/**
 * Narrow a value to a callable, keeping its own signature when it has one.
 */
export function isMethod<V>(value: V): value is Method & V {
  return typeof value === 'function';
}

/**
 * Check whether a value is a {@link MethodDescriptor}.
 */
export function isMethodDescriptor(value: unknown): value is MethodDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'method' &&
    'fn' in value &&
    isMethod(value.fn)
  );
}

/**
 * Wrap a function as a method descriptor.
 *
 * @param fn - The unbound method, e.g. `Greeter.prototype.greet`
 * @param name - Display name (defaults to `fn.name`)
 * @throws InvalidCallableError if `fn` is not a function
 */
export function method<F extends Method>(fn: F, name?: string): MethodDescriptor<F> {
  if (!isMethod(fn)) {
    throw new InvalidCallableError('a method', typeName(fn));
  }
  const descriptor: MethodDescriptor<F> = {
    kind: 'method',
    name: name ?? (fn.name || 'anonymous'),
    fn,
  };
  return Object.freeze(descriptor);
}

/**
 * Look a method up by key and wrap it as a descriptor.
 *
 * The function is resolved once, here; reassigning the property later
 * does not change the descriptor.
 *
 * @param source - Prototype or instance holding the method
 * @param key - Method name
 * @throws MethodDispatchError if `source[key]` is not a function
 */
export function methodOf<T extends object, K extends MethodKeys<T> & keyof T>(
  source: T,
  key: K
): MethodDescriptor<Method & T[K]> {
  const fn = source[key];
  if (!isMethod(fn)) {
    throw new MethodDispatchError(typeName(source), String(key));
  }
  return method<Method & T[K]>(fn, String(key));
}

/**
 * Untyped counterpart of {@link methodOf} for keys that only exist at run time.
 *
 * @throws MethodDispatchError if `source[key]` is not a function
 */
export function lookupMethod(source: object, key: PropertyKey): MethodDescriptor {
  const fn: unknown = Reflect.get(source, key);
  if (!isMethod(fn)) {
    throw new MethodDispatchError(typeName(source), String(key));
  }
  return method(fn, String(key));
}
