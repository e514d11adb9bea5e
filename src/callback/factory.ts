/**
 * Factory layer: builds the right callback variant for a call shape.
 *
 * Three named constructors cover the three shapes explicitly:
 *
 * - {@link fromFunction}: `(fn, ...args)`
 * - {@link fromMethod}: `(sharedReceiver, methodKeyOrDescriptor, ...args)`
 * - {@link fromUnboundMethod}: `(descriptor, ...args)`
 *
 * {@link makeCallback} accepts any of the three shapes. Its overloads are
 * told apart by the first parameter alone (a function, a `SharedRef` or a
 * `MethodDescriptor`), which never overlap. Each constructor picks the
 * nullary variant when no arguments are given.
 *
 * @example
 * ```typescript
 * const pending: Callback[] = [
 *   makeCallback(add, 2, 3),
 *   makeCallback(shared(counter), 'increment'),
 *   makeCallback(methodOf(Audit.prototype, 'record'), 'boot'),
 * ];
 *
 * for (const callback of pending) {
 *   callback.invoke();
 * }
 * ```
 */

import { SharedRef } from '../shared/shared-ref.js';
import { typeName } from '../shared/type-name.js';
import { createLogger } from '../logging/index.js';
import { BoundMethodCallback, NullaryBoundMethodCallback } from './bound-method-callback.js';
import type { Callback, CapturedArgs, CapturedCall } from './callback.js';
import { InvalidCallableError } from './errors.js';
import { FunctionCallback, NullaryFunctionCallback } from './function-callback.js';
import {
  isMethod,
  isMethodDescriptor,
  lookupMethod,
  type Method,
  type MethodArgs,
  type MethodDescriptor,
  type MethodKeys,
} from './method-descriptor.js';
import { NullaryUnboundMethodCallback, UnboundMethodCallback } from './unbound-method-callback.js';

const logger = createLogger({ component: 'callback-factory' });

/** Variants returned by {@link fromFunction}. */
export type FunctionVariant = FunctionCallback | NullaryFunctionCallback;

/** Variants returned by {@link fromMethod}. */
export type BoundMethodVariant<T = unknown> = BoundMethodCallback<T> | NullaryBoundMethodCallback<T>;

/** Variants returned by {@link fromUnboundMethod}. */
export type UnboundMethodVariant = UnboundMethodCallback | NullaryUnboundMethodCallback;

/** Every concrete callback variant. */
export type CallbackVariant = FunctionVariant | BoundMethodVariant | UnboundMethodVariant;

function created<C extends CapturedCall>(callback: C): C {
  logger.debug('Captured deferred call', {
    kind: callback.kind,
    target: callback.target,
    arity: callback.arity,
  });
  return callback;
}

function isReceiver(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function isPropertyKey(value: unknown): value is PropertyKey {
  return typeof value === 'string' || typeof value === 'symbol' || typeof value === 'number';
}

function captureFunction(fn: unknown, args: CapturedArgs): FunctionVariant {
  if (!isMethod(fn)) {
    throw new InvalidCallableError('a function', typeName(fn));
  }
  return created(args.length === 0 ? new NullaryFunctionCallback(fn) : new FunctionCallback(fn, args));
}

function captureBoundMethod<T>(
  receiver: SharedRef<T>,
  method: unknown,
  args: CapturedArgs
): BoundMethodVariant<T> {
  let descriptor: MethodDescriptor;
  if (isMethodDescriptor(method)) {
    descriptor = method;
  } else if (isPropertyKey(method)) {
    const target = receiver.get();
    if (!isReceiver(target)) {
      throw new InvalidCallableError('an object or function receiver', typeName(target));
    }
    descriptor = lookupMethod(target, method);
  } else {
    throw new InvalidCallableError('a method name or descriptor', typeName(method));
  }

  return created(
    args.length === 0
      ? new NullaryBoundMethodCallback(receiver, descriptor)
      : new BoundMethodCallback(receiver, descriptor, args)
  );
}

function captureUnboundMethod(method: unknown, args: CapturedArgs): UnboundMethodVariant {
  if (!isMethodDescriptor(method)) {
    throw new InvalidCallableError('a method descriptor', typeName(method));
  }
  return created(
    args.length === 0
      ? new NullaryUnboundMethodCallback(method)
      : new UnboundMethodCallback(method, args)
  );
}

/**
 * Capture a free function and its arguments.
 *
 * @param fn - Function to call later
 * @param args - Arguments to call it with, checked against `fn`'s parameters
 * @throws InvalidCallableError if `fn` is not a function
 *
 * @example
 * ```typescript
 * const callback = fromFunction(add, 2, 3);
 * callback.invoke(); // add(2, 3)
 * ```
 */
export function fromFunction<F extends Method>(fn: F, ...args: Parameters<F>): FunctionVariant {
  return captureFunction(fn, args);
}

/**
 * Capture a method call on a shared receiver.
 *
 * The method is given either by key, resolved on the receiver right away,
 * or as a descriptor. The callback holds its own share of the receiver.
 *
 * @throws MethodDispatchError if the key does not name a function on the receiver
 *
 * @example
 * ```typescript
 * const callback = fromMethod(shared(counter), 'add', 5);
 * callback.invoke(); // counter.add(5)
 * ```
 */
export function fromMethod<T extends object, K extends MethodKeys<T>>(
  receiver: SharedRef<T>,
  method: K,
  ...args: MethodArgs<T, K>
): BoundMethodVariant<T>;
export function fromMethod<T extends object, F extends Method>(
  receiver: SharedRef<T>,
  method: MethodDescriptor<F>,
  ...args: Parameters<F>
): BoundMethodVariant<T>;
export function fromMethod<T extends object>(
  receiver: SharedRef<T>,
  method: PropertyKey | MethodDescriptor,
  ...args: unknown[]
): BoundMethodVariant<T> {
  if (!(receiver instanceof SharedRef)) {
    throw new InvalidCallableError('a shared receiver', typeName(receiver));
  }
  return captureBoundMethod(receiver, method, args);
}

/**
 * Capture a method call with no receiver; `this` is `undefined` when it runs.
 *
 * @throws InvalidCallableError if `method` is not a descriptor
 *
 * @example
 * ```typescript
 * const callback = fromUnboundMethod(methodOf(Audit.prototype, 'record'), 'boot');
 * callback.invoke(); // Audit.prototype.record.call(undefined, 'boot')
 * ```
 */
export function fromUnboundMethod<F extends Method>(
  method: MethodDescriptor<F>,
  ...args: Parameters<F>
): UnboundMethodVariant {
  return captureUnboundMethod(method, args);
}

/**
 * Capture any supported call shape behind the {@link Callback} interface.
 */
export function makeCallback<F extends Method>(fn: F, ...args: Parameters<F>): Callback;
export function makeCallback<T extends object, K extends MethodKeys<T>>(
  receiver: SharedRef<T>,
  method: K,
  ...args: MethodArgs<T, K>
): Callback;
export function makeCallback<T extends object, F extends Method>(
  receiver: SharedRef<T>,
  method: MethodDescriptor<F>,
  ...args: Parameters<F>
): Callback;
export function makeCallback<F extends Method>(
  method: MethodDescriptor<F>,
  ...args: Parameters<F>
): Callback;
export function makeCallback(
  target: Method | SharedRef<object> | MethodDescriptor,
  ...rest: unknown[]
): CallbackVariant {
  if (target instanceof SharedRef) {
    const [method, ...args] = rest;
    return captureBoundMethod(target, method, args);
  }
  if (isMethodDescriptor(target)) {
    return captureUnboundMethod(target, rest);
  }
  return captureFunction(target, rest);
}
