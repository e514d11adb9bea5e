/**
 * Deferred call capture.
 *
 * - `Callback`: the single `invoke()` interface every handle satisfies
 * - `FunctionCallback`, `BoundMethodCallback`, `UnboundMethodCallback`
 *   and their nullary forms: the concrete variants
 * - `makeCallback`, `fromFunction`, `fromMethod`, `fromUnboundMethod`:
 *   the factory layer
 * - `method`, `methodOf`: method descriptors
 */

export { BoundMethodCallback, NullaryBoundMethodCallback } from './bound-method-callback.js';
export {
  type Callback,
  type CallbackKind,
  type CapturedArgs,
  CapturedCall,
  isCallback,
} from './callback.js';
export {
  CallbackError,
  DanglingReceiverError,
  InvalidCallableError,
  MethodDispatchError,
} from './errors.js';
export {
  type BoundMethodVariant,
  type CallbackVariant,
  type FunctionVariant,
  fromFunction,
  fromMethod,
  fromUnboundMethod,
  makeCallback,
  type UnboundMethodVariant,
} from './factory.js';
export { FunctionCallback, NullaryFunctionCallback } from './function-callback.js';
export {
  isMethod,
  isMethodDescriptor,
  lookupMethod,
  type Method,
  type MethodArgs,
  type MethodDescriptor,
  type MethodKeys,
  method,
  methodOf,
} from './method-descriptor.js';
export { NullaryUnboundMethodCallback, UnboundMethodCallback } from './unbound-method-callback.js';
