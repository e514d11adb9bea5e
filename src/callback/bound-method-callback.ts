/**
 * Callbacks that invoke a method on a shared receiver.
 *
 * The callback takes its own share of the receiver at construction, so
 * the receiver stays alive while the callback holds it, whatever the
 * other owners do. Calling `release()` gives that share back; invoking
 * afterwards throws `DanglingReceiverError`.
 */

import type { SharedRef } from '../shared/shared-ref.js';
import { type CapturedArgs, CapturedCall } from './callback.js';
import type { MethodDescriptor } from './method-descriptor.js';

abstract class ReceiverCall<T> extends CapturedCall {
  protected readonly receiver: SharedRef<T>;
  protected readonly method: MethodDescriptor;

  protected constructor(receiver: SharedRef<T>, method: MethodDescriptor, args: CapturedArgs) {
    super(method.name, args);
    this.receiver = receiver.clone();
    this.method = method;
  }

  /** Type name of the receiver. */
  get receiverName(): string {
    return this.receiver.label;
  }

  /**
   * Give back this callback's share of the receiver.
   */
  release(): void {
    this.receiver.release();
  }
}

/**
 * Method on a shared receiver, with captured arguments.
 */
export class BoundMethodCallback<T = unknown> extends ReceiverCall<T> {
  readonly kind = 'bound-method';

  constructor(receiver: SharedRef<T>, method: MethodDescriptor, args: CapturedArgs) {
    super(receiver, method, args);
  }

  /**
   * @throws DanglingReceiverError if the callback's share was released
   */
  invoke(): void {
    Reflect.apply(this.method.fn, this.receiver.get(), this.args);
  }

  toString(): string {
    return `BoundMethodCallback(receiver=${this.receiverName}, method=${this.target}, arity=${this.arity})`;
  }
}

/**
 * Method on a shared receiver, called without arguments.
 */
export class NullaryBoundMethodCallback<T = unknown> extends ReceiverCall<T> {
  readonly kind = 'bound-method-nullary';

  constructor(receiver: SharedRef<T>, method: MethodDescriptor) {
    super(receiver, method, []);
  }

  invoke(): void {
    Reflect.apply(this.method.fn, this.receiver.get(), []);
  }

  toString(): string {
    return `NullaryBoundMethodCallback(receiver=${this.receiverName}, method=${this.target})`;
  }
}
