import { type CapturedArgs, CapturedCall } from './callback.js';
import type { MethodDescriptor } from './method-descriptor.js';

/**
 * Method invoked with `this` set to `undefined`, with captured arguments.
 *
 * Only meaningful for methods that never touch their receiver. A method
 * that does will fail inside its own body when invoked.
 */
export class UnboundMethodCallback extends CapturedCall {
  readonly kind = 'unbound-method';

  private readonly method: MethodDescriptor;

  constructor(method: MethodDescriptor, args: CapturedArgs) {
    super(method.name, args);
    this.method = method;
  }

  invoke(): void {
    Reflect.apply(this.method.fn, undefined, this.args);
  }

  toString(): string {
    return `UnboundMethodCallback(method=${this.target}, arity=${this.arity})`;
  }
}

/**
 * Method invoked with `this` set to `undefined`, without arguments.
 */
export class NullaryUnboundMethodCallback extends CapturedCall {
  readonly kind = 'unbound-method-nullary';

  private readonly method: MethodDescriptor;

  constructor(method: MethodDescriptor) {
    super(method.name, []);
    this.method = method;
  }

  invoke(): void {
    Reflect.apply(this.method.fn, undefined, []);
  }

  toString(): string {
    return `NullaryUnboundMethodCallback(method=${this.target})`;
  }
}
