import type { Method } from './method-descriptor.js';
import { type CapturedArgs, CapturedCall } from './callback.js';

/**
 * Free function with captured arguments.
 */
export class FunctionCallback extends CapturedCall {
  readonly kind = 'function';

  private readonly fn: Method;

  constructor(fn: Method, args: CapturedArgs) {
    super(fn.name || 'anonymous', args);
    this.fn = fn;
  }

  invoke(): void {
    Reflect.apply(this.fn, undefined, this.args);
  }

  toString(): string {
    return `FunctionCallback(fn=${this.target}, arity=${this.arity})`;
  }
}

/**
 * Free function called without arguments.
 */
export class NullaryFunctionCallback extends CapturedCall {
  readonly kind = 'function-nullary';

  private readonly fn: Method;

  constructor(fn: Method) {
    super(fn.name || 'anonymous', []);
    this.fn = fn;
  }

  invoke(): void {
    Reflect.apply(this.fn, undefined, []);
  }

  toString(): string {
    return `NullaryFunctionCallback(fn=${this.target})`;
  }
}
