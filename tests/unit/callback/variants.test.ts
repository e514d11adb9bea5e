/**
 * Callback variant tests.
 *
 * Exercises the concrete variants directly, without the factory layer.
 */

import { describe, expect, it } from 'vitest';
import {
  BoundMethodCallback,
  type Callback,
  FunctionCallback,
  isCallback,
  method,
  NullaryBoundMethodCallback,
  NullaryFunctionCallback,
  NullaryUnboundMethodCallback,
  UnboundMethodCallback,
} from '../../../src/callback/index.js';
import { shared } from '../../../src/shared/shared-ref.js';

class Greeter {
  readonly greetings: string[] = [];

  greet(name: string, punctuation: string): void {
    this.greetings.push(`hello ${name}${punctuation}`);
  }

  wave(): void {
    this.greetings.push('wave');
  }
}

describe('callback variants', () => {
  describe('FunctionCallback', () => {
    it('applies the function to the arguments in order', () => {
      const calls: string[] = [];
      function join(a: string, b: string, c: string): void {
        calls.push([a, b, c].join('-'));
      }

      const callback = new FunctionCallback(join, ['x', 'y', 'z']);
      callback.invoke();

      expect(calls).toEqual(['x-y-z']);
      expect(callback.target).toBe('join');
      expect(callback.arity).toBe(3);
    });

    it('copies the argument list at construction', () => {
      const seen: unknown[][] = [];
      const args: unknown[] = [1, 2];
      const callback = new FunctionCallback((...values: never[]) => {
        seen.push(values);
      }, args);

      args.push(3);
      callback.invoke();

      expect(seen).toEqual([[1, 2]]);
    });

    it('names anonymous functions', () => {
      const callback = new FunctionCallback(() => undefined, [1]);

      expect(callback.target).toBe('anonymous');
    });
  });

  describe('NullaryFunctionCallback', () => {
    it('calls the function with no arguments', () => {
      const received: number[] = [];
      const callback = new NullaryFunctionCallback((...values: never[]) => {
        received.push(values.length);
      });

      callback.invoke();

      expect(received).toEqual([0]);
      expect(callback.arity).toBe(0);
    });

    it('runs the function with the same receiver as an empty n-ary callback', () => {
      const receivers: unknown[] = [];
      function whoAmI(this: unknown): void {
        receivers.push(this);
      }

      new NullaryFunctionCallback(whoAmI).invoke();
      new FunctionCallback(whoAmI, []).invoke();

      expect(receivers).toEqual([undefined, undefined]);
    });
  });

  describe('BoundMethodCallback', () => {
    it('applies the method to the shared receiver', () => {
      const greeter = new Greeter();
      const ref = shared(greeter);
      const callback = new BoundMethodCallback(ref, method(Greeter.prototype.greet), ['ada', '!']);

      callback.invoke();

      expect(greeter.greetings).toEqual(['hello ada!']);
      expect(callback.receiverName).toBe('Greeter');
      expect(ref.useCount).toBe(2);
    });

    it('releases only its own share', () => {
      const ref = shared(new Greeter());
      const callback = new BoundMethodCallback(ref, method(Greeter.prototype.greet), ['a', '.']);

      callback.release();
      callback.release();

      expect(ref.useCount).toBe(1);
      expect(ref.get().greetings).toEqual([]);
    });
  });

  describe('NullaryBoundMethodCallback', () => {
    it('calls the method on the shared receiver', () => {
      const greeter = new Greeter();
      const callback = new NullaryBoundMethodCallback(shared(greeter), method(Greeter.prototype.wave));

      callback.invoke();
      callback.invoke();

      expect(greeter.greetings).toEqual(['wave', 'wave']);
    });
  });

  describe('UnboundMethodCallback', () => {
    it('applies the method with an undefined receiver', () => {
      const calls: Array<{ self: unknown; value: number }> = [];
      function track(this: unknown, value: number): void {
        calls.push({ self: this, value });
      }

      new UnboundMethodCallback(method(track), [7]).invoke();

      expect(calls).toEqual([{ self: undefined, value: 7 }]);
    });
  });

  describe('NullaryUnboundMethodCallback', () => {
    it('uses the descriptor name as its target', () => {
      const callback = new NullaryUnboundMethodCallback(method(() => undefined, 'noop'));

      expect(callback.target).toBe('noop');
      expect(callback.kind).toBe('unbound-method-nullary');
    });
  });

  describe('isCallback', () => {
    it('accepts every variant', () => {
      const ref = shared(new Greeter());
      const handles: Callback[] = [
        new FunctionCallback(() => undefined, [1]),
        new NullaryFunctionCallback(() => undefined),
        new BoundMethodCallback(ref, method(Greeter.prototype.greet), ['a', '!']),
        new NullaryBoundMethodCallback(ref, method(Greeter.prototype.wave)),
        new UnboundMethodCallback(method(() => undefined), [1]),
        new NullaryUnboundMethodCallback(method(() => undefined)),
      ];

      expect(handles.every(isCallback)).toBe(true);
    });

    it('accepts a plain object with an invoke function', () => {
      expect(isCallback({ invoke: () => undefined })).toBe(true);
    });

    it('rejects values without an invoke function', () => {
      expect(isCallback(null)).toBe(false);
      expect(isCallback({ invoke: 'later' })).toBe(false);
      expect(isCallback(() => undefined)).toBe(false);
    });
  });
});
