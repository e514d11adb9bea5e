/**
 * The invocation interface shared by every deferred call.
 *
 * Holders of a {@link Callback} only ever call `invoke()`; they never need
 * to know which function, method or receiver sits behind it.
 */

/**
 * A captured call, ready to run.
 */
export interface Callback {
  /**
   * Run the captured call with its captured arguments.
   *
   * Every call re-runs it with the same argument snapshot. The callable's
   * return value is discarded and anything it throws propagates unchanged.
   */
  invoke(): void;
}

/**
 * Discriminant of the concrete callback variants.
 */
export type CallbackKind =
  | 'function'
  | 'function-nullary'
  | 'bound-method'
  | 'bound-method-nullary'
  | 'unbound-method'
  | 'unbound-method-nullary';

/**
 * Arguments captured at construction.
 */
export type CapturedArgs = readonly unknown[];

/**
 * Check whether a value can be used as a {@link Callback}.
 */
export function isCallback(value: unknown): value is Callback {
  return (
    typeof value === 'object' &&
    value !== null &&
    'invoke' in value &&
    typeof value.invoke === 'function'
  );
}

/**
 * Common state of the concrete variants: the display name of the target
 * and a frozen copy of the captured arguments.
 */
export abstract class CapturedCall implements Callback {
  abstract readonly kind: CallbackKind;

  /** Function or method name */
  readonly target: string;

  protected readonly args: CapturedArgs;

  protected constructor(target: string, args: CapturedArgs) {
    this.target = target;
    this.args = Object.freeze([...args]);
  }

  /** Number of captured arguments. */
  get arity(): number {
    return this.args.length;
  }

  abstract invoke(): void;
}
