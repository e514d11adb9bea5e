/**
 * Reference-counted shared ownership of a receiver object.
 *
 * Every {@link SharedRef} created by {@link SharedRef.clone} points at the
 * same control block. The target is dropped when the last ref is released,
 * after which any {@link SharedRef.get} throws {@link DanglingReceiverError}.
 *
 * @example
 * ```typescript
 * const owner = shared(new Counter());
 * const borrower = owner.clone(); // useCount === 2
 *
 * owner.release(); // useCount === 1, target still alive
 * borrower.get().increment();
 *
 * borrower.release(); // useCount === 0, target dropped
 * ```
 */

import { DanglingReceiverError } from '../callback/errors.js';
import { createLogger } from '../logging/index.js';
import { typeName } from './type-name.js';

const logger = createLogger({ component: 'shared-ref' });

interface ControlBlock<T> {
  target: T | undefined;
  useCount: number;
  readonly label: string;
}

export class SharedRef<T> {
  private readonly block: ControlBlock<T>;
  private isReleased = false;

  private constructor(block: ControlBlock<T>) {
    this.block = block;
  }

  /**
   * Take shared ownership of a value. The new ref has use count 1.
   */
  static of<T extends object>(value: T): SharedRef<T> {
    return new SharedRef<T>({ target: value, useCount: 1, label: typeName(value) });
  }

  /** Number of unreleased refs sharing this control block. */
  get useCount(): number {
    return this.block.useCount;
  }

  /** Whether this particular ref has given up its share. */
  get released(): boolean {
    return this.isReleased;
  }

  /** Type name of the target, kept after the target is dropped. */
  get label(): string {
    return this.block.label;
  }

  /**
   * Dereference the target.
   *
   * @throws DanglingReceiverError if this ref was released or the target was dropped
   */
  get(): T {
    const target = this.block.target;
    if (this.isReleased || target === undefined) {
      logger.warn('Released shared reference dereferenced', {
        receiver: this.block.label,
        use_count: this.block.useCount,
      });
      throw new DanglingReceiverError(this.block.label);
    }
    return target;
  }

  /**
   * Create another owner of the same target.
   *
   * @throws DanglingReceiverError if this ref was already released
   */
  clone(): SharedRef<T> {
    if (this.isReleased || this.block.target === undefined) {
      throw new DanglingReceiverError(this.block.label);
    }
    this.block.useCount += 1;
    return new SharedRef<T>(this.block);
  }

  /**
   * Give up this ref's share. Releasing the same ref twice has no effect.
   */
  release(): void {
    if (this.isReleased) {
      return;
    }
    this.isReleased = true;
    this.block.useCount -= 1;

    if (this.block.useCount === 0) {
      this.block.target = undefined;
      logger.trace('Last owner released shared reference', { receiver: this.block.label });
    }
  }

  toString(): string {
    return `SharedRef(${this.block.label}, useCount=${this.block.useCount})`;
  }
}

/**
 * Take shared ownership of a value.
 *
 * Shorthand for {@link SharedRef.of}.
 */
export function shared<T extends object>(value: T): SharedRef<T> {
  return SharedRef.of(value);
}
