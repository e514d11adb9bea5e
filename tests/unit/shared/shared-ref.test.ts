/**
 * SharedRef tests.
 *
 * Verifies use counting, release semantics and dangling dereferences.
 */

import { describe, expect, it } from 'vitest';
import { DanglingReceiverError } from '../../../src/callback/errors.js';
import { SharedRef, shared } from '../../../src/shared/shared-ref.js';

class Session {
  readonly id: string;

  constructor(id: string) {
    this.id = id;
  }
}

describe('SharedRef', () => {
  describe('shared', () => {
    it('creates a ref with a single owner', () => {
      const session = new Session('s-1');
      const ref = shared(session);

      expect(ref).toBeInstanceOf(SharedRef);
      expect(ref.useCount).toBe(1);
      expect(ref.released).toBe(false);
      expect(ref.get()).toBe(session);
      expect(ref.label).toBe('Session');
    });
  });

  describe('clone', () => {
    it('shares the target and increments the use count', () => {
      const ref = shared(new Session('s-1'));
      const copy = ref.clone();

      expect(copy.get()).toBe(ref.get());
      expect(ref.useCount).toBe(2);
      expect(copy.useCount).toBe(2);
    });

    it('throws on a released ref', () => {
      const ref = shared(new Session('s-1'));
      ref.release();

      expect(() => ref.clone()).toThrow(DanglingReceiverError);
    });
  });

  describe('release', () => {
    it('keeps the target alive while another owner remains', () => {
      const session = new Session('s-1');
      const ref = shared(session);
      const copy = ref.clone();

      ref.release();

      expect(ref.released).toBe(true);
      expect(copy.useCount).toBe(1);
      expect(copy.get()).toBe(session);
    });

    it('is idempotent per ref', () => {
      const ref = shared(new Session('s-1'));
      const copy = ref.clone();

      ref.release();
      ref.release();

      expect(copy.useCount).toBe(1);
    });

    it('drops the target when the last owner releases', () => {
      const ref = shared(new Session('s-1'));
      const copy = ref.clone();

      ref.release();
      copy.release();

      expect(copy.useCount).toBe(0);
      expect(() => copy.get()).toThrow(DanglingReceiverError);
    });
  });

  describe('get', () => {
    it('throws DanglingReceiverError naming the receiver type', () => {
      const ref = shared(new Session('s-1'));
      ref.release();

      expect(() => ref.get()).toThrow("Shared reference to 'Session' has been released");
    });

    it('throws for a released ref even while other owners remain', () => {
      const ref = shared(new Session('s-1'));
      const copy = ref.clone();
      ref.release();

      expect(() => ref.get()).toThrow(DanglingReceiverError);
      expect(copy.get().id).toBe('s-1');
    });
  });

  describe('toString', () => {
    it('shows the label and use count', () => {
      const ref = shared(new Session('s-1'));
      ref.clone();

      expect(ref.toString()).toBe('SharedRef(Session, useCount=2)');
    });
  });
});
