/**
 * Error types raised by the deferred-call library itself.
 *
 * Errors thrown by a captured callable are never wrapped in these types;
 * they reach the caller of `invoke()` unchanged.
 */

/**
 * Base error class for capture and dereference failures.
 */
export class CallbackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CallbackError';
  }
}

/**
 * Error thrown when a factory receives a target it cannot call.
 */
export class InvalidCallableError extends CallbackError {
  readonly expected: string;
  readonly received: string;

  constructor(expected: string, received: string) {
    super(`Expected ${expected}, received ${received}`);
    this.name = 'InvalidCallableError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * Error thrown when a receiver has no function under the requested key.
 */
export class MethodDispatchError extends CallbackError {
  readonly receiverName: string;
  readonly methodName: string;

  constructor(receiverName: string, methodName: string) {
    super(`Receiver '${receiverName}' does not have method '${methodName}'`);
    this.name = 'MethodDispatchError';
    this.receiverName = receiverName;
    this.methodName = methodName;
  }
}

/**
 * Error thrown when a released shared reference is dereferenced.
 */
export class DanglingReceiverError extends CallbackError {
  readonly receiverName: string;

  constructor(receiverName: string) {
    super(`Shared reference to '${receiverName}' has been released`);
    this.name = 'DanglingReceiverError';
    this.receiverName = receiverName;
  }
}
