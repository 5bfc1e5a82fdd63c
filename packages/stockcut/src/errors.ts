/**
 * Error types raised by the policy.
 */

/** A policy operation was called before `initialize()`. */
export class PolicyNotInitializedError extends Error {
  constructor(operation: string) {
    super(`Policy not initialized: call initialize() before ${operation}()`);
    this.name = "PolicyNotInitializedError";
  }
}

/** The experience buffer was driven out of its append/finalize protocol. */
export class BufferError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BufferError";
  }
}

/** A checkpoint could not be written, read or applied. */
export class CheckpointError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CheckpointError";
  }
}
