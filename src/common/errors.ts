import { StreamDescriptor, formatDescriptor } from '../types';

/**
 * Base class for consistency violations raised by the checkpoint core
 */
export class CheckpointError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckpointError';
    Object.setPrototypeOf(this, CheckpointError.prototype);
  }
}

/**
 * Thrown when stream and global checkpoints are mixed within one sync run
 */
export class ModeConflictError extends CheckpointError {
  constructor(
    public readonly currentMode: string,
    public readonly attemptedMode: string
  ) {
    super(`Cannot add a ${attemptedMode} checkpoint: checkpoint mode is already ${currentMode}`);
    this.name = 'ModeConflictError';
    Object.setPrototypeOf(this, ModeConflictError.prototype);
  }
}

/**
 * Thrown when a checkpoint index does not advance past the last one seen for its stream
 */
export class OutOfOrderError extends CheckpointError {
  constructor(
    public readonly stream: StreamDescriptor,
    public readonly index: number,
    public readonly lastIndex: number
  ) {
    super(
      `Checkpoint index ${index} for stream ${formatDescriptor(stream)} is not greater than last index ${lastIndex}`
    );
    this.name = 'OutOfOrderError';
    Object.setPrototypeOf(this, OutOfOrderError.prototype);
  }
}

export class UnknownStreamError extends CheckpointError {
  constructor(public readonly stream: StreamDescriptor) {
    super(`Stream ${formatDescriptor(stream)} is not in the catalog`);
    this.name = 'UnknownStreamError';
    Object.setPrototypeOf(this, UnknownStreamError.prototype);
  }
}

export class DuplicateStreamError extends CheckpointError {
  constructor(public readonly stream: StreamDescriptor) {
    super(`Stream ${formatDescriptor(stream)} appears more than once in the catalog`);
    this.name = 'DuplicateStreamError';
    Object.setPrototypeOf(this, DuplicateStreamError.prototype);
  }
}

/**
 * Thrown when records are counted (or the end marked again) after end of stream
 */
export class EndOfStreamError extends CheckpointError {
  constructor(public readonly stream: StreamDescriptor) {
    super(`End of stream already read for ${formatDescriptor(stream)}`);
    this.name = 'EndOfStreamError';
    Object.setPrototypeOf(this, EndOfStreamError.prototype);
  }
}
