/**
 * Error types shared across the pipeline
 */

/**
 * Thrown by stage implementations. `retryable` separates transient conditions
 * (network, rate limits) from permanent ones (bad input, content below the
 * quality bar); `cause` is a short code recorded on the item.
 */
export class StageFailure extends Error {
  readonly retryable: boolean;
  readonly code: string;

  constructor(message: string, options: { retryable: boolean; code: string }) {
    super(message);
    this.name = 'StageFailure';
    this.retryable = options.retryable;
    this.code = options.code;
  }

  static transient(code: string, message: string): StageFailure {
    return new StageFailure(message, { retryable: true, code });
  }

  static permanent(code: string, message: string): StageFailure {
    return new StageFailure(message, { retryable: false, code });
  }
}

export class SourceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

export class StorageNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Storage object not found: ${path}`);
    this.name = 'StorageNotFoundError';
    this.path = path;
  }
}

export class BatchInProgressError extends Error {
  readonly batchId: string;

  constructor(batchId: string) {
    super(`Batch ${batchId} already has a run in progress`);
    this.name = 'BatchInProgressError';
    this.batchId = batchId;
  }
}

export class BatchNotFoundError extends Error {
  constructor(batchId: string) {
    super(`Batch ${batchId} has no item records`);
    this.name = 'BatchNotFoundError';
  }
}

export class ItemNotFoundError extends Error {
  constructor(batchId: string, itemId: string) {
    super(`Item ${itemId} not found in batch ${batchId}`);
    this.name = 'ItemNotFoundError';
  }
}

export class ReplayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReplayError';
  }
}

/**
 * Raised when the state machine is asked for a transition the stage table
 * does not allow. Indicates a defect, never an environmental failure.
 */
export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal item transition: ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}
