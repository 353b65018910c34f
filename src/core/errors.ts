export type QueueErrorCode = 'VALIDATION' | 'DUPLICATE_JOB' | 'NOT_IN_DLQ';

/**
 * Base class for errors reported back to the operator.
 * Anything that is not a QueueError is a bug or an environment fault.
 */
export class QueueError extends Error {
  constructor(readonly code: QueueErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends QueueError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class DuplicateJobError extends QueueError {
  constructor(readonly jobId: string) {
    super('DUPLICATE_JOB', `A job with ID '${jobId}' already exists.`);
  }
}

export class NotInDLQError extends QueueError {
  constructor(readonly jobId: string) {
    super('NOT_IN_DLQ', `Job ID '${jobId}' not found in DLQ.`);
  }
}
