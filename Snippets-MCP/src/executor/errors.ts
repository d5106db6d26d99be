import { BaseError } from '../../../Shared/Types/errors.js';

/**
 * The caller aborted an execution. Raised only after the runtime process
 * has exited.
 */
export class ExecutionCancelledError extends BaseError {
  constructor(public readonly executionId: string) {
    super('Script execution was cancelled', 'EXECUTION_CANCELLED', { executionId });
  }
}
