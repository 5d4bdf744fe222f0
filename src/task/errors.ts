import { ChoreError } from '../errors.js';

/**
 * Thrown when a task is invoked with fewer arguments than it has required
 * parameters, or with more arguments than it declares.
 */
export class ArityError extends ChoreError {
  constructor(
    message: string,
    public readonly taskName: string,
    public readonly missing: string[],
  ) {
    super(message);
    this.name = 'ArityError';
  }
}

export class ArgumentTypeError extends ChoreError {
  constructor(
    public readonly taskName: string,
    public readonly paramName: string,
    public readonly value: string,
    expected: string,
  ) {
    super(`Invalid value for '${paramName}' of task '${taskName}': '${value}' (expected ${expected})`);
    this.name = 'ArgumentTypeError';
  }
}

export class TaskDefinitionError extends ChoreError {
  constructor(
    public readonly taskName: string,
    public readonly issues: string[],
  ) {
    super(`Invalid definition of task '${taskName}': ${issues.join('; ')}`);
    this.name = 'TaskDefinitionError';
  }
}
