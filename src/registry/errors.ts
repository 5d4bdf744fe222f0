import { ChoreError } from '../errors.js';

export class TaskNotFoundError extends ChoreError {
  constructor(public readonly taskName: string) {
    super(`Task '${taskName}' not found.`);
    this.name = 'TaskNotFoundError';
  }
}

export class MultipleDefaultsError extends ChoreError {
  constructor(public readonly taskNames: string[]) {
    super(`More than one default task found: ${taskNames.join(', ')}`);
    this.name = 'MultipleDefaultsError';
  }
}

/**
 * Thrown when a task requires a task that has not been registered yet.
 * Dependencies must be declared before the tasks that use them.
 */
export class UnknownDependencyError extends ChoreError {
  constructor(
    public readonly taskName: string,
    public readonly dependencyName: string,
  ) {
    super(`Task '${taskName}' requires unknown task '${dependencyName}'. Declare it before '${taskName}'.`);
    this.name = 'UnknownDependencyError';
  }
}
