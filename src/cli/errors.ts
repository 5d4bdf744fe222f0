import { ChoreError } from '../errors.js';

/**
 * Thrown when none of the task file candidates exists.
 */
export class TaskFileNotFoundError extends ChoreError {
  constructor(public readonly candidates: string[]) {
    super(`No task file found. Looked for: ${candidates.join(', ')}`);
    this.name = 'TaskFileNotFoundError';
  }
}

export class TaskFileLoadError extends ChoreError {
  constructor(
    public readonly path: string,
    cause?: Error,
  ) {
    super(`Failed to load task file ${path}${cause ? `: ${cause.message}` : ''}`, cause);
    this.name = 'TaskFileLoadError';
  }
}

/**
 * Thrown when a resolved command matches no dispatch state.
 */
export class DispatchError extends ChoreError {
  constructor(
    message: string,
    public readonly state?: unknown,
  ) {
    super(message);
    this.name = 'DispatchError';
  }
}
