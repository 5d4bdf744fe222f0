import { ChoreError } from '../errors.js';

export class EnvAssignmentError extends ChoreError {
  constructor(public readonly assignment: string) {
    super(`Invalid environment assignment '${assignment}'. Expected KEY=VALUE`);
    this.name = 'EnvAssignmentError';
  }
}

export class EnvFileError extends ChoreError {
  constructor(
    public readonly path: string,
    cause?: Error,
  ) {
    super(`Cannot read environment file ${path}${cause ? `: ${cause.message}` : ''}`, cause);
    this.name = 'EnvFileError';
  }
}
