/**
 * Base class for every error that is reported to the user
 * and ends the run with exit code 1.
 */
export class ChoreError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ChoreError';
  }
}
