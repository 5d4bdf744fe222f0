import { ChoreError } from '../errors.js';

export class ConfigLoadError extends ChoreError {
  constructor(message: string, cause?: Error) {
    super(message, cause);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigNotFoundError extends ChoreError {
  constructor(public readonly path: string) {
    super(`Configuration file not found: ${path}`);
    this.name = 'ConfigNotFoundError';
  }
}

export interface ConfigIssue {
  message: string;
  path: (string | number)[];
}

export class ConfigValidationError extends ChoreError {
  constructor(public issues: ConfigIssue[]) {
    super(
      `Configuration validation failed: ${issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ')}`,
    );
    this.name = 'ConfigValidationError';
  }
}
