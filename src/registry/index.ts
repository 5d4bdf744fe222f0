export { Registry } from './registry.js';
export { MultipleDefaultsError, TaskNotFoundError, UnknownDependencyError } from './errors.js';
