export { Task } from './task.js';
export { coerceArgument, typeLabel } from './coerce.js';
export { ArityError, ArgumentTypeError, TaskDefinitionError } from './errors.js';
export type {
  Dependency,
  InvokeOptions,
  ParamSpec,
  ParamType,
  ParamValue,
  Requirement,
  TaskBody,
  TaskDefinition,
  TaskOptions,
  TaskRef,
} from './types.js';
