export { ChoreApp, chore, type AppOptions, type AppSettings, type EnvListingOptions } from './app.js';
export { ChoreError } from './errors.js';
export {
  Task,
  ArityError,
  ArgumentTypeError,
  TaskDefinitionError,
  type Dependency,
  type InvokeOptions,
  type ParamSpec,
  type ParamType,
  type ParamValue,
  type Requirement,
  type TaskBody,
  type TaskDefinition,
  type TaskOptions,
  type TaskRef,
} from './task/index.js';
export { Registry, MultipleDefaultsError, TaskNotFoundError, UnknownDependencyError } from './registry/index.js';
export { ShellExecutor, type RunOptions, type RunResult } from './shell/index.js';
export { EnvAssignmentError, EnvFileError } from './env/index.js';
export { createPrinter, renderBox, type Printer, type BoxRow } from './output/printer.js';
export { main } from './cli/index.js';
