import type { Printer } from '../output/printer.js';
import type { Task } from './task.js';

export type ParamType = 'string' | 'number' | 'integer' | 'boolean';

export type ParamValue = string | number | boolean;

/**
 * Declared task parameter.
 * A parameter without `default` is required.
 */
export interface ParamSpec {
  name: string;
  type?: ParamType;
  /** Allowed values for an enum-like parameter */
  choices?: readonly string[];
  default?: ParamValue;
}

export type TaskBody = (...args: unknown[]) => unknown;

export type TaskRef = Task | string;

/**
 * A `requires` entry: a task (or its name) called without arguments,
 * or a tuple of the task and the arguments bound to it.
 */
export type Requirement = TaskRef | readonly [TaskRef, readonly unknown[]];

export interface TaskDefinition {
  name: string;
  description?: string;
  params?: readonly ParamSpec[];
  requires?: TaskRef | readonly Requirement[];
  default?: boolean;
  env?: Record<string, string>;
  run(...args: unknown[]): unknown;
}

export interface Dependency {
  task: Task;
  args: readonly unknown[];
}

export interface TaskOptions {
  name: string;
  body(...args: unknown[]): unknown;
  description?: string;
  params?: readonly ParamSpec[];
  dependencies?: readonly Dependency[];
  isDefault?: boolean;
  isBuiltin?: boolean;
  env?: Record<string, string>;
}

export interface InvokeOptions {
  /** Where a body's return value is printed */
  printer?: Printer;
}
