import { createPrinter, renderBox, type BoxRow } from '../output/printer.js';
import { coerceArgument, typeLabel } from './coerce.js';
import { ArityError, TaskDefinitionError } from './errors.js';
import type { Dependency, InvokeOptions, ParamSpec, TaskBody, TaskOptions } from './types.js';

function formatParam(param: ParamSpec): string {
  const label = typeLabel(param);
  const signature = label ? `${param.name}: ${label}` : param.name;
  if (param.default === undefined) {
    return signature;
  }
  return `${signature} = ${JSON.stringify(param.default)} (optional)`;
}

function assertParamOrder(taskName: string, params: readonly ParamSpec[]): void {
  const firstOptional = params.findIndex((param) => param.default !== undefined);
  if (firstOptional < 0) {
    return;
  }
  const misplaced = params.slice(firstOptional).filter((param) => param.default === undefined);
  if (misplaced.length > 0) {
    const names = misplaced.map((param) => `'${param.name}'`).join(', ');
    throw new TaskDefinitionError(taskName, [`params: required parameter ${names} follows an optional one`]);
  }
}

/**
 * A registered unit of work.
 *
 * Tasks are immutable: dependencies point at Task objects that already existed
 * when this task was built, so the dependency graph cannot contain a cycle.
 *
 * @throws {TaskDefinitionError} when a required parameter follows an optional one
 */
export class Task {
  readonly name: string;
  readonly description: string;
  readonly params: readonly ParamSpec[];
  readonly dependencies: readonly Dependency[];
  readonly isDefault: boolean;
  readonly isBuiltin: boolean;
  readonly env: Readonly<Record<string, string>>;
  private readonly body: TaskBody;

  constructor(options: TaskOptions) {
    this.name = options.name;
    assertParamOrder(options.name, options.params ?? []);
    this.description = options.description ?? '';
    this.params = options.params ?? [];
    this.dependencies = options.dependencies ?? [];
    this.isDefault = options.isDefault ?? false;
    this.isBuiltin = options.isBuiltin ?? false;
    this.env = { ...options.env };
    this.body = options.body;
  }

  /**
   * Parameters without a default value, in declaration order.
   */
  get requiredParams(): ParamSpec[] {
    return this.params.filter((param) => param.default === undefined);
  }

  /**
   * Runs the task: applies its environment, runs every dependency with its
   * bound arguments (in order, no memoization), validates the arguments and
   * calls the body. A non-empty return value is printed.
   *
   * @throws {ArityError} when required arguments are missing; dependencies
   * that already ran are not undone
   * @throws {ArgumentTypeError} when an argument cannot be coerced
   */
  async invoke(args: readonly unknown[] = [], options: InvokeOptions = {}): Promise<void> {
    for (const [key, value] of Object.entries(this.env)) {
      process.env[key] = value;
    }

    for (const dependency of this.dependencies) {
      await dependency.task.invoke(dependency.args, options);
    }

    const callArgs = this.bindArguments(args);
    const result = await this.body(...callArgs);

    if (result !== undefined && result !== null && result !== '') {
      (options.printer ?? createPrinter()).value(result);
    }
  }

  /**
   * Help text: name, requirements, parameters and description, followed by
   * the task's own environment when it has one.
   */
  describe(): string {
    const rows: BoxRow[] = [];
    if (this.dependencies.length > 0) {
      rows.push(['Requires', this.dependencies.map((dependency) => dependency.task.name).join(', ')]);
    }
    rows.push(['Parameters', this.params.map(formatParam).join(', ')]);
    rows.push(['Description', this.description.trim() || 'No description provided.']);

    const lines = renderBox(this.name, rows);
    const envRows = Object.entries(this.env);
    if (envRows.length > 0) {
      lines.push(...renderBox('Task-defined Environment', envRows, { sort: true }));
    }
    return lines.join('\n');
  }

  toString(): string {
    const tags: string[] = [];
    if (this.isDefault) tags.push('[default]');
    if (this.isBuiltin) tags.push('[builtin]');
    return tags.length > 0 ? `${this.name} ${tags.join(' ')}` : this.name;
  }

  private bindArguments(args: readonly unknown[]): unknown[] {
    const required = this.requiredParams;
    if (args.length < required.length) {
      const missing = required.slice(args.length).map((param) => param.name);
      throw new ArityError(
        `Missing arguments for task '${this.name}': ${missing.join(', ')}`,
        this.name,
        missing,
      );
    }

    if (args.length > this.params.length) {
      throw new ArityError(
        `Too many arguments for task '${this.name}': expected at most ${this.params.length}, got ${args.length}`,
        this.name,
        [],
      );
    }

    return this.params.map((param, index) =>
      coerceArgument(this.name, param, index < args.length ? args[index] : param.default),
    );
  }
}
