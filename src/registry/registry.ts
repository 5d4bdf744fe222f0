import { z } from 'zod';
import { Task } from '../task/task.js';
import { TaskDefinitionError } from '../task/errors.js';
import { defaultFitsType } from '../task/coerce.js';
import type { Dependency, Requirement, TaskBody, TaskDefinition, TaskRef } from '../task/types.js';
import { MultipleDefaultsError, TaskNotFoundError, UnknownDependencyError } from './errors.js';

const TASK_NAME_REGEX = /^[A-Za-z0-9_][A-Za-z0-9_:.-]*$/;

const paramSchema = z
  .object({
    name: z.string().min(1, 'Parameter name cannot be empty'),
    type: z.enum(['string', 'number', 'integer', 'boolean']).optional(),
    choices: z.array(z.string()).min(1, 'choices cannot be empty').optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).optional(),
  })
  .strict()
  .refine((param) => !(param.choices && param.type && param.type !== 'string'), {
    message: 'choices can only be combined with type "string"',
    path: ['choices'],
  })
  .refine(
    (param) =>
      !param.choices || param.default === undefined || param.choices.includes(String(param.default)),
    { message: 'default must be one of choices', path: ['default'] },
  )
  .refine(defaultFitsType, (param) => ({
    message: `default does not match type "${param.type ?? 'string'}"`,
    path: ['default'],
  }));

const definitionSchema = z
  .object({
    name: z.string().regex(TASK_NAME_REGEX, 'Task name must be a non-empty identifier without spaces'),
    description: z.string().optional(),
    params: z
      .array(paramSchema)
      .refine((params) => new Set(params.map((param) => param.name)).size === params.length, {
        message: 'Parameter names must be unique',
      })
      .refine(
        (params) => {
          const firstOptional = params.findIndex((param) => param.default !== undefined);
          return firstOptional < 0 || params.slice(firstOptional).every((param) => param.default !== undefined);
        },
        { message: 'Required parameters must come before optional ones' },
      )
      .optional(),
    requires: z.unknown().optional(),
    default: z.boolean().optional(),
    env: z.record(z.string(), z.string()).optional(),
    run: z.custom<TaskBody>((value) => typeof value === 'function', 'run must be a function'),
  })
  .strict();

function isBound(entry: Requirement): entry is readonly [TaskRef, readonly unknown[]] {
  return Array.isArray(entry);
}

function isTaskRef(value: TaskRef | readonly Requirement[]): value is TaskRef {
  return typeof value === 'string' || value instanceof Task;
}

/**
 * Ordered collection of tasks keyed by name.
 *
 * Registering a name twice replaces the earlier task; the replacement keeps
 * the earlier task's position in listings.
 */
export class Registry {
  private readonly tasks = new Map<string, Task>();

  register(task: Task): Task {
    this.tasks.set(task.name, task);
    return task;
  }

  /**
   * Validates a task definition, resolves its requirements against the tasks
   * registered so far and registers the resulting task.
   *
   * @throws {TaskDefinitionError} when the definition is malformed
   * @throws {UnknownDependencyError} when a requirement is not registered yet
   */
  define(definition: TaskDefinition): Task {
    const result = definitionSchema.safeParse(definition);
    if (!result.success) {
      const name = typeof definition.name === 'string' && definition.name ? definition.name : '<unnamed>';
      throw new TaskDefinitionError(
        name,
        result.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        ),
      );
    }

    return this.register(
      new Task({
        name: definition.name,
        description: definition.description,
        params: definition.params,
        dependencies: this.resolveRequirements(definition.name, definition.requires),
        isDefault: definition.default,
        env: definition.env,
        body: definition.run,
      }),
    );
  }

  addBuiltin(name: string, description: string, body: TaskBody): Task {
    return this.register(new Task({ name, description, body, isBuiltin: true, isDefault: false }));
  }

  lookup(name: string): Task | undefined {
    return this.tasks.get(name);
  }

  /**
   * @throws {TaskNotFoundError}
   */
  get(name: string): Task {
    const task = this.tasks.get(name);
    if (!task) {
      throw new TaskNotFoundError(name);
    }
    return task;
  }

  /**
   * @throws {MultipleDefaultsError} when more than one task is marked default
   */
  getDefault(): Task | undefined {
    const defaults = this.list().filter((task) => task.isDefault);
    if (defaults.length > 1) {
      throw new MultipleDefaultsError(defaults.map((task) => task.name));
    }
    return defaults.length === 1 ? defaults[0] : undefined;
  }

  /**
   * True when no user task has been registered.
   */
  hasOnlyBuiltins(): boolean {
    return this.list().every((task) => task.isBuiltin);
  }

  list(): Task[] {
    return Array.from(this.tasks.values());
  }

  get size(): number {
    return this.tasks.size;
  }

  private resolveRequirements(
    taskName: string,
    requires: TaskDefinition['requires'],
  ): Dependency[] {
    if (requires === undefined) {
      return [];
    }

    const entries: readonly Requirement[] = isTaskRef(requires) ? [requires] : requires;

    return entries.map((entry) => {
      const [ref, args]: readonly [TaskRef, readonly unknown[]] = isBound(entry) ? entry : [entry, []];
      // Task files are plain JavaScript, so the shapes are checked here as well
      if (typeof ref !== 'string' && !(ref instanceof Task)) {
        throw new TaskDefinitionError(taskName, [
          `requires: expected a task or a task name, got ${String(ref)}`,
        ]);
      }
      if (!Array.isArray(args)) {
        throw new TaskDefinitionError(taskName, [
          `requires: arguments bound to '${String(ref)}' must be an array`,
        ]);
      }

      const name = typeof ref === 'string' ? ref : ref.name;
      const task = this.tasks.get(name);
      if (!task) {
        throw new UnknownDependencyError(taskName, name);
      }
      return { task, args };
    });
  }
}
